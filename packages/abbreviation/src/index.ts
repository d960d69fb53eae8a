/**
 * @tagweave/abbreviation
 *
 * Grammar and serializer for the compact element notation
 * `label(.class|#id)?(*count)?(>node)*`.
 *
 * @example
 * ```typescript
 * import { expand } from "@tagweave/abbreviation";
 *
 * expand("div.root*2", { content: "it" });
 * // → '<div class="root">it</div><div class="root">it</div>'
 * ```
 *
 * @module
 */

export { MAX_REPEAT_COUNT, type AbbreviationNode } from "./types.js";

export {
  isDot,
  isSharp,
  isAsterisk,
  isGreater,
  letterAtom,
  digitAtom,
  dotAtom,
  sharpAtom,
  asteriskAtom,
  greaterAtom,
  accumulateDigits,
  label,
  number,
  className,
  id,
  count,
  node,
  child,
  expression,
  parseAbbreviation,
  type Qualifier,
} from "./grammar.js";

export {
  OutputBuffer,
  SerializeError,
  escapeAttribute,
  serialize,
  serializeInto,
  expand,
  type SerializeErrorKind,
  type SerializeOptions,
} from "./serialize.js";
