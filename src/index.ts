/**
 * tagweave - Parser combinators and an element-abbreviation expander
 *
 * Re-exports the three workspace packages:
 * - `@tagweave/core`: configuration, diagnostics, logging
 * - `@tagweave/parser`: the combinator engine
 * - `@tagweave/abbreviation`: the abbreviation grammar and markup serializer
 *
 * @example
 * ```typescript
 * import { expand } from "tagweave";
 *
 * expand("ul>li*2", { content: "item" });
 * // → "<ul><li>item</li><li>item</li></ul>"
 * ```
 */

export * from "@tagweave/core";
export * from "@tagweave/parser";

// Grammar rules such as `label` would clash with the combinator of the same
// name, so they stay under the `abbreviation` namespace.
export * as abbreviation from "@tagweave/abbreviation";
export {
  MAX_REPEAT_COUNT,
  OutputBuffer,
  SerializeError,
  escapeAttribute,
  expand,
  parseAbbreviation,
  serialize,
  serializeInto,
  type AbbreviationNode,
  type SerializeErrorKind,
  type SerializeOptions,
} from "@tagweave/abbreviation";

export { run, type CliIO } from "./cli/index.js";
