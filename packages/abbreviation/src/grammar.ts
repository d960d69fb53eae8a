/**
 * The abbreviation grammar, assembled from @tagweave/parser combinators.
 *
 * ```
 * label      := ManyOne(letter)
 * number     := ManyOne(digit)
 * className  := RightOnly('.', label)
 * id         := RightOnly('#', label)
 * count      := RightOnly('*', number)
 * node       := And(label, And(Optional(OrElse(className, id)), Optional(count)))
 * child      := RightOnly('>', node)
 * expression := And(node, Many(child))
 * ```
 *
 * Children form a flat sibling list under the root: `a>b>c` gives `a` two
 * children, not a chain of depth three.
 */

import {
  and,
  isAlpha,
  isDigit,
  many,
  manyOne,
  map,
  optional,
  orElse,
  rightOnly,
  satisfy,
  type Parser,
} from "@tagweave/parser";
import { MAX_REPEAT_COUNT, type AbbreviationNode } from "./types.js";

// ---------------------------------------------------------------------------
// Atoms
// ---------------------------------------------------------------------------

export const isDot = (ch: string): boolean => ch === ".";
export const isSharp = (ch: string): boolean => ch === "#";
export const isAsterisk = (ch: string): boolean => ch === "*";
export const isGreater = (ch: string): boolean => ch === ">";

export const letterAtom: Parser<string> = satisfy(isAlpha, "letter");
export const digitAtom: Parser<string> = satisfy(isDigit, "digit");
export const dotAtom: Parser<string> = satisfy(isDot, '"."');
export const sharpAtom: Parser<string> = satisfy(isSharp, '"#"');
export const asteriskAtom: Parser<string> = satisfy(isAsterisk, '"*"');
export const greaterAtom: Parser<string> = satisfy(isGreater, '">"');

// ---------------------------------------------------------------------------
// Rules
// ---------------------------------------------------------------------------

/**
 * Left-to-right positional accumulation of decimal digits, saturating at
 * {@link MAX_REPEAT_COUNT}.
 */
export function accumulateDigits(digits: readonly string[]): number {
  let acc = 0;
  for (const d of digits) {
    acc = Math.min(acc * 10 + (d.charCodeAt(0) - 48), MAX_REPEAT_COUNT);
  }
  return acc;
}

export const label: Parser<string> = map(manyOne(letterAtom), (letters) => letters.join(""));

export const number: Parser<number> = map(manyOne(digitAtom), accumulateDigits);

export const className: Parser<string> = rightOnly(dotAtom, label);

export const id: Parser<string> = rightOnly(sharpAtom, label);

export const count: Parser<number> = rightOnly(asteriskAtom, number);

/** `.class` or `#id`; both share one slot after the label. */
export type Qualifier = { kind: "class"; name: string } | { kind: "id"; name: string };

const qualifier: Parser<Qualifier> = orElse(
  map(className, (name): Qualifier => ({ kind: "class", name })),
  map(id, (name): Qualifier => ({ kind: "id", name }))
);

export const node: Parser<AbbreviationNode> = map(
  and(label, and(optional(qualifier), optional(count))),
  ({ first, second }) => ({
    label: first,
    className: second.first?.kind === "class" ? second.first.name : "",
    id: second.first?.kind === "id" ? second.first.name : null,
    repeatCount: second.second ?? 1,
    children: [],
  })
);

export const child: Parser<AbbreviationNode> = rightOnly(greaterAtom, node);

export const expression: Parser<AbbreviationNode> = map(
  and(node, many(child)),
  ({ first, second }) => ({ ...first, children: second })
);

/**
 * Parse a complete abbreviation.
 *
 * @throws ParseError when the input is not an abbreviation or has trailing symbols
 */
export function parseAbbreviation(input: string): AbbreviationNode {
  return expression.parseAll(input);
}
