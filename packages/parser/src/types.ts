/**
 * Core types for @tagweave/parser
 *
 * Defines the input contract, the parse outcome and the parser interface.
 */

/**
 * An immutable, randomly indexable sequence of symbols. A `string` is an
 * `Input<string>` of UTF-16 code units; a `Uint8Array` is an `Input<number>`.
 */
export type Input<S> = ArrayLike<S>;

/** Why a parse failed. */
export type FailureKind =
  | "EndOfInput"
  | "Unsatisfied"
  | "SequenceFailure"
  | "AllocationFailure"
  | "TrailingInput";

/** A failed parse. Carries no output and promises no consumption. */
export interface ParseFailure {
  readonly ok: false;
  /** Position of the symbol that triggered the failure. */
  readonly pos: number;
  /** The matcher or construct that was expected at `pos`. */
  readonly expected: string;
  readonly kind: FailureKind;
  /** The inner failure a sequence wrapped, if any. */
  readonly cause?: ParseFailure;
}

/** A successful parse: the output and the position to resume from. */
export interface ParseSuccess<T> {
  readonly ok: true;
  readonly value: T;
  readonly pos: number;
}

/** Result of a parse attempt. */
export type ParseResult<T> = ParseSuccess<T> | ParseFailure;

/**
 * Per-call record of the furthest failure a parse absorbed (`many`,
 * `optional`) or backtracked over (`orElse`). Only read for error reporting.
 */
export interface FailureTrace {
  furthest: ParseFailure | null;
}

/** A parser is a pure function from (input, position) to ParseResult. */
export interface Parser<T, S = string> {
  /** Name of the construct, used as `expected` when this parser fails. */
  readonly expected: string;
  /** Attempt to parse starting at `pos` (default 0). */
  parse(input: Input<S>, pos?: number, trace?: FailureTrace): ParseResult<T>;
  /**
   * Parse the full input, throwing `ParseError` if not consumed entirely.
   * Reports the furthest failure when it lies past the point parsing stopped.
   */
  parseAll(input: Input<S>): T;
  /** `and(this, q)` */
  and<B>(q: Parser<B, S>): Parser<Pair<T, B>, S>;
  /** `andThen(this, q)` */
  andThen<B>(q: Parser<B, S>): Parser<B, S>;
  /** `orElse(this, q)` */
  orElse<B>(q: Parser<B, S>): Parser<T | B, S>;
  /** `map(this, f)` */
  map<B>(f: (value: T) => B): Parser<B, S>;
}

/** Output of `and`: a named pair instead of a positional tuple. */
export interface Pair<A, B> {
  readonly first: A;
  readonly second: B;
}

/** Output type of a parser, resolved statically. */
export type Output<P> = P extends Parser<infer T, infer _S> ? T : never;

/** Symbol type a parser consumes. */
export type SymbolOf<P> = P extends Parser<infer _T, infer S> ? S : never;

/** The predicate a `satisfy` parser tests each symbol with. */
export type Predicate<S> = (symbol: S) => boolean;
