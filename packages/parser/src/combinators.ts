/**
 * Programmatic parser combinator API for @tagweave/parser
 *
 * All combinators return `Parser<T, S>` values that can be composed freely.
 * Alternation is ordered: first match wins, and the second branch always
 * restarts from the original position.
 */

import { TW3001, formatMessage } from "@tagweave/core";
import { ParseError } from "./errors.js";
import type {
  FailureKind,
  FailureTrace,
  Input,
  Pair,
  ParseFailure,
  ParseResult,
  ParseSuccess,
  Parser,
  Predicate,
} from "./types.js";

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Create a Parser from a raw parse function. */
export function mkParser<T, S = string>(
  expected: string,
  parseFn: (input: Input<S>, pos: number, trace?: FailureTrace) => ParseResult<T>
): Parser<T, S> {
  const parser: Parser<T, S> = {
    expected,
    parse(input: Input<S>, pos = 0, trace?: FailureTrace): ParseResult<T> {
      return parseFn(input, pos, trace);
    },
    parseAll(input: Input<S>): T {
      const trace: FailureTrace = { furthest: null };
      const result = parseFn(input, 0, trace);
      const furthest = trace.furthest;
      if (!result.ok) {
        throw new ParseError(input, furthest && furthest.pos > result.pos ? furthest : result);
      }
      if (result.pos !== input.length) {
        // A malformed tail: `many`/`optional` stopped at the marker, but the
        // real trigger is further on.
        throw new ParseError(
          input,
          furthest && furthest.pos > result.pos ? furthest : fail(result.pos, "end of input", "TrailingInput")
        );
      }
      return result.value;
    },
    and: <B>(q: Parser<B, S>) => and(parser, q),
    andThen: <B>(q: Parser<B, S>) => andThen(parser, q),
    orElse: <B>(q: Parser<B, S>) => orElse(parser, q),
    map: <B>(f: (value: T) => B) => map(parser, f),
  };
  return parser;
}

export function ok<T>(value: T, pos: number): ParseSuccess<T> {
  return { ok: true, value, pos };
}

export function fail(
  pos: number,
  expected: string,
  kind: FailureKind,
  cause?: ParseFailure
): ParseFailure {
  return cause ? { ok: false, pos, expected, kind, cause } : { ok: false, pos, expected, kind };
}

/** Keep `failure` if it lies strictly past the furthest one seen so far. */
export function recordFailure(trace: FailureTrace | undefined, failure: ParseFailure): void {
  if (trace && (trace.furthest === null || failure.pos > trace.furthest.pos)) {
    trace.furthest = failure;
  }
}

/** Failure of the second part of a sequence, reported where that part failed. */
function sequenceFailure(inner: ParseFailure): ParseFailure {
  return fail(inner.pos, inner.expected, "SequenceFailure", inner);
}

function invalidArgument(combinator: string, reason: string): RangeError {
  return new RangeError(`TW${TW3001.code}: ${formatMessage(TW3001, { combinator, reason })}`);
}

/**
 * Append to a per-call collection. Converts the runtime's RangeError on an
 * oversized array into an AllocationFailure; collected elements are kept.
 *
 * @internal
 */
export function append<T>(results: T[], value: T, pos: number, expected: string): ParseFailure | null {
  try {
    results.push(value);
    return null;
  } catch (error) {
    if (error instanceof RangeError) {
      return fail(pos, expected, "AllocationFailure");
    }
    throw error;
  }
}

// ---------------------------------------------------------------------------
// Primitive parsers
// ---------------------------------------------------------------------------

/**
 * Match one symbol satisfying `predicate`. Fails with `EndOfInput` past the
 * end, and with `Unsatisfied` (without advancing) otherwise.
 */
export function satisfy<S>(predicate: Predicate<S>, expected: string): Parser<S, S> {
  return mkParser<S, S>(expected, (input, pos) => {
    if (pos >= input.length) {
      return fail(pos, expected, "EndOfInput");
    }
    const current = input[pos];
    if (predicate(current)) {
      return ok(current, pos + 1);
    }
    return fail(pos, expected, "Unsatisfied");
  });
}

/** Match a single specific symbol. */
export function symbol<S>(expectedSymbol: S, expected: string = JSON.stringify(expectedSymbol)): Parser<S, S> {
  return satisfy<S>((s) => s === expectedSymbol, expected);
}

/** Match any single symbol. */
export function anySymbol<S = string>(): Parser<S, S> {
  return satisfy<S>(() => true, "any symbol");
}

/** Match an exact run of symbols, e.g. a string literal over string input. */
export function literal(text: string): Parser<string> {
  const expected = JSON.stringify(text);
  return mkParser(expected, (input, pos) => {
    for (let i = 0; i < text.length; i++) {
      const at = pos + i;
      if (at >= input.length) return fail(at, expected, "EndOfInput");
      if (input[at] !== text[i]) return fail(pos, expected, "Unsatisfied");
    }
    return ok(text, pos + text.length);
  });
}

/** Match end of input. */
export function eof<S = string>(): Parser<null, S> {
  return mkParser<null, S>("end of input", (input, pos) => {
    if (pos >= input.length) {
      return ok(null, pos);
    }
    return fail(pos, "end of input", "TrailingInput");
  });
}

// ---------------------------------------------------------------------------
// Sequence combinators
// ---------------------------------------------------------------------------

/**
 * Run `p` then `q`, keeping both outputs as `{ first, second }`.
 * A failure of `p` propagates unchanged; a failure of `q` becomes a
 * `SequenceFailure` at `q`'s position. `p`'s consumption is never undone.
 */
export function and<A, B, S = string>(p: Parser<A, S>, q: Parser<B, S>): Parser<Pair<A, B>, S> {
  return mkParser<Pair<A, B>, S>(p.expected, (input, pos, trace) => {
    const rp = p.parse(input, pos, trace);
    if (!rp.ok) return rp;
    const rq = q.parse(input, rp.pos, trace);
    if (!rq.ok) return sequenceFailure(rq);
    return ok({ first: rp.value, second: rq.value }, rq.pos);
  });
}

/** Run `p` then `q`, keeping only `q`'s output. Same failure policy as `and`. */
export function andThen<A, B, S = string>(p: Parser<A, S>, q: Parser<B, S>): Parser<B, S> {
  return mkParser<B, S>(p.expected, (input, pos, trace) => {
    const rp = p.parse(input, pos, trace);
    if (!rp.ok) return rp;
    const rq = q.parse(input, rp.pos, trace);
    if (!rq.ok) return sequenceFailure(rq);
    return rq;
  });
}

/**
 * Marker-then-payload: `marker` must match (its output is discarded) before
 * `payload` is attempted, e.g. a leading "." then a class name.
 */
export function rightOnly<A, B, S = string>(marker: Parser<A, S>, payload: Parser<B, S>): Parser<B, S> {
  return andThen(marker, payload);
}

/** Payload-then-terminator: keep `p`'s output, require `terminator` after it. */
export function leftOnly<A, B, S = string>(p: Parser<A, S>, terminator: Parser<B, S>): Parser<A, S> {
  return mkParser<A, S>(p.expected, (input, pos, trace) => {
    const rp = p.parse(input, pos, trace);
    if (!rp.ok) return rp;
    const rt = terminator.parse(input, rp.pos, trace);
    if (!rt.ok) return sequenceFailure(rt);
    return ok(rp.value, rt.pos);
  });
}

/** Parse `p` between `open` and `close`, returning only the inner result. */
export function between<O, T, C, S = string>(
  open: Parser<O, S>,
  p: Parser<T, S>,
  close: Parser<C, S>
): Parser<T, S> {
  return rightOnly(open, leftOnly(p, close));
}

// ---------------------------------------------------------------------------
// Alternation
// ---------------------------------------------------------------------------

/**
 * Ordered alternation: try `p`; if it fails, try `q` from the same original
 * position. When `p` fails the outcome is exactly `q`'s.
 */
export function orElse<A, B, S = string>(p: Parser<A, S>, q: Parser<B, S>): Parser<A | B, S> {
  return mkParser<A | B, S>(`${p.expected} or ${q.expected}`, (input, pos, trace) => {
    const rp = p.parse(input, pos, trace);
    if (rp.ok) return rp;
    recordFailure(trace, rp);
    return q.parse(input, pos, trace);
  });
}

/** n-ary `orElse`; the last alternative's failure is reported. */
export function choice<T, S = string>(...parsers: [Parser<T, S>, ...Parser<T, S>[]]): Parser<T, S> {
  const [head, ...rest] = parsers;
  return rest.reduce<Parser<T, S>>((acc, next) => orElse(acc, next), head);
}

// ---------------------------------------------------------------------------
// Repetition
// ---------------------------------------------------------------------------

/**
 * Zero or more repetitions. Always succeeds, resuming after the last
 * successful application. Stops on an application that consumes nothing.
 */
export function many<T, S = string>(p: Parser<T, S>): Parser<T[], S> {
  return mkParser<T[], S>(`many ${p.expected}`, (input, pos, trace) => {
    const results: T[] = [];
    let cur = pos;
    for (;;) {
      const r = p.parse(input, cur, trace);
      if (!r.ok) {
        recordFailure(trace, r);
        break;
      }
      if (r.pos === cur) break; // zero-width match
      const overflow = append(results, r.value, cur, p.expected);
      if (overflow) return overflow;
      cur = r.pos;
    }
    return ok(results, cur);
  });
}

/** One or more repetitions: `p` followed by `many(p)`. */
export function manyOne<T, S = string>(p: Parser<T, S>): Parser<T[], S> {
  const rest = many(p);
  return mkParser<T[], S>(p.expected, (input, pos, trace) => {
    const first = p.parse(input, pos, trace);
    if (!first.ok) return first;
    const tail = rest.parse(input, first.pos, trace);
    if (!tail.ok) return tail;
    const results = [first.value];
    for (const value of tail.value) {
      const overflow = append(results, value, tail.pos, p.expected);
      if (overflow) return overflow;
    }
    return ok(results, tail.pos);
  });
}

/**
 * Between `min` and `max` repetitions (inclusive). Fails with the inner
 * failure when fewer than `min` applications succeed.
 */
export function times<T, S = string>(p: Parser<T, S>, min: number, max: number): Parser<T[], S> {
  if (!Number.isInteger(min) || min < 0) {
    throw invalidArgument("times", `min must be a non-negative integer, got ${min}`);
  }
  if (!(Number.isInteger(max) || max === Infinity) || max < min) {
    throw invalidArgument("times", `max must be an integer >= min (${min}), got ${max}`);
  }
  return mkParser<T[], S>(p.expected, (input, pos, trace) => {
    const results: T[] = [];
    let cur = pos;
    while (results.length < max) {
      const r = p.parse(input, cur, trace);
      if (!r.ok) {
        if (results.length < min) return r;
        recordFailure(trace, r);
        break;
      }
      const overflow = append(results, r.value, cur, p.expected);
      if (overflow) return overflow;
      if (r.pos === cur) {
        // Zero-width matches repeat forever; one counts for all remaining.
        while (results.length < min) results.push(r.value);
        break;
      }
      cur = r.pos;
    }
    return ok(results, cur);
  });
}

/** Zero or more items separated by `sep`. */
export function sepBy<T, D, S = string>(item: Parser<T, S>, sep: Parser<D, S>): Parser<T[], S> {
  const nonEmpty = sepBy1(item, sep);
  return mkParser<T[], S>(`${item.expected} list`, (input, pos, trace) => {
    const r = nonEmpty.parse(input, pos, trace);
    if (r.ok) return r;
    recordFailure(trace, r);
    return ok([], pos);
  });
}

/** One or more items separated by `sep`. A dangling separator is not consumed. */
export function sepBy1<T, D, S = string>(item: Parser<T, S>, sep: Parser<D, S>): Parser<T[], S> {
  return mkParser<T[], S>(item.expected, (input, pos, trace) => {
    const first = item.parse(input, pos, trace);
    if (!first.ok) return first;
    const results: T[] = [first.value];
    let cur = first.pos;
    for (;;) {
      const rs = sep.parse(input, cur, trace);
      if (!rs.ok) {
        recordFailure(trace, rs);
        break;
      }
      const ri = item.parse(input, rs.pos, trace);
      if (!ri.ok) {
        recordFailure(trace, ri);
        break;
      }
      if (ri.pos === cur) break;
      const overflow = append(results, ri.value, cur, item.expected);
      if (overflow) return overflow;
      cur = ri.pos;
    }
    return ok(results, cur);
  });
}

/** Zero or one: `null` at the original position when `p` fails. Never fails. */
export function optional<T, S = string>(p: Parser<T, S>): Parser<T | null, S> {
  return mkParser<T | null, S>(`optional ${p.expected}`, (input, pos, trace) => {
    const r = p.parse(input, pos, trace);
    if (r.ok) return r;
    recordFailure(trace, r);
    return ok(null, pos);
  });
}

// ---------------------------------------------------------------------------
// Lookahead / negation
// ---------------------------------------------------------------------------

/** Negative lookahead: succeed with null only if `p` fails here. Consumes nothing. */
export function not<T, S = string>(p: Parser<T, S>): Parser<null, S> {
  const expected = `not ${p.expected}`;
  return mkParser<null, S>(expected, (input, pos) => {
    const r = p.parse(input, pos);
    if (r.ok) return fail(pos, expected, "Unsatisfied");
    return ok(null, pos);
  });
}

// ---------------------------------------------------------------------------
// Transformation
// ---------------------------------------------------------------------------

/** Transform a parser's output with a total function. Failures pass through. */
export function map<A, B, S = string>(p: Parser<A, S>, f: (a: A) => B): Parser<B, S> {
  return mkParser<B, S>(p.expected, (input, pos, trace) => {
    const r = p.parse(input, pos, trace);
    if (!r.ok) return r;
    return ok(f(r.value), r.pos);
  });
}

/** Rename the construct a parser reports. Only top-level failures of `p` are relabelled. */
export function label<T, S = string>(p: Parser<T, S>, expected: string): Parser<T, S> {
  return mkParser<T, S>(expected, (input, pos, trace) => {
    const r = p.parse(input, pos, trace);
    if (r.ok || r.kind === "SequenceFailure") return r;
    return fail(r.pos, expected, r.kind, r.cause);
  });
}

/** Lazy parser for recursive grammars. `f` is called on first use. */
export function lazy<T, S = string>(f: () => Parser<T, S>, expected = "lazy parser"): Parser<T, S> {
  let cached: Parser<T, S> | null = null;
  return mkParser<T, S>(expected, (input, pos, trace) => {
    if (!cached) cached = f();
    return cached.parse(input, pos, trace);
  });
}

// ---------------------------------------------------------------------------
// Character classes
// ---------------------------------------------------------------------------

export function isAlpha(ch: string): boolean {
  return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z");
}

export function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

export function isSpace(ch: string): boolean {
  return ch === " " || ch === "\t";
}

/** Match a single ASCII letter [a-zA-Z]. */
export function letter(): Parser<string> {
  return satisfy(isAlpha, "letter");
}

/** Match a single ASCII digit [0-9]. */
export function digit(): Parser<string> {
  return satisfy(isDigit, "digit");
}

/** Match a single space or tab. */
export function space(): Parser<string> {
  return satisfy(isSpace, "space");
}
