import { describe, it, expect, expectTypeOf } from "vitest";
import {
  satisfy,
  symbol,
  anySymbol,
  literal,
  eof,
  and,
  andThen,
  rightOnly,
  leftOnly,
  between,
  orElse,
  choice,
  many,
  manyOne,
  times,
  sepBy,
  sepBy1,
  optional,
  not,
  map,
  label,
  lazy,
  letter,
  digit,
  space,
  isDigit,
  ParseError,
} from "../index.js";
import { append, fail, recordFailure } from "../combinators.js";
import type { FailureTrace, Output, Pair, Parser, SymbolOf } from "../types.js";

// ---------------------------------------------------------------------------
// Primitives
// ---------------------------------------------------------------------------

describe("satisfy", () => {
  const digitP = satisfy(isDigit, "digit");

  it("consumes exactly one matching symbol", () => {
    expect(digitP.parse("7x")).toEqual({ ok: true, value: "7", pos: 1 });
  });

  it("fails with Unsatisfied without advancing", () => {
    expect(digitP.parse("x7")).toEqual({ ok: false, pos: 0, expected: "digit", kind: "Unsatisfied" });
  });

  it("fails with EndOfInput on empty input", () => {
    expect(digitP.parse("")).toEqual({ ok: false, pos: 0, expected: "digit", kind: "EndOfInput" });
  });

  it("fails with EndOfInput past the last symbol", () => {
    expect(digitP.parse("12", 2)).toEqual({ ok: false, pos: 2, expected: "digit", kind: "EndOfInput" });
  });

  it("respects position offset", () => {
    expect(digitP.parse("ab3", 2)).toEqual({ ok: true, value: "3", pos: 3 });
  });

  it("works over byte input", () => {
    const digitByte = satisfy<number>((b) => b >= 0x30 && b <= 0x39, "digit byte");
    expect(digitByte.parse(new Uint8Array([0x31, 0x41]))).toEqual({ ok: true, value: 0x31, pos: 1 });
    expect(digitByte.parse(new Uint8Array([0x41]))).toEqual({
      ok: false,
      pos: 0,
      expected: "digit byte",
      kind: "Unsatisfied",
    });
  });
});

describe("symbol", () => {
  it("matches one specific symbol", () => {
    expect(symbol(".").parse(".a")).toEqual({ ok: true, value: ".", pos: 1 });
  });

  it("names the symbol it expected", () => {
    expect(symbol(".").parse("a")).toEqual({ ok: false, pos: 0, expected: '"."', kind: "Unsatisfied" });
  });
});

describe("anySymbol", () => {
  it("matches any single symbol", () => {
    expect(anySymbol().parse("\n")).toEqual({ ok: true, value: "\n", pos: 1 });
  });

  it("fails on empty input", () => {
    expect(anySymbol().parse("").ok).toBe(false);
  });
});

describe("literal", () => {
  it("matches an exact run", () => {
    expect(literal("div").parse("div>")).toEqual({ ok: true, value: "div", pos: 3 });
  });

  it("fails at the start on mismatch", () => {
    expect(literal("div").parse("dix")).toEqual({
      ok: false,
      pos: 0,
      expected: '"div"',
      kind: "Unsatisfied",
    });
  });

  it("reports where the input ran out", () => {
    expect(literal("div").parse("di")).toEqual({
      ok: false,
      pos: 2,
      expected: '"div"',
      kind: "EndOfInput",
    });
  });
});

describe("eof", () => {
  it("succeeds at end of input", () => {
    expect(eof().parse("", 0)).toEqual({ ok: true, value: null, pos: 0 });
    expect(eof().parse("abc", 3)).toEqual({ ok: true, value: null, pos: 3 });
  });

  it("fails when input remains", () => {
    expect(eof().parse("abc", 0).ok).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Sequencing
// ---------------------------------------------------------------------------

describe("and", () => {
  const p = and(letter(), digit());

  it("pairs both outputs", () => {
    expect(p.parse("a1")).toEqual({ ok: true, value: { first: "a", second: "1" }, pos: 2 });
  });

  it("propagates the first parser's failure unchanged", () => {
    expect(p.parse("11")).toEqual({ ok: false, pos: 0, expected: "letter", kind: "Unsatisfied" });
  });

  it("reports a second-part failure at that part's position", () => {
    expect(p.parse("ab")).toEqual({
      ok: false,
      pos: 1,
      expected: "digit",
      kind: "SequenceFailure",
      cause: { ok: false, pos: 1, expected: "digit", kind: "Unsatisfied" },
    });
  });

  it("keeps EndOfInput as the cause when the input runs out", () => {
    const r = p.parse("a");
    expect(r.ok).toBe(false);
    if (!r.ok) {
      expect(r.kind).toBe("SequenceFailure");
      expect(r.cause).toEqual({ ok: false, pos: 1, expected: "digit", kind: "EndOfInput" });
    }
  });
});

describe("andThen", () => {
  it("keeps only the second output", () => {
    expect(andThen(symbol("*"), digit()).parse("*5")).toEqual({ ok: true, value: "5", pos: 2 });
  });

  it("does not undo the first parser's consumption", () => {
    const r = andThen(letter(), digit()).parse("ab");
    expect(r).toMatchObject({ ok: false, pos: 1, kind: "SequenceFailure" });
  });

  it("relies on orElse for backtracking", () => {
    const p = orElse(andThen(letter(), digit()), letter());
    expect(p.parse("ab")).toEqual({ ok: true, value: "a", pos: 1 });
  });
});

describe("rightOnly", () => {
  it("discards the marker", () => {
    const className = map(rightOnly(symbol("."), manyOne(letter())), (cs) => cs.join(""));
    expect(className.parse(".root")).toEqual({ ok: true, value: "root", pos: 5 });
  });

  it("fails without the marker", () => {
    const p = rightOnly(symbol("."), manyOne(letter()));
    expect(p.parse("root")).toEqual({ ok: false, pos: 0, expected: '"."', kind: "Unsatisfied" });
  });
});

describe("leftOnly", () => {
  it("keeps the first output", () => {
    expect(leftOnly(letter(), symbol(";")).parse("a;")).toEqual({ ok: true, value: "a", pos: 2 });
  });
});

describe("between", () => {
  const p = between(symbol("("), digit(), symbol(")"));

  it("extracts content between delimiters", () => {
    expect(p.parse("(4)")).toEqual({ ok: true, value: "4", pos: 3 });
  });

  it("fails on missing close at the close position", () => {
    expect(p.parse("(4")).toMatchObject({ ok: false, pos: 2, expected: '")"', kind: "SequenceFailure" });
  });
});

// ---------------------------------------------------------------------------
// Alternation
// ---------------------------------------------------------------------------

describe("orElse", () => {
  it("tries first then second", () => {
    const p = orElse(digit(), letter());
    expect(p.parse("7")).toEqual({ ok: true, value: "7", pos: 1 });
    expect(p.parse("a")).toEqual({ ok: true, value: "a", pos: 1 });
  });

  it("is left-biased when both would succeed", () => {
    expect(orElse(literal("ab"), literal("a")).parse("ab")).toEqual({ ok: true, value: "ab", pos: 2 });
    expect(orElse(literal("a"), literal("ab")).parse("ab")).toEqual({ ok: true, value: "a", pos: 1 });
  });

  it("returns the second parser's failure when both fail", () => {
    expect(orElse(digit(), letter()).parse("#")).toEqual({
      ok: false,
      pos: 0,
      expected: "letter",
      kind: "Unsatisfied",
    });
  });

  it("restarts the second branch from the original position", () => {
    const p = orElse(and(letter(), digit()), manyOne(letter()));
    expect(p.parse("ab1")).toEqual({ ok: true, value: ["a", "b"], pos: 2 });
  });

  it("describes both alternatives", () => {
    expect(orElse(digit(), letter()).expected).toBe("digit or letter");
  });
});

describe("choice", () => {
  it("picks the first matching alternative", () => {
    const marker = choice(symbol("."), symbol("#"), symbol("*"));
    expect(marker.parse("*")).toEqual({ ok: true, value: "*", pos: 1 });
    expect(marker.parse(">")).toEqual({ ok: false, pos: 0, expected: '"*"', kind: "Unsatisfied" });
  });
});

// ---------------------------------------------------------------------------
// Repetition
// ---------------------------------------------------------------------------

describe("many", () => {
  it("collects until the inner parser fails", () => {
    expect(many(digit()).parse("123ab")).toEqual({ ok: true, value: ["1", "2", "3"], pos: 3 });
  });

  it("succeeds with an empty list on zero matches", () => {
    expect(many(digit()).parse("ab")).toEqual({ ok: true, value: [], pos: 0 });
    expect(many(digit()).parse("")).toEqual({ ok: true, value: [], pos: 0 });
  });

  it("resumes before a partially consumed failing attempt", () => {
    const p = many(and(letter(), digit()));
    expect(p.parse("a1b2c")).toEqual({
      ok: true,
      value: [
        { first: "a", second: "1" },
        { first: "b", second: "2" },
      ],
      pos: 4,
    });
  });

  it("stops on a zero-width match", () => {
    expect(many(optional(digit())).parse("ab")).toEqual({ ok: true, value: [], pos: 0 });
    expect(many(optional(digit())).parse("12a")).toEqual({ ok: true, value: ["1", "2"], pos: 2 });
  });

  it("allocates a fresh collection for every call", () => {
    const p = many(digit());
    const first = p.parse("12");
    const second = p.parse("3");
    expect(first).toEqual({ ok: true, value: ["1", "2"], pos: 2 });
    expect(second).toEqual({ ok: true, value: ["3"], pos: 1 });
    if (first.ok && second.ok) expect(first.value).not.toBe(second.value);
  });

  it("is not affected by a caller mutating an earlier result", () => {
    const p = many(letter());
    const first = p.parse("ab");
    if (first.ok) first.value.push("z");
    expect(p.parse("ab")).toEqual({ ok: true, value: ["a", "b"], pos: 2 });
  });
});

describe("manyOne", () => {
  it("collects one or more", () => {
    expect(manyOne(letter()).parse("div.x")).toEqual({ ok: true, value: ["d", "i", "v"], pos: 3 });
  });

  it("fails when the first application fails", () => {
    expect(manyOne(letter()).parse("123")).toEqual({
      ok: false,
      pos: 0,
      expected: "letter",
      kind: "Unsatisfied",
    });
    expect(manyOne(letter()).parse("")).toEqual({ ok: false, pos: 0, expected: "letter", kind: "EndOfInput" });
  });

  it("returns independent collections from repeated calls", () => {
    const p = manyOne(letter());
    const first = p.parse("ab");
    if (first.ok) first.value.push("z");
    const second = p.parse("ab");
    expect(second).toEqual({ ok: true, value: ["a", "b"], pos: 2 });
    if (first.ok && second.ok) expect(first.value).not.toBe(second.value);
  });
});

describe("times", () => {
  it("stops at the maximum", () => {
    expect(times(digit(), 2, 3).parse("12345")).toEqual({ ok: true, value: ["1", "2", "3"], pos: 3 });
  });

  it("accepts anything between the bounds", () => {
    expect(times(digit(), 2, 3).parse("12a")).toEqual({ ok: true, value: ["1", "2"], pos: 2 });
  });

  it("fails with the inner failure below the minimum", () => {
    expect(times(digit(), 2, 3).parse("1a")).toEqual({ ok: false, pos: 1, expected: "digit", kind: "Unsatisfied" });
  });

  it("allows zero when min is zero", () => {
    expect(times(digit(), 0, 2).parse("a")).toEqual({ ok: true, value: [], pos: 0 });
  });

  it("rejects invalid bounds at construction", () => {
    expect(() => times(digit(), 3, 1)).toThrow(RangeError);
    expect(() => times(digit(), 3, 1)).toThrow(/TW3001/);
    expect(() => times(digit(), -1, 2)).toThrow(RangeError);
  });
});

describe("sepBy", () => {
  const p = sepBy(digit(), symbol(","));

  it("matches zero items", () => {
    expect(p.parse("x")).toEqual({ ok: true, value: [], pos: 0 });
  });

  it("matches multiple items", () => {
    expect(p.parse("1,2,3")).toEqual({ ok: true, value: ["1", "2", "3"], pos: 5 });
  });

  it("leaves a trailing separator unconsumed", () => {
    expect(p.parse("1,2,")).toEqual({ ok: true, value: ["1", "2"], pos: 3 });
  });
});

describe("sepBy1", () => {
  it("fails on zero items", () => {
    expect(sepBy1(digit(), symbol(",")).parse("x")).toEqual({
      ok: false,
      pos: 0,
      expected: "digit",
      kind: "Unsatisfied",
    });
  });
});

describe("optional", () => {
  it("returns the value when present", () => {
    expect(optional(digit()).parse("5")).toEqual({ ok: true, value: "5", pos: 1 });
  });

  it("returns null at the original position when absent", () => {
    expect(optional(digit()).parse("x")).toEqual({ ok: true, value: null, pos: 0 });
  });

  it("does not advance when the inner parser fails after consuming", () => {
    expect(optional(and(letter(), digit())).parse("ab")).toEqual({ ok: true, value: null, pos: 0 });
    expect(optional(rightOnly(symbol("*"), digit())).parse("*x", 0)).toEqual({ ok: true, value: null, pos: 0 });
  });
});

describe("not", () => {
  it("succeeds when the inner parser fails", () => {
    expect(not(digit()).parse("a")).toEqual({ ok: true, value: null, pos: 0 });
  });

  it("fails without consuming when the inner parser succeeds", () => {
    expect(not(digit()).parse("1")).toEqual({ ok: false, pos: 0, expected: "not digit", kind: "Unsatisfied" });
  });
});

// ---------------------------------------------------------------------------
// Transformation
// ---------------------------------------------------------------------------

describe("map", () => {
  it("transforms the result at the same position", () => {
    const p = map(manyOne(digit()), (ds) => ds.join(""));
    expect(p.parse("42x")).toEqual({ ok: true, value: "42", pos: 2 });
  });

  it("propagates failure unchanged", () => {
    expect(map(digit(), Number).parse("x")).toEqual({ ok: false, pos: 0, expected: "digit", kind: "Unsatisfied" });
  });
});

describe("label", () => {
  it("renames the expected construct", () => {
    const count = label(manyOne(digit()), "count");
    expect(count.expected).toBe("count");
    expect(count.parse("x")).toEqual({ ok: false, pos: 0, expected: "count", kind: "Unsatisfied" });
  });
});

describe("lazy", () => {
  it("enables recursive grammars", () => {
    // Nested parentheses: value = '(' value ')' | digit
    const value: Parser<string> = lazy(() =>
      orElse(
        map(between(symbol("("), value, symbol(")")), (inner) => `(${inner})`),
        digit()
      )
    );
    expect(value.parse("((3))")).toEqual({ ok: true, value: "((3))", pos: 5 });
    expect(value.parse("7")).toEqual({ ok: true, value: "7", pos: 1 });
  });
});

describe("space", () => {
  it("matches a space or tab", () => {
    expect(space().parse("\tx")).toEqual({ ok: true, value: "\t", pos: 1 });
    expect(space().parse("\n").ok).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Static output types
// ---------------------------------------------------------------------------

describe("output type composition", () => {
  it("derives composed output types without parsing", () => {
    expectTypeOf(and(letter(), digit())).toEqualTypeOf<Parser<Pair<string, string>, string>>();
    expectTypeOf<Output<ReturnType<typeof many<string>>>>().toEqualTypeOf<string[]>();
    expectTypeOf(optional(map(digit(), Number))).toEqualTypeOf<Parser<number | null, string>>();
    expectTypeOf(orElse(digit(), map(letter(), () => 0))).toEqualTypeOf<Parser<string | number, string>>();
  });
});

describe("symbol type extraction", () => {
  it("resolves the consumed symbol type", () => {
    const digitByte = satisfy<number>((b) => b >= 0x30 && b <= 0x39, "digit byte");
    expectTypeOf<SymbolOf<typeof digitByte>>().toEqualTypeOf<number>();
    expectTypeOf<SymbolOf<ReturnType<typeof letter>>>().toEqualTypeOf<string>();
  });
});

// ---------------------------------------------------------------------------
// Chained methods
// ---------------------------------------------------------------------------

describe("chained methods", () => {
  it("and pairs outputs", () => {
    expect(letter().and(digit()).parse("a1")).toEqual({ ok: true, value: { first: "a", second: "1" }, pos: 2 });
  });

  it("andThen and map compose left to right", () => {
    const p = symbol(".").andThen(letter()).map((c) => c.toUpperCase());
    expect(p.parse(".x")).toEqual({ ok: true, value: "X", pos: 2 });
  });

  it("orElse backtracks", () => {
    expect(digit().orElse(letter()).parse("x")).toEqual({ ok: true, value: "x", pos: 1 });
  });

  it("has the same output types as the functions", () => {
    expectTypeOf(letter().and(digit())).toEqualTypeOf<Parser<Pair<string, string>, string>>();
    expectTypeOf(digit().map(Number)).toEqualTypeOf<Parser<number, string>>();
  });
});

// ---------------------------------------------------------------------------
// Collection growth
// ---------------------------------------------------------------------------

class FullArray extends Array<string> {
  override push(..._items: string[]): number {
    throw new RangeError("Invalid array length");
  }
}

class BrokenArray extends Array<string> {
  override push(..._items: string[]): number {
    throw new TypeError("not a range problem");
  }
}

describe("append", () => {
  it("adds to the collection", () => {
    const results = ["a"];
    expect(append(results, "b", 1, "letter")).toBeNull();
    expect(results).toEqual(["a", "b"]);
  });

  it("turns a RangeError into AllocationFailure", () => {
    expect(append(new FullArray(), "x", 3, "letter")).toEqual({
      ok: false,
      pos: 3,
      expected: "letter",
      kind: "AllocationFailure",
    });
  });

  it("rethrows other errors", () => {
    expect(() => append(new BrokenArray(), "x", 0, "letter")).toThrow(TypeError);
  });
});

// ---------------------------------------------------------------------------
// Failure trace
// ---------------------------------------------------------------------------

describe("failure trace", () => {
  it("keeps the first failure at the furthest position", () => {
    const trace: FailureTrace = { furthest: null };
    recordFailure(trace, fail(2, "x", "Unsatisfied"));
    recordFailure(trace, fail(2, "y", "Unsatisfied"));
    expect(trace.furthest?.expected).toBe("x");
    recordFailure(trace, fail(1, "w", "Unsatisfied"));
    expect(trace.furthest?.expected).toBe("x");
    recordFailure(trace, fail(3, "z", "EndOfInput"));
    expect(trace.furthest?.expected).toBe("z");
  });

  it("records the failure many absorbed", () => {
    const trace: FailureTrace = { furthest: null };
    expect(many(andThen(symbol(">"), letter())).parse(">1", 0, trace)).toEqual({ ok: true, value: [], pos: 0 });
    expect(trace.furthest).toEqual({
      ok: false,
      pos: 1,
      expected: "letter",
      kind: "SequenceFailure",
      cause: { ok: false, pos: 1, expected: "letter", kind: "Unsatisfied" },
    });
  });

  it("records the branch orElse backtracked over", () => {
    const trace: FailureTrace = { furthest: null };
    expect(orElse(andThen(symbol("a"), digit()), letter()).parse("ab", 0, trace)).toEqual({
      ok: true,
      value: "a",
      pos: 1,
    });
    expect(trace.furthest?.pos).toBe(1);
    expect(trace.furthest?.expected).toBe("digit");
  });

  it("records the failure optional absorbed", () => {
    const trace: FailureTrace = { furthest: null };
    optional(andThen(symbol("*"), digit())).parse("*", 0, trace);
    expect(trace.furthest).toEqual({
      ok: false,
      pos: 1,
      expected: "digit",
      kind: "SequenceFailure",
      cause: { ok: false, pos: 1, expected: "digit", kind: "EndOfInput" },
    });
  });

  it("leaves lookahead failures out", () => {
    const trace: FailureTrace = { furthest: null };
    expect(not(andThen(symbol("a"), digit())).parse("ab", 0, trace)).toEqual({ ok: true, value: null, pos: 0 });
    expect(trace.furthest).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// Error cases
// ---------------------------------------------------------------------------

describe("parseAll error handling", () => {
  it("returns the value when the input is consumed", () => {
    expect(map(manyOne(letter()), (cs) => cs.join("")).parseAll("div")).toBe("div");
  });

  it("throws ParseError on failure", () => {
    expect(() => manyOne(letter()).parseAll("123abc")).toThrow(ParseError);
  });

  it("reports the position and the expected construct", () => {
    const error = catchParseError(() => manyOne(letter()).parseAll("123abc"));
    expect(error.pos).toBe(0);
    expect(error.expected).toBe("letter");
    expect(error.kind).toBe("Unsatisfied");
    expect(error.message).toBe('TW1002 at line 1, col 1: expected letter, found "1"');
  });

  it("throws TrailingInput on partial consumption", () => {
    const error = catchParseError(() => letter().parseAll("ab"));
    expect(error.kind).toBe("TrailingInput");
    expect(error.pos).toBe(1);
    expect(error.message).toBe('TW1005 at line 1, col 2: unexpected "b", expected end of input');
  });

  it("renders the failing line with a caret", () => {
    const error = catchParseError(() => manyOne(letter()).parseAll("123"));
    expect(error.render({ colors: false })).toBe(
      [
        'error[TW1002]: expected letter, found "1"',
        "  --> input:1:1",
        "    |",
        "  1 | 123",
        "    | ^",
        "    |",
      ].join("\n")
    );
  });

  it("notes the root cause of a sequence failure", () => {
    const error = catchParseError(() => andThen(symbol(">"), letter()).parseAll(">1"));
    expect(error.message).toBe("TW1003 at line 1, col 2: expected letter to continue the sequence");
    expect(error.render({ colors: false }).split("\n").at(-1)).toBe(
      '   = note: caused by: expected letter, found "1"'
    );
  });

  it("reports a malformed tail at its trigger instead of as trailing input", () => {
    const p = and(letter(), many(andThen(symbol(">"), letter())));
    const error = catchParseError(() => p.parseAll("a>1"));
    expect(error.kind).toBe("SequenceFailure");
    expect(error.pos).toBe(2);
    expect(error.message).toBe("TW1003 at line 1, col 3: expected letter to continue the sequence");
  });

  it("prefers a further absorbed failure over the final one", () => {
    const p = and(many(andThen(symbol(">"), letter())), digit());
    const error = catchParseError(() => p.parseAll(">x>1"));
    expect(error.pos).toBe(3);
    expect(error.expected).toBe("letter");
  });

  it("keeps TrailingInput when nothing failed further on", () => {
    const error = catchParseError(() => many(letter()).parseAll("ab1"));
    expect(error.kind).toBe("TrailingInput");
    expect(error.pos).toBe(2);
  });

  it("describes byte input by value", () => {
    const digitByte = satisfy<number>((b) => b >= 0x30 && b <= 0x39, "digit byte");
    const error = catchParseError(() => manyOne(digitByte).parseAll(new Uint8Array([0x31, 0x41])));
    expect(error.message).toBe("TW1005 at line 1, col 2: unexpected 65, expected end of input");
    expect(error.render()).toBe(error.message);
  });
});

function catchParseError(fn: () => unknown): ParseError {
  try {
    fn();
  } catch (e) {
    if (e instanceof ParseError) return e;
    throw e;
  }
  throw new Error("expected a ParseError");
}
