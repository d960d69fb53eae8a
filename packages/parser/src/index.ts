/**
 * @tagweave/parser
 *
 * A small parser-combinator engine: atomic predicate matchers plus ordered
 * sequencing, alternation, repetition, optionality and output mapping.
 * The output type of every composed parser is fixed by its operands' types,
 * so a grammar is type-checked before any input is parsed.
 *
 * @module
 */

// Core types
export type {
  Input,
  FailureKind,
  FailureTrace,
  ParseFailure,
  ParseSuccess,
  ParseResult,
  Parser,
  Pair,
  Output,
  SymbolOf,
  Predicate,
} from "./types.js";

// Error reporting
export { ParseError, describeFailure, descriptorFor, rootCause } from "./errors.js";

// Combinator API
export {
  mkParser,
  ok,
  fail,
  recordFailure,
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
  isAlpha,
  isDigit,
  isSpace,
  letter,
  digit,
  space,
} from "./combinators.js";
