/**
 * Error reporting for @tagweave/parser
 */

import {
  TW1001,
  TW1002,
  TW1003,
  TW1004,
  TW1005,
  describeSymbolAt,
  formatCode,
  formatMessage,
  lineCol,
  renderSourceDiagnostic,
  type DiagnosticDescriptor,
  type RenderOptions,
} from "@tagweave/core";
import type { FailureKind, Input, ParseFailure } from "./types.js";

const DESCRIPTORS: Record<FailureKind, DiagnosticDescriptor> = {
  EndOfInput: TW1001,
  Unsatisfied: TW1002,
  SequenceFailure: TW1003,
  AllocationFailure: TW1004,
  TrailingInput: TW1005,
};

export function descriptorFor(kind: FailureKind): DiagnosticDescriptor {
  return DESCRIPTORS[kind];
}

function describeSymbol(input: Input<unknown>, pos: number): string {
  if (typeof input === "string") return describeSymbolAt(input, pos);
  return pos < input.length ? String(input[pos]) : "end of input";
}

/** Walk `cause` links to the failure that started the chain. */
export function rootCause(failure: ParseFailure): ParseFailure {
  let current = failure;
  while (current.cause) {
    current = current.cause;
  }
  return current;
}

/** One-line description of a failure, as used in error messages. */
export function describeFailure(input: Input<unknown>, failure: ParseFailure): string {
  return formatMessage(descriptorFor(failure.kind), {
    expected: failure.expected,
    found: describeSymbol(input, failure.pos),
  });
}

/** Descriptive parse error with position context. */
export class ParseError extends Error {
  /** Zero-based position in the input where parsing failed. */
  readonly pos: number;
  /** What the parser expected at the failure position. */
  readonly expected: string;
  readonly kind: FailureKind;
  /** 1-based, counted over string input; equal to `pos + 1` otherwise. */
  readonly line: number;
  readonly column: number;
  readonly failure: ParseFailure;
  readonly descriptor: DiagnosticDescriptor;
  private readonly source: string | undefined;

  constructor(input: Input<unknown>, failure: ParseFailure) {
    const source = typeof input === "string" ? input : undefined;
    const { line, column } = source !== undefined ? lineCol(source, failure.pos) : { line: 1, column: failure.pos + 1 };
    const descriptor = descriptorFor(failure.kind);
    super(`${formatCode(descriptor)} at line ${line}, col ${column}: ${describeFailure(input, failure)}`);
    this.name = "ParseError";
    this.pos = failure.pos;
    this.expected = failure.expected;
    this.kind = failure.kind;
    this.line = line;
    this.column = column;
    this.failure = failure;
    this.descriptor = descriptor;
    this.source = source;
  }

  /**
   * Rust-style rendering with the input line and a caret. Falls back to the
   * one-line message for non-string input.
   */
  render(options: RenderOptions = {}): string {
    if (this.source === undefined) return this.message;
    const notes: string[] = [];
    const root = rootCause(this.failure);
    if (root !== this.failure) {
      notes.push(`caused by: ${describeFailure(this.source, root)}`);
    }
    return renderSourceDiagnostic(
      {
        descriptor: this.descriptor,
        args: { expected: this.expected, found: describeSymbol(this.source, this.pos) },
        source: this.source,
        pos: this.pos,
        notes,
      },
      options
    );
  }
}
