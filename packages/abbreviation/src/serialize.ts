/**
 * Markup serializer for abbreviation trees.
 *
 * Each node becomes `<label class="c" id="i">content</label>`, written
 * `repeatCount` times. Output goes to a growable {@link OutputBuffer}; a
 * write that would pass the buffer's limit throws {@link SerializeError}
 * before anything is written, so output is never truncated.
 */

import { TW2001, TW3001, config, createLogger, formatCode, formatMessage, DEFAULT_OUTPUT_LIMIT } from "@tagweave/core";
import { parseAbbreviation } from "./grammar.js";
import type { AbbreviationNode } from "./types.js";

const log = createLogger("serialize");

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export type SerializeErrorKind = "CapacityExceeded";

export class SerializeError extends Error {
  readonly kind: SerializeErrorKind = "CapacityExceeded";
  readonly descriptor = TW2001;
  /** Total length the buffer would have needed */
  readonly required: number;
  readonly limit: number;

  constructor(required: number, limit: number) {
    super(`${formatCode(TW2001)}: ${formatMessage(TW2001, { required, limit })}`);
    this.name = "SerializeError";
    this.required = required;
    this.limit = limit;
  }
}

// ---------------------------------------------------------------------------
// Output buffer
// ---------------------------------------------------------------------------

export class OutputBuffer {
  private readonly chunks: string[] = [];
  private size = 0;

  /**
   * @param limit - Maximum length in UTF-16 code units; `Infinity` for none
   */
  constructor(readonly limit: number = DEFAULT_OUTPUT_LIMIT) {
    if (!(limit === Infinity || (Number.isInteger(limit) && limit >= 0))) {
      throw new RangeError(
        `${formatCode(TW3001)}: ${formatMessage(TW3001, {
          combinator: "OutputBuffer",
          reason: `limit must be a non-negative integer, got ${limit}`,
        })}`
      );
    }
  }

  get length(): number {
    return this.size;
  }

  /** Code units left before the limit. */
  get remaining(): number {
    return this.limit - this.size;
  }

  /** Throw unless `extra` more code units fit. */
  reserve(extra: number): void {
    if (this.size + extra > this.limit) {
      throw new SerializeError(this.size + extra, this.limit);
    }
  }

  write(text: string): void {
    this.reserve(text.length);
    this.chunks.push(text);
    this.size += text.length;
  }

  toString(): string {
    return this.chunks.join("");
  }
}

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

export interface SerializeOptions {
  /** Inner content for nodes without children (default: `serialize.content`, else "") */
  content?: string;
  /** Escape attribute values (default: `serialize.escape`, else true) */
  escape?: boolean;
  /** Output limit for {@link serialize} (default: `serialize.limit`, else 1 MiB) */
  limit?: number;
}

interface ResolvedOptions {
  content: string;
  escape: boolean;
}

function resolveOptions(options: SerializeOptions): ResolvedOptions {
  return {
    content: options.content ?? config.getString("serialize.content") ?? "",
    escape: options.escape ?? config.getBoolean("serialize.escape") ?? true,
  };
}

const ESCAPES: Readonly<Record<string, string>> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
};

/** Escape `& < > "` for use inside a double-quoted attribute value. */
export function escapeAttribute(value: string): string {
  return value.replace(/[&<>"]/g, (ch) => ESCAPES[ch] ?? ch);
}

function renderElement(node: AbbreviationNode, inner: string, options: ResolvedOptions): string {
  const attr = options.escape ? escapeAttribute : (value: string) => value;
  let open = `<${node.label}`;
  if (node.className !== "") open += ` class="${attr(node.className)}"`;
  if (node.id !== null) open += ` id="${attr(node.id)}"`;
  return `${open}>${inner}</${node.label}>`;
}

function writeNode(node: AbbreviationNode, buffer: OutputBuffer, options: ResolvedOptions): void {
  if (node.repeatCount === 0) return;

  let inner = options.content;
  if (node.children.length > 0) {
    const childBuffer = new OutputBuffer(buffer.remaining);
    try {
      for (const child of node.children) {
        writeNode(child, childBuffer, options);
      }
    } catch (error) {
      // Report against the outer buffer, not the scratch one
      if (error instanceof SerializeError) {
        throw new SerializeError(buffer.length + error.required, buffer.limit);
      }
      throw error;
    }
    inner = childBuffer.toString();
  }

  const element = renderElement(node, inner, options);
  buffer.reserve(element.length * node.repeatCount);
  for (let i = 0; i < node.repeatCount; i++) {
    buffer.write(element);
  }
  log.debug(`${node.label} x${node.repeatCount}: ${element.length * node.repeatCount} code units`);
}

/**
 * Write `node` into `buffer`. A node with `repeatCount` 0 writes nothing.
 *
 * @throws SerializeError when the output would exceed the buffer's limit
 */
export function serializeInto(
  node: AbbreviationNode,
  buffer: OutputBuffer,
  options: SerializeOptions = {}
): OutputBuffer {
  writeNode(node, buffer, resolveOptions(options));
  return buffer;
}

/**
 * Serialize `node` to a markup string.
 *
 * @example
 * ```ts
 * serialize(parseAbbreviation("ul>li*2"));
 * // → "<ul><li></li><li></li></ul>"
 * ```
 */
export function serialize(node: AbbreviationNode, options: SerializeOptions = {}): string {
  const limit = options.limit ?? config.getNumber("serialize.limit") ?? DEFAULT_OUTPUT_LIMIT;
  return serializeInto(node, new OutputBuffer(limit), options).toString();
}

/** Parse and serialize in one step. */
export function expand(input: string, options: SerializeOptions = {}): string {
  return serialize(parseAbbreviation(input), options);
}
