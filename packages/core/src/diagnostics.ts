/**
 * Diagnostics System for tagweave
 *
 * Provides:
 * - A catalog of structured error codes (TW1001-TW4999)
 * - Message templates with {placeholder} interpolation
 * - Rust-style rendering against the parsed input, with a caret under the
 *   offending symbol
 *
 * @example Output:
 * ```
 * error[TW1002]: expected letter, found "1"
 *   --> input:1:1
 *    |
 *  1 | 123abc
 *    | ^
 *    |
 * ```
 */

// ============================================================================
// Diagnostic Categories
// ============================================================================

export enum DiagnosticCategory {
  Parse = "parse",
  Serialize = "serialize",
  Construction = "construction",
  Usage = "usage",
}

// ============================================================================
// Diagnostic Descriptor (Error Catalog Entry)
// ============================================================================

export interface DiagnosticDescriptor {
  /** Unique error code, rendered as TW<code> */
  readonly code: number;

  readonly severity: "error" | "warning" | "info";

  readonly category: DiagnosticCategory;

  /** Message template with {placeholders} for interpolation */
  readonly messageTemplate: string;

  /** Long-form explanation for --explain */
  readonly explanation: string;
}

// ============================================================================
// Error Catalog: Parsing (1001-1099)
// ============================================================================

export const TW1001: DiagnosticDescriptor = {
  code: 1001,
  severity: "error",
  category: DiagnosticCategory.Parse,
  messageTemplate: "expected {expected}, found end of input",
  explanation: `A matcher needed one more symbol but the input ended.

Example:
  (empty)     // an abbreviation starts with an element label
  ^

Markers that end the input early (\`div.\`, \`ul>\`) are reported as TW1003,
with this error as the cause.`,
};

export const TW1002: DiagnosticDescriptor = {
  code: 1002,
  severity: "error",
  category: DiagnosticCategory.Parse,
  messageTemplate: "expected {expected}, found {found}",
  explanation: `The symbol at this position does not satisfy the matcher's predicate.

Example:
  123abc      // an element label must start with a letter
  ^

Labels, class names and ids are letters only; counts are digits only.`,
};

export const TW1003: DiagnosticDescriptor = {
  code: 1003,
  severity: "error",
  category: DiagnosticCategory.Parse,
  messageTemplate: "expected {expected} to continue the sequence",
  explanation: `The first part of a sequence matched, but a later, non-optional part did not.

Examples:
  ul>         // ">" must be followed by an element
     ^
  div*x       // "*" must be followed by digits
      ^

The reported position is the one of the failing part, not of the sequence start.`,
};

export const TW1004: DiagnosticDescriptor = {
  code: 1004,
  severity: "error",
  category: DiagnosticCategory.Parse,
  messageTemplate: "could not grow the collection for {expected}",
  explanation: `A repetition collected more results than the runtime can store.

Collected results are never dropped; the whole repetition fails instead.`,
};

export const TW1005: DiagnosticDescriptor = {
  code: 1005,
  severity: "error",
  category: DiagnosticCategory.Parse,
  messageTemplate: "unexpected {found}, expected end of input",
  explanation: `The grammar matched a prefix of the input and stopped before the end.

Example:
  div*3x      // nothing may follow the count
       ^`,
};

// ============================================================================
// Error Catalog: Serialization (2001-2099)
// ============================================================================

export const TW2001: DiagnosticDescriptor = {
  code: 2001,
  severity: "error",
  category: DiagnosticCategory.Serialize,
  messageTemplate: "output of {required} code units exceeds the limit of {limit}",
  explanation: `Serialization stopped because the output would grow past the configured limit.

Output is never truncated. Raise the limit with --limit, the
serialize.limit config key, or TAGWEAVE_SERIALIZE_LIMIT, or lower the
repeat counts.`,
};

// ============================================================================
// Error Catalog: Construction (3001-3099)
// ============================================================================

export const TW3001: DiagnosticDescriptor = {
  code: 3001,
  severity: "error",
  category: DiagnosticCategory.Construction,
  messageTemplate: "invalid argument for {combinator}: {reason}",
  explanation: `A combinator was built with arguments it cannot honour, such as
times(p, 3, 1) where the minimum exceeds the maximum.`,
};

// ============================================================================
// Error Catalog: Usage (4001-4099)
// ============================================================================

export const TW4001: DiagnosticDescriptor = {
  code: 4001,
  severity: "error",
  category: DiagnosticCategory.Usage,
  messageTemplate: "{reason}",
  explanation: `The command line was not understood.

Usage:
  tagweave <abbreviation> [--content <text>] [--no-escape] [--limit <n>]`,
};

const CATALOG: readonly DiagnosticDescriptor[] = [
  TW1001,
  TW1002,
  TW1003,
  TW1004,
  TW1005,
  TW2001,
  TW3001,
  TW4001,
];

/**
 * Look up a descriptor by numeric code or by its "TW1002" spelling.
 */
export function getDescriptor(code: number | string): DiagnosticDescriptor | undefined {
  const numeric = typeof code === "number" ? code : parseInt(code.replace(/^TW/i, ""), 10);
  return CATALOG.find((d) => d.code === numeric);
}

export function formatCode(descriptor: DiagnosticDescriptor): string {
  return `TW${descriptor.code}`;
}

/**
 * Interpolate a descriptor's message template.
 */
export function formatMessage(
  descriptor: DiagnosticDescriptor,
  args: Readonly<Record<string, string | number>> = {}
): string {
  let message = descriptor.messageTemplate;
  for (const [key, value] of Object.entries(args)) {
    message = message.replace(new RegExp(`\\{${key}\\}`, "g"), String(value));
  }
  return message;
}

// ============================================================================
// Source positions
// ============================================================================

export interface SourceLocation {
  /** 1-based */
  line: number;
  /** 1-based */
  column: number;
}

/** Convert a zero-based offset to 1-based line/column. */
export function lineCol(source: string, pos: number): SourceLocation {
  let line = 1;
  let column = 1;
  for (let i = 0; i < pos && i < source.length; i++) {
    if (source[i] === "\n") {
      line++;
      column = 1;
    } else {
      column++;
    }
  }
  return { line, column };
}

/** Describe the symbol at `pos` for messages: `"x"` or `end of input`. */
export function describeSymbolAt(source: string, pos: number): string {
  return pos < source.length ? JSON.stringify(source[pos]) : "end of input";
}

// ============================================================================
// CLI Renderer
// ============================================================================

/**
 * ANSI color codes for terminal output.
 * Set NO_COLOR or TAGWEAVE_NO_COLOR to disable.
 */
const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
} as const;

type Style = keyof typeof COLORS;

function colorsEnabledByEnv(): boolean {
  const env = process.env;
  return !env.NO_COLOR && !env.TAGWEAVE_NO_COLOR && env.FORCE_COLOR !== "0";
}

function severityColor(severity: DiagnosticDescriptor["severity"]): Style {
  switch (severity) {
    case "error":
      return "red";
    case "warning":
      return "yellow";
    case "info":
      return "cyan";
  }
}

export interface SourceDiagnostic {
  descriptor: DiagnosticDescriptor;
  args?: Readonly<Record<string, string | number>>;
  /** The full input the failure refers to */
  source: string;
  /** Zero-based offset of the failure */
  pos: number;
  /** Name shown after `-->` (default: "input") */
  origin?: string;
  notes?: string[];
}

export interface RenderOptions {
  /** Whether to use colors (default: auto-detect from the environment) */
  colors?: boolean;
  /** Append the catalog explanation (default: false) */
  showExplanation?: boolean;
}

/**
 * Render a diagnostic against its source text.
 */
export function renderSourceDiagnostic(
  diagnostic: SourceDiagnostic,
  options: RenderOptions = {}
): string {
  const useColors = options.colors ?? colorsEnabledByEnv();
  const color = (text: string, ...styles: Style[]): string => {
    if (!useColors) return text;
    return `${styles.map((s) => COLORS[s]).join("")}${text}${COLORS.reset}`;
  };

  const { descriptor, source, pos } = diagnostic;
  const severity = severityColor(descriptor.severity);
  const message = formatMessage(descriptor, diagnostic.args);
  const { line, column } = lineCol(source, pos);
  const lineText = source.split("\n")[line - 1] ?? "";
  const gutter = " ".repeat(Math.max(2, String(line).length));
  const bar = color("|", "blue");

  const lines: string[] = [];
  lines.push(
    `${color(`${descriptor.severity}[${formatCode(descriptor)}]`, "bold", severity)}: ${color(message, "bold")}`
  );
  lines.push(`  ${color("-->", "blue")} ${diagnostic.origin ?? "input"}:${line}:${column}`);
  lines.push(` ${gutter} ${bar}`);
  lines.push(` ${color(String(line).padStart(gutter.length, " "), "blue")} ${bar} ${lineText}`);
  lines.push(` ${gutter} ${bar} ${color(`${" ".repeat(column - 1)}^`, severity)}`);
  lines.push(` ${gutter} ${bar}`);

  for (const note of diagnostic.notes ?? []) {
    lines.push(`   ${color("= note:", "bold")} ${note}`);
  }

  if (options.showExplanation) {
    lines.push("");
    lines.push(color("Explanation:", "bold"));
    for (const expLine of descriptor.explanation.split("\n")) {
      lines.push(`  ${expLine}`);
    }
  }

  return lines.join("\n");
}

/**
 * Render the --explain page for a catalog entry.
 */
export function renderExplanation(descriptor: DiagnosticDescriptor): string {
  return [`${formatCode(descriptor)} (${descriptor.category})`, "", descriptor.explanation].join(
    "\n"
  );
}
