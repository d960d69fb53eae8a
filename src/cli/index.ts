/**
 * tagweave CLI -- expand an element abbreviation into markup
 *
 * Usage:
 *   tagweave <abbreviation> [--content <text>] [--no-escape] [--limit <n>] [--verbose]
 *   tagweave --explain <code>
 */

import {
  TW4001,
  config,
  createLogger,
  formatCode,
  formatMessage,
  getDescriptor,
  renderExplanation,
  type DiagnosticDescriptor,
  type LogLevel,
} from "@tagweave/core";
import { ParseError } from "@tagweave/parser";
import { SerializeError, parseAbbreviation, serialize } from "@tagweave/abbreviation";

interface CliOptions {
  abbreviation: string;
  content?: string;
  escape?: boolean;
  limit?: number;
  verbose: boolean;
  colors?: boolean;
  explain?: string;
  help: boolean;
}

/** Where the CLI writes; one call per line (or pre-joined block). */
export interface CliIO {
  out(text: string): void;
  err(text: string): void;
}

const consoleIO: CliIO = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

const USAGE = "usage: tagweave <abbreviation> [--content <text>] [--no-escape] [--limit <n>] [--verbose]";

class UsageError extends Error {
  constructor(reason: string) {
    super(reason);
    this.name = "UsageError";
  }
}

function parseArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = { abbreviation: "", verbose: false, help: false };
  let positional: string | undefined;

  const valueOf = (flag: string, value: string | undefined): string => {
    if (value === undefined) {
      throw new UsageError(`${flag} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--content" || arg === "-c") {
      options.content = valueOf(arg, args[++i]);
    } else if (arg === "--no-escape") {
      options.escape = false;
    } else if (arg === "--limit" || arg === "-l") {
      const raw = valueOf(arg, args[++i]);
      if (!/^\d+$/.test(raw)) {
        throw new UsageError(`${arg} expects a non-negative integer, got ${raw}`);
      }
      options.limit = parseInt(raw, 10);
    } else if (arg === "--verbose" || arg === "-v") {
      options.verbose = true;
    } else if (arg === "--no-color") {
      options.colors = false;
    } else if (arg === "--explain") {
      options.explain = valueOf(arg, args[++i]);
    } else if (arg === "--help" || arg === "-h") {
      options.help = true;
    } else if (arg.startsWith("-") && arg !== "-") {
      throw new UsageError(`unknown option: ${arg}`);
    } else if (positional === undefined) {
      positional = arg;
    } else {
      throw new UsageError(`unexpected argument: ${arg}`);
    }
  }

  if (!options.help && options.explain === undefined && !positional) {
    throw new UsageError("missing abbreviation");
  }
  options.abbreviation = positional ?? "";
  return options;
}

function helpText(): string {
  return `
tagweave - Expand element abbreviations into markup

USAGE:
  tagweave <abbreviation> [options]

ABBREVIATION:
  label(.class|#id)?(*count)?(>label...)*

OPTIONS:
  -c, --content <text>   Inner content of elements without children
  --no-escape            Write class and id values without escaping
  -l, --limit <n>        Maximum output length (default: 1048576)
  -v, --verbose          Enable verbose logging
  --no-color             Plain diagnostics
  --explain <code>       Explain a diagnostic code, e.g. TW1002
  -h, --help             Show this help message

EXAMPLES:
  tagweave div.root*3
  tagweave "ul>li*2" --content item
  tagweave --explain TW2001
`;
}

function headline(descriptor: DiagnosticDescriptor, args: Readonly<Record<string, string | number>>): string {
  return `${descriptor.severity}[${formatCode(descriptor)}]: ${formatMessage(descriptor, args)}`;
}

/**
 * Run the CLI against `argv` (without the node and script entries).
 *
 * @returns the process exit code
 */
export function run(argv: readonly string[], io: CliIO = consoleIO): number {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      io.err(headline(TW4001, { reason: error.message }));
      io.err(USAGE);
      return 1;
    }
    throw error;
  }

  if (options.help) {
    io.out(helpText());
    return 0;
  }

  if (options.explain !== undefined) {
    const descriptor = getDescriptor(options.explain);
    if (!descriptor) {
      io.err(headline(TW4001, { reason: `unknown diagnostic code: ${options.explain}` }));
      return 1;
    }
    io.out(renderExplanation(descriptor));
    return 0;
  }

  const log = createLogger("cli", {
    verbose: options.verbose,
    writer: (level: LogLevel, line: string) => (level === "warn" || level === "error" ? io.err(line) : io.out(line)),
  });
  log.debug(`config file: ${config.getConfigFilePath() ?? "none"}`);

  try {
    const tree = parseAbbreviation(options.abbreviation);
    log.debug(`parsed ${tree.children.length + 1} node(s)`);
    const output = serialize(tree, {
      content: options.content,
      escape: options.escape,
      limit: options.limit,
    });
    io.out(options.abbreviation);
    io.out(output);
    return 0;
  } catch (error) {
    if (error instanceof ParseError) {
      io.err(error.render({ colors: options.colors }));
      return 1;
    }
    if (error instanceof SerializeError) {
      io.err(headline(error.descriptor, { required: error.required, limit: error.limit }));
      return 1;
    }
    throw error;
  }
}
