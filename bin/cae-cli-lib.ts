// bin/cae-cli-lib.ts
// Shared CLI utilities for the cae command
// Exported functions for testing

import * as fs from "fs";
import { fileURLToPath } from "url";
import type { ConfigOverrides, EofPolicy, RuntimeConfig } from "../src/core/config";
import { isEofPolicy } from "../src/core/config";
import type { Diagnostic } from "../src/outcome/diagnostic";
import type { TraceEvent } from "../src/core/eval/machine";
import { formatSpan } from "../src/core/span";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type CliArgs = {
  help?: boolean;
  version?: boolean;
  eval?: string;
  file?: string;
  check?: boolean;
  config?: string;
  maxSteps?: string;
  maxDepth?: string;
  eof?: string;
  trace?: boolean;
  verbose?: boolean;
};

export type CliConfig = {
  mode: "run" | "check";
  code?: string;
  file?: string;
  configFile?: string;
  overrides: ConfigOverrides;
  trace: boolean;
  verbose: boolean;
  /** Problems with the arguments themselves */
  errors: string[];
};

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg === "--check" || arg === "-c") {
      result.check = true;
    } else if (arg === "--trace") {
      result.trace = true;
    } else if (arg === "--verbose") {
      result.verbose = true;
    } else if (arg === "--eval" || arg === "-e") {
      result.eval = args[++i] ?? "";
    } else if (arg === "--config") {
      result.config = args[++i];
    } else if (arg === "--max-steps") {
      result.maxSteps = args[++i];
    } else if (arg === "--max-depth") {
      result.maxDepth = args[++i];
    } else if (arg === "--eof") {
      result.eof = args[++i];
    } else if (!arg.startsWith("-")) {
      // First non-flag argument is the file
      if (!result.file) {
        result.file = arg;
      }
    }
    // Ignore unknown flags
  }

  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getHelpText(): string {
  return `
cae - run programs written in cae

USAGE:
  cae [options] <file>                Run a cae source file
  cae [options] --eval <code>         Run cae source given on the command line

OPTIONS:
  -h, --help                         Show this help message
  -v, --version                      Show version information
  -e, --eval <code>                  Run code instead of a file
  -c, --check                        Load and validate only, do not run
  --config <file>                    Read settings from a JSON file
  --max-steps <n>                    Stop after n machine steps (0 = unlimited)
  --max-depth <n>                    Limit active call frames (0 = unlimited)
  --eof zero|unchanged|error         What ',' does at end of input (default: zero)
  --trace                            Print every call to stderr
  --verbose                          Print warnings and run statistics to stderr

Program input is read from stdin and output is written to stdout.

EXAMPLES:
  cae examples/adder.cae             # Run a file
  echo 34 | cae examples/adder.cae   # Feed it input
  cae -e 'region main[1]; proc main: "41.;'
`.trim();
}

// ═══════════════════════════════════════════════════════════════════════════════
// VERSION
// ═══════════════════════════════════════════════════════════════════════════════

export function getVersion(): string {
  try {
    const pkgPath = fileURLToPath(new URL("../package.json", import.meta.url));
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return `cae v${pkg.version}`;
    }
    return "cae v0.0.0";
  } catch {
    return "cae v0.0.0";
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION BUILDING
// ═══════════════════════════════════════════════════════════════════════════════

function parseLimit(flag: string, value: string, errors: string[]): number | null | undefined {
  if (!/^\d+$/.test(value)) {
    errors.push(`${flag} expects a non-negative integer, got '${value}'`);
    return undefined;
  }
  const n = parseInt(value, 10);
  return n === 0 ? null : n;
}

export function buildConfig(args: CliArgs): CliConfig {
  const errors: string[] = [];
  const runtime: Partial<RuntimeConfig> = {};

  if (args.maxSteps !== undefined) {
    const n = parseLimit("--max-steps", args.maxSteps, errors);
    if (n !== undefined) runtime.maxSteps = n;
  }
  if (args.maxDepth !== undefined) {
    const n = parseLimit("--max-depth", args.maxDepth, errors);
    if (n !== undefined) runtime.maxCallDepth = n;
  }
  if (args.eof !== undefined) {
    const policy: string = args.eof;
    if (isEofPolicy(policy)) {
      const eof: EofPolicy = policy;
      runtime.onEof = eof;
    } else {
      errors.push(`--eof expects zero, unchanged or error, got '${policy}'`);
    }
  }
  if (args.file === undefined && args.eval === undefined) {
    errors.push("no input: give a file or --eval <code>");
  }

  return {
    mode: args.check ? "check" : "run",
    code: args.eval,
    file: args.file,
    configFile: args.config,
    overrides: { runtime },
    trace: args.trace ?? false,
    verbose: args.verbose ?? false,
    errors,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// OUTPUT FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/** `file:line:col: error[E0101]: message` */
export function formatDiagnostic(d: Diagnostic): string {
  const head = `${d.severity}[${d.code}]: ${d.message}`;
  return d.span ? `${formatSpan(d.span)}: ${head}` : head;
}

export function formatTrace(e: TraceEvent): string {
  return `${"  ".repeat(e.depth - 1)}call ${e.procedure} here=${e.here} origin=${e.origin}`;
}
