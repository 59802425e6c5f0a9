#!/usr/bin/env npx tsx
// bin/cae.ts
// cae command line: load, check and run cae programs
//
// Run:  npx tsx bin/cae.ts [options] [file]

import * as fs from "fs";
import {
  parseCliArgs,
  getHelpText,
  getVersion,
  buildConfig,
  formatDiagnostic,
  formatTrace,
  type CliConfig,
} from "./cae-cli-lib";
import { loadConfig, validateConfig } from "../src/core/config";
import { compileText } from "../src/core/pipeline/load";
import { runProgram } from "../src/core/eval/run";
import { CaeError } from "../src/core/errors";
import { match } from "../src/outcome/matchers";
import { streamInput } from "../src/ports/source";
import { streamOutput } from "../src/ports/sink";

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

async function main() {
  const cliArgs = parseCliArgs(process.argv.slice(2));

  if (cliArgs.help) {
    console.log(getHelpText());
    process.exit(0);
  }

  if (cliArgs.version) {
    console.log(getVersion());
    process.exit(0);
  }

  const cli = buildConfig(cliArgs);
  if (cli.errors.length > 0) {
    for (const e of cli.errors) console.error(`cae: ${e}`);
    console.error("Run 'cae --help' for usage.");
    process.exit(1);
  }

  process.exit(await execute(cli));
}

// ═══════════════════════════════════════════════════════════════════════════════
// EXECUTION
// ═══════════════════════════════════════════════════════════════════════════════

async function execute(cli: CliConfig): Promise<number> {
  const config = loadConfig({ configFile: cli.configFile, overrides: cli.overrides });
  const checked = validateConfig(config);
  for (const e of checked.errors) console.error(`cae: config: ${e}`);
  if (!checked.valid) return 1;
  if (cli.verbose) {
    for (const w of checked.warnings) console.error(`cae: config: ${w}`);
  }

  const filename = cli.file ?? "<eval>";
  let source: string;
  if (cli.file !== undefined) {
    if (!fs.existsSync(cli.file)) {
      console.error(`cae: file not found: ${cli.file}`);
      return 1;
    }
    source = fs.readFileSync(cli.file, "utf8");
  } else {
    source = cli.code ?? "";
  }

  const program = match(compileText(source, { filename, maxRegionCapacity: config.loader.maxRegionCapacity }), {
    done: (loaded) => {
      if (cli.verbose || cli.mode === "check") {
        for (const w of loaded.meta.warnings ?? []) console.error(formatDiagnostic(w));
      }
      return loaded.value;
    },
    fail: (failed) => {
      for (const d of failed.failure.diagnostics) console.error(formatDiagnostic(d));
      return null;
    },
  });
  if (program === null) return 1;

  if (cli.mode === "check") {
    console.error(`${filename}: ok`);
    return 0;
  }

  try {
    const report = await runProgram(program, {
      input: streamInput(process.stdin),
      output: streamOutput(process.stdout),
      runtime: config.runtime,
      trace: cli.trace ? (e) => console.error(formatTrace(e)) : undefined,
    });
    if (cli.verbose) {
      console.error(`cae: ${report.steps} steps, max call depth ${report.maxDepth}`);
    }
    return 0;
  } catch (e) {
    if (e instanceof CaeError) {
      console.error(formatDiagnostic(e.diagnostic));
      return 2;
    }
    throw e;
  }
}

main().catch((error) => {
  console.error("Fatal error:", error instanceof Error ? error.message : String(error));
  process.exit(1);
});
