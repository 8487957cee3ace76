#!/usr/bin/env node
/**
 * witgen-jit CLI
 *
 * Command-line interface for the witness-generation solver.
 */

import { parseArgs } from "node:util";
import { formatJson, formatPretty, formatSummary } from "./diagnostics";
import { fieldNames } from "./field";
import { SOLVER_VERSION, parseField, parseRowSpec, solveSource } from "./solve";
import { readSourceFile, type SourceFile } from "./utils/source";
import { Logger } from "./utils/logger";
import { DEFAULT_MAX_PASSES } from "./witgen";

// =============================================================================
// CLI Types
// =============================================================================

type Command = "solve" | "help" | "version";
type EmitFormat = "code" | "json";

interface CliArgs {
  command: Command;
  files: string[];
  rows: string;
  known: string[];
  field: string;
  maxPasses: string;
  emit: string;
  quiet: boolean;
  debug: boolean;
}

// =============================================================================
// Argument Parsing
// =============================================================================

function parseCliArgs(argv: string[]): CliArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      rows: { type: "string", short: "r", default: "0" },
      known: { type: "string", short: "k", multiple: true, default: [] },
      field: { type: "string", short: "f", default: "goldilocks" },
      "max-passes": { type: "string", default: String(DEFAULT_MAX_PASSES) },
      emit: { type: "string", default: "code" },
      quiet: { type: "boolean", short: "q", default: false },
      debug: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
      version: { type: "boolean", short: "v", default: false },
    },
    allowPositionals: true,
  });

  let command: Command = "help";
  if (values.version) {
    command = "version";
  } else if (!values.help && positionals[0] === "solve") {
    command = "solve";
  } else if (positionals[0] === "version") {
    command = "version";
  }

  return {
    command,
    files: positionals.slice(1),
    rows: values.rows ?? "0",
    known: values.known ?? [],
    field: values.field ?? "goldilocks",
    maxPasses: values["max-passes"] ?? String(DEFAULT_MAX_PASSES),
    emit: values.emit ?? "code",
    quiet: values.quiet ?? false,
    debug: values.debug ?? false,
  };
}

function isEmitFormat(value: string): value is EmitFormat {
  return value === "code" || value === "json";
}

// =============================================================================
// Commands
// =============================================================================

async function runSolve(args: CliArgs): Promise<number> {
  const file = args.files[0];
  if (file === undefined) {
    console.error("error: no input file");
    return 1;
  }

  const rows = parseRowSpec(args.rows);
  if (rows === undefined) {
    console.error(`error: invalid row specification '${args.rows}'`);
    return 1;
  }

  const field = parseField(args.field);
  if (typeof field === "string") {
    console.error(`error: ${field}`);
    return 1;
  }

  const maxPasses = Number(args.maxPasses);
  if (!Number.isInteger(maxPasses) || maxPasses < 1) {
    console.error(`error: --max-passes must be a positive integer, got '${args.maxPasses}'`);
    return 1;
  }

  if (!isEmitFormat(args.emit)) {
    console.error(`error: unknown emit format '${args.emit}'`);
    return 1;
  }

  let source: SourceFile;
  try {
    source = await readSourceFile(file);
  } catch (e) {
    console.error(`error: could not read file '${file}': ${e instanceof Error ? e.message : String(e)}`);
    return 1;
  }

  const logger = new Logger(args.debug ? "debug" : "warn");
  const { report } = solveSource(source, {
    rows,
    known: args.known,
    field,
    maxPasses,
    logger,
  });

  if (args.emit === "json") {
    console.log(formatJson(report));
  } else {
    if (report.code.length > 0) {
      console.log(report.code.join("\n"));
    }
    if (!args.quiet) {
      if (report.diagnostics.length > 0) {
        console.error(formatPretty(report.diagnostics, source));
      }
      console.error(formatSummary(report));
    }
  }

  return report.status === "error" ? 1 : 0;
}

function printHelp(): void {
  console.log(`
witgen-jit - witness generation code from polynomial constraints

USAGE:
  witgen-jit <command> [options] <file>

COMMANDS:
  solve <file>      Generate code that computes the unknown cells
  help              Print help
  version           Print version

OPTIONS:
  -r, --rows <spec>       Rows to solve on: 0..3, 3,4,5 or a single row (default: 0)
  -k, --known <col:row>   Cell known before the code runs (repeatable)
  -f, --field <name>      Prime field: ${fieldNames().join(", ")} or a modulus (default: goldilocks)
  --max-passes <n>        Iteration limit of the solver (default: ${DEFAULT_MAX_PASSES})
  --emit <format>         Output format: code, json (default: code)
  --debug                 Log solver progress to stderr
  -q, --quiet             Suppress diagnostics and summary
  -h, --help              Print help
  -v, --version           Print version

EXAMPLES:
  witgen-jit solve fib.pil --rows 0..1 --known X:0 --known Y:0
  witgen-jit solve xor.pil --rows 3..7 --known Xor::A:7 --emit json
`);
}

function printVersion(): void {
  console.log(`witgen-jit ${SOLVER_VERSION}`);
}

// =============================================================================
// Main
// =============================================================================

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));

  let exitCode = 0;

  switch (args.command) {
    case "help":
      printHelp();
      break;

    case "version":
      printVersion();
      break;

    case "solve":
      exitCode = await runSolve(args);
      break;
  }

  process.exitCode = exitCode;
}

main().catch((e: unknown) => {
  console.error(e);
  process.exitCode = 1;
});
