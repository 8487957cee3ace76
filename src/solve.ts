/**
 * End-to-end solving of a constraint source file: front end, global
 * constraints, fixed-point driver and report.
 */

import { Cell } from "./cell";
import { loadConstraintSystem, type ConstraintSystem } from "./constraints";
import { formatCode } from "./codegen";
import {
  DiagnosticCollector,
  ErrorCode,
  resetDiagnosticIdCounter,
  type SolveReport,
} from "./diagnostics";
import { GOLDILOCKS, fieldByName, fieldNames, type PrimeField } from "./field";
import type { Effect } from "./symbolic";
import type { SourceFile } from "./utils/source";
import { syntheticSpan } from "./utils/span";
import type { Logger } from "./utils/logger";
import { solveOnRows } from "./witgen";

export const SOLVER_VERSION = "0.1.0";

export interface SolveSourceOptions {
  rows: number[];
  /** Known cells as `column:row`, the column possibly namespace-qualified */
  known?: string[] | undefined;
  field?: PrimeField | undefined;
  maxPasses?: number | undefined;
  fixedColumnValues?: Map<string, bigint[]> | undefined;
  logger?: Logger | undefined;
}

export interface SolveSourceResult {
  report: SolveReport;
  /** The generated program, absent when the input was rejected */
  effects?: Effect[] | undefined;
}

/**
 * Parse `0..3` (inclusive), `3,4,5` or a single row.
 */
export function parseRowSpec(spec: string): number[] | undefined {
  const range = /^(-?\d+)\.\.(-?\d+)$/.exec(spec.trim());
  if (range) {
    const from = Number(range[1]);
    const to = Number(range[2]);
    if (from > to) return undefined;
    const rows: number[] = [];
    for (let row = from; row <= to; row++) {
      rows.push(row);
    }
    return rows;
  }
  const parts = spec.split(",").map((p) => p.trim());
  if (parts.length === 0 || parts.some((p) => !/^-?\d+$/.test(p))) {
    return undefined;
  }
  return parts.map(Number);
}

/**
 * Resolve a field name or modulus, or explain why it cannot be used.
 */
export function parseField(name: string): PrimeField | string {
  let field: PrimeField | undefined;
  try {
    field = fieldByName(name);
  } catch (e) {
    if (e instanceof RangeError) return e.message;
    throw e;
  }
  return field ?? `unknown field '${name}' (known fields: ${fieldNames().join(", ")})`;
}

/**
 * Resolve `column:row` against the witness columns of a system. An
 * unqualified column name matches a qualified column with that last segment.
 */
export function parseKnownCell(spec: string, system: ConstraintSystem): Cell | undefined {
  const separator = spec.lastIndexOf(":");
  if (separator <= 0 || spec[separator - 1] === ":") return undefined;
  const name = spec.slice(0, separator);
  const rowText = spec.slice(separator + 1);
  if (!/^-?\d+$/.test(rowText)) return undefined;

  const column =
    system.witnessColumns.find((c) => c.name === name) ??
    system.witnessColumns.find((c) => c.name.endsWith(`::${name}`));
  if (column === undefined) return undefined;
  return new Cell(column.name, column.polyId.id, Number(rowText));
}

export function solveSource(source: SourceFile, options: SolveSourceOptions): SolveSourceResult {
  const startTime = performance.now();
  resetDiagnosticIdCounter();

  const loaded = loadConstraintSystem(source, { fixedColumnValues: options.fixedColumnValues });
  const diagnostics = new DiagnosticCollector();
  for (const d of loaded.diagnostics) {
    diagnostics.add(d);
  }

  const system = loaded.system;
  if (system === undefined) {
    return { report: errorReport(diagnostics, options, startTime) };
  }

  const knownCells: Cell[] = [];
  for (const spec of options.known ?? []) {
    const cell = parseKnownCell(spec, system);
    if (cell === undefined) {
      diagnostics.error(
        ErrorCode.UnknownKnownCell,
        `'${spec}' does not name a witness column and row`,
        syntheticSpan(source.name),
        { kind: "unknown_known_cell", actual: spec }
      );
    } else {
      knownCells.push(cell);
    }
  }
  if (diagnostics.hasErrors()) {
    return { report: errorReport(diagnostics, options, startTime) };
  }

  const result = solveOnRows(system, {
    rows: options.rows,
    knownCells,
    field: options.field ?? GOLDILOCKS,
    maxPasses: options.maxPasses,
    logger: options.logger,
  });
  for (const d of result.diagnostics) {
    diagnostics.add(d);
  }

  const code = formatCode(result.code);
  const status = diagnostics.hasErrors()
    ? "error"
    : result.incomplete.length > 0
      ? "incomplete"
      : "complete";

  return {
    effects: result.code,
    report: {
      status,
      solverVersion: SOLVER_VERSION,
      code: code === "" ? [] : code.split("\n"),
      completed: result.completed,
      incomplete: result.incomplete,
      diagnostics: diagnostics.getAll(),
      stats: {
        identities: system.identities.length,
        rows: options.rows.length,
        passes: result.passes,
        knownCells: result.knownCells.length,
        solveTimeMs: performance.now() - startTime,
      },
    },
  };
}

function errorReport(
  diagnostics: DiagnosticCollector,
  options: SolveSourceOptions,
  startTime: number
): SolveReport {
  return {
    status: "error",
    solverVersion: SOLVER_VERSION,
    code: [],
    completed: [],
    incomplete: [],
    diagnostics: diagnostics.getAll(),
    stats: {
      identities: 0,
      rows: options.rows.length,
      passes: 0,
      knownCells: 0,
      solveTimeMs: performance.now() - startTime,
    },
  };
}
