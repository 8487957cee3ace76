/**
 * Shared helpers for solver tests.
 */

import { expect } from "vitest";
import { Cell } from "../../src/cell";
import { loadConstraintSystem, type ConstraintSystem } from "../../src/constraints";
import { formatCode } from "../../src/codegen";
import { solveOnRows, type SolveOptions } from "../../src/witgen";
import { sourceFromString } from "../../src/utils/source";

export function loadSystem(
  content: string,
  fixedColumnValues?: Map<string, bigint[]>
): ConstraintSystem {
  const { system, diagnostics } = loadConstraintSystem(sourceFromString("test.pil", content), {
    fixedColumnValues,
  });
  expect(diagnostics.filter((d) => d.severity === "error")).toEqual([]);
  if (system === undefined) throw new Error("constraint system was rejected");
  return system;
}

/**
 * The cell of a witness column, looked up by its qualified name.
 */
export function cell(system: ConstraintSystem, name: string, row: number): Cell {
  const column = system.witnessColumns.find((c) => c.name === name);
  if (column === undefined) throw new Error(`no witness column '${name}'`);
  return new Cell(column.name, column.polyId.id, row);
}

/**
 * Solve a system on the given rows and render the generated code.
 */
export function solveToCode(
  system: ConstraintSystem,
  rows: number[],
  known: [string, number][] = [],
  options: Omit<SolveOptions, "rows" | "knownCells"> = {}
): string {
  const result = solveOnRows(system, {
    ...options,
    rows,
    knownCells: known.map(([name, row]) => cell(system, name, row)),
  });
  return formatCode(result.code);
}

export function range(length: number, f: (i: number) => bigint): bigint[] {
  return Array.from({ length }, (_, i) => f(i));
}
