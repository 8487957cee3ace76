/**
 * Effects
 *
 * The output vocabulary of the solver. A sequence of effects is a program
 * that computes unknown trace cells from known ones.
 */

import type { Cell } from "../cell";
import type { RangeConstraint } from "../range";
import type { AffineSymbolicExpression } from "./affine-expression";
import type { SymbolicExpression } from "./symbolic-expression";

export interface Assertion {
  lhs: SymbolicExpression;
  rhs: SymbolicExpression;
  /** `lhs == rhs` when true, `lhs != rhs` otherwise */
  expectedEqual: boolean;
}

export type MachineCallArgument =
  | { kind: "known"; value: SymbolicExpression }
  /** The callee supplies the value; the expression has exactly one unknown. */
  | { kind: "unknown"; expression: AffineSymbolicExpression };

export type Effect =
  | { kind: "assignment"; cell: Cell; value: SymbolicExpression }
  | { kind: "range-constraint"; cell: Cell; constraint: RangeConstraint }
  | { kind: "assertion"; assertion: Assertion }
  | { kind: "machine-call"; identityId: number; arguments: MachineCallArgument[] };

export interface ProcessResult {
  effects: Effect[];
  /** When true, the (identity, row) pair never needs to be processed again. */
  complete: boolean;
}

export function emptyResult(): ProcessResult {
  return { effects: [], complete: false };
}

export function completeResult(effects: Effect[] = []): ProcessResult {
  return { effects, complete: true };
}

export function assignment(cell: Cell, value: SymbolicExpression): Effect {
  return { kind: "assignment", cell, value };
}

export function assertEq(lhs: SymbolicExpression, rhs: SymbolicExpression): Effect {
  return { kind: "assertion", assertion: { lhs, rhs, expectedEqual: true } };
}

export function assertNe(lhs: SymbolicExpression, rhs: SymbolicExpression): Effect {
  return { kind: "assertion", assertion: { lhs, rhs, expectedEqual: false } };
}
