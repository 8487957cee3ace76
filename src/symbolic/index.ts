/**
 * Symbolic Module
 *
 * Known-value expressions, affine expressions over unknown cells, and the
 * effects produced by solving them.
 */

export {
  SymbolicExpression,
  type SymbolicNode,
  type FieldOperator,
  type BitwiseOperator,
} from "./symbolic-expression";
export { AffineSymbolicExpression } from "./affine-expression";
export {
  type Effect,
  type Assertion,
  type MachineCallArgument,
  type ProcessResult,
  emptyResult,
  completeResult,
  assignment,
  assertEq,
  assertNe,
} from "./effects";
