/**
 * Witness Generation Module
 *
 * The inference engine, its collaborators and the fixed-point driver.
 */

export {
  WitgenInference,
  type WitgenInferenceOptions,
  type RangeConflict,
} from "./witgen-inference";
export { FixedColumnEvaluator, noFixedColumns, type FixedEvaluator } from "./fixed-evaluator";
export {
  GlobalConstraints,
  deriveGlobalConstraints,
  type RangeConstraintSource,
  type GlobalConstraintResult,
} from "./global-constraints";
export { solveOnRows, DEFAULT_MAX_PASSES, type SolveOptions, type SolveResult } from "./driver";
export { InternalSolverError } from "./errors";
