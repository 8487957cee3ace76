/**
 * Constraints Module
 *
 * The analyzed constraint system and the front end that builds it.
 */

export * from "./ast";
export { formatExpression, formatIdentity } from "./print";
export {
  analyze,
  loadConstraintSystem,
  type AnalyzeOptions,
  type AnalyzeResult,
} from "./analyze";
