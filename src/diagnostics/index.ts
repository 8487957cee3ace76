/**
 * Diagnostics Module
 *
 * Structured error reporting with source locations, hints and
 * machine-readable output.
 */

export type {
  Severity,
  Diagnostic,
  StructuredData,
  Hint,
  RelatedInfo,
  SolveReport,
  IdentityRow,
  SolveStats,
} from "./diagnostic";

export { createDiagnostic, isError, isWarning, resetDiagnosticIdCounter } from "./diagnostic";

export { ErrorCode, getErrorDescription, getCodeSeverity } from "./codes";
export type { ErrorCodeType } from "./codes";

export { DiagnosticCollector } from "./collector";

export { formatJson, formatPretty, formatSimple, formatSummary } from "./formatter";
