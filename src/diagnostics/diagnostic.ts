/**
 * Diagnostic types for structured solver output
 *
 * These types define the shape of front-end and solver diagnostics and the
 * overall result of a solve run.
 */

import type { SourceSpan } from "../utils/span";

// =============================================================================
// Core Diagnostic Types
// =============================================================================

export type Severity = "error" | "warning";

export interface Diagnostic {
  /** Unique ID for this diagnostic instance */
  id: string;
  severity: Severity;
  code: string;
  message: string;
  location: SourceSpan;
  /** Syntax node or identity the diagnostic is about */
  primary_node_id?: string | undefined;
  structured: StructuredData;
  hints: Hint[];
  related: RelatedInfo[];
}

export interface StructuredData {
  kind: string;
  expected?: string | undefined;
  actual?: string | undefined;
  [key: string]: unknown;
}

/**
 * A suggested repair. `template` is text the user can paste: a declaration
 * for the source file or an argument for the command line.
 */
export interface Hint {
  strategy: "declare_column" | "supply_known_cell";
  description: string;
  template?: string | undefined;
}

export interface RelatedInfo {
  message: string;
  location: SourceSpan;
}

// =============================================================================
// Solve Result
// =============================================================================

export interface SolveReport {
  /**
   * - "complete": every (identity, row) pair was resolved
   * - "incomplete": some pairs stayed unresolved
   * - "error": the input was rejected or a conflict was found
   */
  status: "complete" | "incomplete" | "error";
  solverVersion: string;
  /** Generated program, one effect per line */
  code: string[];
  completed: IdentityRow[];
  incomplete: IdentityRow[];
  diagnostics: Diagnostic[];
  stats: SolveStats;
}

export interface IdentityRow {
  identityId: number;
  row: number;
}

export interface SolveStats {
  identities: number;
  rows: number;
  passes: number;
  knownCells: number;
  solveTimeMs: number;
}

// =============================================================================
// Helper Functions
// =============================================================================

let diagnosticIdCounter = 0;

function generateDiagnosticId(): string {
  return `d${++diagnosticIdCounter}`;
}

/**
 * Reset the diagnostic ID counter (call at the start of a run).
 */
export function resetDiagnosticIdCounter(): void {
  diagnosticIdCounter = 0;
}

export function createDiagnostic(
  severity: Severity,
  code: string,
  message: string,
  location: SourceSpan,
  structured: StructuredData = { kind: "general" },
  hints: Hint[] = [],
  related: RelatedInfo[] = [],
  primary_node_id?: string
): Diagnostic {
  return {
    id: generateDiagnosticId(),
    severity,
    code,
    message,
    location,
    primary_node_id,
    structured,
    hints,
    related,
  };
}

export function isError(diagnostic: Diagnostic): boolean {
  return diagnostic.severity === "error";
}

export function isWarning(diagnostic: Diagnostic): boolean {
  return diagnostic.severity === "warning";
}
