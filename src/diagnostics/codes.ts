/**
 * Error Code Registry
 *
 * Error codes follow the pattern:
 * - E0xxx: Syntax errors
 * - E1xxx: Name and column errors
 * - E3xxx: Solver conflicts
 * - W0xxx: Warnings
 */

import type { Severity } from "./diagnostic";

export const ErrorCode = {
  // ==========================================================================
  // E0xxx - Syntax errors (handled by lexer/parser)
  // ==========================================================================
  UnexpectedToken: "E0001",
  InvalidNumeric: "E0003",
  ExpectedExpression: "E0005",

  // ==========================================================================
  // E1xxx - Name and column errors
  // ==========================================================================
  UnresolvedName: "E1001",
  DuplicateDefinition: "E1002",
  InvalidFixedColumn: "E1003",
  UnknownKnownCell: "E1004",
  LookupArityMismatch: "E1005",

  // ==========================================================================
  // E3xxx - Solver conflicts
  // ==========================================================================
  EmptyRangeConstraint: "E3001",

  // ==========================================================================
  // W0xxx - Warnings
  // ==========================================================================
  UnresolvedIdentity: "W0001",
  PassLimitReached: "W0002",
  MissingDegree: "W0003",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Get a human-readable description for an error code.
 */
export function getErrorDescription(code: string): string {
  const descriptions: Record<string, string> = {
    E0001: "Unexpected token in input",
    E0003: "Invalid numeric literal",
    E0005: "Expected an expression",

    E1001: "Column or namespace is not defined",
    E1002: "Column is already defined",
    E1003: "Fixed column values are malformed",
    E1004: "Cell given as known does not name a witness column",
    E1005: "Both sides of a lookup must have the same number of expressions",

    E3001: "No value satisfies the range constraints of a cell",

    W0001: "Identity could not be resolved on this row",
    W0002: "Iteration limit reached before a fixed point",
    W0003: "Repeated fixed column values need a namespace degree",
  };

  return descriptions[code] ?? "Unknown error";
}

/**
 * Get the severity for an error code.
 */
export function getCodeSeverity(code: string): Severity {
  if (code.startsWith("W")) {
    return "warning";
  }
  return "error";
}
