/**
 * Syntax tree of the constraint language
 *
 * All nodes include a SourceSpan for error reporting and an ID that is
 * stable within one parse.
 */

import type { SourceSpan } from "../utils/span";

// =============================================================================
// Node ID Generation
// =============================================================================

let nodeIdCounter = 0;

/**
 * Generate a unique node ID. Format: "n{counter}" (e.g., "n1", "n2", ...)
 */
export function generateNodeId(): string {
  return `n${++nodeIdCounter}`;
}

/**
 * Reset the node ID counter so the same input yields the same IDs.
 */
export function resetNodeIdCounter(): void {
  nodeIdCounter = 0;
}

// =============================================================================
// Base Types
// =============================================================================

export interface AstNode {
  id: string;
  span: SourceSpan;
}

// =============================================================================
// Expressions
// =============================================================================

export type BinaryOp = "+" | "-" | "*" | "**";
export type UnaryOp = "-";

export type Expr = NumberExpr | RefExpr | PublicRefExpr | BinaryExpr | UnaryExpr;

export interface NumberExpr extends AstNode {
  kind: "number";
  value: bigint;
}

export interface RefExpr extends AstNode {
  kind: "ref";
  /** Possibly namespace-qualified, e.g. "Main::x" */
  name: string;
  /** Written with a trailing quote: the value on the next row */
  next: boolean;
}

export interface PublicRefExpr extends AstNode {
  kind: "public-ref";
  name: string;
}

export interface BinaryExpr extends AstNode {
  kind: "binary";
  op: BinaryOp;
  left: Expr;
  right: Expr;
}

export interface UnaryExpr extends AstNode {
  kind: "unary";
  op: UnaryOp;
  operand: Expr;
}

/**
 * `selector $ [e1, e2, ...]`; the selector is optional.
 */
export interface SelectedExpr extends AstNode {
  selector?: Expr | undefined;
  expressions: Expr[];
}

// =============================================================================
// Statements
// =============================================================================

export type Stmt =
  | NamespaceStmt
  | WitnessDecl
  | FixedDecl
  | PolynomialIdentityStmt
  | LookupIdentityStmt
  | ConnectIdentityStmt;

export interface NamespaceStmt extends AstNode {
  kind: "namespace";
  name: string;
  degree?: bigint | undefined;
}

export interface DeclaredName {
  name: string;
  span: SourceSpan;
}

export interface WitnessDecl extends AstNode {
  kind: "witness";
  names: DeclaredName[];
}

/**
 * One `[v1, v2, ...]` block of a fixed column definition; a repeated block
 * (written with a trailing `*`) fills the rows up to the degree.
 */
export interface FixedValueBlock {
  values: bigint[];
  repeat: boolean;
}

export interface FixedDecl extends AstNode {
  kind: "fixed";
  name: string;
  /** Absent when the values are supplied from outside */
  blocks?: FixedValueBlock[] | undefined;
}

export interface PolynomialIdentityStmt extends AstNode {
  kind: "polynomial-identity";
  left: Expr;
  right: Expr;
}

export interface LookupIdentityStmt extends AstNode {
  kind: "lookup-identity";
  op: "in" | "is";
  phantom: boolean;
  left: SelectedExpr;
  right: SelectedExpr;
}

export interface ConnectIdentityStmt extends AstNode {
  kind: "connect-identity";
  left: Expr[];
  right: Expr[];
}

export interface Program {
  kind: "program";
  id: string;
  span: SourceSpan;
  statements: Stmt[];
}
