/**
 * Constraint Expression Tree
 *
 * The analyzed form of a constraint system: columns are resolved to numeric
 * ids, and every identity carries a stable id and an optional source span.
 */

import type { SourceSpan } from "../utils/span";

// =============================================================================
// References
// =============================================================================

/** Witness columns are "committed", fixed columns are "constant". */
export type PolynomialType = "committed" | "constant";

export interface PolyId {
  id: number;
  ptype: PolynomialType;
}

export interface AlgebraicReference {
  name: string;
  polyId: PolyId;
  /** Refers to the next row */
  next: boolean;
}

export function isFixedReference(reference: AlgebraicReference): boolean {
  return reference.polyId.ptype === "constant";
}

// =============================================================================
// Expressions
// =============================================================================

export type BinaryOperator = "+" | "-" | "*" | "**";
export type UnaryOperator = "-";

export type Expression =
  | ReferenceExpression
  | PublicReferenceExpression
  | ChallengeExpression
  | NumberExpression
  | BinaryExpression
  | UnaryExpression;

export interface ReferenceExpression {
  kind: "reference";
  reference: AlgebraicReference;
}

export interface PublicReferenceExpression {
  kind: "public-reference";
  name: string;
}

export interface ChallengeExpression {
  kind: "challenge";
  id: number;
  stage: number;
}

export interface NumberExpression {
  kind: "number";
  value: bigint;
}

export interface BinaryExpression {
  kind: "binary";
  op: BinaryOperator;
  left: Expression;
  right: Expression;
}

export interface UnaryExpression {
  kind: "unary";
  op: UnaryOperator;
  expr: Expression;
}

// =============================================================================
// Identities
// =============================================================================

export interface SelectedExpressions {
  selector: Expression;
  expressions: Expression[];
}

export type LookupKind = "lookup" | "permutation" | "phantom-lookup" | "phantom-permutation";

interface IdentityBase {
  id: number;
  span?: SourceSpan | undefined;
}

export interface PolynomialIdentity extends IdentityBase {
  kind: "polynomial";
  /** Constrained to be zero */
  expression: Expression;
}

export interface LookupIdentity extends IdentityBase {
  kind: LookupKind;
  left: SelectedExpressions;
  right: SelectedExpressions;
}

export interface BusInteractionIdentity extends IdentityBase {
  kind: "phantom-bus-interaction";
  multiplicity: Expression;
  tuple: Expression[];
  latch: Expression;
}

export interface ConnectIdentity extends IdentityBase {
  kind: "connect";
  left: Expression[];
  right: Expression[];
}

export type Identity =
  | PolynomialIdentity
  | LookupIdentity
  | BusInteractionIdentity
  | ConnectIdentity;

export function isLookupIdentity(identity: Identity): identity is LookupIdentity {
  return (
    identity.kind === "lookup" ||
    identity.kind === "permutation" ||
    identity.kind === "phantom-lookup" ||
    identity.kind === "phantom-permutation"
  );
}

function identityExpressions(identity: Identity): Expression[] {
  switch (identity.kind) {
    case "polynomial":
      return [identity.expression];
    case "lookup":
    case "permutation":
    case "phantom-lookup":
    case "phantom-permutation":
      return [
        identity.left.selector,
        ...identity.left.expressions,
        identity.right.selector,
        ...identity.right.expressions,
      ];
    case "phantom-bus-interaction":
      return [identity.multiplicity, ...identity.tuple, identity.latch];
    case "connect":
      return [...identity.left, ...identity.right];
  }
}

/**
 * Witness column references of an identity in source order, each once.
 */
export function witnessReferences(identity: Identity): AlgebraicReference[] {
  const found = new Map<string, AlgebraicReference>();
  const visit = (expr: Expression): void => {
    switch (expr.kind) {
      case "reference":
        if (!isFixedReference(expr.reference)) {
          found.set(`${expr.reference.polyId.id}${expr.reference.next ? "'" : ""}`, expr.reference);
        }
        return;
      case "binary":
        visit(expr.left);
        visit(expr.right);
        return;
      case "unary":
        visit(expr.expr);
        return;
      case "number":
      case "public-reference":
      case "challenge":
        return;
    }
  };
  identityExpressions(identity).forEach(visit);
  return [...found.values()];
}

// =============================================================================
// Constraint System
// =============================================================================

export interface ColumnInfo {
  name: string;
  polyId: PolyId;
}

export interface FixedColumn extends ColumnInfo {
  /** Values for every row; empty when the column is evaluated elsewhere */
  values: bigint[];
}

export interface ConstraintSystem {
  /** Number of rows, when declared */
  degree?: number | undefined;
  witnessColumns: ColumnInfo[];
  fixedColumns: FixedColumn[];
  identities: Identity[];
}

// =============================================================================
// Builders
// =============================================================================

export function num(value: bigint | number): NumberExpression {
  return { kind: "number", value: BigInt(value) };
}

export function ref(reference: AlgebraicReference): ReferenceExpression {
  return { kind: "reference", reference };
}

export function binary(op: BinaryOperator, left: Expression, right: Expression): BinaryExpression {
  return { kind: "binary", op, left, right };
}

export function negate(expr: Expression): UnaryExpression {
  return { kind: "unary", op: "-", expr };
}

/**
 * Selected expressions that are always active.
 */
export function unselected(expressions: Expression[]): SelectedExpressions {
  return { selector: num(1), expressions };
}
