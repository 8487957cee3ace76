/**
 * Global Range Constraints
 *
 * Range constraints that hold on every row, derived once from the constraint
 * system before solving: the value ranges of fixed columns, lookups of
 * witness columns into fixed columns, and boolean constraints.
 */

import type {
  AlgebraicReference,
  ConstraintSystem,
  Expression,
  Identity,
  LookupIdentity,
} from "../constraints";
import { isFixedReference } from "../constraints";
import type { PrimeField } from "../field";
import { RangeConstraint } from "../range";

export interface RangeConstraintSource {
  rangeConstraint(reference: AlgebraicReference): RangeConstraint | undefined;
}

export class GlobalConstraints implements RangeConstraintSource {
  constructor(
    private readonly witnessConstraints: ReadonlyMap<number, RangeConstraint>,
    private readonly fixedConstraints: ReadonlyMap<number, RangeConstraint>
  ) {}

  static none(): GlobalConstraints {
    return new GlobalConstraints(new Map(), new Map());
  }

  rangeConstraint(reference: AlgebraicReference): RangeConstraint | undefined {
    const constraints = isFixedReference(reference) ? this.fixedConstraints : this.witnessConstraints;
    return constraints.get(reference.polyId.id);
  }

  /**
   * Witness column ids with a global constraint.
   */
  constrainedWitnessColumns(): number[] {
    return [...this.witnessConstraints.keys()].sort((a, b) => a - b);
  }
}

export interface GlobalConstraintResult {
  constraints: GlobalConstraints;
  /** Identities that still need to be solved */
  retainedIdentities: Identity[];
}

export function deriveGlobalConstraints(
  system: ConstraintSystem,
  field: PrimeField
): GlobalConstraintResult {
  const fixedConstraints = new Map<number, RangeConstraint>();
  for (const column of system.fixedColumns) {
    const constraint = fixedColumnConstraint(column.values, field);
    if (constraint !== undefined) {
      fixedConstraints.set(column.polyId.id, constraint);
    }
  }

  const witnessConstraints = new Map<number, RangeConstraint>();
  const add = (id: number, constraint: RangeConstraint): void => {
    const existing = witnessConstraints.get(id);
    witnessConstraints.set(id, existing ? existing.conjunction(constraint) : constraint);
  };

  const retainedIdentities: Identity[] = [];
  for (const identity of system.identities) {
    let consumed = false;
    if (identity.kind === "lookup") {
      const transferred = lookupTransfers(identity, fixedConstraints);
      for (const [id, constraint] of transferred) {
        add(id, constraint);
      }
      // A single-column lookup that transferred its range is a pure range check.
      consumed = transferred.length > 0 && identity.left.expressions.length === 1;
    } else if (identity.kind === "polynomial") {
      const column = booleanColumn(identity.expression);
      if (column !== undefined) {
        add(column.polyId.id, RangeConstraint.fromMask(field, 1n));
        consumed = true;
      }
    }
    if (!consumed) {
      retainedIdentities.push(identity);
    }
  }

  return {
    constraints: new GlobalConstraints(witnessConstraints, fixedConstraints),
    retainedIdentities,
  };
}

function fixedColumnConstraint(values: bigint[], field: PrimeField): RangeConstraint | undefined {
  if (values.length === 0) return undefined;
  let min = field.from(values[0]);
  let max = min;
  for (const value of values) {
    const v = field.from(value);
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return RangeConstraint.fromRange(field, min, max);
}

/**
 * `[w1, ..., wn] in [f1, ..., fn]` with unconditional sides constrains each
 * witness column `wi` to the range of the fixed column `fi`.
 */
function lookupTransfers(
  identity: LookupIdentity,
  fixedConstraints: ReadonlyMap<number, RangeConstraint>
): [number, RangeConstraint][] {
  if (!isLiteralOne(identity.left.selector) || !isLiteralOne(identity.right.selector)) {
    return [];
  }
  const transfers: [number, RangeConstraint][] = [];
  identity.left.expressions.forEach((left, i) => {
    const right = identity.right.expressions[i];
    if (left.kind !== "reference" || right === undefined || right.kind !== "reference") return;
    if (isFixedReference(left.reference) || left.reference.next) return;
    if (!isFixedReference(right.reference) || right.reference.next) return;
    const constraint = fixedConstraints.get(right.reference.polyId.id);
    if (constraint !== undefined) {
      transfers.push([left.reference.polyId.id, constraint]);
    }
  });
  return transfers;
}

/**
 * The witness reference `x` if the expression is `x * (x - 1)` or
 * `x * (1 - x)`, in either factor order.
 */
function booleanColumn(expr: Expression): AlgebraicReference | undefined {
  if (expr.kind !== "binary" || expr.op !== "*") return undefined;
  return booleanFactors(expr.left, expr.right) ?? booleanFactors(expr.right, expr.left);
}

function booleanFactors(variable: Expression, factor: Expression): AlgebraicReference | undefined {
  if (variable.kind !== "reference") return undefined;
  const reference = variable.reference;
  if (isFixedReference(reference) || reference.next) return undefined;
  if (factor.kind !== "binary" || factor.op !== "-") return undefined;

  const { left, right } = factor;
  const isVariable = (e: Expression): boolean =>
    e.kind === "reference" &&
    e.reference.polyId.id === reference.polyId.id &&
    e.reference.polyId.ptype === reference.polyId.ptype &&
    e.reference.next === reference.next;

  if ((isVariable(left) && isLiteralOne(right)) || (isLiteralOne(left) && isVariable(right))) {
    return reference;
  }
  return undefined;
}

function isLiteralOne(expr: Expression): boolean {
  return expr.kind === "number" && expr.value === 1n;
}
