/**
 * Affine Symbolic Expressions
 *
 * `offset + Σ coefficient_i * unknown_i`, where the offset and the
 * coefficients are known (possibly symbolic) values and each unknown is a
 * cell tagged with its current range constraint.
 *
 * `solve()` reads the expression as the equation `expression = 0`.
 */

import { type Cell, compareCells } from "../cell";
import type { FieldElement, PrimeField } from "../field";
import type { RangeConstraint } from "../range";
import {
  type Effect,
  type ProcessResult,
  assertEq,
  assignment,
  completeResult,
  emptyResult,
} from "./effects";
import { SymbolicExpression } from "./symbolic-expression";

interface Term {
  cell: Cell;
  coefficient: SymbolicExpression;
}

export class AffineSymbolicExpression {
  readonly field: PrimeField;
  readonly offset: SymbolicExpression;
  private readonly terms: Map<string, Term>;
  private readonly rangeConstraints: Map<string, RangeConstraint>;

  private constructor(
    field: PrimeField,
    terms: Map<string, Term>,
    offset: SymbolicExpression,
    rangeConstraints: Map<string, RangeConstraint>
  ) {
    this.field = field;
    this.terms = terms;
    this.offset = offset;
    this.rangeConstraints = rangeConstraints;
  }

  // ===========================================================================
  // Construction
  // ===========================================================================

  static fromNumber(field: PrimeField, value: FieldElement | number): AffineSymbolicExpression {
    return AffineSymbolicExpression.fromKnown(SymbolicExpression.concrete(field, value));
  }

  static fromKnown(value: SymbolicExpression): AffineSymbolicExpression {
    return new AffineSymbolicExpression(value.field, new Map(), value, new Map());
  }

  /**
   * A cell whose value the generated code will already have computed.
   */
  static fromKnownSymbol(
    field: PrimeField,
    cell: Cell,
    rangeConstraint?: RangeConstraint
  ): AffineSymbolicExpression {
    return AffineSymbolicExpression.fromKnown(SymbolicExpression.symbol(field, cell, rangeConstraint));
  }

  static fromUnknownVariable(
    field: PrimeField,
    cell: Cell,
    rangeConstraint?: RangeConstraint
  ): AffineSymbolicExpression {
    const terms = new Map([[cell.key, { cell, coefficient: SymbolicExpression.concrete(field, 1n) }]]);
    const rangeConstraints = new Map<string, RangeConstraint>();
    if (rangeConstraint) {
      rangeConstraints.set(cell.key, rangeConstraint);
    }
    return new AffineSymbolicExpression(field, terms, SymbolicExpression.concrete(field, 0n), rangeConstraints);
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  isKnown(): boolean {
    return this.terms.size === 0;
  }

  /**
   * The known value, if no unknown terms remain.
   */
  tryToKnown(): SymbolicExpression | undefined {
    return this.isKnown() ? this.offset : undefined;
  }

  /**
   * The only unknown cell, if there is exactly one.
   */
  singleUnknownVariable(): Cell | undefined {
    if (this.terms.size !== 1) return undefined;
    return this.sortedTerms()[0].cell;
  }

  unknownVariables(): Cell[] {
    return this.sortedTerms().map((t) => t.cell);
  }

  coefficient(cell: Cell): SymbolicExpression | undefined {
    return this.terms.get(cell.key)?.coefficient;
  }

  rangeConstraintOf(cell: Cell): RangeConstraint | undefined {
    return this.rangeConstraints.get(cell.key);
  }

  // ===========================================================================
  // Arithmetic
  // ===========================================================================

  add(other: AffineSymbolicExpression): AffineSymbolicExpression {
    const terms = new Map(this.terms);
    for (const [key, term] of other.terms) {
      const existing = terms.get(key);
      if (existing === undefined) {
        terms.set(key, term);
        continue;
      }
      const coefficient = existing.coefficient.add(term.coefficient);
      if (coefficient.isKnownZero()) {
        terms.delete(key);
      } else {
        terms.set(key, { cell: existing.cell, coefficient });
      }
    }
    const rangeConstraints = new Map(this.rangeConstraints);
    for (const [key, rc] of other.rangeConstraints) {
      rangeConstraints.set(key, rc);
    }
    return new AffineSymbolicExpression(this.field, terms, this.offset.add(other.offset), rangeConstraints);
  }

  sub(other: AffineSymbolicExpression): AffineSymbolicExpression {
    return this.add(other.neg());
  }

  neg(): AffineSymbolicExpression {
    const terms = new Map<string, Term>();
    for (const [key, term] of this.terms) {
      terms.set(key, { cell: term.cell, coefficient: term.coefficient.neg() });
    }
    return new AffineSymbolicExpression(this.field, terms, this.offset.neg(), this.rangeConstraints);
  }

  /**
   * Product of two affine expressions. Only defined if at least one side is
   * known; otherwise the result would not be affine.
   */
  tryMul(other: AffineSymbolicExpression): AffineSymbolicExpression | undefined {
    const right = other.tryToKnown();
    if (right !== undefined) {
      return this.scale((c) => c.mul(right));
    }
    const left = this.tryToKnown();
    if (left !== undefined) {
      return other.scale((c) => left.mul(c));
    }
    return undefined;
  }

  private scale(
    multiply: (value: SymbolicExpression) => SymbolicExpression
  ): AffineSymbolicExpression {
    const terms = new Map<string, Term>();
    for (const [key, term] of this.terms) {
      const coefficient = multiply(term.coefficient);
      if (!coefficient.isKnownZero()) {
        terms.set(key, { cell: term.cell, coefficient });
      }
    }
    return new AffineSymbolicExpression(this.field, terms, multiply(this.offset), this.rangeConstraints);
  }

  // ===========================================================================
  // Solving
  // ===========================================================================

  /**
   * Solve `this = 0` for the unknowns, as far as currently possible.
   */
  solve(): ProcessResult {
    const terms = this.sortedTerms();

    if (terms.length === 0) {
      if (this.offset.isKnownZero()) {
        return completeResult();
      }
      // Either a conflict or a check on runtime values; both are left to the
      // generated code.
      return completeResult([assertEq(this.offset, SymbolicExpression.concrete(this.field, 0n))]);
    }

    if (terms.length === 1) {
      const { cell, coefficient } = terms[0];
      return completeResult([assignment(cell, this.offset.fieldDiv(coefficient.neg()))]);
    }

    const decomposition = this.solveBitDecomposition();
    if (decomposition.complete) return decomposition;
    const negated = this.neg().solveBitDecomposition();
    if (negated.complete) return negated;

    const transfer = this.transferConstraints();
    return transfer ? { effects: [transfer], complete: false } : emptyResult();
  }

  /**
   * Solve `-offset = Σ 2^k_i * x_i` where the scaled masks of all `x_i` are
   * disjoint: each unknown is then a bit slice of the offset.
   */
  private solveBitDecomposition(): ProcessResult {
    const constrained: { cell: Cell; coefficient: FieldElement; constraint: RangeConstraint }[] = [];
    for (const { cell, coefficient } of this.sortedTerms()) {
      const c = coefficient.tryToNumber();
      const constraint = this.rangeConstraints.get(cell.key);
      if (c === undefined || constraint === undefined) {
        return emptyResult();
      }
      constrained.push({ cell, coefficient: c, constraint });
    }

    const total = this.offset.neg();
    const effects: Effect[] = [];
    let covered = 0n;
    for (const { cell, coefficient, constraint } of constrained) {
      const mask = constraint.multiple(coefficient).mask;
      if ((mask & covered) !== 0n) {
        return emptyResult();
      }
      covered |= mask;
      effects.push(assignment(cell, total.bitAnd(mask).integerDiv(coefficient)));
    }

    if (covered >= this.field.modulus) {
      return emptyResult();
    }

    // Bits outside all masks must be zero, otherwise there is no solution.
    effects.push(assertEq(total, total.bitOr(covered)));
    return completeResult(effects);
  }

  /**
   * Derive a range constraint for the least constrained unknown with
   * coefficient ±1 from the ranges of all other summands.
   */
  private transferConstraints(): Effect | undefined {
    const terms = this.sortedTerms();

    let solveFor: Term | undefined;
    let widest = -1n;
    for (const term of terms) {
      if (!term.coefficient.isKnownOne() && !term.coefficient.isKnownMinusOne()) continue;
      const width = this.rangeConstraints.get(term.cell.key)?.rangeWidth() ?? this.field.modulus;
      if (width >= widest) {
        widest = width;
        solveFor = term;
      }
    }
    if (solveFor === undefined) return undefined;

    let sum = this.offset.rangeConstraint();
    for (const term of terms) {
      if (term === solveFor) continue;
      const c = term.coefficient.tryToNumber();
      const constraint = this.rangeConstraints.get(term.cell.key);
      if (sum === undefined || c === undefined || constraint === undefined) {
        return undefined;
      }
      sum = sum.combineSum(constraint.multiple(c));
    }
    if (sum === undefined) return undefined;

    // x + rest = 0 gives x = -rest; -x + rest = 0 gives x = rest.
    const constraint = solveFor.coefficient.isKnownOne() ? sum.negate() : sum;
    return { kind: "range-constraint", cell: solveFor.cell, constraint };
  }

  private sortedTerms(): Term[] {
    return [...this.terms.values()].sort((a, b) => compareCells(a.cell, b.cell));
  }

  toString(): string {
    const parts = this.sortedTerms().map(({ cell, coefficient }) => {
      if (coefficient.isKnownOne()) return cell.toString();
      if (coefficient.isKnownMinusOne()) return `-${cell}`;
      return `${coefficient} * ${cell}`;
    });
    if (!this.offset.isKnownZero() || parts.length === 0) {
      parts.push(this.offset.toString());
    }
    return parts.join(" + ");
  }
}
