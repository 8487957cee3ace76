/**
 * Witness Generation Inference
 *
 * Stateful engine that turns identities on concrete rows into code. It
 * tracks which cells the generated code will have computed and which range
 * constraints hold for the others, and appends one effect per operation the
 * code has to perform. A driver decides which identities to process on
 * which rows and how often.
 */

import { Cell, CellSet } from "../cell";
import type {
  AlgebraicReference,
  BinaryExpression,
  Expression,
  Identity,
  LookupIdentity,
} from "../constraints";
import { isFixedReference, isLookupIdentity } from "../constraints";
import type { PrimeField } from "../field";
import type { RangeConstraint } from "../range";
import {
  AffineSymbolicExpression,
  SymbolicExpression,
  completeResult,
  emptyResult,
  type Effect,
  type MachineCallArgument,
  type ProcessResult,
} from "../symbolic";
import { type Logger, silentLogger } from "../utils/logger";
import { InternalSolverError } from "./errors";
import type { FixedEvaluator } from "./fixed-evaluator";
import type { RangeConstraintSource } from "./global-constraints";

export interface WitgenInferenceOptions {
  field: PrimeField;
  fixedEvaluator: FixedEvaluator;
  globalConstraints?: RangeConstraintSource | undefined;
  /** Cells whose values are available before the generated code runs */
  knownCells?: Iterable<Cell> | undefined;
  logger?: Logger | undefined;
}

/**
 * A cell whose range constraints allow no value at all.
 */
export interface RangeConflict {
  cell: Cell;
  /** Identity being processed when the conflict was found */
  identityId: number;
  rowOffset: number;
}

export class WitgenInference {
  private readonly field: PrimeField;
  private readonly fixedEvaluator: FixedEvaluator;
  private readonly globalConstraints: RangeConstraintSource | undefined;
  private readonly logger: Logger;
  private readonly known: CellSet;
  private readonly derivedRangeConstraints = new Map<string, RangeConstraint>();
  private readonly effects: Effect[] = [];
  private readonly conflictList: RangeConflict[] = [];
  private changes = 0;
  private current: { identityId: number; rowOffset: number } = { identityId: -1, rowOffset: 0 };

  constructor(options: WitgenInferenceOptions) {
    this.field = options.field;
    this.fixedEvaluator = options.fixedEvaluator;
    this.globalConstraints = options.globalConstraints;
    this.logger = options.logger ?? silentLogger();
    this.known = new CellSet(options.knownCells ?? []);
  }

  // ===========================================================================
  // Accessors
  // ===========================================================================

  /**
   * The generated program so far.
   */
  code(): Effect[] {
    return [...this.effects];
  }

  knownCells(): Cell[] {
    return this.known.toArray();
  }

  isKnown(cell: Cell): boolean {
    return this.known.has(cell);
  }

  conflicts(): RangeConflict[] {
    return [...this.conflictList];
  }

  /**
   * Number of state changes so far; it stays the same across a round in
   * which nothing new was learned.
   */
  changeCount(): number {
    return this.changes;
  }

  // ===========================================================================
  // Processing
  // ===========================================================================

  /**
   * Process an identity on a row. Returns true if the pair is done and never
   * needs to be processed again.
   */
  processIdentity(identity: Identity, rowOffset: number): boolean {
    this.current = { identityId: identity.id, rowOffset };
    let result: ProcessResult;
    if (identity.kind === "polynomial") {
      result = this.processPolynomialIdentity(identity.expression, rowOffset);
    } else if (isLookupIdentity(identity)) {
      result = this.processLookup(identity, rowOffset);
    } else {
      // Bus interactions and connect identities cannot be answered yet.
      result = emptyResult();
    }
    this.ingestEffects(result.effects);
    return result.complete;
  }

  private processPolynomialIdentity(expression: Expression, rowOffset: number): ProcessResult {
    const evaluated = this.evaluate(expression, rowOffset);
    return evaluated === undefined ? emptyResult() : evaluated.solve();
  }

  /**
   * A lookup into static columns becomes a call into the table as soon as
   * its selector is one and exactly one of its arguments is unknown.
   */
  private processLookup(identity: LookupIdentity, rowOffset: number): ProcessResult {
    const { left, right } = identity;
    const rightIsStatic = right.expressions.every(
      (e) => e.kind === "number" || (e.kind === "reference" && isFixedReference(e.reference))
    );
    if (!rightIsStatic) return emptyResult();

    const selector = this.evaluate(left.selector, rowOffset)?.tryToKnown();
    if (selector === undefined || !selector.isKnownOne()) return emptyResult();

    const values: AffineSymbolicExpression[] = [];
    for (const e of left.expressions) {
      const value = this.evaluate(e, rowOffset);
      if (value === undefined) return emptyResult();
      values.push(value);
    }

    const unknown = values.filter((v) => !v.isKnown());
    if (unknown.length !== 1 || unknown[0].singleUnknownVariable() === undefined) {
      return emptyResult();
    }

    const args: MachineCallArgument[] = values.map((value) => {
      const known = value.tryToKnown();
      return known !== undefined
        ? { kind: "known", value: known }
        : { kind: "unknown", expression: value };
    });
    return completeResult([{ kind: "machine-call", identityId: identity.id, arguments: args }]);
  }

  // ===========================================================================
  // Ingesting Effects
  // ===========================================================================

  private ingestEffects(effects: Effect[]): void {
    for (const effect of effects) {
      switch (effect.kind) {
        case "assignment": {
          if (!this.known.add(effect.cell)) {
            throw new InternalSolverError(`Cell ${effect.cell} is assigned twice`);
          }
          this.changes++;
          const constraint = effect.value.rangeConstraint();
          if (constraint !== undefined) {
            // Keeps compile-time constants visible to later evaluations.
            this.addRangeConstraint(effect.cell, constraint);
          }
          this.effects.push(effect);
          this.logger.debug(`assign ${effect.cell}`, { value: effect.value.toString() });
          break;
        }

        case "range-constraint":
          this.addRangeConstraint(effect.cell, effect.constraint);
          break;

        case "machine-call":
          for (const arg of effect.arguments) {
            if (arg.kind !== "unknown") continue;
            const cell = arg.expression.singleUnknownVariable();
            if (cell === undefined) {
              throw new InternalSolverError(
                `Unknown argument ${arg.expression} of lookup ${effect.identityId} has no single unknown cell`
              );
            }
            this.known.add(cell);
          }
          this.changes++;
          this.effects.push(effect);
          this.logger.debug(`call lookup ${effect.identityId}`, { row: this.current.rowOffset });
          break;

        case "assertion":
          this.changes++;
          this.effects.push(effect);
          break;
      }
    }
  }

  private addRangeConstraint(cell: Cell, constraint: RangeConstraint): void {
    const previous = this.rangeConstraint(cell);
    const combined = previous === undefined ? constraint : previous.conjunction(constraint);

    if (combined.isEmpty()) {
      if (previous !== undefined && previous.isEmpty()) return;
      // Left to the generated code; recorded so the driver can report it.
      this.conflictList.push({ cell, ...this.current });
      this.logger.warn(`empty range constraint for ${cell}`, {
        identity: this.current.identityId,
        row: this.current.rowOffset,
      });
    } else if (!this.known.has(cell)) {
      const value = combined.tryToSingleValue();
      if (value !== undefined) {
        // The range constraints alone fix the value.
        this.known.add(cell);
        this.effects.push({
          kind: "assignment",
          cell,
          value: SymbolicExpression.concrete(this.field, value),
        });
        this.logger.debug(`assign ${cell} from range constraint`, { value: this.field.format(value) });
      }
    }

    if (previous === undefined || !previous.equals(combined)) {
      this.changes++;
    }
    this.derivedRangeConstraints.set(cell.key, combined);
  }

  // ===========================================================================
  // Evaluation
  // ===========================================================================

  /**
   * Evaluate an expression on a row into an affine expression over the
   * unknown cells, or `undefined` if it is not affine in the current state.
   */
  private evaluate(expr: Expression, rowOffset: number): AffineSymbolicExpression | undefined {
    switch (expr.kind) {
      case "reference":
        return this.evaluateReference(expr.reference, rowOffset);

      case "public-reference":
      case "challenge":
        return undefined;

      case "number":
        return AffineSymbolicExpression.fromNumber(this.field, this.field.from(expr.value));

      case "binary":
        return this.evaluateBinary(expr, rowOffset);

      case "unary":
        return this.evaluate(expr.expr, rowOffset)?.neg();
    }
  }

  private evaluateReference(
    reference: AlgebraicReference,
    rowOffset: number
  ): AffineSymbolicExpression | undefined {
    if (isFixedReference(reference)) {
      const value = this.fixedEvaluator.evaluate(reference, rowOffset);
      return value === undefined
        ? undefined
        : AffineSymbolicExpression.fromNumber(this.field, this.field.from(value));
    }

    const cell = Cell.fromReference(reference, rowOffset);
    const constraint = this.rangeConstraint(cell);
    const value = constraint?.tryToSingleValue();
    if (value !== undefined) {
      return AffineSymbolicExpression.fromNumber(this.field, value);
    }
    if (this.known.has(cell)) {
      return AffineSymbolicExpression.fromKnownSymbol(this.field, cell, constraint);
    }
    return AffineSymbolicExpression.fromUnknownVariable(this.field, cell, constraint);
  }

  private evaluateBinary(
    expr: BinaryExpression,
    rowOffset: number
  ): AffineSymbolicExpression | undefined {
    const left = this.evaluate(expr.left, rowOffset);
    const right = this.evaluate(expr.right, rowOffset);
    if (left === undefined || right === undefined) return undefined;

    switch (expr.op) {
      case "+":
        return left.add(right);
      case "-":
        return left.sub(right);
      case "*":
        return left.tryMul(right);
      case "**": {
        const base = left.tryToKnown()?.tryToNumber();
        const exponent = right.tryToKnown()?.tryToNumber();
        if (base === undefined || exponent === undefined) return undefined;
        return AffineSymbolicExpression.fromNumber(this.field, this.field.pow(base, exponent));
      }
    }
  }

  /**
   * Current best range constraint of a cell: the global constraint of its
   * column combined with what was derived for this particular cell.
   */
  rangeConstraint(cell: Cell): RangeConstraint | undefined {
    const global = this.globalConstraints?.rangeConstraint({
      name: cell.columnName,
      polyId: { id: cell.id, ptype: "committed" },
      next: false,
    });
    const derived = this.derivedRangeConstraints.get(cell.key);
    if (global === undefined) return derived;
    if (derived === undefined) return global;
    return global.conjunction(derived);
  }
}
