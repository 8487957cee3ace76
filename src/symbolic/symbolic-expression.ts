/**
 * Symbolic Expressions
 *
 * A value that is known at runtime but not necessarily at solve time: either
 * a concrete field element or an expression over cells whose values the
 * generated code will have computed by the time it is evaluated.
 *
 * Concrete operands are folded eagerly, and a handful of identities
 * (`0 + x`, `1 * x`, `--x`, ...) are applied so that generated code stays
 * readable.
 */

import type { Cell } from "../cell";
import type { FieldElement, PrimeField } from "../field";
import { RangeConstraint } from "../range";

export type FieldOperator = "+" | "*" | "/";
export type BitwiseOperator = "&" | "|" | "//";

export type SymbolicNode =
  | { kind: "concrete"; value: FieldElement }
  | { kind: "symbol"; cell: Cell; rangeConstraint: RangeConstraint | undefined }
  | { kind: "binary"; op: FieldOperator; left: SymbolicExpression; right: SymbolicExpression }
  | { kind: "bitwise"; op: BitwiseOperator; left: SymbolicExpression; operand: bigint }
  | { kind: "negation"; inner: SymbolicExpression };

export class SymbolicExpression {
  readonly field: PrimeField;
  readonly node: SymbolicNode;

  private constructor(field: PrimeField, node: SymbolicNode) {
    this.field = field;
    this.node = node;
  }

  static concrete(field: PrimeField, value: FieldElement | number): SymbolicExpression {
    return new SymbolicExpression(field, { kind: "concrete", value: field.from(value) });
  }

  static symbol(
    field: PrimeField,
    cell: Cell,
    rangeConstraint?: RangeConstraint
  ): SymbolicExpression {
    return new SymbolicExpression(field, { kind: "symbol", cell, rangeConstraint });
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  tryToNumber(): FieldElement | undefined {
    return this.node.kind === "concrete" ? this.node.value : undefined;
  }

  isKnownZero(): boolean {
    return this.tryToNumber() === 0n;
  }

  isKnownOne(): boolean {
    return this.tryToNumber() === 1n;
  }

  isKnownMinusOne(): boolean {
    const n = this.tryToNumber();
    return n !== undefined && this.field.isMinusOne(n);
  }

  /**
   * Range of the runtime value, as far as it can be derived structurally.
   */
  rangeConstraint(): RangeConstraint | undefined {
    const node = this.node;
    switch (node.kind) {
      case "concrete":
        return RangeConstraint.fromValue(this.field, node.value);
      case "symbol":
        return node.rangeConstraint;
      case "negation":
        return node.inner.rangeConstraint()?.negate();
      case "binary": {
        if (node.op === "+") {
          const left = node.left.rangeConstraint();
          const right = node.right.rangeConstraint();
          return left && right ? left.combineSum(right) : undefined;
        }
        if (node.op === "*") {
          const leftNumber = node.left.tryToNumber();
          if (leftNumber !== undefined) return node.right.rangeConstraint()?.multiple(leftNumber);
          const rightNumber = node.right.tryToNumber();
          if (rightNumber !== undefined) return node.left.rangeConstraint()?.multiple(rightNumber);
        }
        return undefined;
      }
      case "bitwise":
        return node.op === "&" ? RangeConstraint.fromMask(this.field, node.operand) : undefined;
    }
  }

  /**
   * Cells this expression reads.
   */
  symbols(): Cell[] {
    const node = this.node;
    switch (node.kind) {
      case "concrete":
        return [];
      case "symbol":
        return [node.cell];
      case "negation":
        return node.inner.symbols();
      case "binary":
        return [...node.left.symbols(), ...node.right.symbols()];
      case "bitwise":
        return node.left.symbols();
    }
  }

  // ===========================================================================
  // Field Arithmetic
  // ===========================================================================

  add(other: SymbolicExpression): SymbolicExpression {
    const a = this.tryToNumber();
    const b = other.tryToNumber();
    if (a !== undefined && b !== undefined) {
      return this.concrete(this.field.add(a, b));
    }
    if (a === 0n) return other;
    if (b === 0n) return this;
    return this.binary("+", other);
  }

  sub(other: SymbolicExpression): SymbolicExpression {
    return this.add(other.neg());
  }

  mul(other: SymbolicExpression): SymbolicExpression {
    const a = this.tryToNumber();
    const b = other.tryToNumber();
    if (a !== undefined && b !== undefined) {
      return this.concrete(this.field.mul(a, b));
    }
    if (a === 0n || b === 0n) return this.concrete(0n);
    if (a === 1n) return other;
    if (b === 1n) return this;
    if (this.isKnownMinusOne()) return other.neg();
    if (other.isKnownMinusOne()) return this.neg();
    return this.binary("*", other);
  }

  neg(): SymbolicExpression {
    const node = this.node;
    if (node.kind === "concrete") {
      return this.concrete(this.field.neg(node.value));
    }
    if (node.kind === "negation") {
      return node.inner;
    }
    return new SymbolicExpression(this.field, { kind: "negation", inner: this });
  }

  /**
   * Division in the field, i.e. multiplication by the inverse.
   */
  fieldDiv(other: SymbolicExpression): SymbolicExpression {
    const a = this.tryToNumber();
    const b = other.tryToNumber();
    if (a !== undefined && b !== undefined) {
      return this.concrete(this.field.div(a, b));
    }
    if (b === 1n) return this;
    if (other.isKnownMinusOne()) return this.neg();
    if (a === 0n) return this;
    return this.binary("/", other);
  }

  // ===========================================================================
  // Integer Operations
  // ===========================================================================

  /**
   * Bitwise and with an integer mask, on the canonical representative.
   */
  bitAnd(mask: bigint): SymbolicExpression {
    const a = this.tryToNumber();
    if (a !== undefined) return this.concrete(a & mask);
    return this.bitwise("&", mask);
  }

  bitOr(mask: bigint): SymbolicExpression {
    const a = this.tryToNumber();
    if (a !== undefined) return this.concrete(a | mask);
    return this.bitwise("|", mask);
  }

  /**
   * Integer division (rounding down) of the canonical representative.
   */
  integerDiv(divisor: bigint): SymbolicExpression {
    if (divisor === 1n) return this;
    const a = this.tryToNumber();
    if (a !== undefined) return this.concrete(a / divisor);
    return this.bitwise("//", divisor);
  }

  toString(): string {
    const node = this.node;
    switch (node.kind) {
      case "concrete":
        return this.field.format(node.value);
      case "symbol":
        return node.cell.toString();
      case "negation":
        return `-${node.inner.toString()}`;
      case "binary":
        return `(${node.left.toString()} ${node.op} ${node.right.toString()})`;
      case "bitwise":
        return `(${node.left.toString()} ${node.op} ${node.operand})`;
    }
  }

  private concrete(value: FieldElement): SymbolicExpression {
    return SymbolicExpression.concrete(this.field, value);
  }

  private binary(op: FieldOperator, right: SymbolicExpression): SymbolicExpression {
    return new SymbolicExpression(this.field, { kind: "binary", op, left: this, right });
  }

  private bitwise(op: BitwiseOperator, operand: bigint): SymbolicExpression {
    return new SymbolicExpression(this.field, { kind: "bitwise", op, left: this, operand });
  }
}
