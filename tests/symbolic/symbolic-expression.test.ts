/**
 * Symbolic Expression Tests
 */

import { describe, test, expect } from "vitest";
import { Cell } from "../../src/cell";
import { GOLDILOCKS } from "../../src/field";
import { RangeConstraint } from "../../src/range";
import { SymbolicExpression } from "../../src/symbolic";

const F = GOLDILOCKS;
const p = F.modulus;

const num = (v: bigint | number): SymbolicExpression => SymbolicExpression.concrete(F, v);
const sym = (name: string, id: number, row = 0, rc?: RangeConstraint): SymbolicExpression =>
  SymbolicExpression.symbol(F, new Cell(name, id, row), rc);

describe("SymbolicExpression", () => {
  describe("Concrete values", () => {
    test("fold eagerly", () => {
      expect(num(2).add(num(3)).tryToNumber()).toBe(5n);
      expect(num(2).mul(num(3)).tryToNumber()).toBe(6n);
      expect(num(6).fieldDiv(num(3)).tryToNumber()).toBe(2n);
      expect(num(2).sub(num(3)).tryToNumber()).toBe(p - 1n);
    });

    test("display signed", () => {
      expect(num(-5).toString()).toBe("-5");
      expect(num(7).toString()).toBe("7");
    });

    test("classify known values", () => {
      expect(num(0).isKnownZero()).toBe(true);
      expect(num(1).isKnownOne()).toBe(true);
      expect(num(-1).isKnownMinusOne()).toBe(true);
      expect(num(3).isKnownZero()).toBe(false);
      expect(sym("a", 0).isKnownZero()).toBe(false);
    });

    test("bitwise operations on numbers", () => {
      expect(num(0x1234).bitAnd(0xffn).tryToNumber()).toBe(0x34n);
      expect(num(0x1200).bitOr(0x34n).tryToNumber()).toBe(0x1234n);
      expect(num(0x1234).integerDiv(0x100n).tryToNumber()).toBe(0x12n);
    });
  });

  describe("Simplification", () => {
    const a = sym("a", 0);

    test("adding zero", () => {
      expect(num(0).add(a)).toBe(a);
      expect(a.add(num(0))).toBe(a);
    });

    test("multiplying by one, zero and minus one", () => {
      expect(num(1).mul(a)).toBe(a);
      expect(a.mul(num(1))).toBe(a);
      expect(a.mul(num(0)).isKnownZero()).toBe(true);
      expect(num(-1).mul(a).toString()).toBe("-a[0]");
    });

    test("double negation", () => {
      expect(a.neg().neg()).toBe(a);
    });

    test("dividing by one and minus one", () => {
      expect(a.fieldDiv(num(1))).toBe(a);
      expect(a.fieldDiv(num(-1)).toString()).toBe("-a[0]");
    });

    test("integer division by one", () => {
      expect(a.integerDiv(1n)).toBe(a);
    });
  });

  describe("Display", () => {
    test("parenthesises binary operations", () => {
      const b = sym("b", 1, 2);
      expect(sym("a", 0).add(b).toString()).toBe("(a[0] + b[2])");
      expect(sym("a", 0).mul(b).add(num(1)).toString()).toBe("((a[0] * b[2]) + 1)");
      expect(sym("a", 0).fieldDiv(num(3)).toString()).toBe("(a[0] / 3)");
    });

    test("prints bitwise operands as plain integers", () => {
      expect(sym("a", 0).bitAnd(0xff000000n).integerDiv(0x1000000n).toString()).toBe(
        "((a[0] & 4278190080) // 16777216)"
      );
      expect(sym("a", 0).bitOr(0xffn).toString()).toBe("(a[0] | 255)");
    });
  });

  describe("rangeConstraint", () => {
    const byte = RangeConstraint.fromMask(F, 0xffn);

    test("of a concrete value", () => {
      expect(num(7).rangeConstraint()?.tryToSingleValue()).toBe(7n);
    });

    test("of a symbol is its own", () => {
      expect(sym("a", 0, 0, byte).rangeConstraint()).toBe(byte);
      expect(sym("a", 0).rangeConstraint()).toBeUndefined();
    });

    test("of sums and scaled symbols", () => {
      const sum = sym("a", 0, 0, byte).add(sym("b", 1, 0, byte).mul(num(256)));
      expect(sum.rangeConstraint()?.toString()).toBe("[0, 65535] & 0xffff");
    });

    test("of a masked value", () => {
      expect(sym("a", 0).bitAnd(0xffn).rangeConstraint()?.equals(byte)).toBe(true);
    });

    test("unknown for products of symbols", () => {
      expect(sym("a", 0, 0, byte).mul(sym("b", 1, 0, byte)).rangeConstraint()).toBeUndefined();
    });
  });

  test("symbols lists the cells read", () => {
    const expr = sym("a", 0).add(sym("b", 1, 3).neg()).bitAnd(3n);
    expect(expr.symbols().map((c) => c.toString())).toEqual(["a[0]", "b[3]"]);
  });
});
