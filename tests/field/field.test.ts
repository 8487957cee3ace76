/**
 * Prime Field Tests
 */

import { describe, test, expect } from "vitest";
import {
  PrimeField,
  GOLDILOCKS,
  BABY_BEAR,
  bitLength,
  maskFromBits,
  log2Exact,
  isProbablePrime,
  fieldByName,
  fieldNames,
} from "../../src/field";

const p = GOLDILOCKS.modulus;

describe("PrimeField", () => {
  describe("Arithmetic", () => {
    test("reduces into canonical form", () => {
      expect(GOLDILOCKS.from(-1)).toBe(p - 1n);
      expect(GOLDILOCKS.from(p + 5n)).toBe(5n);
      expect(GOLDILOCKS.from(7)).toBe(7n);
    });

    test("adds and subtracts with wrap-around", () => {
      expect(GOLDILOCKS.add(p - 1n, 2n)).toBe(1n);
      expect(GOLDILOCKS.sub(1n, 2n)).toBe(p - 1n);
    });

    test("negates", () => {
      expect(GOLDILOCKS.neg(0n)).toBe(0n);
      expect(GOLDILOCKS.neg(1n)).toBe(p - 1n);
    });

    test("inverts and divides", () => {
      const small = new PrimeField(7n);
      expect(small.inv(3n)).toBe(5n);
      expect(small.div(6n, 3n)).toBe(2n);
      expect(GOLDILOCKS.mul(GOLDILOCKS.inv(12345n), 12345n)).toBe(1n);
    });

    test("throws on division by zero", () => {
      expect(() => GOLDILOCKS.inv(0n)).toThrow(RangeError);
    });

    test("raises to powers", () => {
      expect(GOLDILOCKS.pow(2n, 10n)).toBe(1024n);
      expect(GOLDILOCKS.pow(5n, 0n)).toBe(1n);
      const small = new PrimeField(7n);
      expect(small.pow(3n, -1n)).toBe(5n);
    });

    test("knows its minus one", () => {
      expect(GOLDILOCKS.minusOne).toBe(p - 1n);
      expect(GOLDILOCKS.isMinusOne(p - 1n)).toBe(true);
      expect(GOLDILOCKS.isMinusOne(1n)).toBe(false);
    });

    test("rejects moduli that are not prime", () => {
      expect(() => new PrimeField(1n)).toThrow("Field modulus 1 is not prime");
      expect(() => new PrimeField(4n)).toThrow("Field modulus 4 is not prime");
      expect(() => new PrimeField(561n)).toThrow(RangeError);
    });

    test("throws for values without an inverse", () => {
      const small = new PrimeField(7n);
      expect(() => small.inv(7n)).toThrow("7 has no inverse modulo 7");
    });
  });

  describe("Display", () => {
    test("shows small values as they are", () => {
      expect(GOLDILOCKS.format(42n)).toBe("42");
    });

    test("shows values above half the modulus as negative", () => {
      expect(GOLDILOCKS.format(p - 1n)).toBe("-1");
      expect(GOLDILOCKS.format(p - 9223372034707292155n)).toBe("-9223372034707292155");
    });

    test("bit length of the goldilocks modulus", () => {
      expect(GOLDILOCKS.bitLength).toBe(64);
      expect(BABY_BEAR.bitLength).toBe(31);
    });
  });

  describe("Bit helpers", () => {
    test("bitLength", () => {
      expect(bitLength(0n)).toBe(0);
      expect(bitLength(1n)).toBe(1);
      expect(bitLength(255n)).toBe(8);
      expect(bitLength(256n)).toBe(9);
    });

    test("maskFromBits", () => {
      expect(maskFromBits(0)).toBe(0n);
      expect(maskFromBits(8)).toBe(255n);
    });

    test("log2Exact", () => {
      expect(log2Exact(1n)).toBe(0);
      expect(log2Exact(256n)).toBe(8);
      expect(log2Exact(6n)).toBeUndefined();
      expect(log2Exact(0n)).toBeUndefined();
    });
  });

  describe("isProbablePrime", () => {
    test("small numbers", () => {
      expect([0n, 1n, 2n, 3n, 4n, 41n, 43n, 91n, 101n].map(isProbablePrime)).toEqual([
        false,
        false,
        true,
        true,
        false,
        true,
        true,
        false,
        true,
      ]);
    });

    test("strong pseudoprimes to the first bases are rejected", () => {
      expect(isProbablePrime(3215031751n)).toBe(false);
    });

    test("the named moduli are prime", () => {
      expect(isProbablePrime(GOLDILOCKS.modulus)).toBe(true);
      expect(isProbablePrime(BABY_BEAR.modulus)).toBe(true);
      expect(isProbablePrime((1n << 61n) - 1n)).toBe(true);
      expect(isProbablePrime(GOLDILOCKS.modulus + 2n)).toBe(false);
    });
  });

  describe("Named fields", () => {
    test("looks up fields by name", () => {
      expect(fieldByName("goldilocks")).toBe(GOLDILOCKS);
      expect(fieldByName("BabyBear")).toBe(BABY_BEAR);
      expect(fieldNames()).toEqual(["goldilocks", "babybear", "bn254"]);
    });

    test("builds a field from a modulus", () => {
      expect(fieldByName("0x65")?.modulus).toBe(101n);
      expect(fieldByName("101")?.modulus).toBe(101n);
    });

    test("throws for a modulus that is not prime", () => {
      expect(() => fieldByName("4")).toThrow("Field modulus 4 is not prime");
    });

    test("returns undefined for unknown names", () => {
      expect(fieldByName("mersenne")).toBeUndefined();
    });
  });
});
