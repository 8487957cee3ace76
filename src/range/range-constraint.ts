/**
 * Range Constraints
 *
 * A sound over-approximation of the values a cell can take. Two independent
 * abstractions are tracked together:
 *
 * - a bit mask: every allowed value `v` satisfies `v & ~mask == 0`
 * - a wrapping interval `[min, max]`: when `min > max` the interval wraps
 *   around the modulus, i.e. it is `[min, p - 1] ∪ [0, max]`
 *
 * The constraint with no allowed values is represented explicitly.
 */

import {
  type FieldElement,
  type PrimeField,
  bitLength,
  log2Exact,
  maskFromBits,
} from "../field";

interface Segment {
  start: bigint;
  end: bigint;
}

export class RangeConstraint {
  readonly field: PrimeField;
  readonly mask: bigint;
  readonly min: FieldElement;
  readonly max: FieldElement;
  private readonly impossible: boolean;

  private constructor(
    field: PrimeField,
    mask: bigint,
    min: FieldElement,
    max: FieldElement,
    impossible: boolean
  ) {
    this.field = field;
    this.mask = mask;
    this.min = min;
    this.max = max;
    this.impossible = impossible;
  }

  // ===========================================================================
  // Construction
  // ===========================================================================

  /**
   * Build a constraint and bring mask and interval into agreement.
   */
  private static create(
    field: PrimeField,
    mask: bigint,
    min: FieldElement,
    max: FieldElement
  ): RangeConstraint {
    let m = mask & fullMask(field);
    let lo = min;
    let hi = max;

    if (lo > hi && m < lo) {
      // The upper segment lies entirely above the mask.
      lo = 0n;
    }

    if (lo <= hi) {
      if (hi > m) hi = m;
      if (lo > hi) return RangeConstraint.empty(field);
      m &= maskFromBits(bitLength(hi));
    }

    if (lo === hi && (lo & m) !== lo) {
      return RangeConstraint.empty(field);
    }

    return new RangeConstraint(field, m, lo, hi, false);
  }

  static unconstrained(field: PrimeField): RangeConstraint {
    return RangeConstraint.create(field, fullMask(field), 0n, field.modulus - 1n);
  }

  static empty(field: PrimeField): RangeConstraint {
    return new RangeConstraint(field, 0n, 1n, 0n, true);
  }

  static fromMask(field: PrimeField, mask: bigint): RangeConstraint {
    return RangeConstraint.create(field, mask, 0n, field.modulus - 1n);
  }

  static fromValue(field: PrimeField, value: FieldElement): RangeConstraint {
    const v = field.from(value);
    return RangeConstraint.create(field, v, v, v);
  }

  /**
   * Values in `[min, max]`, wrapping around the modulus when `min > max`.
   */
  static fromRange(field: PrimeField, min: FieldElement, max: FieldElement): RangeConstraint {
    return RangeConstraint.create(field, fullMask(field), field.from(min), field.from(max));
  }

  /**
   * Values whose highest set bit is at most `bit`.
   */
  static fromMaxBit(field: PrimeField, bit: number): RangeConstraint {
    return RangeConstraint.fromMask(field, maskFromBits(bit + 1));
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  isEmpty(): boolean {
    return this.impossible;
  }

  isUnconstrained(): boolean {
    return (
      !this.impossible &&
      this.min === 0n &&
      this.max === this.field.modulus - 1n &&
      this.mask === fullMask(this.field)
    );
  }

  /**
   * Number of values in the interval, ignoring the mask.
   */
  rangeWidth(): bigint {
    if (this.impossible) return 0n;
    if (this.min <= this.max) return this.max - this.min + 1n;
    return this.field.modulus - this.min + this.max + 1n;
  }

  allowsValue(value: FieldElement): boolean {
    if (this.impossible) return false;
    const inRange =
      this.min <= this.max
        ? this.min <= value && value <= this.max
        : value >= this.min || value <= this.max;
    return inRange && (value & this.mask) === value;
  }

  tryToSingleValue(): FieldElement | undefined {
    if (this.impossible || this.min !== this.max) return undefined;
    return this.min;
  }

  equals(other: RangeConstraint): boolean {
    if (this.impossible || other.impossible) {
      return this.impossible === other.impossible;
    }
    return this.mask === other.mask && this.min === other.min && this.max === other.max;
  }

  // ===========================================================================
  // Combinators
  // ===========================================================================

  /**
   * Values allowed by both constraints.
   */
  conjunction(other: RangeConstraint): RangeConstraint {
    if (this.impossible || other.impossible) {
      return RangeConstraint.empty(this.field);
    }

    const mask = this.mask & other.mask;
    const segments: Segment[] = [];
    for (const a of this.segments()) {
      for (const b of other.segments()) {
        const start = a.start > b.start ? a.start : b.start;
        const end = a.end < b.end ? a.end : b.end;
        if (start <= end) {
          segments.push({ start, end });
        }
      }
    }
    if (segments.length === 0) {
      return RangeConstraint.empty(this.field);
    }

    const { min, max } = coveringInterval(segments, this.field.modulus);
    return RangeConstraint.create(this.field, mask, min, max);
  }

  /**
   * Constraint of `factor * x` for `x` in this constraint.
   */
  multiple(factor: FieldElement): RangeConstraint {
    const f = this.field.from(factor);
    if (this.impossible) return this;
    if (f === 0n) return RangeConstraint.fromValue(this.field, 0n);
    if (f === 1n) return this;

    const p = this.field.modulus;
    const shift = log2Exact(f);
    const mask =
      shift !== undefined && this.mask << BigInt(shift) < p
        ? this.mask << BigInt(shift)
        : fullMask(this.field);

    const steps = this.rangeWidth() - 1n;
    const negated = p - f;
    // Scale by f or by -f, whichever keeps the interval narrower.
    let min = 0n;
    let max = p - 1n;
    if (steps * f < p && f <= negated) {
      min = this.field.mul(this.min, f);
      max = this.field.add(min, steps * f);
    } else if (steps * negated < p) {
      min = this.field.mul(this.max, f);
      max = this.field.add(min, steps * negated);
    } else if (steps * f < p) {
      min = this.field.mul(this.min, f);
      max = this.field.add(min, steps * f);
    }

    return RangeConstraint.create(this.field, mask, min, max);
  }

  /**
   * Constraint of `x + y` for `x` in this and `y` in `other`.
   */
  combineSum(other: RangeConstraint): RangeConstraint {
    if (this.impossible || other.impossible) {
      return RangeConstraint.empty(this.field);
    }

    const p = this.field.modulus;
    let mask = fullMask(this.field);
    if ((this.mask & other.mask) === 0n && (this.mask | other.mask) < p) {
      mask = this.mask | other.mask;
    } else if (this.mask + other.mask < p) {
      mask = maskFromBits(bitLength(this.mask + other.mask));
    }

    let min = 0n;
    let max = p - 1n;
    if (this.rangeWidth() + other.rangeWidth() - 1n <= p) {
      min = this.field.add(this.min, other.min);
      max = this.field.add(this.max, other.max);
    }

    return RangeConstraint.create(this.field, mask, min, max);
  }

  negate(): RangeConstraint {
    return this.multiple(this.field.minusOne);
  }

  toString(): string {
    if (this.impossible) return "<empty>";
    return `[${this.min}, ${this.max}] & 0x${this.mask.toString(16)}`;
  }

  private segments(): Segment[] {
    if (this.min <= this.max) {
      return [{ start: this.min, end: this.max }];
    }
    return [
      { start: 0n, end: this.max },
      { start: this.min, end: this.field.modulus - 1n },
    ];
  }
}

function fullMask(field: PrimeField): bigint {
  return maskFromBits(field.bitLength);
}

/**
 * Smallest wrapping interval containing all segments: drop the largest gap.
 */
function coveringInterval(
  segments: Segment[],
  modulus: bigint
): { min: bigint; max: bigint } {
  const sorted = [...segments].sort((a, b) => (a.start < b.start ? -1 : a.start > b.start ? 1 : 0));
  const first = sorted[0];
  const last = sorted[sorted.length - 1];

  let bestGap = modulus - 1n - last.end + first.start;
  let min = first.start;
  let max = last.end;
  for (let i = 0; i + 1 < sorted.length; i++) {
    const gap = sorted[i + 1].start - sorted[i].end - 1n;
    if (gap > bestGap) {
      bestGap = gap;
      min = sorted[i + 1].start;
      max = sorted[i].end;
    }
  }
  return { min, max };
}
