/**
 * Prime Field Arithmetic
 *
 * Field elements are plain bigints kept in canonical form `0 <= v < modulus`.
 * All arithmetic goes through a PrimeField instance so the same solver code
 * works over any prime.
 */

export type FieldElement = bigint;

export class PrimeField {
  readonly name: string;
  readonly modulus: bigint;
  /** Number of bits needed to represent `modulus - 1` */
  readonly bitLength: number;

  constructor(modulus: bigint, name: string = `F_${modulus}`) {
    if (!isProbablePrime(modulus)) {
      throw new RangeError(`Field modulus ${modulus} is not prime`);
    }
    this.modulus = modulus;
    this.name = name;
    this.bitLength = bitLength(modulus - 1n);
  }

  /**
   * Reduce an arbitrary integer into canonical form.
   */
  from(value: bigint | number): FieldElement {
    const v = BigInt(value) % this.modulus;
    return v < 0n ? v + this.modulus : v;
  }

  add(a: FieldElement, b: FieldElement): FieldElement {
    const s = a + b;
    return s >= this.modulus ? s - this.modulus : s;
  }

  sub(a: FieldElement, b: FieldElement): FieldElement {
    const d = a - b;
    return d < 0n ? d + this.modulus : d;
  }

  mul(a: FieldElement, b: FieldElement): FieldElement {
    return (a * b) % this.modulus;
  }

  neg(a: FieldElement): FieldElement {
    return a === 0n ? 0n : this.modulus - a;
  }

  /**
   * Multiplicative inverse via the extended Euclidean algorithm.
   */
  inv(a: FieldElement): FieldElement {
    if (a === 0n) {
      throw new RangeError("Division by zero in field");
    }
    let [oldR, r] = [a, this.modulus];
    let [oldS, s] = [1n, 0n];
    while (r !== 0n) {
      const q = oldR / r;
      [oldR, r] = [r, oldR - q * r];
      [oldS, s] = [s, oldS - q * s];
    }
    if (oldR !== 1n) {
      throw new RangeError(`${a} has no inverse modulo ${this.modulus}`);
    }
    return this.from(oldS);
  }

  div(a: FieldElement, b: FieldElement): FieldElement {
    return this.mul(a, this.inv(b));
  }

  /**
   * Exponentiation by squaring. Negative exponents invert the base first.
   */
  pow(base: FieldElement, exponent: bigint): FieldElement {
    if (exponent < 0n) {
      return this.pow(this.inv(base), -exponent);
    }
    let result = 1n % this.modulus;
    let b = base;
    let e = exponent;
    while (e > 0n) {
      if (e & 1n) {
        result = this.mul(result, b);
      }
      b = this.mul(b, b);
      e >>= 1n;
    }
    return result;
  }

  /** The canonical representative of -1 */
  get minusOne(): FieldElement {
    return this.modulus - 1n;
  }

  isMinusOne(a: FieldElement): boolean {
    return a === this.modulus - 1n;
  }

  /**
   * Values above half the modulus are shown as negative numbers,
   * so -1 reads as "-1" rather than "p - 1".
   */
  format(a: FieldElement): string {
    if (a > this.modulus / 2n) {
      return `-${this.modulus - a}`;
    }
    return a.toString();
  }

  toString(): string {
    return this.name;
  }
}

/**
 * Number of bits in the binary representation of a non-negative integer.
 */
export function bitLength(value: bigint): number {
  return value <= 0n ? 0 : value.toString(2).length;
}

/**
 * All-ones mask covering `bits` low bits.
 */
export function maskFromBits(bits: number): bigint {
  return (1n << BigInt(bits)) - 1n;
}

/**
 * If `value` is a power of two, return its exponent.
 */
export function log2Exact(value: bigint): number | undefined {
  if (value <= 0n || (value & (value - 1n)) !== 0n) {
    return undefined;
  }
  return bitLength(value) - 1;
}

const WITNESSES = [2n, 3n, 5n, 7n, 11n, 13n, 17n, 19n, 23n, 29n, 31n, 37n, 41n];

/**
 * Miller-Rabin with the first thirteen primes as witnesses. Exact below
 * 3.3 * 10^24, a strong probable-prime test above.
 */
export function isProbablePrime(n: bigint): boolean {
  if (n < 2n) return false;
  for (const w of WITNESSES) {
    if (n === w) return true;
    if (n % w === 0n) return false;
  }

  let d = n - 1n;
  let twos = 0;
  while ((d & 1n) === 0n) {
    d >>= 1n;
    twos++;
  }

  return WITNESSES.every((w) => passesWitness(n, w, d, twos));
}

/**
 * Checks `w^d = 1` or `w^(d * 2^i) = -1` for some `i < twos`, where
 * `n - 1 = d * 2^twos`.
 */
function passesWitness(n: bigint, w: bigint, d: bigint, twos: number): boolean {
  let x = modPow(w, d, n);
  if (x === 1n || x === n - 1n) return true;
  for (let i = 1; i < twos; i++) {
    x = (x * x) % n;
    if (x === n - 1n) return true;
  }
  return false;
}

function modPow(base: bigint, exponent: bigint, modulus: bigint): bigint {
  let result = 1n;
  let b = base % modulus;
  let e = exponent;
  while (e > 0n) {
    if (e & 1n) result = (result * b) % modulus;
    b = (b * b) % modulus;
    e >>= 1n;
  }
  return result;
}

// =============================================================================
// Named Fields
// =============================================================================

export const GOLDILOCKS = new PrimeField(0xffffffff00000001n, "goldilocks");
export const BABY_BEAR = new PrimeField(0x78000001n, "babybear");
export const BN254 = new PrimeField(
  21888242871839275222246405745257275088548364400416034343698204186575808495617n,
  "bn254"
);

const NAMED_FIELDS: Map<string, PrimeField> = new Map([
  [GOLDILOCKS.name, GOLDILOCKS],
  [BABY_BEAR.name, BABY_BEAR],
  [BN254.name, BN254],
]);

/**
 * Look up a field by name, or build one from a decimal/hex modulus. Throws
 * a RangeError if the modulus is not prime.
 */
export function fieldByName(name: string): PrimeField | undefined {
  const named = NAMED_FIELDS.get(name.toLowerCase());
  if (named) return named;
  if (/^(0x[0-9a-fA-F]+|[0-9]+)$/.test(name)) {
    return new PrimeField(BigInt(name));
  }
  return undefined;
}

export function fieldNames(): string[] {
  return [...NAMED_FIELDS.keys()];
}
