/**
 * Field Module
 */

export {
  PrimeField,
  type FieldElement,
  bitLength,
  maskFromBits,
  log2Exact,
  isProbablePrime,
  GOLDILOCKS,
  BABY_BEAR,
  BN254,
  fieldByName,
  fieldNames,
} from "./field";
