/**
 * Code Generation Module
 */

export {
  formatEffect,
  formatCode,
  serializeEffect,
  type SerializedEffect,
  type SerializedArgument,
} from "./format";
