/**
 * witgen-jit
 *
 * Symbolic witness-generation solver: turns polynomial and lookup
 * constraints into straight-line code that computes unknown trace cells.
 */

export * from "./field";
export * from "./cell";
export * from "./range";
export * from "./symbolic";
export * from "./constraints";
export * from "./witgen";
export * from "./codegen";
export * from "./diagnostics";
export * from "./lexer";
export * from "./parser";
export * from "./utils";
export { solveSource, parseRowSpec, parseKnownCell, parseField, SOLVER_VERSION, type SolveSourceOptions, type SolveSourceResult } from "./solve";
