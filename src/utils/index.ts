/**
 * Utility exports
 */

export * from "./span";
export * from "./source";
export * from "./logger";
