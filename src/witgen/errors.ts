/**
 * Raised when the solver reaches a state its own bookkeeping rules out, such
 * as assigning a cell that is already known. Never caused by user input.
 */
export class InternalSolverError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InternalSolverError";
  }
}
