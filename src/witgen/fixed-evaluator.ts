/**
 * Fixed Column Evaluation
 */

import type { AlgebraicReference, FixedColumn } from "../constraints";
import { isFixedReference } from "../constraints";

export interface FixedEvaluator {
  /**
   * Value of a fixed column reference on a row, or `undefined` if it is not
   * available at solve time.
   */
  evaluate(reference: AlgebraicReference, rowOffset: number): bigint | undefined;
}

/**
 * Reads fixed columns from their explicit values. Rows wrap around the
 * column length in both directions.
 */
export class FixedColumnEvaluator implements FixedEvaluator {
  private readonly columns = new Map<number, bigint[]>();

  constructor(fixedColumns: Iterable<FixedColumn>) {
    for (const column of fixedColumns) {
      this.columns.set(column.polyId.id, column.values);
    }
  }

  evaluate(reference: AlgebraicReference, rowOffset: number): bigint | undefined {
    if (!isFixedReference(reference)) {
      return undefined;
    }
    const values = this.columns.get(reference.polyId.id);
    if (values === undefined || values.length === 0) {
      return undefined;
    }
    const row = rowOffset + (reference.next ? 1 : 0);
    const index = ((row % values.length) + values.length) % values.length;
    return values[index];
  }
}

/**
 * Evaluator for systems without fixed columns.
 */
export const noFixedColumns: FixedEvaluator = {
  evaluate: () => undefined,
};
