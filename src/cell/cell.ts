/**
 * Trace cells: one witness column at one concrete row.
 */

import type { AlgebraicReference } from "../constraints/ast";

export class Cell {
  /** Used for display only; identity is (id, rowOffset). */
  readonly columnName: string;
  readonly id: number;
  readonly rowOffset: number;

  constructor(columnName: string, id: number, rowOffset: number) {
    this.columnName = columnName;
    this.id = id;
    this.rowOffset = rowOffset;
  }

  /**
   * Cell for a witness reference evaluated relative to `rowOffset`.
   */
  static fromReference(reference: AlgebraicReference, rowOffset: number): Cell {
    return new Cell(
      reference.name,
      reference.polyId.id,
      rowOffset + (reference.next ? 1 : 0)
    );
  }

  /** Stable key for maps and sets. */
  get key(): string {
    return `${this.id}@${this.rowOffset}`;
  }

  equals(other: Cell): boolean {
    return this.id === other.id && this.rowOffset === other.rowOffset;
  }

  toString(): string {
    return `${this.columnName}[${this.rowOffset}]`;
  }
}

/**
 * Order by column id, then by row.
 */
export function compareCells(a: Cell, b: Cell): number {
  if (a.id !== b.id) return a.id - b.id;
  return a.rowOffset - b.rowOffset;
}

/**
 * Set of cells keyed by (id, rowOffset).
 */
export class CellSet implements Iterable<Cell> {
  private cells: Map<string, Cell> = new Map();

  constructor(cells: Iterable<Cell> = []) {
    for (const cell of cells) {
      this.add(cell);
    }
  }

  /** Returns true if the cell was not yet a member. */
  add(cell: Cell): boolean {
    if (this.cells.has(cell.key)) return false;
    this.cells.set(cell.key, cell);
    return true;
  }

  has(cell: Cell): boolean {
    return this.cells.has(cell.key);
  }

  get size(): number {
    return this.cells.size;
  }

  [Symbol.iterator](): Iterator<Cell> {
    return this.cells.values();
  }

  toArray(): Cell[] {
    return [...this.cells.values()].sort(compareCells);
  }
}
