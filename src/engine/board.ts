import type { CellState, Coord, Orientation } from './types';

export function key(c: Coord): string {
  return `${c.row},${c.col}`;
}

export function sameCoord(a: Coord, b: Coord): boolean {
  return a.row === b.row && a.col === b.col;
}

/** The `length` cells starting at `origin`; H runs along the row, V down the column. */
export function runCells(origin: Coord, orientation: Orientation, length: number): Coord[] {
  const cells: Coord[] = [];
  for (let i = 0; i < length; i += 1) {
    cells.push({
      row: origin.row + (orientation === 'V' ? i : 0),
      col: origin.col + (orientation === 'H' ? i : 0),
    });
  }
  return cells;
}

export function isAttacked(state: CellState): boolean {
  return state === 'hit' || state === 'miss';
}

export class Board {
  readonly size: number;
  private readonly grid: CellState[][];

  constructor(size: number) {
    this.size = size;
    this.grid = Array.from({ length: size }, () => Array.from({ length: size }, (): CellState => 'empty'));
  }

  inBounds(c: Coord): boolean {
    return (
      Number.isInteger(c.row) &&
      Number.isInteger(c.col) &&
      c.row >= 0 &&
      c.col >= 0 &&
      c.row < this.size &&
      c.col < this.size
    );
  }

  /** Cell state, or undefined when `c` is off the board. */
  get(c: Coord): CellState | undefined {
    if (!this.inBounds(c)) {
      return undefined;
    }
    return this.grid[c.row][c.col];
  }

  set(c: Coord, state: CellState): void {
    if (!this.inBounds(c)) {
      throw new RangeError(`Cell ${key(c)} is outside a ${this.size}x${this.size} board`);
    }
    this.grid[c.row][c.col] = state;
  }

  isAttacked(c: Coord): boolean {
    const state = this.get(c);
    return state !== undefined && isAttacked(state);
  }

  isOpen(c: Coord): boolean {
    return this.inBounds(c) && !this.isAttacked(c);
  }

  rows(): CellState[][] {
    return this.grid.map((row) => [...row]);
  }

  count(state: CellState): number {
    let n = 0;
    for (const row of this.grid) {
      for (const cell of row) {
        if (cell === state) {
          n += 1;
        }
      }
    }
    return n;
  }
}
