import { runCells, type Board } from './board';
import type { Coord, Orientation } from './types';

export function validatePlacement(size: number, length: number, origin: Coord, orientation: Orientation): boolean {
  if (length < 1 || origin.row < 0 || origin.col < 0) {
    return false;
  }
  if (orientation === 'H') {
    return origin.col + length <= size && origin.row < size;
  }
  return origin.row + length <= size && origin.col < size;
}

/**
 * True when any cell of the run is taken: a ship on a ship board, a hit or miss
 * on an attack board. Cells off the board count as taken.
 */
export function checkOverlap(board: Board, origin: Coord, orientation: Orientation, length: number): boolean {
  return runCells(origin, orientation, length).some((c) => {
    const state = board.get(c);
    return state === undefined || state !== 'empty';
  });
}

export function isLegalPlacement(board: Board, length: number, origin: Coord, orientation: Orientation): boolean {
  return validatePlacement(board.size, length, origin, orientation) && !checkOverlap(board, origin, orientation, length);
}
