import { key, runCells, type Board } from './board';
import { isLegalPlacement } from './placement';
import type { RandomSource } from './rng';
import type { Coord, HuntState, Orientation, ShotOutcome } from './types';

const ORIENTATIONS: readonly Orientation[] = ['H', 'V'];

/**
 * Heat map over the attack board: every open cell starts at 1, then gains 1 for
 * each way a remaining ship could lie across it without touching a hit or miss.
 * Attacked cells stay at 0.
 */
export function probabilityMap(board: Board, lengths: readonly number[]): number[][] {
  const weights = Array.from({ length: board.size }, (_, row) =>
    Array.from({ length: board.size }, (_, col) => (board.isAttacked({ row, col }) ? 0 : 1))
  );
  for (const length of lengths) {
    for (let row = 0; row < board.size; row += 1) {
      for (let col = 0; col < board.size; col += 1) {
        for (const orientation of ORIENTATIONS) {
          const origin = { row, col };
          if (!isLegalPlacement(board, length, origin, orientation)) {
            continue;
          }
          for (const c of runCells(origin, orientation, length)) {
            weights[c.row][c.col] += 1;
          }
        }
      }
    }
  }
  return weights;
}

/** First cell holding the largest weight, scanning row by row. */
export function hottestCell(weights: number[][]): Coord {
  let best: Coord | null = null;
  let bestWeight = 0;
  for (let row = 0; row < weights.length; row += 1) {
    for (let col = 0; col < weights[row].length; col += 1) {
      if (weights[row][col] > bestWeight) {
        bestWeight = weights[row][col];
        best = { row, col };
      }
    }
  }
  if (best === null) {
    throw new Error('No open cells left to target');
  }
  return best;
}

function neighbours(c: Coord, direction?: Orientation): Coord[] {
  const vertical = [
    { row: c.row - 1, col: c.col },
    { row: c.row + 1, col: c.col },
  ];
  const horizontal = [
    { row: c.row, col: c.col - 1 },
    { row: c.row, col: c.col + 1 },
  ];
  if (direction === 'H') {
    return horizontal;
  }
  if (direction === 'V') {
    return vertical;
  }
  return [...vertical, ...horizontal];
}

function lineEnds(a: Coord, b: Coord, direction: Orientation): Coord[] {
  if (direction === 'H') {
    return [
      { row: a.row, col: Math.min(a.col, b.col) - 1 },
      { row: a.row, col: Math.max(a.col, b.col) + 1 },
    ];
  }
  return [
    { row: Math.min(a.row, b.row) - 1, col: a.col },
    { row: Math.max(a.row, b.row) + 1, col: a.col },
  ];
}

/**
 * Computer targeting: work through queued line extensions, then probe around the
 * last hit, and fall back to the probability map when there is nothing to chase.
 */
export class TargetingEngine {
  private state: HuntState = { kind: 'idle' };

  constructor(private readonly rng: RandomSource) {}

  get hunt(): HuntState {
    return this.state;
  }

  reset(): void {
    this.state = { kind: 'idle' };
  }

  /** Open cells next to the last hit, along the known direction when there is one. */
  huntCandidates(board: Board): Coord[] {
    if (this.state.kind === 'idle') {
      return [];
    }
    const direction = this.state.kind === 'directed' ? this.state.direction : undefined;
    return neighbours(this.state.lastHit, direction).filter((c) => board.isOpen(c));
  }

  nextTarget(board: Board, remainingLengths: readonly number[]): Coord {
    if (this.state.kind === 'directed') {
      let queued = this.state.queue.shift();
      while (queued && !board.isOpen(queued)) {
        queued = this.state.queue.shift();
      }
      if (queued) {
        return queued;
      }
    }

    if (this.state.kind !== 'idle') {
      const candidates = this.huntCandidates(board);
      if (candidates.length) {
        return this.rng.pick(candidates);
      }
      this.reset();
    }

    return hottestCell(probabilityMap(board, remainingLengths));
  }

  /** Feed back the outcome of the last shot. `board` already shows it. */
  recordResult(board: Board, target: Coord, outcome: ShotOutcome, sunk: boolean): void {
    if (outcome === 'miss') {
      return;
    }
    if (sunk) {
      this.reset();
      return;
    }
    if (this.state.kind === 'idle') {
      this.state = { kind: 'probing', lastHit: target };
      return;
    }

    const previous = this.state.lastHit;
    const fallback = this.state.kind === 'directed' ? this.state.direction : 'V';
    const direction: Orientation =
      target.row === previous.row ? 'H' : target.col === previous.col ? 'V' : fallback;
    const queue = this.state.kind === 'directed' ? this.state.queue : [];
    const queued = new Set(queue.map(key));
    for (const c of lineEnds(target, previous, direction)) {
      if (board.isOpen(c) && !queued.has(key(c))) {
        queue.push(c);
        queued.add(key(c));
      }
    }
    this.state = { kind: 'directed', lastHit: target, direction, queue };
  }
}
