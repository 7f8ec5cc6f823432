import { describe, expect, it } from 'vitest';
import { SHIPS } from '../src/engine/data';
import { isGameRuleError } from '../src/engine/errors';
import { SeededRng } from '../src/engine/rng';
import { checkShot, hasWinner, resolveShot } from '../src/engine/rules';
import { placeShip, randomFleetPlacement, unplacedShips } from '../src/engine/setup';
import { createMatchState, createSide } from '../src/engine/state';
import type { Ruleset } from '../src/engine/types';

const DUEL: Ruleset = { boardSize: 4, ships: [{ name: 'Destroyer', length: 2 }] };

function ruleCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (e) {
    return isGameRuleError(e) ? e.code : 'not a rule error';
  }
  return undefined;
}

function duel() {
  const state = createMatchState(DUEL);
  placeShip(state.sides[0], DUEL.ships[0], { row: 0, col: 0 }, 'H');
  placeShip(state.sides[1], DUEL.ships[0], { row: 3, col: 0 }, 'H');
  return state;
}

describe('setup', () => {
  it('rejects placements that leave the board, overlap or repeat a ship', () => {
    const side = createSide(0, 'Player', 8);
    const [carrier, battleship] = SHIPS;

    expect(ruleCode(() => placeShip(side, carrier, { row: 0, col: 4 }, 'H'))).toBe('IllegalPlacement');
    expect(side.shipBoard.count('ship')).toBe(0);

    placeShip(side, carrier, { row: 0, col: 3 }, 'H');
    expect(ruleCode(() => placeShip(side, battleship, { row: 0, col: 5 }, 'V'))).toBe('IllegalPlacement');
    expect(ruleCode(() => placeShip(side, carrier, { row: 5, col: 0 }, 'H'))).toBe('IllegalPlacement');
    expect(side.shipBoard.count('ship')).toBe(5);
    expect(unplacedShips(side, SHIPS).map((s) => s.name)).toEqual(['Battleship', 'Cruiser', 'Submarine', 'Destroyer']);
  });

  it('creates random legal fleet placements', () => {
    const side = createSide(1, 'Computer', 8);
    randomFleetPlacement(side, SHIPS, new SeededRng(3));
    expect(side.fleet.size).toBe(5);
    expect(side.shipBoard.count('ship')).toBe(17);
    expect(unplacedShips(side, SHIPS)).toEqual([]);
  });

  it('reproduces the same layout from the same seed', () => {
    const a = createSide(1, 'Computer', 8);
    const b = createSide(1, 'Computer', 8);
    randomFleetPlacement(a, SHIPS, new SeededRng(42));
    randomFleetPlacement(b, SHIPS, new SeededRng(42));
    expect(a.shipBoard.rows()).toEqual(b.shipBoard.rows());
  });

  it('keeps ships that are already placed', () => {
    const side = createSide(0, 'Player', 8);
    placeShip(side, SHIPS[4], { row: 7, col: 6 }, 'H');
    randomFleetPlacement(side, SHIPS, new SeededRng(9));
    expect(side.fleet.get('Destroyer')?.cells).toEqual([
      { row: 7, col: 6 },
      { row: 7, col: 7 },
    ]);
    expect(side.shipBoard.count('ship')).toBe(17);
  });

  it('gives up when the fleet cannot fit', () => {
    const side = createSide(0, 'Player', 4);
    const ships = ['A', 'B', 'C', 'D', 'E'].map((name) => ({ name, length: 4 }));
    expect(ruleCode(() => randomFleetPlacement(side, ships, new SeededRng(1)))).toBe('IllegalPlacement');
  });
});

describe('shots', () => {
  it('rejects off-board and repeated targets', () => {
    const state = duel();
    const board = state.sides[0].attackBoard;
    expect(ruleCode(() => checkShot(board, { row: 4, col: 0 }))).toBe('InvalidCoordinate');
    expect(ruleCode(() => checkShot(board, { row: 0, col: 1.5 }))).toBe('InvalidCoordinate');
    board.set({ row: 1, col: 1 }, 'miss');
    expect(ruleCode(() => checkShot(board, { row: 1, col: 1 }))).toBe('AlreadyAttacked');
    expect(checkShot(board, { row: 1, col: 2 })).toBeUndefined();
  });

  it('records hits and misses on both boards and passes the turn', () => {
    const state = duel();
    const first = resolveShot(state, 0, { row: 3, col: 0 });
    expect(first).toEqual({ attacker: 0, defender: 1, target: { row: 3, col: 0 }, outcome: 'hit' });
    expect(state.sides[0].attackBoard.get({ row: 3, col: 0 })).toBe('hit');
    expect(state.sides[1].shipBoard.get({ row: 3, col: 0 })).toBe('hit');
    expect(state.sides[1].fleet.get('Destroyer')?.cells).toEqual([{ row: 3, col: 1 }]);
    expect(state.active).toBe(1);

    const second = resolveShot(state, 1, { row: 2, col: 2 });
    expect(second.outcome).toBe('miss');
    expect(state.sides[1].attackBoard.get({ row: 2, col: 2 })).toBe('miss');
    expect(state.sides[0].shipBoard.get({ row: 2, col: 2 })).toBe('miss');
    expect(state.active).toBe(0);
    expect(state.turn).toBe(3);
  });

  it('leaves state untouched when a repeat attack is rejected', () => {
    const state = duel();
    resolveShot(state, 0, { row: 3, col: 0 });
    resolveShot(state, 1, { row: 2, col: 2 });

    const attack = state.sides[0].attackBoard.rows();
    const ships = state.sides[1].shipBoard.rows();
    const cells = [...(state.sides[1].fleet.get('Destroyer')?.cells ?? [])];

    expect(ruleCode(() => resolveShot(state, 0, { row: 3, col: 0 }))).toBe('AlreadyAttacked');
    expect(state.sides[0].attackBoard.rows()).toEqual(attack);
    expect(state.sides[1].shipBoard.rows()).toEqual(ships);
    expect(state.sides[1].fleet.get('Destroyer')?.cells).toEqual(cells);
    expect(state.shotLog).toHaveLength(2);
    expect(state.active).toBe(0);
    expect(state.turn).toBe(3);
  });

  it('rejects a shot out of turn', () => {
    const state = duel();
    expect(ruleCode(() => resolveShot(state, 1, { row: 0, col: 0 }))).toBe('OutOfTurn');
    expect(state.shotLog).toEqual([]);
  });

  it('reports the sinking and the winner on the last hit', () => {
    const state = duel();
    resolveShot(state, 0, { row: 3, col: 0 });
    resolveShot(state, 1, { row: 0, col: 3 });
    const last = resolveShot(state, 0, { row: 3, col: 1 });

    expect(last).toEqual({
      attacker: 0,
      defender: 1,
      target: { row: 3, col: 1 },
      outcome: 'hit',
      sunk: 'Destroyer',
      winner: 0,
    });
    expect(state.winner).toBe(0);
    expect(hasWinner(state)).toBe(0);
    expect(state.active).toBe(0);
    expect(ruleCode(() => resolveShot(state, 0, { row: 2, col: 1 }))).toBe('OutOfTurn');
  });
});
