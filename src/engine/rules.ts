import { key, type Board } from './board';
import { GameRuleError } from './errors';
import { other, type MatchState } from './state';
import type { Coord, PlayerId, ShotResult } from './types';

export function checkShot(attackBoard: Board, target: Coord): void {
  if (!attackBoard.inBounds(target)) {
    throw new GameRuleError('InvalidCoordinate', `Cell ${key(target)} is off the board`);
  }
  if (attackBoard.isAttacked(target)) {
    throw new GameRuleError('AlreadyAttacked', `Cell ${key(target)} has already been attacked`);
  }
}

export function hasWinner(state: MatchState): PlayerId | undefined {
  if (state.sides[1].fleet.allSunk()) {
    return 0;
  }
  if (state.sides[0].fleet.allSunk()) {
    return 1;
  }
  return undefined;
}

export function resolveShot(state: MatchState, attackerId: PlayerId, target: Coord): ShotResult {
  if (state.winner !== undefined) {
    throw new GameRuleError('OutOfTurn', 'The game is already over');
  }
  if (state.active !== attackerId) {
    throw new GameRuleError('OutOfTurn', `It is not ${state.sides[attackerId].name}'s turn`);
  }
  const attacker = state.sides[attackerId];
  const defender = state.sides[other(attackerId)];
  checkShot(attacker.attackBoard, target);

  const shot = { row: target.row, col: target.col };
  const result: ShotResult = {
    attacker: attackerId,
    defender: defender.id,
    target: shot,
    outcome: defender.shipBoard.get(shot) === 'ship' ? 'hit' : 'miss',
  };

  if (result.outcome === 'hit') {
    attacker.attackBoard.set(shot, 'hit');
    defender.shipBoard.set(shot, 'hit');
    const sunk = defender.fleet.registerHit(shot);
    if (sunk) {
      result.sunk = sunk;
    }
    const winner = hasWinner(state);
    if (winner !== undefined) {
      state.winner = winner;
      result.winner = winner;
    }
  } else {
    attacker.attackBoard.set(shot, 'miss');
    defender.shipBoard.set(shot, 'miss');
  }

  state.shotLog.push(result);
  if (state.winner === undefined) {
    state.active = defender.id;
    state.turn += 1;
  }
  return result;
}
