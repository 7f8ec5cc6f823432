import { Board } from './board';
import { DEFAULT_RULESET, PLAYER_NAMES } from './data';
import { Fleet } from './fleet';
import type { PlayerId, Ruleset, ShotResult } from './types';

export interface Side {
  id: PlayerId;
  name: string;
  shipBoard: Board;
  attackBoard: Board;
  fleet: Fleet;
}

export interface MatchState {
  ruleset: Ruleset;
  sides: [Side, Side];
  active: PlayerId;
  turn: number;
  shotLog: ShotResult[];
  winner?: PlayerId;
}

export function createSide(id: PlayerId, name: string, boardSize: number): Side {
  const shipBoard = new Board(boardSize);
  return {
    id,
    name,
    shipBoard,
    attackBoard: new Board(boardSize),
    fleet: new Fleet(shipBoard),
  };
}

export function createMatchState(ruleset: Ruleset = DEFAULT_RULESET, names: readonly [string, string] = PLAYER_NAMES): MatchState {
  return {
    ruleset,
    sides: [createSide(0, names[0], ruleset.boardSize), createSide(1, names[1], ruleset.boardSize)],
    active: 0,
    turn: 1,
    shotLog: [],
  };
}

export function other(id: PlayerId): PlayerId {
  return id === 0 ? 1 : 0;
}
