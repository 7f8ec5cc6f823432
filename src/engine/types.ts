export type PlayerId = 0 | 1;

export type Orientation = 'H' | 'V';

export type CellState = 'empty' | 'ship' | 'hit' | 'miss';

export interface Coord {
  row: number;
  col: number;
}

export interface ShipTemplate {
  name: string;
  length: number;
}

export interface Ship {
  name: string;
  length: number;
  // Unhit segments only; a ship is sunk once this is empty.
  cells: Coord[];
}

export interface Ruleset {
  boardSize: number;
  ships: ShipTemplate[];
}

export type ShotOutcome = 'hit' | 'miss';

export interface ShotResult {
  attacker: PlayerId;
  defender: PlayerId;
  target: Coord;
  outcome: ShotOutcome;
  sunk?: string;
  winner?: PlayerId;
}

export type HuntState =
  | { kind: 'idle' }
  | { kind: 'probing'; lastHit: Coord }
  | { kind: 'directed'; lastHit: Coord; direction: Orientation; queue: Coord[] };

export type Phase = 'placement' | 'battle' | 'game_over';
