import type { Ruleset, ShipTemplate } from './types';

export const BOARD_SIZE = 8;

export const SHIPS: ShipTemplate[] = [
  { name: 'Carrier', length: 5 },
  { name: 'Battleship', length: 4 },
  { name: 'Cruiser', length: 3 },
  { name: 'Submarine', length: 3 },
  { name: 'Destroyer', length: 2 },
];

export const DEFAULT_RULESET: Ruleset = {
  boardSize: BOARD_SIZE,
  ships: SHIPS,
};

export const PLAYER_NAMES = ['Player', 'Computer'] as const;
