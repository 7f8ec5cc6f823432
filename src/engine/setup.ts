import { GameRuleError } from './errors';
import { isLegalPlacement } from './placement';
import type { RandomSource } from './rng';
import type { Side } from './state';
import type { Coord, Orientation, Ship, ShipTemplate } from './types';

const MAX_PLACEMENT_ATTEMPTS = 500;

export function placeShip(side: Side, template: ShipTemplate, origin: Coord, orientation: Orientation): Ship {
  if (side.fleet.has(template.name)) {
    throw new GameRuleError('IllegalPlacement', `${template.name} is already deployed`);
  }
  if (!isLegalPlacement(side.shipBoard, template.length, origin, orientation)) {
    throw new GameRuleError(
      'IllegalPlacement',
      `${template.name} (length ${template.length}) does not fit at ${origin.row},${origin.col} ${orientation}`
    );
  }
  return side.fleet.deploy(template.name, template.length, origin, orientation);
}

export function randomFleetPlacement(side: Side, ships: readonly ShipTemplate[], rng: RandomSource): void {
  const size = side.shipBoard.size;
  for (const template of ships) {
    if (side.fleet.has(template.name)) {
      continue;
    }
    let placed = false;
    let guard = 0;
    while (!placed && guard < MAX_PLACEMENT_ATTEMPTS) {
      guard += 1;
      const orientation: Orientation = rng.next() > 0.5 ? 'H' : 'V';
      const origin = { row: rng.int(size), col: rng.int(size) };
      if (isLegalPlacement(side.shipBoard, template.length, origin, orientation)) {
        side.fleet.deploy(template.name, template.length, origin, orientation);
        placed = true;
      }
    }
    if (!placed) {
      throw new GameRuleError('IllegalPlacement', `No room left for ${template.name}`);
    }
  }
}

export function unplacedShips(side: Side, ships: readonly ShipTemplate[]): ShipTemplate[] {
  return ships.filter((s) => !side.fleet.has(s.name));
}
