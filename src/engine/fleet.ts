import { runCells, sameCoord, type Board } from './board';
import type { Coord, Orientation, Ship, ShipTemplate } from './types';

export class Fleet {
  private readonly ships = new Map<string, Ship>();

  constructor(private readonly board: Board) {}

  /** Marks the run on the ship board. Callers validate the placement first. */
  deploy(name: string, length: number, origin: Coord, orientation: Orientation): Ship {
    const ship = this.ships.get(name) ?? { name, length, cells: [] };
    for (const c of runCells(origin, orientation, length)) {
      this.board.set(c, 'ship');
      ship.cells.push(c);
    }
    this.ships.set(name, ship);
    return ship;
  }

  /** Removes `target` from the ship holding it. Returns the ship's name if that sank it. */
  registerHit(target: Coord): string | undefined {
    for (const ship of this.ships.values()) {
      const idx = ship.cells.findIndex((c) => sameCoord(c, target));
      if (idx < 0) {
        continue;
      }
      ship.cells.splice(idx, 1);
      if (!ship.cells.length) {
        this.ships.delete(ship.name);
        return ship.name;
      }
      return undefined;
    }
    return undefined;
  }

  allSunk(): boolean {
    return this.ships.size === 0;
  }

  has(name: string): boolean {
    return this.ships.has(name);
  }

  get(name: string): Ship | undefined {
    return this.ships.get(name);
  }

  get size(): number {
    return this.ships.size;
  }

  remaining(): ShipTemplate[] {
    return [...this.ships.values()].map((s) => ({ name: s.name, length: s.length }));
  }
}
