import { describe, expect, it } from 'vitest';
import { Board } from '../src/engine/board';
import { Fleet } from '../src/engine/fleet';

describe('fleet', () => {
  it('is sunk when empty', () => {
    const fleet = new Fleet(new Board(8));
    expect(fleet.allSunk()).toBe(true);
    fleet.deploy('Destroyer', 2, { row: 0, col: 0 }, 'H');
    expect(fleet.allSunk()).toBe(false);
  });

  it('sinks a destroyer after both segments are hit', () => {
    const fleet = new Fleet(new Board(8));
    fleet.deploy('Destroyer', 2, { row: 0, col: 0 }, 'H');

    expect(fleet.registerHit({ row: 0, col: 0 })).toBeUndefined();
    expect(fleet.has('Destroyer')).toBe(true);
    expect(fleet.get('Destroyer')?.cells).toEqual([{ row: 0, col: 1 }]);
    expect(fleet.allSunk()).toBe(false);

    expect(fleet.registerHit({ row: 0, col: 1 })).toBe('Destroyer');
    expect(fleet.has('Destroyer')).toBe(false);
    expect(fleet.allSunk()).toBe(true);
  });

  it('ignores shots on open water', () => {
    const fleet = new Fleet(new Board(8));
    fleet.deploy('Destroyer', 2, { row: 0, col: 0 }, 'H');
    expect(fleet.registerHit({ row: 5, col: 5 })).toBeUndefined();
    expect(fleet.get('Destroyer')?.cells).toHaveLength(2);
  });

  it('becomes all-sunk exactly on the last segment of the last ship', () => {
    const fleet = new Fleet(new Board(8));
    fleet.deploy('Destroyer', 2, { row: 0, col: 0 }, 'H');
    fleet.deploy('Submarine', 3, { row: 2, col: 5 }, 'V');

    fleet.registerHit({ row: 0, col: 0 });
    fleet.registerHit({ row: 0, col: 1 });
    expect(fleet.allSunk()).toBe(false);
    expect(fleet.remaining()).toEqual([{ name: 'Submarine', length: 3 }]);

    fleet.registerHit({ row: 2, col: 5 });
    fleet.registerHit({ row: 4, col: 5 });
    expect(fleet.allSunk()).toBe(false);
    expect(fleet.registerHit({ row: 3, col: 5 })).toBe('Submarine');
    expect(fleet.allSunk()).toBe(true);
    expect(fleet.remaining()).toEqual([]);
  });
});
