import type { Theme } from '@tilerun/game-spec';

import type { GeneratedLevel } from '../level/generator';
import { TileGrid } from '../level/grid';
import type { Rng } from '../sim/rng';
import { createWorld, type World } from '../sim/world';

/**
 * Rng that replays `rolls` from `next()` (then 0.5 forever). `int`, `uniform`
 * and `pick` always return their lower bound or first item.
 */
export function stubRng(rolls: number[] = []): Rng {
  const queue = [...rolls];
  const next = (): number => queue.shift() ?? 0.5;
  return {
    seed: null,
    next,
    int: (min) => min,
    chance: (probability) => next() < probability,
    uniform: (min) => min,
    pick: (items) => items[0],
  };
}

/** Grid with solid ground on rows 10 and 11 across the whole width. */
export function flatGrid(width = 40): TileGrid {
  const grid = new TileGrid(width);
  grid.fill(0, 10, width - 1, 11, 'ground');
  return grid;
}

export function levelFromGrid(grid: TileGrid, theme: Theme = 'overworld'): GeneratedLevel {
  return {
    world: 1,
    level: 1,
    theme,
    grid,
    width: grid.width,
    flagPoleX: -1,
    axe: null,
    bridge: null,
    gaps: [],
    spawns: [],
    playerSpawn: { x: 96, y: 288 },
  };
}

export function worldFromGrid(grid: TileGrid, rng: Rng = stubRng(), theme: Theme = 'overworld'): World {
  return createWorld(levelFromGrid(grid, theme), rng);
}
