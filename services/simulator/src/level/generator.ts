import { createHash } from 'node:crypto';

import {
  LEVEL_ROWS,
  LEVEL_WIDTH_JITTER,
  TILE_SIZE,
  assertStage,
  baseLevelWidth,
  classifyLevel,
  enemyCountForStage,
  type Theme,
} from '@tilerun/game-spec';
import stringify from 'fast-json-stable-stringify';

import { PLAYER_SPAWN_X, PLAYER_SPAWN_Y, PICKUP_SPEED, WALKER_SPEED } from '../sim/constants';
import type { Rng } from '../sim/rng';

import { TileGrid, assertViewportHeight } from './grid';

export type SpawnKind = 'goomba' | 'koopa' | 'bowser' | 'fireflower' | 'star';

export interface EntitySpawn {
  kind: SpawnKind;
  x: number;
  y: number;
  vx: number;
}

export interface GapSpan {
  start: number;
  width: number;
}

export interface BridgeSpan {
  start: number;
  end: number;
  row: number;
}

export interface GeneratedLevel {
  world: number;
  level: number;
  theme: Theme;
  grid: TileGrid;
  width: number;
  /** Column of the flag pole, or -1 when the level ends at an axe. */
  flagPoleX: number;
  axe: { x: number; y: number } | null;
  bridge: BridgeSpan | null;
  gaps: GapSpan[];
  /** Sorted by x so the simulation can activate them as the camera advances. */
  spawns: EntitySpawn[];
  playerSpawn: { x: number; y: number };
}

interface TerrainResult {
  flagPoleX: number;
  axe: GeneratedLevel['axe'];
  bridge: BridgeSpan | null;
  gaps: GapSpan[];
  extraSpawns: EntitySpawn[];
}

const DECORATIONS = ['bush', 'hill'] as const;
const FLOOR_ROW = LEVEL_ROWS - 2;
const SURFACE_ROW = LEVEL_ROWS - 3;
/** Features are kept clear of the goal area at the tail of every level. */
const TAIL_CLEARANCE = 16;
/** Tallest pipe a standing jump still clears. */
const OVERWORLD_PIPE_HEIGHT = 2;

export function addPipe(grid: TileGrid, x: number, topRow: number, height: number): boolean {
  if (x < 0 || x + 1 >= grid.width || topRow < 0 || topRow + height >= grid.height || height < 1) {
    return false;
  }

  grid.setTile(x, topRow, 'pipeTopLeft');
  grid.setTile(x + 1, topRow, 'pipeTopRight');
  for (let h = 1; h < height; h += 1) {
    grid.setTile(x, topRow + h, 'pipeBottomLeft');
    grid.setTile(x + 1, topRow + h, 'pipeBottomRight');
  }
  return true;
}

function placeFlagPole(grid: TileGrid, x: number): void {
  grid.setTile(x, 2, 'flagTop');
  for (let ty = 3; ty <= SURFACE_ROW; ty += 1) {
    if (!grid.solid(x, ty)) {
      grid.setTile(x, ty, 'flagPole');
    }
  }
}

function decorateOverworld(grid: TileGrid, rng: Rng): void {
  for (let x = 4; x < grid.width - 2; x += 12) {
    if (rng.chance(0.5)) {
      const row = rng.int(1, 3);
      grid.paint(x, row, 'cloud');
      grid.paint(x + 1, row, 'cloud');
    }
  }

  for (let x = 8; x < grid.width - TAIL_CLEARANCE; x += 16) {
    if (grid.tileAt(x, SURFACE_ROW) !== 'air' || !grid.solid(x, FLOOR_ROW)) {
      continue;
    }
    grid.paint(x, SURFACE_ROW, rng.pick(DECORATIONS));
  }
}

function bonusPickup(grid: TileGrid, level: number): EntitySpawn | null {
  for (let x = 40; x < grid.width - TAIL_CLEARANCE; x += 1) {
    for (let ty = 4; ty <= 7; ty += 1) {
      const kind = grid.tileAt(x, ty);
      if ((kind === 'brick' || kind === 'question') && grid.tileAt(x, ty - 1) === 'air') {
        const pickup: SpawnKind = level % 2 === 1 ? 'fireflower' : 'star';
        return {
          kind: pickup,
          x: x * TILE_SIZE,
          y: (ty - 1) * TILE_SIZE,
          vx: pickup === 'star' ? PICKUP_SPEED : 0,
        };
      }
    }
  }
  return null;
}

function generateOverworld(grid: TileGrid, world: number, level: number, rng: Rng): TerrainResult {
  const width = grid.width;
  grid.fill(0, FLOOR_ROW, width - 1, LEVEL_ROWS - 1, 'ground');

  const gaps: GapSpan[] = [];
  const gapCount = 3 + world + rng.int(0, 3);
  const spacing = Math.floor(width / (gapCount + 1));
  for (let i = 0; i < gapCount; i += 1) {
    const gapX = 30 + i * spacing + rng.int(-10, 10);
    const gapWidth = 2 + rng.int(0, 2 + Math.floor(world / 2));
    const end = Math.min(gapX + gapWidth, width - TAIL_CLEARANCE + 2);
    if (end <= gapX) {
      continue;
    }
    grid.fill(gapX, FLOOR_ROW, end - 1, LEVEL_ROWS - 1, 'air');
    gaps.push({ start: gapX, width: end - gapX });
  }

  const featureCount = Math.floor(width / 15);
  for (let i = 0; i < featureCount; i += 1) {
    const x = 10 + i * 15 + rng.int(0, 8);
    const row = LEVEL_ROWS - 5 - rng.int(0, 3);
    const featureType = rng.int(0, 3);
    if (x > width - TAIL_CLEARANCE) {
      continue;
    }

    if (featureType === 0) {
      const length = 1 + rng.int(0, 4);
      for (let j = 0; j < length; j += 1) {
        grid.setTile(x + j, row, rng.chance(1 / 3) ? 'question' : 'brick');
      }
    } else if (featureType === 1) {
      const length = 3 + rng.int(0, 5);
      grid.fill(x, row, x + length - 1, row, 'brick');
    } else if (featureType === 2) {
      const height = 2 + rng.int(0, 4);
      for (let step = 0; step < height; step += 1) {
        grid.fill(x + step, SURFACE_ROW - step, x + step, SURFACE_ROW, 'hard');
      }
    }
  }

  const pipeCount = Math.floor(width / 30);
  for (let i = 0; i < pipeCount; i += 1) {
    const x = 20 + i * 30 + rng.int(0, 15);
    if (x > width - TAIL_CLEARANCE) {
      continue;
    }
    addPipe(grid, x, FLOOR_ROW - OVERWORLD_PIPE_HEIGHT, OVERWORLD_PIPE_HEIGHT);
  }

  const flagPoleX = width - 10;
  placeFlagPole(grid, flagPoleX);

  grid.fill(width - 6, LEVEL_ROWS - 6, width - 2, SURFACE_ROW, 'castle');
  grid.setTile(width - 4, SURFACE_ROW, 'air');
  grid.setTile(width - 4, SURFACE_ROW - 1, 'air');

  decorateOverworld(grid, rng);

  const bonus = bonusPickup(grid, level);
  return {
    flagPoleX,
    axe: null,
    bridge: null,
    gaps,
    extraSpawns: bonus ? [bonus] : [],
  };
}

function generateUnderground(grid: TileGrid, rng: Rng): TerrainResult {
  const width = grid.width;
  grid.fill(0, 0, width - 1, 1, 'brick');
  grid.fill(0, FLOOR_ROW, width - 1, LEVEL_ROWS - 1, 'hard');

  const clusterCount = Math.floor(width / 20);
  for (let i = 0; i < clusterCount; i += 1) {
    const x = 15 + i * 20 + rng.int(0, 10);
    const row = 4 + rng.int(0, 6);
    const length = 3 + rng.int(0, 6);
    if (x > width - TAIL_CLEARANCE - 4) {
      continue;
    }
    for (let j = 0; j < length; j += 1) {
      grid.setTile(x + j, row, rng.chance(0.25) ? 'question' : 'brick');
    }
  }

  addPipe(grid, width - 15, LEVEL_ROWS - 6, 4);

  const flagPoleX = width - 8;
  placeFlagPole(grid, flagPoleX);
  return { flagPoleX, axe: null, bridge: null, gaps: [], extraSpawns: [] };
}

function generateCastle(grid: TileGrid, rng: Rng): TerrainResult {
  const width = grid.width;
  for (let x = 0; x < width; x += 1) {
    if (x % 20 < 15 || x > width - 30) {
      grid.fill(x, FLOOR_ROW, x, LEVEL_ROWS - 1, 'hard');
    } else {
      grid.setTile(x, LEVEL_ROWS - 1, 'lava');
    }
  }
  grid.fill(0, 0, width - 1, 1, 'hard');

  const bridgeStart = width - 25;
  const bridgeEnd = width - 6;

  const platformCount = Math.floor(width / 25);
  for (let i = 0; i < platformCount; i += 1) {
    const x = 10 + i * 25;
    const row = 5 + rng.int(0, 4);
    const length = 4 + rng.int(0, 4);
    if (x + length >= bridgeStart) {
      continue;
    }
    grid.fill(x, row, x + length - 1, row, 'brick');
  }

  const bridgeRow = LEVEL_ROWS - 4;
  grid.fill(bridgeStart, bridgeRow, bridgeEnd, bridgeRow, 'bridge');
  grid.fill(bridgeStart, bridgeRow + 1, bridgeEnd, LEVEL_ROWS - 1, 'lava');

  const axe = { x: width - 6, y: LEVEL_ROWS - 5 };
  grid.setTile(axe.x, axe.y, 'axe');

  grid.fill(width - 5, FLOOR_ROW, width - 1, LEVEL_ROWS - 1, 'hard');

  return {
    flagPoleX: -1,
    axe,
    bridge: { start: bridgeStart, end: bridgeEnd, row: bridgeRow },
    gaps: [],
    extraSpawns: [],
  };
}

function generateUnderwater(grid: TileGrid, rng: Rng): TerrainResult {
  const width = grid.width;
  for (let x = 0; x < width; x += 1) {
    const raise = rng.chance(0.3) ? rng.int(0, 1) : 0;
    const top = x < 6 ? FLOOR_ROW : FLOOR_ROW - raise;
    grid.fill(x, top, x, LEVEL_ROWS - 1, 'ground');
  }
  grid.fill(0, 0, width - 1, 0, 'water');

  const coralCount = Math.floor(width / 10);
  for (let i = 0; i < coralCount; i += 1) {
    const x = 5 + i * 10 + rng.int(0, 5);
    const height = 1 + rng.int(0, 3);
    for (let ty = SURFACE_ROW; ty > Math.max(SURFACE_ROW - height, 0); ty -= 1) {
      grid.paint(x, ty, 'coral');
    }
  }

  const platformCount = Math.floor(width / 20);
  for (let i = 0; i < platformCount; i += 1) {
    const x = 15 + i * 20 + rng.int(0, 10);
    const row = 4 + rng.int(0, 6);
    const length = 3 + rng.int(0, 4);
    if (x > width - TAIL_CLEARANCE) {
      continue;
    }
    grid.fill(x, row, x + length - 1, row, 'hard');
  }

  addPipe(grid, width - 12, LEVEL_ROWS - 6, 4);

  const flagPoleX = width - 6;
  placeFlagPole(grid, flagPoleX);
  return { flagPoleX, axe: null, bridge: null, gaps: [], extraSpawns: [] };
}

/** First row at or above the surface row whose cell is open at column `tx`. */
function standingRow(grid: TileGrid, tx: number): number {
  let row = SURFACE_ROW;
  while (row > 0 && grid.solid(tx, row)) {
    row -= 1;
  }
  return row;
}

export function populateEntities(
  grid: TileGrid,
  world: number,
  level: number,
  theme: Theme,
  rng: Rng,
): EntitySpawn[] {
  const spawns: EntitySpawn[] = [];
  const count = enemyCountForStage(world, level);
  const spacing = Math.floor((grid.width * TILE_SIZE) / count);
  const lastX = (grid.width - 15) * TILE_SIZE;

  for (let i = 0; i < count; i += 1) {
    const x = 100 + i * spacing;
    if (x < 200 || x > lastX) {
      continue;
    }
    const kind: SpawnKind = rng.chance(0.67) ? 'goomba' : 'koopa';
    const vx = rng.chance(0.5) ? -WALKER_SPEED : WALKER_SPEED;
    const row = standingRow(grid, Math.floor((x + TILE_SIZE / 2) / TILE_SIZE));
    spawns.push({ kind, x, y: row * TILE_SIZE, vx });
  }

  if (theme === 'castle') {
    spawns.push({
      kind: 'bowser',
      x: (grid.width - 20) * TILE_SIZE,
      y: (LEVEL_ROWS - 6) * TILE_SIZE,
      vx: -WALKER_SPEED,
    });
  }

  return spawns;
}

export function generateLevel(world: number, level: number, rng: Rng): GeneratedLevel {
  assertStage(world, level);
  const theme = classifyLevel(world, level);
  const width = baseLevelWidth(world) + rng.int(0, LEVEL_WIDTH_JITTER);
  const grid = new TileGrid(width);

  let terrain: TerrainResult;
  switch (theme) {
    case 'castle':
      terrain = generateCastle(grid, rng);
      break;
    case 'underground':
      terrain = generateUnderground(grid, rng);
      break;
    case 'underwater':
      terrain = generateUnderwater(grid, rng);
      break;
    case 'overworld':
      terrain = generateOverworld(grid, world, level, rng);
      break;
  }

  assertViewportHeight(grid);

  const spawns = [...populateEntities(grid, world, level, theme, rng), ...terrain.extraSpawns].sort(
    (a, b) => a.x - b.x,
  );

  return {
    world,
    level,
    theme,
    grid,
    width,
    flagPoleX: terrain.flagPoleX,
    axe: terrain.axe,
    bridge: terrain.bridge,
    gaps: terrain.gaps,
    spawns,
    playerSpawn: { x: PLAYER_SPAWN_X, y: PLAYER_SPAWN_Y },
  };
}

/** Stable digest of a generated level, used to compare seeded generations. */
export function levelFingerprint(level: GeneratedLevel): string {
  const payload = stringify({
    theme: level.theme,
    rows: level.grid.rows(),
    spawns: level.spawns,
    flagPoleX: level.flagPoleX,
    axe: level.axe,
  });
  return createHash('sha1').update(payload).digest('hex');
}
