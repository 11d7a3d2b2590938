export const TILE_KINDS = [
  'air',
  'ground',
  'brick',
  'question',
  'used',
  'pipeTopLeft',
  'pipeTopRight',
  'pipeBottomLeft',
  'pipeBottomRight',
  'hard',
  'castle',
  'flagPole',
  'flagTop',
  'lava',
  'bridge',
  'axe',
  'cloud',
  'bush',
  'hill',
  'water',
  'coral',
] as const;

export type TileKind = (typeof TILE_KINDS)[number];

/** Edge length of one tile in world pixels. */
export const TILE_SIZE = 32;
export const VIEWPORT_WIDTH = 600;
export const VIEWPORT_HEIGHT = 384;
/** Every level is exactly one viewport tall. */
export const LEVEL_ROWS = VIEWPORT_HEIGHT / TILE_SIZE;

const SOLID_TILES: ReadonlySet<TileKind> = new Set<TileKind>([
  'ground',
  'brick',
  'question',
  'used',
  'hard',
  'pipeTopLeft',
  'pipeTopRight',
  'pipeBottomLeft',
  'pipeBottomRight',
  'bridge',
  'castle',
]);

export function isSolidTile(kind: TileKind): boolean {
  return SOLID_TILES.has(kind);
}
