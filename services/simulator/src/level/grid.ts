import { LEVEL_ROWS, isSolidTile, type TileKind } from '@tilerun/game-spec';

import { LevelShapeError } from '../errors';

/**
 * Tile matrix of one level. Row 0 is the top of the screen. Coordinates outside
 * the matrix read as open air, which lets actors fall off the bottom and walk
 * past either end.
 */
export class TileGrid {
  private readonly cells: TileKind[][];

  constructor(
    readonly width: number,
    readonly height: number = LEVEL_ROWS,
  ) {
    if (!Number.isInteger(width) || width <= 0 || !Number.isInteger(height) || height <= 0) {
      throw new LevelShapeError(`Invalid grid size ${width}x${height}`, { width, height });
    }
    this.cells = Array.from({ length: height }, () => Array<TileKind>(width).fill('air'));
  }

  static fromRows(rows: TileKind[][]): TileGrid {
    const width = rows[0]?.length ?? 0;
    if (rows.some((row) => row.length !== width)) {
      throw new LevelShapeError('Grid rows differ in width', { width, height: rows.length });
    }
    const grid = new TileGrid(width, rows.length);
    rows.forEach((row, ty) => {
      row.forEach((kind, tx) => {
        grid.setTile(tx, ty, kind);
      });
    });
    return grid;
  }

  inBounds(tx: number, ty: number): boolean {
    return (
      Number.isInteger(tx) &&
      Number.isInteger(ty) &&
      tx >= 0 &&
      tx < this.width &&
      ty >= 0 &&
      ty < this.height
    );
  }

  tileAt(tx: number, ty: number): TileKind {
    if (!this.inBounds(tx, ty)) {
      return 'air';
    }
    return this.cells[ty][tx];
  }

  /** Returns false and leaves the grid untouched for off-grid coordinates. */
  setTile(tx: number, ty: number, kind: TileKind): boolean {
    if (!this.inBounds(tx, ty)) {
      return false;
    }
    this.cells[ty][tx] = kind;
    return true;
  }

  solid(tx: number, ty: number): boolean {
    return isSolidTile(this.tileAt(tx, ty));
  }

  /** Fills the inclusive rectangle, clipped to the grid. */
  fill(x0: number, y0: number, x1: number, y1: number, kind: TileKind): void {
    const left = Math.max(0, Math.min(x0, x1));
    const right = Math.min(this.width - 1, Math.max(x0, x1));
    const top = Math.max(0, Math.min(y0, y1));
    const bottom = Math.min(this.height - 1, Math.max(y0, y1));
    for (let ty = top; ty <= bottom; ty += 1) {
      for (let tx = left; tx <= right; tx += 1) {
        this.cells[ty][tx] = kind;
      }
    }
  }

  /** Writes `kind` only where the cell is currently air. */
  paint(tx: number, ty: number, kind: TileKind): boolean {
    if (this.tileAt(tx, ty) !== 'air' || !this.inBounds(tx, ty)) {
      return false;
    }
    this.cells[ty][tx] = kind;
    return true;
  }

  rows(): TileKind[][] {
    return this.cells.map((row) => [...row]);
  }

  columnsWhere(ty: number, predicate: (kind: TileKind) => boolean): number[] {
    const result: number[] = [];
    for (let tx = 0; tx < this.width; tx += 1) {
      if (predicate(this.tileAt(tx, ty))) {
        result.push(tx);
      }
    }
    return result;
  }
}

export function assertViewportHeight(grid: TileGrid): void {
  if (grid.height !== LEVEL_ROWS) {
    throw new LevelShapeError(`Level height mismatch: ${grid.height} != ${LEVEL_ROWS}`, {
      width: grid.width,
      height: grid.height,
      expectedHeight: LEVEL_ROWS,
    });
  }
}
