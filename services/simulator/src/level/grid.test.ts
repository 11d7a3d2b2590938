import { describe, expect, it } from 'vitest';

import { LEVEL_ROWS } from '@tilerun/game-spec';

import { LevelShapeError } from '../errors';

import { TileGrid, assertViewportHeight } from './grid';

describe('level/grid', () => {
  it('starts as open air one viewport tall', () => {
    const grid = new TileGrid(10);
    expect(grid.height).toBe(LEVEL_ROWS);
    expect(grid.rows().flat().every((kind) => kind === 'air')).toBe(true);
  });

  it('reports nothing solid outside the grid', () => {
    const grid = new TileGrid(10);
    grid.fill(0, 10, 9, 11, 'ground');

    expect(grid.solid(0, 10)).toBe(true);
    expect(grid.solid(-1, 10)).toBe(false);
    expect(grid.solid(10, 10)).toBe(false);
    expect(grid.solid(0, 12)).toBe(false);
    expect(grid.solid(0, -1)).toBe(false);
    expect(grid.tileAt(25, 25)).toBe('air');
  });

  it('ignores writes outside the grid', () => {
    const grid = new TileGrid(4);
    expect(grid.setTile(4, 0, 'brick')).toBe(false);
    expect(grid.setTile(3, 0, 'brick')).toBe(true);
    expect(grid.tileAt(3, 0)).toBe('brick');
  });

  it('clips rectangle fills to the grid', () => {
    const grid = new TileGrid(8);
    grid.fill(-5, 10, 3, 20, 'hard');

    expect(grid.tileAt(0, 10)).toBe('hard');
    expect(grid.tileAt(3, 11)).toBe('hard');
    expect(grid.tileAt(4, 10)).toBe('air');
    expect(grid.tileAt(0, 9)).toBe('air');
  });

  it('paints decorations only into air', () => {
    const grid = new TileGrid(4);
    grid.setTile(1, 9, 'ground');

    expect(grid.paint(1, 9, 'bush')).toBe(false);
    expect(grid.paint(2, 9, 'bush')).toBe(true);
    expect(grid.tileAt(1, 9)).toBe('ground');
    expect(grid.tileAt(2, 9)).toBe('bush');
  });

  it('hands out copies of its rows', () => {
    const grid = new TileGrid(3);
    const rows = grid.rows();
    rows[0][0] = 'brick';
    expect(grid.tileAt(0, 0)).toBe('air');
  });

  it('lists columns matching a predicate', () => {
    const grid = new TileGrid(6);
    grid.setTile(1, 4, 'question');
    grid.setTile(4, 4, 'question');
    expect(grid.columnsWhere(4, (kind) => kind === 'question')).toEqual([1, 4]);
  });

  it('builds from rows of equal width and rejects ragged input', () => {
    const grid = TileGrid.fromRows([
      ['air', 'brick'],
      ['ground', 'ground'],
    ]);
    expect(grid.width).toBe(2);
    expect(grid.height).toBe(2);
    expect(grid.tileAt(1, 0)).toBe('brick');

    expect(() => TileGrid.fromRows([['air', 'air'], ['air']])).toThrow(LevelShapeError);
  });

  it('rejects empty grids', () => {
    expect(() => new TileGrid(0)).toThrow(LevelShapeError);
  });

  it('fails fast when a level is not one viewport tall', () => {
    expect(() => assertViewportHeight(new TileGrid(5))).not.toThrow();

    try {
      assertViewportHeight(new TileGrid(5, 10));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(LevelShapeError);
      if (error instanceof LevelShapeError) {
        expect(error.details).toEqual({ width: 5, height: 10, expectedHeight: LEVEL_ROWS });
      }
    }
  });
});
