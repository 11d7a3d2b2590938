import { describe, expect, it } from 'vitest';

import { defaultInput } from '../input';
import { TileGrid } from '../level/grid';
import { flatGrid, stubRng, worldFromGrid } from '../testing/fixtures';

import {
  createPlayer,
  damagePlayer,
  resolveHorizontal,
  resolveVertical,
  shootFireball,
  stepDeath,
  stepPlayer,
  tickPlayerTimers,
} from './player';

describe('sim/player', () => {
  describe('movement', () => {
    it('lands a small player on the ground surface', () => {
      const world = worldFromGrid(flatGrid());
      const player = createPlayer();

      stepPlayer(player, defaultInput(), world);

      expect(player.y).toBe(288);
      expect(player.vy).toBe(0);
      expect(player.onGround).toBe(true);
    });

    it('lands a big player one tile higher', () => {
      const world = worldFromGrid(flatGrid());
      const player = createPlayer('big');

      stepPlayer(player, defaultInput(), world);

      expect(player.y).toBe(256);
      expect(player.onGround).toBe(true);
    });

    it('jumps only on the press edge and cuts the jump on release', () => {
      const world = worldFromGrid(flatGrid());
      const player = createPlayer();
      stepPlayer(player, defaultInput(), world);

      const held = { ...defaultInput(), jump: true };
      stepPlayer(player, held, world);
      expect(player.vy).toBe(-9.5);
      expect(player.y).toBe(278.5);

      stepPlayer(player, held, world);
      expect(player.vy).toBe(-9);

      stepPlayer(player, defaultInput(), world);
      expect(player.vy).toBe(-2.5);
    });

    it('accelerates toward the walking speed and faces the input', () => {
      const world = worldFromGrid(flatGrid());
      const player = createPlayer();
      stepPlayer(player, defaultInput(), world);

      stepPlayer(player, { ...defaultInput(), left: true }, world);

      expect(player.vx).toBe(-0.2);
      expect(player.facing).toBe('left');
    });

    it('stops flush against a wall on the right', () => {
      const grid = flatGrid();
      grid.setTile(5, 9, 'hard');
      const world = worldFromGrid(grid);
      const player = createPlayer();
      player.x = 132;
      player.vx = 4;

      resolveHorizontal(player, world);

      expect(player.x).toBe(131);
      expect(player.vx).toBe(0);
    });

    it('stops flush against a wall on the left', () => {
      const grid = flatGrid();
      grid.setTile(2, 9, 'hard');
      const world = worldFromGrid(grid);
      const player = createPlayer();
      player.x = 95;
      player.vx = -4;

      resolveHorizontal(player, world);

      expect(player.x).toBe(97);
      expect(player.vx).toBe(0);
    });

    it('keeps the player inside the camera window', () => {
      const world = worldFromGrid(flatGrid());
      world.camera = 100;
      const player = createPlayer();

      stepPlayer(player, defaultInput(), world);

      expect(player.x).toBe(100);
    });
  });

  describe('blocks', () => {
    function headButt(rolls: number[], tier: 'small' | 'big' = 'small') {
      const grid = flatGrid();
      grid.setTile(3, 6, 'question');
      const world = worldFromGrid(grid, stubRng(rolls));
      const player = createPlayer(tier);
      player.y = 221.5;
      player.vy = -7.5;
      resolveVertical(player, world);
      return { world, player };
    }

    it('turns a question block into a used block and pops a coin', () => {
      const { world, player } = headButt([0.9]);

      expect(player.y).toBe(224);
      expect(player.vy).toBe(0);
      expect(world.grid.tileAt(3, 6)).toBe('used');
      expect(world.events).toEqual([
        { type: 'score', points: 100 },
        { type: 'blockHit', tile: 'question', tx: 3, ty: 6 },
      ]);
      expect(world.entities.map((entity) => entity.kind)).toEqual(['coin']);
      expect(world.texts.map((text) => text.text)).toEqual(['+100']);
    });

    it('sometimes releases a mushroom for a small player', () => {
      const { world } = headButt([0.1]);

      expect(world.entities.map((entity) => entity.kind)).toEqual(['mushroom']);
      expect(world.events).toContainEqual({ type: 'powerUpSpawned', kind: 'mushroom' });
    });

    it('never releases a mushroom for a big player', () => {
      const { world } = headButt([0.1], 'big');

      expect(world.entities.map((entity) => entity.kind)).toEqual(['coin']);
    });

    it('ignores a block that has already been used', () => {
      const { world, player } = headButt([0.9]);
      world.events = [];
      player.y = 221.5;
      player.vy = -7.5;

      resolveVertical(player, world);

      expect(world.events).toEqual([]);
      expect(world.entities).toHaveLength(1);
    });

    it('breaks bricks only for a powered-up player', () => {
      const grid = flatGrid();
      grid.setTile(3, 5, 'brick');
      const world = worldFromGrid(grid);
      const small = createPlayer();
      small.y = 189.5;
      small.vy = -7.5;

      resolveVertical(small, world);
      expect(world.grid.tileAt(3, 5)).toBe('brick');
      expect(world.events).toEqual([]);

      const big = createPlayer('big');
      big.y = 189.5;
      big.vy = -7.5;
      resolveVertical(big, world);
      expect(world.grid.tileAt(3, 5)).toBe('air');
      expect(world.particles).toHaveLength(4);
      expect(world.events).toEqual([
        { type: 'score', points: 50 },
        { type: 'blockHit', tile: 'brick', tx: 3, ty: 5 },
      ]);
    });
  });

  describe('death and damage', () => {
    it('dies after falling below the level', () => {
      const world = worldFromGrid(new TileGrid(40));
      const player = createPlayer();
      player.y = 430;
      player.vy = 5;

      stepPlayer(player, defaultInput(), world);

      expect(player.dead).toBe(true);
      expect(player.deathTimer).toBe(180);
      expect(player.vy).toBe(-8);
      expect(world.events).toEqual([{ type: 'playerKilled', cause: 'fall' }]);
    });

    it('dies on contact with lava', () => {
      const grid = flatGrid();
      grid.setTile(3, 9, 'lava');
      const world = worldFromGrid(grid);
      const player = createPlayer();

      stepPlayer(player, defaultInput(), world);

      expect(world.events).toEqual([{ type: 'playerKilled', cause: 'lava' }]);
    });

    it('shrinks a big player and grants blinking time', () => {
      const world = worldFromGrid(flatGrid());
      const player = createPlayer('big');

      damagePlayer(player, world);

      expect(player.tier).toBe('small');
      expect(player.y).toBe(288);
      expect(player.invincibility).toBe(120);
      expect(player.dead).toBe(false);
      expect(world.events).toEqual([{ type: 'playerDamaged' }]);

      damagePlayer(player, world);
      expect(player.dead).toBe(false);
    });

    it('kills a small player outright', () => {
      const world = worldFromGrid(flatGrid());
      const player = createPlayer();

      damagePlayer(player, world);
      damagePlayer(player, world);

      expect(player.dead).toBe(true);
      expect(world.events).toEqual([{ type: 'playerKilled', cause: 'enemy' }]);
    });

    it('shrugs off damage under star power', () => {
      const world = worldFromGrid(flatGrid());
      const player = createPlayer();
      player.starTimer = 10;

      damagePlayer(player, world);

      expect(player.dead).toBe(false);
      expect(world.events).toEqual([]);
    });

    it('finishes the death animation after its countdown', () => {
      const world = worldFromGrid(flatGrid());
      const player = createPlayer();
      damagePlayer(player, world);

      let finished = 0;
      for (let tick = 1; tick <= 180; tick += 1) {
        if (stepDeath(player)) {
          finished = tick;
          break;
        }
      }

      expect(finished).toBe(180);
    });
  });

  describe('fireballs', () => {
    it('throws at most two fireballs for a fire player', () => {
      const world = worldFromGrid(flatGrid());
      const player = createPlayer('fire');

      expect(shootFireball(player, world)).toBe(true);
      expect(shootFireball(player, world)).toBe(true);
      expect(shootFireball(player, world)).toBe(false);

      expect(world.entities).toHaveLength(2);
      expect(world.entities[0]).toMatchObject({ kind: 'fireball', x: 128, y: 272, vx: 8 });
    });

    it('throws nothing without the fire tier', () => {
      const world = worldFromGrid(flatGrid());

      expect(shootFireball(createPlayer('big'), world)).toBe(false);
      expect(world.entities).toEqual([]);
    });
  });

  it('cycles the animation frame every eight ticks', () => {
    const player = createPlayer();

    for (let i = 0; i < 8; i += 1) {
      tickPlayerTimers(player);
    }
    expect(player.animFrame).toBe(1);

    for (let i = 0; i < 16; i += 1) {
      tickPlayerTimers(player);
    }
    expect(player.animFrame).toBe(0);
  });
});
