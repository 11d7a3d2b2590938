import { TILE_SIZE, VIEWPORT_WIDTH, type Facing } from '@tilerun/game-spec';

import type { EntitySpawn } from '../level/generator';

import {
  BELOW_LEVEL_Y,
  BOWSER_HIT_POINTS,
  CLIFF_LOOKAHEAD,
  COIN_RISE_GRAVITY,
  COIN_RISE_VELOCITY,
  CULL_MARGIN,
  EMERGE_SPEED,
  ENTITY_GRAVITY,
  ENTITY_MAX_FALL_SPEED,
  FIREBALL_BOUNCE,
  FIREBALL_SIZE,
  FIREBALL_SPEED,
  PICKUP_SPEED,
  SPAWN_MARGIN,
  STAR_BOUNCE,
} from './constants';
import type { PickupKind } from './events';
import { emit, type World } from './world';

interface EntityBase {
  x: number;
  y: number;
  vx: number;
  vy: number;
  width: number;
  height: number;
  /** Inactive entities are drawn but ignore the player. */
  active: boolean;
  dead: boolean;
  stomped: boolean;
  stompTimer: number;
  /** Set while a pickup rises out of its block; cleared once it is clear. */
  emergeTargetY: number | null;
}

export interface GoombaEntity extends EntityBase {
  kind: 'goomba';
}

export interface KoopaEntity extends EntityBase {
  kind: 'koopa';
  inShell: boolean;
  /** Ticks after a kick during which the shell cannot touch the kicker. */
  kickGrace: number;
}

export interface BowserEntity extends EntityBase {
  kind: 'bowser';
  hitPoints: number;
}

export interface PowerUpEntity extends EntityBase {
  kind: PickupKind;
}

export interface CoinEntity extends EntityBase {
  kind: 'coin';
  rising: boolean;
}

export interface FireballEntity extends EntityBase {
  kind: 'fireball';
}

export type Entity =
  | GoombaEntity
  | KoopaEntity
  | BowserEntity
  | PowerUpEntity
  | CoinEntity
  | FireballEntity;

export type HostileEntity = GoombaEntity | KoopaEntity | BowserEntity;

function base(x: number, y: number, vx: number, width = TILE_SIZE, height = TILE_SIZE): EntityBase {
  return {
    x,
    y,
    vx,
    vy: 0,
    width,
    height,
    active: true,
    dead: false,
    stomped: false,
    stompTimer: 0,
    emergeTargetY: null,
  };
}

export function createEntity(spawn: EntitySpawn): Entity {
  switch (spawn.kind) {
    case 'goomba':
      return { ...base(spawn.x, spawn.y, spawn.vx), kind: 'goomba' };
    case 'koopa':
      return { ...base(spawn.x, spawn.y, spawn.vx), kind: 'koopa', inShell: false, kickGrace: 0 };
    case 'bowser':
      return {
        ...base(spawn.x, spawn.y, spawn.vx, TILE_SIZE * 2, TILE_SIZE * 2),
        kind: 'bowser',
        hitPoints: BOWSER_HIT_POINTS,
      };
    case 'fireflower':
    case 'star':
      return { ...base(spawn.x, spawn.y, spawn.vx), kind: spawn.kind };
  }
}

/** A coin that pops out of a question block and is collected when it peaks. */
export function createBlockCoin(tx: number, ty: number): CoinEntity {
  return {
    ...base(tx * TILE_SIZE + TILE_SIZE / 2 - 6, (ty - 1) * TILE_SIZE, 0, 12, 16),
    kind: 'coin',
    vy: COIN_RISE_VELOCITY,
    active: false,
    rising: true,
  };
}

/** A pickup that slides up out of the block at (tx, ty) before moving off. */
export function createEmergingPowerUp(kind: PickupKind, tx: number, ty: number): PowerUpEntity {
  return {
    ...base(tx * TILE_SIZE, ty * TILE_SIZE, kind === 'fireflower' ? 0 : PICKUP_SPEED),
    kind,
    active: false,
    emergeTargetY: (ty - 1) * TILE_SIZE,
  };
}

export function createFireball(x: number, y: number, facing: Facing): FireballEntity {
  return {
    ...base(x, y, facing === 'right' ? FIREBALL_SPEED : -FIREBALL_SPEED, FIREBALL_SIZE, FIREBALL_SIZE),
    kind: 'fireball',
  };
}

export function isHostile(entity: Entity): entity is HostileEntity {
  return entity.kind === 'goomba' || entity.kind === 'koopa' || entity.kind === 'bowser';
}

function walksCliffs(entity: Entity): boolean {
  switch (entity.kind) {
    case 'goomba':
    case 'bowser':
      return true;
    case 'koopa':
      return !entity.inShell;
    default:
      return false;
  }
}

function settleTimers(entity: Entity): void {
  if (entity.kind === 'koopa' && entity.kickGrace > 0) {
    entity.kickGrace -= 1;
  }
}

export function updateEntity(entity: Entity, world: World): void {
  const grid = world.grid;

  if (entity.stomped) {
    entity.stompTimer -= 1;
    if (entity.stompTimer <= 0) {
      entity.dead = true;
    }
    return;
  }

  if (entity.emergeTargetY !== null) {
    entity.y -= EMERGE_SPEED;
    if (entity.y <= entity.emergeTargetY) {
      entity.y = entity.emergeTargetY;
      entity.emergeTargetY = null;
      entity.active = true;
    }
    return;
  }

  settleTimers(entity);

  if (entity.kind === 'coin') {
    if (entity.rising) {
      entity.y += entity.vy;
      entity.vy += COIN_RISE_GRAVITY;
      if (entity.vy >= 0) {
        entity.dead = true;
        emit(world, { type: 'coin' });
      }
    }
    return;
  }

  entity.vy = Math.min(entity.vy + ENTITY_GRAVITY, ENTITY_MAX_FALL_SPEED);
  entity.x += entity.vx;

  if (entity.vx !== 0) {
    const movingRight = entity.vx > 0;
    const wallCol = Math.floor((movingRight ? entity.x + entity.width : entity.x) / TILE_SIZE);
    const midRow = Math.floor((entity.y + entity.height / 2) / TILE_SIZE);
    if (grid.solid(wallCol, midRow)) {
      if (entity.kind === 'fireball') {
        entity.dead = true;
        return;
      }
      entity.x = movingRight ? wallCol * TILE_SIZE - entity.width : (wallCol + 1) * TILE_SIZE;
      entity.vx = -entity.vx;
    }
  }

  let grounded = false;
  if (entity.vy >= 0) {
    const feetRow = Math.floor((entity.y + entity.height + entity.vy) / TILE_SIZE);
    const centreCol = Math.floor((entity.x + entity.width / 2) / TILE_SIZE);
    if (grid.solid(centreCol, feetRow)) {
      entity.y = feetRow * TILE_SIZE - entity.height;
      entity.vy = 0;
      grounded = true;
    }
  }

  if (grounded && entity.vx !== 0 && walksCliffs(entity)) {
    const aheadX = entity.vx > 0 ? entity.x + entity.width + CLIFF_LOOKAHEAD : entity.x - CLIFF_LOOKAHEAD;
    const belowRow = Math.floor((entity.y + entity.height) / TILE_SIZE);
    if (!grid.solid(Math.floor(aheadX / TILE_SIZE), belowRow)) {
      entity.vx = -entity.vx;
    }
  }

  if (grounded && entity.kind === 'star') {
    entity.vy = STAR_BOUNCE;
  } else if (grounded && entity.kind === 'fireball') {
    entity.vy = FIREBALL_BOUNCE;
  }

  entity.y += entity.vy;
  if (entity.y > BELOW_LEVEL_Y) {
    entity.dead = true;
  }
}

/** Moves spawns the camera is about to reveal into the live collection. */
export function activatePending(world: World): void {
  const horizon = world.camera + VIEWPORT_WIDTH + SPAWN_MARGIN;
  let taken = 0;
  while (taken < world.pending.length && world.pending[taken].x < horizon) {
    world.entities.push(createEntity(world.pending[taken]));
    taken += 1;
  }
  if (taken > 0) {
    world.pending = world.pending.slice(taken);
  }
}

export function isOffstage(entity: Entity, camera: number): boolean {
  return (
    entity.x < camera - CULL_MARGIN ||
    entity.x > camera + VIEWPORT_WIDTH + CULL_MARGIN ||
    entity.y > BELOW_LEVEL_Y
  );
}

export function updateEntities(world: World): void {
  activatePending(world);
  for (const entity of world.entities) {
    if (!entity.dead) {
      updateEntity(entity, world);
    }
  }
  sweepEntities(world);
}

export function sweepEntities(world: World): void {
  world.entities = world.entities.filter(
    (entity) => !entity.dead && !isOffstage(entity, world.camera),
  );
}

export function entityFacing(entity: Entity): Facing {
  return entity.vx > 0 ? 'right' : 'left';
}

export function countLive(world: World, kind: Entity['kind']): number {
  return world.entities.filter((entity) => entity.kind === kind && !entity.dead).length;
}
