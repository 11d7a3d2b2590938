import { TILE_SIZE, type Facing, type PowerTier } from '@tilerun/game-spec';

import type { InputState } from '../input';

import {
  ANIM_FRAMES,
  ANIM_TICKS,
  BIG_HEIGHT,
  DEATH_GRAVITY,
  DEATH_HOP,
  DEATH_TICKS,
  FALL_DEATH_Y,
  FRICTION,
  GRAVITY,
  INVINCIBILITY_TICKS,
  JUMP_CUT_VELOCITY,
  JUMP_VELOCITY,
  MAX_FALL_SPEED,
  MAX_FIREBALLS,
  PLAYER_SPAWN_X,
  PLAYER_SPAWN_Y,
  PLAYER_WIDTH,
  POWERUP_CHANCE,
  RUN_ACCEL,
  RUN_SPEED,
  SCORE_BRICK,
  SCORE_QUESTION,
  SMALL_HEIGHT,
  UNDERWATER_GRAVITY,
  UNDERWATER_MAX_FALL_SPEED,
  WALK_ACCEL,
  WALK_SPEED,
} from './constants';
import { brickDebris } from './effects';
import { countLive, createBlockCoin, createEmergingPowerUp, createFireball } from './entities';
import type { DeathCause } from './events';
import { award, emit, type World } from './world';

export interface PlayerState {
  x: number;
  y: number;
  vx: number;
  vy: number;
  facing: Facing;
  tier: PowerTier;
  onGround: boolean;
  crouching: boolean;
  invincibility: number;
  starTimer: number;
  animFrame: number;
  animTimer: number;
  /** Jump input of the previous tick, for edge detection. */
  previousJump: boolean;
  dead: boolean;
  deathTimer: number;
}

export interface Box {
  x: number;
  y: number;
  width: number;
  height: number;
}

export function createPlayer(tier: PowerTier = 'small'): PlayerState {
  return {
    x: PLAYER_SPAWN_X,
    y: tier === 'small' ? PLAYER_SPAWN_Y : PLAYER_SPAWN_Y - TILE_SIZE,
    vx: 0,
    vy: 0,
    facing: 'right',
    tier,
    onGround: false,
    crouching: false,
    invincibility: 0,
    starTimer: 0,
    animFrame: 0,
    animTimer: 0,
    previousJump: false,
    dead: false,
    deathTimer: 0,
  };
}

/** Puts the player back at the level start, keeping the power tier. */
export function respawnPlayer(player: PlayerState): void {
  Object.assign(player, createPlayer(player.tier));
}

export function playerHeight(player: PlayerState): number {
  return player.tier === 'small' ? SMALL_HEIGHT : BIG_HEIGHT;
}

export function playerBox(player: PlayerState): Box {
  return { x: player.x, y: player.y, width: PLAYER_WIDTH, height: playerHeight(player) };
}

export function overlaps(a: Box, b: Box): boolean {
  return a.x < b.x + b.width && a.x + a.width > b.x && a.y < b.y + b.height && a.y + a.height > b.y;
}

function applyHorizontalInput(player: PlayerState, input: InputState): void {
  const accel = input.run ? RUN_ACCEL : WALK_ACCEL;
  const maxSpeed = input.run ? RUN_SPEED : WALK_SPEED;

  if (input.left && !input.right && !player.crouching) {
    player.vx = Math.max(player.vx - accel, -maxSpeed);
    player.facing = 'left';
  } else if (input.right && !input.left && !player.crouching) {
    player.vx = Math.min(player.vx + accel, maxSpeed);
    player.facing = 'right';
  } else if (player.vx > 0) {
    player.vx = Math.max(player.vx - FRICTION, 0);
  } else if (player.vx < 0) {
    player.vx = Math.min(player.vx + FRICTION, 0);
  }
}

export function applyGravity(player: PlayerState, underwater: boolean): void {
  if (underwater) {
    player.vy = Math.min(player.vy + UNDERWATER_GRAVITY, UNDERWATER_MAX_FALL_SPEED);
  } else {
    player.vy = Math.min(player.vy + GRAVITY, MAX_FALL_SPEED);
  }
}

export function resolveHorizontal(player: PlayerState, world: World): void {
  const height = playerHeight(player);
  const topRow = Math.floor(player.y / TILE_SIZE);
  const bottomRow = Math.floor((player.y + height - 1) / TILE_SIZE);

  if (player.vx > 0) {
    const col = Math.floor((player.x + PLAYER_WIDTH) / TILE_SIZE);
    for (let ty = topRow; ty <= bottomRow; ty += 1) {
      if (world.grid.solid(col, ty)) {
        player.x = col * TILE_SIZE - PLAYER_WIDTH - 1;
        player.vx = 0;
        return;
      }
    }
  } else if (player.vx < 0) {
    const col = Math.floor(player.x / TILE_SIZE);
    for (let ty = topRow; ty <= bottomRow; ty += 1) {
      if (world.grid.solid(col, ty)) {
        player.x = (col + 1) * TILE_SIZE + 1;
        player.vx = 0;
        return;
      }
    }
  }
}

export function resolveVertical(player: PlayerState, world: World): void {
  const height = playerHeight(player);
  const firstCol = Math.floor((player.x + 2) / TILE_SIZE);
  const lastCol = Math.floor((player.x + PLAYER_WIDTH - 2) / TILE_SIZE);
  player.onGround = false;

  if (player.vy > 0) {
    const row = Math.floor((player.y + height) / TILE_SIZE);
    for (let tx = firstCol; tx <= lastCol; tx += 1) {
      if (world.grid.solid(tx, row)) {
        player.y = row * TILE_SIZE - height;
        player.vy = 0;
        player.onGround = true;
        return;
      }
    }
  } else if (player.vy < 0) {
    const row = Math.floor(player.y / TILE_SIZE);
    for (let tx = firstCol; tx <= lastCol; tx += 1) {
      if (world.grid.solid(tx, row)) {
        player.y = (row + 1) * TILE_SIZE;
        player.vy = 0;
        hitBlock(player, world, tx, row);
        return;
      }
    }
  }
}

/** Reacts to the player's head striking the tile at (tx, ty). */
export function hitBlock(player: PlayerState, world: World, tx: number, ty: number): void {
  const tile = world.grid.tileAt(tx, ty);

  if (tile === 'question') {
    world.grid.setTile(tx, ty, 'used');
    award(world, SCORE_QUESTION, tx * TILE_SIZE, ty * TILE_SIZE);
    emit(world, { type: 'blockHit', tile, tx, ty });
    const roll = world.rng.next();
    if (roll < POWERUP_CHANCE && player.tier === 'small') {
      world.entities.push(createEmergingPowerUp('mushroom', tx, ty));
      emit(world, { type: 'powerUpSpawned', kind: 'mushroom' });
    } else {
      world.entities.push(createBlockCoin(tx, ty));
    }
  } else if (tile === 'brick' && player.tier !== 'small') {
    world.grid.setTile(tx, ty, 'air');
    world.particles.push(...brickDebris(tx * TILE_SIZE, ty * TILE_SIZE, TILE_SIZE));
    emit(world, { type: 'score', points: SCORE_BRICK });
    emit(world, { type: 'blockHit', tile, tx, ty });
  }
}

function touchesLava(player: PlayerState, world: World): boolean {
  const box = playerBox(player);
  const firstCol = Math.floor(box.x / TILE_SIZE);
  const lastCol = Math.floor((box.x + box.width - 1) / TILE_SIZE);
  const firstRow = Math.floor(box.y / TILE_SIZE);
  const lastRow = Math.floor((box.y + box.height - 1) / TILE_SIZE);
  for (let ty = firstRow; ty <= lastRow; ty += 1) {
    for (let tx = firstCol; tx <= lastCol; tx += 1) {
      if (world.grid.tileAt(tx, ty) === 'lava') {
        return true;
      }
    }
  }
  return false;
}

/** One playing tick of movement for a live player. */
export function stepPlayer(player: PlayerState, input: InputState, world: World): void {
  if (player.dead) {
    return;
  }

  player.crouching = input.crouch && player.onGround && player.tier !== 'small';
  applyHorizontalInput(player, input);

  if (input.jump && !player.previousJump && player.onGround) {
    player.vy = JUMP_VELOCITY;
    player.onGround = false;
  }
  if (!input.jump && player.vy < JUMP_CUT_VELOCITY) {
    player.vy = JUMP_CUT_VELOCITY;
  }
  player.previousJump = input.jump;

  applyGravity(player, world.underwater);

  player.x += player.vx;
  resolveHorizontal(player, world);
  const rightLimit = world.grid.width * TILE_SIZE - PLAYER_WIDTH;
  player.x = Math.min(Math.max(player.x, 0, world.camera), rightLimit);

  player.y += player.vy;
  resolveVertical(player, world);

  if (player.y > FALL_DEATH_Y) {
    killPlayer(player, world, 'fall');
  } else if (touchesLava(player, world)) {
    killPlayer(player, world, 'lava');
  }
}

/** Starts the death hop. Calling it on a dead player does nothing. */
export function killPlayer(player: PlayerState, world: World, cause: DeathCause): void {
  if (player.dead) {
    return;
  }
  player.dead = true;
  player.vx = 0;
  player.vy = DEATH_HOP;
  player.deathTimer = DEATH_TICKS;
  player.starTimer = 0;
  emit(world, { type: 'playerKilled', cause });
}

/** Hostile contact: small players die, bigger ones shrink and blink. */
export function damagePlayer(player: PlayerState, world: World): void {
  if (player.dead || player.invincibility > 0 || player.starTimer > 0) {
    return;
  }
  if (player.tier === 'small') {
    killPlayer(player, world, 'enemy');
    return;
  }
  player.tier = 'small';
  player.y += BIG_HEIGHT - SMALL_HEIGHT;
  player.invincibility = INVINCIBILITY_TICKS;
  emit(world, { type: 'playerDamaged' });
}

/** Advances the death animation; true once the countdown has run out. */
export function stepDeath(player: PlayerState): boolean {
  player.deathTimer = Math.max(player.deathTimer - 1, 0);
  player.vy += DEATH_GRAVITY;
  player.y += player.vy;
  return player.deathTimer === 0;
}

export function shootFireball(player: PlayerState, world: World): boolean {
  if (player.dead || player.tier !== 'fire' || countLive(world, 'fireball') >= MAX_FIREBALLS) {
    return false;
  }
  const x = player.facing === 'right' ? player.x + TILE_SIZE : player.x - 8;
  world.entities.push(createFireball(x, player.y + TILE_SIZE / 2, player.facing));
  emit(world, { type: 'fireball' });
  return true;
}

export function tickPlayerTimers(player: PlayerState): void {
  if (player.invincibility > 0) {
    player.invincibility -= 1;
  }
  if (player.starTimer > 0) {
    player.starTimer -= 1;
  }
  player.animTimer += 1;
  if (player.animTimer >= ANIM_TICKS) {
    player.animTimer = 0;
    player.animFrame = (player.animFrame + 1) % ANIM_FRAMES;
  }
}
