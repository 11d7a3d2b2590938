import {
  BIG_HEIGHT,
  KICK_GRACE_TICKS,
  SCORE_KILL,
  SCORE_POWERUP,
  SCORE_STOMP,
  SHELL_SPEED,
  SMALL_HEIGHT,
  STAR_TICKS,
  STOMP_BOUNCE,
  STOMP_TICKS,
  STOMP_TOLERANCE,
} from './constants';
import { burst } from './effects';
import { isHostile, type Entity, type HostileEntity, type PowerUpEntity } from './entities';
import type { DefeatCause } from './events';
import { damagePlayer, overlaps, playerBox, playerHeight, type Box, type PlayerState } from './player';
import { award, emit, type World } from './world';

function entityBox(entity: Entity): Box {
  return { x: entity.x, y: entity.y, width: entity.width, height: entity.height };
}

function collectPowerUp(player: PlayerState, entity: PowerUpEntity, world: World): void {
  switch (entity.kind) {
    case 'mushroom':
      if (player.tier === 'small') {
        player.tier = 'big';
        player.y -= BIG_HEIGHT - SMALL_HEIGHT;
      }
      break;
    case 'fireflower':
      if (player.tier === 'small') {
        player.y -= BIG_HEIGHT - SMALL_HEIGHT;
      }
      player.tier = 'fire';
      break;
    case 'star':
      player.starTimer = STAR_TICKS;
      break;
  }
  entity.dead = true;
  award(world, SCORE_POWERUP, entity.x, entity.y);
  emit(world, { type: 'powerUp', kind: entity.kind });
}

/** Removes a hostile outright, with the burst of white particles. */
export function defeatEnemy(entity: HostileEntity, world: World, by: DefeatCause): void {
  entity.dead = true;
  award(world, SCORE_KILL, entity.x, entity.y);
  world.particles.push(...burst(world.rng, entityBox(entity)));
  emit(world, { type: 'enemyDefeated', kind: entity.kind, by });
}

function stompEnemy(player: PlayerState, entity: HostileEntity, world: World): void {
  switch (entity.kind) {
    case 'goomba':
      entity.stomped = true;
      entity.stompTimer = STOMP_TICKS;
      entity.active = false;
      entity.vx = 0;
      award(world, SCORE_STOMP, entity.x, entity.y);
      emit(world, { type: 'enemyDefeated', kind: 'goomba', by: 'stomp' });
      break;
    case 'koopa':
      if (entity.inShell) {
        entity.vx = player.facing === 'right' ? SHELL_SPEED : -SHELL_SPEED;
        entity.kickGrace = KICK_GRACE_TICKS;
        emit(world, { type: 'shellKicked' });
      } else {
        entity.inShell = true;
        entity.vx = 0;
      }
      award(world, SCORE_STOMP, entity.x, entity.y);
      break;
    case 'bowser':
      break;
  }
  player.vy = STOMP_BOUNCE;
}

function isStomp(player: PlayerState, entity: Entity): boolean {
  const bottom = player.y + playerHeight(player);
  return player.vy > 0 && bottom - STOMP_TOLERANCE < entity.y + entity.height / 2;
}

function touchable(entity: Entity): boolean {
  if (!entity.active || entity.dead || entity.kind === 'fireball') {
    return false;
  }
  return !(entity.kind === 'koopa' && entity.kickGrace > 0);
}

/**
 * Applies every player/entity overlap for this tick. Skipped entirely while the
 * player is dead, blinking, or being driven by a completion sequence.
 */
export function resolvePlayerContacts(player: PlayerState, world: World, sequenceActive = false): void {
  if (player.dead || player.invincibility > 0 || sequenceActive) {
    return;
  }

  for (const entity of world.entities) {
    if (player.dead || player.invincibility > 0) {
      return;
    }
    if (!touchable(entity) || !overlaps(playerBox(player), entityBox(entity))) {
      continue;
    }

    switch (entity.kind) {
      case 'mushroom':
      case 'fireflower':
      case 'star':
        collectPowerUp(player, entity, world);
        break;
      case 'coin':
        entity.dead = true;
        emit(world, { type: 'coin' });
        break;
      case 'goomba':
      case 'koopa':
      case 'bowser':
        if (player.starTimer > 0) {
          defeatEnemy(entity, world, 'star');
        } else if (isStomp(player, entity)) {
          stompEnemy(player, entity, world);
        } else {
          damagePlayer(player, world);
        }
        break;
      case 'fireball':
        break;
    }
  }
}

function isMovingShell(entity: Entity): boolean {
  return entity.kind === 'koopa' && entity.inShell && entity.vx !== 0;
}

/** Fireballs and kicked shells against the other hostiles. */
export function resolveEntityContacts(world: World): void {
  const attackers = world.entities.filter(
    (entity) => !entity.dead && (entity.kind === 'fireball' || isMovingShell(entity)),
  );

  for (const attacker of attackers) {
    for (const target of world.entities) {
      if (attacker.dead) {
        break;
      }
      if (target === attacker || target.dead || target.stomped || !isHostile(target)) {
        continue;
      }
      if (!overlaps(entityBox(attacker), entityBox(target))) {
        continue;
      }

      if (attacker.kind === 'fireball') {
        attacker.dead = true;
        if (target.kind === 'bowser') {
          target.hitPoints -= 1;
          if (target.hitPoints <= 0) {
            defeatEnemy(target, world, 'fireball');
          }
        } else {
          defeatEnemy(target, world, 'fireball');
        }
      } else if (target.kind !== 'bowser') {
        defeatEnemy(target, world, 'shell');
      }
    }
  }
}

