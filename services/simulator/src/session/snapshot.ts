import {
  TILE_SIZE,
  getTheme,
  stageLabel,
  type EntityViewT,
  type PlayerViewT,
  type SnapshotT,
} from '@tilerun/game-spec';

import { DEATH_TICKS, FLAG_BOTTOM_Y, FLAG_TOP_Y, PLAYER_WIDTH } from '../sim/constants';
import { entityFacing, type Entity } from '../sim/entities';
import { playerHeight, type PlayerState } from '../sim/player';
import type { World } from '../sim/world';

import type { Session } from './session';

function entityView(entity: Entity, animFrame: number): EntityViewT {
  return {
    kind: entity.kind,
    x: entity.x,
    y: entity.y,
    w: entity.width,
    h: entity.height,
    facing: entityFacing(entity),
    active: entity.active,
    stomped: entity.stomped,
    inShell: entity.kind === 'koopa' && entity.inShell,
    emerging: entity.emergeTargetY !== null,
    animFrame,
  };
}

function playerView(player: PlayerState): PlayerViewT {
  return {
    x: player.x,
    y: player.y,
    w: PLAYER_WIDTH,
    h: playerHeight(player),
    facing: player.facing,
    tier: player.tier,
    invincible: player.invincibility > 0,
    star: player.starTimer > 0,
    crouching: player.crouching,
    animFrame: player.animFrame,
    alive: !player.dead,
    deathProgress: player.dead ? 1 - player.deathTimer / DEATH_TICKS : 0,
  };
}

function levelView(session: Session, stage: World): SnapshotT['level'] {
  const { level } = stage;
  const params = getTheme(level.theme).params;
  const flag =
    level.flagPoleX >= 0
      ? { x: level.flagPoleX * TILE_SIZE, y: session.flag?.y ?? flagRestingY(session) }
      : null;
  const axePresent = level.axe !== null && stage.grid.tileAt(level.axe.x, level.axe.y) === 'axe';

  return {
    theme: level.theme,
    underground: params.underground,
    underwater: params.underwater,
    castle: params.castle,
    palette: params.palette,
    width: stage.grid.width,
    tiles: stage.grid.rows(),
    flag,
    axe: axePresent ? level.axe : null,
  };
}

/** The flag stays down once the slide has finished. */
function flagRestingY(session: Session): number {
  return session.state === 'levelComplete' ? FLAG_BOTTOM_Y : FLAG_TOP_Y;
}

/** Read-only view of the session for one rendered frame. */
export function buildSnapshot(session: Session): SnapshotT {
  const stage = session.stage;
  const animFrame = session.player.animFrame;

  return {
    state: session.state,
    camera: stage?.camera ?? 0,
    level: stage ? levelView(session, stage) : null,
    entities: stage ? stage.entities.map((entity) => entityView(entity, animFrame)) : [],
    particles: stage
      ? stage.particles.map(({ x, y, color, life }) => ({ x, y, color, life }))
      : [],
    texts: stage ? stage.texts.map(({ x, y, text, life }) => ({ x, y, text, life })) : [],
    player: playerView(session.player),
    hud: {
      score: session.score,
      coins: session.coins,
      worldLabel: stageLabel(session.world, session.level),
      time: session.timeRemaining,
      lives: session.lives,
    },
  };
}
