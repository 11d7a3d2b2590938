import { TILE_SIZE, isSolidTile, type InputEventT, type SnapshotT } from '@tilerun/game-spec';

import { defaultInput, eventsBetween, type InputState } from './input';
import { startOnTitle, type InputSource } from './runner';

const JUMP_HOLD_TICKS = 18;
const LOOKAHEAD_PX = 16;
const THREAT_RANGE_PX = 96;

type LevelView = NonNullable<SnapshotT['level']>;

function solidAt(level: LevelView, tx: number, ty: number): boolean {
  const kind = level.tiles[ty]?.[tx];
  return kind !== undefined && isSolidTile(kind);
}

function blockedAhead(snapshot: SnapshotT, level: LevelView): boolean {
  const { player } = snapshot;
  const col = Math.floor((player.x + player.w + LOOKAHEAD_PX) / TILE_SIZE);
  const topRow = Math.floor(player.y / TILE_SIZE);
  const bottomRow = Math.floor((player.y + player.h - 1) / TILE_SIZE);
  for (let ty = topRow; ty <= bottomRow; ty += 1) {
    if (solidAt(level, col, ty)) {
      return true;
    }
  }
  return false;
}

function gapAhead(snapshot: SnapshotT, level: LevelView): boolean {
  const { player } = snapshot;
  const col = Math.floor((player.x + player.w + LOOKAHEAD_PX) / TILE_SIZE);
  const feetRow = Math.floor((player.y + player.h) / TILE_SIZE);
  return col < level.width && !solidAt(level, col, feetRow);
}

function threatAhead(snapshot: SnapshotT): boolean {
  const { player } = snapshot;
  const front = player.x + player.w;
  return snapshot.entities.some((entity) => {
    if (!entity.active || entity.stomped) {
      return false;
    }
    if (entity.kind !== 'goomba' && entity.kind !== 'koopa' && entity.kind !== 'bowser') {
      return false;
    }
    const distance = entity.x - front;
    return distance >= 0 && distance <= THREAT_RANGE_PX && Math.abs(entity.y - player.y) < TILE_SIZE * 2;
  });
}

export function wantsJump(snapshot: SnapshotT): boolean {
  const level = snapshot.level;
  if (!level) {
    return false;
  }
  return blockedAhead(snapshot, level) || gapAhead(snapshot, level) || threatAhead(snapshot);
}

/**
 * Input source that starts a game and runs right, hopping over walls, gaps
 * and enemies. Good enough to drive soak runs; it does not aim to win.
 */
export function createAutopilot(): InputSource {
  let held: InputState = defaultInput();
  let jumpTicks = 0;

  return startOnTitle({
    next(snapshot: SnapshotT): InputEventT[] {
      if (snapshot.state !== 'playing' || !snapshot.player.alive) {
        return [];
      }

      const desired: InputState = { ...held, left: false, right: true, run: true, crouch: false };
      if (held.jump) {
        jumpTicks += 1;
        desired.jump = jumpTicks < JUMP_HOLD_TICKS;
      } else if (wantsJump(snapshot)) {
        desired.jump = true;
        jumpTicks = 0;
      }

      const events = eventsBetween(held, desired);
      held = desired;
      return events;
    },
  });
}
