import { setTimeout as delay, setImmediate as yieldToLoop } from 'node:timers/promises';

import { InputEvent, type InputEventT, type SessionStateName, type SnapshotT } from '@tilerun/game-spec';
import type { Logger } from '@tilerun/logger';

import { applyCommand, compressCommands, defaultInput, eventsBetween, type InputCmd } from './input';
import { recordTick, recordTickEvents } from './metrics';
import { handleInput, tickSession, type Session } from './session/session';
import { buildSnapshot } from './session/snapshot';
import { TICK_HZ } from './sim/constants';
import type { SimEvent } from './sim/events';

/** Supplies the input events applied before each tick. */
export interface InputSource {
  next(snapshot: SnapshotT, tick: number): InputEventT[];
}

export type StopReason = 'gameOver' | 'victory' | 'maxTicks' | 'aborted';

export interface RunOptions {
  session: Session;
  source: InputSource;
  maxTicks: number;
  /** Pace ticks at 60 Hz of wall time instead of running flat out. */
  realtime?: boolean;
  logger?: Logger;
  progressEvery?: number;
  signal?: AbortSignal;
  onFrame?: (snapshot: SnapshotT, events: SimEvent[]) => void;
}

export interface RunSummary {
  ticks: number;
  state: SessionStateName;
  stopReason: StopReason;
  score: number;
  world: number;
  level: number;
  lives: number;
  coins: number;
  deaths: number;
  levelsCleared: number;
}

/** Replays an input timeline, one held-state change per listed tick. */
export function scriptSource(commands: InputCmd[]): InputSource {
  const timeline = compressCommands(commands);
  let held = defaultInput();
  let index = 0;

  return {
    next(_snapshot, tick) {
      let nextHeld = held;
      while (index < timeline.length && timeline[index].t <= tick) {
        nextHeld = applyCommand(nextHeld, timeline[index]);
        index += 1;
      }
      const events = eventsBetween(held, nextHeld);
      held = nextHeld;
      return events;
    },
  };
}

/** Presses confirm whenever the session sits on the title screen. */
export function startOnTitle(source: InputSource): InputSource {
  return {
    next(snapshot, tick) {
      if (snapshot.state === 'title') {
        return [
          { action: 'confirm', pressed: true },
          { action: 'confirm', pressed: false },
        ];
      }
      return source.next(snapshot, tick);
    },
  };
}

function stopReasonFor(state: SessionStateName): StopReason | null {
  if (state === 'gameOver' || state === 'victory') {
    return state;
  }
  return null;
}

export async function runHeadless(options: RunOptions): Promise<RunSummary> {
  const { session, source, maxTicks, logger, signal, onFrame } = options;
  const progressEvery = options.progressEvery ?? TICK_HZ * 10;
  const frameMs = 1000 / TICK_HZ;
  let nextFrameAt = session.clock.nowMs();
  let deaths = 0;
  let levelsCleared = 0;
  let stopReason: StopReason = 'maxTicks';
  let tick = 0;

  for (; tick < maxTicks; tick += 1) {
    if (signal?.aborted) {
      stopReason = 'aborted';
      break;
    }

    for (const event of source.next(buildSnapshot(session), tick)) {
      handleInput(session, InputEvent.parse(event));
    }

    const startedAt = process.hrtime.bigint();
    const events = tickSession(session);
    recordTick(session.stage?.entities.length ?? 0, startedAt);
    recordTickEvents(events);

    for (const event of events) {
      if (event.type === 'playerKilled') {
        deaths += 1;
      } else if (event.type === 'levelCleared') {
        levelsCleared += 1;
      }
    }

    onFrame?.(buildSnapshot(session), events);

    if ((tick + 1) % progressEvery === 0) {
      logger?.info(
        {
          tick: tick + 1,
          state: session.state,
          stage: `${session.world}-${session.level}`,
          score: session.score,
          lives: session.lives,
        },
        'simulation progress',
      );
    }

    const finished = stopReasonFor(session.state);
    if (finished) {
      stopReason = finished;
      tick += 1;
      break;
    }

    if (options.realtime) {
      nextFrameAt += frameMs;
      await delay(Math.max(0, nextFrameAt - session.clock.nowMs()));
    } else if ((tick + 1) % progressEvery === 0) {
      await yieldToLoop();
    }
  }

  return {
    ticks: tick,
    state: session.state,
    stopReason,
    score: session.score,
    world: session.world,
    level: session.level,
    lives: session.lives,
    coins: session.coins,
    deaths,
    levelsCleared,
  };
}
