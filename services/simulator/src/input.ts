import type { InputAction, InputEventT } from '@tilerun/game-spec';
import { z } from 'zod';

export type HeldKey = 'left' | 'right' | 'jump' | 'run' | 'crouch';

export const HELD_KEYS: readonly HeldKey[] = ['left', 'right', 'jump', 'run', 'crouch'];

/** One entry of an input timeline: at tick `t`, the listed keys take these values. */
export type InputCmd = {
  t: number;
  left?: boolean;
  right?: boolean;
  jump?: boolean;
  run?: boolean;
  crouch?: boolean;
};

export type InputState = Record<HeldKey, boolean>;

export const InputScript = z.array(
  z.object({
    t: z.number().int().min(0),
    left: z.boolean().optional(),
    right: z.boolean().optional(),
    jump: z.boolean().optional(),
    run: z.boolean().optional(),
    crouch: z.boolean().optional(),
  }),
);

/** Validates a recorded timeline and returns it merged and ordered. */
export function parseInputScript(raw: unknown): InputCmd[] {
  return mergeCommands(InputScript.parse(raw));
}

export function defaultInput(): InputState {
  return { left: false, right: false, jump: false, run: false, crouch: false };
}

export function isHeldKey(action: InputAction): action is HeldKey {
  return HELD_KEYS.some((key) => key === action);
}

export function applyCommand(previous: InputState, command?: InputCmd): InputState {
  if (!command) {
    return { ...previous };
  }
  const next = { ...previous };
  for (const key of HELD_KEYS) {
    const value = command[key];
    if (value !== undefined) {
      next[key] = value;
    }
  }
  return next;
}

/** Folds commands sharing a tick together and orders them by tick. */
export function mergeCommands(commands: InputCmd[]): InputCmd[] {
  const map = new Map<number, InputCmd>();
  for (const command of commands) {
    if (command.t < 0) {
      continue;
    }
    const merged: InputCmd = { ...(map.get(command.t) ?? { t: command.t }) };
    for (const key of HELD_KEYS) {
      const value = command[key];
      if (value !== undefined) {
        merged[key] = value;
      }
    }
    map.set(command.t, merged);
  }
  return Array.from(map.values()).sort((a, b) => a.t - b.t);
}

/** Drops keys that do not change the held state, keeping the tick-0 entry. */
export function compressCommands(commands: InputCmd[]): InputCmd[] {
  const result: InputCmd[] = [];
  let prevState = defaultInput();

  for (const command of mergeCommands(commands)) {
    const nextState = applyCommand(prevState, command);
    const delta: InputCmd = { t: command.t };
    let changed = false;

    for (const key of HELD_KEYS) {
      if (prevState[key] !== nextState[key]) {
        delta[key] = nextState[key];
        changed = true;
      }
    }

    if (changed || command.t === 0) {
      result.push(delta);
    }
    prevState = nextState;
  }

  return result;
}

/** Press and release events that turn the `previous` held state into `next`. */
export function eventsBetween(previous: InputState, next: InputState): InputEventT[] {
  const events: InputEventT[] = [];
  for (const key of HELD_KEYS) {
    if (previous[key] !== next[key]) {
      events.push({ action: key, pressed: next[key] });
    }
  }
  return events;
}
