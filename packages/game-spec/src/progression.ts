export const LEVELS_PER_WORLD = 4;
export const FINAL_WORLD = 8;
export const STAGE_TIME_SECONDS = 400;
export const STARTING_LIVES = 3;

/** Extra columns a generated level may add on top of its world's base width. */
export const LEVEL_WIDTH_JITTER = 50;

export class InvalidStageError extends Error {
  constructor(
    public readonly world: number,
    public readonly level: number,
  ) {
    super(`Invalid stage ${world}-${level}`);
    this.name = 'InvalidStageError';
  }
}

export interface Stage {
  world: number;
  level: number;
}

export type StageAdvance = ({ kind: 'stage' } & Stage) | { kind: 'victory' };

export function assertStage(world: number, level: number): void {
  if (!Number.isInteger(world) || world < 1 || world > FINAL_WORLD) {
    throw new InvalidStageError(world, level);
  }
  if (!Number.isInteger(level) || level < 1 || level > LEVELS_PER_WORLD) {
    throw new InvalidStageError(world, level);
  }
}

export function nextStage(world: number, level: number): StageAdvance {
  assertStage(world, level);
  if (level < LEVELS_PER_WORLD) {
    return { kind: 'stage', world, level: level + 1 };
  }
  if (world >= FINAL_WORLD) {
    return { kind: 'victory' };
  }
  return { kind: 'stage', world: world + 1, level: 1 };
}

export function stageLabel(world: number, level: number): string {
  return `${world}-${level}`;
}

export function baseLevelWidth(world: number): number {
  return 200 + (world - 1) * 20;
}

export function enemyCountForStage(world: number, level: number): number {
  return 5 + world * 2 + level;
}
