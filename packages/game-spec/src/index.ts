import { z } from 'zod';

import { TILE_KINDS } from './tiles';

export const ENTITY_KINDS = [
  'goomba',
  'koopa',
  'bowser',
  'mushroom',
  'fireflower',
  'star',
  'coin',
  'fireball',
] as const;

export const INPUT_ACTIONS = [
  'left',
  'right',
  'jump',
  'run',
  'crouch',
  'pause',
  'back',
  'confirm',
] as const;

export const SESSION_STATES = [
  'title',
  'worldIntro',
  'playing',
  'paused',
  'levelComplete',
  'victory',
  'gameOver',
] as const;

export const POWER_TIERS = ['small', 'big', 'fire'] as const;

const Facing = z.enum(['left', 'right']);

export const InputEvent = z.object({
  action: z.enum(INPUT_ACTIONS),
  pressed: z.boolean(),
});

const EntityView = z.object({
  kind: z.enum(ENTITY_KINDS),
  x: z.number(),
  y: z.number(),
  w: z.number().gt(0),
  h: z.number().gt(0),
  facing: Facing,
  active: z.boolean(),
  stomped: z.boolean(),
  inShell: z.boolean(),
  emerging: z.boolean(),
  animFrame: z.number().int().min(0),
});

const ParticleView = z.object({
  x: z.number(),
  y: z.number(),
  color: z.number().int().min(0),
  life: z.number().int().min(0),
});

const FloatingTextView = z.object({
  x: z.number(),
  y: z.number(),
  text: z.string(),
  life: z.number().int().min(0),
});

const PlayerView = z.object({
  x: z.number(),
  y: z.number(),
  w: z.number().gt(0),
  h: z.number().gt(0),
  facing: Facing,
  tier: z.enum(POWER_TIERS),
  invincible: z.boolean(),
  star: z.boolean(),
  crouching: z.boolean(),
  animFrame: z.number().int().min(0),
  alive: z.boolean(),
  deathProgress: z.number().min(0).max(1),
});

const Hud = z.object({
  score: z.number().int().min(0),
  coins: z.number().int().min(0).max(99),
  worldLabel: z.string(),
  time: z.number().int().min(0),
  lives: z.number().int().min(0),
});

export const Snapshot = z.object({
  state: z.enum(SESSION_STATES),
  camera: z.number().min(0),
  level: z
    .object({
      theme: z.enum(['overworld', 'underground', 'castle', 'underwater']),
      underground: z.boolean(),
      underwater: z.boolean(),
      castle: z.boolean(),
      palette: z.object({
        bg: z.number().int().min(0),
        ground: z.number().int().min(0),
        brick: z.number().int().min(0),
        accent: z.number().int().min(0),
      }),
      width: z.number().int().gt(0),
      tiles: z.array(z.array(z.enum(TILE_KINDS))),
      flag: z.object({ x: z.number(), y: z.number() }).nullable(),
      axe: z.object({ x: z.number().int(), y: z.number().int() }).nullable(),
    })
    .nullable(),
  entities: z.array(EntityView),
  particles: z.array(ParticleView),
  texts: z.array(FloatingTextView),
  player: PlayerView,
  hud: Hud,
});

export type EntityKind = (typeof ENTITY_KINDS)[number];
export type InputAction = (typeof INPUT_ACTIONS)[number];
export type SessionStateName = (typeof SESSION_STATES)[number];
export type PowerTier = (typeof POWER_TIERS)[number];
export type Facing = z.infer<typeof Facing>;
export type InputEventT = z.infer<typeof InputEvent>;
export type SnapshotT = z.infer<typeof Snapshot>;
export type EntityViewT = z.infer<typeof EntityView>;
export type PlayerViewT = z.infer<typeof PlayerView>;

export * from './tiles';
export * from './themes';
export * from './progression';
