import type { Theme } from '@tilerun/game-spec';

export type HostileKind = 'goomba' | 'koopa' | 'bowser';
export type PickupKind = 'mushroom' | 'fireflower' | 'star';
export type DeathCause = 'enemy' | 'fall' | 'lava' | 'time';
export type DefeatCause = 'stomp' | 'star' | 'fireball' | 'shell';

/** Gameplay facts raised during a tick; the session folds them into its counters. */
export type SimEvent =
  | { type: 'score'; points: number }
  | { type: 'coin' }
  | { type: 'blockHit'; tile: 'question' | 'brick'; tx: number; ty: number }
  | { type: 'powerUpSpawned'; kind: PickupKind }
  | { type: 'powerUp'; kind: PickupKind }
  | { type: 'enemyDefeated'; kind: HostileKind; by: DefeatCause }
  | { type: 'shellKicked' }
  | { type: 'fireball' }
  | { type: 'playerDamaged' }
  | { type: 'playerKilled'; cause: DeathCause }
  | { type: 'lifeLost'; livesLeft: number }
  | { type: 'extraLife' }
  | { type: 'levelCleared'; theme: Theme; world: number; level: number }
  | { type: 'stateChanged'; from: string; to: string };
