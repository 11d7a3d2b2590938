import { beforeEach, describe, expect, it } from 'vitest';

import {
  coinsCollectedTotal,
  enemiesDefeatedTotal,
  levelsClearedTotal,
  liveEntities,
  playerDeathsTotal,
  recordTick,
  recordTickEvents,
  registry,
  ticksTotal,
} from './metrics';

describe('metrics', () => {
  beforeEach(() => {
    registry.resetMetrics();
  });

  it('folds tick events into the counters', async () => {
    recordTickEvents([
      { type: 'coin' },
      { type: 'coin' },
      { type: 'playerKilled', cause: 'lava' },
      { type: 'levelCleared', theme: 'castle', world: 1, level: 4 },
      { type: 'enemyDefeated', kind: 'koopa', by: 'fireball' },
      { type: 'shellKicked' },
    ]);

    expect((await coinsCollectedTotal.get()).values[0]?.value).toBe(2);
    expect((await playerDeathsTotal.get()).values).toContainEqual(
      expect.objectContaining({ labels: { cause: 'lava' }, value: 1 }),
    );
    expect((await levelsClearedTotal.get()).values).toContainEqual(
      expect.objectContaining({ labels: { theme: 'castle' }, value: 1 }),
    );
    expect((await enemiesDefeatedTotal.get()).values).toContainEqual(
      expect.objectContaining({ labels: { kind: 'koopa', by: 'fireball' }, value: 1 }),
    );
  });

  it('counts ticks and tracks the live entity gauge', async () => {
    recordTick(4);
    recordTick(7, process.hrtime.bigint());

    expect((await ticksTotal.get()).values[0]?.value).toBe(2);
    expect((await liveEntities.get()).values[0]?.value).toBe(7);
    expect(await registry.metrics()).toContain('sim_tick_duration_seconds_count 1');
  });
});
