import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

import type { SimEvent } from './sim/events';

export const registry = new Registry();
collectDefaultMetrics({ register: registry });

export const ticksTotal = new Counter({
  name: 'sim_ticks_total',
  help: 'Total number of simulation ticks',
  registers: [registry],
});

export const tickDurationSeconds = new Histogram({
  name: 'sim_tick_duration_seconds',
  help: 'Wall time spent computing one tick',
  buckets: [0.0001, 0.00025, 0.0005, 0.001, 0.0025, 0.005, 0.01, 0.025],
  registers: [registry],
});

export const playerDeathsTotal = new Counter({
  name: 'player_deaths_total',
  help: 'Player deaths by cause',
  labelNames: ['cause'],
  registers: [registry],
});

export const levelsClearedTotal = new Counter({
  name: 'levels_cleared_total',
  help: 'Levels cleared by theme',
  labelNames: ['theme'],
  registers: [registry],
});

export const coinsCollectedTotal = new Counter({
  name: 'coins_collected_total',
  help: 'Coins collected',
  registers: [registry],
});

export const enemiesDefeatedTotal = new Counter({
  name: 'enemies_defeated_total',
  help: 'Enemies defeated by kind and method',
  labelNames: ['kind', 'by'],
  registers: [registry],
});

export const liveEntities = new Gauge({
  name: 'sim_live_entities',
  help: 'Entities alive in the current stage',
  registers: [registry],
});

export function recordTickEvents(events: SimEvent[]): void {
  for (const event of events) {
    switch (event.type) {
      case 'playerKilled':
        playerDeathsTotal.labels(event.cause).inc();
        break;
      case 'levelCleared':
        levelsClearedTotal.labels(event.theme).inc();
        break;
      case 'coin':
        coinsCollectedTotal.inc();
        break;
      case 'enemyDefeated':
        enemiesDefeatedTotal.labels(event.kind, event.by).inc();
        break;
      default:
        break;
    }
  }
}

export function recordTick(entityCount: number, startedAt?: bigint): void {
  ticksTotal.inc();
  liveEntities.set(entityCount);
  if (startedAt) {
    const diffNs = Number(process.hrtime.bigint() - startedAt);
    tickDurationSeconds.observe(diffNs / 1_000_000_000);
  }
}
