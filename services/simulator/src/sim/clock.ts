import { performance } from 'node:perf_hooks';

/** Wall-clock source sampled once per tick to drive the stage timer. */
export interface Clock {
  nowMs(): number;
}

export const systemClock: Clock = {
  nowMs: () => performance.now(),
};

export class ManualClock implements Clock {
  constructor(private current = 0) {}

  nowMs(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}
