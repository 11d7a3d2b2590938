import { describe, expect, it } from 'vitest';

import { createRng } from './rng';

describe('sim/rng', () => {
  it('replays the same sequence for the same seed', () => {
    const a = createRng('replay');
    const b = createRng('replay');
    const left = Array.from({ length: 5 }, () => a.next());
    const right = Array.from({ length: 5 }, () => b.next());
    expect(left).toEqual(right);
    expect(a.seed).toBe('replay');
  });

  it('keeps integers inside the inclusive range', () => {
    const rng = createRng('bounds');
    const values = Array.from({ length: 200 }, () => rng.int(-2, 3));
    expect(Math.min(...values)).toBeGreaterThanOrEqual(-2);
    expect(Math.max(...values)).toBeLessThanOrEqual(3);
    expect(values.every((value) => Number.isInteger(value))).toBe(true);
  });

  it('returns the lower bound for an empty range', () => {
    expect(createRng('flat').int(4, 4)).toBe(4);
  });

  it('picks from the list and refuses an empty one', () => {
    const rng = createRng('pick');
    expect(['a', 'b', 'c']).toContain(rng.pick(['a', 'b', 'c']));
    expect(() => rng.pick([])).toThrow(RangeError);
  });

  it('has no seed when created unseeded', () => {
    expect(createRng().seed).toBeNull();
  });
});
