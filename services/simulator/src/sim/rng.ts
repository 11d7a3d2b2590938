import seedrandom from 'seedrandom';

/**
 * Uniform random source for generation and gameplay rolls. Everything that needs
 * randomness takes one of these so a fixed seed replays identically.
 */
export interface Rng {
  readonly seed: string | null;
  /** Float in [0, 1). */
  next(): number;
  /** Integer in [min, max], both inclusive. */
  int(min: number, max: number): number;
  chance(probability: number): boolean;
  uniform(min: number, max: number): number;
  pick<T>(items: readonly T[]): T;
}

export function createRng(seed?: string): Rng {
  const prng = seed === undefined ? seedrandom() : seedrandom(seed);
  const next = (): number => prng();

  return {
    seed: seed ?? null,
    next,
    int: (min, max) => {
      if (max <= min) {
        return min;
      }
      return min + Math.floor(next() * (max - min + 1));
    },
    chance: (probability) => next() < probability,
    uniform: (min, max) => min + (max - min) * next(),
    pick: (items) => {
      if (items.length === 0) {
        throw new RangeError('Cannot pick from an empty list');
      }
      return items[Math.floor(next() * items.length)];
    },
  };
}
