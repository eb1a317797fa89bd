export type RandomFloat = () => number;

/**
 * Source of every random draw the scheduler makes.
 */
export interface RandomSource {
  /** Uniform integer in `[min, max]`, both inclusive. */
  int(min: number, max: number): number;
  /** Uniform float in `[0, 1)`. */
  float(): number;
  /** `count` distinct items, without replacement. */
  sample<T>(items: readonly T[], count: number): T[];
}

export const createRandomSource = (next: RandomFloat = Math.random): RandomSource => ({
  int: (min, max) => min + Math.floor(next() * (max - min + 1)),
  float: () => next(),
  sample: <T>(items: readonly T[], count: number): T[] => {
    const pool = [...items];
    const picked: T[] = [];
    const n = Math.min(count, pool.length);
    // Partial Fisher-Yates
    for (let i = 0; i < n; i++) {
      const j = i + Math.floor(next() * (pool.length - i));
      [pool[i], pool[j]] = [pool[j], pool[i]];
      picked.push(pool[i]);
    }
    return picked;
  },
});

export const createSeededRandom = (seed: number): RandomFloat => {
  let state = seed >>> 0;
  return () => {
    state = (1664525 * state + 1013904223) % 4294967296;
    return state / 4294967296;
  };
};
