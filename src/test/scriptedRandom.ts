import { vi } from 'vitest';
import type { RandomSource } from '../core/random';

interface Script {
  ints?: number[];
  floats?: number[];
}

/**
 * A RandomSource that replays fixed draws and fails on any draw it was not
 * given. `sample` takes the first `count` items.
 */
export function scriptedRandom(script: Script = {}) {
  const ints = [...(script.ints ?? [])];
  const floats = [...(script.floats ?? [])];

  return {
    int: vi.fn((min: number, max: number): number => {
      const next = ints.shift();
      if (next === undefined) throw new Error(`Unexpected int(${min}, ${max}) draw`);
      return next;
    }),
    float: vi.fn((): number => {
      const next = floats.shift();
      if (next === undefined) throw new Error('Unexpected float() draw');
      return next;
    }),
    sample<T>(items: readonly T[], count: number): T[] {
      return items.slice(0, count);
    },
  } satisfies RandomSource;
}
