import { describe, it, expect } from 'vitest';
import { parseWeightConfig, settingsFileSchema } from './validation';
import { DEFAULT_SETTINGS, type WeightConfig } from './app-types';
import { InvalidWeightsError } from './errors';

const base: WeightConfig = {
  minCommits: 1,
  maxCommits: 3,
  weekendWeight: 1.5,
  weekdayWeight: 0.2,
  holidayWeight: 0.3,
  vacationWeeksPerYear: 2,
};

describe('validation', () => {
  it('accepts the defaults', () => {
    expect(parseWeightConfig(DEFAULT_SETTINGS)).toEqual(base);
  });

  it('rejects min-commits above max-commits', () => {
    expect(() => parseWeightConfig({ ...base, minCommits: 4 })).toThrow(
      'minCommits: min-commits cannot be greater than max-commits',
    );
  });

  it('rejects weights outside their bounds', () => {
    expect(() => parseWeightConfig({ ...base, weekdayWeight: 1.2 })).toThrow(InvalidWeightsError);
    expect(() => parseWeightConfig({ ...base, weekendWeight: -0.5 })).toThrow(InvalidWeightsError);
    expect(() => parseWeightConfig({ ...base, holidayWeight: -1 })).toThrow(InvalidWeightsError);
    expect(() => parseWeightConfig({ ...base, vacationWeeksPerYear: 11 })).toThrow(InvalidWeightsError);
    expect(() => parseWeightConfig({ ...base, minCommits: 1.5 })).toThrow(InvalidWeightsError);
  });

  it('rejects unbounded weekend and holiday weights', () => {
    expect(() => parseWeightConfig({ ...base, weekendWeight: Infinity })).toThrow(InvalidWeightsError);
    expect(() => parseWeightConfig({ ...base, holidayWeight: Number.POSITIVE_INFINITY })).toThrow(
      'holidayWeight: Number must be finite',
    );
  });

  it('allows partial settings files but no unknown keys', () => {
    expect(settingsFileSchema.safeParse({ holidayCountry: 'DE' }).success).toBe(true);
    expect(settingsFileSchema.safeParse({ holidayWeigth: 0.5 }).success).toBe(false);
  });
});
