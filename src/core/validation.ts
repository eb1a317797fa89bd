import { z } from 'zod';
import type { AppSettings, WeightConfig } from './app-types';
import { InvalidWeightsError } from './errors';

export const weightConfigSchema = z
  .object({
    minCommits: z.number().int().min(0),
    maxCommits: z.number().int().min(0),
    weekendWeight: z.number().finite().min(0),
    weekdayWeight: z.number().min(0).max(1),
    holidayWeight: z.number().finite().min(0),
    vacationWeeksPerYear: z.number().int().min(0).max(10),
  })
  .refine((w) => w.minCommits <= w.maxCommits, {
    message: 'min-commits cannot be greater than max-commits',
    path: ['minCommits'],
  });

/** Shape of the optional settings file; every key may be left out. */
export const settingsFileSchema = z
  .object({
    minCommits: z.number().int().min(0),
    maxCommits: z.number().int().min(0),
    weekendWeight: z.number().finite().min(0),
    weekdayWeight: z.number().min(0).max(1),
    holidayWeight: z.number().finite().min(0),
    vacationWeeksPerYear: z.number().int().min(0).max(10),
    holidayCountry: z.string().min(2),
    sampleSize: z.number().int().min(0),
  })
  .partial()
  .strict() satisfies z.ZodType<Partial<AppSettings>>;

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Validates merged weights before they reach the scheduler.
 */
export function parseWeightConfig(input: WeightConfig): WeightConfig {
  const result = weightConfigSchema.safeParse(input);
  if (!result.success) throw new InvalidWeightsError(describeIssues(result.error));
  return result.data;
}
