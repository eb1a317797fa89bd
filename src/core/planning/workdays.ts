import { WEEKDAY_WEIGHT_LOW, WEEKDAY_WEIGHT_MEDIUM } from '../constants';
import type { RandomSource } from '../random';

const WEEKDAYS = [0, 1, 2, 3, 4] as const;

/**
 * How many weekdays of a week carry commits, as an inclusive range.
 */
export function workdayCountRange(weekdayWeight: number): [number, number] {
  if (weekdayWeight < WEEKDAY_WEIGHT_LOW) return [1, 2];
  if (weekdayWeight < WEEKDAY_WEIGHT_MEDIUM) return [2, 3];
  return [3, 4];
}

/** Weekday indices (0=Monday .. 4=Friday) that get commits this week. */
export function selectWorkdays(weekdayWeight: number, random: RandomSource): Set<number> {
  const [min, max] = workdayCountRange(weekdayWeight);
  return new Set(random.sample(WEEKDAYS, random.int(min, max)));
}
