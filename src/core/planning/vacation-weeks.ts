import type { DateRange, DayISO } from '../app-types';
import { DAYS_PER_YEAR } from '../constants';
import { weekStart, weekTouchesHolidayPeriod } from '../calendar';
import { addDays, daysBetween, iso } from '../date-utils';
import type { RandomSource } from '../random';

/**
 * Mondays whose week may become a vacation week, oldest first. Weeks that
 * overlap the Christmas / New Year season are skipped, since they are
 * already quiet.
 */
export function vacationCandidates(range: DateRange): Date[] {
  const candidates: Date[] = [];
  for (let monday = weekStart(range.start); monday.getTime() <= range.end.getTime(); monday = addDays(monday, 7)) {
    if (!weekTouchesHolidayPeriod(monday)) candidates.push(monday);
  }
  return candidates;
}

/**
 * Picks the week starts that get no activity at all, spread evenly across
 * the range with a +/- one week wobble.
 */
export function planVacationWeeks(
  range: DateRange,
  vacationWeeksPerYear: number,
  random: RandomSource,
): Set<DayISO> {
  const totalDays = daysBetween(range.start, range.end);
  const totalWeeks = Math.floor(totalDays / 7);
  const years = totalDays / DAYS_PER_YEAR;

  const target = Math.min(Math.max(1, Math.floor(years * vacationWeeksPerYear)), totalWeeks);
  if (target <= 0) return new Set();

  const candidates = vacationCandidates(range);
  if (candidates.length <= target) return new Set(candidates.map(iso));

  const interval = candidates.length / target;
  const weeks = new Set<DayISO>();
  for (let i = 0; i < target; i++) {
    const index = Math.floor(i * interval) + random.int(-1, 1);
    const clamped = Math.max(0, Math.min(candidates.length - 1, index));
    // Two picks may land on the same week
    weeks.add(iso(candidates[clamped]));
  }
  return weeks;
}
