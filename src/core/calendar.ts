import { HOLIDAY_SEASON_END_DAY, HOLIDAY_SEASON_START_DAY } from './constants';
import { addDays, iso, weekdayIndex } from './date-utils';

/**
 * Answers whether a calendar day is a public holiday. Backed by a holiday
 * data provider in production; tests pass a fixed table.
 */
export type HolidayCalendar = (day: Date) => boolean;

export const NO_HOLIDAYS: HolidayCalendar = () => false;

export function holidayTable(days: Iterable<string>): HolidayCalendar {
  const set = new Set(days);
  return (day) => set.has(iso(day));
}

export function isWeekend(day: Date): boolean {
  return weekdayIndex(day) >= 5;
}

/** The Monday on or before `day`. */
export function weekStart(day: Date): Date {
  return addDays(day, -weekdayIndex(day));
}

/** Dec 20 .. Jan 7, when activity is already low. */
export function isMajorHolidayPeriod(day: Date): boolean {
  const month = day.getUTCMonth() + 1;
  const date = day.getUTCDate();
  return (month === 12 && date >= HOLIDAY_SEASON_START_DAY) || (month === 1 && date <= HOLIDAY_SEASON_END_DAY);
}

export function weekTouchesHolidayPeriod(monday: Date): boolean {
  for (let offset = 0; offset < 7; offset++) {
    if (isMajorHolidayPeriod(addDays(monday, offset))) return true;
  }
  return false;
}
