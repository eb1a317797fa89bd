import type { DateRange, DayISO, WorkTime } from './app-types';
import { InvalidDateError } from './errors';

const ISO_DAY = /^(\d{4})-(\d{2})-(\d{2})$/;

const WEEKDAY_NAMES = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];

export function dayOf(year: number, month: number, day: number): Date {
  return new Date(Date.UTC(year, month - 1, day));
}

/** Drops the time of day, keeping the UTC calendar day. */
export function startOfDayUTC(date: Date): Date {
  return dayOf(date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate());
}

/**
 * Parses user-supplied date text into a calendar day.
 * `YYYY-MM-DD` is read as-is; anything else goes through the runtime parser
 * (e.g. "January 1, 2024") and keeps the local calendar day it names.
 */
export function parseDay(text: string): Date {
  const trimmed = text.trim();
  const iso = ISO_DAY.exec(trimmed);
  if (iso) {
    const [y, m, d] = [iso[1], iso[2], iso[3]].map((s) => parseInt(s, 10));
    const day = dayOf(y, m, d);
    if (day.getUTCMonth() !== m - 1 || day.getUTCDate() !== d) throw new InvalidDateError(text);
    return day;
  }

  const parsed = new Date(trimmed);
  if (trimmed === '' || Number.isNaN(parsed.getTime())) throw new InvalidDateError(text);
  return dayOf(parsed.getFullYear(), parsed.getMonth() + 1, parsed.getDate());
}

export function addDays(day: Date, days: number): Date {
  const next = new Date(day.getTime());
  next.setUTCDate(next.getUTCDate() + days);
  return next;
}

export function daysBetween(start: Date, end: Date): number {
  return Math.round((startOfDayUTC(end).getTime() - startOfDayUTC(start).getTime()) / 86_400_000);
}

/** Monday = 0 .. Sunday = 6 */
export function weekdayIndex(day: Date): number {
  return (day.getUTCDay() + 6) % 7;
}

export function weekdayName(date: Date): string {
  return WEEKDAY_NAMES[date.getUTCDay()];
}

export function enumerateDays(range: DateRange): Date[] {
  const days: Date[] = [];
  const d = startOfDayUTC(range.start);
  const last = startOfDayUTC(range.end);
  // Inclusive of start and end
  while (d.getTime() <= last.getTime()) {
    days.push(new Date(d));
    d.setUTCDate(d.getUTCDate() + 1);
  }
  return days;
}

export function iso(day: Date): DayISO {
  return day.toISOString().split('T')[0];
}

export function atTime(day: Date, time: WorkTime): Date {
  return new Date(Date.UTC(
    day.getUTCFullYear(),
    day.getUTCMonth(),
    day.getUTCDate(),
    time.hour, time.minute, time.second,
  ));
}

/** `YYYY-MM-DDTHH:MM:SS`, no fraction and no offset. */
export function formatIsoTimestamp(timestamp: Date): string {
  return timestamp.toISOString().slice(0, 19);
}

/** `YYYY-MM-DD HH:MM:SS`, the form git reads as a local date. */
export function formatGitTimestamp(timestamp: Date): string {
  return formatIsoTimestamp(timestamp).replace('T', ' ');
}
