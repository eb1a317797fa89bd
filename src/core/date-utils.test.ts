import { describe, it, expect } from 'vitest';
import {
  addDays,
  atTime,
  daysBetween,
  enumerateDays,
  formatGitTimestamp,
  formatIsoTimestamp,
  iso,
  parseDay,
  weekdayIndex,
  weekdayName,
} from './date-utils';
import { InvalidDateError } from './errors';

describe('date-utils', () => {
  it('parses ISO days as UTC midnight', () => {
    expect(parseDay('2024-01-01').toISOString()).toBe('2024-01-01T00:00:00.000Z');
    expect(parseDay(' 2024-02-29 ').toISOString()).toBe('2024-02-29T00:00:00.000Z');
  });

  it('parses written-out dates to the day they name', () => {
    expect(iso(parseDay('January 1, 2024'))).toBe('2024-01-01');
    expect(iso(parseDay('December 31, 2024'))).toBe('2024-12-31');
  });

  it('rejects impossible and unreadable dates', () => {
    expect(() => parseDay('2023-02-29')).toThrow(InvalidDateError);
    expect(() => parseDay('not a date')).toThrow('Unrecognized date: "not a date"');
    expect(() => parseDay('')).toThrow(InvalidDateError);
  });

  it('counts whole days between calendar days', () => {
    expect(daysBetween(parseDay('2024-01-01'), parseDay('2024-01-07'))).toBe(6);
    expect(daysBetween(parseDay('2024-01-01'), parseDay('2025-01-01'))).toBe(366);
  });

  it('adds days across month and year boundaries', () => {
    expect(iso(addDays(parseDay('2024-12-30'), 3))).toBe('2025-01-02');
    expect(iso(addDays(parseDay('2024-03-01'), -1))).toBe('2024-02-29');
  });

  it('indexes weekdays from Monday', () => {
    expect(weekdayIndex(parseDay('2024-01-01'))).toBe(0); // Monday
    expect(weekdayIndex(parseDay('2024-01-05'))).toBe(4); // Friday
    expect(weekdayIndex(parseDay('2024-01-06'))).toBe(5); // Saturday
    expect(weekdayIndex(parseDay('2024-01-07'))).toBe(6); // Sunday
    expect(weekdayName(parseDay('2024-01-07'))).toBe('Sunday');
  });

  it('enumerates days inclusive of both ends', () => {
    const days = enumerateDays({ start: parseDay('2024-02-27'), end: parseDay('2024-03-01') });
    expect(days.map(iso)).toEqual(['2024-02-27', '2024-02-28', '2024-02-29', '2024-03-01']);
  });

  it('formats timestamps without offset', () => {
    const ts = atTime(parseDay('2024-01-02'), { hour: 9, minute: 5, second: 7 });
    expect(formatIsoTimestamp(ts)).toBe('2024-01-02T09:05:07');
    expect(formatGitTimestamp(ts)).toBe('2024-01-02 09:05:07');
  });
});
