import Holidays from 'date-holidays';
import type { DayISO } from '../core/app-types';
import type { HolidayCalendar } from '../core/calendar';
import { iso } from '../core/date-utils';
import { UnknownHolidayCountryError } from '../core/errors';

/**
 * Public holidays of one country, observed days included, looked up by
 * calendar day. Each year is loaded once.
 */
export class HolidayCalendarService {
  private readonly holidays: Holidays;
  private readonly byYear = new Map<number, Set<DayISO>>();

  constructor(readonly country: string) {
    this.holidays = new Holidays();
    if (!this.holidays.init(country)) {
      throw new UnknownHolidayCountryError(country);
    }
  }

  public isHoliday(day: Date): boolean {
    return this.daysOf(day.getUTCFullYear()).has(iso(day));
  }

  public asCalendar(): HolidayCalendar {
    return (day) => this.isHoliday(day);
  }

  private daysOf(year: number): Set<DayISO> {
    let days = this.byYear.get(year);
    if (!days) {
      days = new Set(
        this.holidays
          .getHolidays(year)
          .filter((h) => h.type === 'public')
          // "2024-07-04 00:00:00"
          .map((h) => h.date.slice(0, 10)),
      );
      this.byYear.set(year, days);
    }
    return days;
  }
}
