import type {
  ApplyActivity,
  DateRange,
  DayISO,
  ProgressCallback,
  WeekWorkdaySelection,
  WeightConfig,
  WorkTime,
} from './app-types';
import { WORK_HOUR_END, WORK_HOUR_START } from './constants';
import { isWeekend, weekStart, type HolidayCalendar } from './calendar';
import { atTime, enumerateDays, iso, startOfDayUTC, weekdayIndex } from './date-utils';
import { InvalidRangeError } from './errors';
import { planVacationWeeks } from './planning/vacation-weeks';
import { selectWorkdays } from './planning/workdays';
import { createRandomSource, type RandomSource } from './random';

export interface GenerateOptions {
  /** Compute the schedule but never call the apply collaborator. */
  preview?: boolean;
  onProgress?: ProgressCallback;
}

/**
 * State of one `generate` call. The week selection is replaced the first
 * time a day of a new week is counted.
 */
export interface SchedulingRun {
  weights: WeightConfig;
  vacationWeeks: ReadonlySet<DayISO>;
  week: WeekWorkdaySelection | null;
}

interface SchedulerDeps {
  apply: ApplyActivity;
  holidays: HolidayCalendar;
  random?: RandomSource;
}

export class ActivityScheduler {
  private readonly apply: ApplyActivity;
  private readonly isHoliday: HolidayCalendar;
  private readonly random: RandomSource;

  constructor(deps: SchedulerDeps) {
    this.apply = deps.apply;
    this.isHoliday = deps.holidays;
    this.random = deps.random ?? createRandomSource();
  }

  /**
   * Builds the chronological list of activity timestamps for the range and
   * applies them one by one, oldest first. In preview mode nothing is
   * applied, but the returned list is built the same way.
   */
  public async generate(range: DateRange, weights: WeightConfig, options: GenerateOptions = {}): Promise<Date[]> {
    const days = { start: startOfDayUTC(range.start), end: startOfDayUTC(range.end) };
    if (days.start.getTime() >= days.end.getTime()) {
      throw new InvalidRangeError();
    }

    const run = this.startRun(days, weights);
    const timestamps: Date[] = [];

    for (const day of enumerateDays(days)) {
      const count = this.commitCountFor(day, run);
      for (let i = 0; i < count; i++) {
        timestamps.push(atTime(day, this.randomWorkTime()));
      }
    }

    timestamps.sort((a, b) => a.getTime() - b.getTime());

    const total = timestamps.length;
    for (const [index, timestamp] of timestamps.entries()) {
      if (!options.preview) await this.apply(timestamp);
      options.onProgress?.(index + 1, total, timestamp);
    }

    return timestamps;
  }

  public startRun(range: DateRange, weights: WeightConfig): SchedulingRun {
    const vacationWeeks = planVacationWeeks(range, weights.vacationWeeksPerYear, this.random);
    console.debug('[scheduler] vacation weeks', [...vacationWeeks]);
    return { weights, vacationWeeks, week: null };
  }

  /**
   * Number of commits for one day. Priority: vacation week, then holiday,
   * weekend, and finally the week's selected weekdays.
   */
  public commitCountFor(day: Date, run: SchedulingRun): number {
    const week = iso(weekStart(day));
    if (run.vacationWeeks.has(week)) return 0;

    let selection = run.week;
    if (!selection || selection.weekStart !== week) {
      selection = { weekStart: week, selectedWeekdays: selectWorkdays(run.weights.weekdayWeight, this.random) };
      run.week = selection;
    }

    const { weights } = run;
    const base = this.random.int(weights.minCommits, weights.maxCommits);

    let probability: number;
    if (this.isHoliday(day)) {
      probability = weights.holidayWeight;
    } else if (isWeekend(day)) {
      probability = weights.weekendWeight;
    } else {
      if (!selection.selectedWeekdays.has(weekdayIndex(day))) return 0;
      probability = 1.0;
    }

    if (probability < 1.0) {
      return this.random.float() > probability ? 0 : base;
    }

    if (probability > 1.0) {
      const extraCap = Math.floor((probability - 1.0) * base);
      return base + this.random.int(0, extraCap);
    }

    return base;
  }

  public randomWorkTime(): WorkTime {
    return {
      hour: this.random.int(WORK_HOUR_START, WORK_HOUR_END),
      minute: this.random.int(0, 59),
      second: this.random.int(0, 59),
    };
  }
}
