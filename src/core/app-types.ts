// src/core/app-types.ts

/**
 * Weighting knobs for one scheduling run.
 */
export interface WeightConfig {
  minCommits: number;
  maxCommits: number;
  /** Above 1.0 adds extra commits on weekends, below 1.0 skips some weekends. */
  weekendWeight: number;
  /** Decides how many weekdays of each week get commits. */
  weekdayWeight: number;
  holidayWeight: number;
  vacationWeeksPerYear: number;
}

/**
 * Defines the shape of all user-configurable settings for the tool.
 */
export interface AppSettings extends WeightConfig {
  holidayCountry: string;
  sampleSize: number;
}

/**
 * Default values for all application settings.
 */
export const DEFAULT_SETTINGS: AppSettings = {
  minCommits: 1,
  maxCommits: 3,
  weekendWeight: 1.5,
  weekdayWeight: 0.2,
  holidayWeight: 0.3,
  vacationWeeksPerYear: 2,
  holidayCountry: 'US',
  sampleSize: 10,
};

// Calendar days are held as UTC-midnight Dates and carry no timezone meaning
export interface DateRange {
  start: Date;
  end: Date;
}

export type DayISO = string; // e.g., "2024-01-01"

export interface WorkTime {
  hour: number;
  minute: number;
  second: number;
}

/**
 * Weekdays (0=Monday .. 4=Friday) picked for the week starting on `weekStart`.
 */
export interface WeekWorkdaySelection {
  weekStart: DayISO;
  selectedWeekdays: ReadonlySet<number>;
}

/**
 * A unit of history already recorded in the repository.
 */
export interface ChangeRecord {
  id: string;
  parentIds: string[];
  changedPaths: ReadonlySet<string>;
}

export type RollbackTarget<T extends ChangeRecord = ChangeRecord> = T | 'root';

export type ApplyActivity = (timestamp: Date) => Promise<void>;

export type ProgressCallback = (current: number, total: number, timestamp: Date) => void;
