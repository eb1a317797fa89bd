import { InvalidArgumentError } from 'commander';
import { formatGitTimestamp, weekdayName } from '../core/date-utils';
import {
  InvalidDateError,
  InvalidRangeError,
  InvalidSettingsError,
  InvalidWeightsError,
  NotAGitRepositoryError,
  UnknownHolidayCountryError,
} from '../core/errors';

export interface Output {
  log(message?: string): void;
  /** Rewrites the current status line. */
  progress(message: string): void;
}

export const consoleOutput: Output = {
  log: (message = '') => console.log(message),
  progress: (message) => {
    process.stdout.write(`\r${message}`);
  },
};

export function formatTable(title: string, rows: Array<[string, string]>): string[] {
  const width = Math.max(...rows.map(([label]) => label.length));
  return [title, ...rows.map(([label, value]) => `  ${label.padEnd(width)}  ${value}`)];
}

export function formatCommitLine(position: number, timestamp: Date): string {
  return `  ${String(position).padStart(2)}. ${formatGitTimestamp(timestamp)} (${weekdayName(timestamp)})`;
}

const EXPECTED_ERRORS = [
  InvalidArgumentError,
  InvalidDateError,
  InvalidRangeError,
  InvalidSettingsError,
  InvalidWeightsError,
  NotAGitRepositoryError,
  UnknownHolidayCountryError,
];

export function describeFailure(err: unknown): string {
  if (EXPECTED_ERRORS.some((type) => err instanceof type)) {
    return `Error: ${err instanceof Error ? err.message : String(err)}`;
  }
  return `Unexpected error: ${err instanceof Error ? err.message : String(err)}`;
}

export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) throw new InvalidArgumentError('Not a number.');
  return parsed;
}

export function parseInteger(value: string): number {
  const parsed = parseNumber(value);
  if (!Number.isInteger(parsed)) throw new InvalidArgumentError('Not a whole number.');
  return parsed;
}
