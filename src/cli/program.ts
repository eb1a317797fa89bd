import { Command } from 'commander';
import { DEFAULT_SETTINGS } from '../core/app-types';
import { runClear, runGenerate, type CommandDeps } from './commands';
import { parseInteger, parseNumber } from './format';

interface GenerateFlags {
  startDate: string;
  endDate: string;
  minCommits?: number;
  maxCommits?: number;
  weekendWeight?: number;
  weekdayWeight?: number;
  holidayWeight?: number;
  vacationWeeks?: number;
  country?: string;
  dryRun: boolean;
  repoPath?: string;
}

interface ClearFlags {
  dryRun: boolean;
  repoPath?: string;
}

export function createProgram(deps: CommandDeps = {}): Command {
  const program = new Command();
  const d = DEFAULT_SETTINGS;

  program
    .name('activity-backfill')
    .description('Generate backdated git commits to fill in repository activity')
    // -h is the holiday weight
    .helpOption('--help', 'display help for command');

  program
    .command('generate', { isDefault: true })
    .description('Create trivial commits appending to activity.log, backdated across a date range')
    .helpOption('--help', 'display help for command')
    .requiredOption('-s, --start-date <date>', "start date (e.g. '2024-01-01' or 'January 1, 2024')")
    .requiredOption('-e, --end-date <date>', "end date (e.g. '2024-12-31' or 'December 31, 2024')")
    .option('-n, --min-commits <count>', `minimum commits per day (default: ${d.minCommits})`, parseInteger)
    .option('-x, --max-commits <count>', `maximum commits per day (default: ${d.maxCommits})`, parseInteger)
    .option('-w, --weekend-weight <weight>', `weekend activity multiplier (default: ${d.weekendWeight})`, parseNumber)
    .option('--weekday-weight <weight>', `share of weekdays with commits, 0-1 (default: ${d.weekdayWeight})`, parseNumber)
    .option('-h, --holiday-weight <weight>', `holiday activity multiplier (default: ${d.holidayWeight})`, parseNumber)
    .option('-v, --vacation-weeks <weeks>', `vacation weeks per year, 0-10 (default: ${d.vacationWeeksPerYear})`, parseInteger)
    .option('-c, --country <code>', `holiday calendar country (default: ${d.holidayCountry})`)
    .option('-d, --dry-run', 'preview commits without creating them', false)
    .option('-r, --repo-path <path>', 'path to the git repository (defaults to the current directory)')
    .action(async (flags: GenerateFlags) => {
      await runGenerate(
        {
          startDate: flags.startDate,
          endDate: flags.endDate,
          minCommits: flags.minCommits,
          maxCommits: flags.maxCommits,
          weekendWeight: flags.weekendWeight,
          weekdayWeight: flags.weekdayWeight,
          holidayWeight: flags.holidayWeight,
          vacationWeeksPerYear: flags.vacationWeeks,
          country: flags.country,
          dryRun: flags.dryRun,
          repoPath: flags.repoPath,
        },
        deps,
      );
    });

  program
    .command('clear')
    .description('Remove all commits that only modified activity.log')
    .helpOption('--help', 'display help for command')
    .option('-d, --dry-run', 'preview what would be removed without removing anything', false)
    .option('-r, --repo-path <path>', 'path to the git repository (defaults to the current directory)')
    .action(async (flags: ClearFlags) => {
      await runClear({ dryRun: flags.dryRun, repoPath: flags.repoPath }, deps);
    });

  return program;
}
