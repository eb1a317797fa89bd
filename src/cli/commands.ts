import path from 'node:path';
import { ActivityScheduler } from '../core/ActivityScheduler';
import type { WeightConfig } from '../core/app-types';
import { parseDay } from '../core/date-utils';
import type { RandomSource } from '../core/random';
import { parseWeightConfig } from '../core/validation';
import { ActivityCommitService } from '../services/ActivityCommitService';
import { GitRepositoryService } from '../services/GitRepositoryService';
import { HistoryCleanupService } from '../services/HistoryCleanupService';
import { HolidayCalendarService } from '../services/HolidayCalendarService';
import { SettingsService } from '../services/SettingsService';
import { consoleOutput, formatCommitLine, formatTable, type Output } from './format';

export interface GenerateCommandOptions extends Partial<WeightConfig> {
  startDate: string;
  endDate: string;
  dryRun?: boolean;
  repoPath?: string;
  country?: string;
}

export interface ClearCommandOptions {
  dryRun?: boolean;
  repoPath?: string;
}

export interface CommandDeps {
  output?: Output;
  random?: RandomSource;
  openRepository?: (repoPath: string) => GitRepositoryService;
}

const openGitRepository = (repoPath: string) => new GitRepositoryService(repoPath);

/**
 * Generates (or previews) backdated activity commits and reports them.
 * Returns the timestamps that were, or would be, committed.
 */
export async function runGenerate(options: GenerateCommandOptions, deps: CommandDeps = {}): Promise<Date[]> {
  const out = deps.output ?? consoleOutput;
  const repoPath = path.resolve(options.repoPath ?? process.cwd());
  const settings = new SettingsService(repoPath);

  const weights = parseWeightConfig(
    await settings.getWeights({
      minCommits: options.minCommits,
      maxCommits: options.maxCommits,
      weekendWeight: options.weekendWeight,
      weekdayWeight: options.weekdayWeight,
      holidayWeight: options.holidayWeight,
      vacationWeeksPerYear: options.vacationWeeksPerYear,
    }),
  );
  await GitRepositoryService.assertRepository(repoPath);

  const range = { start: parseDay(options.startDate), end: parseDay(options.endDate) };
  const country = options.country ?? (await settings.get('holidayCountry'));
  const sampleSize = await settings.get('sampleSize');
  const dryRun = options.dryRun ?? false;

  out.log();
  out.log('Activity Backfill - Git Activity Generator');
  out.log();
  for (const line of formatTable('Configuration', [
    ['Repository', repoPath],
    ['Date Range', `${options.startDate} to ${options.endDate}`],
    ['Commits per Day', `${weights.minCommits} - ${weights.maxCommits}`],
    ['Weekend Weight', `${weights.weekendWeight}x`],
    ['Weekday Weight', `${weights.weekdayWeight}x`],
    ['Holiday Weight', `${weights.holidayWeight}x`],
    ['Holiday Calendar', country],
    ['Vacation Weeks/Year', String(weights.vacationWeeksPerYear)],
    ['Mode', dryRun ? 'DRY RUN' : 'LIVE'],
  ])) {
    out.log(line);
  }
  out.log();

  const git = (deps.openRepository ?? openGitRepository)(repoPath);
  const scheduler = new ActivityScheduler({
    apply: new ActivityCommitService(git).asApply(),
    holidays: new HolidayCalendarService(country).asCalendar(),
    random: deps.random,
  });

  const label = dryRun ? 'Simulating commits...' : 'Creating commits...';
  const commits = await scheduler.generate(range, weights, {
    preview: dryRun,
    onProgress: (current, total) => out.progress(`${label} ${current}/${total}`),
  });
  if (commits.length > 0) out.progress('\n');

  out.log();
  out.log(`✓ Successfully ${dryRun ? 'simulated' : 'created'} ${commits.length} commit(s)`);
  out.log();

  if (commits.length > 0) {
    const shown = Math.min(sampleSize, commits.length);
    out.log(`Showing first ${shown} commits:`);
    out.log();
    commits.slice(0, shown).forEach((ts, i) => out.log(formatCommitLine(i + 1, ts)));
    if (commits.length > shown) {
      out.log();
      out.log(`  ... and ${commits.length - shown} more`);
    }
  }

  out.log();
  if (dryRun) {
    out.log('This was a dry run. No commits were created.');
    out.log('Remove --dry-run flag to create actual commits.');
  } else {
    out.log('Commits have been created with backdated timestamps.');
    out.log("Use 'git log' to view the commit history.");
  }

  return commits;
}

/**
 * Removes (or counts) every commit that only touched activity.log.
 */
export async function runClear(options: ClearCommandOptions, deps: CommandDeps = {}): Promise<number> {
  const out = deps.output ?? consoleOutput;
  const repoPath = path.resolve(options.repoPath ?? process.cwd());
  await GitRepositoryService.assertRepository(repoPath);
  const dryRun = options.dryRun ?? false;

  out.log();
  out.log('Activity Backfill - Clear Activity Commits');
  out.log();
  if (dryRun) {
    out.log('DRY RUN MODE - No commits will be removed');
    out.log();
  }

  const cleanup = new HistoryCleanupService((deps.openRepository ?? openGitRepository)(repoPath));
  const { removed } = await cleanup.clear({ dryRun });

  if (removed.length === 0) {
    out.log('No activity.log commits found to remove.');
    return 0;
  }

  out.log(`✓ ${removed.length} commit(s) ${dryRun ? 'would be removed' : 'removed'}`);
  out.log();
  if (dryRun) {
    out.log('This was a dry run. No commits were removed.');
    out.log('Remove --dry-run flag to actually remove commits.');
  } else {
    out.log('Activity commits have been removed.');
    out.log("Use 'git log' to verify the commit history.");
    out.log();
    out.log("WARNING: If you've already pushed these commits, you'll need to force push to update the remote.");
  }
  return removed.length;
}
