import { access, rm } from 'node:fs/promises';
import path from 'node:path';
import { simpleGit, type SimpleGit } from 'simple-git';
import type { ChangeRecord, RollbackTarget } from '../core/app-types';
import { NotAGitRepositoryError } from '../core/errors';

// Environment handed to git when committing. TZ decides how git reads the
// naive commit date; the agent variables keep signed commits working.
const PASSTHROUGH_ENV = [
  'PATH',
  'HOME',
  'USERPROFILE',
  'SystemRoot',
  'XDG_CONFIG_HOME',
  'TZ',
  'LANG',
  'LC_ALL',
  'GNUPGHOME',
  'GPG_TTY',
  'SSH_AUTH_SOCK',
  'GIT_AUTHOR_NAME',
  'GIT_AUTHOR_EMAIL',
  'GIT_COMMITTER_NAME',
  'GIT_COMMITTER_EMAIL',
];

export class GitRepositoryService {
  constructor(
    readonly repoPath: string,
    private readonly git: SimpleGit = simpleGit(repoPath),
  ) {}

  public static async assertRepository(repoPath: string): Promise<void> {
    try {
      await access(path.join(repoPath, '.git'));
    } catch {
      throw new NotAGitRepositoryError(repoPath);
    }
  }

  /**
   * Stages `file` and commits it alone, with author and committer dates
   * both set to `date` (`YYYY-MM-DD HH:MM:SS`, read as local time).
   */
  public async commitFile(file: string, message: string, date: string): Promise<string> {
    await this.git.add(file);
    const result = await this.git.env(commitEnv(date)).commit(message, [file]);
    return result.commit;
  }

  /**
   * Every commit reachable from HEAD, newest first. Root commits report the
   * files they introduced; others the paths that differ from their first
   * parent.
   */
  public async listHistory(): Promise<ChangeRecord[]> {
    // Unborn HEAD: no commits yet, or every commit was rolled back
    const head = await this.git.raw(['rev-parse', '--verify', '-q', 'HEAD']);
    if (head.trim() === '') return [];

    const lines = (await this.git.raw(['rev-list', '--parents', 'HEAD'])).split('\n').filter((l) => l.trim() !== '');

    const records: ChangeRecord[] = [];
    for (const line of lines) {
      const [id, ...parentIds] = line.trim().split(' ');
      records.push({ id, parentIds, changedPaths: await this.changedPaths(id, parentIds[0]) });
    }
    return records;
  }

  /**
   * Hard-resets to `target`, or for "root" drops the whole branch history
   * and deletes `trackedFile` from the index and the working copy.
   */
  public async rollbackTo(target: RollbackTarget, trackedFile: string): Promise<void> {
    if (target === 'root') {
      console.info('[git] removing all history');
      await this.git.raw(['update-ref', '-d', 'HEAD']);
      await this.git.raw(['rm', '--cached', '-q', '--ignore-unmatch', '--', trackedFile]);
      await rm(path.join(this.repoPath, trackedFile), { force: true });
      return;
    }

    console.info(`[git] resetting to ${target.id}`);
    await this.git.reset(['--hard', target.id]);
  }

  private async changedPaths(id: string, firstParent: string | undefined): Promise<Set<string>> {
    const output = firstParent
      ? await this.git.raw(['diff', '--name-only', '--no-renames', '-z', firstParent, id])
      : await this.git.raw(['diff-tree', '--root', '--no-commit-id', '--name-only', '-r', '-z', id]);
    return new Set(output.split('\0').filter((p) => p !== ''));
  }
}

function commitEnv(date: string): Record<string, string> {
  const env: Record<string, string> = {};
  for (const key of PASSTHROUGH_ENV) {
    const value = process.env[key];
    if (value !== undefined) env[key] = value;
  }
  env.GIT_AUTHOR_DATE = date;
  env.GIT_COMMITTER_DATE = date;
  return env;
}
