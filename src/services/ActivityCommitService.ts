import { appendFile } from 'node:fs/promises';
import path from 'node:path';
import type { ApplyActivity } from '../core/app-types';
import { ACTIVITY_COMMIT_MESSAGE, ACTIVITY_LOG_FILE, ACTIVITY_LOG_LINE_PREFIX } from '../core/constants';
import { formatGitTimestamp, formatIsoTimestamp } from '../core/date-utils';
import type { GitRepositoryService } from './GitRepositoryService';

/**
 * Records one activity event: a line appended to `activity.log` and a
 * commit backdated to the event's timestamp.
 */
export class ActivityCommitService {
  private readonly logPath: string;

  constructor(private readonly git: GitRepositoryService) {
    this.logPath = path.join(git.repoPath, ACTIVITY_LOG_FILE);
  }

  async apply(timestamp: Date): Promise<string> {
    // appendFile creates the log on first use
    await appendFile(this.logPath, `${ACTIVITY_LOG_LINE_PREFIX} ${formatIsoTimestamp(timestamp)}\n`, 'utf8');
    return this.git.commitFile(ACTIVITY_LOG_FILE, ACTIVITY_COMMIT_MESSAGE, formatGitTimestamp(timestamp));
  }

  asApply(): ApplyActivity {
    return async (timestamp) => {
      await this.apply(timestamp);
    };
  }
}
