import type { ChangeRecord } from '../core/app-types';
import { ACTIVITY_LOG_FILE } from '../core/constants';
import { findRemovable, resolveRollbackTarget } from '../core/removal';
import type { GitRepositoryService } from './GitRepositoryService';

interface ClearOptions {
  dryRun?: boolean;
}

export interface ClearResult {
  removed: ChangeRecord[];
  /** Where history was (or would be) reset to; null when nothing matched. */
  target: ChangeRecord | 'root' | null;
}

/**
 * Finds every commit that only touched `activity.log` and discards it by
 * resetting the branch.
 */
export class HistoryCleanupService {
  constructor(private readonly git: GitRepositoryService) {}

  async clear(options: ClearOptions = {}): Promise<ClearResult> {
    const history = await this.git.listHistory();
    const removed = findRemovable(history);
    if (removed.length === 0) return { removed, target: null };

    const target = resolveRollbackTarget([...history].reverse(), removed);
    if (!options.dryRun) {
      await this.git.rollbackTo(target, ACTIVITY_LOG_FILE);
    }
    return { removed, target };
  }
}
