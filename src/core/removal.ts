import type { ChangeRecord, RollbackTarget } from './app-types';
import { ACTIVITY_LOG_FILE } from './constants';

/** True when the record touched `activity.log` and nothing else. */
export function isRemovable(record: ChangeRecord): boolean {
  return record.changedPaths.size === 1 && record.changedPaths.has(ACTIVITY_LOG_FILE);
}

export function findRemovable<T extends ChangeRecord>(history: readonly T[]): T[] {
  return history.filter(isRemovable);
}

/**
 * Scans oldest-first for the first record not being removed. When activity
 * commits sit between older and newer real commits, the reset lands on the
 * earliest survivor and the newer real commits go too.
 */
export function resolveRollbackTarget<T extends ChangeRecord>(
  historyOldestFirst: readonly T[],
  removable: readonly T[],
): RollbackTarget<T> {
  const removableIds = new Set(removable.map((r) => r.id));
  return historyOldestFirst.find((record) => !removableIds.has(record.id)) ?? 'root';
}
