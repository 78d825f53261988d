import type { RetentionPolicy, RetentionReport, Snapshot } from '../types/backup.js';
import { BackupError, errorMessage } from '../types/errors.js';
import { parseDuration } from '../utils/duration.js';
import type { Logger } from '../utils/logger.js';
import { removeArchive } from './archive-builder.js';
import type { SnapshotStore } from './snapshot-store.js';

export interface ApplyRetentionOptions {
  store: SnapshotStore;
  policy: RetentionPolicy;
  /** Restrict the sweep to one source; all sources otherwise. */
  sourcePath?: string;
  now: Date;
  dryRun?: boolean;
  logger?: Logger;
}

interface ResolvedPolicy {
  maxAgeMs: number | null;
  maxCount: number | null;
}

export function resolvePolicy(policy: RetentionPolicy): ResolvedPolicy {
  const maxAgeMs = policy.maxAge === undefined ? null : parseDuration(policy.maxAge);
  if (policy.maxCount !== undefined && (!Number.isInteger(policy.maxCount) || policy.maxCount < 0)) {
    throw new BackupError('InvalidArgument', `maxCount must be a non-negative integer, got ${policy.maxCount}.`);
  }
  return { maxAgeMs, maxCount: policy.maxCount ?? null };
}

function selectCandidates(live: readonly Snapshot[], policy: ResolvedPolicy, now: Date): Snapshot[] {
  const selected = new Set<string>();
  const bySource = new Map<string, Snapshot[]>();
  for (const snapshot of live) {
    const group = bySource.get(snapshot.sourcePath) ?? [];
    group.push(snapshot);
    bySource.set(snapshot.sourcePath, group);
  }

  for (const group of bySource.values()) {
    if (policy.maxAgeMs !== null) {
      const cutoff = now.getTime() - policy.maxAgeMs;
      for (const snapshot of group) {
        if (Date.parse(snapshot.createdAt) < cutoff) selected.add(snapshot.id);
      }
    }

    if (policy.maxCount !== null && group.length > policy.maxCount) {
      for (const snapshot of group.slice(0, group.length - policy.maxCount)) {
        selected.add(snapshot.id);
      }
    }
  }

  return live.filter((snapshot) => selected.has(snapshot.id));
}

function childrenOf(snapshots: readonly Snapshot[]): Map<string, string[]> {
  const children = new Map<string, string[]>();
  for (const snapshot of snapshots) {
    if (snapshot.parentId === null) continue;
    const siblings = children.get(snapshot.parentId) ?? [];
    siblings.push(snapshot.id);
    children.set(snapshot.parentId, siblings);
  }
  return children;
}

/**
 * Shrink the candidate set until no kept snapshot depends on a deleted one:
 * a candidate survives only if all of its live children are also deleted.
 */
function resolveDeletable(candidates: readonly Snapshot[], allLive: readonly Snapshot[]): Set<string> {
  const children = childrenOf(allLive);
  const deletable = new Set(candidates.map((snapshot) => snapshot.id));
  let changed = true;
  while (changed) {
    changed = false;
    for (const id of [...deletable]) {
      const dependents = children.get(id) ?? [];
      if (dependents.some((childId) => !deletable.has(childId))) {
        deletable.delete(id);
        changed = true;
      }
    }
  }
  return deletable;
}

/**
 * Order deletions so a snapshot goes only after every dependent of it has
 * gone, taking the oldest ready snapshot first. An interrupted sweep then
 * never leaves a live incremental whose ancestor is deleted.
 */
function deletionOrder(toDelete: readonly Snapshot[]): Snapshot[] {
  const children = childrenOf(toDelete);
  const pending = [...toDelete];
  const gone = new Set<string>();
  const ordered: Snapshot[] = [];

  while (pending.length > 0) {
    const index = pending.findIndex((snapshot) => (children.get(snapshot.id) ?? []).every((id) => gone.has(id)));
    // The parent links form a forest, so some pending snapshot is always ready
    const [next] = pending.splice(index === -1 ? 0 : index, 1);
    if (!next) break;
    ordered.push(next);
    gone.add(next.id);
  }
  return ordered;
}

/**
 * Apply a retention policy to the catalog. Candidates are chosen per source.
 * Deletion is a soft delete: the archive file is removed and the record is
 * marked, dependents before the snapshots they build on.
 */
export async function applyRetention(options: ApplyRetentionOptions): Promise<RetentionReport> {
  const { store, now, logger } = options;
  const dryRun = options.dryRun ?? false;
  const policy = resolvePolicy(options.policy);

  if (policy.maxAgeMs === null && policy.maxCount === null) {
    return { deleted: [], retainedDueToDependents: [], candidates: [], dryRun };
  }

  const allLive = store.listAll().filter((snapshot) => snapshot.deletedAt === null);
  const live = options.sourcePath === undefined
    ? allLive
    : allLive.filter((snapshot) => snapshot.sourcePath === options.sourcePath);

  const candidates = selectCandidates(live, policy, now);
  const deletable = resolveDeletable(candidates, allLive);
  const toDelete = deletionOrder(candidates.filter((snapshot) => deletable.has(snapshot.id)));
  const retainedDueToDependents = candidates
    .filter((snapshot) => !deletable.has(snapshot.id))
    .map((snapshot) => snapshot.id);

  const deleted: string[] = [];
  if (!dryRun) {
    for (const snapshot of toDelete) {
      try {
        await removeArchive(snapshot.archivePath);
      } catch (error) {
        throw new BackupError(
          'WriteFailure',
          `Cannot remove archive of snapshot '${snapshot.id}': ${errorMessage(error)}`,
          { snapshotId: snapshot.id, path: snapshot.archivePath, cause: error },
        );
      }
      store.markDeleted(snapshot.id, now);
      deleted.push(snapshot.id);
      logger?.info({ snapshotId: snapshot.id }, 'Snapshot pruned');
    }
  } else {
    deleted.push(...toDelete.map((snapshot) => snapshot.id));
  }

  if (retainedDueToDependents.length > 0) {
    logger?.info({ retained: retainedDueToDependents }, 'Snapshots retained because live snapshots depend on them');
  }

  return {
    deleted,
    retainedDueToDependents,
    candidates: candidates.map((snapshot) => snapshot.id),
    dryRun,
  };
}
