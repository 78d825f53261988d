import { createHash } from 'node:crypto';
import { createReadStream, type Stats } from 'node:fs';
import { lstat, readdir, readlink, stat } from 'node:fs/promises';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import type {
  ArchivedManifestEntry,
  ChangeSet,
  ManifestEntry,
  ManifestEntryKind,
  Snapshot,
  TreeEntry,
} from '../types/backup.js';
import { BackupError, errorCode, errorMessage, isBackupError } from '../types/errors.js';
import { ExclusionMatcher } from '../utils/exclusion.js';
import type { Logger } from '../utils/logger.js';
import { mapWithConcurrency } from '../utils/worker-pool.js';

export const DEFAULT_HASH_CONCURRENCY = 4;

export type BaselineState = ReadonlyMap<string, TreeEntry>;

export interface DetectChangesOptions {
  sourceRoot: string;
  exclusions?: readonly string[] | ExclusionMatcher;
  /** Tree state of the parent snapshot; omitted for a full scan. */
  baseline?: BaselineState;
  /** Hash files whose size and mtime match the baseline. */
  verifyContent?: boolean;
  concurrency?: number;
  signal?: AbortSignal;
  logger?: Logger;
}

interface ScannedPath {
  relativePath: string;
  absolutePath: string;
  kind: ManifestEntryKind;
  stats: Stats;
}

interface PendingEntry {
  scanned: ScannedPath;
  state: 'present' | 'changed' | 'verify';
  baseline: TreeEntry | null;
}

export function comparePaths(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function sortManifest<T extends { path: string }>(entries: T[]): T[] {
  return entries.sort((a, b) => comparePaths(a.path, b.path));
}

/**
 * Fold manifests root-first into the tree state at the last snapshot.
 * Archived entries set a path, tombstones clear it.
 */
export function foldChainState(chain: readonly Pick<Snapshot, 'manifest'>[]): Map<string, TreeEntry> {
  const state = new Map<string, TreeEntry>();
  for (const snapshot of chain) {
    for (const entry of snapshot.manifest) {
      if (entry.state === 'removed') {
        state.delete(entry.path);
        continue;
      }
      const { state: _state, ...treeEntry } = entry;
      state.set(entry.path, treeEntry);
    }
  }
  return state;
}

function toPosix(relativePath: string): string {
  return relativePath.split(path.sep).join('/');
}

function sourceUnreadable(targetPath: string, error: unknown): BackupError {
  if (isBackupError(error)) return error;
  return new BackupError('SourceUnreadable', `Cannot read '${targetPath}': ${errorMessage(error)}`, {
    path: targetPath,
    cause: error,
  });
}

function sameMtime(a: number, b: number): boolean {
  return Math.round(a) === Math.round(b);
}

export async function hashFile(filePath: string, signal?: AbortSignal): Promise<{ hash: string; size: number }> {
  const hash = createHash('sha256');
  let size = 0;
  await pipeline(
    createReadStream(filePath),
    async (source: AsyncIterable<Buffer>) => {
      for await (const chunk of source) {
        size += chunk.length;
        hash.update(chunk);
      }
    },
    { signal },
  );
  return { hash: hash.digest('hex'), size };
}

export function hashLinkTarget(linkTarget: string): string {
  return createHash('sha256').update(linkTarget).digest('hex');
}

async function scanTree(
  sourceRoot: string,
  matcher: ExclusionMatcher,
  signal: AbortSignal | undefined,
  logger: Logger | undefined,
): Promise<ScannedPath[]> {
  const scanned: ScannedPath[] = [];

  const walk = async (directory: string): Promise<void> => {
    signal?.throwIfAborted();
    let names: string[];
    try {
      names = await readdir(directory);
    } catch (error) {
      throw sourceUnreadable(directory, error);
    }

    for (const name of names) {
      const absolutePath = path.join(directory, name);
      const relativePath = toPosix(path.relative(sourceRoot, absolutePath));
      if (matcher.matchesSelf(relativePath)) {
        continue;
      }

      let stats: Stats;
      try {
        stats = await lstat(absolutePath);
      } catch (error) {
        throw sourceUnreadable(absolutePath, error);
      }

      if (stats.isDirectory()) {
        await walk(absolutePath);
      } else if (stats.isFile()) {
        scanned.push({ relativePath, absolutePath, kind: 'file', stats });
      } else if (stats.isSymbolicLink()) {
        scanned.push({ relativePath, absolutePath, kind: 'symlink', stats });
      } else {
        logger?.debug({ path: relativePath }, 'Skipping special file');
      }
    }
  };

  await walk(sourceRoot);
  return scanned;
}

async function describe(scanned: ScannedPath, signal: AbortSignal | undefined): Promise<TreeEntry> {
  const base = {
    path: scanned.relativePath,
    kind: scanned.kind,
    mtimeMs: scanned.stats.mtimeMs,
    mode: scanned.stats.mode & 0o7777,
  };

  try {
    if (scanned.kind === 'symlink') {
      const linkTarget = await readlink(scanned.absolutePath);
      return { ...base, size: 0, hash: hashLinkTarget(linkTarget), linkTarget };
    }
    const { hash, size } = await hashFile(scanned.absolutePath, signal);
    return { ...base, size, hash, linkTarget: null };
  } catch (error) {
    if (signal?.aborted) throw error;
    throw sourceUnreadable(scanned.absolutePath, error);
  }
}

function classify(scanned: ScannedPath, baseline: TreeEntry | undefined, verifyContent: boolean): PendingEntry | null {
  if (!baseline) {
    return { scanned, state: 'present', baseline: null };
  }
  if (baseline.kind !== scanned.kind) {
    return { scanned, state: 'changed', baseline };
  }
  if (scanned.kind === 'file') {
    if (baseline.size !== scanned.stats.size || !sameMtime(baseline.mtimeMs, scanned.stats.mtimeMs)) {
      return { scanned, state: 'changed', baseline };
    }
    return verifyContent ? { scanned, state: 'verify', baseline } : null;
  }
  // Symlink targets are cheap to read, so they are always compared.
  return { scanned, state: 'verify', baseline };
}

/**
 * Compare the tree under `sourceRoot` with a baseline and produce the
 * inclusion set plus the delta manifest for the next snapshot.
 */
export async function detectChanges(options: DetectChangesOptions): Promise<ChangeSet> {
  const sourceRoot = path.resolve(options.sourceRoot);
  const matcher = options.exclusions instanceof ExclusionMatcher
    ? options.exclusions
    : new ExclusionMatcher(options.exclusions ?? []);
  const baseline: BaselineState = options.baseline ?? new Map<string, TreeEntry>();
  const verifyContent = options.verifyContent ?? false;
  const { signal, logger } = options;

  try {
    let rootStats: Stats;
    try {
      rootStats = await stat(sourceRoot);
    } catch (error) {
      throw sourceUnreadable(sourceRoot, error);
    }
    if (!rootStats.isDirectory()) {
      throw new BackupError('SourceUnreadable', `Source '${sourceRoot}' is not a directory.`, { path: sourceRoot });
    }

    const scanned = await scanTree(sourceRoot, matcher, signal, logger);
    const seen = new Set(scanned.map((item) => item.relativePath));

    const pending: PendingEntry[] = [];
    for (const item of scanned) {
      const decision = classify(item, baseline.get(item.relativePath), verifyContent);
      if (decision) pending.push(decision);
    }

    const described = await mapWithConcurrency(
      pending,
      options.concurrency ?? DEFAULT_HASH_CONCURRENCY,
      async (item) => ({ item, entry: await describe(item.scanned, signal) }),
      signal,
    );

    const archived: ArchivedManifestEntry[] = [];
    for (const { item, entry } of described) {
      if (item.state === 'verify') {
        const previous = item.baseline;
        if (previous && previous.hash === entry.hash && previous.linkTarget === entry.linkTarget) {
          continue;
        }
        archived.push({ ...entry, state: 'changed' });
        continue;
      }
      archived.push({ ...entry, state: item.state });
    }

    const manifest: ManifestEntry[] = [...archived];
    for (const baselinePath of baseline.keys()) {
      if (!seen.has(baselinePath) && !matcher.isExcluded(baselinePath)) {
        manifest.push({ state: 'removed', path: baselinePath });
      }
    }

    sortManifest(manifest);
    const inclusionSet = archived.map((entry) => entry.path).sort(comparePaths);

    logger?.debug(
      { scanned: scanned.length, included: inclusionSet.length, manifest: manifest.length },
      'Change detection complete',
    );

    return {
      inclusionSet,
      manifest,
      scanned: scanned.length,
      unchanged: scanned.length - archived.length,
    };
  } catch (error) {
    if (signal?.aborted && !isBackupError(error)) {
      throw new BackupError('OperationAborted', 'Change detection was aborted.', { path: sourceRoot, cause: error });
    }
    if (errorCode(error) !== undefined && !isBackupError(error)) {
      throw sourceUnreadable(sourceRoot, error);
    }
    throw error;
  }
}
