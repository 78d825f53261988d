import { createReadStream, createWriteStream, type Stats } from 'node:fs';
import { chmod, lstat, lutimes, mkdir, readdir, rm, rmdir, stat, symlink, utimes } from 'node:fs/promises';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import type { RestoreReport, Snapshot } from '../types/backup.js';
import { BackupError, ExtractionFailureError, errorCode, errorMessage, isBackupError } from '../types/errors.js';
import { createDecompressor } from '../utils/compression.js';
import type { Logger } from '../utils/logger.js';
import { readTarEntries, type TarEntry } from '../utils/tar.js';
import { verifyArchive } from './verifier.js';

export interface RestoreChainOptions {
  /** Chain root first, target last. */
  chain: readonly Snapshot[];
  outputPath: string;
  overwrite?: boolean;
  /** Check every layer's digest before writing anything. Defaults to true. */
  verify?: boolean;
  signal?: AbortSignal;
  logger?: Logger;
}

interface LayerOutcome {
  filesWritten: number;
  pathsRemoved: number;
}

async function lstatOrNull(targetPath: string): Promise<Stats | null> {
  try {
    return await lstat(targetPath);
  } catch (error) {
    const code = errorCode(error);
    if (code === 'ENOENT' || code === 'ENOTDIR') return null;
    throw error;
  }
}

/** Resolve an archive member name under the output root, rejecting escapes. */
export function resolveInside(outputRoot: string, name: string): string {
  const normalized = name.replace(/\\/g, '/');
  if (normalized === '' || path.posix.isAbsolute(normalized) || path.win32.isAbsolute(normalized)) {
    throw new Error(`Refusing to extract absolute or empty entry name '${name}'.`);
  }
  const target = path.resolve(outputRoot, ...normalized.split('/'));
  if (!target.startsWith(outputRoot + path.sep)) {
    throw new Error(`Refusing to extract '${name}' outside of ${outputRoot}.`);
  }
  return target;
}

async function assertRestorable(outputPath: string, overwrite: boolean): Promise<void> {
  const existing = await lstatOrNull(outputPath);
  if (!existing) return;
  if (!existing.isDirectory()) {
    throw new BackupError('DestinationNotEmpty', `Restore target '${outputPath}' exists and is not a directory.`, {
      path: outputPath,
    });
  }
  if (overwrite) return;
  const contents = await readdir(outputPath);
  if (contents.length > 0) {
    throw new BackupError('DestinationNotEmpty', `Restore target '${outputPath}' is not empty.`, { path: outputPath });
  }
}

/** Create the parent directories of `target`, replacing any non-directory in the way. */
async function ensureParents(outputRoot: string, target: string): Promise<void> {
  const relative = path.relative(outputRoot, path.dirname(target));
  if (relative === '') return;
  let current = outputRoot;
  for (const segment of relative.split(path.sep)) {
    current = path.join(current, segment);
    const existing = await lstatOrNull(current);
    if (existing?.isDirectory()) continue;
    if (existing) await rm(current, { force: true });
    await mkdir(current);
  }
}

async function clearTarget(target: string): Promise<void> {
  if (await lstatOrNull(target)) {
    await rm(target, { recursive: true, force: true });
  }
}

async function writeEntry(outputRoot: string, entry: TarEntry): Promise<void> {
  const target = resolveInside(outputRoot, entry.header.name);
  await ensureParents(outputRoot, target);
  const mtime = new Date(entry.header.mtimeMs);

  if (entry.header.type === 'symlink') {
    await clearTarget(target);
    await symlink(entry.header.linkTarget ?? '', target);
    await lutimes(target, mtime, mtime);
    return;
  }

  await clearTarget(target);
  await pipeline(entry.body, createWriteStream(target, { mode: entry.header.mode }));
  await chmod(target, entry.header.mode);
  await utimes(target, mtime, mtime);
}

/**
 * lstat a path under the restore root without following symlinks on the way.
 * A path below a symlink or a file is not part of the restored tree.
 */
async function lstatInTree(outputRoot: string, target: string): Promise<Stats | null> {
  const ancestors = path.relative(outputRoot, target).split(path.sep).slice(0, -1);
  let current = outputRoot;
  for (const segment of ancestors) {
    current = path.join(current, segment);
    const ancestor = await lstatOrNull(current);
    if (!ancestor?.isDirectory()) return null;
  }
  return lstatOrNull(target);
}

async function pruneEmptyParents(outputRoot: string, start: string): Promise<void> {
  let directory = start;
  while (directory !== outputRoot && directory.startsWith(outputRoot + path.sep)) {
    const stats = await lstatOrNull(directory);
    if (!stats?.isDirectory()) return;
    const contents = await readdir(directory);
    if (contents.length > 0) return;
    await rmdir(directory);
    directory = path.dirname(directory);
  }
}

async function applyTombstone(outputRoot: string, relativePath: string): Promise<boolean> {
  const target = resolveInside(outputRoot, relativePath);
  const existing = await lstatInTree(outputRoot, target);
  // A directory here means a later layer reused the name for a directory.
  if (!existing || existing.isDirectory()) return false;
  await rm(target, { force: true });
  await pruneEmptyParents(outputRoot, path.dirname(target));
  return true;
}

async function applyLayer(outputRoot: string, snapshot: Snapshot, signal: AbortSignal | undefined): Promise<LayerOutcome> {
  let filesWritten = 0;
  const expected = snapshot.manifest.filter((entry) => entry.state !== 'removed').length;

  await pipeline(
    createReadStream(snapshot.archivePath),
    createDecompressor(snapshot.compression),
    async (source: AsyncIterable<Buffer>) => {
      for await (const entry of readTarEntries(source)) {
        signal?.throwIfAborted();
        await writeEntry(outputRoot, entry);
        filesWritten += 1;
      }
    },
    { signal },
  );

  if (filesWritten !== expected) {
    throw new Error(`Archive holds ${filesWritten} entries but the manifest lists ${expected}.`);
  }

  let pathsRemoved = 0;
  for (const entry of snapshot.manifest) {
    if (entry.state !== 'removed') continue;
    signal?.throwIfAborted();
    if (await applyTombstone(outputRoot, entry.path)) pathsRemoved += 1;
  }

  return { filesWritten, pathsRemoved };
}

/**
 * Replay a snapshot chain into `outputPath`, root first. Each layer's
 * tombstones are applied before the next layer is extracted. A failed
 * layer is reported with its chain position; earlier layers stay applied.
 */
export async function restoreChain(options: RestoreChainOptions): Promise<RestoreReport> {
  const { chain, signal, logger } = options;
  const target = chain[chain.length - 1];
  if (!target) {
    throw new BackupError('InvalidArgument', 'Cannot restore an empty snapshot chain.');
  }
  const outputRoot = path.resolve(options.outputPath);

  await assertRestorable(outputRoot, options.overwrite ?? false);

  for (const snapshot of chain) {
    if (options.verify ?? true) {
      const result = await verifyArchive(snapshot, signal);
      if (result.status === 'mismatch') {
        throw new BackupError(
          'IntegrityMismatch',
          `Archive of snapshot '${snapshot.id}' does not match its recorded digest.`,
          { snapshotId: snapshot.id, path: snapshot.archivePath },
        );
      }
      continue;
    }
    try {
      await stat(snapshot.archivePath);
    } catch (error) {
      throw new BackupError('ArchiveMissing', `Archive for snapshot '${snapshot.id}' is missing: ${snapshot.archivePath}`, {
        snapshotId: snapshot.id,
        path: snapshot.archivePath,
        cause: error,
      });
    }
  }

  try {
    await mkdir(outputRoot, { recursive: true });
  } catch (error) {
    throw new BackupError('WriteFailure', `Cannot create restore target '${outputRoot}': ${errorMessage(error)}`, {
      path: outputRoot,
      cause: error,
    });
  }

  let filesWritten = 0;
  let pathsRemoved = 0;
  let lastAppliedSnapshotId: string | null = null;

  for (const [position, snapshot] of chain.entries()) {
    try {
      const outcome = await applyLayer(outputRoot, snapshot, signal);
      filesWritten += outcome.filesWritten;
      pathsRemoved += outcome.pathsRemoved;
    } catch (error) {
      if (signal?.aborted) {
        throw new BackupError('OperationAborted', `Restore was aborted while applying '${snapshot.id}'.`, {
          snapshotId: snapshot.id,
          cause: error,
        });
      }
      throw new ExtractionFailureError(
        `Failed to apply snapshot '${snapshot.id}' (${position + 1} of ${chain.length}): ${errorMessage(error)}`,
        {
          snapshotId: snapshot.id,
          chainPosition: position,
          chainLength: chain.length,
          lastAppliedSnapshotId,
          path: isBackupError(error) ? error.path ?? undefined : undefined,
          cause: error,
        },
      );
    }
    lastAppliedSnapshotId = snapshot.id;
    logger?.debug({ snapshotId: snapshot.id, position }, 'Layer applied');
  }

  return {
    snapshotId: target.id,
    outputPath: outputRoot,
    appliedSnapshots: chain.map((snapshot) => snapshot.id),
    filesWritten,
    pathsRemoved,
  };
}
