import { createHash, randomUUID } from 'node:crypto';
import { createReadStream, createWriteStream } from 'node:fs';
import { mkdir, open, rename, rm } from 'node:fs/promises';
import path from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import type {
  ArchiveBuildResult,
  ArchivedManifestEntry,
  CompressionAlgorithm,
  ManifestEntry,
} from '../types/backup.js';
import { BackupError, errorMessage, isBackupError } from '../types/errors.js';
import { createCompressor, type CompressionOptions } from '../utils/compression.js';
import type { Logger } from '../utils/logger.js';
import { bufferBody, tarStream, type TarEntry } from '../utils/tar.js';

export interface BuildArchiveOptions {
  sourceRoot: string;
  /** Manifest of the new snapshot; archived entries are written in order. */
  manifest: readonly ManifestEntry[];
  /** Final archive file path. Its directory is created when missing. */
  archivePath: string;
  compression: CompressionAlgorithm;
  compressionOptions?: CompressionOptions;
  signal?: AbortSignal;
  logger?: Logger;
}

function isArchived(entry: ManifestEntry): entry is ArchivedManifestEntry {
  return entry.state !== 'removed';
}

/** Stream a source file, failing when its size no longer matches the manifest. */
async function* fileBody(
  absolutePath: string,
  entry: ArchivedManifestEntry,
  signal: AbortSignal | undefined,
): AsyncGenerator<Buffer> {
  let read = 0;
  try {
    const chunks: AsyncIterable<Buffer> = createReadStream(absolutePath, { signal });
    for await (const chunk of chunks) {
      read += chunk.length;
      yield chunk;
    }
  } catch (error) {
    if (signal?.aborted) throw error;
    throw new BackupError('SourceUnreadable', `Cannot read '${absolutePath}': ${errorMessage(error)}`, {
      path: absolutePath,
      cause: error,
    });
  }
  if (read !== entry.size) {
    throw new BackupError(
      'SourceUnreadable',
      `File '${entry.path}' changed size during backup (expected ${entry.size} bytes, read ${read}).`,
      { path: absolutePath },
    );
  }
}

async function* archiveEntries(
  sourceRoot: string,
  entries: readonly ArchivedManifestEntry[],
  signal: AbortSignal | undefined,
): AsyncGenerator<TarEntry> {
  for (const entry of entries) {
    signal?.throwIfAborted();

    if (entry.kind === 'symlink') {
      yield {
        header: {
          name: entry.path,
          type: 'symlink',
          mode: entry.mode,
          mtimeMs: entry.mtimeMs,
          size: 0,
          linkTarget: entry.linkTarget ?? '',
        },
        body: bufferBody(Buffer.alloc(0)),
      };
      continue;
    }

    yield {
      header: {
        name: entry.path,
        type: 'file',
        mode: entry.mode,
        mtimeMs: entry.mtimeMs,
        size: entry.size,
        linkTarget: null,
      },
      body: fileBody(path.join(sourceRoot, ...entry.path.split('/')), entry, signal),
    };
  }
}

/**
 * Stream the archived entries of a manifest into a compressed tar file.
 *
 * The bytes land in a hidden temporary file next to the target, are
 * fsynced, and are renamed into place once the digest is final. Any
 * failure removes the temporary file.
 */
export async function buildArchive(options: BuildArchiveOptions): Promise<ArchiveBuildResult> {
  const sourceRoot = path.resolve(options.sourceRoot);
  const archivePath = path.resolve(options.archivePath);
  const directory = path.dirname(archivePath);
  const tempPath = path.join(directory, `.${path.basename(archivePath)}.${randomUUID()}.tmp`);
  const { signal, logger } = options;
  const entries = options.manifest.filter(isArchived);

  try {
    await mkdir(directory, { recursive: true });
  } catch (error) {
    throw new BackupError('WriteFailure', `Cannot create destination '${directory}': ${errorMessage(error)}`, {
      path: directory,
      cause: error,
    });
  }

  const digest = createHash('sha256');
  let archiveSize = 0;

  try {
    signal?.throwIfAborted();
    await pipeline(
      Readable.from(tarStream(archiveEntries(sourceRoot, entries, signal))),
      createCompressor(options.compression, options.compressionOptions),
      async function* (source: AsyncIterable<Buffer>) {
        for await (const chunk of source) {
          digest.update(chunk);
          archiveSize += chunk.length;
          yield chunk;
        }
      },
      createWriteStream(tempPath, { flags: 'wx' }),
      { signal },
    );

    const handle = await open(tempPath, 'r+');
    try {
      await handle.sync();
    } finally {
      await handle.close();
    }

    signal?.throwIfAborted();
    await rename(tempPath, archivePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    if (signal?.aborted) {
      throw new BackupError('OperationAborted', 'Archive build was aborted.', { path: archivePath, cause: error });
    }
    if (isBackupError(error)) {
      throw error;
    }
    throw new BackupError('WriteFailure', `Failed to write archive '${archivePath}': ${errorMessage(error)}`, {
      path: archivePath,
      cause: error,
    });
  }

  const uncompressedSize = entries.reduce((total, entry) => total + (entry.kind === 'file' ? entry.size : 0), 0);
  logger?.debug({ archivePath, entries: entries.length, archiveSize }, 'Archive written');

  return {
    archivePath,
    digest: digest.digest('hex'),
    uncompressedSize,
    archiveSize,
  };
}

/** Remove an archive file; a missing file is not an error. */
export async function removeArchive(archivePath: string): Promise<void> {
  await rm(archivePath, { force: true });
}
