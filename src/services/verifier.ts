import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import { pipeline } from 'node:stream/promises';
import type { Snapshot, VerificationResult } from '../types/backup.js';
import { BackupError, errorCode, errorMessage } from '../types/errors.js';

export async function digestFile(filePath: string, signal?: AbortSignal): Promise<string> {
  const hash = createHash('sha256');
  await pipeline(
    createReadStream(filePath),
    async (source: AsyncIterable<Buffer>) => {
      for await (const chunk of source) {
        hash.update(chunk);
      }
    },
    { signal },
  );
  return hash.digest('hex');
}

/**
 * Recompute the archive digest of a snapshot and compare it with the
 * recorded one. Read-only.
 */
export async function verifyArchive(
  snapshot: Pick<Snapshot, 'id' | 'archivePath' | 'digest'>,
  signal?: AbortSignal,
): Promise<VerificationResult> {
  const missing = (cause?: unknown): BackupError =>
    new BackupError('ArchiveMissing', `Archive for snapshot '${snapshot.id}' is missing: ${snapshot.archivePath}`, {
      snapshotId: snapshot.id,
      path: snapshot.archivePath,
      cause,
    });

  try {
    const stats = await stat(snapshot.archivePath);
    if (!stats.isFile()) throw missing();
  } catch (error) {
    if (error instanceof BackupError) throw error;
    if (errorCode(error) === 'ENOENT') throw missing(error);
    throw new BackupError('SourceUnreadable', `Cannot read archive '${snapshot.archivePath}': ${errorMessage(error)}`, {
      snapshotId: snapshot.id,
      path: snapshot.archivePath,
      cause: error,
    });
  }

  let actualDigest: string;
  try {
    actualDigest = await digestFile(snapshot.archivePath, signal);
  } catch (error) {
    if (signal?.aborted) {
      throw new BackupError('OperationAborted', 'Verification was aborted.', { snapshotId: snapshot.id, cause: error });
    }
    throw new BackupError('SourceUnreadable', `Cannot read archive '${snapshot.archivePath}': ${errorMessage(error)}`, {
      snapshotId: snapshot.id,
      path: snapshot.archivePath,
      cause: error,
    });
  }

  return {
    snapshotId: snapshot.id,
    archivePath: snapshot.archivePath,
    status: actualDigest === snapshot.digest ? 'match' : 'mismatch',
    expectedDigest: snapshot.digest,
    actualDigest,
  };
}
