import path from 'node:path';
import {
  SNAPSHOT_ID_PATTERN,
  type CompressionAlgorithm,
  type RestoreReport,
  type RetentionPolicy,
  type RetentionReport,
  type Snapshot,
  type SnapshotSummary,
  type SnapshotType,
  type TreeEntry,
  type VerificationResult,
} from '../types/backup.js';
import type { BackupConfig } from '../config/json-config.js';
import { BackupError } from '../types/errors.js';
import { archiveExtension, isCompressionAlgorithm, type CompressionOptions } from '../utils/compression.js';
import { createLogger, setLogLevel, type Logger } from '../utils/logger.js';
import { buildArchive, removeArchive } from './archive-builder.js';
import { DEFAULT_HASH_CONCURRENCY, detectChanges, foldChainState } from './change-detector.js';
import { restoreChain } from './restore-engine.js';
import { applyRetention, resolvePolicy } from './retention-manager.js';
import { SnapshotStore } from './snapshot-store.js';
import { verifyArchive } from './verifier.js';

const DEFAULT_ID_PREFIX = 'backup';
const DEFAULT_COMPRESSION: CompressionAlgorithm = 'gzip';

export interface BackupEngineOptions {
  now?: () => Date;
  logger?: Logger;
  /** Files hashed in parallel during change detection. */
  concurrency?: number;
  idPrefix?: string;
  compressionOptions?: CompressionOptions;
}

export interface CreateSnapshotOptions {
  sourcePath: string;
  destinationPath: string;
  type: SnapshotType;
  exclusions?: readonly string[];
  compression?: CompressionAlgorithm;
  /** Parent of an incremental; the newest live snapshot of the source when omitted. */
  parentId?: string;
  /** Explicit identifier; generated from the clock when omitted. */
  snapshotId?: string;
  verifyContent?: boolean;
  /** Sweep applied to the source after the snapshot is recorded. */
  retention?: RetentionPolicy;
  signal?: AbortSignal;
}

export interface RestoreSnapshotOptions {
  destinationPath: string;
  snapshotId: string;
  outputPath: string;
  overwrite?: boolean;
  verify?: boolean;
  signal?: AbortSignal;
}

export interface ListSnapshotsOptions {
  includeDeleted?: boolean;
  sourcePath?: string;
}

export interface PruneOptions {
  sourcePath?: string;
  dryRun?: boolean;
}

function compactTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:.TZ]/g, '');
}

export function summarizeSnapshot(snapshot: Snapshot): SnapshotSummary {
  const removedCount = snapshot.manifest.filter((entry) => entry.state === 'removed').length;
  return {
    id: snapshot.id,
    type: snapshot.type,
    sourcePath: snapshot.sourcePath,
    archivePath: snapshot.archivePath,
    createdAt: snapshot.createdAt,
    parentId: snapshot.parentId,
    fileCount: snapshot.manifest.length - removedCount,
    removedCount,
    uncompressedSize: snapshot.uncompressedSize,
    archiveSize: snapshot.archiveSize,
    compression: snapshot.compression,
    digest: snapshot.digest,
    deleted: snapshot.deletedAt !== null,
  };
}

/**
 * Entry point for backup operations against a destination directory.
 * Each call opens the destination's catalog and closes it before returning.
 */
export class BackupEngine {
  readonly #now: () => Date;
  readonly #logger: Logger;
  readonly #concurrency: number;
  readonly #idPrefix: string;
  readonly #compressionOptions: CompressionOptions;

  constructor(options: BackupEngineOptions = {}) {
    this.#now = options.now ?? (() => new Date());
    this.#logger = options.logger ?? createLogger('backup-engine');
    this.#concurrency = Math.max(1, options.concurrency ?? DEFAULT_HASH_CONCURRENCY);
    this.#idPrefix = options.idPrefix ?? DEFAULT_ID_PREFIX;
    if (!SNAPSHOT_ID_PATTERN.test(this.#idPrefix)) {
      throw new BackupError('InvalidArgument', `Id prefix '${this.#idPrefix}' may only contain letters, digits, '.', '_' and '-'.`);
    }
    this.#compressionOptions = options.compressionOptions ?? {};
  }

  /** Engine using the configured id prefix and hashing concurrency; applies the configured log level. */
  static fromConfig(config: BackupConfig, options: Omit<BackupEngineOptions, 'concurrency' | 'idPrefix'> = {}): BackupEngine {
    setLogLevel(config.logging.level);
    return new BackupEngine({
      ...options,
      concurrency: config.defaults.concurrency,
      idPrefix: config.defaults.idPrefix,
    });
  }

  async create(options: CreateSnapshotOptions): Promise<Snapshot> {
    const sourcePath = path.resolve(options.sourcePath);
    const destinationPath = path.resolve(options.destinationPath);
    const compression = options.compression ?? DEFAULT_COMPRESSION;
    if (!isCompressionAlgorithm(compression)) {
      throw new BackupError('InvalidArgument', `Unsupported compression algorithm '${String(compression)}'.`);
    }
    if (options.type === 'full' && options.parentId !== undefined) {
      throw new BackupError('InvalidArgument', 'A full snapshot cannot have a parent.', {
        snapshotId: options.parentId,
      });
    }

    if (options.retention) {
      resolvePolicy(options.retention);
    }

    const store = SnapshotStore.forDestination(destinationPath);
    try {
      const startedAt = this.#now();
      let type = options.type;
      let parent: Snapshot | null = null;
      let baseline: Map<string, TreeEntry> | undefined;

      if (type === 'incremental') {
        const chain = this.#resolveParentChain(store, sourcePath, options.parentId);
        const last = chain[chain.length - 1];
        if (last) {
          parent = last;
          baseline = foldChainState(chain);
        } else {
          this.#logger.info({ sourcePath }, 'No earlier snapshot for source; taking a full snapshot instead');
          type = 'full';
        }
      }

      const id = this.#assignId(store, options.snapshotId, startedAt);
      const changes = await detectChanges({
        sourceRoot: sourcePath,
        exclusions: options.exclusions ?? [],
        baseline,
        verifyContent: options.verifyContent,
        concurrency: this.#concurrency,
        signal: options.signal,
        logger: this.#logger,
      });

      const archivePath = path.join(destinationPath, `${id}_${type}${archiveExtension(compression)}`);
      const built = await buildArchive({
        sourceRoot: sourcePath,
        manifest: changes.manifest,
        archivePath,
        compression,
        compressionOptions: this.#compressionOptions,
        signal: options.signal,
        logger: this.#logger,
      });

      const snapshot: Snapshot = {
        id,
        type,
        sourcePath,
        archivePath: built.archivePath,
        createdAt: startedAt.toISOString(),
        parentId: parent?.id ?? null,
        manifest: changes.manifest,
        digest: built.digest,
        uncompressedSize: built.uncompressedSize,
        archiveSize: built.archiveSize,
        compression,
        deletedAt: null,
      };

      try {
        options.signal?.throwIfAborted();
        store.append(snapshot);
      } catch (error) {
        await removeArchive(built.archivePath);
        if (options.signal?.aborted) {
          throw new BackupError('OperationAborted', 'Snapshot creation was aborted.', { snapshotId: id, cause: error });
        }
        throw error;
      }

      this.#logger.info(
        {
          snapshotId: id,
          type,
          parentId: snapshot.parentId,
          included: changes.inclusionSet.length,
          unchanged: changes.unchanged,
          archiveSize: built.archiveSize,
        },
        'Snapshot created',
      );

      if (options.retention) {
        await applyRetention({
          store,
          policy: options.retention,
          sourcePath,
          now: this.#now(),
          logger: this.#logger,
        });
      }

      return snapshot;
    } finally {
      store.close();
    }
  }

  async restore(options: RestoreSnapshotOptions): Promise<RestoreReport> {
    const store = this.#openExisting(options.destinationPath, options.snapshotId);
    try {
      const chain = store.listChain(options.snapshotId);
      const report = await restoreChain({
        chain,
        outputPath: options.outputPath,
        overwrite: options.overwrite,
        verify: options.verify,
        signal: options.signal,
        logger: this.#logger,
      });
      this.#logger.info(
        {
          snapshotId: report.snapshotId,
          layers: report.appliedSnapshots.length,
          filesWritten: report.filesWritten,
          pathsRemoved: report.pathsRemoved,
        },
        'Snapshot restored',
      );
      return report;
    } finally {
      store.close();
    }
  }

  async verify(destinationPath: string, snapshotId: string): Promise<VerificationResult> {
    const store = this.#openExisting(destinationPath, snapshotId);
    try {
      const snapshot = store.find(snapshotId);
      const result = await verifyArchive(snapshot);
      if (result.status === 'mismatch') {
        this.#logger.warn({ snapshotId, expected: result.expectedDigest, actual: result.actualDigest }, 'Archive digest mismatch');
      }
      return result;
    } finally {
      store.close();
    }
  }

  list(destinationPath: string, options: ListSnapshotsOptions = {}): SnapshotSummary[] {
    const resolved = path.resolve(destinationPath);
    if (!SnapshotStore.exists(resolved)) {
      return [];
    }
    const store = SnapshotStore.forDestination(resolved);
    try {
      const sourcePath = options.sourcePath === undefined ? undefined : path.resolve(options.sourcePath);
      return store
        .listAll(sourcePath)
        .filter((snapshot) => options.includeDeleted || snapshot.deletedAt === null)
        .map(summarizeSnapshot);
    } finally {
      store.close();
    }
  }

  async prune(destinationPath: string, policy: RetentionPolicy, options: PruneOptions = {}): Promise<RetentionReport> {
    const resolved = path.resolve(destinationPath);
    if (!SnapshotStore.exists(resolved)) {
      return { deleted: [], retainedDueToDependents: [], candidates: [], dryRun: options.dryRun ?? false };
    }
    const store = SnapshotStore.forDestination(resolved);
    try {
      const report = await applyRetention({
        store,
        policy,
        sourcePath: options.sourcePath === undefined ? undefined : path.resolve(options.sourcePath),
        now: this.#now(),
        dryRun: options.dryRun,
        logger: this.#logger,
      });
      this.#logger.info(
        { deleted: report.deleted.length, retained: report.retainedDueToDependents.length, dryRun: report.dryRun },
        'Retention sweep finished',
      );
      return report;
    } finally {
      store.close();
    }
  }

  #openExisting(destinationPath: string, snapshotId: string): SnapshotStore {
    const resolved = path.resolve(destinationPath);
    if (!SnapshotStore.exists(resolved)) {
      throw new BackupError('NotFound', `No snapshot catalog in '${resolved}'; snapshot '${snapshotId}' does not exist.`, {
        snapshotId,
        path: resolved,
      });
    }
    return SnapshotStore.forDestination(resolved);
  }

  #resolveParentChain(store: SnapshotStore, sourcePath: string, parentId: string | undefined): Snapshot[] {
    if (parentId === undefined) {
      const latest = store.latestLive(sourcePath);
      return latest ? store.listChain(latest.id) : [];
    }

    const chain = store.listChain(parentId);
    const parent = chain[chain.length - 1];
    if (parent && parent.sourcePath !== sourcePath) {
      throw new BackupError(
        'InvalidArgument',
        `Parent snapshot '${parentId}' was taken from '${parent.sourcePath}', not '${sourcePath}'.`,
        { snapshotId: parentId },
      );
    }
    return chain;
  }

  #assignId(store: SnapshotStore, requested: string | undefined, at: Date): string {
    if (requested !== undefined) {
      if (!SNAPSHOT_ID_PATTERN.test(requested)) {
        throw new BackupError('InvalidArgument', `Snapshot id '${requested}' may only contain letters, digits, '.', '_' and '-'.`);
      }
      if (store.has(requested)) {
        throw new BackupError('DuplicateIdentifier', `Snapshot '${requested}' already exists.`, { snapshotId: requested });
      }
      return requested;
    }

    const base = `${this.#idPrefix}_${compactTimestamp(at)}`;
    let candidate = base;
    let suffix = 1;
    while (store.has(candidate)) {
      candidate = `${base}_${String(suffix).padStart(2, '0')}`;
      suffix += 1;
    }
    return candidate;
  }
}
