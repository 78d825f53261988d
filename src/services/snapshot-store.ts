import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import type {
  CompressionAlgorithm,
  ManifestEntry,
  ManifestEntryKind,
  ManifestEntryState,
  Snapshot,
  SnapshotType,
} from '../types/backup.js';
import { BackupError, errorMessage } from '../types/errors.js';

export const CATALOG_FILE_NAME = 'catalog.db';

interface SnapshotRow {
  id: string;
  type: SnapshotType;
  source_path: string;
  archive_path: string;
  created_at: string;
  parent_id: string | null;
  digest: string;
  uncompressed_size: number;
  archive_size: number;
  compression: CompressionAlgorithm;
  deleted_at: string | null;
}

interface ManifestEntryRow {
  path: string;
  state: ManifestEntryState;
  kind: ManifestEntryKind | null;
  size: number | null;
  mtime_ms: number | null;
  mode: number | null;
  hash: string | null;
  link_target: string | null;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS snapshots (
    id TEXT PRIMARY KEY,
    type TEXT NOT NULL,
    source_path TEXT NOT NULL,
    archive_path TEXT NOT NULL,
    created_at TEXT NOT NULL,
    parent_id TEXT,
    digest TEXT NOT NULL,
    uncompressed_size INTEGER NOT NULL,
    archive_size INTEGER NOT NULL,
    compression TEXT NOT NULL,
    deleted_at TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_snapshots_source_created
    ON snapshots(source_path, created_at);

  CREATE TABLE IF NOT EXISTS manifest_entries (
    snapshot_id TEXT NOT NULL,
    seq INTEGER NOT NULL,
    path TEXT NOT NULL,
    state TEXT NOT NULL,
    kind TEXT,
    size INTEGER,
    mtime_ms INTEGER,
    mode INTEGER,
    hash TEXT,
    link_target TEXT,
    PRIMARY KEY (snapshot_id, seq),
    FOREIGN KEY(snapshot_id) REFERENCES snapshots(id)
  );
`;

function toManifestEntry(row: ManifestEntryRow): ManifestEntry {
  if (row.state === 'removed') {
    return { state: 'removed', path: row.path };
  }
  return {
    state: row.state,
    path: row.path,
    kind: row.kind ?? 'file',
    size: row.size ?? 0,
    mtimeMs: row.mtime_ms ?? 0,
    mode: row.mode ?? 0o644,
    hash: row.hash ?? '',
    linkTarget: row.link_target,
  };
}

export interface SnapshotStoreOptions {
  /** Open without creating the catalog or its schema. */
  readonly?: boolean;
}

/**
 * Snapshot catalog for one destination directory, kept in `catalog.db`.
 * Records are append-only apart from the soft-delete marker.
 */
export class SnapshotStore {
  readonly catalogPath: string;
  readonly #db: Database.Database;

  constructor(catalogPath: string, options: SnapshotStoreOptions = {}) {
    this.catalogPath = catalogPath;
    try {
      if (!options.readonly) {
        fs.mkdirSync(path.dirname(catalogPath), { recursive: true });
      }
      this.#db = new Database(catalogPath, { readonly: options.readonly ?? false, fileMustExist: options.readonly ?? false });
      if (!options.readonly) {
        this.#db.pragma('journal_mode = WAL');
        this.#db.pragma('foreign_keys = ON');
        this.#db.exec(SCHEMA);
      }
    } catch (error) {
      throw new BackupError('WriteFailure', `Failed to open snapshot catalog at ${catalogPath}: ${errorMessage(error)}`, {
        path: catalogPath,
        cause: error,
      });
    }
  }

  static forDestination(destinationPath: string, options: SnapshotStoreOptions = {}): SnapshotStore {
    return new SnapshotStore(path.join(destinationPath, CATALOG_FILE_NAME), options);
  }

  static exists(destinationPath: string): boolean {
    return fs.existsSync(path.join(destinationPath, CATALOG_FILE_NAME));
  }

  close(): void {
    if (this.#db.open) {
      this.#db.close();
    }
  }

  has(id: string): boolean {
    const row = this.#db
      .prepare<[string], { id: string }>('SELECT id FROM snapshots WHERE id = ?')
      .get(id);
    return row !== undefined;
  }

  append(snapshot: Snapshot): void {
    const insertSnapshot = this.#db.prepare(`
      INSERT INTO snapshots (
        id,
        type,
        source_path,
        archive_path,
        created_at,
        parent_id,
        digest,
        uncompressed_size,
        archive_size,
        compression,
        deleted_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const insertEntry = this.#db.prepare(`
      INSERT INTO manifest_entries (
        snapshot_id,
        seq,
        path,
        state,
        kind,
        size,
        mtime_ms,
        mode,
        hash,
        link_target
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const write = this.#db.transaction((record: Snapshot) => {
      if (this.has(record.id)) {
        throw new BackupError('DuplicateIdentifier', `Snapshot '${record.id}' already exists.`, {
          snapshotId: record.id,
        });
      }
      insertSnapshot.run(
        record.id,
        record.type,
        record.sourcePath,
        record.archivePath,
        record.createdAt,
        record.parentId,
        record.digest,
        record.uncompressedSize,
        record.archiveSize,
        record.compression,
        record.deletedAt,
      );
      record.manifest.forEach((entry, seq) => {
        if (entry.state === 'removed') {
          insertEntry.run(record.id, seq, entry.path, entry.state, null, null, null, null, null, null);
          return;
        }
        insertEntry.run(
          record.id,
          seq,
          entry.path,
          entry.state,
          entry.kind,
          entry.size,
          Math.round(entry.mtimeMs),
          entry.mode,
          entry.hash,
          entry.linkTarget,
        );
      });
    });

    try {
      write(snapshot);
    } catch (error) {
      if (error instanceof BackupError) throw error;
      throw new BackupError('WriteFailure', `Failed to record snapshot '${snapshot.id}': ${errorMessage(error)}`, {
        snapshotId: snapshot.id,
        cause: error,
      });
    }
  }

  find(id: string): Snapshot {
    const row = this.#db
      .prepare<[string], SnapshotRow>('SELECT * FROM snapshots WHERE id = ?')
      .get(id);
    if (!row) {
      throw new BackupError('NotFound', `Snapshot '${id}' does not exist.`, { snapshotId: id });
    }
    return this.#hydrate(row);
  }

  /**
   * Resolve the chain `[root, ..., id]` by following parent links. Every
   * member must be live and the root must be a full snapshot.
   */
  listChain(id: string): Snapshot[] {
    const target = this.find(id);
    if (target.deletedAt !== null) {
      throw new BackupError('BrokenChain', `Snapshot '${id}' was deleted on ${target.deletedAt}.`, { snapshotId: id });
    }

    const chain: Snapshot[] = [target];
    const seen = new Set<string>([target.id]);
    let current = target;

    while (current.parentId !== null) {
      const parentId = current.parentId;
      if (seen.has(parentId)) {
        throw new BackupError('BrokenChain', `Snapshot chain of '${id}' loops back to '${parentId}'.`, {
          snapshotId: id,
        });
      }
      const row = this.#db
        .prepare<[string], SnapshotRow>('SELECT * FROM snapshots WHERE id = ?')
        .get(parentId);
      if (!row) {
        throw new BackupError('BrokenChain', `Snapshot '${current.id}' references missing parent '${parentId}'.`, {
          snapshotId: id,
        });
      }
      if (row.deleted_at !== null) {
        throw new BackupError('BrokenChain', `Parent snapshot '${parentId}' of '${current.id}' has been deleted.`, {
          snapshotId: id,
        });
      }
      const parent = this.#hydrate(row);
      seen.add(parent.id);
      chain.push(parent);
      current = parent;
    }

    if (current.type !== 'full') {
      throw new BackupError('BrokenChain', `Chain of '${id}' starts at '${current.id}', which is not a full snapshot.`, {
        snapshotId: id,
      });
    }

    return chain.reverse();
  }

  /** All records, soft-deleted included, oldest first. */
  listAll(sourcePath?: string): Snapshot[] {
    const rows = sourcePath === undefined
      ? this.#db
        .prepare<[], SnapshotRow>('SELECT * FROM snapshots ORDER BY created_at ASC, id ASC')
        .all()
      : this.#db
        .prepare<[string], SnapshotRow>('SELECT * FROM snapshots WHERE source_path = ? ORDER BY created_at ASC, id ASC')
        .all(sourcePath);
    return rows.map((row) => this.#hydrate(row));
  }

  latestLive(sourcePath: string): Snapshot | null {
    const row = this.#db
      .prepare<[string], SnapshotRow>(`
        SELECT * FROM snapshots
        WHERE source_path = ? AND deleted_at IS NULL
        ORDER BY created_at DESC, id DESC
        LIMIT 1
      `)
      .get(sourcePath);
    return row ? this.#hydrate(row) : null;
  }

  /** Soft delete. Repeated calls keep the first timestamp. */
  markDeleted(id: string, at: Date | string): void {
    const deletedAt = typeof at === 'string' ? at : at.toISOString();
    const result = this.#db
      .prepare<[string, string]>('UPDATE snapshots SET deleted_at = COALESCE(deleted_at, ?) WHERE id = ?')
      .run(deletedAt, id);
    if (result.changes === 0) {
      throw new BackupError('NotFound', `Snapshot '${id}' does not exist.`, { snapshotId: id });
    }
  }

  #hydrate(row: SnapshotRow): Snapshot {
    const entries = this.#db
      .prepare<[string], ManifestEntryRow>(`
        SELECT path, state, kind, size, mtime_ms, mode, hash, link_target
        FROM manifest_entries
        WHERE snapshot_id = ?
        ORDER BY seq ASC
      `)
      .all(row.id);

    return {
      id: row.id,
      type: row.type,
      sourcePath: row.source_path,
      archivePath: row.archive_path,
      createdAt: row.created_at,
      parentId: row.parent_id,
      manifest: entries.map(toManifestEntry),
      digest: row.digest,
      uncompressedSize: row.uncompressed_size,
      archiveSize: row.archive_size,
      compression: row.compression,
      deletedAt: row.deleted_at,
    };
  }
}
