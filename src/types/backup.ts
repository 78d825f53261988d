export type SnapshotType = 'full' | 'incremental';

/** Snapshot ids and id prefixes become file names in the destination. */
export const SNAPSHOT_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export type CompressionAlgorithm = 'none' | 'gzip' | 'brotli';

export type ManifestEntryKind = 'file' | 'symlink';

/**
 * Per-entry replay state.
 * - 'present': archived in this snapshot, absent from the baseline.
 * - 'changed': archived in this snapshot, replaces the baseline value.
 * - 'removed': tombstone: existed in the baseline, gone now.
 */
export type ManifestEntryState = 'present' | 'changed' | 'removed';

/** File state as observed on disk, shared by archived entries and tree state. */
export interface TreeEntry {
  /** Relative path from the source root, POSIX separators. */
  path: string;
  kind: ManifestEntryKind;
  size: number;
  mtimeMs: number;
  /** Permission bits (mode & 0o7777). */
  mode: number;
  /** SHA-256 hex of the file content, or of the link target for symlinks. */
  hash: string;
  linkTarget: string | null;
}

export interface ArchivedManifestEntry extends TreeEntry {
  state: 'present' | 'changed';
}

export interface RemovedManifestEntry {
  state: 'removed';
  path: string;
}

export type ManifestEntry = ArchivedManifestEntry | RemovedManifestEntry;

export interface Snapshot {
  id: string;
  type: SnapshotType;
  /** Absolute source root the snapshot was taken from. */
  sourcePath: string;
  /** Absolute path of the archive file. */
  archivePath: string;
  createdAt: string;
  parentId: string | null;
  /** Entries sorted by relative path. */
  manifest: ManifestEntry[];
  /** SHA-256 hex over the archive bytes. */
  digest: string;
  uncompressedSize: number;
  archiveSize: number;
  compression: CompressionAlgorithm;
  deletedAt: string | null;
}

export interface SnapshotSummary {
  id: string;
  type: SnapshotType;
  sourcePath: string;
  archivePath: string;
  createdAt: string;
  parentId: string | null;
  fileCount: number;
  removedCount: number;
  uncompressedSize: number;
  archiveSize: number;
  compression: CompressionAlgorithm;
  digest: string;
  deleted: boolean;
}

/** Milliseconds, or a string such as '30d', '12h', '45m', '2w'. */
export type Duration = number | string;

export interface RetentionPolicy {
  maxAge?: Duration;
  maxCount?: number;
}

export interface RetentionReport {
  /** Snapshot ids removed in this sweep, oldest first. */
  deleted: string[];
  /** Candidates kept because a live snapshot still depends on them. */
  retainedDueToDependents: string[];
  /** Every snapshot the policy selected, oldest first. */
  candidates: string[];
  dryRun: boolean;
}

export type VerificationStatus = 'match' | 'mismatch';

export interface VerificationResult {
  snapshotId: string;
  archivePath: string;
  status: VerificationStatus;
  expectedDigest: string;
  actualDigest: string;
}

export interface RestoreReport {
  snapshotId: string;
  outputPath: string;
  /** Chain that was replayed, root first. */
  appliedSnapshots: string[];
  filesWritten: number;
  pathsRemoved: number;
}

export interface ChangeSet {
  /** Relative paths to archive, sorted. */
  inclusionSet: string[];
  /** New manifest: archived entries plus tombstones, sorted by path. */
  manifest: ManifestEntry[];
  /** Number of non-excluded paths seen in the tree. */
  scanned: number;
  /** Paths identical to the baseline. */
  unchanged: number;
}

export interface ArchiveBuildResult {
  archivePath: string;
  digest: string;
  uncompressedSize: number;
  archiveSize: number;
}
