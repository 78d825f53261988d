import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import os from 'node:os';
import path from 'node:path';
import { mkdtemp, rm } from 'node:fs/promises';
import { SnapshotStore } from '../../src/services/snapshot-store.js';
import type { Snapshot } from '../../src/types/backup.js';
import { captureError } from '../helpers/tree.js';

function makeSnapshot(id: string, overrides: Partial<Snapshot> = {}): Snapshot {
  return {
    id,
    type: 'full',
    sourcePath: '/data/source',
    archivePath: `/data/backups/${id}_full.tar.gz`,
    createdAt: '2026-01-01T00:00:00.000Z',
    parentId: null,
    manifest: [],
    digest: 'f'.repeat(64),
    uncompressedSize: 0,
    archiveSize: 0,
    compression: 'gzip',
    deletedAt: null,
    ...overrides,
  };
}

describe('SnapshotStore', () => {
  let tempDir: string;
  let store: SnapshotStore;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), 'strata-store-'));
    store = SnapshotStore.forDestination(tempDir);
  });

  afterEach(async () => {
    store.close();
    await rm(tempDir, { recursive: true, force: true });
  });

  it('round-trips a snapshot with archived entries and tombstones', () => {
    const snapshot = makeSnapshot('backup_1', {
      type: 'incremental',
      parentId: 'backup_0',
      manifest: [
        { state: 'changed', path: 'a.txt', kind: 'file', size: 3, mtimeMs: 1_700_000_000_000, mode: 0o644, hash: 'a'.repeat(64), linkTarget: null },
        { state: 'removed', path: 'b.txt' },
        { state: 'present', path: 'link', kind: 'symlink', size: 0, mtimeMs: 1_700_000_000_000, mode: 0o777, hash: 'c'.repeat(64), linkTarget: 'a.txt' },
      ],
      uncompressedSize: 3,
      archiveSize: 120,
    });

    store.append(snapshot);

    expect(store.find('backup_1')).toEqual(snapshot);
    expect(store.has('backup_1')).toBe(true);
    expect(store.has('backup_2')).toBe(false);
  });

  it('rejects a duplicate identifier and keeps the first record', () => {
    store.append(makeSnapshot('backup_1', { digest: '1'.repeat(64) }));

    const error = captureError(() => store.append(makeSnapshot('backup_1', { digest: '2'.repeat(64) })));

    expect(error).toMatchObject({ kind: 'DuplicateIdentifier', snapshotId: 'backup_1' });
    expect(store.find('backup_1').digest).toBe('1'.repeat(64));
    expect(store.listAll()).toHaveLength(1);
  });

  it('fails with NotFound for an unknown identifier', () => {
    expect(captureError(() => store.find('missing'))).toMatchObject({ kind: 'NotFound', snapshotId: 'missing' });
    expect(captureError(() => store.listChain('missing'))).toMatchObject({ kind: 'NotFound' });
  });

  it('resolves a chain root first', () => {
    store.append(makeSnapshot('f'));
    store.append(makeSnapshot('i1', { type: 'incremental', parentId: 'f', createdAt: '2026-01-02T00:00:00.000Z' }));
    store.append(makeSnapshot('i2', { type: 'incremental', parentId: 'i1', createdAt: '2026-01-03T00:00:00.000Z' }));

    expect(store.listChain('i2').map((snapshot) => snapshot.id)).toEqual(['f', 'i1', 'i2']);
    expect(store.listChain('f').map((snapshot) => snapshot.id)).toEqual(['f']);
  });

  it('reports a broken chain when an ancestor is soft-deleted or missing', () => {
    store.append(makeSnapshot('f'));
    store.append(makeSnapshot('i1', { type: 'incremental', parentId: 'f' }));
    store.append(makeSnapshot('orphan', { type: 'incremental', parentId: 'gone' }));
    store.markDeleted('f', '2026-02-01T00:00:00.000Z');

    expect(captureError(() => store.listChain('i1'))).toMatchObject({ kind: 'BrokenChain', snapshotId: 'i1' });
    expect(captureError(() => store.listChain('orphan'))).toMatchObject({ kind: 'BrokenChain', snapshotId: 'orphan' });
    expect(captureError(() => store.listChain('f'))).toMatchObject({ kind: 'BrokenChain', snapshotId: 'f' });
  });

  it('reports a broken chain when the root is not a full snapshot', () => {
    store.append(makeSnapshot('rootless', { type: 'incremental' }));

    expect(captureError(() => store.listChain('rootless'))).toMatchObject({ kind: 'BrokenChain' });
  });

  it('lists by creation time, optionally filtered by source', () => {
    store.append(makeSnapshot('late', { createdAt: '2026-01-03T00:00:00.000Z' }));
    store.append(makeSnapshot('early', { createdAt: '2026-01-01T00:00:00.000Z' }));
    store.append(makeSnapshot('other', { createdAt: '2026-01-02T00:00:00.000Z', sourcePath: '/data/other' }));

    expect(store.listAll().map((snapshot) => snapshot.id)).toEqual(['early', 'other', 'late']);
    expect(store.listAll('/data/source').map((snapshot) => snapshot.id)).toEqual(['early', 'late']);
  });

  it('marks deletions idempotently and keeps the first timestamp', () => {
    store.append(makeSnapshot('f'));

    store.markDeleted('f', '2026-02-01T00:00:00.000Z');
    store.markDeleted('f', new Date('2026-03-01T00:00:00.000Z'));

    expect(store.find('f').deletedAt).toBe('2026-02-01T00:00:00.000Z');
    expect(captureError(() => store.markDeleted('nope', new Date()))).toMatchObject({ kind: 'NotFound' });
  });

  it('returns the newest live snapshot for a source', () => {
    store.append(makeSnapshot('a', { createdAt: '2026-01-01T00:00:00.000Z' }));
    store.append(makeSnapshot('b', { createdAt: '2026-01-02T00:00:00.000Z' }));
    store.markDeleted('b', '2026-01-05T00:00:00.000Z');

    expect(store.latestLive('/data/source')?.id).toBe('a');
    expect(store.latestLive('/data/elsewhere')).toBeNull();
  });

  it('persists records across reopening the catalog', () => {
    store.append(makeSnapshot('kept'));
    store.close();

    store = SnapshotStore.forDestination(tempDir);
    expect(store.find('kept').id).toBe('kept');
    expect(SnapshotStore.exists(tempDir)).toBe(true);
  });
});
