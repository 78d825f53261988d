import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import os from 'node:os';
import path from 'node:path';
import { access, mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { applyRetention, resolvePolicy } from '../../src/services/retention-manager.js';
import { SnapshotStore } from '../../src/services/snapshot-store.js';
import type { Snapshot } from '../../src/types/backup.js';
import { captureError } from '../helpers/tree.js';

const DAY = 86_400_000;
const EPOCH = Date.UTC(2026, 0, 1);

describe('applyRetention', () => {
  let destination: string;
  let store: SnapshotStore;

  async function addSnapshot(id: string, day: number, parentId: string | null = null, sourcePath = '/data/source'): Promise<Snapshot> {
    const archivePath = path.join(destination, `${id}.tar.gz`);
    await writeFile(archivePath, id, 'utf8');
    const snapshot: Snapshot = {
      id,
      type: parentId === null ? 'full' : 'incremental',
      sourcePath,
      archivePath,
      createdAt: new Date(EPOCH + day * DAY).toISOString(),
      parentId,
      manifest: [],
      digest: '0'.repeat(64),
      uncompressedSize: 0,
      archiveSize: id.length,
      compression: 'gzip',
      deletedAt: null,
    };
    store.append(snapshot);
    return snapshot;
  }

  async function exists(filePath: string): Promise<boolean> {
    try {
      await access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  function liveIds(): string[] {
    return store.listAll().filter((snapshot) => snapshot.deletedAt === null).map((snapshot) => snapshot.id);
  }

  beforeEach(async () => {
    destination = await mkdtemp(path.join(os.tmpdir(), 'strata-retention-'));
    store = SnapshotStore.forDestination(destination);
  });

  afterEach(async () => {
    store.close();
    await rm(destination, { recursive: true, force: true });
  });

  it('keeps the newest snapshots under maxCount and deletes the oldest', async () => {
    for (let day = 0; day < 5; day++) {
      await addSnapshot(`s${day}`, day);
    }
    const now = new Date(EPOCH + 10 * DAY);

    const report = await applyRetention({ store, policy: { maxCount: 3 }, now });

    expect(report).toEqual({ deleted: ['s0', 's1'], retainedDueToDependents: [], candidates: ['s0', 's1'], dryRun: false });
    expect(liveIds()).toEqual(['s2', 's3', 's4']);
    expect(store.find('s0').deletedAt).toBe(now.toISOString());
    expect(await exists(path.join(destination, 's0.tar.gz'))).toBe(false);
    expect(await exists(path.join(destination, 's2.tar.gz'))).toBe(true);
  });

  it('deletes snapshots older than maxAge', async () => {
    await addSnapshot('old', 0);
    await addSnapshot('recent', 35);

    const report = await applyRetention({ store, policy: { maxAge: '30d' }, now: new Date(EPOCH + 40 * DAY) });

    expect(report.deleted).toEqual(['old']);
    expect(liveIds()).toEqual(['recent']);
  });

  it('retains a selected ancestor while a kept snapshot depends on it', async () => {
    await addSnapshot('f', 0);
    await addSnapshot('i1', 1, 'f');
    await addSnapshot('i2', 2, 'i1');

    const report = await applyRetention({ store, policy: { maxCount: 1 }, now: new Date(EPOCH + 3 * DAY) });

    expect(report.candidates).toEqual(['f', 'i1']);
    expect(report.deleted).toEqual([]);
    expect(report.retainedDueToDependents).toEqual(['f', 'i1']);
    expect(liveIds()).toEqual(['f', 'i1', 'i2']);
  });

  it('deletes a whole chain once every member qualifies, newest link first', async () => {
    await addSnapshot('f', 0);
    await addSnapshot('i1', 1, 'f');
    await addSnapshot('i2', 2, 'i1');
    await addSnapshot('f2', 50);

    const report = await applyRetention({ store, policy: { maxAge: '30d' }, now: new Date(EPOCH + 60 * DAY) });

    expect(report.candidates).toEqual(['f', 'i1', 'i2']);
    expect(report.deleted).toEqual(['i2', 'i1', 'f']);
    expect(liveIds()).toEqual(['f2']);
  });

  it('leaves no orphaned incremental when a deletion fails partway', async () => {
    const s1 = await addSnapshot('s1', 0);
    const s2 = await addSnapshot('s2', 1, 's1');
    await addSnapshot('s3', 2, 's2');
    await rm(s2.archivePath);
    await mkdir(s2.archivePath);
    await writeFile(path.join(s2.archivePath, 'blocker'), 'x', 'utf8');

    await expect(
      applyRetention({ store, policy: { maxAge: '1d' }, now: new Date(EPOCH + 10 * DAY) }),
    ).rejects.toMatchObject({ kind: 'WriteFailure', snapshotId: 's2' });

    expect(liveIds()).toEqual(['s1', 's2']);
    expect(store.listChain('s2').map((snapshot) => snapshot.id)).toEqual(['s1', 's2']);
    expect(await exists(s1.archivePath)).toBe(true);
  });

  it('applies maxCount to each source on its own', async () => {
    await addSnapshot('a0', 0, null, '/data/a');
    await addSnapshot('b0', 1, null, '/data/b');
    await addSnapshot('a1', 2, null, '/data/a');
    await addSnapshot('b1', 3, null, '/data/b');
    const now = new Date(EPOCH + 4 * DAY);

    expect(await applyRetention({ store, policy: { maxCount: 2 }, now })).toEqual({
      deleted: [],
      retainedDueToDependents: [],
      candidates: [],
      dryRun: false,
    });

    const report = await applyRetention({ store, policy: { maxCount: 1 }, now });

    expect(report.deleted).toEqual(['a0', 'b0']);
    expect(liveIds()).toEqual(['a1', 'b1']);
  });

  it('only sweeps the given source', async () => {
    await addSnapshot('a0', 0, null, '/data/a');
    await addSnapshot('b0', 1, null, '/data/b');
    await addSnapshot('a1', 2, null, '/data/a');

    const report = await applyRetention({
      store,
      policy: { maxCount: 1 },
      sourcePath: '/data/a',
      now: new Date(EPOCH + 3 * DAY),
    });

    expect(report.deleted).toEqual(['a0']);
    expect(liveIds()).toEqual(['b0', 'a1']);
  });

  it('reports without deleting on a dry run', async () => {
    for (let day = 0; day < 4; day++) {
      await addSnapshot(`s${day}`, day);
    }

    const report = await applyRetention({ store, policy: { maxCount: 2 }, now: new Date(EPOCH + 5 * DAY), dryRun: true });

    expect(report).toMatchObject({ deleted: ['s0', 's1'], dryRun: true });
    expect(liveIds()).toEqual(['s0', 's1', 's2', 's3']);
    expect(await exists(path.join(destination, 's0.tar.gz'))).toBe(true);
  });

  it('does nothing without a policy', async () => {
    await addSnapshot('s0', 0);

    const report = await applyRetention({ store, policy: {}, now: new Date(EPOCH + 400 * DAY) });

    expect(report).toEqual({ deleted: [], retainedDueToDependents: [], candidates: [], dryRun: false });
    expect(liveIds()).toEqual(['s0']);
  });

  it('tolerates an archive that is already gone', async () => {
    const snapshot = await addSnapshot('s0', 0);
    await addSnapshot('s1', 1);
    await rm(snapshot.archivePath);

    const report = await applyRetention({ store, policy: { maxCount: 1 }, now: new Date(EPOCH + 2 * DAY) });

    expect(report.deleted).toEqual(['s0']);
  });
});

describe('resolvePolicy', () => {
  it('parses durations and rejects invalid values', () => {
    expect(resolvePolicy({ maxAge: '2d', maxCount: 4 })).toEqual({ maxAgeMs: 2 * DAY, maxCount: 4 });
    expect(resolvePolicy({})).toEqual({ maxAgeMs: null, maxCount: null });
    expect(captureError(() => resolvePolicy({ maxCount: -1 }))).toMatchObject({ kind: 'InvalidArgument' });
    expect(captureError(() => resolvePolicy({ maxCount: 1.5 }))).toMatchObject({ kind: 'InvalidArgument' });
    expect(captureError(() => resolvePolicy({ maxAge: 'forever' }))).toMatchObject({ kind: 'InvalidArgument' });
  });
});
