import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createSilentLogger } from '../src/core/structured_log';
import { PathViolationError, SnapshotNotFoundError, StorageFailureError } from '../src/errors';
import {
  assertWithinRoots,
  canonicalize,
  isValidSnapshotId,
  isWithin,
} from '../src/snapshot/path_safety';
import { SnapshotStore, generateSnapshotId } from '../src/snapshot/store';

const DAY_MS = 24 * 60 * 60 * 1000;
const START = Date.parse('2026-01-01T00:00:00.000Z');

describe('SnapshotStore', () => {
  let dir: string;
  let work: string;
  let current: Date;
  let store: SnapshotStore;

  const at = (days: number) => {
    current = new Date(START + days * DAY_MS);
  };

  beforeEach(async () => {
    dir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'cmdgate-snap-')));
    work = path.join(dir, 'work');
    await fs.ensureDir(work);
    current = new Date(START);
    store = new SnapshotStore({
      rootDir: path.join(dir, 'snapshots'),
      allowedRoots: [work],
      now: () => current,
      logger: createSilentLogger(),
    });
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  describe('create and restore', () => {
    it('restores modified files and removes created ones', async () => {
      const file = path.join(work, 'a.txt');
      const created = path.join(work, 'new.txt');
      await fs.writeFile(file, 'one');

      const snapshot = await store.create([file, created]);
      expect(snapshot.entries).toEqual([
        { originalPath: file, existed: true, kind: 'file', backupKey: '0', sizeBytes: 3 },
        { originalPath: created, existed: false, kind: 'absent', backupKey: null, sizeBytes: 0 },
      ]);
      expect(snapshot.sizeBytes).toBe(3);

      await fs.writeFile(file, 'two');
      await fs.writeFile(created, 'x');

      const report = await store.restore(snapshot.id);
      expect(report).toEqual({ snapshotId: snapshot.id, restored: [file], removed: [created], unchanged: [] });
      expect(await fs.readFile(file, 'utf-8')).toBe('one');
      expect(await fs.pathExists(created)).toBe(false);
    });

    it('is idempotent', async () => {
      const file = path.join(work, 'a.txt');
      const created = path.join(work, 'new.txt');
      await fs.writeFile(file, 'one');
      const snapshot = await store.create([file, created]);
      await fs.writeFile(file, 'two');

      await store.restore(snapshot.id);
      const second = await store.restore(snapshot.id);

      expect(second.restored).toEqual([]);
      expect(second.removed).toEqual([]);
      expect(second.unchanged).toEqual([file, created]);
      expect(await fs.readFile(file, 'utf-8')).toBe('one');
    });

    it('restores whole directories', async () => {
      const docs = path.join(work, 'docs');
      await fs.outputFile(path.join(docs, 'x.md'), 'x');
      const snapshot = await store.create([docs]);
      expect(snapshot.entries[0].kind).toBe('directory');
      expect(snapshot.entries[0].sizeBytes).toBe(1);

      await fs.remove(path.join(docs, 'x.md'));
      await fs.writeFile(path.join(docs, 'y.md'), 'y');

      const report = await store.restore(snapshot.id);
      expect(report.restored).toEqual([docs]);
      expect(await fs.readdir(docs)).toEqual(['x.md']);
    });

    it('checks every path before writing anything', async () => {
      const file = path.join(work, 'a.txt');
      await fs.writeFile(file, 'one');
      const snapshot = await store.create([file]);
      await fs.writeFile(file, 'two');

      const other = path.join(dir, 'other');
      await fs.ensureDir(other);

      await expect(store.restore(snapshot.id, { allowedRoots: [other] })).rejects.toBeInstanceOf(PathViolationError);
      expect(await fs.readFile(file, 'utf-8')).toBe('two');
    });

    it('refuses manifests that point outside the allowed roots', async () => {
      const snapshot = await store.create([path.join(work, 'a.txt')]);
      const manifestPath = path.join(dir, 'snapshots', snapshot.id, 'manifest.json');
      const manifest = await fs.readJson(manifestPath);
      manifest.entries[0].originalPath = path.join(work, '..', 'escaped.txt');
      await fs.writeJson(manifestPath, manifest);
      await fs.writeFile(path.join(dir, 'escaped.txt'), 'keep');

      await expect(store.restore(snapshot.id)).rejects.toBeInstanceOf(PathViolationError);
      expect(await fs.readFile(path.join(dir, 'escaped.txt'), 'utf-8')).toBe('keep');
    });

    it('fails creation with StorageFailureError and leaves nothing behind', async () => {
      const blocker = path.join(dir, 'blocker');
      await fs.writeFile(blocker, '');
      const logger = createSilentLogger();
      const broken = new SnapshotStore({ rootDir: blocker, logger });

      await expect(broken.create([path.join(work, 'a.txt')])).rejects.toThrow(/^Failed to create snapshot /);
      await expect(broken.create([])).rejects.toBeInstanceOf(StorageFailureError);
      expect((await fs.stat(blocker)).isFile()).toBe(true);
      expect(logger.getEntriesByEvent('snapshot_failed')).toHaveLength(2);
    });
  });

  describe('lookup', () => {
    it('throws SnapshotNotFoundError for unknown ids', async () => {
      await expect(store.get('missing')).rejects.toBeInstanceOf(SnapshotNotFoundError);
      expect(await store.has('missing')).toBe(false);
    });

    it('rejects ids that are not a single path segment', async () => {
      await expect(store.get('../work')).rejects.toBeInstanceOf(PathViolationError);
      expect(await store.has('.staging')).toBe(false);
    });

    it('lists snapshots newest first', async () => {
      const first = await store.create([]);
      at(1);
      const second = await store.create([]);
      const third = await store.create([]);

      const ids = (await store.list()).map(s => s.id);
      expect(ids).toEqual([third.id, second.id, first.id]);
    });

    it('is empty before anything is stored', async () => {
      expect(await store.list()).toEqual([]);
      expect(await store.stats()).toEqual({ count: 0, totalBytes: 0, newest: undefined, oldest: undefined });
    });

    it('deletes snapshots', async () => {
      const snapshot = await store.create([]);
      expect(await store.delete(snapshot.id)).toBe(true);
      expect(await store.delete(snapshot.id)).toBe(false);
      expect(await store.list()).toEqual([]);
    });
  });

  describe('prune', () => {
    async function seed(): Promise<string[]> {
      const ids: string[] = [];
      for (const day of [0, 10, 40]) {
        at(day);
        ids.push((await store.create([])).id);
      }
      return ids;
    }

    it('deletes snapshots past the age cutoff but keeps the newest', async () => {
      const [, , newest] = await seed();
      at(80);

      expect(await store.prune({ keepNewest: 1, olderThanDays: 30 })).toBe(2);
      expect((await store.list()).map(s => s.id)).toEqual([newest]);
    });

    it('keeps snapshots exactly at the cutoff', async () => {
      const [, middle, newest] = await seed();
      at(40);

      expect(await store.prune({ keepNewest: 0, olderThanDays: 30 })).toBe(1);
      expect((await store.list()).map(s => s.id)).toEqual([newest, middle]);
    });

    it('does nothing below the auto-prune threshold', async () => {
      await seed();
      at(400);
      expect(await store.autoPrune()).toBe(0);
      expect(await store.list()).toHaveLength(3);
    });
  });
});

describe('generateSnapshotId', () => {
  it('is time-sortable and unique', () => {
    const a = generateSnapshotId(new Date(0));
    const b = generateSnapshotId(new Date(0));
    expect(a).toMatch(/^000000000-[0-9a-z]{3}[0-9a-f]{6}$/);
    expect(a).not.toBe(b);
    expect(generateSnapshotId(new Date(START)) > a).toBe(true);
  });
});

describe('path safety', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'cmdgate-path-')));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('compares paths by segment', () => {
    expect(isWithin('/srv/app', '/srv/app')).toBe(true);
    expect(isWithin('/srv/app/a/b', '/srv/app')).toBe(true);
    expect(isWithin('/srv/application', '/srv/app')).toBe(false);
    expect(isWithin('/srv', '/srv/app')).toBe(false);
    expect(isWithin('/srv/app/..data', '/srv/app')).toBe(true);
  });

  it('canonicalises paths that do not exist yet', async () => {
    expect(await canonicalize(path.join(dir, 'a', '..', 'b', 'c.txt'))).toBe(path.join(dir, 'b', 'c.txt'));
  });

  it('follows a dangling symlink to where a write would land', async () => {
    const target = path.join(dir, 'elsewhere', 'f.txt');
    await fs.symlink(target, path.join(dir, 'dangling'));
    expect(await canonicalize(path.join(dir, 'dangling'))).toBe(target);
  });

  it('resolves symlinked parents', async () => {
    const real = path.join(dir, 'real');
    await fs.ensureDir(real);
    await fs.symlink(real, path.join(dir, 'link'));
    expect(await assertWithinRoots(path.join(dir, 'link', 'f.txt'), [real])).toBe(path.join(real, 'f.txt'));
  });

  it('rejects escapes through a symlinked directory', async () => {
    const root = path.join(dir, 'root');
    const outside = path.join(dir, 'outside');
    await fs.ensureDir(root);
    await fs.ensureDir(outside);
    await fs.symlink(outside, path.join(root, 'out'));

    await expect(assertWithinRoots(path.join(root, 'out', 'f.txt'), [root])).rejects.toBeInstanceOf(
      PathViolationError
    );
  });

  it('does not follow a symlink in the final segment', async () => {
    const root = path.join(dir, 'root');
    await fs.ensureDir(root);
    await fs.symlink('/etc/hostname', path.join(root, 'host'));
    expect(await assertWithinRoots(path.join(root, 'host'), [root])).toBe(path.join(root, 'host'));
  });

  it('validates snapshot ids', () => {
    expect(isValidSnapshotId('abc-123')).toBe(true);
    expect(isValidSnapshotId('')).toBe(false);
    expect(isValidSnapshotId('.staging')).toBe(false);
    expect(isValidSnapshotId('a/b')).toBe(false);
  });
});
