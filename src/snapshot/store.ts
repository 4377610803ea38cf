/**
 * Snapshot Store
 *
 * Captures the state of a set of paths before a plan runs and restores it on
 * undo. Layout under the store root:
 *
 * ```
 * <root>/<id>/manifest.json
 * <root>/<id>/files/<backupKey>
 * <root>/.staging/<id>/...        in-progress creation
 * ```
 *
 * A snapshot becomes visible only when its staging directory is renamed into
 * place, so a failed creation never leaves a partial snapshot behind.
 */

import { randomBytes } from 'crypto';
import * as fs from 'fs-extra';
import * as path from 'path';
import { RETENTION_DEFAULTS, STATE_LAYOUT } from '../constants';
import { StructuredLogger, createSilentLogger } from '../core/structured_log';
import {
  PathViolationError,
  SnapshotNotFoundError,
  StorageFailureError,
  ValidationError,
  toError,
} from '../errors';
import { RestoreReport, Snapshot, SnapshotEntry, SnapshotSummary } from '../types';
import { parseSnapshotManifest } from '../validation';
import { assertWithinRoots, isValidSnapshotId } from './path_safety';

export interface SnapshotStoreOptions {
  /** Directory holding one sub-directory per snapshot */
  rootDir: string;

  /** Roots a restore may write under, unless the call overrides them */
  allowedRoots?: readonly string[];

  logger?: StructuredLogger;

  /** Clock; injectable so retention can be tested */
  now?: () => Date;

  /** Snapshot count above which `autoPrune` prunes */
  autoPruneThreshold?: number;
}

export interface PruneOptions {
  /** The newest N snapshots are never deleted */
  keepNewest: number;

  /** Older snapshots are deleted once their age exceeds this many days */
  olderThanDays: number;
}

export interface RestoreOptions {
  allowedRoots?: readonly string[];
}

export interface SnapshotStats {
  count: number;
  totalBytes: number;
  oldest?: string;
  newest?: string;
}

interface RestoreStep {
  entry: SnapshotEntry;
  target: string;
  backup: string | null;
}

const DAY_MS = 24 * 60 * 60 * 1000;

let sequence = 0;

/**
 * Time-sortable id: base36 milliseconds, a process-local sequence and a
 * random suffix
 */
export function generateSnapshotId(now: Date): string {
  sequence = (sequence + 1) % 36 ** 3;
  const time = now.getTime().toString(36).padStart(9, '0');
  const seq = sequence.toString(36).padStart(3, '0');
  return `${time}-${seq}${randomBytes(3).toString('hex')}`;
}

/**
 * Snapshot Store
 */
export class SnapshotStore {
  readonly rootDir: string;
  private readonly allowedRoots: readonly string[];
  private readonly logger: StructuredLogger;
  private readonly now: () => Date;
  private readonly autoPruneThreshold: number;

  constructor(options: SnapshotStoreOptions) {
    this.rootDir = path.resolve(options.rootDir);
    this.allowedRoots = options.allowedRoots ?? [];
    this.logger = options.logger ?? createSilentLogger();
    this.now = options.now ?? (() => new Date());
    this.autoPruneThreshold = options.autoPruneThreshold ?? RETENTION_DEFAULTS.AUTO_PRUNE_THRESHOLD;
  }

  // ==========================================================================
  // Creation
  // ==========================================================================

  /**
   * Copy every existing path into a new snapshot. Missing paths are recorded
   * so restore can delete whatever the plan creates there.
   */
  async create(paths: readonly string[], traceId?: string): Promise<Snapshot> {
    const createdAt = this.now();
    const id = generateSnapshotId(createdAt);
    const stagingDir = path.join(this.rootDir, STATE_LAYOUT.STAGING_DIR, id);
    const filesDir = path.join(stagingDir, STATE_LAYOUT.FILES_DIR);
    const targets = Array.from(new Set(paths.map(p => path.resolve(p))));

    try {
      await fs.ensureDir(filesDir);

      const entries = await Promise.all(
        targets.map((target, index) => this.captureEntry(target, String(index), filesDir))
      );

      const snapshot: Snapshot = {
        id,
        createdAt: createdAt.toISOString(),
        entries,
        sizeBytes: entries.reduce((sum, entry) => sum + entry.sizeBytes, 0),
      };

      await fs.writeJson(path.join(stagingDir, STATE_LAYOUT.MANIFEST_FILE), snapshot, { spaces: 2 });
      await fs.rename(stagingDir, this.snapshotDir(id));

      this.logger.info(
        'snapshot_created',
        { snapshotId: id, entries: entries.length, sizeBytes: snapshot.sizeBytes },
        traceId
      );
      return snapshot;
    } catch (error) {
      await this.discardStaging(stagingDir, traceId);
      this.logger.error('snapshot_failed', { snapshotId: id, paths: targets }, traceId, toError(error));
      throw new StorageFailureError(`Failed to create snapshot ${id}`, toError(error));
    }
  }

  private async captureEntry(target: string, backupKey: string, filesDir: string): Promise<SnapshotEntry> {
    let stats: fs.Stats;
    try {
      stats = await fs.lstat(target);
    } catch (error) {
      if (isMissing(error)) {
        return { originalPath: target, existed: false, kind: 'absent', backupKey: null, sizeBytes: 0 };
      }
      throw error;
    }

    await fs.copy(target, path.join(filesDir, backupKey), {
      preserveTimestamps: true,
      dereference: false,
      errorOnExist: true,
    });

    const isDirectory = stats.isDirectory();
    return {
      originalPath: target,
      existed: true,
      kind: isDirectory ? 'directory' : 'file',
      backupKey,
      sizeBytes: isDirectory ? await treeSize(target) : stats.size,
    };
  }

  private async discardStaging(stagingDir: string, traceId?: string): Promise<void> {
    try {
      await fs.remove(stagingDir);
    } catch (error) {
      this.logger.warn('snapshot_staging_cleanup_failed', { stagingDir }, traceId);
      this.logger.debug('snapshot_staging_cleanup_error', { message: toError(error).message }, traceId);
    }
  }

  // ==========================================================================
  // Restore
  // ==========================================================================

  /**
   * Put every captured path back the way it was. Every path is checked before
   * anything is written; restoring the same snapshot twice is a no-op the
   * second time.
   */
  async restore(id: string, options: RestoreOptions = {}, traceId?: string): Promise<RestoreReport> {
    const snapshot = await this.get(id);
    const roots = options.allowedRoots ?? this.allowedRoots;
    const dir = this.snapshotDir(id);
    const filesDir = path.join(dir, STATE_LAYOUT.FILES_DIR);

    const steps: RestoreStep[] = [];
    for (const entry of snapshot.entries) {
      const target = await assertWithinRoots(entry.originalPath, roots);

      let backup: string | null = null;
      if (entry.existed) {
        if (entry.backupKey === null || !isValidSnapshotId(entry.backupKey)) {
          throw new PathViolationError(path.join(filesDir, String(entry.backupKey)), [dir]);
        }
        backup = await assertWithinRoots(path.join(filesDir, entry.backupKey), [dir]);
      }
      steps.push({ entry, target, backup });
    }

    const report: RestoreReport = { snapshotId: id, restored: [], removed: [], unchanged: [] };

    for (const step of steps) {
      if (step.backup !== null) {
        if (await sameTree(step.backup, step.target)) {
          report.unchanged.push(step.target);
          continue;
        }
        await fs.remove(step.target);
        await fs.ensureDir(path.dirname(step.target));
        await fs.copy(step.backup, step.target, { preserveTimestamps: true, dereference: false });
        report.restored.push(step.target);
      } else if (await exists(step.target)) {
        await fs.remove(step.target);
        report.removed.push(step.target);
      } else {
        report.unchanged.push(step.target);
      }
    }

    this.logger.info(
      'snapshot_restored',
      {
        snapshotId: id,
        restored: report.restored.length,
        removed: report.removed.length,
        unchanged: report.unchanged.length,
      },
      traceId
    );
    return report;
  }

  // ==========================================================================
  // Lookup
  // ==========================================================================

  /**
   * Load a snapshot manifest
   */
  async get(id: string): Promise<Snapshot> {
    if (!isValidSnapshotId(id)) {
      throw new PathViolationError(id, [this.rootDir]);
    }

    const manifestPath = path.join(this.snapshotDir(id), STATE_LAYOUT.MANIFEST_FILE);
    let data: unknown;
    try {
      data = await fs.readJson(manifestPath);
    } catch (error) {
      if (isMissing(error)) {
        throw new SnapshotNotFoundError(id);
      }
      throw new StorageFailureError(`Failed to read snapshot ${id}`, toError(error));
    }

    const snapshot = parseSnapshotManifest(data);
    if (snapshot.id !== id) {
      throw new ValidationError(`Snapshot manifest id '${snapshot.id}' does not match directory '${id}'`);
    }
    return snapshot;
  }

  async has(id: string): Promise<boolean> {
    if (!isValidSnapshotId(id)) {
      return false;
    }
    return exists(path.join(this.snapshotDir(id), STATE_LAYOUT.MANIFEST_FILE));
  }

  /**
   * Summaries of every readable snapshot, newest first
   */
  async list(): Promise<SnapshotSummary[]> {
    if (!(await exists(this.rootDir))) {
      return [];
    }

    const names = await fs.readdir(this.rootDir);
    const summaries: SnapshotSummary[] = [];

    for (const name of names) {
      if (!isValidSnapshotId(name)) {
        continue;
      }
      try {
        const snapshot = await this.get(name);
        summaries.push({
          id: snapshot.id,
          createdAt: snapshot.createdAt,
          entryCount: snapshot.entries.length,
          sizeBytes: snapshot.sizeBytes,
        });
      } catch (error) {
        this.logger.debug('snapshot_unreadable', { snapshotId: name, message: toError(error).message });
      }
    }

    return summaries.sort((a, b) => {
      const byTime = Date.parse(b.createdAt) - Date.parse(a.createdAt);
      if (byTime !== 0) {
        return byTime;
      }
      return a.id < b.id ? 1 : a.id > b.id ? -1 : 0;
    });
  }

  async stats(): Promise<SnapshotStats> {
    const summaries = await this.list();
    return {
      count: summaries.length,
      totalBytes: summaries.reduce((sum, s) => sum + s.sizeBytes, 0),
      newest: summaries[0]?.createdAt,
      oldest: summaries[summaries.length - 1]?.createdAt,
    };
  }

  // ==========================================================================
  // Deletion and retention
  // ==========================================================================

  /**
   * Delete a snapshot; false when it did not exist
   */
  async delete(id: string, traceId?: string): Promise<boolean> {
    if (!(await this.has(id))) {
      return false;
    }
    await fs.remove(this.snapshotDir(id));
    this.logger.info('snapshot_deleted', { snapshotId: id }, traceId);
    return true;
  }

  /**
   * Delete snapshots older than `olderThanDays`, never touching the
   * `keepNewest` newest. Returns the number deleted.
   */
  async prune(options: PruneOptions, traceId?: string): Promise<number> {
    const keepNewest = Math.max(0, Math.floor(options.keepNewest));
    const cutoff = this.now().getTime() - options.olderThanDays * DAY_MS;
    const summaries = await this.list();

    let pruned = 0;
    for (const summary of summaries.slice(keepNewest)) {
      if (Date.parse(summary.createdAt) < cutoff) {
        await fs.remove(this.snapshotDir(summary.id));
        pruned++;
      }
    }

    await fs.remove(path.join(this.rootDir, STATE_LAYOUT.STAGING_DIR));

    this.logger.info(
      'snapshots_pruned',
      { pruned, kept: summaries.length - pruned, keepNewest, olderThanDays: options.olderThanDays },
      traceId
    );
    return pruned;
  }

  /**
   * Prune with the default retention once the store grows past its threshold
   */
  async autoPrune(traceId?: string): Promise<number> {
    const summaries = await this.list();
    if (summaries.length <= this.autoPruneThreshold) {
      return 0;
    }
    return this.prune(
      { keepNewest: RETENTION_DEFAULTS.KEEP_NEWEST, olderThanDays: RETENTION_DEFAULTS.OLDER_THAN_DAYS },
      traceId
    );
  }

  private snapshotDir(id: string): string {
    return path.join(this.rootDir, id);
  }
}

// ============================================================================
// Helpers
// ============================================================================

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function exists(target: string): Promise<boolean> {
  try {
    await fs.lstat(target);
    return true;
  } catch (error) {
    if (isMissing(error)) {
      return false;
    }
    throw error;
  }
}

async function treeSize(target: string): Promise<number> {
  const stats = await fs.lstat(target);
  if (!stats.isDirectory()) {
    return stats.size;
  }
  const children = await fs.readdir(target);
  const sizes = await Promise.all(children.map(child => treeSize(path.join(target, child))));
  return sizes.reduce((sum, size) => sum + size, 0);
}

/**
 * Two paths hold identical content: same kind, same bytes, same link
 * targets, same directory listings
 */
async function sameTree(a: string, b: string): Promise<boolean> {
  let statsA: fs.Stats;
  let statsB: fs.Stats;
  try {
    [statsA, statsB] = await Promise.all([fs.lstat(a), fs.lstat(b)]);
  } catch (error) {
    if (isMissing(error)) {
      return false;
    }
    throw error;
  }

  if (statsA.isSymbolicLink() || statsB.isSymbolicLink()) {
    return (
      statsA.isSymbolicLink() &&
      statsB.isSymbolicLink() &&
      (await fs.readlink(a)) === (await fs.readlink(b))
    );
  }

  if (statsA.isDirectory() || statsB.isDirectory()) {
    if (!(statsA.isDirectory() && statsB.isDirectory())) {
      return false;
    }
    const [namesA, namesB] = await Promise.all([fs.readdir(a), fs.readdir(b)]);
    namesA.sort();
    namesB.sort();
    if (namesA.length !== namesB.length || namesA.some((name, i) => name !== namesB[i])) {
      return false;
    }
    for (const name of namesA) {
      if (!(await sameTree(path.join(a, name), path.join(b, name)))) {
        return false;
      }
    }
    return true;
  }

  if (statsA.size !== statsB.size) {
    return false;
  }
  const [bufA, bufB] = await Promise.all([fs.readFile(a), fs.readFile(b)]);
  return bufA.equals(bufB);
}
