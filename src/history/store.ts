/**
 * History Log
 *
 * Append-only record of every executed or blocked plan.
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import { HISTORY_DEFAULTS } from '../constants';
import { StructuredLogger, createSilentLogger } from '../core/structured_log';
import { StorageFailureError, toError } from '../errors';
import { HistoryRecord } from '../types';
import { parseHistoryRecord } from '../validation';

/**
 * Storage for history records, passed explicitly to the orchestrator
 */
export interface HistoryStore {
  append(record: HistoryRecord): Promise<void>;

  /** Most recent records, newest first */
  recent(limit: number): Promise<HistoryRecord[]>;

  last(): Promise<HistoryRecord | undefined>;
}

/**
 * In-memory store for tests and embedding
 */
export class InMemoryHistoryStore implements HistoryStore {
  private records: HistoryRecord[] = [];

  async append(record: HistoryRecord): Promise<void> {
    this.records.push(record);
  }

  async recent(limit: number): Promise<HistoryRecord[]> {
    return this.records.slice(-Math.max(0, limit)).reverse();
  }

  async last(): Promise<HistoryRecord | undefined> {
    return this.records[this.records.length - 1];
  }

  all(): HistoryRecord[] {
    return [...this.records];
  }
}

export interface JsonlHistoryStoreOptions {
  filePath: string;

  /** Rotate once the file grows past this size */
  maxFileBytes?: number;

  logger?: StructuredLogger;

  now?: () => Date;
}

/**
 * One JSON record per line. Lines that fail to parse or validate are
 * skipped on read. Appends are serialised through a promise queue.
 */
export class JsonlHistoryStore implements HistoryStore {
  readonly filePath: string;
  private readonly maxFileBytes: number;
  private readonly logger: StructuredLogger;
  private readonly now: () => Date;
  private queue: Promise<void> = Promise.resolve();
  private rotationChecked = false;

  constructor(options: JsonlHistoryStoreOptions) {
    this.filePath = path.resolve(options.filePath);
    this.maxFileBytes = options.maxFileBytes ?? HISTORY_DEFAULTS.MAX_FILE_BYTES;
    this.logger = options.logger ?? createSilentLogger();
    this.now = options.now ?? (() => new Date());
  }

  append(record: HistoryRecord): Promise<void> {
    const next = this.queue.then(() => this.write(record));
    // Keep the queue alive after a failed append; the caller still sees the rejection
    this.queue = next.catch(error => {
      this.logger.error('history_append_failed', { recordId: record.id }, undefined, toError(error));
    });
    return next;
  }

  private async write(record: HistoryRecord): Promise<void> {
    try {
      if (!this.rotationChecked) {
        this.rotationChecked = true;
        await this.rotateIfNeeded();
      }
      await fs.ensureDir(path.dirname(this.filePath));
      await fs.appendFile(this.filePath, JSON.stringify(record) + '\n', 'utf-8');
    } catch (error) {
      throw new StorageFailureError(`Failed to append to history log ${this.filePath}`, toError(error));
    }
  }

  async recent(limit: number): Promise<HistoryRecord[]> {
    await this.queue;
    const records = await this.readAll();
    return records.slice(-Math.max(0, limit)).reverse();
  }

  async last(): Promise<HistoryRecord | undefined> {
    const [record] = await this.recent(1);
    return record;
  }

  /**
   * Every valid record in file order
   */
  async readAll(): Promise<HistoryRecord[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw new StorageFailureError(`Failed to read history log ${this.filePath}`, toError(error));
    }

    const records: HistoryRecord[] = [];
    const lines = content.split('\n');
    lines.forEach((line, lineNumber) => {
      if (line.trim() === '') {
        return;
      }
      try {
        records.push(parseHistoryRecord(JSON.parse(line)));
      } catch (error) {
        this.logger.warn('history_line_skipped', { line: lineNumber + 1, message: toError(error).message });
      }
    });
    return records;
  }

  /**
   * Move the older half of an oversized log to `history.<timestamp>.jsonl`
   */
  async rotateIfNeeded(): Promise<string | null> {
    let size: number;
    try {
      size = (await fs.stat(this.filePath)).size;
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
    if (size <= this.maxFileBytes) {
      return null;
    }

    const lines = (await fs.readFile(this.filePath, 'utf-8')).split('\n').filter(line => line.trim() !== '');
    const split = Math.floor(lines.length / 2);
    const stamp = this.now().toISOString().replace(/[:.]/g, '-');
    const ext = path.extname(this.filePath);
    const archive = path.join(
      path.dirname(this.filePath),
      `${path.basename(this.filePath, ext)}.${stamp}${ext}`
    );

    await fs.writeFile(archive, lines.slice(0, split).map(line => line + '\n').join(''), 'utf-8');
    await fs.writeFile(this.filePath, lines.slice(split).map(line => line + '\n').join(''), 'utf-8');

    this.logger.info('history_rotated', { archive, archivedLines: split, keptLines: lines.length - split });
    return archive;
  }
}
