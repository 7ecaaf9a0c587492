import path from 'path';
import { constants } from 'fs';
import { copyFile, mkdir, open, readdir, readFile, rename, rm, stat } from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import { z } from 'zod';
import { LockTable } from '../concurrency/mutex.js';
import { createLogger, describeError, type Logger } from '../logger.js';
import type { StoredRecord } from '../types/index.js';

export type StoreError = 'not_found' | 'rejected' | 'io_error';

export interface WriteFailure {
  success: false;
  error: StoreError;
  message: string;
}

export type WriteResult = { success: true } | WriteFailure;

/**
 * Receives the current records of a collection and returns the records to
 * write back, or a failure to abort without touching the file.
 */
export type Mutator = (records: StoredRecord[]) => StoredRecord[] | WriteFailure;

export interface FileInfo {
  exists: boolean;
  sizeBytes?: number;
  modifiedAt?: string;
}

type ReadResult =
  | { ok: true; records: StoredRecord[] }
  | { ok: false; reason: 'unreadable' | 'malformed'; message: string };

const collectionFileSchema = z.array(z.record(z.union([z.string(), z.array(z.string())])));

const COLLECTION_NAME = /^[A-Za-z0-9_-]+$/;

export function rejectWrite(message: string): WriteFailure {
  return { success: false, error: 'rejected', message };
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function backupStamp(now: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `${date}_${time}`;
}

/**
 * JSON file store, one file per collection.
 *
 * Writes go to `<collection>.json.tmp`, are fsynced, then renamed over
 * `<collection>.json`, so readers see either the old file or the new one.
 * Every call on a collection (reads included) holds that collection's
 * mutex, and read-modify-write calls hold it across the whole sequence.
 */
export class JsonStore {
  private locks = new LockTable();
  private logger: Logger;

  constructor(
    readonly baseDir: string,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('storage');
  }

  filePath(collection: string): string {
    if (!COLLECTION_NAME.test(collection)) {
      throw new RangeError(`Invalid collection name: "${collection}"`);
    }
    return path.join(this.baseDir, `${collection}.json`);
  }

  /**
   * Reads a whole collection. A missing file is an empty collection; so is
   * an unreadable or malformed one, which is logged instead of failing.
   */
  async load(collection: string): Promise<StoredRecord[]> {
    return this.locks.get(collection).runExclusive(async () => {
      const result = await this.read(collection);
      if (result.ok) return result.records;

      this.logger.error('Collection could not be loaded, treating as empty', {
        collection,
        reason: result.reason,
        error: result.message,
      });
      return [];
    });
  }

  async save(collection: string, records: StoredRecord[]): Promise<WriteResult> {
    return this.locks.get(collection).runExclusive(() => this.writeAtomic(collection, records));
  }

  async append(collection: string, record: StoredRecord): Promise<WriteResult> {
    return this.modify(collection, (records) => [...records, record]);
  }

  async update(collection: string, id: string, record: StoredRecord): Promise<WriteResult> {
    return this.modify(collection, (records) => {
      const index = records.findIndex((item) => item.id === id);
      if (index === -1) {
        return { success: false, error: 'not_found', message: `${collection}/${id} not found` };
      }
      const next = [...records];
      next[index] = record;
      return next;
    });
  }

  async delete(collection: string, id: string): Promise<WriteResult> {
    return this.modify(collection, (records) => {
      const remaining = records.filter((item) => item.id !== id);
      if (remaining.length === records.length) {
        return { success: false, error: 'not_found', message: `${collection}/${id} not found` };
      }
      return remaining;
    });
  }

  /**
   * Locked read-modify-write. The mutator sees the current records and
   * decides what is written; nothing else can touch the collection until
   * the new file is in place.
   *
   * A file that exists but cannot be read or parsed is never overwritten.
   */
  async modify(collection: string, mutator: Mutator): Promise<WriteResult> {
    return this.locks.get(collection).runExclusive(async () => {
      const current = await this.read(collection);
      if (!current.ok) {
        this.logger.error('Refusing to modify unreadable collection', {
          collection,
          reason: current.reason,
          error: current.message,
        });
        return { success: false, error: 'io_error', message: current.message };
      }

      const outcome = mutator(current.records);
      if (!Array.isArray(outcome)) {
        if (outcome.error === 'not_found') {
          this.logger.warn('Record not found', { collection, message: outcome.message });
        }
        return outcome;
      }
      return this.writeAtomic(collection, outcome);
    });
  }

  async findById(collection: string, id: string): Promise<StoredRecord | null> {
    const records = await this.load(collection);
    return records.find((item) => item.id === id) ?? null;
  }

  async count(collection: string): Promise<number> {
    return (await this.load(collection)).length;
  }

  async fileInfo(collection: string): Promise<FileInfo> {
    try {
      const info = await stat(this.filePath(collection));
      return { exists: true, sizeBytes: info.size, modifiedAt: info.mtime.toISOString() };
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        this.logger.error('Could not stat collection file', { collection, error: describeError(error) });
      }
      return { exists: false };
    }
  }

  /**
   * Copies the collection file to `<backupDir>/<collection>_<YYYYMMDD_HHMMSS>.json`.
   * An existing backup is never overwritten: a second backup within the same
   * second gets a `_1`, `_2`, ... suffix.
   * Returns the backup file name, or null when there is nothing to copy.
   */
  async backup(collection: string, backupDir: string, now: Date = new Date()): Promise<string | null> {
    return this.locks.get(collection).runExclusive(async () => {
      const source = this.filePath(collection);
      const base = `${collection}_${backupStamp(now)}`;
      try {
        await mkdir(backupDir, { recursive: true });
        for (let attempt = 0; ; attempt++) {
          const fileName = attempt === 0 ? `${base}.json` : `${base}_${attempt}.json`;
          try {
            await copyFile(source, path.join(backupDir, fileName), constants.COPYFILE_EXCL);
            this.logger.info('Backup created', { collection, fileName });
            return fileName;
          } catch (error) {
            if (errorCode(error) !== 'EEXIST') throw error;
            this.logger.warn('Backup name taken, trying next', { collection, fileName });
          }
        }
      } catch (error) {
        if (errorCode(error) === 'ENOENT') {
          this.logger.warn('Nothing to back up', { collection });
        } else {
          this.logger.error('Backup failed', { collection, error: describeError(error) });
        }
        return null;
      }
    });
  }

  /** Backup file names, newest first */
  async listBackups(backupDir: string, collection?: string): Promise<string[]> {
    try {
      const entries = await readdir(backupDir);
      return entries
        .filter((name) => name.endsWith('.json'))
        .filter((name) => collection === undefined || name.startsWith(`${collection}_`))
        .sort()
        .reverse();
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        this.logger.error('Could not list backups', { backupDir, error: describeError(error) });
      }
      return [];
    }
  }

  // ---------------------------------------------------------------------------
  // Unlocked primitives, callers must hold the collection lock
  // ---------------------------------------------------------------------------

  private async read(collection: string): Promise<ReadResult> {
    let text: string;
    try {
      text = await readFile(this.filePath(collection), 'utf-8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        this.logger.debug('Collection file does not exist yet', { collection });
        return { ok: true, records: [] };
      }
      return { ok: false, reason: 'unreadable', message: describeError(error) };
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      return { ok: false, reason: 'malformed', message: describeError(error) };
    }

    const parsed = collectionFileSchema.safeParse(raw);
    if (!parsed.success) {
      return { ok: false, reason: 'malformed', message: parsed.error.issues[0]?.message ?? 'Invalid collection file' };
    }

    this.logger.debug('Collection loaded', { collection, records: parsed.data.length });
    return { ok: true, records: parsed.data };
  }

  private async writeAtomic(collection: string, records: StoredRecord[]): Promise<WriteResult> {
    const target = this.filePath(collection);
    const temp = `${target}.tmp`;
    let handle: FileHandle | undefined;

    try {
      await mkdir(this.baseDir, { recursive: true });
      handle = await open(temp, 'w');
      await handle.writeFile(JSON.stringify(records, null, 2), 'utf-8');
      await handle.sync();
      await handle.close();
      handle = undefined;
      await rename(temp, target);

      this.logger.info('Collection saved', { collection, records: records.length });
      return { success: true };
    } catch (error) {
      const message = describeError(error);
      this.logger.error('Collection save failed, previous file kept', { collection, error: message });
      await this.discardTemp(temp, handle);
      return { success: false, error: 'io_error', message };
    }
  }

  private async discardTemp(temp: string, handle: FileHandle | undefined): Promise<void> {
    if (handle) {
      try {
        await handle.close();
      } catch (error) {
        this.logger.warn('Could not close temp file', { temp, error: describeError(error) });
      }
    }
    try {
      await rm(temp, { force: true });
    } catch (error) {
      this.logger.warn('Could not remove temp file', { temp, error: describeError(error) });
    }
  }
}
