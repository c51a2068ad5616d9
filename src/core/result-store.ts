// ResultStore - generated PNG artifacts on disk, keyed by job id, with a TTL

import { promises as fs } from 'fs';
import path from 'path';
import { TimestampUtil, type Timestamp } from './utils/timestamp.js';
import { logger } from './utils/logger.js';

export interface ResultStoreOptions {
  // Artifacts older than this are treated as absent by get()
  ttlMs: number;
  now?: () => Timestamp;
}

export type ResultLookup =
  | { state: 'available'; data: Buffer }
  | { state: 'expired' }
  | { state: 'missing' };

const ARTIFACT_EXTENSION = '.png';
const TEMP_EXTENSION = '.tmp';
const JOB_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

const isNotFound = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

export class ResultStore {
  private readonly ttlMs: number;
  private readonly now: () => Timestamp;
  private locks = new Map<string, Promise<unknown>>();
  private tempCounter = 0;

  constructor(
    readonly directory: string,
    options: ResultStoreOptions
  ) {
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? TimestampUtil.now;
  }

  async initialize(): Promise<void> {
    await fs.mkdir(this.directory, { recursive: true });
    logger.info(`Result store ready at ${path.resolve(this.directory)}`);
  }

  /**
   * Writes the artifact and returns its reference (the file name). Writing
   * the same job id again replaces the artifact and restarts its TTL.
   */
  async put(jobId: string, data: Buffer): Promise<string> {
    const fileName = this.fileName(jobId);
    const target = path.join(this.directory, fileName);
    const temp = path.join(
      this.directory,
      `${fileName}.${process.pid}-${++this.tempCounter}${TEMP_EXTENSION}`
    );

    await this.withLock(jobId, async () => {
      await fs.mkdir(this.directory, { recursive: true });
      try {
        await fs.writeFile(temp, data);
        await fs.rename(temp, target);
      } catch (error) {
        await fs.rm(temp, { force: true });
        throw error;
      }
    });

    logger.debug(`Stored result for job ${jobId} (${data.length} bytes)`);
    return fileName;
  }

  // Deletes the artifact if present; returns whether one was deleted
  async remove(jobId: string): Promise<boolean> {
    const target = path.join(this.directory, this.fileName(jobId));
    const removed = await this.withLock(jobId, async () => {
      try {
        await fs.unlink(target);
        return true;
      } catch (error) {
        if (isNotFound(error)) return false;
        throw error;
      }
    });
    if (removed) {
      logger.debug(`Removed result for job ${jobId}`);
    }
    return removed;
  }

  // Null before put, after eviction, or once the artifact outlived the TTL
  async get(jobId: string): Promise<Buffer | null> {
    const result = await this.lookup(jobId);
    return result.state === 'available' ? result.data : null;
  }

  async lookup(jobId: string): Promise<ResultLookup> {
    const target = path.join(this.directory, this.fileName(jobId));
    try {
      const stats = await fs.stat(target);
      if (this.now() - stats.mtimeMs > this.ttlMs) {
        return { state: 'expired' };
      }
      return { state: 'available', data: await fs.readFile(target) };
    } catch (error) {
      if (isNotFound(error)) return { state: 'missing' };
      throw error;
    }
  }

  /**
   * Deletes every artifact older than `ttlMs`, along with temporary files
   * left behind by interrupted writes. Returns the number of artifacts deleted.
   */
  async sweep(ttlMs: number): Promise<number> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.directory);
    } catch (error) {
      if (isNotFound(error)) return 0;
      throw error;
    }

    let deleted = 0;
    for (const entry of entries) {
      if (entry.endsWith(ARTIFACT_EXTENSION)) {
        const jobId = entry.slice(0, -ARTIFACT_EXTENSION.length);
        const removed = await this.withLock(jobId, () => this.removeIfExpired(entry, ttlMs));
        if (removed) deleted++;
      } else if (entry.endsWith(TEMP_EXTENSION)) {
        await this.removeIfExpired(entry, ttlMs);
      }
    }

    return deleted;
  }

  private async removeIfExpired(entry: string, ttlMs: number): Promise<boolean> {
    const target = path.join(this.directory, entry);
    try {
      const stats = await fs.stat(target);
      if (this.now() - stats.mtimeMs <= ttlMs) {
        return false;
      }
      await fs.unlink(target);
      logger.debug(`Removed expired file ${entry}`);
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }

  private fileName(jobId: string): string {
    if (!JOB_ID_PATTERN.test(jobId)) {
      throw new Error(`Invalid job id '${jobId}'`);
    }
    return `${jobId}${ARTIFACT_EXTENSION}`;
  }

  // Serialises put, remove and sweep for one job id within this process
  private async withLock<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(key) ?? Promise.resolve();
    // A failed predecessor has already rejected for its own caller
    const run = previous.then(task, task);
    this.locks.set(key, run);
    try {
      return await run;
    } finally {
      if (this.locks.get(key) === run) {
        this.locks.delete(key);
      }
    }
  }
}
