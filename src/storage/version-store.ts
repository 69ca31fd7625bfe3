import fs from 'fs/promises';
import type { Stats } from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { ensureDirectoryExists, isErrnoException, readTextIfExists, writeText } from './file-storage';
import { LocalIOError } from '../utils/errors';
import { Sleeper, sleep } from '../utils/retry-handler';
import logger from '../utils/logger';

/**
 * Allocates artifact versions. Values are strictly increasing across process
 * invocations and never reused.
 */
export interface VersionStore {
  allocateNext(): Promise<number>;
  /** The last allocated version, or null when nothing has been allocated. */
  peek(): Promise<number | null>;
}

export interface FileVersionStoreOptions {
  lockTimeoutMs?: number;
  staleLockMs?: number;
  lockRetryDelayMs?: number;
  sleep?: Sleeper;
}

export function parseVersion(raw: string): number {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    return 0;
  }
  const value = parseInt(trimmed, 10);
  return Number.isSafeInteger(value) ? value : 0;
}

/**
 * Version counter kept as plain integer text in a single file. The
 * read-increment-write runs while holding `<file>.lock`, created exclusively.
 */
export class FileVersionStore implements VersionStore {
  private readonly lockPath: string;
  private readonly lockTimeoutMs: number;
  private readonly staleLockMs: number;
  private readonly lockRetryDelayMs: number;
  private readonly sleep: Sleeper;

  constructor(private readonly filePath: string, options: FileVersionStoreOptions = {}) {
    this.lockPath = `${filePath}.lock`;
    this.lockTimeoutMs = options.lockTimeoutMs ?? 10_000;
    this.staleLockMs = options.staleLockMs ?? 60_000;
    this.lockRetryDelayMs = options.lockRetryDelayMs ?? 50;
    this.sleep = options.sleep ?? sleep;
  }

  async allocateNext(): Promise<number> {
    await this.acquireLock();
    try {
      const current = await this.readCurrent();
      const next = current + 1;
      await writeText(this.filePath, String(next));

      logger.info('Artifact version allocated', { version: next, version_file: this.filePath });
      return next;
    } finally {
      await fs.rm(this.lockPath, { force: true });
    }
  }

  async peek(): Promise<number | null> {
    const current = await this.readCurrent();
    return current > 0 ? current : null;
  }

  private async readCurrent(): Promise<number> {
    let raw: string | null;
    try {
      raw = await readTextIfExists(this.filePath);
    } catch (error) {
      logger.warn('Version file unreadable, treating as 0', {
        version_file: this.filePath,
        error: (error as Error).message,
      });
      return 0;
    }

    if (raw === null) {
      return 0;
    }

    const value = parseVersion(raw);
    if (value === 0 && raw.trim() !== '0') {
      logger.warn('Version file corrupt, treating as 0', { version_file: this.filePath, content: raw.slice(0, 40) });
    }
    return value;
  }

  private async acquireLock(): Promise<void> {
    await ensureDirectoryExists(path.dirname(this.lockPath));
    const startedAt = Date.now();

    for (;;) {
      try {
        const handle = await fs.open(this.lockPath, 'wx');
        try {
          await handle.writeFile(String(process.pid));
        } finally {
          await handle.close();
        }
        return;
      } catch (error) {
        if (!isErrnoException(error) || error.code !== 'EEXIST') {
          throw error;
        }
      }

      if (await this.breakStaleLock()) {
        continue;
      }

      if (Date.now() - startedAt >= this.lockTimeoutMs) {
        throw new LocalIOError(`Timed out after ${this.lockTimeoutMs}ms waiting for ${this.lockPath}`, this.lockPath);
      }

      await this.sleep(this.lockRetryDelayMs);
    }
  }

  private async breakStaleLock(): Promise<boolean> {
    let observed: Stats;
    try {
      observed = await fs.stat(this.lockPath);
      if (Date.now() - observed.mtimeMs <= this.staleLockMs) {
        return false;
      }
    } catch (error) {
      // Released between our open() and stat(): retry immediately.
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return true;
      }
      throw error;
    }

    // Rename is atomic; the moved file is then checked against the one judged stale.
    const asidePath = `${this.lockPath}.${uuidv4()}.stale`;
    try {
      await fs.rename(this.lockPath, asidePath);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return true;
      }
      throw error;
    }

    try {
      const moved = await fs.stat(asidePath);
      if (moved.ino !== observed.ino || moved.mtimeMs !== observed.mtimeMs) {
        await this.restoreLock(asidePath);
        return false;
      }

      logger.warn('Breaking stale version lock', { lock_file: this.lockPath, lock_age_ms: Date.now() - observed.mtimeMs });
      return true;
    } finally {
      await fs.rm(asidePath, { force: true });
    }
  }

  /** Puts back a live lock that another waiter re-created after the stale check. */
  private async restoreLock(asidePath: string): Promise<void> {
    try {
      await fs.link(asidePath, this.lockPath);
      logger.debug('Live version lock restored', { lock_file: this.lockPath });
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'EEXIST') {
        throw error;
      }
      logger.error('Version lock displaced while restoring, a newer lock is already held', { lock_file: this.lockPath });
    }
  }
}
