// src/cache/lock.ts
import { mkdir, rm, stat, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { LockedError } from '../errors.js';
import { DIR_MODE, FILE_MODE } from './store.js';

/** A lock file this old is assumed to belong to a crashed process. */
export const LOCK_STALE_MS = 5 * 60 * 1000;

/**
 * Advisory cross-process lock over the cache directory: a lock file
 * holding the owner's PID. Staleness is judged by the file's mtime, not
 * its contents. Not reentrant.
 */
export class CacheLock {
  constructor(
    private readonly lockPath: string,
    private readonly staleMs: number = LOCK_STALE_MS,
  ) {}

  /** Take the lock or throw LockedError when a live holder exists. */
  async acquire(): Promise<void> {
    await mkdir(dirname(this.lockPath), { recursive: true, mode: DIR_MODE });

    const age = await this.age();
    if (age !== null) {
      if (age < this.staleMs) {
        throw new LockedError(this.lockPath);
      }
      await rm(this.lockPath, { force: true });
    }

    try {
      // wx: fail if another process created the file since we looked
      await writeFile(this.lockPath, String(process.pid), { mode: FILE_MODE, flag: 'wx' });
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'EEXIST') {
        throw new LockedError(this.lockPath);
      }
      throw err;
    }
  }

  /** Remove the lock file. Releasing twice is a no-op. */
  async release(): Promise<void> {
    await rm(this.lockPath, { force: true });
  }

  /** Run `fn` while holding the lock; the lock is released on every exit path. */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      await this.release();
    }
  }

  private async age(): Promise<number | null> {
    try {
      const info = await stat(this.lockPath);
      return Date.now() - info.mtimeMs;
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') return null;
      throw err;
    }
  }
}
