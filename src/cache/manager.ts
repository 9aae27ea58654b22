// src/cache/manager.ts
import { rm, stat, readFile } from 'node:fs/promises';
import { countBanners, decodeIndex } from '../banners/schema.js';
import { mergeIndexes } from '../banners/merge.js';
import { fetchAll } from '../fetch/parallel.js';
import { AllSourcesFailedError, errorMessage } from '../errors.js';
import { CacheLock } from './lock.js';
import {
  emptyMeta,
  loadIndexFile,
  loadMetaFile,
  writeIndexFile,
  writeMetaFile,
} from './store.js';
import type { CacheStats, Config, IndexDocument, MetaCache, SourceResult } from '../types.js';

export interface BannerCacheOptions {
  /** Emit one diagnostic line per source during updates */
  verbose?: boolean;
  /** Diagnostic sink (default: console.error) */
  log?: (line: string) => void;
  /** Per-request timeout in ms for remote sources */
  timeout?: number;
}

export interface UpdateOptions {
  /** Refetch even when the cache is still fresh */
  force?: boolean;
  signal?: AbortSignal;
}

export interface SmartUpdateOptions {
  signal?: AbortSignal;
}

/**
 * Manages the merged ISF banner cache: freshness checks, full and
 * conditional updates, stats and removal. Writers in other processes are
 * kept out by a lock file in the cache directory; within one process
 * callers must not run updates concurrently.
 */
export class BannerCache {
  private readonly lock: CacheLock;
  private readonly verbose: boolean;
  private readonly log: (line: string) => void;
  private readonly timeout: number | undefined;

  constructor(
    readonly config: Config,
    options: BannerCacheOptions = {},
  ) {
    this.lock = new CacheLock(config.lockFile);
    this.verbose = options.verbose ?? false;
    this.log = options.log ?? ((line) => console.error(line));
    this.timeout = options.timeout;
  }

  /** True when the cache file exists, decodes, and is younger than the TTL. */
  async isValid(): Promise<boolean> {
    const age = await this.ageMs();
    if (age === null || age < 0 || age >= this.config.ttlMs) return false;
    return (await loadIndexFile(this.config.cacheFile)) !== null;
  }

  /** Cache file path if it exists (fresh or not). */
  async path(): Promise<string | null> {
    return (await this.ageMs()) === null ? null : this.config.cacheFile;
  }

  /** `file://` URI for volatility3's `-u` flag, if the cache exists. */
  async uri(): Promise<string | null> {
    const path = await this.path();
    return path === null ? null : `file://${path}`;
  }

  async stats(): Promise<CacheStats> {
    try {
      const info = await stat(this.config.cacheFile);
      const doc = decodeIndex(await readFile(this.config.cacheFile, 'utf-8'));
      return {
        valid: true,
        path: this.config.cacheFile,
        entries: countBanners(doc),
        sizeBytes: info.size,
        ageSeconds: Math.floor((Date.now() - info.mtimeMs) / 1000),
        updatedAt: info.mtime.toISOString(),
      };
    } catch {
      return { valid: false };
    }
  }

  /** Remove the cache file. Missing is fine. */
  async clear(): Promise<void> {
    await rm(this.config.cacheFile, { force: true });
  }

  /** Make sure a fresh cache exists, updating only when needed. */
  async ensure(signal?: AbortSignal): Promise<void> {
    if (await this.isValid()) return;
    await this.update({ force: false, signal });
  }

  /**
   * Fetch every source unconditionally, merge what succeeded and publish
   * it. Skipped when not forced and the cache is fresh. Throws
   * AllSourcesFailedError when nothing could be fetched and LockedError
   * when another process is updating.
   */
  async update(options: UpdateOptions = {}): Promise<void> {
    if (!options.force && (await this.isValid())) return;

    await this.lock.withLock(async () => {
      const results = await fetchAll(this.config.sources, {
        signal: options.signal,
        timeout: this.timeout,
      });

      const documents: IndexDocument[] = [];
      const meta = emptyMeta();
      for (const result of results) {
        this.report(result);
        if (result.status === 'modified') {
          documents.push(result.data);
          meta.sources[result.source] = result.meta;
        }
      }

      if (documents.length === 0) {
        throw new AllSourcesFailedError();
      }

      await writeIndexFile(this.config.cacheFile, mergeIndexes(documents));
      await this.saveMeta(meta);
    });
  }

  /**
   * Conditional update using each source's remembered ETag/Last-Modified.
   * Unchanged sources contribute the currently cached content; failed
   * sources keep their previous validators. Resolves true when at least
   * one source changed and the cache was rewritten, false when nothing
   * changed.
   */
  async smartUpdate(options: SmartUpdateOptions = {}): Promise<boolean> {
    return this.lock.withLock(async () => {
      const meta = await loadMetaFile(this.config.metaFile);
      const results = await fetchAll(this.config.sources, {
        meta,
        signal: options.signal,
        timeout: this.timeout,
      });

      const nextMeta = emptyMeta();
      const documents: IndexDocument[] = [];
      let current: IndexDocument | null | undefined;
      let anyModified = false;

      for (const result of results) {
        this.report(result);

        switch (result.status) {
          case 'failed': {
            if (Object.hasOwn(meta.sources, result.source)) {
              nextMeta.sources[result.source] = meta.sources[result.source];
            }
            break;
          }
          case 'unmodified': {
            if (result.meta) nextMeta.sources[result.source] = result.meta;
            // The current document is contributed once, however many sources are unchanged.
            if (current === undefined) {
              current = await loadIndexFile(this.config.cacheFile);
              if (current) documents.push(current);
            }
            break;
          }
          case 'modified': {
            nextMeta.sources[result.source] = result.meta;
            documents.push(result.data);
            anyModified = true;
            break;
          }
        }
      }

      await this.saveMeta(nextMeta);

      if (!anyModified && (await this.isValid())) {
        return false;
      }

      if (documents.length === 0) {
        throw new AllSourcesFailedError();
      }

      await writeIndexFile(this.config.cacheFile, mergeIndexes(documents));
      return anyModified;
    });
  }

  private async ageMs(): Promise<number | null> {
    try {
      const info = await stat(this.config.cacheFile);
      return Date.now() - info.mtimeMs;
    } catch {
      return null;
    }
  }

  // Sidecar write failures are reported, never thrown.
  private async saveMeta(meta: MetaCache): Promise<void> {
    try {
      await writeMetaFile(this.config.metaFile, meta);
    } catch (err) {
      this.log(`warning: saving source metadata: ${errorMessage(err)}`);
    }
  }

  private report(result: SourceResult): void {
    if (!this.verbose) return;
    switch (result.status) {
      case 'modified':
        this.log(`source ${result.source}: updated`);
        break;
      case 'unmodified':
        this.log(`source ${result.source}: not modified`);
        break;
      case 'failed':
        this.log(`source ${result.source}: ${result.error.message}`);
        break;
    }
  }
}
