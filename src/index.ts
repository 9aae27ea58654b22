// src/index.ts
export { BannerCache, type BannerCacheOptions, type UpdateOptions, type SmartUpdateOptions } from './cache/manager.js';
export { CacheLock, LOCK_STALE_MS } from './cache/lock.js';
export { atomicWriteFile, writeIndexFile, loadIndexFile, loadMetaFile, writeMetaFile } from './cache/store.js';
export { fetchSource, sourceKind, resolveLocalPath, USER_AGENT, type FetchSourceOptions } from './fetch/source.js';
export { fetchAll, type FetchAllOptions } from './fetch/parallel.js';
export { mergeIndexes } from './banners/merge.js';
export { decodeIndex, parseIndex, serializeIndex } from './banners/schema.js';
export { loadConfig, createConfig, initConfig, DEFAULT_SOURCES, DEFAULT_TTL_MS } from './config.js';
export { configureVolatility3 } from './setup/volatility.js';
export { installService } from './setup/service.js';
export { setup } from './setup/index.js';
export { LockedError, AllSourcesFailedError, HttpStatusError, InvalidIndexError } from './errors.js';
export type { IndexDocument, SourceMeta, MetaCache, FetchOutcome, SourceResult, CacheStats, Config } from './types.js';
