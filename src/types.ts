// src/types.ts

/** Volatility3 ISF banner index: kernel banner → symbol file URLs */
export interface IndexDocument {
  version: number;
  linux: Record<string, string[]>;
}

/** Validators remembered for one source, used for conditional requests */
export interface SourceMeta {
  etag?: string;
  lastModified?: string;
  updatedAt: string; // ISO timestamp of the last successful fetch
}

/** Freshness state of every configured source (the metadata sidecar) */
export interface MetaCache {
  sources: Record<string, SourceMeta>;
}

/** What happened when one source was fetched */
export type FetchOutcome =
  | { status: 'modified'; data: IndexDocument; meta: SourceMeta }
  | { status: 'unmodified'; meta: SourceMeta | null }
  | { status: 'failed'; error: Error };

/** Fetch outcome for the source at `index` in the input list */
export type SourceResult = FetchOutcome & {
  index: number;
  source: string;
};

export interface CacheStats {
  valid: boolean;
  path?: string;
  entries?: number;
  sizeBytes?: number;
  ageSeconds?: number;
  updatedAt?: string;
}

export interface Config {
  cacheDir: string;
  configDir: string;
  cacheFile: string;
  metaFile: string;
  lockFile: string;
  configFile: string;
  ttlMs: number;
  sources: string[];
}
