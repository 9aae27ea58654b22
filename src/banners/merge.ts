// src/banners/merge.ts
import { INDEX_VERSION } from './schema.js';
import type { IndexDocument } from '../types.js';

/**
 * Merge banner indexes in input order. Each banner's URL list keeps the
 * order URLs were first seen and never holds the same URL twice.
 * Null entries (sources that produced nothing) are skipped.
 */
export function mergeIndexes(documents: ReadonlyArray<IndexDocument | null | undefined>): IndexDocument {
  // banner -> URLs in first-seen order
  const merged = new Map<string, { urls: string[]; seen: Set<string> }>();

  for (const doc of documents) {
    if (!doc) continue;

    for (const [banner, urls] of Object.entries(doc.linux)) {
      let entry = merged.get(banner);
      if (!entry) {
        entry = { urls: [], seen: new Set() };
        merged.set(banner, entry);
      }
      for (const url of urls) {
        if (entry.seen.has(url)) continue;
        entry.seen.add(url);
        entry.urls.push(url);
      }
    }
  }

  return {
    version: INDEX_VERSION,
    linux: Object.fromEntries([...merged].map(([banner, { urls }]) => [banner, urls])),
  };
}
