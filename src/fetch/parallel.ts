// src/fetch/parallel.ts
import { fetchSource, type FetchSourceOptions } from './source.js';
import type { MetaCache, SourceResult } from '../types.js';

export interface FetchAllOptions extends FetchSourceOptions {
  /** Prior validators by source; omit for unconditional requests */
  meta?: MetaCache;
}

/**
 * Fetch every source concurrently. `results[i]` always describes
 * `sources[i]`, whatever order the fetches finish in. Resolves only once
 * every fetch has settled; individual failures are carried in their slot.
 */
export async function fetchAll(
  sources: readonly string[],
  options: FetchAllOptions = {},
): Promise<SourceResult[]> {
  const { meta, ...fetchOptions } = options;
  const results = new Array<SourceResult>(sources.length);

  await Promise.all(
    sources.map(async (source, index) => {
      const prior = meta && Object.hasOwn(meta.sources, source) ? meta.sources[source] : null;
      const outcome = await fetchSource(source, prior, fetchOptions);
      results[index] = { ...outcome, index, source };
    }),
  );

  return results;
}
