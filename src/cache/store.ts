// src/cache/store.ts
import { mkdir, open, readFile, rename, rm, type FileHandle } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { decodeIndex, serializeIndex } from '../banners/schema.js';
import type { IndexDocument, MetaCache, SourceMeta } from '../types.js';

export const DIR_MODE = 0o755;
export const FILE_MODE = 0o644;

/**
 * Replace `filePath` with `data` atomically: write `<filePath>.tmp`,
 * fsync, close, then rename over the target. Readers see either the old
 * bytes or the new ones. On failure the temp file is removed and the
 * error rethrown; the previous file is left untouched.
 */
export async function atomicWriteFile(filePath: string, data: string): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true, mode: DIR_MODE });

  const tempPath = `${filePath}.tmp`;
  let handle: FileHandle | null = null;

  try {
    handle = await open(tempPath, 'w', FILE_MODE);
    await handle.writeFile(data, 'utf-8');
    await handle.sync();
    await handle.close();
    handle = null;
    await rename(tempPath, filePath);
  } catch (err) {
    if (handle) {
      await handle.close().catch(() => undefined);
    }
    await rm(tempPath, { force: true });
    throw err;
  }
}

export async function writeIndexFile(filePath: string, doc: IndexDocument): Promise<void> {
  await atomicWriteFile(filePath, serializeIndex(doc));
}

/** Read the cached index. Null when missing or not a valid index. */
export async function loadIndexFile(filePath: string): Promise<IndexDocument | null> {
  try {
    return decodeIndex(await readFile(filePath, 'utf-8'));
  } catch {
    return null;
  }
}

// --- metadata sidecar ---

const sourceMetaSchema = z.object({
  etag: z.string().optional(),
  last_modified: z.string().optional(),
  updated_at: z.string(),
});

const metaCacheSchema = z.object({
  sources: z.record(sourceMetaSchema).nullish(),
});

export function emptyMeta(): MetaCache {
  return { sources: {} };
}

/** Parse sidecar JSON text; throws on malformed input. */
export function decodeMeta(text: string): MetaCache {
  const parsed = metaCacheSchema.parse(JSON.parse(text));
  const meta = emptyMeta();
  for (const [source, entry] of Object.entries(parsed.sources ?? {})) {
    const sourceMeta: SourceMeta = { updatedAt: entry.updated_at };
    if (entry.etag) sourceMeta.etag = entry.etag;
    if (entry.last_modified) sourceMeta.lastModified = entry.last_modified;
    meta.sources[source] = sourceMeta;
  }
  return meta;
}

/** Pretty-printed sidecar JSON; empty validators are left out. */
export function serializeMeta(meta: MetaCache): string {
  const sources: Record<string, { etag?: string; last_modified?: string; updated_at: string }> = {};
  for (const [source, entry] of Object.entries(meta.sources)) {
    sources[source] = {
      ...(entry.etag ? { etag: entry.etag } : {}),
      ...(entry.lastModified ? { last_modified: entry.lastModified } : {}),
      updated_at: entry.updatedAt,
    };
  }
  return JSON.stringify({ sources }, null, 2) + '\n';
}

/** Load the sidecar; a missing or unreadable one counts as empty. */
export async function loadMetaFile(filePath: string): Promise<MetaCache> {
  try {
    return decodeMeta(await readFile(filePath, 'utf-8'));
  } catch {
    return emptyMeta();
  }
}

export async function writeMetaFile(filePath: string, meta: MetaCache): Promise<void> {
  await atomicWriteFile(filePath, serializeMeta(meta));
}
