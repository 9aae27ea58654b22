// src/fetch/source.ts
import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { decodeIndex } from '../banners/schema.js';
import { HttpStatusError, toError } from '../errors.js';
import type { FetchOutcome, SourceMeta } from '../types.js';

export const DEFAULT_TIMEOUT = 30_000;
export const USER_AGENT = 'basar/1.0';

export interface FetchSourceOptions {
  /** Cancels the fetch; remote requests abort as soon as it fires */
  signal?: AbortSignal;
  /** Per-request timeout in ms for remote sources (default 30s) */
  timeout?: number;
}

export type SourceKind = 'local' | 'remote';

/**
 * Classify a source reference. Checked in order: `file://`, a leading `/`
 * or `~`, then anything without a `://` scheme separator is a local path.
 */
export function sourceKind(source: string): SourceKind {
  if (source.startsWith('file://')) return 'local';
  if (source.startsWith('/') || source.startsWith('~')) return 'local';
  if (!source.includes('://')) return 'local';
  return 'remote';
}

/** Strip `file://` and expand a leading `~` against the home directory. */
export function resolveLocalPath(source: string, home: string = homedir()): string {
  const path = source.startsWith('file://') ? source.slice('file://'.length) : source;
  if (path.startsWith('~')) {
    return join(home, path.slice(1));
  }
  return path;
}

/**
 * Fetch one banner index. Never throws: transport, status, decode and
 * cancellation problems all come back as `{ status: 'failed' }`.
 *
 * `prior` validators are sent as If-None-Match / If-Modified-Since; on a
 * 304 they are handed back unchanged.
 */
export async function fetchSource(
  source: string,
  prior: SourceMeta | null = null,
  options: FetchSourceOptions = {},
): Promise<FetchOutcome> {
  try {
    options.signal?.throwIfAborted();
    if (sourceKind(source) === 'local') {
      return await fetchLocal(source);
    }
    return await fetchRemote(source, prior, options);
  } catch (err) {
    return { status: 'failed', error: toError(err) };
  }
}

// Local files are always reported as modified; they carry no validators.
async function fetchLocal(source: string): Promise<FetchOutcome> {
  const text = await readFile(resolveLocalPath(source), 'utf-8');
  const data = decodeIndex(text);
  return {
    status: 'modified',
    data,
    meta: { updatedAt: new Date().toISOString() },
  };
}

async function fetchRemote(
  url: string,
  prior: SourceMeta | null,
  options: FetchSourceOptions,
): Promise<FetchOutcome> {
  const timeoutSignal = AbortSignal.timeout(options.timeout ?? DEFAULT_TIMEOUT);
  const signal = options.signal
    ? AbortSignal.any([options.signal, timeoutSignal])
    : timeoutSignal;

  const headers: Record<string, string> = { 'User-Agent': USER_AGENT };
  if (prior?.etag) headers['If-None-Match'] = prior.etag;
  if (prior?.lastModified) headers['If-Modified-Since'] = prior.lastModified;

  const response = await fetch(url, { headers, signal, redirect: 'follow' });

  if (response.status === 304) {
    await response.body?.cancel();
    return { status: 'unmodified', meta: prior };
  }

  if (response.status !== 200) {
    await response.body?.cancel();
    throw new HttpStatusError(response.status);
  }

  const data = decodeIndex(await response.text());
  return {
    status: 'modified',
    data,
    meta: {
      etag: response.headers.get('etag') ?? '',
      lastModified: response.headers.get('last-modified') ?? '',
      updatedAt: new Date().toISOString(),
    },
  };
}
