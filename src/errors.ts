// src/errors.ts

/** Another process holds a lock on the cache directory that is not stale yet. */
export class LockedError extends Error {
  constructor(public readonly lockFile: string) {
    super('cache is locked by another process');
    this.name = 'LockedError';
  }
}

/** No source produced a document that could be merged. */
export class AllSourcesFailedError extends Error {
  constructor() {
    super('all sources failed');
    this.name = 'AllSourcesFailedError';
  }
}

/** A remote source answered with something other than 200 or 304. */
export class HttpStatusError extends Error {
  constructor(public readonly status: number) {
    super(`unexpected status: ${status}`);
    this.name = 'HttpStatusError';
  }
}

/** JSON that does not have the shape of a banner index. */
export class InvalidIndexError extends Error {
  constructor(message: string) {
    super(`invalid banner index: ${message}`);
    this.name = 'InvalidIndexError';
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function errorMessage(err: unknown): string {
  return toError(err).message;
}
