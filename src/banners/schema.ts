// src/banners/schema.ts
import { z } from 'zod';
import { InvalidIndexError, errorMessage } from '../errors.js';
import type { IndexDocument } from '../types.js';

export const INDEX_VERSION = 1;

const urlListSchema = z
  .array(z.string())
  .nullable()
  .transform((urls) => urls ?? []);

// Built with Object.fromEntries: z.record skips a `__proto__` key, and banner keys are opaque.
const bannerMapSchema = z.unknown().transform((value, ctx): Record<string, string[]> => {
  if (value === null || value === undefined) return {};
  if (typeof value !== 'object' || Array.isArray(value)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected object' });
    return z.NEVER;
  }

  const entries: Array<[string, string[]]> = [];
  for (const [banner, urls] of Object.entries(value)) {
    const result = urlListSchema.safeParse(urls);
    if (!result.success) {
      for (const issue of result.error.issues) {
        ctx.addIssue({ ...issue, path: [banner, ...issue.path] });
      }
      return z.NEVER;
    }
    entries.push([banner, result.data]);
  }
  return Object.fromEntries(entries);
});

// Unknown top-level keys (other operating systems, comments) are dropped.
export const indexDocumentSchema = z.object({
  version: z.number().int().default(INDEX_VERSION),
  linux: bannerMapSchema,
});

/** Validate an already-parsed JSON value as a banner index. */
export function parseIndex(value: unknown): IndexDocument {
  const result = indexDocumentSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new InvalidIndexError(`${issue?.message ?? 'unexpected shape'}${where}`);
  }
  return result.data;
}

/** Decode banner index JSON text. Throws InvalidIndexError on malformed input. */
export function decodeIndex(text: string): IndexDocument {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err) {
    throw new InvalidIndexError(errorMessage(err));
  }
  return parseIndex(value);
}

/**
 * Serialize for the on-disk artifact. JSON.stringify never HTML-escapes,
 * so URLs containing `&`, `<` or `>` are written verbatim.
 */
export function serializeIndex(doc: IndexDocument): string {
  return JSON.stringify({ version: doc.version, linux: doc.linux }) + '\n';
}

export function countBanners(doc: IndexDocument): number {
  return Object.keys(doc.linux).length;
}
