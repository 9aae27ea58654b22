// src/config.ts
import { access, mkdir, readFile, writeFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import type { Config } from './types.js';

export const APP_NAME = 'basar';

export const DEFAULT_TTL_MS = 24 * 60 * 60 * 1000;

/** Upstream ISF banner indexes used when no sources.conf exists */
export const DEFAULT_SOURCES = [
  'https://raw.githubusercontent.com/Abyss-W4tcher/volatility3-symbols/master/banners/banners.json',
  'https://raw.githubusercontent.com/leludo84/vol3-linux-profiles/main/banners-isf.json',
];

const CONFIG_HEADER = `# basar sources configuration
# One URL or local path per line
# Lines starting with # are comments

`;

export function homeDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.HOME || homedir() || '/';
}

/** `$<envVar>` when set, otherwise `~/<fallback>`. */
export function xdgPath(envVar: string, fallback: string, env: NodeJS.ProcessEnv = process.env): string {
  const dir = env[envVar];
  if (dir) return dir;
  return join(homeDir(env), fallback);
}

/**
 * Parse a TTL given in seconds. A leading positive integer is accepted
 * ("3600", "3600s"); anything else falls back to `defaultMs`.
 */
export function parseTTL(value: string | undefined, defaultMs: number = DEFAULT_TTL_MS): number {
  if (!value) return defaultMs;
  const seconds = parseInt(value.trim(), 10);
  if (!Number.isFinite(seconds) || seconds <= 0) return defaultMs;
  return seconds * 1000;
}

/** Source lines from a sources.conf body: trimmed, blanks and `#` comments dropped. */
export function parseSources(content: string): string[] {
  return content
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'));
}

export async function loadSources(configFile: string): Promise<string[]> {
  let content: string;
  try {
    content = await readFile(configFile, 'utf-8');
  } catch {
    return [...DEFAULT_SOURCES];
  }
  const sources = parseSources(content);
  return sources.length > 0 ? sources : [...DEFAULT_SOURCES];
}

export interface CreateConfigOptions {
  cacheDir: string;
  configDir: string;
  ttlMs?: number;
  sources?: string[];
}

/** Derive every artifact path from the cache and config directories. */
export function createConfig(options: CreateConfigOptions): Config {
  return {
    cacheDir: options.cacheDir,
    configDir: options.configDir,
    cacheFile: join(options.cacheDir, 'banners.json'),
    metaFile: join(options.cacheDir, 'meta.json'),
    lockFile: join(options.cacheDir, '.lock'),
    configFile: join(options.configDir, 'sources.conf'),
    ttlMs: options.ttlMs ?? DEFAULT_TTL_MS,
    sources: options.sources ?? [...DEFAULT_SOURCES],
  };
}

/**
 * Resolve configuration the XDG way:
 * $XDG_CACHE_HOME/basar, $XDG_CONFIG_HOME/basar/sources.conf, $BASAR_TTL.
 */
export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<Config> {
  const config = createConfig({
    cacheDir: join(xdgPath('XDG_CACHE_HOME', '.cache', env), APP_NAME),
    configDir: join(xdgPath('XDG_CONFIG_HOME', '.config', env), APP_NAME),
    ttlMs: parseTTL(env.BASAR_TTL),
  });
  config.sources = await loadSources(config.configFile);
  return config;
}

/** Write sources.conf with the default sources. Fails if it already exists. */
export async function initConfig(config: Config): Promise<void> {
  const exists = await access(config.configFile).then(() => true, () => false);
  if (exists) {
    throw new Error(`config already exists: ${config.configFile}`);
  }

  await mkdir(config.configDir, { recursive: true, mode: 0o755 });
  await writeFile(config.configFile, CONFIG_HEADER + DEFAULT_SOURCES.map((s) => `${s}\n`).join(''), {
    flag: 'wx',
  });
}
