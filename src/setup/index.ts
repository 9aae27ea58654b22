// src/setup/index.ts
import { access } from 'node:fs/promises';
import { initConfig, loadSources } from '../config.js';
import { errorMessage } from '../errors.js';
import { configureVolatility3 } from './volatility.js';
import { installService, type CommandRunner } from './service.js';
import type { BannerCache } from '../cache/manager.js';

export interface SetupOptions {
  verbose?: boolean;
  log?: (line: string) => void;
  signal?: AbortSignal;
  homeDir?: string;
  platform?: NodeJS.Platform;
  binPath?: string;
  runCommand?: CommandRunner;
}

/**
 * First-run setup: write sources.conf if missing, populate the cache,
 * point volatility3 at it and install the update timer (Linux).
 * Only the cache update is fatal; the last two steps warn on failure.
 */
export async function setup(cache: BannerCache, options: SetupOptions = {}): Promise<void> {
  const config = cache.config;
  const log = options.log ?? ((line: string) => console.error(line));
  const verbose = options.verbose ?? false;

  const hasConfig = await access(config.configFile).then(() => true, () => false);
  if (!hasConfig) {
    try {
      await initConfig(config);
    } catch (err) {
      throw new Error(`creating config: ${errorMessage(err)}`, { cause: err });
    }
    config.sources = await loadSources(config.configFile);
    if (verbose) log(`created config: ${config.configFile}`);
  }

  if (verbose) log(`updating cache from ${config.sources.length} sources...`);
  try {
    await cache.update({ force: true, signal: options.signal });
  } catch (err) {
    throw new Error(`updating cache: ${errorMessage(err)}`, { cause: err });
  }
  if (verbose) {
    const stats = await cache.stats();
    log(`cached ${stats.entries ?? 0} banners`);
  }

  try {
    await configureVolatility3(cache, { homeDir: options.homeDir });
    if (verbose) log('configured volatility3');
  } catch (err) {
    log(`warning: ${errorMessage(err)}`);
  }

  const platform = options.platform ?? process.platform;
  if (platform === 'linux') {
    try {
      await installService({
        homeDir: options.homeDir,
        platform,
        binPath: options.binPath,
        runCommand: options.runCommand,
      });
      if (verbose) log('installed systemd timer (runs twice monthly)');
    } catch (err) {
      log(`warning: service install failed: ${errorMessage(err)}`);
    }
  }
}
