// src/setup/volatility.ts
import { appendFile, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { homeDir } from '../config.js';
import type { BannerCache } from '../cache/manager.js';

export const VOLATILITY_CONFIG_NAME = '.volatility3.yaml';

export interface ConfigureVolatilityOptions {
  homeDir?: string;
}

/**
 * Point volatility3 at the cache by adding `remote_isf_url` to
 * ~/.volatility3.yaml. Refuses to touch a file that already sets it.
 * Returns the path of the config file written.
 */
export async function configureVolatility3(
  cache: BannerCache,
  options: ConfigureVolatilityOptions = {},
): Promise<string> {
  const configPath = join(options.homeDir ?? homeDir(), VOLATILITY_CONFIG_NAME);
  const uri = (await cache.uri()) ?? `file://${cache.config.cacheFile}`;
  const block = `# Added by basar\nremote_isf_url: ${uri}\n`;

  let existing: string | null;
  try {
    existing = await readFile(configPath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== 'ENOENT') throw err;
    existing = null;
  }

  if (existing === null) {
    await writeFile(configPath, block, { mode: 0o644 });
    return configPath;
  }

  if (existing.includes('remote_isf_url')) {
    throw new Error(`volatility3 config already has remote_isf_url, please update manually: ${configPath}`);
  }

  await appendFile(configPath, `\n${block}`);
  return configPath;
}
