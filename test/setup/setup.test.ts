// test/setup/setup.test.ts
import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, rm, readFile, writeFile, mkdir, access } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { setup } from '../../src/setup/index.js';
import { BannerCache } from '../../src/cache/manager.js';
import { createConfig } from '../../src/config.js';

async function exists(path: string): Promise<boolean> {
  return access(path).then(() => true, () => false);
}

describe('setup', () => {
  let testDir: string;
  let home: string;
  let source: string;
  let calls: string[][];
  let lines: string[];

  const recorder = async (command: string, args: string[]): Promise<void> => {
    calls.push([command, ...args]);
  };

  function makeCache(): BannerCache {
    const config = createConfig({
      cacheDir: join(testDir, 'cache'),
      configDir: join(testDir, 'config'),
      sources: [source],
    });
    return new BannerCache(config, { log: (line) => lines.push(line) });
  }

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'basar-setup-'));
    home = join(testDir, 'home');
    await mkdir(home);
    await mkdir(join(testDir, 'config'));
    source = join(testDir, 'banners.json');
    await writeFile(source, '{"version":1,"linux":{"K1":["u1"],"K2":["u2"]}}');
    await writeFile(join(testDir, 'config', 'sources.conf'), `${source}\n`);
    calls = [];
    lines = [];
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('populates the cache, configures volatility3 and installs the timer', async () => {
    const cache = makeCache();
    await setup(cache, {
      verbose: true,
      log: (line) => lines.push(line),
      homeDir: home,
      platform: 'linux',
      binPath: '/opt/bin/basar',
      runCommand: recorder,
    });

    assert.equal(await cache.isValid(), true);
    assert.equal(
      await readFile(join(home, '.volatility3.yaml'), 'utf-8'),
      `# Added by basar\nremote_isf_url: file://${cache.config.cacheFile}\n`,
    );
    assert.ok(await exists(join(home, '.config', 'systemd', 'user', 'basar.timer')));
    assert.equal(calls.length, 3);
    assert.deepEqual(lines, [
      'updating cache from 1 sources...',
      'cached 2 banners',
      'configured volatility3',
      'installed systemd timer (runs twice monthly)',
    ]);
  });

  it('skips the timer off Linux', async () => {
    const cache = makeCache();
    await setup(cache, { log: (line) => lines.push(line), homeDir: home, platform: 'darwin', runCommand: recorder });

    assert.equal(await cache.isValid(), true);
    assert.deepEqual(calls, []);
    assert.equal(await exists(join(home, '.config')), false);
    assert.deepEqual(lines, []);
  });

  it('warns but completes when volatility3 is already configured', async () => {
    await writeFile(join(home, '.volatility3.yaml'), 'remote_isf_url: https://mirror.test/b.json\n');
    const cache = makeCache();

    await setup(cache, { log: (line) => lines.push(line), homeDir: home, platform: 'linux', binPath: '/b', runCommand: recorder });

    assert.deepEqual(lines, [
      `warning: volatility3 config already has remote_isf_url, please update manually: ${join(home, '.volatility3.yaml')}`,
    ]);
    assert.equal(calls.length, 3);
  });

  it('warns when the timer cannot be started', async () => {
    const cache = makeCache();
    const failing = async (): Promise<void> => {
      throw new Error('no user bus');
    };

    await setup(cache, { log: (line) => lines.push(line), homeDir: home, platform: 'linux', binPath: '/b', runCommand: failing });

    assert.deepEqual(lines, ['warning: service install failed: daemon-reload failed: no user bus']);
  });

  it('fails when the cache cannot be populated', async () => {
    await rm(source);
    const cache = makeCache();

    await assert.rejects(
      setup(cache, { log: (line) => lines.push(line), homeDir: home, platform: 'linux', binPath: '/b', runCommand: recorder }),
      { message: 'updating cache: all sources failed' },
    );
    assert.equal(await exists(join(home, '.volatility3.yaml')), false);
    assert.deepEqual(calls, []);
  });
});
