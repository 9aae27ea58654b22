#!/usr/bin/env node
// src/cli.ts
import { BannerCache } from './cache/manager.js';
import { homeDir, initConfig, loadConfig } from './config.js';
import { errorMessage } from './errors.js';
import { configureVolatility3 } from './setup/volatility.js';
import { installService } from './setup/service.js';
import { setup } from './setup/index.js';

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_INVALID = 2;

export interface Flags {
  path: boolean;
  uri: boolean;
  stats: boolean;
  check: boolean;
  update: boolean;
  smartUpdate: boolean;
  clear: boolean;
  init: boolean;
  setup: boolean;
  installService: boolean;
  configureVol3: boolean;
  verbose: boolean;
  help: boolean;
}

const FLAG_NAMES: Record<string, keyof Flags> = {
  'p': 'path',
  'path': 'path',
  'u': 'uri',
  'uri': 'uri',
  's': 'stats',
  'stats': 'stats',
  'c': 'check',
  'check': 'check',
  'update': 'update',
  'smart-update': 'smartUpdate',
  'clear': 'clear',
  'init': 'init',
  'init-config': 'init',
  'setup': 'setup',
  'install-service': 'installService',
  'configure-vol3': 'configureVol3',
  'v': 'verbose',
  'verbose': 'verbose',
  'h': 'help',
  'help': 'help',
};

/** Parse boolean flags; `-x` and `--x` are interchangeable. */
export function parseFlags(argv: string[]): Flags {
  const flags: Flags = {
    path: false,
    uri: false,
    stats: false,
    check: false,
    update: false,
    smartUpdate: false,
    clear: false,
    init: false,
    setup: false,
    installService: false,
    configureVol3: false,
    verbose: false,
    help: false,
  };

  for (const arg of argv) {
    if (!arg.startsWith('-')) {
      throw new Error(`unexpected argument: ${arg}`);
    }
    const name = arg.replace(/^--?/, '');
    const key = Object.hasOwn(FLAG_NAMES, name) ? FLAG_NAMES[name] : undefined;
    if (!key) {
      throw new Error(`flag provided but not defined: ${arg}`);
    }
    flags[key] = true;
  }

  return flags;
}

export const USAGE = `basar - Volatility3 ISF symbol cache manager

Usage: basar [options]

Options:
  -p, --path            print cache file path
  -u, --uri             print file:// URI (default output)
  -s, --stats           print cache statistics as JSON
  -c, --check           check if cache is valid (exit 0=valid, 2=invalid)
      --update          force cache update
      --smart-update    update only if sources changed
      --clear           remove cache file
      --init            create default config file
      --setup           complete setup (recommended for first use)
      --install-service install systemd timer for auto-updates
      --configure-vol3  configure volatility3 to use basar
  -v, --verbose         enable verbose output
  -h, --help            show this help

Environment:
  BASAR_TTL      cache TTL in seconds (default: 86400)
  BASAR_VERBOSE  set to "1" for verbose output

First time? Run:
  basar --setup

After setup, just run:
  volatility3 -f dump.raw linux.pslist

Config: ~/.config/basar/sources.conf (one URL/path per line)
`;

export interface Writer {
  write(chunk: string): unknown;
}

export interface RunOptions {
  stdout?: Writer;
  stderr?: Writer;
  env?: NodeJS.ProcessEnv;
  /** Aborts in-flight fetches (wired to SIGINT/SIGTERM by the binary) */
  signal?: AbortSignal;
}

/** Run the CLI and return its exit code. */
export async function run(argv: string[], options: RunOptions = {}): Promise<number> {
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;
  const env = options.env ?? process.env;
  const signal = options.signal;

  let flags: Flags;
  try {
    flags = parseFlags(argv);
  } catch (err) {
    stderr.write(`basar: ${errorMessage(err)}\n`);
    return EXIT_ERROR;
  }

  if (flags.help) {
    stdout.write(USAGE);
    return EXIT_OK;
  }

  const verbose = flags.verbose || env.BASAR_VERBOSE === '1';
  const log = (line: string) => {
    stderr.write(`${line}\n`);
  };

  try {
    const config = await loadConfig(env);
    const cache = new BannerCache(config, { verbose, log });
    const home = homeDir(env);

    if (flags.setup) {
      await setup(cache, { verbose, log, signal, homeDir: home });
      stdout.write('setup complete\n');
      return EXIT_OK;
    }

    if (flags.init) {
      await initConfig(config);
      stdout.write(`${config.configFile}\n`);
      return EXIT_OK;
    }

    if (flags.installService) {
      await installService({ homeDir: home });
      stdout.write('systemd timer installed\n');
      return EXIT_OK;
    }

    if (flags.configureVol3) {
      await configureVolatility3(cache, { homeDir: home });
      stdout.write('volatility3 configured\n');
      return EXIT_OK;
    }

    if (flags.clear) {
      await cache.clear();
      return EXIT_OK;
    }

    if (flags.smartUpdate) {
      if (verbose) log(`checking ${config.sources.length} sources for updates`);
      const updated = await cache.smartUpdate({ signal });
      if (verbose) {
        if (updated) {
          const stats = await cache.stats();
          log(`updated: ${stats.entries ?? 0} banners cached`);
        } else {
          log('no changes');
        }
      }
      return EXIT_OK;
    }

    if (flags.update) {
      if (verbose) log(`updating from ${config.sources.length} sources`);
      await cache.update({ force: true, signal });
      if (verbose) {
        const stats = await cache.stats();
        log(`cached ${stats.entries ?? 0} banners`);
      }
      return EXIT_OK;
    }

    if (flags.check) {
      return (await cache.isValid()) ? EXIT_OK : EXIT_INVALID;
    }

    if (flags.stats) {
      stdout.write(JSON.stringify(await cache.stats(), null, 2) + '\n');
      return EXIT_OK;
    }

    await cache.ensure(signal);

    if (flags.path) {
      const path = await cache.path();
      if (path === null) return EXIT_INVALID;
      stdout.write(`${path}\n`);
      return EXIT_OK;
    }

    const uri = await cache.uri();
    if (uri === null) return EXIT_INVALID;
    stdout.write(`${uri}\n`);
    return EXIT_OK;
  } catch (err) {
    stderr.write(`basar: ${errorMessage(err)}\n`);
    return EXIT_ERROR;
  }
}

// --- binary entry point ---
// Only run when executed directly (not imported for testing)
const _argv1 = (process.argv[1] || '').replace(/\\/g, '/');
const isMainModule = _argv1.endsWith('/cli.ts') ||
  _argv1.endsWith('/cli.js') ||
  _argv1.endsWith('/basar');

if (isMainModule) {
  const controller = new AbortController();
  const cancel = () => controller.abort(new Error('interrupted'));
  process.once('SIGINT', cancel);
  process.once('SIGTERM', cancel);

  run(process.argv.slice(2), { signal: controller.signal })
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      console.error(`basar: ${errorMessage(err)}`);
      process.exitCode = EXIT_ERROR;
    })
    .finally(() => {
      process.off('SIGINT', cancel);
      process.off('SIGTERM', cancel);
    });
}
