// src/setup/service.ts
import { execFile } from 'node:child_process';
import { access, mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { promisify } from 'node:util';
import { homeDir } from '../config.js';
import { errorMessage } from '../errors.js';

const execFileAsync = promisify(execFile);

export type CommandRunner = (command: string, args: string[]) => Promise<void>;

export interface InstallServiceOptions {
  homeDir?: string;
  platform?: NodeJS.Platform;
  /** basar executable for ExecStart; looked up on PATH when omitted */
  binPath?: string;
  /** Runs systemctl; replaced in tests */
  runCommand?: CommandRunner;
}

export interface InstalledService {
  servicePath: string;
  timerPath: string;
}

// 1st and 15th of each month, with up to an hour of random delay.
export const TIMER_UNIT = `[Unit]
Description=Update basar ISF symbol cache periodically

[Timer]
OnCalendar=*-*-01,15 06:00:00
RandomizedDelaySec=3600
Persistent=true

[Install]
WantedBy=timers.target
`;

export function serviceUnit(binPath: string): string {
  return `[Unit]
Description=Update basar ISF symbol cache
After=network-online.target
Wants=network-online.target

[Service]
Type=oneshot
ExecStart=${binPath} --smart-update
Nice=19
IOSchedulingClass=idle

[Install]
WantedBy=default.target
`;
}

const defaultRunner: CommandRunner = async (command, args) => {
  await execFileAsync(command, args);
};

async function exists(path: string): Promise<boolean> {
  return access(path).then(() => true, () => false);
}

/** Locate the basar binary: PATH first, then the usual install prefixes. */
export async function findBinary(home: string, pathEnv: string = process.env.PATH ?? ''): Promise<string> {
  for (const dir of pathEnv.split(':')) {
    if (!dir) continue;
    const candidate = join(dir, 'basar');
    if (await exists(candidate)) return candidate;
  }
  const local = join(home, '.local', 'bin', 'basar');
  if (await exists(local)) return local;
  return '/usr/local/bin/basar';
}

/**
 * Install and start a systemd user timer that runs `basar --smart-update`.
 * Linux only.
 */
export async function installService(options: InstallServiceOptions = {}): Promise<InstalledService> {
  const platform = options.platform ?? process.platform;
  if (platform !== 'linux') {
    throw new Error('systemd service only supported on Linux');
  }

  const home = options.homeDir ?? homeDir();
  const run = options.runCommand ?? defaultRunner;
  const binPath = options.binPath ?? (await findBinary(home));

  const systemdDir = join(home, '.config', 'systemd', 'user');
  await mkdir(systemdDir, { recursive: true, mode: 0o755 });

  const servicePath = join(systemdDir, 'basar.service');
  const timerPath = join(systemdDir, 'basar.timer');
  await writeFile(servicePath, serviceUnit(binPath), { mode: 0o644 });
  await writeFile(timerPath, TIMER_UNIT, { mode: 0o644 });

  const steps: Array<[string, string[]]> = [
    ['daemon-reload', ['--user', 'daemon-reload']],
    ['enabling timer', ['--user', 'enable', 'basar.timer']],
    ['starting timer', ['--user', 'start', 'basar.timer']],
  ];
  for (const [label, args] of steps) {
    try {
      await run('systemctl', args);
    } catch (err) {
      throw new Error(`${label} failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  return { servicePath, timerPath };
}
