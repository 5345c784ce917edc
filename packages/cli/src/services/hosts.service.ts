/**
 * Hosts Service
 * Registers site hostnames with the operating system resolver. The apply
 * pass re-runs the berth executable under sudo as `berth hosts`, which
 * rewrites a block of the hosts file it owns.
 */

import { spawn } from 'child_process';
import * as fs from 'fs/promises';
import { HostsSyncError } from '../errors';
import { LOOPBACK } from '../generators/docker';

export const HOSTS_SUBCOMMAND = 'hosts';
export const DEFAULT_HOSTS_FILE = '/etc/hosts';

/**
 * Whether the apply pass should touch the hosts file at all
 */
export function shouldSyncHosts(skipHosts: boolean, env: NodeJS.ProcessEnv = process.env): boolean {
  return !skipHosts && env.BERTH_EDIT_HOSTS !== 'false';
}

/** Runs a command with elevated privileges and resolves with its exit code */
export type ElevatedRunner = (command: string, args: string[]) => Promise<number>;

export const runWithSudo: ElevatedRunner = (command, args) =>
  new Promise((resolve, reject) => {
    const child = spawn('sudo', [command, ...args], { stdio: 'inherit' });
    child.on('error', reject);
    child.on('close', (code) => resolve(code ?? 1));
  });

export interface HostsSyncOptions {
  environment: string;
  platform?: NodeJS.Platform;
  /** The berth executable, as interpreter and script */
  executable?: string[];
  runElevated?: ElevatedRunner;
}

/**
 * Invoke the privileged helper with every hostname of the environment
 */
export async function syncHosts(hostnames: string[], options: HostsSyncOptions): Promise<void> {
  const {
    environment,
    platform = process.platform,
    executable = [process.execPath, process.argv[1]],
    runElevated = runWithSudo,
  } = options;

  if (platform === 'win32') {
    throw new HostsSyncError('setting the hosts file is not yet supported on windows', { entity: environment });
  }

  const [command, ...prefix] = executable;
  const args = [
    ...prefix,
    HOSTS_SUBCOMMAND,
    `--environment=${environment}`,
    `--hostnames=${hostnames.join(',')}`,
  ];

  let code: number;
  try {
    code = await runElevated(command, args);
  } catch (err) {
    throw new HostsSyncError('unable to run the hosts helper', { entity: environment, cause: err });
  }

  if (code !== 0) {
    throw new HostsSyncError(`the hosts helper exited with code ${code}`, { entity: environment });
  }
}

// =============================================================================
// Hosts file editing (runs inside the privileged helper)
// =============================================================================

function blockMarkers(environment: string): { start: string; end: string } {
  return { start: `# <berth:${environment}>`, end: `# </berth:${environment}>` };
}

/**
 * Replace the environment's block in hosts file content. Lines outside the
 * block are kept as they are; an empty hostname list removes the block.
 * A start marker without its end marker is left for the user to fix.
 */
export function updateHostsContent(content: string, environment: string, hostnames: string[]): string {
  const { start, end } = blockMarkers(environment);

  const kept: string[] = [];
  let inBlock = false;
  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (trimmed === start) {
      inBlock = true;
    } else if (trimmed === end) {
      inBlock = false;
    } else if (!inBlock) {
      kept.push(line);
    }
  }

  if (inBlock) {
    throw new HostsSyncError(`the hosts file has "${start}" without a matching "${end}", fix it by hand and re-run`, {
      entity: environment,
    });
  }

  const base = kept.join('\n').replace(/\n+$/, '');
  const unique = [...new Set(hostnames.filter(Boolean))];
  if (unique.length === 0) {
    return base ? `${base}\n` : '';
  }

  const block = [start, ...unique.map((hostname) => `${LOOPBACK}\t${hostname}`), end].join('\n');
  return base ? `${base}\n\n${block}\n` : `${block}\n`;
}

export async function writeHostsFile(file: string, environment: string, hostnames: string[]): Promise<boolean> {
  const current = await fs.readFile(file, 'utf-8');
  const next = updateHostsContent(current, environment, hostnames);
  if (next === current) {
    return false;
  }
  await fs.writeFile(file, next);
  return true;
}
