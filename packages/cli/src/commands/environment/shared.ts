/**
 * Helpers shared by the environment commands
 */

import chalk from 'chalk';
import * as os from 'os';
import { loadConfig } from '@berth/config';
import { BerthError } from '../../errors';
import type { Logger } from '../../logger';
import type { Reporter } from '../../reporter';
import { applyEnvironment, type ApplyResult } from '../../services/convergence.service';
import { syncHosts } from '../../services/hosts.service';
import { HttpProxyClient } from '../../services/proxy-client.service';
import { DockerRuntime } from '../../services/runtime.service';

export const DEFAULT_ENVIRONMENT = 'berth-dev';

export function defaultEnvironment(env: NodeJS.ProcessEnv = process.env): string {
  return env.BERTH_DEFAULT_ENVIRONMENT || DEFAULT_ENVIRONMENT;
}

export interface EnvironmentOptions {
  environment: string;
}

export interface ApplyOptions extends EnvironmentOptions {
  skipPull?: boolean;
  skipHosts?: boolean;
}

/**
 * Print a command failure, log it and mark the process as failed
 */
export function reportError(error: unknown, logger: Logger): void {
  const message = error instanceof Error ? error.message : String(error);
  console.log(chalk.red(`\n  Error: ${message}\n`));

  if (error instanceof BerthError && error.kind === 'hosts-sync') {
    console.log(chalk.gray('  The containers are up; add the hostnames to your hosts file by hand'));
    console.log(chalk.gray('  or run again with --skip-hosts.\n'));
  }

  logger.error('command failed', error);
  process.exitCode = 1;
}

/**
 * Load the environment config and run one apply pass against the local
 * Docker Engine. The first Ctrl-C stops the pass before its next runtime
 * call or during the wait for the proxy; a second one exits at once.
 */
export async function runApply(options: ApplyOptions, reporter: Reporter, logger: Logger): Promise<ApplyResult> {
  const { environment } = options;
  const { config, file } = loadConfig(os.homedir(), environment);
  logger.info(`applying ${environment}`, { file, skipPull: options.skipPull, skipHosts: options.skipHosts });

  const controller = new AbortController();
  const cancel = () => {
    console.log(chalk.yellow('\n  Stopping after the current step (press Ctrl-C again to quit)'));
    controller.abort();
  };
  process.once('SIGINT', cancel);

  try {
    const result = await applyEnvironment(
      {
        environment,
        home: os.homedir(),
        config,
        skipPull: options.skipPull,
        skipHosts: options.skipHosts,
        signal: controller.signal,
      },
      {
        runtime: new DockerRuntime(),
        proxy: new HttpProxyClient(),
        syncHosts: (hostnames) => syncHosts(hostnames, { environment }),
        reporter,
        logger,
      }
    );
    logger.info(`applied ${environment}`, { operations: result.operations.length, routes: result.routes.length });
    return result;
  } finally {
    process.removeListener('SIGINT', cancel);
  }
}
