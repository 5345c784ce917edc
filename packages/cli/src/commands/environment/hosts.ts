/**
 * berth hosts
 *
 * Privileged helper run under sudo by `berth apply`. Rewrites the
 * environment's block of the hosts file.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createLogger } from '../../logger';
import { DEFAULT_HOSTS_FILE, HOSTS_SUBCOMMAND, writeHostsFile } from '../../services/hosts.service';
import { defaultEnvironment, reportError, type EnvironmentOptions } from './shared';

interface HostsOptions extends EnvironmentOptions {
  hostnames: string;
  hostsFile: string;
}

export function parseHostnames(value: string): string[] {
  return value
    .split(',')
    .map((hostname) => hostname.trim())
    .filter(Boolean);
}

export const hostsCommand = new Command(HOSTS_SUBCOMMAND)
  .description('Write hostnames to the hosts file (run with elevated privileges)')
  .option('-e, --environment <name>', 'Environment owning the hostnames', defaultEnvironment())
  .option('--hostnames <list>', 'Comma separated hostnames', '')
  .option('--hosts-file <path>', 'Hosts file to edit', DEFAULT_HOSTS_FILE)
  .action(async (options: HostsOptions) => {
    const logger = createLogger('hosts');

    try {
      const hostnames = parseHostnames(options.hostnames);
      const changed = await writeHostsFile(options.hostsFile, options.environment, hostnames);
      logger.info(changed ? 'hosts file updated' : 'hosts file unchanged', {
        file: options.hostsFile,
        environment: options.environment,
        hostnames,
      });

      if (changed) {
        console.log(chalk.green(`  ✓ ${hostnames.length} hostnames registered in ${options.hostsFile}`));
      }
    } catch (error) {
      reportError(error, logger);
    }
  });
