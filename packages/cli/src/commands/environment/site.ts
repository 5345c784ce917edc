/**
 * berth site add
 *
 * Add a site to the environment config. The containers change on the next
 * `berth apply`.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as os from 'os';
import { addSite, loadConfig, saveConfig, type MountConfig, type SiteConfig } from '@berth/config';
import { createLogger } from '../../logger';
import { defaultEnvironment, reportError, type EnvironmentOptions } from './shared';

interface SiteAddOptions extends EnvironmentOptions {
  path: string;
  runtime: string;
  alias?: string[];
  mount?: string[];
  debug?: boolean;
}

/**
 * Parse a `source:target` mount argument
 */
export function parseMount(value: string): MountConfig {
  const index = value.indexOf(':');
  if (index <= 0 || index === value.length - 1) {
    throw new Error(`mount "${value}" must look like <source>:<target>`);
  }
  return { source: value.slice(0, index), target: value.slice(index + 1) };
}

const addCommand = new Command('add')
  .description('Add a site to the environment config')
  .argument('<hostname>', 'Hostname the site is served on')
  .requiredOption('-p, --path <dir>', 'Local source directory, mounted at /app')
  .requiredOption('-r, --runtime <version>', 'Runtime version of the site image')
  .option('-a, --alias <hostname...>', 'Extra hostnames for the site')
  .option('-m, --mount <source:target...>', 'Extra directories to mount')
  .option('--debug', 'Enable debugging for the site')
  .option('-e, --environment <name>', 'Environment to change', defaultEnvironment())
  .action((hostname: string, options: SiteAddOptions) => {
    const logger = createLogger('site');

    try {
      const site: SiteConfig = { hostname, runtime: options.runtime, path: options.path };
      if (options.alias && options.alias.length > 0) site.aliases = options.alias;
      if (options.mount && options.mount.length > 0) site.mounts = options.mount.map(parseMount);
      if (options.debug) site.debug = true;

      const loaded = loadConfig(os.homedir(), options.environment);
      const config = addSite(loaded.config, site, os.homedir());
      saveConfig({ ...loaded, config });
      logger.info(`added site ${hostname}`, { environment: options.environment, file: loaded.file });

      console.log(chalk.green(`\n  Added ${hostname} to ${loaded.file}`));
      console.log(chalk.gray('  Run `berth apply` to start it\n'));
    } catch (error) {
      reportError(error, logger);
    }
  });

export const siteCommand = new Command('site').description('Manage the sites of an environment').addCommand(addCommand);
