/**
 * berth debug on|off <hostname>
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as os from 'os';
import { loadConfig, saveConfig, setSiteDebug } from '@berth/config';
import { createLogger } from '../../logger';
import { defaultEnvironment, reportError, type EnvironmentOptions } from './shared';

export function parseSwitch(value: string): boolean {
  if (value === 'on') return true;
  if (value === 'off') return false;
  throw new Error(`expected "on" or "off", got "${value}"`);
}

export const debugCommand = new Command('debug')
  .description('Turn debugging on or off for a site')
  .argument('<state>', 'on or off')
  .argument('<hostname>', 'Hostname of the site')
  .option('-e, --environment <name>', 'Environment to change', defaultEnvironment())
  .action((state: string, hostname: string, options: EnvironmentOptions) => {
    const logger = createLogger('debug');

    try {
      const debug = parseSwitch(state);
      const loaded = loadConfig(os.homedir(), options.environment);
      saveConfig({ ...loaded, config: setSiteDebug(loaded.config, hostname, debug) });
      logger.info(`debug ${state} for ${hostname}`, { environment: options.environment });

      console.log(chalk.green(`\n  Debugging is ${state} for ${hostname}`));
      console.log(chalk.gray('  Run `berth apply` to recreate the site container\n'));
    } catch (error) {
      reportError(error, logger);
    }
  });
