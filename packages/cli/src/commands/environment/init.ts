/**
 * berth init
 *
 * Write a starter config when there is none, create the network and proxy,
 * then apply the environment.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as fs from 'fs';
import * as os from 'os';
import { configPath, defaultConfig, saveConfig } from '@berth/config';
import { createLogger } from '../../logger';
import { createSpinnerReporter } from '../../reporter';
import { bootstrapEnvironment } from '../../services/bootstrap.service';
import { DockerRuntime } from '../../services/runtime.service';
import { defaultEnvironment, reportError, runApply, type ApplyOptions } from './shared';

export const initCommand = new Command('init')
  .description('Set up a new environment')
  .option('-e, --environment <name>', 'Environment to set up', defaultEnvironment())
  .option('--skip-pull', 'Do not pull images before creating containers')
  .option('--skip-hosts', 'Do not modify the hosts file')
  .action(async (options: ApplyOptions) => {
    const logger = createLogger('init');
    const reporter = createSpinnerReporter();
    const { environment } = options;

    console.log(chalk.bold(`\n  Initializing ${environment}`));

    try {
      const file = configPath(os.homedir(), environment);
      if (fs.existsSync(file)) {
        reporter.success(`using existing config ${file}`);
      } else {
        saveConfig({ environment, file, config: defaultConfig() });
        reporter.success(`wrote ${file}`);
        logger.info(`created config for ${environment}`, { file });
      }

      reporter.info('Setting up Network and Proxy...');
      await bootstrapEnvironment(new DockerRuntime(), environment, { skipPull: options.skipPull, reporter });

      await runApply(options, reporter, logger);

      console.log(chalk.green(`\n  ${environment} is ready`));
      console.log(chalk.gray(`  Add sites to ${file} and run \`berth apply\`\n`));
    } catch (error) {
      reportError(error, logger);
    }
  });
