/**
 * berth update
 *
 * Pull the latest images for an environment, optionally applying afterwards.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import * as os from 'os';
import { loadConfig } from '@berth/config';
import { createLogger } from '../../logger';
import { createSpinnerReporter } from '../../reporter';
import { environmentImages } from '../../services/convergence.service';
import { DockerRuntime } from '../../services/runtime.service';
import { defaultEnvironment, reportError, runApply, type ApplyOptions } from './shared';

interface UpdateOptions extends ApplyOptions {
  apply?: boolean;
}

export const updateCommand = new Command('update')
  .description('Pull the images an environment uses')
  .option('-e, --environment <name>', 'Environment to update', defaultEnvironment())
  .option('--apply', 'Apply the environment after pulling')
  .option('--skip-hosts', 'Do not modify the hosts file when applying')
  .action(async (options: UpdateOptions) => {
    const logger = createLogger('update');

    try {
      const { config } = loadConfig(os.homedir(), options.environment);
      const runtime = new DockerRuntime();

      console.log(chalk.bold(`\n  Updating images for ${options.environment}\n`));
      for (const image of environmentImages(options.environment, os.homedir(), config)) {
        const spinner = ora({ text: `pulling ${image}`, indent: 2 }).start();
        try {
          await runtime.pullImage(image);
          spinner.succeed();
          logger.operation('pull', image);
        } catch (error) {
          spinner.fail();
          throw error;
        }
      }

      if (options.apply) {
        await runApply({ ...options, skipPull: true }, createSpinnerReporter(), logger);
        console.log(chalk.green(`\n  ${options.environment} is up to date\n`));
      } else {
        console.log(chalk.gray('\n  Run `berth apply` to recreate sites on the new images\n'));
      }
    } catch (error) {
      reportError(error, logger);
    }
  });
