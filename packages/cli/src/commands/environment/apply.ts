/**
 * berth apply
 *
 * Bring the environment's containers, proxy routes and hostnames in line
 * with its config.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createLogger } from '../../logger';
import { createSpinnerReporter } from '../../reporter';
import { defaultEnvironment, reportError, runApply, type ApplyOptions } from './shared';

export const applyCommand = new Command('apply')
  .description('Apply the environment config to the running containers')
  .option('-e, --environment <name>', 'Environment to apply', defaultEnvironment())
  .option('--skip-pull', 'Do not pull images before creating containers')
  .option('--skip-hosts', 'Do not modify the hosts file')
  .action(async (options: ApplyOptions) => {
    const logger = createLogger('apply');
    console.log(chalk.bold(`\n  Applying ${options.environment}`));

    try {
      const result = await runApply(options, createSpinnerReporter(), logger);

      console.log(chalk.green(`\n  ${result.environment} is up to date`));
      if (result.operations.length === 0) {
        console.log(chalk.gray('  No changes were needed'));
      }
      for (const route of result.routes) {
        console.log(`    ${chalk.cyan(`http://${route.hostname}`)} ${chalk.gray(`→ ${route.site}`)}`);
      }
      console.log('');
    } catch (error) {
      reportError(error, logger);
    }
  });
