/**
 * berth ls
 *
 * List the containers of an environment.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createLogger } from '../../logger';
import { Labels, forEnvironment } from '../../labels';
import { DockerRuntime, RuntimeInspector } from '../../services/runtime.service';
import { defaultEnvironment, reportError, type EnvironmentOptions } from './shared';

export const lsCommand = new Command('ls')
  .description('List the containers of an environment')
  .option('-e, --environment <name>', 'Environment to list', defaultEnvironment())
  .action(async (options: EnvironmentOptions) => {
    const logger = createLogger('ls');

    try {
      const inspector = new RuntimeInspector(new DockerRuntime());
      const containers = await inspector.findContainers(forEnvironment(options.environment));

      if (containers.length === 0) {
        console.log(chalk.gray(`\n  No containers for ${options.environment}\n`));
        return;
      }

      console.log(chalk.bold(`\n  ${options.environment}\n`));
      const width = Math.max(...containers.map((c) => c.name.length));
      for (const container of containers) {
        const type = container.labels[Labels.type] || 'unknown';
        const state = container.state === 'running' ? chalk.green(container.state) : chalk.yellow(container.state);
        console.log(`    ${container.name.padEnd(width)}  ${chalk.gray(type.padEnd(8))}  ${state}`);
      }
      console.log('');
    } catch (error) {
      reportError(error, logger);
    }
  });
