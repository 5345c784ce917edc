/**
 * @berth/cli
 *
 * CLI entry point for berth commands.
 */

import { Command } from 'commander';
import { applyCommand, initCommand, lsCommand, updateCommand, siteCommand, debugCommand, hostsCommand } from './commands';

const program = new Command();

program
  .name('berth')
  .description('Run local development environments on Docker')
  .version('0.1.0');

// Environment commands
program.addCommand(initCommand);
program.addCommand(applyCommand);
program.addCommand(lsCommand);
program.addCommand(updateCommand);
program.addCommand(siteCommand);
program.addCommand(debugCommand);

// Privileged helper, invoked through sudo by apply
program.addCommand(hostsCommand, { hidden: true });

program.parse();
