/**
 * Terminal progress for long running commands.
 * Services report through this interface and never print directly.
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';

export interface Reporter {
  /** Section heading, e.g. "Checking Sites..." */
  info(message: string): void;
  /** Start a step that will be closed by done() or warn() */
  pending(message: string): void;
  done(): void;
  warn(message?: string): void;
  success(message: string): void;
}

export function createSpinnerReporter(): Reporter {
  let spinner: Ora | null = null;

  const close = (finish: (s: Ora) => void) => {
    if (spinner) {
      finish(spinner);
      spinner = null;
    }
  };

  return {
    info: (message) => {
      close((s) => s.stop());
      console.log(chalk.bold(`\n  ${message}`));
    },
    pending: (message) => {
      close((s) => s.stop());
      spinner = ora({ text: message, indent: 2 }).start();
    },
    done: () => close((s) => s.succeed()),
    warn: (message) => {
      if (spinner) {
        close((s) => s.warn(message));
      } else if (message) {
        console.log(chalk.yellow(`  ⚠ ${message}`));
      }
    },
    success: (message) => {
      close((s) => s.stop());
      console.log(chalk.green(`  ✓ ${message}`));
    },
  };
}

export const silentReporter: Reporter = {
  info: () => {},
  pending: () => {},
  done: () => {},
  warn: () => {},
  success: () => {},
};
