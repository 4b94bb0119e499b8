/**
 * Stop Command
 * Stop a running service
 */

import ora from 'ora';
import chalk from 'chalk';
import { ServiceManager } from '@service-wizard/core';
import { createCliContext, type CliContext } from '../context.js';

export async function runStop(name: string, context: CliContext): Promise<number> {
  const spinner = ora(`Stopping ${name}...`).start();
  const serviceManager = new ServiceManager(name, { executor: context.executor });
  const result = await serviceManager.stop();

  if (result.success) {
    spinner.succeed(chalk.green(result.message));
  } else {
    spinner.fail(chalk.red(result.message));
  }
  return 0;
}

/**
 * Stop command handler
 */
export async function stopCommand(name: string): Promise<void> {
  process.exitCode = await runStop(name, createCliContext());
}
