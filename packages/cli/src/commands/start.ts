/**
 * Start Command
 * Start a service and show its status once it has had a moment to come up
 */

import ora from 'ora';
import chalk from 'chalk';
import { ServiceManager } from '@service-wizard/core';
import { createCliContext, type CliContext } from '../context.js';
import { wait } from '../utils/display.js';

export async function runStart(name: string, context: CliContext): Promise<number> {
  const spinner = ora(`Starting ${name}...`).start();
  const serviceManager = new ServiceManager(name, { executor: context.executor });
  const result = await serviceManager.start();

  if (!result.success) {
    spinner.fail(chalk.red(result.message));
    return 0;
  }
  spinner.succeed(chalk.green(result.message));

  await wait(context.startDelayMs);
  const status = await serviceManager.statusText();
  console.log(status.message);
  return 0;
}

/**
 * Start command handler
 */
export async function startCommand(name: string): Promise<void> {
  process.exitCode = await runStart(name, createCliContext());
}
