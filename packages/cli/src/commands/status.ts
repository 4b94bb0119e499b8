/**
 * Status Command
 * Show systemd status for a service
 */

import { ServiceManager } from '@service-wizard/core';
import { createCliContext, type CliContext } from '../context.js';
import { printError } from '../utils/display.js';

/**
 * Print `systemctl status` output; failures are reported without a non-zero exit
 */
export async function runStatus(name: string, context: CliContext): Promise<number> {
  const serviceManager = new ServiceManager(name, { executor: context.executor });
  const status = await serviceManager.statusText();

  if (status.success) {
    console.log(status.message);
  } else {
    printError(status.message);
  }
  return 0;
}

/**
 * Status command handler
 */
export async function statusCommand(name: string): Promise<void> {
  process.exitCode = await runStatus(name, createCliContext());
}
