/**
 * Display helpers shared by the commands
 */

import chalk from 'chalk';
import { fieldsForTemplate, formatEnvVars, getFieldValue, type ServiceConfig } from '@service-wizard/core';

/**
 * Render a field value the way the operator would type it back in
 */
export function formatFieldValue(value: string | readonly string[] | undefined): string {
  if (value === undefined) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  return formatEnvVars(value);
}

/**
 * `field: value` lines for every field of the record, in prompt order
 */
export function describeConfig(config: ServiceConfig): string[] {
  return fieldsForTemplate(config.template).map(
    (field) => `${field}: ${formatFieldValue(getFieldValue(config, field))}`
  );
}

export function printConfig(title: string, config: ServiceConfig): void {
  console.log(chalk.bold.cyan(`\n=== ${title} ===`));
  for (const line of describeConfig(config)) {
    console.log(line);
  }
}

export function printError(message: string): void {
  console.log(chalk.red(`\n❌ ${message}\n`));
}

export function printWarning(message: string): void {
  console.log(chalk.yellow(`⚠️  Warning: ${message}`));
}

/**
 * Pause so a just-started unit has time to settle before its status is read
 */
export async function wait(ms: number): Promise<void> {
  if (ms > 0) {
    await new Promise((resolve) => setTimeout(resolve, ms));
  }
}
