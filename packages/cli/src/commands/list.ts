/**
 * List Command
 * Browse saved service configurations
 */

import chalk from 'chalk';
import {
  logger,
  getTemplate,
  previewServiceFile,
  ServiceWizardError,
  type ServiceConfig,
} from '@service-wizard/core';
import { createCliContext, type CliContext } from '../context.js';
import type { MenuOption } from '../prompts/prompter.js';
import { printConfig, printError } from '../utils/display.js';
import { runCreate } from './create.js';

interface SavedEntry {
  name: string;
  config?: ServiceConfig;
  error?: string;
}

type ListAction = 'load' | 'preview' | 'cancel';

const ACTION_MENU: readonly MenuOption<ListAction>[] = [
  { label: 'Load this config', value: 'load' },
  { label: 'Preview service file', value: 'preview' },
  { label: 'Cancel', value: 'cancel' },
];

async function loadEntry(name: string, context: CliContext): Promise<SavedEntry> {
  try {
    return { name, config: await context.store.load(name) };
  } catch (error) {
    if (error instanceof ServiceWizardError) {
      logger.info('Skipping unreadable configuration', { name, error: error.message });
      return { name, error: error.message };
    }
    throw error;
  }
}

function describeEntry(entry: SavedEntry): string {
  return entry.config ? getTemplate(entry.config.template).name : chalk.red('Invalid configuration');
}

/**
 * List flow; resolves to the process exit code
 */
export async function runList(context: CliContext): Promise<number> {
  const names = await context.store.list();
  if (names.length === 0) {
    console.log(chalk.yellow('No saved service configurations found.'));
    return 0;
  }

  const entries: SavedEntry[] = [];
  for (const name of names) {
    entries.push(await loadEntry(name, context));
  }

  console.log(chalk.bold.cyan('\nSaved service configurations:'));
  entries.forEach((entry, index) => {
    console.log(`${index + 1}) ${entry.name} - ${describeEntry(entry)}`);
  });

  const selection = await context.prompter.select<SavedEntry | undefined>('Select a configuration to view:', [
    ...entries.map((entry) => ({ label: entry.name, value: entry })),
    { label: 'Cancel', value: undefined },
  ]);
  if (!selection) {
    return 0;
  }

  const { config } = selection;
  if (!config) {
    printError(selection.error ?? `Could not load configuration ${selection.name}`);
    return 1;
  }

  printConfig(`${selection.name} Configuration`, config);

  const action = await context.prompter.select('What would you like to do?', ACTION_MENU, ACTION_MENU.length - 1);
  switch (action) {
    case 'load':
      return runCreate({ load: context.store.getConfigPath(selection.name) }, context);
    case 'preview':
      console.log(previewServiceFile(config));
      return 0;
    case 'cancel':
      return 0;
  }
}

/**
 * List command handler
 */
export async function listCommand(): Promise<void> {
  process.exitCode = await runList(createCliContext());
}
