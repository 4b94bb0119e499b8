/**
 * Collaborators a command runs against
 */

import {
  ConfigStore,
  LocalCommandExecutor,
  defaultBuildContext,
  resolvePaths,
  type BuildContext,
  type CommandExecutor,
  type WizardPaths,
} from '@service-wizard/core';
import { InquirerPrompter, type Prompter } from './prompts/prompter.js';

export interface CliContext {
  prompter: Prompter;
  store: ConfigStore;
  executor: CommandExecutor;
  paths: WizardPaths;
  build: BuildContext;
  /** Wait after enable/start before the status is shown */
  settleDelayMs: number;
  /** Wait after a plain `start` before the status is shown */
  startDelayMs: number;
}

export function createCliContext(overrides: Partial<CliContext> = {}): CliContext {
  const paths = overrides.paths ?? resolvePaths();
  return {
    prompter: overrides.prompter ?? new InquirerPrompter(),
    store: overrides.store ?? new ConfigStore(paths.configDir),
    executor: overrides.executor ?? new LocalCommandExecutor(),
    paths,
    build: overrides.build ?? defaultBuildContext(),
    settleDelayMs: overrides.settleDelayMs ?? 2000,
    startDelayMs: overrides.startDelayMs ?? 1000,
  };
}
