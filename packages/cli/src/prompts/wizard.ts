/**
 * Interactive Wizard
 * Asks for every field of a service configuration in a fixed order
 */

import chalk from 'chalk';
import {
  composeServiceConfig,
  listTemplates,
  parseEnvVars,
  toAbsolutePath,
  validateEnvLine,
  validateRestartSec,
  validateServiceName,
  DEFAULT_SERVICE_VALUES,
  RESTART_POLICIES,
  type BuildContext,
  type RestartPolicy,
  type ServiceConfig,
  type TemplateId,
} from '@service-wizard/core';
import type { MenuOption, Prompter } from './prompter.js';
import { printConfig } from '../utils/display.js';

export const templateMenu = (): MenuOption<TemplateId>[] =>
  listTemplates().map((template) => ({
    label: `${template.name} - ${template.description}`,
    value: template.id,
  }));

export const restartPolicyMenu = (): MenuOption<RestartPolicy>[] =>
  RESTART_POLICIES.map((policy) => ({ label: policy, value: policy }));

const required =
  (label: string) =>
  (value: string): true | string =>
    value.trim() ? true : `${label} is required`;

const fromCheck =
  (check: (value: string) => string | undefined) =>
  (value: string): true | string =>
    check(value) ?? true;

export const checkEnvLine = (value: string): true | string => validateEnvLine(value) ?? true;

/**
 * Prompt for the fields specific to a template
 */
export async function promptTemplateFields(
  prompter: Prompter,
  template: TemplateId,
  context: BuildContext,
  current: { script_path?: string; script_args?: string; bind_address?: string; app_module?: string } = {}
): Promise<{ script_path?: string; script_args?: string; bind_address?: string; app_module?: string }> {
  if (template === 'standard_python') {
    const scriptPath = await prompter.input('Full path to Python script:', {
      default: current.script_path,
      validate: required('Script path'),
    });
    const scriptArgs = await prompter.input('Script arguments (if any):', { default: current.script_args });
    return {
      script_path: toAbsolutePath(scriptPath, context.cwd, context.homeDir),
      script_args: scriptArgs,
    };
  }

  const bindAddress = await prompter.input('Bind address (e.g., 0.0.0.0:8000):', {
    default: current.bind_address ?? DEFAULT_SERVICE_VALUES.bindAddress,
  });
  const appModule = await prompter.input(
    'App module (e.g., app:app for Flask or wsgi:application for Django):',
    { default: current.app_module, validate: required('App module') }
  );
  return { bind_address: bindAddress, app_module: appModule };
}

/**
 * Walk the operator through every field, show a summary and ask for
 * confirmation. Returns undefined when the operator declines.
 */
export async function gatherServiceInfo(prompter: Prompter, context: BuildContext): Promise<ServiceConfig | undefined> {
  console.log(chalk.bold.cyan('\n=== Python Systemd Deployment Wizard ===\n'));

  const name = await prompter.input('Service name:', { validate: fromCheck(validateServiceName) });
  const description = await prompter.input('Service description:');

  const template = await prompter.select('Select template:', templateMenu(), 0);

  const workingDirectory = await prompter.input('Working directory:', { default: context.cwd });
  const venvPath = await prompter.input('Path to virtual environment (e.g., /path/to/venv):', {
    validate: required('Virtual environment path'),
  });

  const templateFields = await promptTemplateFields(prompter, template, context);

  const user = await prompter.input('User to run the service:', { default: context.user });
  const group = await prompter.input('Group to run the service:', { default: context.user });

  const restartPolicy = await prompter.select(
    'Select restart policy:',
    restartPolicyMenu(),
    RESTART_POLICIES.indexOf(DEFAULT_SERVICE_VALUES.restartPolicy)
  );
  const restartSec = await prompter.input('Restart delay in seconds:', {
    default: DEFAULT_SERVICE_VALUES.restartSec,
    validate: fromCheck(validateRestartSec),
  });

  console.log(chalk.gray('\nAdditional environment variables (beyond PATH and PYTHONUNBUFFERED)'));
  console.log(chalk.gray('Format: KEY1=VALUE1 KEY2=VALUE2 (space-separated, quote values with spaces)'));
  const envLine = await prompter.input('Environment variables:', { validate: checkEnvLine });

  const config = composeServiceConfig({
    name,
    description,
    template,
    working_directory: toAbsolutePath(workingDirectory, context.cwd, context.homeDir),
    venv_path: toAbsolutePath(venvPath, context.cwd, context.homeDir),
    ...templateFields,
    user,
    group,
    restart_policy: restartPolicy,
    restart_sec: restartSec,
    additional_env_vars: parseEnvVars(envLine),
  });

  printConfig('Service Configuration Summary', config);

  const confirmed = await prompter.confirm('Does this look correct?', true);
  if (!confirmed) {
    console.log(chalk.yellow('Configuration cancelled. Please run the wizard again.'));
    return undefined;
  }

  return config;
}
