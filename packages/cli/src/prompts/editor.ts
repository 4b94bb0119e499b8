/**
 * Field editor
 * Lets the operator change any field of a record before it is used
 */

import chalk from 'chalk';
import {
  composeServiceConfig,
  fieldsForTemplate,
  getFieldValue,
  parseEnvVars,
  toAbsolutePath,
  validateRestartSec,
  validateServiceName,
  RESTART_POLICIES,
  TEMPLATE_IDS,
  type BuildContext,
  type ServiceConfig,
  type ServiceConfigField,
  type ServiceConfigFields,
} from '@service-wizard/core';
import type { MenuOption, Prompter } from './prompter.js';
import { promptTemplateFields, restartPolicyMenu, templateMenu, checkEnvLine } from './wizard.js';
import { formatFieldValue, printConfig } from '../utils/display.js';

type EditChoice = { kind: 'field'; field: ServiceConfigField } | { kind: 'done' };

const PATH_FIELDS: readonly ServiceConfigField[] = ['working_directory', 'venv_path', 'script_path'];

function editMenu(config: ServiceConfig): MenuOption<EditChoice>[] {
  const fields: MenuOption<EditChoice>[] = fieldsForTemplate(config.template).map((field) => ({
    label: `${field}: ${formatFieldValue(getFieldValue(config, field))}`,
    value: { kind: 'field', field },
  }));
  return [...fields, { label: 'Done editing', value: { kind: 'done' } }];
}

/**
 * Store a text answer into the draft
 */
function assignText(draft: ServiceConfigFields, field: ServiceConfigField, value: string): void {
  switch (field) {
    case 'name':
      draft.name = value;
      break;
    case 'description':
      draft.description = value;
      break;
    case 'working_directory':
      draft.working_directory = value;
      break;
    case 'venv_path':
      draft.venv_path = value;
      break;
    case 'script_path':
      draft.script_path = value;
      break;
    case 'script_args':
      draft.script_args = value;
      break;
    case 'bind_address':
      draft.bind_address = value;
      break;
    case 'app_module':
      draft.app_module = value;
      break;
    case 'user':
      draft.user = value;
      break;
    case 'group':
      draft.group = value;
      break;
    case 'restart_sec':
      draft.restart_sec = value;
      break;
    default:
      throw new Error(`Field ${field} is not a text field`);
  }
}

function textValidator(field: ServiceConfigField): ((value: string) => true | string) | undefined {
  switch (field) {
    case 'name':
      return (value) => validateServiceName(value) ?? true;
    case 'restart_sec':
      return (value) => validateRestartSec(value) ?? true;
    case 'venv_path':
    case 'script_path':
    case 'app_module':
      return (value) => (value.trim() ? true : `${field} is required`);
    default:
      return undefined;
  }
}

async function editField(
  prompter: Prompter,
  draft: ServiceConfigFields,
  field: ServiceConfigField,
  context: BuildContext
): Promise<void> {
  const current = composeServiceConfig(draft);

  if (field === 'template') {
    const template = await prompter.select(
      'Select template:',
      templateMenu(),
      TEMPLATE_IDS.indexOf(draft.template)
    );
    if (template !== draft.template) {
      const extras = await promptTemplateFields(prompter, template, context);
      draft.template = template;
      Object.assign(draft, extras);
    }
    return;
  }

  if (field === 'restart_policy') {
    draft.restart_policy = await prompter.select(
      'Select restart policy:',
      restartPolicyMenu(),
      RESTART_POLICIES.indexOf(draft.restart_policy)
    );
    return;
  }

  if (field === 'additional_env_vars') {
    const line = await prompter.input('Enter new value for additional_env_vars (space-separated list):', {
      validate: checkEnvLine,
    });
    draft.additional_env_vars = parseEnvVars(line);
    return;
  }

  const existing = getFieldValue(current, field);
  const answer = await prompter.input(`Enter new value for ${field}:`, {
    default: typeof existing === 'string' ? existing : undefined,
    validate: textValidator(field),
  });
  assignText(draft, field, PATH_FIELDS.includes(field) ? toAbsolutePath(answer, context.cwd, context.homeDir) : answer);
}

/**
 * Repeatedly offer the fields of the record until "Done editing" is chosen
 */
export async function editServiceInfo(
  prompter: Prompter,
  config: ServiceConfig,
  context: BuildContext
): Promise<ServiceConfig> {
  const draft: ServiceConfigFields = { ...config, additional_env_vars: [...config.additional_env_vars] };

  for (;;) {
    printConfig('Current Configuration', composeServiceConfig(draft));
    const choice = await prompter.select('Select field to edit:', editMenu(composeServiceConfig(draft)));
    if (choice.kind === 'done') {
      break;
    }
    await editField(prompter, draft, choice.field, context);
  }

  const edited = composeServiceConfig(draft);
  console.log(chalk.green('✅ Configuration updated'));
  return edited;
}
