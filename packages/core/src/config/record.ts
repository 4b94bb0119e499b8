/**
 * Canonical construction of ServiceConfig records
 */

import type { BaseServiceConfig, ServiceConfig, ServiceConfigField, TemplateId } from "./types.js";

/**
 * Every field a record may carry; the template decides which extras are kept
 */
export interface ServiceConfigFields extends BaseServiceConfig {
  template: TemplateId;
  script_path?: string;
  script_args?: string;
  bind_address?: string;
  app_module?: string;
}

/**
 * Assemble a record in the order fields are prompted for, which is also
 * the order they appear in the saved JSON and the edit menu.
 * Fields belonging to the other template are dropped.
 */
export function composeServiceConfig(fields: ServiceConfigFields): ServiceConfig {
  const head = {
    name: fields.name,
    description: fields.description,
  };
  const tail = {
    user: fields.user,
    group: fields.group,
    restart_policy: fields.restart_policy,
    restart_sec: fields.restart_sec,
    additional_env_vars: [...fields.additional_env_vars],
  };

  if (fields.template === "standard_python") {
    return {
      ...head,
      template: "standard_python",
      working_directory: fields.working_directory,
      venv_path: fields.venv_path,
      script_path: fields.script_path ?? "",
      script_args: fields.script_args ?? "",
      ...tail,
    };
  }

  return {
    ...head,
    template: "gunicorn",
    working_directory: fields.working_directory,
    venv_path: fields.venv_path,
    bind_address: fields.bind_address ?? "",
    app_module: fields.app_module ?? "",
    ...tail,
  };
}

const STANDARD_PYTHON_FIELDS: readonly ServiceConfigField[] = [
  "name",
  "description",
  "template",
  "working_directory",
  "venv_path",
  "script_path",
  "script_args",
  "user",
  "group",
  "restart_policy",
  "restart_sec",
  "additional_env_vars",
];

const GUNICORN_FIELDS: readonly ServiceConfigField[] = [
  "name",
  "description",
  "template",
  "working_directory",
  "venv_path",
  "bind_address",
  "app_module",
  "user",
  "group",
  "restart_policy",
  "restart_sec",
  "additional_env_vars",
];

/**
 * Fields a record of this template carries, in display order
 */
export function fieldsForTemplate(template: TemplateId): readonly ServiceConfigField[] {
  return template === "standard_python" ? STANDARD_PYTHON_FIELDS : GUNICORN_FIELDS;
}

/**
 * Read any field of a record by name
 */
export function getFieldValue(config: ServiceConfig, field: ServiceConfigField): string | string[] | undefined {
  const value: unknown = new Map<string, unknown>(Object.entries(config)).get(field);
  if (typeof value === "string") {
    return value;
  }
  if (Array.isArray(value)) {
    return value.filter((entry): entry is string => typeof entry === "string");
  }
  return undefined;
}
