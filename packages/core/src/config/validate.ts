/**
 * Service configuration invariants and parsing of untrusted JSON
 */

import { InvalidConfigError } from "../utils/errors.js";
import { validateEnvVars } from "./env-vars.js";
import { composeServiceConfig } from "./record.js";
import type { ServiceConfig } from "./types.js";
import { isRestartPolicy, isTemplateId, RESTART_POLICIES, TEMPLATE_IDS } from "./types.js";

/**
 * Unit and JSON filename stem: no path separators, no leading dot or dash
 */
export const SERVICE_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.@-]*$/;

export function validateServiceName(name: string): string | undefined {
  if (!name) {
    return "Service name is required";
  }
  if (!SERVICE_NAME_PATTERN.test(name)) {
    return `Invalid service name '${name}': use letters, digits, '_', '.', '@' or '-'`;
  }
  return undefined;
}

export function validateRestartSec(value: string): string | undefined {
  return /^\d+$/.test(value) ? undefined : `Restart delay must be a non-negative integer, got '${value}'`;
}

/**
 * Throw InvalidConfigError if the record breaks any invariant
 */
export function assertValidServiceConfig(config: ServiceConfig, source?: string): void {
  const problems = [
    validateServiceName(config.name),
    isTemplateId(config.template) ? undefined : `Unknown template: ${config.template}`,
    isRestartPolicy(config.restart_policy)
      ? undefined
      : `Invalid restart policy '${config.restart_policy}' (expected one of: ${RESTART_POLICIES.join(", ")})`,
    validateRestartSec(config.restart_sec),
    validateEnvVars(config.additional_env_vars),
    config.template === "standard_python" && !config.script_path
      ? "script_path is required for standard_python template"
      : undefined,
    config.template === "gunicorn" && !config.app_module
      ? "app_module is required for gunicorn template"
      : undefined,
  ];

  const problem = problems.find((message) => message !== undefined);
  if (problem) {
    throw new InvalidConfigError(problem, source);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(raw: Record<string, unknown>, field: string, source?: string, fallback?: string): string {
  const value = raw[field] ?? fallback;
  if (typeof value !== "string") {
    throw new InvalidConfigError(`Field '${field}' must be a string`, source);
  }
  return value;
}

function readStringList(raw: Record<string, unknown>, field: string, source?: string): string[] {
  const value = raw[field] ?? [];
  if (!Array.isArray(value)) {
    throw new InvalidConfigError(`Field '${field}' must be a list of strings`, source);
  }
  return value.map((entry) => {
    if (typeof entry !== "string") {
      throw new InvalidConfigError(`Field '${field}' must be a list of strings`, source);
    }
    return entry;
  });
}

/**
 * Build a validated ServiceConfig from parsed JSON
 */
export function parseServiceConfig(input: unknown, source?: string): ServiceConfig {
  if (!isRecord(input)) {
    throw new InvalidConfigError("Configuration must be a JSON object", source);
  }
  const raw = input;

  const template = readString(raw, "template", source);
  if (!isTemplateId(template)) {
    throw new InvalidConfigError(`Unknown template: ${template} (expected one of: ${TEMPLATE_IDS.join(", ")})`, source);
  }

  const restartPolicy = readString(raw, "restart_policy", source);
  if (!isRestartPolicy(restartPolicy)) {
    throw new InvalidConfigError(`Invalid restart policy '${restartPolicy}'`, source);
  }

  const optional = (field: string): string | undefined => {
    const value = raw[field];
    return value === undefined ? undefined : readString(raw, field, source);
  };

  const config = composeServiceConfig({
    name: readString(raw, "name", source),
    description: readString(raw, "description", source, ""),
    template,
    working_directory: readString(raw, "working_directory", source),
    venv_path: readString(raw, "venv_path", source),
    script_path: optional("script_path"),
    script_args: optional("script_args"),
    bind_address: optional("bind_address"),
    app_module: optional("app_module"),
    user: readString(raw, "user", source),
    group: readString(raw, "group", source),
    restart_policy: restartPolicy,
    restart_sec: readString(raw, "restart_sec", source),
    additional_env_vars: readStringList(raw, "additional_env_vars", source),
  });

  assertValidServiceConfig(config, source);
  return config;
}
