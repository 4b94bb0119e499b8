/**
 * Config Builder
 * Builds a ServiceConfig from command-line flags and supplies the
 * defaults shared with the interactive wizard
 */

import os from "node:os";
import { logger } from "../utils/logger.js";
import { MissingFieldError, UnknownTemplateError, InvalidConfigError } from "../utils/errors.js";
import { toAbsolutePath } from "./paths.js";
import { parseEnvVars, validateEnvLine } from "./env-vars.js";
import { composeServiceConfig } from "./record.js";
import { assertValidServiceConfig } from "./validate.js";
import type { ServiceConfig } from "./types.js";
import { DEFAULT_SERVICE_VALUES, isRestartPolicy, isTemplateId, RESTART_POLICIES } from "./types.js";

/**
 * Discrete `create` flags, as commander hands them over
 */
export interface ServiceFlags {
  name?: string;
  template?: string;
  description?: string;
  workingDir?: string;
  venvPath?: string;
  scriptPath?: string;
  scriptArgs?: string;
  bindAddress?: string;
  appModule?: string;
  user?: string;
  group?: string;
  restart?: string;
  restartSec?: string;
  env?: string;
}

/**
 * Process facts the defaults are derived from
 */
export interface BuildContext {
  cwd: string;
  homeDir: string;
  user: string;
}

/**
 * Name of the account running the wizard
 */
export function getDefaultUser(): string {
  try {
    return os.userInfo().username;
  } catch (error) {
    logger.debug("Could not read OS user info, falling back to environment", { error: (error as Error).message });
    return process.env.USER || process.env.LOGNAME || "root";
  }
}

export function defaultBuildContext(): BuildContext {
  return {
    cwd: process.cwd(),
    homeDir: os.homedir(),
    user: getDefaultUser(),
  };
}

/**
 * Flag mode needs at least a name, a template and a virtual environment;
 * anything less falls back to the interactive wizard.
 */
export function hasRequiredFlags(flags: ServiceFlags): boolean {
  return Boolean(flags.name && flags.template && flags.venvPath);
}

/**
 * Build a configuration from flags, applying the same defaults as the
 * wizard. Throws an input error naming the offending flag.
 */
export function buildFromFlags(flags: ServiceFlags, context: BuildContext = defaultBuildContext()): ServiceConfig {
  const { name, template, venvPath } = flags;
  if (!name) {
    throw new MissingFieldError("name", "--name is required");
  }
  if (!template) {
    throw new MissingFieldError("template", "--template is required");
  }
  if (!isTemplateId(template)) {
    throw new UnknownTemplateError(template);
  }
  if (!venvPath) {
    throw new MissingFieldError("venv_path", "--venv-path is required");
  }

  if (template === "standard_python" && !flags.scriptPath) {
    throw new MissingFieldError("script_path", "--script-path is required for standard_python template");
  }
  if (template === "gunicorn" && !flags.appModule) {
    throw new MissingFieldError("app_module", "--app-module is required for gunicorn template");
  }

  const restartPolicy = flags.restart ?? DEFAULT_SERVICE_VALUES.restartPolicy;
  if (!isRestartPolicy(restartPolicy)) {
    throw new InvalidConfigError(
      `Invalid restart policy '${restartPolicy}' (expected one of: ${RESTART_POLICIES.join(", ")})`
    );
  }

  const envProblem = validateEnvLine(flags.env);
  if (envProblem) {
    throw new InvalidConfigError(envProblem, "command-line flags");
  }

  const absolute = (value: string): string => toAbsolutePath(value, context.cwd, context.homeDir);

  const config = composeServiceConfig({
    name,
    description: flags.description || `Python service ${name}`,
    template,
    working_directory: flags.workingDir ? absolute(flags.workingDir) : context.cwd,
    venv_path: absolute(venvPath),
    script_path: flags.scriptPath ? absolute(flags.scriptPath) : undefined,
    script_args: flags.scriptArgs ?? "",
    bind_address: flags.bindAddress || DEFAULT_SERVICE_VALUES.bindAddress,
    app_module: flags.appModule,
    user: flags.user || context.user,
    group: flags.group || context.user,
    restart_policy: restartPolicy,
    restart_sec: flags.restartSec ?? DEFAULT_SERVICE_VALUES.restartSec,
    additional_env_vars: parseEnvVars(flags.env),
  });

  assertValidServiceConfig(config, "command-line flags");
  logger.debug("Built service configuration from flags", { name: config.name, template: config.template });
  return config;
}
