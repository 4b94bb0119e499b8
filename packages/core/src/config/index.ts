/**
 * Config Module - Service configuration model, builder and storage
 */

export { ConfigStore } from "./store.js";
export { buildFromFlags, hasRequiredFlags, defaultBuildContext, getDefaultUser } from "./builder.js";
export type { ServiceFlags, BuildContext } from "./builder.js";
export { composeServiceConfig, fieldsForTemplate, getFieldValue } from "./record.js";
export type { ServiceConfigFields } from "./record.js";
export {
  parseEnvVars,
  formatEnvVars,
  validateEnvVar,
  validateEnvVars,
  validateEnvLine,
  hasUnterminatedQuote,
} from "./env-vars.js";
export {
  parseServiceConfig,
  assertValidServiceConfig,
  validateServiceName,
  validateRestartSec,
  SERVICE_NAME_PATTERN,
} from "./validate.js";
export { resolvePaths, toAbsolutePath, SYSTEM_UNIT_DIR } from "./paths.js";
export type { WizardPaths } from "./paths.js";
export type {
  ServiceConfig,
  BaseServiceConfig,
  StandardPythonServiceConfig,
  GunicornServiceConfig,
  ServiceConfigField,
  TemplateId,
  RestartPolicy,
} from "./types.js";
export {
  TEMPLATE_IDS,
  RESTART_POLICIES,
  DEFAULT_SERVICE_VALUES,
  isTemplateId,
  isRestartPolicy,
} from "./types.js";
