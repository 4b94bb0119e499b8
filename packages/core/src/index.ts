/**
 * @service-wizard/core
 *
 * Core shared logic for the service wizard
 * Provides unit templates, configuration handling, path validation and systemd deployment
 */

// Export common types
export type { OperationResult, ExecutionResult } from "./types/common.js";

// Export Templates module
export {
  getTemplate,
  listTemplates,
  renderServiceFile,
  renderServiceConfig,
  previewServiceFile,
  formatEnvironmentLine,
} from "./templates/index.js";
export type { ServiceTemplate } from "./templates/index.js";

// Export Config module
export {
  ConfigStore,
  buildFromFlags,
  hasRequiredFlags,
  defaultBuildContext,
  getDefaultUser,
  composeServiceConfig,
  fieldsForTemplate,
  getFieldValue,
  parseEnvVars,
  formatEnvVars,
  validateEnvVar,
  validateEnvVars,
  validateEnvLine,
  hasUnterminatedQuote,
  parseServiceConfig,
  assertValidServiceConfig,
  validateServiceName,
  validateRestartSec,
  SERVICE_NAME_PATTERN,
  resolvePaths,
  toAbsolutePath,
  SYSTEM_UNIT_DIR,
  TEMPLATE_IDS,
  RESTART_POLICIES,
  DEFAULT_SERVICE_VALUES,
  isTemplateId,
  isRestartPolicy,
} from "./config/index.js";
export type {
  ServiceFlags,
  BuildContext,
  ServiceConfigFields,
  WizardPaths,
  ServiceConfig,
  BaseServiceConfig,
  StandardPythonServiceConfig,
  GunicornServiceConfig,
  ServiceConfigField,
  TemplateId,
  RestartPolicy,
} from "./config/index.js";

// Export Validation module
export { validateScript, validateVenv, validateServicePaths, VENV_ACTIVATE_SCRIPT } from "./validation/index.js";
export type { ValidationResult, PathCheck } from "./validation/index.js";

// Export Service module
export {
  ServiceManager,
  ServiceFileManager,
  Deployer,
  LocalCommandExecutor,
  describeFailure,
  ServiceStatus,
} from "./service/index.js";
export type { ServiceManagerOptions, DeployerOptions, CommandExecutor, WriteResult } from "./service/index.js";

// Export Utils module
export {
  logger,
  initLogger,
  getLogger,
  parseLogLevel,
  LogLevel,
  ServiceWizardError,
  UnknownTemplateError,
  MissingFieldError,
  InvalidConfigError,
} from "./utils/index.js";
export type { Logger, LoggerConfig } from "./utils/index.js";
