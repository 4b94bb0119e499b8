/**
 * Utils Module
 */

export { logger, initLogger, getLogger, parseLogLevel, LogLevel } from './logger.js';
export type { Logger, LoggerConfig } from './logger.js';
export { ServiceWizardError, UnknownTemplateError, MissingFieldError, InvalidConfigError } from './errors.js';
