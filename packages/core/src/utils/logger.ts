/**
 * Logging Module
 * Provides centralized logging using Winston
 */

import winston from 'winston';
import path from 'node:path';
import fs from 'node:fs';
import { resolvePaths } from '../config/paths.js';

/**
 * Log levels
 */
export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level?: LogLevel;
  consoleLevel?: LogLevel;
  logToFile?: boolean;
  logDir?: string;
  logFileName?: string;
  maxFiles?: number;
  maxSize?: number;
  silent?: boolean;
}

/**
 * Narrow a free-form string (flag or env var) to a log level
 */
export const parseLogLevel = (value: string | undefined): LogLevel | undefined =>
  Object.values(LogLevel).find((level) => level === value?.toLowerCase());

const ensureLogDir = (logDir: string): void => {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
};

/**
 * Create a Winston logger instance
 */
const createLogger = (config: LoggerConfig = {}): winston.Logger => {
  const {
    level = LogLevel.INFO,
    consoleLevel = parseLogLevel(process.env.SERVICE_WIZARD_LOG_LEVEL) ?? LogLevel.WARN,
    logToFile = true,
    logDir = resolvePaths().logDir,
    logFileName = 'service-wizard.log',
    maxFiles = 7,
    maxSize = 10 * 1024 * 1024, // 10MB
    silent = false,
  } = config;

  const transports: winston.transport[] = [];

  // Console stays quiet by default; the wizard does its own printing
  transports.push(
    new winston.transports.Console({
      level: consoleLevel,
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.printf(({ timestamp, level, message, ...meta }) => {
          const metaStr = Object.keys(meta).length > 0 ? `\n${JSON.stringify(meta, null, 2)}` : '';
          return `${timestamp} [${level}]: ${message}${metaStr}`;
        })
      ),
    })
  );

  if (logToFile) {
    ensureLogDir(logDir);

    transports.push(
      new winston.transports.File({
        filename: path.join(logDir, logFileName),
        maxsize: maxSize,
        maxFiles,
        format: winston.format.combine(
          winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
          winston.format.json()
        ),
      })
    );

    // Separate error log
    transports.push(
      new winston.transports.File({
        filename: path.join(logDir, 'error.log'),
        level: 'error',
        maxsize: maxSize,
        maxFiles,
        format: winston.format.combine(
          winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
          winston.format.json()
        ),
      })
    );
  }

  return winston.createLogger({
    level: level === LogLevel.DEBUG || consoleLevel === LogLevel.DEBUG ? LogLevel.DEBUG : level,
    silent,
    transports,
  });
};

let loggerInstance: winston.Logger | undefined;

/**
 * Initialize the logger with custom configuration
 */
export const initLogger = (config?: LoggerConfig): winston.Logger => {
  loggerInstance = createLogger(config);
  return loggerInstance;
};

/**
 * Get the logger instance
 */
export const getLogger = (): winston.Logger => {
  if (!loggerInstance) {
    loggerInstance = createLogger();
  }
  return loggerInstance;
};

/**
 * Default logger instance (auto-initialized)
 */
export const logger = {
  error: (message: string, meta?: unknown): void => {
    getLogger().error(message, meta);
  },

  warn: (message: string, meta?: unknown): void => {
    getLogger().warn(message, meta);
  },

  info: (message: string, meta?: unknown): void => {
    getLogger().info(message, meta);
  },

  debug: (message: string, meta?: unknown): void => {
    getLogger().debug(message, meta);
  },
};

export type Logger = typeof logger;
