/**
 * 🚀 LETTER-SERVICES: Logger System
 *
 * Barrel exports and the configured default logger instance
 *
 * Classification: INTERNAL (service infrastructure)
 *
 * Usage:
 * import logger from '../utils/logging';
 */

import path from 'path';
import { createLogger, format, transports, Logger } from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { createLoggerConfig, sanitizeLogData, getDefaultMeta } from './core/config';
import { LetterServicesLogger } from './core/logger';
import type { LoggerConfig } from './core/types';

export type {
  LogLevel,
  LogMeta,
  ServiceOperation,
  LogMode,
  LetterServicesLogEntry,
  LoggerConfig,
  ILogger,
  ILetterServicesLogger,
} from './core/types';

export {
  getLogMode,
  getLogLevel,
  getServiceName,
  getEnvironment,
  ensureLogsDirectory,
  createLoggerConfig,
  sanitizeLogData,
  formatUptime,
  isValidLogLevel,
  getDefaultMeta,
  SENSITIVE_PATTERNS,
} from './core/config';

export { LetterServicesLogger } from './core/logger';

const createStructuredFormat = (config: LoggerConfig) => {
  return format.printf((info) => {
    const {
      timestamp,
      level,
      message,
      operation,
      service = config.service,
      environment = config.environment,
      ...meta
    } = info;

    const logEntry: Record<string, unknown> = {
      timestamp,
      level: level.toUpperCase(),
      service,
      environment,
      mode: config.mode,
      message,
    };

    if (operation) {
      logEntry.operation = operation;
    }

    const sanitizedMeta = sanitizeLogData(meta, config.mode);
    if (sanitizedMeta && typeof sanitizedMeta === 'object' && Object.keys(sanitizedMeta).length > 0) {
      logEntry.metadata = sanitizedMeta;
    }

    return JSON.stringify(logEntry);
  });
};

const createConsoleFormat = (config: LoggerConfig) => {
  return format.printf((info) => {
    const {
      timestamp,
      level,
      message,
      operation,
      trace_id,
      duration_ms,
      service: _service,
      environment: _environment,
      mode: _mode,
      ...meta
    } = info;

    let output = `${String(timestamp)} [${level.toUpperCase()}]`;

    if (config.mode === 'verbose') {
      output += ' [VERBOSE]';
    }

    if (typeof operation === 'string') {
      output += ` [${operation}]`;
    }

    if (typeof trace_id === 'string') {
      output += ` [${trace_id.substring(0, 8)}...]`;
    }

    output += `: ${String(message)}`;

    if (typeof duration_ms === 'number') {
      output += ` (${duration_ms}ms)`;
    }

    const sanitizedMeta = sanitizeLogData(meta, config.mode);
    if (config.mode === 'verbose' || level.includes('error')) {
      if (sanitizedMeta && typeof sanitizedMeta === 'object' && Object.keys(sanitizedMeta).length > 0) {
        output += `\n  📋 ${JSON.stringify(sanitizedMeta, null, 2)}`;
      }
    }

    return output;
  });
};

const createWinstonLogger = (config: LoggerConfig): Logger => {
  const loggerTransports: Array<InstanceType<typeof transports.Console> | DailyRotateFile> = [
    new transports.Console({
      level: config.level.toLowerCase(),
      silent: config.silent,
      format: format.combine(
        format.colorize({
          colors: { debug: 'blue', info: 'green', warn: 'yellow', error: 'red' },
        }),
        format.timestamp({ format: 'HH:mm:ss.SSS' }),
        createConsoleFormat(config)
      ),
    }),
  ];

  if (config.fileLogging) {
    loggerTransports.push(
      new DailyRotateFile({
        filename: path.join(config.logsDirectory, 'letter-services-%DATE%.log'),
        datePattern: 'YYYY-MM-DD',
        zippedArchive: true,
        maxSize: '50m',
        maxFiles: '14d',
        level: 'info',
      }),
      new DailyRotateFile({
        filename: path.join(config.logsDirectory, 'letter-services-error-%DATE%.log'),
        datePattern: 'YYYY-MM-DD',
        zippedArchive: true,
        maxSize: '25m',
        maxFiles: '30d',
        level: 'error',
      })
    );
  }

  return createLogger({
    level: config.level.toLowerCase(),
    format: format.combine(
      format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      format.errors({ stack: true }),
      createStructuredFormat(config)
    ),
    defaultMeta: getDefaultMeta(config),
    transports: loggerTransports,
    exitOnError: false,
  });
};

const config = createLoggerConfig();
const logger = new LetterServicesLogger(createWinstonLogger(config), config);

logger.system('🚀 Letter-Services logger system initialized', {
  log_mode: config.mode,
  log_level: config.level,
  environment: config.environment,
  file_logging: config.fileLogging,
});

export default logger;
