/**
 * 🔧 LETTER-SERVICES: Logger Configuration
 *
 * Configuration utilities and helpers for the logging system
 *
 * Classification: INTERNAL (service infrastructure)
 */

import path from 'path';
import fs from 'fs';
import { LogMode, LogLevel, LoggerConfig } from './types';

/**
 * Field names redacted from log metadata in normal mode
 */
export const SENSITIVE_PATTERNS = [
  /password/i,
  /secret/i,
  /token/i,
  /credential/i,
  /^nip$/i,
  /telepon/i,
  /phone/i,
  /email/i,
  /^isi$/i,
];

const VALID_LEVELS: LogLevel[] = ['DEBUG', 'INFO', 'WARN', 'ERROR'];

/**
 * Determine log mode from environment
 */
export const getLogMode = (): LogMode => {
  const mode = process.env.LOG_LEVEL?.toLowerCase();
  return mode === 'verbose' || mode === 'debug' ? 'verbose' : 'normal';
};

export const isValidLogLevel = (level: string): level is LogLevel => {
  return VALID_LEVELS.some((valid) => valid === level);
};

/**
 * Get effective log level based on mode and environment
 */
export const getLogLevel = (): LogLevel => {
  if (getLogMode() === 'verbose') {
    return 'DEBUG';
  }

  const envLevel = process.env.LOG_LEVEL?.toUpperCase();
  if (envLevel && isValidLogLevel(envLevel)) {
    return envLevel;
  }

  return process.env.NODE_ENV === 'production' ? 'INFO' : 'DEBUG';
};

export const getServiceName = (): string => {
  return process.env.SERVICE_NAME || 'letter-services';
};

export const getEnvironment = (): string => {
  return process.env.NODE_ENV || 'development';
};

/**
 * Create logs directory lazily
 */
export const ensureLogsDirectory = (): string => {
  const logsDir = process.env.LOGS_DIR || path.join(process.cwd(), 'logs');
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }
  return logsDir;
};

/**
 * Create complete logger configuration.
 * The test environment gets no file transports and a silent console unless
 * LOG_LEVEL is set explicitly.
 */
export const createLoggerConfig = (): LoggerConfig => {
  const environment = getEnvironment();
  const isTest = environment === 'test';
  return {
    mode: getLogMode(),
    level: getLogLevel(),
    environment,
    service: getServiceName(),
    logsDirectory: isTest ? '' : ensureLogsDirectory(),
    fileLogging: !isTest,
    silent: isTest && !process.env.LOG_LEVEL,
  };
};

/**
 * Redact sensitive metadata in normal mode
 */
export const sanitizeLogData = (data: unknown, mode: LogMode): unknown => {
  if (mode === 'verbose') {
    return data;
  }

  if (typeof data !== 'object' || data === null) {
    return data;
  }

  if (Array.isArray(data)) {
    return data.map((item) => sanitizeLogData(item, mode));
  }

  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    if (SENSITIVE_PATTERNS.some((pattern) => pattern.test(key))) {
      sanitized[key] = '[REDACTED]';
    } else {
      sanitized[key] = sanitizeLogData(value, mode);
    }
  }
  return sanitized;
};

/**
 * Format uptime to human readable string
 */
export const formatUptime = (seconds: number): string => {
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = Math.floor(seconds % 60);

  if (hours > 0) {
    return `${hours}h ${minutes}m ${secs}s`;
  } else if (minutes > 0) {
    return `${minutes}m ${secs}s`;
  }
  return `${secs}s`;
};

export const getDefaultMeta = (config: LoggerConfig) => {
  return {
    service: config.service,
    environment: config.environment,
    mode: config.mode,
  };
};
