/**
 * 🔧 LETTER-SERVICES: Core Logger
 *
 * Base logger implementation wrapping a Winston logger
 *
 * Classification: INTERNAL (service infrastructure)
 */

import { Logger } from 'winston';
import {
  LogLevel,
  LogMeta,
  ServiceOperation,
  ILetterServicesLogger,
  LoggerConfig,
} from './types';

const WINSTON_LEVELS: Record<LogLevel, string> = {
  DEBUG: 'debug',
  INFO: 'info',
  WARN: 'warn',
  ERROR: 'error',
};

export class LetterServicesLogger implements ILetterServicesLogger {
  protected logger: Logger;
  protected config: LoggerConfig;

  constructor(logger: Logger, config: LoggerConfig) {
    this.logger = logger;
    this.config = config;
  }

  debug(message: string, meta?: LogMeta): void {
    this.log('DEBUG', message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log('INFO', message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log('WARN', message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.log('ERROR', message, meta);
  }

  /**
   * Letter rendering and storage
   */
  letter(message: string, meta?: LogMeta): void {
    this.log('INFO', message, { ...meta, operation: 'LETTER_GENERATION' });
  }

  /**
   * Expired file sweeps
   */
  cleanup(message: string, meta?: LogMeta): void {
    this.log('INFO', message, { ...meta, operation: 'FILE_CLEANUP' });
  }

  /**
   * Rejected filenames, traversal attempts and out-of-bounds assets
   */
  security(message: string, meta?: LogMeta): void {
    this.log('WARN', message, { ...meta, operation: 'SECURITY' });
  }

  container(message: string, meta?: LogMeta): void {
    this.log('INFO', message, { ...meta, operation: 'SERVICE_CONTAINER' });
  }

  request(message: string, meta?: LogMeta): void {
    this.log('INFO', message, { ...meta, operation: 'API_REQUEST' });
  }

  system(message: string, meta?: LogMeta): void {
    this.log('INFO', message, { ...meta, operation: 'SYSTEM' });
  }

  /**
   * Performance logging with automatic duration calculation
   */
  performance(operation: ServiceOperation, startTime: number, meta?: LogMeta): void {
    this.log('INFO', `${operation} completed`, {
      ...meta,
      operation,
      duration_ms: Date.now() - startTime,
    });
  }

  isVerbose(): boolean {
    return this.config.mode === 'verbose';
  }

  protected log(level: LogLevel, message: string, meta?: LogMeta): void {
    this.logger.log(WINSTON_LEVELS[level], message, meta);
  }
}
