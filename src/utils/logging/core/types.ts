/**
 * 🔧 LETTER-SERVICES: Logger Types
 *
 * Core types and interfaces for the logging system
 *
 * Classification: INTERNAL (service infrastructure)
 */

/**
 * Log levels understood by the service logger
 */
export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

/**
 * Letter-services specific log categories
 */
export type ServiceOperation =
  | 'LETTER_GENERATION'
  | 'FILE_CLEANUP'
  | 'SECURITY'
  | 'SERVICE_CONTAINER'
  | 'SYSTEM'
  | 'API_REQUEST';

/**
 * Log modes for data sensitivity
 */
export type LogMode = 'normal' | 'verbose';

/**
 * Structured log entry
 */
export interface LetterServicesLogEntry {
  message: string;
  level?: LogLevel;

  // Service-specific context
  operation?: ServiceOperation;
  trace_id?: string;

  // Performance metrics
  duration_ms?: number;
  file_size_bytes?: number;

  // Letter context
  template?: string;
  filename?: string;
  doc_id?: string;

  // Technical context
  error_code?: string;
  error_message?: string;
  stack?: string;
  endpoint?: string;
  method?: string;
  status_code?: number;

  // Additional data (sanitized in normal mode)
  [key: string]: unknown;
}

export type LogMeta = Partial<LetterServicesLogEntry>;

/**
 * Logger configuration
 */
export interface LoggerConfig {
  mode: LogMode;
  level: LogLevel;
  environment: string;
  service: string;
  logsDirectory: string;
  fileLogging: boolean;
  silent: boolean;
}

/**
 * Base logger interface
 */
export interface ILogger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  isVerbose(): boolean;
}

/**
 * Logger with service-specific helpers
 */
export interface ILetterServicesLogger extends ILogger {
  letter(message: string, meta?: LogMeta): void;
  cleanup(message: string, meta?: LogMeta): void;
  security(message: string, meta?: LogMeta): void;
  container(message: string, meta?: LogMeta): void;
  request(message: string, meta?: LogMeta): void;
  system(message: string, meta?: LogMeta): void;

  performance(operation: ServiceOperation, startTime: number, meta?: LogMeta): void;
}
