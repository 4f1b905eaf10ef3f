import { z } from 'zod';
import logger from '../utils/logging';

export class ConfigValidationError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

const TRUE_VALUES = ['true', '1', 'yes', 'on'];

const booleanFlag = z.preprocess(
  (value) => (typeof value === 'string' ? TRUE_VALUES.includes(value.trim().toLowerCase()) : value),
  z.boolean()
);

const positiveInt = (label: string) =>
  z.coerce.number({ invalid_type_error: `${label} must be a number` }).int(`${label} must be an integer`).positive(`${label} must be positive`);

/**
 * Shape of config/config.yaml. Every key is optional.
 */
export const fileConfigSchema = z
  .object({
    server: z
      .object({
        host: z.string().optional(),
        port: z.number().optional(),
      })
      .optional(),
    paths: z
      .object({
        output_dir: z.string().optional(),
        templates_dir: z.string().optional(),
        static_dir: z.string().optional(),
      })
      .optional(),
    cleanup: z
      .object({
        enabled: z.boolean().optional(),
        interval_seconds: z.number().optional(),
        expiry_minutes: z.number().optional(),
        stop_grace_ms: z.number().optional(),
      })
      .optional(),
    rate_limit: z
      .object({
        window_ms: z.number().optional(),
        max: z.number().optional(),
      })
      .optional(),
    render: z
      .object({
        page_size: z.string().optional(),
        font_size: z.number().optional(),
      })
      .optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

/**
 * Final application config after merging defaults, the YAML file and the
 * environment. Environment values arrive as strings and are coerced here.
 */
export const appConfigSchema = z.object({
  environment: z.string().min(1),
  version: z.string().min(1),
  server: z.object({
    host: z.string().min(1, 'HOST is required'),
    port: positiveInt('PORT').max(65535, 'PORT must be at most 65535'),
  }),
  paths: z.object({
    outputDir: z.string().min(1),
    templatesDir: z.string().min(1),
    staticDir: z.string().min(1),
  }),
  cleanup: z.object({
    enabled: booleanFlag,
    intervalSeconds: positiveInt('PDF_CLEANUP_INTERVAL_SECONDS'),
    expiryMinutes: positiveInt('PDF_EXPIRY_MINUTES'),
    stopGraceMs: positiveInt('stop_grace_ms'),
  }),
  rateLimit: z.object({
    windowMs: positiveInt('RATE_LIMIT_WINDOW_MS'),
    max: positiveInt('RATE_LIMIT_MAX'),
  }),
  render: z.object({
    pageSize: z.enum(['A4', 'LETTER', 'LEGAL', 'FOLIO']),
    fontSize: positiveInt('font_size').max(24, 'font_size must be at most 24'),
  }),
});

export type AppConfig = z.infer<typeof appConfigSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

export function validateFileConfig(raw: unknown, source: string): FileConfig {
  const result = fileConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = formatIssues(result.error);
    logger.error('Config file has an invalid structure', {
      operation: 'SYSTEM',
      error_code: 'CONFIG_FILE_INVALID',
      config_file: source,
      issues,
    });
    throw new ConfigValidationError(issues);
  }
  return result.data;
}

export function validateConfig(candidate: unknown): AppConfig {
  const result = appConfigSchema.safeParse(candidate);

  if (!result.success) {
    const issues = formatIssues(result.error);
    logger.error('Configuration validation failed', {
      operation: 'SYSTEM',
      error_code: 'CONFIG_INVALID',
      issues,
      issue_count: issues.length,
    });
    throw new ConfigValidationError(issues);
  }

  logger.system('Configuration validation successful', {
    environment: result.data.environment,
    port: result.data.server.port,
    cleanup_enabled: result.data.cleanup.enabled,
    ...(logger.isVerbose() && {
      output_dir: result.data.paths.outputDir,
      templates_dir: result.data.paths.templatesDir,
    }),
  });

  return result.data;
}
