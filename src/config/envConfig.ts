// config/envConfig.ts
import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import dotenv from 'dotenv';
import { z } from 'zod';
import logger from '../utils/logging';
import { paths } from './paths';
import { validateConfig, validateFileConfig } from './config-validator';
import type { AppConfig, FileConfig } from './config-validator';

export interface LoadConfigOptions {
  /** Environment to read; defaults to process.env after loading .env */
  env?: NodeJS.ProcessEnv;
  /** YAML file; defaults to LETTER_SERVICES_CONFIG or config/config.yaml */
  configPath?: string;
}

const packageJsonSchema = z.object({ version: z.string() });

const readPackageVersion = (): string => {
  try {
    const parsed = packageJsonSchema.safeParse(JSON.parse(fs.readFileSync(paths.packageJson, 'utf8')));
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch (error) {
    logger.warn('Could not read package.json version', {
      operation: 'SYSTEM',
      error: (error as Error).message,
    });
    return '0.0.0';
  }
};

const readConfigFile = (configPath: string): FileConfig => {
  if (!fs.existsSync(configPath)) {
    logger.system('No config file found, using defaults and environment', { config_file: configPath });
    return {};
  }

  const raw = yaml.load(fs.readFileSync(configPath, 'utf8'));
  logger.debug('Config file loaded', { config_file: configPath });
  return validateFileConfig(raw, configPath);
};

const resolveFromRoot = (value: string): string => path.resolve(paths.root, value);

/**
 * Defaults < config.yaml < environment, validated with zod.
 *
 * @throws ConfigValidationError
 */
export const loadConfig = (options: LoadConfigOptions = {}): AppConfig => {
  if (!options.env) {
    dotenv.config({ path: paths.envFile });
  }

  const env = options.env ?? process.env;
  const configPath = options.configPath ?? env.LETTER_SERVICES_CONFIG ?? paths.configFile;
  const file = readConfigFile(configPath);

  const candidate = {
    environment: env.NODE_ENV || 'development',
    version: readPackageVersion(),
    server: {
      host: env.HOST ?? file.server?.host ?? '0.0.0.0',
      port: env.PORT ?? file.server?.port ?? 8000,
    },
    paths: {
      outputDir: resolveFromRoot(env.OUTPUT_DIR ?? file.paths?.output_dir ?? paths.letters.outputPath),
      templatesDir: resolveFromRoot(file.paths?.templates_dir ?? paths.letters.templatePath),
      staticDir: resolveFromRoot(file.paths?.static_dir ?? paths.letters.staticPath),
    },
    cleanup: {
      enabled: env.PDF_CLEANUP_ENABLED ?? file.cleanup?.enabled ?? true,
      intervalSeconds: env.PDF_CLEANUP_INTERVAL_SECONDS ?? file.cleanup?.interval_seconds ?? 300,
      expiryMinutes: env.PDF_EXPIRY_MINUTES ?? file.cleanup?.expiry_minutes ?? 15,
      stopGraceMs: file.cleanup?.stop_grace_ms ?? 5000,
    },
    rateLimit: {
      windowMs: env.RATE_LIMIT_WINDOW_MS ?? file.rate_limit?.window_ms ?? 60000,
      max: env.RATE_LIMIT_MAX ?? file.rate_limit?.max ?? 100,
    },
    render: {
      pageSize: file.render?.page_size ?? 'A4',
      fontSize: file.render?.font_size ?? 12,
    },
  };

  const config = validateConfig(candidate);

  logger.system('Config loaded successfully', {
    config_file: configPath,
    environment: config.environment,
    version: config.version,
  });

  return config;
};
