// src/services/serviceContainer.ts
import logger from '../utils/logging';
import type { AppConfig } from '../config/config-validator';
import { PdfCleanupService } from './cleanup/PdfCleanupService';
import { DocumentRegistry } from './letters/documentRegistry';
import { LetterRenderer } from './letters/renderer';
import { createRenderConfig } from './letters/renderConfig';
import type { RenderConfig } from './letters/renderConfig';

/**
 * Service Container for Dependency Injection
 * Owns the long-lived collaborators shared by all requests
 */
export class ServiceContainer {
  readonly config: AppConfig;
  readonly renderConfig: RenderConfig;
  readonly renderer: LetterRenderer;
  readonly registry: DocumentRegistry;
  readonly cleanupService: PdfCleanupService;

  constructor(config: AppConfig) {
    this.config = config;

    this.renderConfig = createRenderConfig({
      pageSize: config.render.pageSize,
      fontSize: config.render.fontSize,
    });

    this.renderer = new LetterRenderer({
      templatesDir: config.paths.templatesDir,
      staticDir: config.paths.staticDir,
      outputDir: config.paths.outputDir,
      renderConfig: this.renderConfig,
    });

    this.registry = new DocumentRegistry();

    this.cleanupService = new PdfCleanupService({
      outputDir: config.paths.outputDir,
      expiryMinutes: config.cleanup.expiryMinutes,
    });
  }
}

/**
 * Create the service container from the validated configuration
 * Should be called once during app startup
 */
export function initServiceContainer(config: AppConfig): ServiceContainer {
  const container = new ServiceContainer(config);

  logger.container('Service container initialized', {
    templates: container.renderer.supportedTemplates.length,
    page_size: container.renderConfig.pageSize,
    output_dir: config.paths.outputDir,
  });

  return container;
}
