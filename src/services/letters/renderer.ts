// src/services/letters/renderer.ts
import path from 'path';
import { promises as fs } from 'fs';
import { compileFile } from 'pug';
import { v4 as uuidv4 } from 'uuid';
import logger from '../../utils/logging';
import { checkPdfSize, MAX_PDF_SIZE, sanitizeFilename } from '../../utils/filename';
import { resolveFileWithin } from '../../utils/pathSafety';
import type { LetterRequest } from '../../validators/letterRequestSchema';
import { LetterServiceError, RenderFailureError, TemplateMissingError, UnknownTemplateError } from './errors';
import { htmlToPdf } from './htmlToPdf';
import { defaultFilename } from './mappers';
import type { RenderConfig } from './renderConfig';

export type TemplateContext = Record<string, unknown>;

export interface LetterRendererOptions {
  templatesDir: string;
  staticDir: string;
  outputDir: string;
  renderConfig: RenderConfig;
  maxPdfSize?: number;
}

export interface RenderOptions {
  logoPath?: string;
  traceId?: string;
}

export interface GenerateOptions {
  filename?: string;
  traceId?: string;
}

export interface GeneratedLetter {
  filename: string;
  filePath: string;
  fileSize: number;
}

export const SUPPORTED_TEMPLATES = [
  'surat_tugas',
  'lembar_persetujuan',
  'surat_dinas',
  'surat_edaran',
  'surat_pemberitahuan',
] as const;

/**
 * Turns a template id and a context into PDF bytes and stores the result in
 * the output directory.
 */
export class LetterRenderer {
  readonly templatesDir: string;
  readonly staticDir: string;
  readonly outputDir: string;
  readonly supportedTemplates: readonly string[];

  private readonly renderConfig: RenderConfig;
  private readonly maxPdfSize: number;

  constructor(options: LetterRendererOptions) {
    this.templatesDir = path.resolve(options.templatesDir);
    this.staticDir = path.resolve(options.staticDir);
    this.outputDir = path.resolve(options.outputDir);
    this.renderConfig = options.renderConfig;
    this.maxPdfSize = options.maxPdfSize ?? MAX_PDF_SIZE;
    this.supportedTemplates = Object.freeze([...SUPPORTED_TEMPLATES]);
  }

  isSupported(templateId: string): boolean {
    return this.supportedTemplates.includes(templateId);
  }

  async render(templateId: string, data: TemplateContext, options: RenderOptions = {}): Promise<Buffer> {
    const startTime = Date.now();
    const trace_id = options.traceId ?? uuidv4();

    logger.letter('Starting letter rendering', {
      trace_id,
      template: templateId,
      has_logo: Boolean(options.logoPath),
    });

    if (!this.isSupported(templateId)) {
      throw new UnknownTemplateError(templateId, this.supportedTemplates, trace_id);
    }

    const templatePath = path.join(this.templatesDir, `${templateId}.pug`);
    await this.ensureTemplate(templateId, templatePath, trace_id);

    const logoPath = options.logoPath ? this.resolveLogo(options.logoPath, trace_id) : undefined;
    const context = this.buildContext(data, logoPath);

    try {
      const html = compileFile(templatePath)(context);

      logger.debug('Template compiled', {
        trace_id,
        template: templateId,
        html_length: html.length,
        duration_ms: Date.now() - startTime,
      });

      const pdf = await htmlToPdf(html, this.renderConfig, {
        assetsDir: this.staticDir,
        traceId: trace_id,
      });

      logger.letter('Letter rendered successfully', {
        trace_id,
        template: templateId,
        duration_ms: Date.now() - startTime,
        file_size_bytes: pdf.length,
        file_size_kb: Math.round(pdf.length / 1024),
      });

      return pdf;
    } catch (error) {
      const structuredError =
        error instanceof LetterServiceError
          ? error
          : new RenderFailureError(`Rendering '${templateId}' failed: ${(error as Error).message}`, trace_id);

      logger.error('Letter rendering failed', {
        trace_id,
        template: templateId,
        duration_ms: Date.now() - startTime,
        error_code: structuredError.code,
        error_details: structuredError.details,
      });

      throw structuredError;
    }
  }

  /**
   * Template context: a shallow copy of `data` with the keys of `data.content`
   * lifted to the top level (they override same-named keys). `logo_path` is
   * only ever the verified logo passed in here.
   */
  buildContext(data: TemplateContext, logoPath?: string): TemplateContext {
    const context: TemplateContext = { ...data };
    const content = data.content;

    if (isRecord(content)) {
      Object.assign(context, content);
      context.content = content;
    }

    delete context.logo_path;
    if (logoPath) {
      context.logo_path = logoPath;
    }

    return context;
  }

  /**
   * Returns the real path of the logo when it is a regular file inside the
   * static directory. The reference is tried as given and relative to the
   * static directory; anything else means no logo.
   */
  resolveLogo(reference: string, traceId?: string): string | undefined {
    const candidates = [path.resolve(reference), path.resolve(this.staticDir, reference)];

    for (const candidate of candidates) {
      const resolved = resolveFileWithin(this.staticDir, candidate);
      if (resolved) {
        logger.debug('Logo resolved', { trace_id: traceId, logo_path: resolved });
        return resolved;
      }
    }

    logger.security('Logo outside the static directory or missing, rendering without logo', {
      trace_id: traceId,
      logo_reference: reference,
    });
    return undefined;
  }

  /**
   * Size check, then filename check, then write. Returns the full path.
   */
  async save(bytes: Uint8Array, filename: string, traceId?: string): Promise<string> {
    checkPdfSize(bytes, this.maxPdfSize);
    const safeName = sanitizeFilename(filename);

    await fs.mkdir(this.outputDir, { recursive: true });
    const filePath = path.join(this.outputDir, safeName);
    await fs.writeFile(filePath, bytes);

    logger.letter('Letter saved', {
      trace_id: traceId,
      filename: safeName,
      file_size_bytes: bytes.length,
    });

    return filePath;
  }

  async generate(request: LetterRequest, options: GenerateOptions = {}): Promise<GeneratedLetter> {
    const trace_id = options.traceId ?? uuidv4();

    const bytes = await this.render(
      request.template_type,
      { ...request },
      { logoPath: request.school_info.logo_url, traceId: trace_id }
    );

    const filename = options.filename ?? defaultFilename(request.template_type);
    const filePath = await this.save(bytes, filename, trace_id);

    return {
      filename: path.basename(filePath),
      filePath,
      fileSize: bytes.length,
    };
  }

  private async ensureTemplate(templateId: string, templatePath: string, traceId: string): Promise<void> {
    try {
      await fs.access(templatePath, fs.constants.R_OK);
    } catch (error) {
      logger.error('Template file not readable', {
        trace_id: traceId,
        template: templateId,
        error: (error as Error).message,
      });
      throw new TemplateMissingError(templateId, templatePath, traceId);
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
