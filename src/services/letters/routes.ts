import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import { promises as fs } from 'fs';
import type { ServiceContainer } from '../serviceContainer';
import { parseBody } from '../../validators/parseBody';
import {
  generateLetterRequestSchema,
  lembarPersetujuanRequestSchema,
  renderLetterRequestSchema,
  suratTugasRequestSchema,
} from '../../validators/letterRequestSchema';
import { isMissingEntry } from '../../utils/fsErrors';
import { resolveDocumentRef } from './documentRegistry';
import { DocumentNotFoundError } from './errors';
import {
  fromGenerateRequest,
  fromLembarPersetujuan,
  fromRenderRequest,
  fromSuratTugas,
  generatedLetterFilename,
  lembarPersetujuanFilename,
  suratTugasFilename,
} from './mappers';
import type { GeneratedLetter } from './renderer';

export const LETTERS_BASE_PATH = '/letters';

export interface FileResponse {
  filename: string;
  file_url: string;
  file_size: number;
}

export function downloadUrl(ref: string): string {
  return `${LETTERS_BASE_PATH}/download/${encodeURIComponent(ref)}`;
}

/**
 * Plain `filename` for ASCII names; other names get an ASCII fallback plus
 * an RFC 5987 `filename*` parameter.
 */
export function contentDisposition(disposition: 'attachment' | 'inline', filename: string): string {
  const fallback = filename.replace(/[^\x20-\x7e]/g, '_');
  const header = `${disposition}; filename="${fallback}"`;
  return fallback === filename ? header : `${header}; filename*=UTF-8''${encodeURIComponent(filename)}`;
}

// The sweeper may remove the file after it was resolved
async function readDocument(filePath: string, ref: string, traceId?: string): Promise<Buffer> {
  try {
    return await fs.readFile(filePath);
  } catch (error) {
    if (isMissingEntry(error)) {
      throw new DocumentNotFoundError(ref, traceId);
    }
    throw error;
  }
}

function toFileResponse(letter: GeneratedLetter): FileResponse {
  return {
    filename: letter.filename,
    file_url: downloadUrl(letter.filename),
    file_size: letter.fileSize,
  };
}

/**
 * Letter routes, mounted under /letters.
 * Download references are checked by validateDownloadPath before they get here.
 */
export function createLetterRoutes(container: ServiceContainer) {
  const router = express.Router();
  const { renderer, registry } = container;

  /**
   * GET /templates
   * Fixed list of template identifiers the renderer accepts.
   */
  router.get('/templates', (_req, res) => {
    res.json({
      templates: renderer.supportedTemplates,
      count: renderer.supportedTemplates.length,
    });
  });

  /**
   * POST /surat-tugas
   * Assignment letter; file named after the first assignee and the letter date.
   */
  router.post('/surat-tugas', async (req, res, next) => {
    try {
      const request = parseBody(suratTugasRequestSchema, req.body, req.trace_id);
      const letter = await renderer.generate(fromSuratTugas(request), {
        filename: suratTugasFilename(request),
        traceId: req.trace_id,
      });
      return res.json(toFileResponse(letter));
    } catch (error) {
      return next(error);
    }
  });

  /**
   * POST /lembar-persetujuan
   * Internship approval sheet, dated today.
   */
  router.post('/lembar-persetujuan', async (req, res, next) => {
    try {
      const request = parseBody(lembarPersetujuanRequestSchema, req.body, req.trace_id);
      const now = new Date();
      const letter = await renderer.generate(fromLembarPersetujuan(request, now), {
        filename: lembarPersetujuanFilename(request, now),
        traceId: req.trace_id,
      });
      return res.json(toFileResponse(letter));
    } catch (error) {
      return next(error);
    }
  });

  /**
   * POST /generate
   * Official letters; answers with an opaque document id for download/preview.
   */
  router.post('/generate', async (req, res, next) => {
    try {
      const request = parseBody(generateLetterRequestSchema, req.body, req.trace_id);
      const letter = await renderer.generate(fromGenerateRequest(request), {
        filename: generatedLetterFilename(request),
        traceId: req.trace_id,
      });
      const docId = registry.register({ filePath: letter.filePath, filename: letter.filename });

      return res.json({
        success: true,
        message: 'PDF generated successfully',
        data: {
          doc_id: docId,
          download_url: downloadUrl(docId),
          filename: letter.filename,
        },
      });
    } catch (error) {
      return next(error);
    }
  });

  /**
   * POST /render
   * Any supported template from a canonical letter request.
   */
  router.post('/render', async (req, res, next) => {
    try {
      const { filename, ...letterRequest } = parseBody(renderLetterRequestSchema, req.body, req.trace_id);
      const letter = await renderer.generate(fromRenderRequest(letterRequest), {
        filename,
        traceId: req.trace_id,
      });
      return res.json(toFileResponse(letter));
    } catch (error) {
      return next(error);
    }
  });

  const sendDocument =
    (disposition: 'attachment' | 'inline') => async (req: Request, res: Response, next: NextFunction) => {
      try {
        const document = await resolveDocumentRef(req.params.ref, registry, renderer.outputDir, req.trace_id);
        const buffer = await readDocument(document.filePath, req.params.ref, req.trace_id);

        res.set({
          'Content-Type': 'application/pdf',
          'Content-Disposition': contentDisposition(disposition, document.filename),
          'Content-Length': String(buffer.length),
        });

        return res.end(buffer);
      } catch (error) {
        return next(error);
      }
    };

  /**
   * GET /download/:ref
   * `ref` is a document id from /generate or a filename from the other routes.
   */
  router.get('/download/:ref', sendDocument('attachment'));

  /**
   * GET /preview/:ref
   */
  router.get('/preview/:ref', sendDocument('inline'));

  return router;
}
