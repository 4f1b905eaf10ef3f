import { Request, Response, NextFunction } from 'express';
import logger from '../utils/logging';
import {
  DocumentNotFoundError,
  InvalidFilenameError,
  LetterServiceError,
  RequestValidationError,
} from '../services/letters/errors';
import type { ValidationIssue } from '../services/letters/errors';

interface ErrorBody {
  error: {
    code: string;
    message: string;
    user_action?: string;
    trace_id?: string;
    details?: ValidationIssue[];
  };
}

/**
 * Body-parser errors carry an HTTP status and a `type`
 */
function bodyParserFailure(err: unknown): { type: string; status: number } | undefined {
  if (!(err instanceof Error) || !('type' in err) || typeof err.type !== 'string') {
    return undefined;
  }
  const status = 'status' in err && typeof err.status === 'number' ? err.status : 400;
  return { type: err.type, status };
}

export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction) {
  const trace_id = req.trace_id;

  if (res.headersSent) {
    return next(err);
  }

  if (err instanceof LetterServiceError) {
    const logMeta = {
      trace_id,
      error_code: err.code,
      error_details: err.details,
      path: req.originalUrl,
      status_code: err.statusCode,
    };

    if (err instanceof InvalidFilenameError) {
      logger.security('Rejected filename or document reference', logMeta);
    } else if (err instanceof DocumentNotFoundError) {
      logger.debug('Document not found', logMeta);
    } else if (err.statusCode >= 500) {
      logger.error(err.message, logMeta);
    } else {
      logger.warn(err.message, logMeta);
    }

    const body: ErrorBody = {
      error: {
        code: err.code,
        message: err.message,
        user_action: err.userAction,
        trace_id,
      },
    };
    if (err instanceof RequestValidationError) {
      body.error.details = err.issues;
    }

    return res.status(err.statusCode).json(body);
  }

  const parserFailure = bodyParserFailure(err);
  if (parserFailure?.type === 'entity.parse.failed') {
    logger.warn('Malformed JSON body', { trace_id, path: req.originalUrl });
    return res.status(400).json({
      error: { code: 'INVALID_JSON', message: 'Request body is not valid JSON', trace_id },
    });
  }
  if (parserFailure?.type === 'entity.too.large') {
    logger.warn('Request body too large', { trace_id, path: req.originalUrl });
    return res.status(413).json({
      error: { code: 'PAYLOAD_TOO_LARGE', message: 'Request body is too large', trace_id },
    });
  }

  logger.error('Unhandled error', {
    trace_id,
    path: req.originalUrl,
    error: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });

  return res.status(500).json({
    error: { code: 'INTERNAL_ERROR', message: 'Internal server error', trace_id },
  });
}

export function notFoundHandler(req: Request, res: Response) {
  res.status(404).json({
    error: {
      code: 'ROUTE_NOT_FOUND',
      message: `Route ${req.method} ${req.path} not found`,
      trace_id: req.trace_id,
    },
  });
}
