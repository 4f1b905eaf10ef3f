import { Request, Response, NextFunction } from 'express';
import { InvalidFilenameError } from '../services/letters/errors';
import { SAFE_FILENAME_PATTERN } from '../utils/filename';

const PROTECTED_PREFIXES = ['/download/', '/preview/'];
const BLOCKED_PATTERNS = ['..', '\\', '/', '~/'];

/**
 * Rejects download/preview references that could leave the output
 * directory, before any route handler or filesystem access runs.
 */
export function validateDownloadPath(req: Request, _res: Response, next: NextFunction) {
  const prefix = PROTECTED_PREFIXES.find((candidate) => req.path.startsWith(candidate));
  if (!prefix) {
    return next();
  }

  const rawRef = req.path.slice(prefix.length);
  let ref: string;
  try {
    ref = decodeURIComponent(rawRef);
  } catch {
    return next(new InvalidFilenameError('Malformed percent-encoding in document reference', req.trace_id));
  }

  const blocked = BLOCKED_PATTERNS.find((pattern) => ref.includes(pattern));
  if (blocked) {
    return next(new InvalidFilenameError(`Blocked pattern '${blocked}' in document reference`, req.trace_id));
  }

  if (!SAFE_FILENAME_PATTERN.test(ref)) {
    return next(new InvalidFilenameError('Document reference contains characters outside the allowed set', req.trace_id));
  }

  next();
}
