// src/utils/filename.ts
import path from 'path';
import { InvalidFilenameError, PayloadTooLargeError } from '../services/letters/errors';

/** 10 MiB */
export const MAX_PDF_SIZE = 10 * 1024 * 1024;

export const PDF_EXTENSION = '.pdf';

/**
 * Allowed stem characters: letters and digits of any script, space,
 * underscore, hyphen, dot
 */
export const SAFE_FILENAME_PATTERN = /^[\p{L}\p{N} _.-]+$/u;

const TRAVERSAL_MARKERS = ['..', '/', '\\'];

/**
 * Validate a filename and return it with the required extension.
 *
 * Traversal markers are rejected before anything else is done to the name;
 * nothing is ever stripped to make a name acceptable.
 *
 * @throws InvalidFilenameError
 */
export function sanitizeFilename(rawName: string, extension: string = PDF_EXTENSION): string {
  const marker = TRAVERSAL_MARKERS.find((candidate) => rawName.includes(candidate));
  if (marker) {
    throw new InvalidFilenameError(`Path traversal marker '${marker}' in filename`);
  }

  const baseName = path.basename(rawName);
  const stem = baseName.endsWith(extension) ? baseName.slice(0, -extension.length) : baseName;

  if (stem.length === 0) {
    throw new InvalidFilenameError('Filename cannot be empty');
  }

  if (!SAFE_FILENAME_PATTERN.test(stem)) {
    throw new InvalidFilenameError('Filename contains characters outside the allowed set');
  }

  return `${stem}${extension}`;
}

/**
 * @throws PayloadTooLargeError when the artifact is over MAX_PDF_SIZE
 */
export function checkPdfSize(bytes: Uint8Array, limit: number = MAX_PDF_SIZE): void {
  if (bytes.length > limit) {
    throw new PayloadTooLargeError(bytes.length, limit);
  }
}

/**
 * Turn a person or company name into one component of a generated filename:
 * uppercased, whitespace to underscores, disallowed characters dropped.
 */
export function toFilenameComponent(value: string, fallback: string = 'UNKNOWN'): string {
  const component = value
    .trim()
    .toUpperCase()
    .replace(/\s+/g, '_')
    .replace(/[^\p{L}\p{N}_.-]/gu, '')
    .replace(/\.{2,}/g, '.');

  return component.length > 0 ? component : fallback;
}
