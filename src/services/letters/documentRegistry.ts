// src/services/letters/documentRegistry.ts
import path from 'path';
import { promises as fs } from 'fs';
import { v4 as uuidv4 } from 'uuid';
import logger from '../../utils/logging';
import { sanitizeFilename } from '../../utils/filename';
import { DocumentNotFoundError } from './errors';

export interface RegisteredDocument {
  filePath: string;
  filename: string;
  createdAt: Date;
}

export interface ResolvedDocument {
  filePath: string;
  filename: string;
}

/**
 * Opaque document ids handed out by POST /letters/generate.
 * Lives for the lifetime of the process only.
 */
export class DocumentRegistry {
  private documents: Map<string, RegisteredDocument> = new Map();

  register(document: { filePath: string; filename: string }): string {
    const id = uuidv4();
    this.documents.set(id, { ...document, createdAt: new Date() });
    return id;
  }

  get(id: string): RegisteredDocument | undefined {
    return this.documents.get(id);
  }

  remove(id: string): boolean {
    return this.documents.delete(id);
  }

  get size(): number {
    return this.documents.size;
  }
}

/**
 * Resolve a download reference: a registered id first, otherwise a filename
 * in the output directory. Both paths re-validate the filename.
 *
 * @throws InvalidFilenameError, DocumentNotFoundError
 */
export async function resolveDocumentRef(
  ref: string,
  registry: DocumentRegistry,
  outputDir: string,
  traceId?: string
): Promise<ResolvedDocument> {
  const root = path.resolve(outputDir);
  const entry = registry.get(ref);

  if (entry) {
    const filename = sanitizeFilename(entry.filename);
    const filePath = path.join(root, filename);

    if (path.resolve(entry.filePath) !== filePath || !(await isFile(filePath))) {
      registry.remove(ref);
      logger.debug('Registered document no longer available', {
        trace_id: traceId,
        doc_id: ref,
        filename,
      });
      throw new DocumentNotFoundError(ref, traceId);
    }

    return { filePath, filename };
  }

  const filename = sanitizeFilename(ref);
  const filePath = path.join(root, filename);

  if (!(await isFile(filePath))) {
    throw new DocumentNotFoundError(ref, traceId);
  }

  return { filePath, filename };
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}
