// src/services/cleanup/PdfCleanupService.ts
import path from 'path';
import { promises as fs } from 'fs';
import type { Dirent } from 'fs';
import logger from '../../utils/logging';
import { isMissingEntry } from '../../utils/fsErrors';

export const DEFAULT_CLEANUP_INTERVAL_SECONDS = 300;
export const DEFAULT_PDF_EXPIRY_MINUTES = 15;
export const DEFAULT_STOP_GRACE_MS = 5000;

export interface PdfCleanupOptions {
  outputDir: string;
  expiryMinutes?: number;
}

export interface CleanupRun {
  startedAt: Date;
  /** Settles when the loop exits; never rejects */
  done: Promise<void>;
}

/**
 * Background sweeper for generated PDFs.
 * One sweep immediately on start, then one per interval until stopped.
 */
export class PdfCleanupService {
  readonly outputDir: string;
  readonly expiryMs: number;

  private controller: AbortController | null = null;
  private run: CleanupRun | null = null;

  constructor(options: PdfCleanupOptions) {
    this.outputDir = path.resolve(options.outputDir);
    this.expiryMs = (options.expiryMinutes ?? DEFAULT_PDF_EXPIRY_MINUTES) * 60 * 1000;
  }

  get isRunning(): boolean {
    return this.run !== null;
  }

  /**
   * Delete every *.pdf in the output directory older than the expiry.
   * Returns the number of files removed.
   */
  async sweep(signal?: AbortSignal): Promise<number> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(this.outputDir, { withFileTypes: true });
    } catch (error) {
      if (isMissingEntry(error)) {
        logger.debug('Output directory does not exist yet, nothing to sweep', {
          output_dir: this.outputDir,
        });
        return 0;
      }
      throw error;
    }

    const now = Date.now();
    let removed = 0;

    for (const entry of entries) {
      if (signal?.aborted) {
        break;
      }
      if (!entry.isFile() || !entry.name.endsWith('.pdf')) {
        continue;
      }

      const filePath = path.join(this.outputDir, entry.name);
      try {
        const stats = await fs.stat(filePath);
        const ageMs = now - stats.mtimeMs;
        if (ageMs <= this.expiryMs) {
          continue;
        }

        await fs.unlink(filePath);
        removed++;
        logger.cleanup('Expired PDF removed', {
          filename: entry.name,
          age_minutes: Math.round(ageMs / 60000),
        });
      } catch (error) {
        logger.warn('Could not remove PDF, skipping', {
          operation: 'FILE_CLEANUP',
          filename: entry.name,
          error: (error as Error).message,
        });
      }
    }

    if (removed > 0) {
      logger.performance('FILE_CLEANUP', now, {
        removed_count: removed,
        scanned_count: entries.length,
      });
    }

    return removed;
  }

  /**
   * Start the recurring sweep. Calling start on a running service returns
   * the existing run.
   */
  start(intervalSeconds: number = DEFAULT_CLEANUP_INTERVAL_SECONDS): CleanupRun {
    if (this.run) {
      logger.warn('PDF cleanup already running', { operation: 'FILE_CLEANUP' });
      return this.run;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.run = {
      startedAt: new Date(),
      done: this.loop(intervalSeconds * 1000, controller),
    };

    logger.cleanup('PDF cleanup started', {
      output_dir: this.outputDir,
      interval_seconds: intervalSeconds,
      expiry_minutes: this.expiryMs / 60000,
    });

    return this.run;
  }

  /**
   * Signal the loop and wait up to `graceMs` for it to exit. A loop that
   * does not exit in time is abandoned; the service is idle either way.
   */
  async stop(graceMs: number = DEFAULT_STOP_GRACE_MS): Promise<void> {
    const controller = this.controller;
    const run = this.run;
    if (!controller || !run) {
      return;
    }

    controller.abort();

    let timer: NodeJS.Timeout | undefined;
    const graceExpired = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(true), graceMs);
    });
    const timedOut = await Promise.race([run.done.then(() => false), graceExpired]);
    clearTimeout(timer);

    if (timedOut) {
      logger.warn('PDF cleanup did not stop within the grace period, abandoning it', {
        operation: 'FILE_CLEANUP',
        grace_ms: graceMs,
      });
    }

    if (this.controller === controller) {
      this.controller = null;
      this.run = null;
    }
  }

  private async loop(intervalMs: number, controller: AbortController): Promise<void> {
    const { signal } = controller;

    try {
      while (!signal.aborted) {
        try {
          await this.sweep(signal);
        } catch (error) {
          logger.error('PDF cleanup sweep failed', {
            operation: 'FILE_CLEANUP',
            error: (error as Error).message,
          });
        }
        await waitOrAbort(intervalMs, signal);
      }
    } finally {
      if (this.controller === controller) {
        this.controller = null;
        this.run = null;
      }
      logger.cleanup('PDF cleanup stopped');
    }
  }
}

/**
 * Resolves after `ms`, or as soon as the signal aborts
 */
function waitOrAbort(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal.addEventListener('abort', onAbort, { once: true });
  });
}
