// src/utils/fsErrors.ts

/**
 * True for the error fs raises when a path does not exist
 */
export function isMissingEntry(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
