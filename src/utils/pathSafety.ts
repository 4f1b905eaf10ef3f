// src/utils/pathSafety.ts
import fs from 'fs';
import path from 'path';

/**
 * True when `target` lies strictly inside `root`. Both paths should already
 * be canonical (realpath); comparison is by path segments, not by prefix.
 */
export function isWithinDirectory(root: string, target: string): boolean {
  const relative = path.relative(root, target);
  if (relative === '' || path.isAbsolute(relative)) {
    return false;
  }
  return relative.split(path.sep)[0] !== '..';
}

/**
 * Resolve `reference` against `baseDir` and return its real path when it is
 * a regular file inside the real `baseDir`, otherwise undefined.
 */
export function resolveFileWithin(baseDir: string, reference: string): string | undefined {
  try {
    const root = fs.realpathSync(baseDir);
    const candidate = fs.realpathSync(path.resolve(baseDir, reference));
    if (!fs.statSync(candidate).isFile()) {
      return undefined;
    }
    return isWithinDirectory(root, candidate) ? candidate : undefined;
  } catch {
    return undefined;
  }
}
