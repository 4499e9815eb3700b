/**
 * Path Utilities
 */

import { join, extname, parse } from 'node:path';

/**
 * Get file extension (lowercase, without dot)
 */
export function getExtension(filename: string): string {
  const ext = extname(filename);
  return ext ? ext.slice(1).toLowerCase() : '';
}

/**
 * Build a path next to `filePath` that keeps its stem and swaps the extension,
 * e.g. `/tv/show.mkv` + `.eng` + `ass` -> `/tv/show.eng.ass`
 */
export function siblingPath(filePath: string, suffix: string, extension: string): string {
  const { dir, name } = parse(filePath);
  return join(dir, `${name}${suffix}.${extension}`);
}
