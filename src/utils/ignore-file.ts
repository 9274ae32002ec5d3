/**
 * .pathorderignore support - gitignore-style patterns for excluding files.
 */

import ignore, { type Ignore } from 'ignore';
import { join } from 'node:path';
import { fileExists, readFile } from './file-system.js';

export const IGNORE_FILENAME = '.pathorderignore';

/**
 * Patterns written by `pathorder init`.
 */
export const DEFAULT_IGNORE_PATTERNS = [
  'build/',
  'target/',
  'out/',
  '.gradle/',
  'node_modules/',
];

/**
 * Filter built from ignore patterns.
 */
export interface IgnoreFilter {
  /**
   * Check if a file path should be ignored.
   * @param filePath - Relative path from project root
   */
  ignores(filePath: string): boolean;

  /**
   * Filter an array of file paths, returning only non-ignored ones.
   */
  filter(filePaths: string[]): string[];

  patterns(): string[];
}

/**
 * Load .pathorderignore from the project root.
 * Returns an empty filter when the file does not exist.
 */
export async function loadIgnoreFile(projectRoot: string): Promise<IgnoreFilter> {
  const ignorePath = join(projectRoot, IGNORE_FILENAME);
  if (!(await fileExists(ignorePath))) {
    return createIgnoreFilter([]);
  }
  return createIgnoreFilter(parseIgnoreFile(await readFile(ignorePath)));
}

/**
 * Create a filter from patterns.
 */
export function createIgnoreFilter(patterns: string[]): IgnoreFilter {
  const ig: Ignore = ignore().add(patterns);

  return {
    ignores(filePath: string): boolean {
      const normalizedPath = filePath.replace(/\\/g, '/');
      // `ignore` rejects paths that leave the project root
      if (normalizedPath.startsWith('../') || normalizedPath === '' || normalizedPath.startsWith('/')) {
        return false;
      }
      return ig.ignores(normalizedPath);
    },

    filter(filePaths: string[]): string[] {
      return filePaths.filter(fp => !this.ignores(fp));
    },

    patterns(): string[] {
      return [...patterns];
    },
  };
}

/**
 * Parse ignore file content.
 * Follows gitignore syntax: `#` comments, blank lines skipped, `!` negates.
 */
export function parseIgnoreFile(content: string): string[] {
  return content
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'));
}
