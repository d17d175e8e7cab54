/**
 * Expands the file patterns given on the command line and reads the matches.
 *
 * Matches are taken pattern by pattern, sorted within a pattern, and each path
 * is read once even when several patterns select it.
 */

import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { glob } from 'glob';

export interface SourceFile {
  path: string;
  content: string;
}

export interface CollectedFiles {
  files: SourceFile[];
  /** Patterns that selected no file at all. */
  unmatched: string[];
}

export async function collectFiles(
  patterns: readonly string[],
  { cwd = process.cwd() }: { cwd?: string } = {},
): Promise<CollectedFiles> {
  const seen = new Set<string>();
  const files: SourceFile[] = [];
  const unmatched: string[] = [];

  for (const pattern of patterns) {
    const matches = (await glob(pattern, { cwd, nodir: true })).sort();
    if (matches.length === 0) {
      unmatched.push(pattern);
      continue;
    }

    for (const match of matches) {
      if (seen.has(match)) {
        continue;
      }
      seen.add(match);
      files.push({ path: match, content: await readFile(path.resolve(cwd, match), 'utf8') });
    }
  }

  return { files, unmatched };
}
