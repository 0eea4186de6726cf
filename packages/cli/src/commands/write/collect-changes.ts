import fg from 'fast-glob';
import { promises as fs } from 'fs';
import * as path from 'path';
import type { ChangeWriter } from '@manifest-pr/core';

export const DEFAULT_MANIFEST_PATTERN = '**/*.yaml';

/**
 * Reads every file under `inputDir` matching `pattern` into a change set.
 * Paths stay relative to `inputDir` and come back sorted.
 */
export async function collectChanges(
  inputDir: string,
  pattern: string = DEFAULT_MANIFEST_PATTERN
): Promise<ChangeWriter.ChangeEntry[]> {
  const relativePaths = await fg(pattern, {
    cwd: inputDir,
    onlyFiles: true,
    dot: false,
  });
  relativePaths.sort();

  return Promise.all(relativePaths.map(async (relativePath) => ({
    path: relativePath,
    content: await fs.readFile(path.join(inputDir, relativePath), 'utf-8'),
  })));
}
