import * as fs from 'fs/promises';
import * as path from 'path';
import { ChangeWriteError, OutputDirectoryError } from '../errors';
import { createLogger } from '../logger/logger';
import { runWithConcurrency } from '../utils/promise_pool';
import type { ChangeEntry, ChangeSet, FileWriter, WriteChangesOptions } from './change_writer.types';

/** Writes in flight at once */
export const WRITE_CONCURRENCY = 2;

const defaultWriteFile: FileWriter = (filePath, content) => fs.writeFile(filePath, content, 'utf-8');

type PlannedWrite = {
  entry: ChangeEntry;
  target: string;
};

/**
 * Final path segment of a generated path.
 * @returns undefined for paths without one ("", "/", ".", "..")
 */
export function flattenedFileName(entryPath: string): string | undefined {
  const name = path.basename(entryPath);
  if (name === '' || name === '.' || name === '..') {
    return undefined;
  }
  return name;
}

/**
 * Resolves every entry to its target inside `outputDir`. Entries without a
 * file name are dropped; when two entries flatten to the same name the later
 * one wins.
 */
export function planWrites(changes: ChangeSet, outputDir: string): { writes: PlannedWrite[]; collisions: string[] } {
  const byName = new Map<string, PlannedWrite>();
  const collisions: string[] = [];

  for (const entry of changes) {
    const name = flattenedFileName(entry.path);
    if (name === undefined) {
      continue;
    }
    const previous = byName.get(name);
    if (previous) {
      collisions.push(`${previous.entry.path} -> ${entry.path}`);
      // Re-insert so the surviving entry keeps its own position.
      byName.delete(name);
    }
    byName.set(name, { entry, target: path.join(outputDir, name) });
  }

  return { writes: [...byName.values()], collisions };
}

/**
 * Writes a change set into `outputDir`, flattening every path to its file name.
 *
 * The directory is created first. Files are then written with at most
 * `WRITE_CONCURRENCY` writes in flight. The call resolves with the written
 * paths only if every write succeeded; otherwise it rejects with the first
 * ChangeWriteError once the started writes have settled. Files already
 * written stay on disk.
 *
 * @throws OutputDirectoryError when `outputDir` cannot be created
 * @throws ChangeWriteError when any file cannot be written
 */
export async function writeChanges(
  changes: ChangeSet,
  outputDir: string,
  options: WriteChangesOptions = {},
): Promise<string[]> {
  const logger = options.logger ?? createLogger('[ChangeWriter] ');
  const writeFile = options.writeFile ?? defaultWriteFile;
  const concurrency = options.concurrency ?? WRITE_CONCURRENCY;

  try {
    await fs.mkdir(outputDir, { recursive: true });
  } catch (error) {
    throw new OutputDirectoryError(outputDir, error);
  }

  const { writes, collisions } = planWrites(changes, outputDir);
  for (const collision of collisions) {
    logger.warn(`Overwriting flattened file name: ${collision}`);
  }

  await runWithConcurrency(writes, concurrency, async ({ entry, target }) => {
    try {
      await writeFile(target, entry.content);
    } catch (error) {
      throw new ChangeWriteError(target, entry.path, error);
    }
    logger.debug(`Wrote ${target}`);
  });

  logger.info(`Wrote ${writes.length} file(s) to ${outputDir}`);
  return writes.map(({ target }) => target);
}
