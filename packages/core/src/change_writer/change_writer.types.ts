import type { Logger } from '../logger/logger';

/**
 * One generated file: a path (only its last segment is used on disk) and
 * the text to write.
 */
export type ChangeEntry = {
  readonly path: string;
  readonly content: string;
};

export type ChangeSet = readonly ChangeEntry[];

/**
 * Writes the full content of one file, creating or truncating it
 */
export type FileWriter = (filePath: string, content: string) => Promise<void>;

export type WriteChangesOptions = {
  /** Maximum simultaneous writes (default: WRITE_CONCURRENCY) */
  concurrency?: number;
  logger?: Logger;
  /** Defaults to fs.writeFile with utf-8 encoding */
  writeFile?: FileWriter;
};
