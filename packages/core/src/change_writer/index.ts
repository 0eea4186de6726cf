export { writeChanges, flattenedFileName, planWrites, WRITE_CONCURRENCY } from './change_writer';
export type { ChangeEntry, ChangeSet, FileWriter, WriteChangesOptions } from './change_writer.types';
