export { WriteCommand } from './write-command';
export { collectChanges, DEFAULT_MANIFEST_PATTERN } from './collect-changes';
