export type { EntryFields, EntryLocation, EntryState, MediaItem, Placeholders } from './domain/types/entry.js';
export type { KlogConfig } from './domain/types/config.js';
export type { CommitReport, CommitFailure, IEntryStore, ILogEntry, ReloadOptions } from './domain/ports/entry-store.js';
export type { DirEntry, IDirectoryScanner, IFileSystem } from './domain/ports/file-system.js';
export type { IRepositorySync } from './domain/ports/repository-sync.js';

export {
  normalizeEntryText,
  parseEntryText,
  serializeEntry,
  renderTemplate,
} from './domain/services/text-codec.js';
export { pathFor, mediaDirFor, mediaPathFor, parseEntryPath, isEntryPath } from './domain/services/path-scheme.js';
export { MediaSet, diffMedia } from './domain/services/media-set.js';

export { EntryStore, type EntryStoreOptions } from './infrastructure/persistence/entry-store.js';
export { LogEntry } from './infrastructure/persistence/log-entry.js';
export { NodeFileSystem } from './infrastructure/persistence/node-file-system.js';
export { MemoryFileSystem } from './infrastructure/persistence/memory-file-system.js';
export { DateTreeScanner } from './infrastructure/persistence/date-tree-scanner.js';
export { loadConfig, resolveConfigPath, type ConfigSources, type LoadedConfig } from './infrastructure/config/config-loader.js';
export { GitSync, type GitRunner, type GitSyncOptions } from './infrastructure/sync/git-sync.js';
export { touchUpdateTrigger } from './infrastructure/sync/update-trigger.js';

export { composeEntryText, type EntryForm } from './features/entry-form/entry-form.js';
export { groupByYear, type YearGroup, type ListedEntry } from './features/entry-listing/year-index.js';
export {
  createEntry,
  modifyEntry,
  removeEntry,
  commitMessage,
  entryFailed,
  syncMessage,
  type ModifyRequest,
  type ModifyOutcome,
} from './features/entry-modify/entry-modifier.js';

export {
  KlogError,
  FormatError,
  IoFailure,
  EntryNotFoundError,
  ConfigError,
  SyncError,
  RepositoryNotFoundError,
} from './shared/lib/errors.js';
export { logger, setLoggerOptions, type Logger, type LoggerOptions } from './shared/lib/logger.js';
