import type { EntryFields, EntryState, MediaItem } from '@domain/types/entry.js';
import type { KlogError } from '@shared/lib/errors.js';

export interface ReloadOptions {
  /**
   * Keep attachments whose MEDIA line is absent from the new text instead of
   * scheduling them for deletion. Form-based editors submit text without
   * MEDIA lines and use this.
   */
  preserveMedia?: boolean;
}

/** What collaborators may do with a single entry. */
export interface ILogEntry {
  readonly fields: Readonly<EntryFields>;
  readonly state: EntryState;
  readonly sequenceIndex: number;
  /** Record path relative to the store root; null until first saved */
  readonly sourcePath: string | null;

  currentText(): string;
  reload(text: string, options?: ReloadOptions): void;
  attach(filename: string, bytes: Uint8Array): void;
  detachByOrdinal(ordinal: number): MediaItem | null;
  markForRemoval(): void;
  isDirty(): boolean;
  summaryLine(): string;
}

export interface CommitFailure<E extends ILogEntry = ILogEntry> {
  entry: E;
  error: KlogError;
}

export interface CommitReport<E extends ILogEntry = ILogEntry> {
  /** Entries written (created, modified or relocated) */
  saved: E[];
  /** Entries whose files were deleted */
  removed: E[];
  failures: CommitFailure<E>[];
}

/**
 * Port interface for the directory-backed entry store.
 * CLI and feature code depend on this rather than the concrete EntryStore.
 */
export interface IEntryStore<E extends ILogEntry = ILogEntry> {
  list(): readonly E[];
  byDate(date: string): E[];
  byIndex(ordinal: number): E | null;
  newEntry(date: string): E;
  commit(): CommitReport<E>;
  rescan(): void;
}
