import type { MediaItem } from '@domain/types/entry.js';
import { FormatError } from '@shared/lib/errors.js';
import { assertMediaFilename } from './text-codec.js';

export interface MediaDiff {
  added: string[];
  removed: string[];
}

/** Set difference over filenames; options are not part of an attachment's identity. */
export function diffMedia(previous: readonly MediaItem[], next: readonly MediaItem[]): MediaDiff {
  const before = new Set(previous.map((m) => m.filename));
  const after = new Set(next.map((m) => m.filename));
  return {
    added: [...after].filter((f) => !before.has(f)),
    removed: [...before].filter((f) => !after.has(f)),
  };
}

export interface ReplaceOptions {
  /** Keep items absent from `next` instead of scheduling their deletion */
  preserveMissing?: boolean;
}

/**
 * Attachment list of one entry plus the file operations it owes the disk:
 * bytes to write for new attachments, and names to delete for dropped ones.
 * Both queues are drained by the entry's save.
 */
export class MediaSet {
  private list: MediaItem[];
  private readonly writes = new Map<string, Uint8Array>();
  private readonly deletes = new Set<string>();

  constructor(items: readonly MediaItem[] = []) {
    this.list = items.map((m) => ({ ...m }));
  }

  get items(): readonly MediaItem[] {
    return this.list;
  }

  has(filename: string): boolean {
    return this.list.some((m) => m.filename === filename);
  }

  attach(filename: string, bytes: Uint8Array, options: string | null = null): void {
    assertMediaFilename(filename);
    if (this.has(filename)) throw new FormatError('duplicate media file');
    this.list.push({ filename, options });
    this.writes.set(filename, bytes);
    this.deletes.delete(filename);
  }

  /** Drop the item at `ordinal`; null when there is none. */
  detach(ordinal: number): MediaItem | null {
    const item = this.list[ordinal];
    if (!Number.isInteger(ordinal) || item === undefined) return null;
    this.list.splice(ordinal, 1);
    this.release(item.filename);
    return item;
  }

  /**
   * Adopt the media list of a re-parsed text. Text may drop attachments or
   * change their options, but never introduce new ones: those need bytes,
   * which only `attach` supplies.
   * @throws FormatError before changing anything when `next` adds a filename
   */
  replace(next: readonly MediaItem[], options: ReplaceOptions = {}): MediaDiff {
    const diff = diffMedia(this.list, next);
    if (diff.added.length > 0) {
      throw new FormatError('direct adding of media is not supported');
    }

    const incoming = new Map(next.map((m) => [m.filename, m]));
    if (options.preserveMissing) {
      this.list = this.list.map((m) => ({ ...m, options: incoming.get(m.filename)?.options ?? m.options }));
      return { added: [], removed: [] };
    }

    this.list = next.map((m) => ({ ...m }));
    for (const filename of diff.removed) {
      this.release(filename);
    }
    return diff;
  }

  /** Items whose file is already on disk (not waiting in the write queue). */
  persisted(): MediaItem[] {
    return this.list.filter((m) => !this.writes.has(m.filename));
  }

  /** Queue bytes for an existing item, e.g. one being carried to a new directory. */
  stage(filename: string, bytes: Uint8Array): void {
    if (!this.has(filename)) {
      throw new Error(`Cannot stage "${filename}": not part of this media set`);
    }
    this.writes.set(filename, bytes);
  }

  pendingWrites(): Array<[string, Uint8Array]> {
    return [...this.writes];
  }

  pendingDeletes(): string[] {
    return [...this.deletes];
  }

  hasPendingChanges(): boolean {
    return this.writes.size > 0 || this.deletes.size > 0;
  }

  /** Forget queued deletions, e.g. once the directory they refer to is gone. */
  discardDeletes(): void {
    this.deletes.clear();
  }

  clearPending(): void {
    this.writes.clear();
    this.deletes.clear();
  }

  private release(filename: string): void {
    // never written: nothing on disk to delete
    if (this.writes.delete(filename)) return;
    this.deletes.add(filename);
  }
}
