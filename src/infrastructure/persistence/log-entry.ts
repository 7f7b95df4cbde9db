import { join } from 'node:path';
import type { IFileSystem } from '@domain/ports/file-system.js';
import type { ILogEntry, ReloadOptions } from '@domain/ports/entry-store.js';
import type { EntryFields, EntryState, MediaItem, Placeholders } from '@domain/types/entry.js';
import { parseEntryText, serializeEntry } from '@domain/services/text-codec.js';
import { MediaSet } from '@domain/services/media-set.js';
import { mediaDirFor, mediaPathFor, parseEntryPath, pathFor } from '@domain/services/path-scheme.js';
import { KlogError } from '@shared/lib/errors.js';
import type { Logger } from '@shared/lib/logger.js';

/** What an entry needs from the store that owns it. */
export interface EntryContext {
  root: string;
  fs: IFileSystem;
  log: Logger;
  /** True when another live entry of the same store already holds `path`. */
  isClaimed(path: string, by: LogEntry): boolean;
}

type Location =
  | { kind: 'unsaved' }
  | { kind: 'saved'; path: string; date: string }
  | { kind: 'removed' };

type Headers = Omit<EntryFields, 'media'>;

export type SaveOutcome = 'saved' | 'removed';

/**
 * One record of the tree plus everything needed to bring the disk in line
 * with it. Fields change only through `reload()` and the media operations;
 * `save()` turns the accumulated changes into file operations.
 */
export class LogEntry implements ILogEntry {
  private headers: Headers;
  private readonly media: MediaSet;
  private location: Location;
  private index: number;
  private flagged = false;
  private removalPending = false;

  private constructor(
    private readonly ctx: EntryContext,
    fields: EntryFields,
    location: Location,
    index: number,
  ) {
    const { media, ...headers } = fields;
    this.headers = headers;
    this.media = new MediaSet(media);
    this.location = location;
    this.index = index;
  }

  /**
   * Entry for a record already on disk. The sequence index comes from the
   * path, never from the content.
   * @throws FormatError when `text` does not parse
   */
  static fromFile(ctx: EntryContext, relativePath: string, text: string): LogEntry {
    const fields = parseEntryText(text);
    const { date, index } = parseEntryPath(relativePath);
    return new LogEntry(ctx, fields, { kind: 'saved', path: relativePath, date }, index);
  }

  /** Unsaved entry pre-filled from placeholders; its index is assigned on save. */
  static blank(ctx: EntryContext, date: string, placeholders: Placeholders): LogEntry {
    const fields: EntryFields = {
      begin: date,
      end: null,
      topic: placeholders.topic,
      appendix: null,
      body: placeholders.body,
      media: [],
      extra: {},
    };
    const entry = new LogEntry(ctx, fields, { kind: 'unsaved' }, 0);
    // stays dirty even if a failed save has already allocated its location
    entry.flagged = true;
    return entry;
  }

  // ── Read access ────────────────────────────────────────────────────────────

  get fields(): Readonly<EntryFields> {
    return { ...this.headers, extra: { ...this.headers.extra }, media: [...this.media.items] };
  }

  get state(): EntryState {
    switch (this.location.kind) {
      case 'removed':
        return 'removed';
      case 'unsaved':
        return 'new';
      case 'saved':
        return this.location.date === this.headers.begin ? 'persisted' : 'relocating';
    }
  }

  get sequenceIndex(): number {
    return this.index;
  }

  get sourcePath(): string | null {
    return this.location.kind === 'saved' ? this.location.path : null;
  }

  currentText(): string {
    return serializeEntry(this.fields);
  }

  isDirty(): boolean {
    const state = this.state;
    if (state === 'removed') return false;
    return this.flagged || this.removalPending || state !== 'persisted';
  }

  summaryLine(): string {
    const { begin, end, topic } = this.headers;
    const span = end !== null && end !== begin ? `${begin}..${end}` : begin;
    return `${span}: ${topic}`;
  }

  // ── Mutation ───────────────────────────────────────────────────────────────

  /**
   * Replace every field from `text`. All-or-nothing: on FormatError the entry
   * is left as it was.
   */
  reload(text: string, options: ReloadOptions = {}): void {
    this.assertLive();
    const { media, ...headers } = parseEntryText(text);
    this.media.replace(media, { preserveMissing: options.preserveMedia ?? false });
    this.headers = headers;
    this.flagged = true;
  }

  attach(filename: string, bytes: Uint8Array): void {
    this.assertLive();
    this.media.attach(filename, bytes);
    this.flagged = true;
  }

  detachByOrdinal(ordinal: number): MediaItem | null {
    this.assertLive();
    const item = this.media.detach(ordinal);
    if (item) this.flagged = true;
    return item;
  }

  markForRemoval(): void {
    this.assertLive();
    this.removalPending = true;
  }

  // ── Persistence ────────────────────────────────────────────────────────────

  /**
   * Bring the disk in line with this entry.
   * @throws IoFailure from the first failing file operation; the entry stays dirty
   */
  save(): SaveOutcome {
    if (this.location.kind === 'removed') return 'removed';
    if (this.removalPending) return this.saveRemoval();

    if (this.state === 'relocating') this.release();
    if (this.location.kind === 'unsaved') this.allocate();

    const path = this.recordPath();
    this.ctx.fs.writeText(join(this.ctx.root, path), this.currentText());
    this.applyMediaQueues();

    this.flagged = false;
    this.ctx.log.debug('Saved entry', { path, summary: this.summaryLine() });
    return 'saved';
  }

  private saveRemoval(): SaveOutcome {
    if (this.location.kind === 'saved') {
      const { path, date } = this.location;
      const names = [...this.media.items.map((m) => m.filename), ...this.media.pendingDeletes()];
      for (const filename of names) {
        this.ctx.fs.remove(join(this.ctx.root, mediaPathFor(date, this.index, filename)));
      }
      this.pruneMediaDir(date);
      this.ctx.fs.remove(join(this.ctx.root, path));
      this.ctx.log.debug('Removed entry', { path });
    }

    this.media.clearPending();
    this.location = { kind: 'removed' };
    this.flagged = false;
    this.removalPending = false;
    return 'removed';
  }

  /**
   * First half of a relocation: carry attachment bytes in memory, delete the
   * old record and media, and forget the old location so the normal save path
   * allocates a fresh one under the new date.
   */
  private release(): void {
    if (this.location.kind !== 'saved') return;
    const { path, date } = this.location;

    const carried = this.media.persisted().map(
      (m) => [m.filename, this.ctx.fs.readBytes(join(this.ctx.root, mediaPathFor(date, this.index, m.filename)))] as const,
    );
    for (const [filename, bytes] of carried) {
      this.media.stage(filename, bytes);
    }

    const stale = [...this.media.items.map((m) => m.filename), ...this.media.pendingDeletes()];
    for (const filename of stale) {
      this.ctx.fs.remove(join(this.ctx.root, mediaPathFor(date, this.index, filename)));
    }
    this.media.discardDeletes();
    this.pruneMediaDir(date);
    this.ctx.fs.remove(join(this.ctx.root, path));

    this.ctx.log.debug('Released entry for relocation', { from: path, to: this.headers.begin });
    this.location = { kind: 'unsaved' };
    // the old record is gone; a failed write below must leave the entry dirty
    this.flagged = true;
  }

  /** Smallest index whose record path is neither on disk nor held by another entry. */
  private allocate(): void {
    const date = this.headers.begin;
    let index = 0;
    while (this.isTaken(pathFor(date, index))) {
      index++;
    }
    this.index = index;
    this.location = { kind: 'saved', path: pathFor(date, index), date };
  }

  private isTaken(path: string): boolean {
    return this.ctx.fs.exists(join(this.ctx.root, path)) || this.ctx.isClaimed(path, this);
  }

  private recordPath(): string {
    if (this.location.kind !== 'saved') {
      throw new Error('Entry has no location to write to');
    }
    return this.location.path;
  }

  private applyMediaQueues(): void {
    const date = this.headers.begin;
    const deletes = this.media.pendingDeletes();
    for (const filename of deletes) {
      this.ctx.fs.remove(join(this.ctx.root, mediaPathFor(date, this.index, filename)));
    }
    for (const [filename, bytes] of this.media.pendingWrites()) {
      this.ctx.fs.writeBytes(join(this.ctx.root, mediaPathFor(date, this.index, filename)), bytes);
    }
    if (deletes.length > 0) this.pruneMediaDir(date);
    this.media.clearPending();
  }

  /** Remove the entry's media directory and any parents it leaves empty, stopping below media/. */
  private pruneMediaDir(date: string): void {
    const segments = mediaDirFor(date, this.index).split('/').filter(Boolean);
    while (segments.length > 1) {
      if (!this.ctx.fs.removeEmptyDir(join(this.ctx.root, ...segments))) return;
      segments.pop();
    }
  }

  private assertLive(): void {
    if (this.location.kind === 'removed') {
      throw new KlogError(`Entry ${this.summaryLine()} has been removed`);
    }
  }
}
