import { join } from 'node:path';
import type { IDirectoryScanner, IFileSystem } from '@domain/ports/file-system.js';
import type { CommitReport, IEntryStore } from '@domain/ports/entry-store.js';
import type { Placeholders } from '@domain/types/entry.js';
import { DEFAULT_PLACEHOLDERS } from '@domain/types/config.js';
import { FormatError, IoFailure, KlogError } from '@shared/lib/errors.js';
import { isIsoDate, toIsoDate } from '@shared/lib/dates.js';
import { logger } from '@shared/lib/logger.js';
import { DateTreeScanner } from './date-tree-scanner.js';
import { LogEntry, type EntryContext } from './log-entry.js';
import { NodeFileSystem } from './node-file-system.js';

export interface EntryStoreOptions {
  /** Directory holding the YYYY/ trees and media/ */
  root: string;
  fs?: IFileSystem;
  scanner?: IDirectoryScanner;
  placeholders?: Placeholders;
}

/**
 * Directory-backed collection of log entries.
 *
 * The whole tree is scanned once at construction and held in memory; the
 * store assumes it is the only writer of `root`. Files that fail to parse
 * are logged and left out rather than failing the scan.
 */
export class EntryStore implements IEntryStore<LogEntry> {
  private entries: LogEntry[] = [];
  private readonly fs: IFileSystem;
  private readonly scanner: IDirectoryScanner;
  private readonly placeholders: Placeholders;
  private readonly ctx: EntryContext;

  constructor(private readonly options: EntryStoreOptions) {
    this.fs = options.fs ?? new NodeFileSystem();
    this.scanner = options.scanner ?? new DateTreeScanner(this.fs);
    this.placeholders = options.placeholders ?? { ...DEFAULT_PLACEHOLDERS };
    this.ctx = {
      root: options.root,
      fs: this.fs,
      log: logger.child({ component: 'entry-store', root: options.root }),
      isClaimed: (path, by) => this.entries.some((e) => e !== by && e.state !== 'removed' && e.sourcePath === path),
    };
    this.rescan();
  }

  get root(): string {
    return this.options.root;
  }

  /** Drop everything held in memory, unsaved changes included, and read the tree again. */
  rescan(): void {
    const loaded: LogEntry[] = [];

    for (const relativePath of this.scanner.scan(this.options.root)) {
      try {
        const text = this.fs.readText(join(this.options.root, relativePath));
        loaded.push(LogEntry.fromFile(this.ctx, relativePath, text));
      } catch (err) {
        if (!(err instanceof FormatError || err instanceof IoFailure)) throw err;
        this.ctx.log.warn(`Skipping entry "${relativePath}": ${err.message}`, { path: relativePath });
      }
    }

    this.entries = loaded;
    this.ctx.log.debug('Scanned entry tree', { count: loaded.length });
  }

  /** Live entries, newest `begin` first; entries sharing a date keep scan/creation order. */
  list(): readonly LogEntry[] {
    return this.entries
      .filter((e) => e.state !== 'removed')
      .sort((a, b) => compareDesc(a.fields.begin, b.fields.begin));
  }

  byDate(date: string): LogEntry[] {
    return this.list().filter((e) => e.fields.begin === date);
  }

  byIndex(ordinal: number): LogEntry | null {
    if (!Number.isInteger(ordinal) || ordinal < 0) return null;
    return this.list()[ordinal] ?? null;
  }

  /**
   * Append a blank entry for `date`. Nothing is written until `commit()`.
   * @throws FormatError when `date` is not a YYYY-MM-DD calendar day
   */
  newEntry(date: string | Date): LogEntry {
    const isoDate = typeof date === 'string' ? date : toIsoDate(date);
    if (!isIsoDate(isoDate)) throw new FormatError('invalid date');

    const entry = LogEntry.blank(this.ctx, isoDate, this.placeholders);
    this.entries.push(entry);
    return entry;
  }

  /**
   * Save every dirty entry in creation order. A failing entry is recorded and
   * skipped; it stays dirty, so a later commit retries it.
   */
  commit(): CommitReport<LogEntry> {
    const report: CommitReport<LogEntry> = { saved: [], removed: [], failures: [] };

    for (const entry of this.entries) {
      if (!entry.isDirty()) continue;
      try {
        const outcome = entry.save();
        (outcome === 'removed' ? report.removed : report.saved).push(entry);
      } catch (err) {
        if (!(err instanceof KlogError)) throw err;
        this.ctx.log.error(`Failed to save ${entry.summaryLine()}: ${err.message}`);
        report.failures.push({ entry, error: err });
      }
    }

    return report;
  }

  // Collaborator-facing aliases

  listEntries(): readonly LogEntry[] {
    return this.list();
  }

  entryByDate(date: string): LogEntry[] {
    return this.byDate(date);
  }

  entryByOrdinal(ordinal: number): LogEntry | null {
    return this.byIndex(ordinal);
  }

  createEntry(date: string | Date): LogEntry {
    return this.newEntry(date);
  }
}

function compareDesc(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? 1 : -1;
}
