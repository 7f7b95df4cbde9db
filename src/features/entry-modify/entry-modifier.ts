import type { CommitReport, IEntryStore, ILogEntry } from '@domain/ports/entry-store.js';
import { parseEntryText } from '@domain/services/text-codec.js';
import { FormatError } from '@shared/lib/errors.js';

export type CommitVerb = 'Added' | 'Modified' | 'Removed';

export function commitMessage(verb: CommitVerb, entry: ILogEntry): string {
  return `${verb} ${entry.summaryLine()}`;
}

export interface ModifyRequest {
  /** Replacement text; omit to only drop attachments */
  text?: string;
  /** Media ordinals to detach; out-of-range ones are ignored */
  removals?: readonly number[];
  /** Keep attachments whose MEDIA line is missing from `text` */
  preserveMedia?: boolean;
}

export type ModifyOutcome<E extends ILogEntry> =
  | { kind: 'unchanged' }
  | { kind: 'committed'; message: string; report: CommitReport<E> };

/**
 * Apply an edit to one entry and commit the store.
 *
 * Detached files are also struck from the text, so a text that still lists
 * them does not read as a direct media addition. A FormatError from the text
 * propagates unchanged, for the caller to show the user, and is raised before
 * anything about the entry changes.
 */
export function modifyEntry<E extends ILogEntry>(
  store: IEntryStore<E>,
  entry: E,
  request: ModifyRequest,
): ModifyOutcome<E> {
  const mediaCount = entry.fields.media.length;
  const removals = [...new Set(request.removals ?? [])]
    .filter((i) => Number.isInteger(i) && i >= 0 && i < mediaCount)
    .sort((a, b) => b - a);

  const textChanged = request.text !== undefined && request.text !== entry.currentText();
  if (!textChanged && removals.length === 0) {
    return { kind: 'unchanged' };
  }

  if (request.text !== undefined) {
    const known = new Set(entry.fields.media.map((m) => m.filename));
    if (parseEntryText(request.text).media.some((m) => !known.has(m.filename))) {
      throw new FormatError('direct adding of media is not supported');
    }
  }

  const detached = removals.map((i) => entry.detachByOrdinal(i)?.filename);
  if (request.text !== undefined) {
    entry.reload(dropMediaLines(request.text, detached), { preserveMedia: request.preserveMedia ?? false });
  }

  const message = commitMessage('Modified', entry);
  return { kind: 'committed', message, report: store.commit() };
}

/** Create an entry from complete record text and commit it. */
export function createEntry<E extends ILogEntry>(
  store: IEntryStore<E>,
  text: string,
): { entry: E; message: string; report: CommitReport<E> } {
  const parsed = parseEntryText(text);
  if (parsed.media.length > 0) {
    // a brand-new entry has no attachments for MEDIA lines to refer to
    throw new FormatError('direct adding of media is not supported');
  }

  const entry = store.newEntry(parsed.begin);
  entry.reload(text);
  return { entry, message: commitMessage('Added', entry), report: store.commit() };
}

export function removeEntry<E extends ILogEntry>(
  store: IEntryStore<E>,
  entry: E,
): { message: string; report: CommitReport<E> } {
  const message = commitMessage('Removed', entry);
  entry.markForRemoval();
  return { message, report: store.commit() };
}

/** Whether saving `entry` failed in this commit. */
export function entryFailed<E extends ILogEntry>(report: CommitReport<E>, entry: E): boolean {
  return report.failures.some((f) => f.entry === entry);
}

/**
 * Message to record a commit under: `message` when `target` made it to disk,
 * otherwise one line per entry the report actually wrote or removed.
 */
export function syncMessage<E extends ILogEntry>(report: CommitReport<E>, target: E, message: string): string {
  if (!entryFailed(report, target)) return message;
  return [
    ...report.saved.map((e) => commitMessage('Modified', e)),
    ...report.removed.map((e) => commitMessage('Removed', e)),
  ].join('\n');
}

function dropMediaLines(text: string, filenames: ReadonlyArray<string | undefined>): string {
  const names = new Set(filenames.filter((f): f is string => f !== undefined));
  if (names.size === 0) return text;
  return text
    .split('\n')
    .filter((line) => {
      if (!line.startsWith('MEDIA: ')) return true;
      const filename = line.slice('MEDIA: '.length).split(', ')[0]?.trimEnd();
      return filename === undefined || !names.has(filename);
    })
    .join('\n');
}
