import type { CommitReport, ILogEntry } from '@domain/ports/entry-store.js';
import type { YearGroup } from '@features/entry-listing/year-index.js';
import { formatLongDate } from '@shared/lib/dates.js';

const RULE_WIDTH = 60;

function dateSpan(entry: ILogEntry, locale: string): string {
  const { begin, end } = entry.fields;
  const from = formatLongDate(begin, locale);
  return end !== null && end !== begin ? `${from} – ${formatLongDate(end, locale)}` : from;
}

/**
 * Format the entry listing as one block per year, newest first.
 */
export function formatEntryList(groups: YearGroup[], locale: string): string {
  if (groups.length === 0) {
    return 'No entries found.';
  }

  const width = String(Math.max(...groups.flatMap((g) => g.entries.map((e) => e.ordinal)))).length;
  const lines: string[] = [];

  for (const group of groups) {
    lines.push(group.year);
    for (const { ordinal, entry } of group.entries) {
      const media = entry.fields.media.length;
      const suffix = media > 0 ? `  [${media} media]` : '';
      lines.push(`  ${String(ordinal).padStart(width)}  ${dateSpan(entry, locale)}  ${entry.fields.topic}${suffix}`);
    }
    lines.push('');
  }

  return lines.join('\n').trimEnd();
}

export function formatEntryListJson(groups: YearGroup[]): string {
  return JSON.stringify(
    groups.map((g) => ({
      year: g.year,
      entries: g.entries.map(({ ordinal, entry }) => ({
        ordinal,
        begin: entry.fields.begin,
        end: entry.fields.end,
        topic: entry.fields.topic,
        appendix: entry.fields.appendix,
        media: entry.fields.media.length,
      })),
    })),
    null,
    2,
  );
}

/**
 * Format a single entry: long date heading, then the record text, then the
 * numbered attachments `klog detach` refers to.
 */
export function formatEntryDetail(entry: ILogEntry, locale: string): string {
  const { topic, appendix, media, body } = entry.fields;
  const lines: string[] = [];

  lines.push(dateSpan(entry, locale));
  lines.push(appendix ? `${topic} (${appendix})` : topic);
  lines.push('─'.repeat(RULE_WIDTH));
  lines.push(body);

  if (media.length > 0) {
    lines.push('');
    lines.push('Media:');
    media.forEach((item, i) => {
      lines.push(`  ${i}  ${item.filename}${item.options ? `  (${item.options})` : ''}`);
    });
  }

  return lines.join('\n');
}

export function formatEntryDetailJson(entry: ILogEntry): string {
  return JSON.stringify(
    { ...entry.fields, sequenceIndex: entry.sequenceIndex, sourcePath: entry.sourcePath },
    null,
    2,
  );
}

/**
 * Format the outcome of a commit. Failures carry the message of the error
 * that stopped the entry.
 */
export function formatCommitReport(report: CommitReport, message: string): string {
  const lines: string[] = [];

  if (report.saved.length === 0 && report.removed.length === 0 && report.failures.length === 0) {
    return 'Nothing to save.';
  }

  if (report.failures.length === 0) {
    lines.push(message);
  }
  for (const entry of report.saved) {
    lines.push(`  saved    ${entry.summaryLine()}`);
  }
  for (const entry of report.removed) {
    lines.push(`  removed  ${entry.summaryLine()}`);
  }
  for (const { entry, error } of report.failures) {
    lines.push(`  failed   ${entry.summaryLine()}: ${error.message}`);
  }

  return lines.join('\n');
}

export function formatCommitReportJson(report: CommitReport, message: string): string {
  return JSON.stringify(
    {
      message,
      saved: report.saved.map((e) => ({ summary: e.summaryLine(), path: e.sourcePath })),
      removed: report.removed.map((e) => e.summaryLine()),
      failures: report.failures.map(({ entry, error }) => ({ summary: entry.summaryLine(), error: error.message })),
    },
    null,
    2,
  );
}
