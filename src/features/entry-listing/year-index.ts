import type { ILogEntry } from '@domain/ports/entry-store.js';

export interface ListedEntry<E extends ILogEntry = ILogEntry> {
  /** Position in the store's sorted list; what `byIndex` takes */
  ordinal: number;
  entry: E;
}

export interface YearGroup<E extends ILogEntry = ILogEntry> {
  year: string;
  entries: ListedEntry<E>[];
}

/**
 * Group a sorted entry list by the year of `begin`, keeping each entry's
 * ordinal so a listing can refer back to it. Years come out in the order
 * they first appear, i.e. newest first for a store's `list()`.
 */
export function groupByYear<E extends ILogEntry>(entries: readonly E[]): YearGroup<E>[] {
  const groups: YearGroup<E>[] = [];
  const byYear = new Map<string, YearGroup<E>>();

  entries.forEach((entry, ordinal) => {
    const year = entry.fields.begin.slice(0, 4);
    let group = byYear.get(year);
    if (!group) {
      group = { year, entries: [] };
      byYear.set(year, group);
      groups.push(group);
    }
    group.entries.push({ ordinal, entry });
  });

  return groups;
}
