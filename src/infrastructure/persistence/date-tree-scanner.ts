import type { IDirectoryScanner, IFileSystem } from '@domain/ports/file-system.js';
import { isEntryPath } from '@domain/services/path-scheme.js';
import { join } from 'node:path';

const YEAR_RE = /^\d{4}$/;
const MONTH_RE = /^\d{2}$/;

/**
 * Walks <root>/YYYY/MM/ and reports every `DD-N.txt` record as a relative path.
 * Anything else in the tree (media/, notes, dotfiles) is ignored.
 * Results are sorted, so entries sharing a date come back in index order.
 */
export class DateTreeScanner implements IDirectoryScanner {
  constructor(private readonly fs: IFileSystem) {}

  scan(root: string): string[] {
    const found: string[] = [];

    for (const year of this.fs.listDir(root)) {
      if (!year.isDirectory || !YEAR_RE.test(year.name)) continue;

      for (const month of this.fs.listDir(join(root, year.name))) {
        if (!month.isDirectory || !MONTH_RE.test(month.name)) continue;

        for (const file of this.fs.listDir(join(root, year.name, month.name))) {
          if (file.isDirectory) continue;
          const relative = `${year.name}/${month.name}/${file.name}`;
          if (isEntryPath(relative)) found.push(relative);
        }
      }
    }

    return found.sort(compareEntryPaths);
  }
}

/** Order by date, then numerically by index (so 10 sorts after 9). */
function compareEntryPaths(a: string, b: string): number {
  const [dateA = '', indexA = ''] = a.split('-');
  const [dateB = '', indexB = ''] = b.split('-');
  if (dateA !== dateB) return dateA < dateB ? -1 : 1;
  return Number.parseInt(indexA, 10) - Number.parseInt(indexB, 10);
}
