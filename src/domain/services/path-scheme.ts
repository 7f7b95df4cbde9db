import type { EntryLocation } from '@domain/types/entry.js';
import { isIsoDate, splitIsoDate } from '@shared/lib/dates.js';
import { KLOG_PATHS } from '@shared/constants/paths.js';

/**
 * Relative layout of the entry tree:
 *
 *   YYYY/MM/DD-<index>.txt              record file
 *   media/YYYY/MM/DD/<index>/<file>     attachments
 *
 * Paths use "/" regardless of platform; callers join them onto the root.
 */

const ENTRY_PATH_RE = /^(\d{4})\/(\d{2})\/(\d{2})-(0|[1-9]\d*)\.txt$/;

function assertIndex(index: number): void {
  if (!Number.isInteger(index) || index < 0) {
    throw new Error(`Sequence index must be a non-negative integer, got ${index}`);
  }
}

export function pathFor(date: string, index: number): string {
  assertIndex(index);
  const { year, month, day } = splitIsoDate(date);
  return `${year}/${month}/${day}-${index}${KLOG_PATHS.recordExtension}`;
}

export function mediaDirFor(date: string, index: number): string {
  assertIndex(index);
  const { year, month, day } = splitIsoDate(date);
  return `${KLOG_PATHS.media}/${year}/${month}/${day}/${index}/`;
}

export function mediaPathFor(date: string, index: number, filename: string): string {
  return `${mediaDirFor(date, index)}${filename}`;
}

function matchEntryPath(path: string): EntryLocation | null {
  const match = ENTRY_PATH_RE.exec(path);
  if (!match) return null;
  const [, year, month, day, index] = match;
  const date = `${year}-${month}-${day}`;
  if (!isIsoDate(date)) return null;
  return { date, index: Number(index) };
}

export function isEntryPath(path: string): boolean {
  return matchEntryPath(path) !== null;
}

/**
 * Inverse of `pathFor`. Only ever fed paths from the scanner or `pathFor`,
 * so a mismatch is a bug rather than bad user input.
 */
export function parseEntryPath(path: string): EntryLocation {
  const location = matchEntryPath(path);
  if (!location) {
    throw new Error(`Not an entry path: "${path}"`);
  }
  return location;
}
