import { z } from 'zod/v4';

/** Machine date format used in headers and paths. */
export const IsoDateSchema = z.iso.date();

export type IsoDate = z.infer<typeof IsoDateSchema>;

export function isIsoDate(value: string): value is IsoDate {
  return IsoDateSchema.safeParse(value).success;
}

/** Calendar date of a JS Date in local time, as YYYY-MM-DD. */
export function toIsoDate(date: Date): IsoDate {
  const y = String(date.getFullYear()).padStart(4, '0');
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

export function splitIsoDate(date: IsoDate): { year: string; month: string; day: string } {
  const [year = '', month = '', day = ''] = date.split('-');
  return { year, month, day };
}

/**
 * Long human-readable form, e.g. "Freitag, 5. Januar 2024" for de-DE.
 * Formatted in UTC so the calendar day never shifts with the host timezone.
 */
export function formatLongDate(date: IsoDate, locale: string): string {
  const { year, month, day } = splitIsoDate(date);
  const instant = Date.UTC(Number(year), Number(month) - 1, Number(day));
  return new Intl.DateTimeFormat(locale, {
    weekday: 'long',
    day: 'numeric',
    month: 'long',
    year: 'numeric',
    timeZone: 'UTC',
  }).format(instant);
}
