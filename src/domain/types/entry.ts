import { z } from 'zod/v4';
import { IsoDateSchema } from '@shared/lib/dates.js';

// ── Media ────────────────────────────────────────────────────────────────────

export const MediaItemSchema = z.object({
  /** Bare file name inside the entry's media directory */
  filename: z.string().min(1),
  /** Free-form rendering hint carried after the filename, e.g. a width */
  options: z.string().nullable(),
});

export type MediaItem = z.infer<typeof MediaItemSchema>;

// ── Entry fields ─────────────────────────────────────────────────────────────

export const EntryFieldsSchema = z.object({
  begin: IsoDateSchema,
  end: IsoDateSchema.nullable(),
  topic: z.string().min(1),
  appendix: z.string().nullable(),
  body: z.string().min(1),
  media: z.array(MediaItemSchema),
  /** Unrecognized headers, kept verbatim in the order they appeared */
  extra: z.record(z.string(), z.string()),
});

export type EntryFields = z.infer<typeof EntryFieldsSchema>;

// ── Lifecycle ────────────────────────────────────────────────────────────────

/**
 * - new: never written, or its old location was just released by a relocation
 * - persisted: on disk at the path its (begin, index) implies
 * - relocating: on disk, but begin was edited since the last save
 * - removed: deletion has been saved; terminal
 */
export const EntryState = z.enum(['new', 'persisted', 'relocating', 'removed']);
export type EntryState = z.infer<typeof EntryState>;

export interface EntryLocation {
  date: string;
  index: number;
}

export interface Placeholders {
  topic: string;
  body: string;
}
