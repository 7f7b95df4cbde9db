import { z } from 'zod/v4';

export const DEFAULT_PLACEHOLDERS = {
  topic: 'Untitled',
  body: 'What happened?',
} as const;

export const KlogConfigSchema = z.object({
  /** Root of the entry tree. `~` is expanded. */
  repo: z.string().min(1).default('~/klog'),
  /** BCP 47 locale for human-readable dates */
  locale: z.string().min(1).default('de-DE'),
  /** Text a freshly created entry starts out with */
  placeholders: z.object({
    topic: z.string().min(1).default(DEFAULT_PLACEHOLDERS.topic),
    body: z.string().min(1).default(DEFAULT_PLACEHOLDERS.body),
  }).default(() => ({ ...DEFAULT_PLACEHOLDERS })),
  /** Version-control sync run after every successful commit */
  sync: z.object({
    enabled: z.boolean().default(false),
    push: z.boolean().default(false),
    remote: z.string().min(1).default('origin'),
  }).default(() => ({ enabled: false, push: false, remote: 'origin' })),
  /**
   * File rewritten with the current timestamp after every commit that changed
   * something. Downstream tooling (e.g. a wiki export) can watch it.
   */
  updateTrigger: z.string().min(1).optional(),
});

export type KlogConfig = z.infer<typeof KlogConfigSchema>;
