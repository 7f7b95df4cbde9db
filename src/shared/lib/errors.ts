export class KlogError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'KlogError';
  }
}

/**
 * Entry text that is malformed or incomplete. The message is the violated rule
 * itself ("missing BEGIN", "invalid date", ...) so callers can show it verbatim.
 */
export class FormatError extends KlogError {
  constructor(public readonly rule: string) {
    super(rule);
    this.name = 'FormatError';
  }
}

export type IoOperation = 'read' | 'write' | 'delete' | 'list' | 'mkdir';

/** A filesystem call failed. Entries that hit this stay dirty so a later commit retries them. */
export class IoFailure extends KlogError {
  constructor(
    public readonly operation: IoOperation,
    public readonly path: string,
    cause?: unknown,
  ) {
    super(`${operation} failed for ${path}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'IoFailure';
  }
}

export class EntryNotFoundError extends KlogError {
  constructor(ordinal: number | string) {
    super(`Entry not found: "${ordinal}". Run "klog list" to see entry numbers.`);
    this.name = 'EntryNotFoundError';
  }
}

export class ConfigError extends KlogError {
  constructor(
    public readonly path: string,
    public readonly issues: unknown[],
  ) {
    super(`Invalid configuration in ${path}: ${JSON.stringify(issues)}`);
    this.name = 'ConfigError';
  }
}

export class SyncError extends KlogError {
  constructor(command: string, cause?: unknown) {
    super(`Repository sync failed at "${command}": ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'SyncError';
  }
}

export class RepositoryNotFoundError extends KlogError {
  constructor(path: string) {
    super(`No log repository at ${path}. Create the directory or pass --repo <path>.`);
    this.name = 'RepositoryNotFoundError';
  }
}
