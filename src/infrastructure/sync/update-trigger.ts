import type { IFileSystem } from '@domain/ports/file-system.js';

/**
 * Rewrite the trigger file with the current time. Tooling that renders the
 * log elsewhere polls its modification time to know when to rebuild.
 */
export function touchUpdateTrigger(fs: IFileSystem, path: string, now: Date = new Date()): void {
  fs.writeText(path, `${now.toISOString()}\n`);
}
