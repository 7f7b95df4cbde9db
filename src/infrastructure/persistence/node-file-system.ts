import {
  existsSync,
  mkdirSync,
  readFileSync,
  readdirSync,
  rmdirSync,
  rmSync,
  writeFileSync,
} from 'node:fs';
import { dirname } from 'node:path';
import type { DirEntry, IFileSystem } from '@domain/ports/file-system.js';
import { IoFailure, type IoOperation } from '@shared/lib/errors.js';

function attempt<T>(operation: IoOperation, path: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    throw new IoFailure(operation, path, err);
  }
}

function ensureParent(path: string): void {
  const dir = dirname(path);
  if (!existsSync(dir)) {
    attempt('mkdir', dir, () => mkdirSync(dir, { recursive: true }));
  }
}

/**
 * IFileSystem over synchronous `node:fs` calls.
 * Every failure is rethrown as IoFailure tagged with the path involved.
 */
export class NodeFileSystem implements IFileSystem {
  exists(path: string): boolean {
    return existsSync(path);
  }

  readText(path: string): string {
    return attempt('read', path, () => readFileSync(path, 'utf-8'));
  }

  writeText(path: string, text: string): void {
    ensureParent(path);
    attempt('write', path, () => writeFileSync(path, text, 'utf-8'));
  }

  readBytes(path: string): Uint8Array {
    return attempt('read', path, () => new Uint8Array(readFileSync(path)));
  }

  writeBytes(path: string, bytes: Uint8Array): void {
    ensureParent(path);
    attempt('write', path, () => writeFileSync(path, bytes));
  }

  remove(path: string): void {
    attempt('delete', path, () => rmSync(path, { force: true }));
  }

  listDir(path: string): DirEntry[] {
    if (!existsSync(path)) return [];
    return attempt('list', path, () =>
      readdirSync(path, { withFileTypes: true }).map((d) => ({ name: d.name, isDirectory: d.isDirectory() })),
    );
  }

  removeEmptyDir(path: string): boolean {
    if (!existsSync(path)) return false;
    if (this.listDir(path).length > 0) return false;
    attempt('delete', path, () => rmdirSync(path));
    return true;
  }
}
