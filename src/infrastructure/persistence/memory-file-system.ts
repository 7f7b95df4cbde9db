import { dirname } from 'node:path';
import type { DirEntry, IFileSystem } from '@domain/ports/file-system.js';
import { IoFailure, type IoOperation } from '@shared/lib/errors.js';

/**
 * In-memory implementation of IFileSystem for use in unit tests.
 *
 * Files are byte arrays keyed by path; directories are tracked explicitly and
 * created for every ancestor on write. `failOn()` makes a given operation on a
 * given path throw IoFailure, to exercise error paths.
 *
 * Example:
 * ```ts
 * const fs = new MemoryFileSystem();
 * fs.writeText('/log/2024/01/05-0.txt', text);
 * fs.failOn('write', '/log/2024/01/06-0.txt');
 * ```
 */
export class MemoryFileSystem implements IFileSystem {
  private readonly files = new Map<string, Uint8Array>();
  private readonly dirs = new Set<string>();
  private readonly faults = new Set<string>();

  exists(path: string): boolean {
    return this.files.has(path) || this.dirs.has(path);
  }

  readText(path: string): string {
    return new TextDecoder().decode(this.readBytes(path));
  }

  writeText(path: string, text: string): void {
    this.writeBytes(path, new TextEncoder().encode(text));
  }

  readBytes(path: string): Uint8Array {
    this.check('read', path);
    const bytes = this.files.get(path);
    if (bytes === undefined) {
      throw new IoFailure('read', path, new Error('no such file'));
    }
    return bytes.slice();
  }

  writeBytes(path: string, bytes: Uint8Array): void {
    this.check('write', path);
    this.addAncestors(path);
    this.files.set(path, bytes.slice());
  }

  remove(path: string): void {
    this.check('delete', path);
    this.files.delete(path);
  }

  listDir(path: string): DirEntry[] {
    this.check('list', path);
    const entries: DirEntry[] = [];
    for (const dir of this.dirs) {
      if (dir !== path && dirname(dir) === path) entries.push({ name: dir.slice(path.length + 1), isDirectory: true });
    }
    for (const file of this.files.keys()) {
      if (dirname(file) === path) entries.push({ name: file.slice(path.length + 1), isDirectory: false });
    }
    return entries.sort((a, b) => a.name.localeCompare(b.name));
  }

  removeEmptyDir(path: string): boolean {
    if (!this.dirs.has(path) || this.listDir(path).length > 0) return false;
    this.check('delete', path);
    this.dirs.delete(path);
    return true;
  }

  /** Create a directory (and its ancestors) without any file in it. */
  mkdir(path: string): void {
    this.dirs.add(path);
    this.addAncestors(path);
  }

  /** All file paths, sorted. */
  paths(): string[] {
    return [...this.files.keys()].sort();
  }

  failOn(operation: IoOperation, path: string): void {
    this.faults.add(`${operation}:${path}`);
  }

  clearFailures(): void {
    this.faults.clear();
  }

  private check(operation: IoOperation, path: string): void {
    if (this.faults.has(`${operation}:${path}`)) {
      throw new IoFailure(operation, path, new Error('injected failure'));
    }
  }

  private addAncestors(path: string): void {
    let dir = dirname(path);
    while (dir !== path && !this.dirs.has(dir)) {
      this.dirs.add(dir);
      path = dir;
      dir = dirname(dir);
    }
  }
}
