/**
 * Port interface for the filesystem operations the entry store needs.
 *
 * Paths are absolute (or at least rooted the same way for every call).
 * Implementations report failures as `IoFailure` carrying the offending path.
 *
 * For unit tests that don't need real I/O, use MemoryFileSystem from
 * `@infra/persistence/memory-file-system.js`.
 */
export interface IFileSystem {
  exists(path: string): boolean;
  readText(path: string): string;
  /** Creates missing parent directories. */
  writeText(path: string, text: string): void;
  readBytes(path: string): Uint8Array;
  /** Creates missing parent directories. */
  writeBytes(path: string, bytes: Uint8Array): void;
  /** Deletes a file; a missing file is not an error. */
  remove(path: string): void;
  /** Direct children of a directory; a missing directory lists as empty. */
  listDir(path: string): DirEntry[];
  /** Deletes a directory only if it exists and is empty. Returns whether it did. */
  removeEmptyDir(path: string): boolean;
}

export interface DirEntry {
  name: string;
  isDirectory: boolean;
}

/**
 * Discovery capability: lists the record files under a root, as paths
 * relative to it in `YYYY/MM/DD-N.txt` form.
 */
export interface IDirectoryScanner {
  scan(root: string): string[];
}
