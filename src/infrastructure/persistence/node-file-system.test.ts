import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { NodeFileSystem } from './node-file-system.js';
import { EntryStore } from './entry-store.js';
import { IoFailure } from '@shared/lib/errors.js';

let tempDir: string;
const fs = new NodeFileSystem();

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), 'klog-fs-test-'));
});

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

describe('NodeFileSystem', () => {
  it('creates parent directories on write', () => {
    const path = join(tempDir, 'a', 'b', 'c.txt');
    fs.writeText(path, 'hello');

    expect(readFileSync(path, 'utf-8')).toBe('hello');
    expect(fs.readText(path)).toBe('hello');
  });

  it('round-trips bytes', () => {
    const path = join(tempDir, 'bin');
    fs.writeBytes(path, new Uint8Array([0, 255, 7]));
    expect(fs.readBytes(path)).toEqual(new Uint8Array([0, 255, 7]));
  });

  it('wraps a failed read in IoFailure naming the path', () => {
    const path = join(tempDir, 'missing.txt');
    try {
      fs.readText(path);
      expect.unreachable('readText should throw');
    } catch (err) {
      expect(err).toBeInstanceOf(IoFailure);
      if (err instanceof IoFailure) {
        expect(err.operation).toBe('read');
        expect(err.path).toBe(path);
      }
    }
  });

  it('tolerates removing a missing file', () => {
    expect(() => fs.remove(join(tempDir, 'nope'))).not.toThrow();
  });

  it('lists a missing directory as empty', () => {
    expect(fs.listDir(join(tempDir, 'nope'))).toEqual([]);
  });

  it('removes a directory only when it is empty', () => {
    const dir = join(tempDir, 'd');
    mkdirSync(dir);
    writeFileSync(join(dir, 'f'), 'x');

    expect(fs.removeEmptyDir(dir)).toBe(false);
    fs.remove(join(dir, 'f'));
    expect(fs.removeEmptyDir(dir)).toBe(true);
    expect(existsSync(dir)).toBe(false);
  });
});

describe('EntryStore on disk', () => {
  it('creates, relocates and removes an entry with an attachment', () => {
    const store = new EntryStore({ root: tempDir });
    const entry = store.newEntry('2024-01-05');
    entry.reload('BEGIN: 2024-01-05\nTOPIC: Disk\n\nOn disk.\n');
    entry.attach('note.txt', new TextEncoder().encode('attached'));
    store.commit();

    expect(readFileSync(join(tempDir, '2024', '01', '05-0.txt'), 'utf-8')).toBe(
      'BEGIN: 2024-01-05\nEND: None\nTOPIC: Disk\nAPPENDIX: None\nMEDIA: note.txt\n\nOn disk.\n',
    );

    const reopened = new EntryStore({ root: tempDir });
    const loaded = reopened.byIndex(0);
    loaded?.reload('BEGIN: 2024-02-01\nTOPIC: Disk\nMEDIA: note.txt\n\nOn disk.\n');
    reopened.commit();

    expect(existsSync(join(tempDir, '2024', '01', '05-0.txt'))).toBe(false);
    expect(existsSync(join(tempDir, 'media', '2024', '01'))).toBe(false);
    expect(readFileSync(join(tempDir, 'media', '2024', '02', '01', '0', 'note.txt'), 'utf-8')).toBe('attached');

    loaded?.markForRemoval();
    reopened.commit();

    expect(existsSync(join(tempDir, '2024', '02', '01-0.txt'))).toBe(false);
    expect(existsSync(join(tempDir, 'media', '2024'))).toBe(false);
    expect(existsSync(join(tempDir, 'media'))).toBe(true);
  });
});
