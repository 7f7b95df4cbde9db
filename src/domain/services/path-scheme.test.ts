import { describe, it, expect } from 'vitest';
import { pathFor, mediaDirFor, mediaPathFor, parseEntryPath, isEntryPath } from './path-scheme.js';

describe('pathFor', () => {
  it('builds the record path from date and index', () => {
    expect(pathFor('2024-01-05', 0)).toBe('2024/01/05-0.txt');
    expect(pathFor('1999-12-31', 12)).toBe('1999/12/31-12.txt');
  });

  it('rejects negative and fractional indexes', () => {
    expect(() => pathFor('2024-01-05', -1)).toThrow('non-negative integer');
    expect(() => pathFor('2024-01-05', 1.5)).toThrow('non-negative integer');
  });
});

describe('mediaDirFor / mediaPathFor', () => {
  it('nests attachments under media/ by day and index', () => {
    expect(mediaDirFor('2024-01-05', 1)).toBe('media/2024/01/05/1/');
    expect(mediaPathFor('2024-01-05', 1, 'photo.jpg')).toBe('media/2024/01/05/1/photo.jpg');
  });
});

describe('parseEntryPath', () => {
  it('inverts pathFor', () => {
    expect(parseEntryPath(pathFor('2024-02-29', 3))).toEqual({ date: '2024-02-29', index: 3 });
  });

  it('throws for paths that are not records', () => {
    expect(() => parseEntryPath('2024/01/05.txt')).toThrow('Not an entry path: "2024/01/05.txt"');
  });
});

describe('isEntryPath', () => {
  it.each([
    ['2024/01/05-0.txt', true],
    ['2024/01/05-10.txt', true],
    ['2024/01/05-01.txt', false],
    ['2024/01/05-a.txt', false],
    ['2024/13/05-0.txt', false],
    ['2023/02/29-0.txt', false],
    ['2024/01/05-0.md', false],
    ['media/2024/01/05/0/photo.jpg', false],
  ])('%s -> %s', (path, expected) => {
    expect(isEntryPath(path)).toBe(expected);
  });
});
