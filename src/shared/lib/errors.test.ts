import { describe, it, expect } from 'vitest';
import {
  KlogError,
  FormatError,
  IoFailure,
  EntryNotFoundError,
  ConfigError,
  SyncError,
  RepositoryNotFoundError,
} from './errors.js';

describe('KlogError', () => {
  it('is the base of every error the package raises', () => {
    for (const err of [
      new FormatError('missing BEGIN'),
      new IoFailure('read', '/log/x', new Error('boom')),
      new EntryNotFoundError(3),
      new ConfigError('/c.json', []),
      new SyncError('git push', 'offline'),
      new RepositoryNotFoundError('/log'),
    ]) {
      expect(err).toBeInstanceOf(KlogError);
      expect(err).toBeInstanceOf(Error);
    }
  });

  it('keeps a cause', () => {
    const cause = new Error('root');
    expect(new KlogError('outer', { cause }).cause).toBe(cause);
  });
});

describe('FormatError', () => {
  it('uses the violated rule as its message', () => {
    const err = new FormatError('invalid date');
    expect(err.name).toBe('FormatError');
    expect(err.message).toBe('invalid date');
    expect(err.rule).toBe('invalid date');
  });
});

describe('IoFailure', () => {
  it('names operation, path and cause', () => {
    const cause = new Error('EACCES');
    const err = new IoFailure('write', '/log/2024/01/05-0.txt', cause);
    expect(err.message).toBe('write failed for /log/2024/01/05-0.txt: EACCES');
    expect(err.operation).toBe('write');
    expect(err.path).toBe('/log/2024/01/05-0.txt');
    expect(err.cause).toBe(cause);
  });
});

describe('EntryNotFoundError', () => {
  it('points at klog list', () => {
    expect(new EntryNotFoundError('7').message).toBe('Entry not found: "7". Run "klog list" to see entry numbers.');
  });
});

describe('ConfigError', () => {
  it('carries path and issues', () => {
    const err = new ConfigError('/c.json', ['bad']);
    expect(err.message).toBe('Invalid configuration in /c.json: ["bad"]');
    expect(err.issues).toEqual(['bad']);
  });
});

describe('SyncError', () => {
  it('names the failing command', () => {
    expect(new SyncError('git push --quiet origin', new Error('rejected')).message).toBe(
      'Repository sync failed at "git push --quiet origin": rejected',
    );
  });
});
