import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { logger, setLoggerOptions } from './logger.js';

describe('logger', () => {
  let stderrSpy: MockInstance<typeof process.stderr.write>;

  function lastLine(): string {
    return String(stderrSpy.mock.calls.at(-1)?.[0] ?? '');
  }

  beforeEach(() => {
    stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    setLoggerOptions({});
  });

  afterEach(() => {
    stderrSpy.mockRestore();
    setLoggerOptions({});
  });

  it('writes "[level] message" lines to stderr', () => {
    logger.info('scan finished');
    expect(lastLine()).toBe('[info] scan finished\n');
  });

  it('colors warnings and appends fields as JSON', () => {
    logger.warn('Skipping entry', { path: '2024/01/05-0.txt' });
    expect(lastLine()).toBe('\x1b[33m[warn]\x1b[0m Skipping entry {"path":"2024/01/05-0.txt"}\n');
  });

  it('hides debug output until the level is lowered', () => {
    logger.debug('hidden');
    expect(stderrSpy).not.toHaveBeenCalled();

    setLoggerOptions({ level: 'debug' });
    logger.debug('shown');
    expect(lastLine()).toContain('[debug]');
    expect(lastLine()).toContain('shown');
  });

  it('suppresses info at warn level', () => {
    setLoggerOptions({ level: 'warn' });
    logger.info('quiet');
    expect(stderrSpy).not.toHaveBeenCalled();
  });

  it('emits one JSON object per line in JSON mode', () => {
    setLoggerOptions({ json: true });
    logger.error('save failed', { path: '2024/01/05-0.txt' });

    const record: unknown = JSON.parse(lastLine());
    expect(record).toMatchObject({ level: 'error', message: 'save failed', path: '2024/01/05-0.txt' });
    expect(record).toHaveProperty('timestamp');
  });

  describe('child', () => {
    it('adds its fields to every record, per-call data winning', () => {
      const child = logger.child({ component: 'entry-store', root: '/log' });
      child.info('opened', { root: '/other' });
      expect(lastLine()).toBe('[info] opened {"component":"entry-store","root":"/other"}\n');
    });

    it('follows options set after it was created', () => {
      const child = logger.child({ component: 'git-sync' });
      setLoggerOptions({ level: 'debug' });
      child.debug('late');
      expect(lastLine()).toContain('late');
    });

    it('nests', () => {
      logger.child({ a: 1 }).child({ b: 2 }).info('deep');
      expect(lastLine()).toBe('[info] deep {"a":1,"b":2}\n');
    });
  });
});
