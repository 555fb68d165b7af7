import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  createLogger,
  configureLogging,
  resetLogging,
  isLogLevel,
  META_STRING_MAX_LENGTH,
  type LogEntry,
  type LogSink,
} from './logger.js';

// ---------------------------------------------------------------------------
// Test sink that captures log entries
// ---------------------------------------------------------------------------

function createTestSink(): { sink: LogSink; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const sink: LogSink = (entry: LogEntry) => {
    entries.push(entry);
  };
  return { sink, entries };
}

describe('Logger', () => {
  let entries: LogEntry[];

  beforeEach(() => {
    const test = createTestSink();
    entries = test.entries;
    configureLogging({ level: 'debug', sink: test.sink });
  });

  afterEach(() => {
    resetLogging();
  });

  describe('log entry structure', () => {
    it('emits level, ts, component and msg', () => {
      createLogger('harness').info('started');

      expect(entries).toHaveLength(1);
      expect(entries[0].level).toBe('info');
      expect(entries[0].component).toBe('harness');
      expect(entries[0].msg).toBe('started');
      expect(new Date(entries[0].ts).toISOString()).toBe(entries[0].ts);
    });

    it('omits meta when none is given', () => {
      createLogger('harness').info('started');
      expect(entries[0].meta).toBeUndefined();
    });
  });

  describe('level filtering', () => {
    it('drops entries below the configured level', () => {
      configureLogging({ level: 'warn' });
      const logger = createLogger('suite');

      logger.debug('d');
      logger.info('i');
      logger.warn('w');
      logger.error('e');

      expect(entries.map((e) => e.msg)).toEqual(['w', 'e']);
    });

    it('restores info level on reset', () => {
      resetLogging();
      const test = createTestSink();
      configureLogging({ sink: test.sink });

      createLogger('suite').debug('hidden');
      createLogger('suite').info('shown');

      expect(test.entries.map((e) => e.msg)).toEqual(['shown']);
    });
  });

  describe('context promotion', () => {
    it('promotes bound context to top-level fields', () => {
      const logger = createLogger('suite').withContext({ run: 'run-7', category: 'performance' });
      logger.info('category finished');

      expect(entries[0].run).toBe('run-7');
      expect(entries[0].category).toBe('performance');
      expect(entries[0].method).toBeUndefined();
    });

    it('merges context from nested withContext calls', () => {
      const logger = createLogger('suite')
        .withContext({ run: 'run-7' })
        .withContext({ method: 'GetBudgets' });
      logger.info('probe');

      expect(entries[0].run).toBe('run-7');
      expect(entries[0].method).toBe('GetBudgets');
    });

    it('promotes well-known meta fields and keeps the rest under meta', () => {
      createLogger('suite').info('test finished', {
        duration_ms: 12,
        ok: false,
        status: 'failed',
        method: 'Name',
        detail: 'x',
      });

      expect(entries[0]).toMatchObject({
        duration_ms: 12,
        ok: false,
        status: 'failed',
        method: 'Name',
        meta: { detail: 'x' },
      });
    });

    it('ignores promoted keys with the wrong type', () => {
      createLogger('suite').info('odd', { duration_ms: 'slow' });
      expect(entries[0].duration_ms).toBeUndefined();
      expect(entries[0].meta).toBeUndefined();
    });
  });

  describe('child loggers', () => {
    it('appends the sub-component and keeps bound context', () => {
      const child = createLogger('category').withContext({ run: 'r1' }).child('performance');
      child.warn('slow');

      expect(entries[0].component).toBe('category:performance');
      expect(entries[0].run).toBe('r1');
    });
  });

  describe('sanitization', () => {
    it('drops credential-like keys', () => {
      createLogger('double').info('request', { token: 'test-secret', provider: 'aws' });
      expect(entries[0].meta).toEqual({ provider: 'aws' });
    });

    it('truncates long strings', () => {
      createLogger('double').info('request', { body: 'a'.repeat(META_STRING_MAX_LENGTH + 5) });
      expect(entries[0].meta?.body).toBe('a'.repeat(META_STRING_MAX_LENGTH) + '...[truncated]');
    });

    it('serializes errors to name and message', () => {
      createLogger('suite').error('fault', { err: new TypeError('bad') });
      expect(entries[0].meta).toEqual({ err: { name: 'TypeError', message: 'bad' } });
    });
  });

  describe('isLogLevel', () => {
    it('accepts the four levels only', () => {
      expect(isLogLevel('debug')).toBe(true);
      expect(isLogLevel('error')).toBe(true);
      expect(isLogLevel('trace')).toBe(false);
      expect(isLogLevel(3)).toBe(false);
    });
  });
});
