import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { configureLogger, formatLogEntry, getLogDirectory, getLogFilePath, logger, logSession } from './logger';

describe('logger', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'rawterm-logger-test-'));
  });

  afterEach(() => {
    configureLogger({ directory: null });
    rmSync(testDir, { recursive: true, force: true });
  });

  describe('formatLogEntry', () => {
    it('should format level, message and data on one line', () => {
      const line = formatLogEntry({
        timestamp: '2026-01-02T03:04:05.000Z',
        level: 'warn',
        message: 'Session already initialized',
        data: { rows: 24 },
      });
      expect(line).toBe('[2026-01-02T03:04:05.000Z] [WARN] Session already initialized {"rows":24}\n');
    });

    it('should omit missing data', () => {
      const line = formatLogEntry({ timestamp: 't', level: 'info', message: 'Session teardown' });
      expect(line).toBe('[t] [INFO] Session teardown\n');
    });
  });

  describe('getLogFilePath', () => {
    it('should name the file after the day and create the directory', () => {
      const dir = join(testDir, 'nested', 'logs');
      const path = getLogFilePath(dir, new Date('2026-03-04T12:00:00Z'));

      expect(path).toBe(join(dir, 'rawterm-2026-03-04.log'));
      expect(existsSync(dir)).toBe(true);
    });
  });

  describe('writing', () => {
    it('should write nothing until a directory is configured', () => {
      const dir = join(testDir, 'unused');
      logger.info('ignored');

      expect(getLogDirectory()).toBeNull();
      expect(existsSync(dir)).toBe(false);
    });

    it('should append entries to the daily file', () => {
      configureLogger({ directory: testDir });

      logger.info('hello', { a: 1 });
      logSession('teardown');

      const content = readFileSync(getLogFilePath(testDir), 'utf-8');
      const lines = content.trimEnd().split('\n');
      expect(lines).toHaveLength(2);
      expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[INFO\] hello \{"a":1\}$/);
      expect(lines[1]).toMatch(/\] \[INFO\] Session teardown$/);
    });

    it('should swallow write failures', () => {
      const blocker = join(testDir, 'file');
      writeFileSync(blocker, 'not a directory');
      // Directory creation fails because a path segment is a file
      configureLogger({ directory: join(blocker, 'logs') });

      expect(() => logger.error('cannot write')).not.toThrow();
    });
  });
});
