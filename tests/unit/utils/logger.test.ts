import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import {
  LogLevel,
  createLogger,
  getLogger,
  getLogLevelFromEnv,
  parseLogLevel,
  resetLogger,
} from '../../../src/utils/logger.js';

describe('Logger', () => {
  beforeEach(() => {
    vi.stubEnv('DEBUG', '');
    vi.stubEnv('SPLITKEEPER_DEBUG', '');
    vi.stubEnv('LOG_LEVEL', '');
    vi.stubEnv('SPLITKEEPER_LOG_LEVEL', '');
    resetLogger();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    resetLogger();
  });

  describe('parseLogLevel', () => {
    it('should parse level names case-insensitively', () => {
      expect(parseLogLevel('error')).toBe(LogLevel.ERROR);
      expect(parseLogLevel('WARN')).toBe(LogLevel.WARN);
      expect(parseLogLevel('warning')).toBe(LogLevel.WARN);
      expect(parseLogLevel('Debug')).toBe(LogLevel.DEBUG);
      expect(parseLogLevel('info')).toBe(LogLevel.INFO);
    });

    it('should fall back to INFO for unknown names', () => {
      expect(parseLogLevel('verbose')).toBe(LogLevel.INFO);
    });
  });

  describe('getLogLevelFromEnv', () => {
    it('should default to INFO', () => {
      expect(getLogLevelFromEnv()).toBe(LogLevel.INFO);
    });

    it('should enable DEBUG from DEBUG=1', () => {
      vi.stubEnv('DEBUG', '1');
      expect(getLogLevelFromEnv()).toBe(LogLevel.DEBUG);
    });

    it('should enable DEBUG from SPLITKEEPER_DEBUG=true', () => {
      vi.stubEnv('SPLITKEEPER_DEBUG', 'true');
      expect(getLogLevelFromEnv()).toBe(LogLevel.DEBUG);
    });

    it('should read SPLITKEEPER_LOG_LEVEL', () => {
      vi.stubEnv('SPLITKEEPER_LOG_LEVEL', 'error');
      expect(getLogLevelFromEnv()).toBe(LogLevel.ERROR);
    });
  });

  describe('console logger', () => {
    it('should return the same instance until reset', () => {
      const first = getLogger();
      expect(getLogger()).toBe(first);
      resetLogger();
      expect(getLogger()).not.toBe(first);
    });

    it('should send warnings to console.warn and info to stderr', () => {
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const logger = getLogger();

      logger.warn('Test', 'careful');
      logger.info('Test', 'hello');

      expect(warnSpy).toHaveBeenCalledTimes(1);
      expect(warnSpy.mock.calls[0][0]).toMatch(/^\[.+\] \[WARN\] \[Test\] careful$/);
      expect(errorSpy).toHaveBeenCalledTimes(1);
      expect(errorSpy.mock.calls[0][0]).toMatch(/^\[.+\] \[INFO\] \[Test\] hello$/);
    });

    it('should drop messages above the current level', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const logger = getLogger();

      logger.debug('Test', 'hidden');
      logger.setLevel(LogLevel.DEBUG);
      logger.debug('Test', 'shown');

      expect(logger.getLevel()).toBe(LogLevel.DEBUG);
      expect(errorSpy).toHaveBeenCalledTimes(1);
      expect(errorSpy.mock.calls[0][0]).toMatch(/\[DEBUG\] \[Test\] shown$/);
    });

    it('should write nothing to the console when silenced', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const logger = getLogger();

      logger.setSilentConsole(true);
      logger.error('Test', 'quiet');

      expect(errorSpy).not.toHaveBeenCalled();
    });
  });

  describe('file logger', () => {
    let testDir: string;

    beforeEach(async () => {
      testDir = path.join(os.tmpdir(), `splitkeeper-logger-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
      await fs.promises.mkdir(testDir, { recursive: true });
    });

    afterEach(async () => {
      await fs.promises.rm(testDir, { recursive: true, force: true });
    });

    it('should append formatted lines with metadata to the log file', async () => {
      const logFile = path.join(testDir, 'logs', 'splitkeeper.log');
      const logger = createLogger(logFile, { level: LogLevel.INFO });

      logger.info('Splitter', 'Split big.bin into 3 parts', { chunkSize: 48 });
      logger.debug('Splitter', 'not written');
      logger.error('Merger', 'failed');

      const lines = (await fs.promises.readFile(logFile, 'utf-8')).trimEnd().split('\n');
      expect(lines).toHaveLength(2);
      expect(lines[0]).toMatch(/^\[.+\] \[INFO\] \[Splitter\] Split big\.bin into 3 parts \{"chunkSize":48\}$/);
      expect(lines[1]).toMatch(/^\[.+\] \[ERROR\] \[Merger\] failed$/);
    });

    it('should become the shared logger', () => {
      const logger = createLogger(path.join(testDir, 'a.log'));
      expect(getLogger()).toBe(logger);
    });
  });
});
