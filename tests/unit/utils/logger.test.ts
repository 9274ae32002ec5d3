/**
 * Tests for logger utility.
 */
import { describe, it, expect, vi, beforeEach, afterEach, afterAll } from 'vitest';
import chalk from 'chalk';
import { Logger, logger } from '../../../src/utils/logger.js';

describe('Logger', () => {
  const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
  const stdout = vi.spyOn(console, 'log').mockImplementation(() => {});
  const originalLevel = chalk.level;

  beforeEach(() => {
    vi.clearAllMocks();
    chalk.level = 0;
  });

  afterEach(() => {
    logger.setLevel('info');
    logger.setPrefix('');
  });

  afterAll(() => {
    chalk.level = originalLevel;
    stderr.mockRestore();
    stdout.mockRestore();
  });

  describe('levels', () => {
    it('defaults to info', () => {
      const log = new Logger();

      log.debug('hidden');
      log.info('shown');

      expect(log.getLevel()).toBe('info');
      expect(stderr).toHaveBeenCalledTimes(1);
      expect(stderr).toHaveBeenCalledWith('[INFO] shown');
    });

    it('shows debug output at debug level', () => {
      const log = new Logger();
      log.setLevel('debug');

      log.debug('details');

      expect(stderr).toHaveBeenCalledWith('[DEBUG] details');
    });

    it('shows nothing when silent', () => {
      const log = new Logger();
      log.setLevel('silent');

      log.error('failure');
      log.warn('careful');
      log.success('done');
      log.fail('failed');

      expect(stderr).not.toHaveBeenCalled();
    });

    it('never writes to stdout', () => {
      const log = new Logger();
      log.setLevel('debug');

      log.debug('a');
      log.info('b');
      log.warn('c');

      expect(stdout).not.toHaveBeenCalled();
    });
  });

  describe('messages', () => {
    it('prints data below the message', () => {
      const log = new Logger();

      log.warn('skipped', { file: 'A.java' });

      expect(stderr.mock.calls).toEqual([['[WARN] skipped'], [JSON.stringify({ file: 'A.java' }, null, 2)]]);
    });

    it('prints the stack of an error', () => {
      const log = new Logger();
      const error = new Error('boom');

      log.error('failed', error);

      expect(stderr.mock.calls).toEqual([['[ERROR] failed'], [error.stack]]);
    });

    it('marks success and failure', () => {
      const log = new Logger();

      log.success('written');
      log.fail('not written');

      expect(stderr.mock.calls).toEqual([['✓ written'], ['✗ not written']]);
    });

    it('adds the prefix', () => {
      const log = new Logger();
      log.setPrefix('cli');

      log.info('hello');

      expect(stderr).toHaveBeenCalledWith('[INFO] [cli] hello');
    });
  });

  describe('child', () => {
    it('joins prefixes', () => {
      const parent = new Logger();
      parent.setPrefix('cli');

      parent.child('analysis').info('started');

      expect(stderr).toHaveBeenCalledWith('[INFO] [cli:analysis] started');
    });

    it('follows the parent level until it has its own', () => {
      const parent = new Logger();
      const child = parent.child('analysis');

      parent.setLevel('silent');
      child.warn('hidden');
      expect(stderr).not.toHaveBeenCalled();

      child.setLevel('warn');
      child.warn('shown');
      expect(stderr).toHaveBeenCalledWith('[WARN] [analysis] shown');
    });

    it('follows the singleton', () => {
      const child = logger.child('engine');

      logger.setLevel('error');

      expect(child.getLevel()).toBe('error');
    });
  });
});
