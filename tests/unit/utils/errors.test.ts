/**
 * Tests for error types.
 */
import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  ErrorCodes,
  getErrorMessage,
  isPathOrderError,
  PathOrderError,
  SystemError,
} from '../../../src/utils/errors.js';

describe('errors', () => {
  describe('PathOrderError', () => {
    it('carries a code and details', () => {
      const error = new PathOrderError('X001', 'broken', { file: 'A.java' });

      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe('PathOrderError');
      expect(error.code).toBe('X001');
      expect(error.message).toBe('broken');
      expect(error.details).toEqual({ file: 'A.java' });
    });

    it('serializes to JSON', () => {
      const error = new SystemError(ErrorCodes.FILE_NOT_FOUND, 'gone', { path: '/x' });

      expect(JSON.parse(JSON.stringify(error))).toEqual({
        name: 'SystemError',
        code: 'S002',
        message: 'gone',
        details: { path: '/x' },
      });
    });
  });

  describe('subclasses', () => {
    it('name themselves', () => {
      expect(new ConfigError(ErrorCodes.INVALID_CONFIG, 'bad').name).toBe('ConfigError');
      expect(new SystemError(ErrorCodes.PARSE_ERROR, 'bad').name).toBe('SystemError');
    });

    it('are pathorder errors', () => {
      expect(isPathOrderError(new ConfigError(ErrorCodes.CONFIG_EXISTS, 'exists'))).toBe(true);
      expect(isPathOrderError(new Error('plain'))).toBe(false);
      expect(isPathOrderError('text')).toBe(false);
    });
  });

  describe('ErrorCodes', () => {
    it('keeps system and config codes apart', () => {
      expect(ErrorCodes).toEqual({
        PARSE_ERROR: 'S001',
        FILE_NOT_FOUND: 'S002',
        UNSUPPORTED_FILE: 'S003',
        INVALID_CONFIG: 'C001',
        CONFIG_LOAD_ERROR: 'C002',
        CONFIG_EXISTS: 'C003',
      });
    });
  });

  describe('getErrorMessage', () => {
    it('reads errors, strings and anything else', () => {
      expect(getErrorMessage(new Error('boom'))).toBe('boom');
      expect(getErrorMessage('plain')).toBe('plain');
      expect(getErrorMessage(42)).toBe('Unknown error');
    });
  });
});
