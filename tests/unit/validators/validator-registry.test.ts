/**
 * Tests for validator registry.
 */
import { describe, it, expect, beforeEach, afterAll, vi } from 'vitest';
import { validatorRegistry } from '../../../src/validators/validator-registry.js';
import { JavaValidator } from '../../../src/validators/java.js';
import type { ILanguageValidator } from '../../../src/validators/interface.types.js';
import type { ChainShapeOptions, SourceModel } from '../../../src/validators/semantic.types.js';
import { DEFAULT_CHAIN_SHAPE } from '../../../src/validators/semantic.types.js';

function createMockValidator(): ILanguageValidator {
  const model: SourceModel = {
    filePath: '/test/A.java',
    fileName: 'A.java',
    extension: '.java',
    language: 'java',
    lineCount: 0,
    ruleNodes: [],
  };
  return {
    supportedLanguages: ['java'],
    supportedExtensions: ['.java'],
    parseFile: vi.fn().mockResolvedValue(model),
    dispose: vi.fn(),
  };
}

describe('ValidatorRegistry', () => {
  beforeEach(() => {
    validatorRegistry.clear();
  });

  afterAll(() => {
    validatorRegistry.clear();
    validatorRegistry.register('java', (options) => new JavaValidator(options), ['java'], ['.java']);
  });

  describe('register', () => {
    it('maps extensions to the validator', () => {
      validatorRegistry.register('java', () => createMockValidator(), ['java'], ['.java', '.JAV']);

      expect(validatorRegistry.isSupported('.java')).toBe(true);
      expect(validatorRegistry.isSupported('.jav')).toBe(true);
      expect(validatorRegistry.isSupported('.kt')).toBe(false);
      expect(validatorRegistry.getSupportedExtensions()).toEqual(['.java', '.jav']);
      expect(validatorRegistry.getRegisteredValidators()).toEqual(['java']);
    });
  });

  describe('getForExtension', () => {
    it('returns null for an unknown extension', () => {
      expect(validatorRegistry.getForExtension('.kt')).toBeNull();
    });

    it('matches extensions case-insensitively', () => {
      const mock = createMockValidator();
      validatorRegistry.register('java', () => mock, ['java'], ['.java']);

      expect(validatorRegistry.getForExtension('.JAVA')).toBe(mock);
    });

    it('creates one instance per chain shape', () => {
      const factory = vi.fn((_options: ChainShapeOptions) => createMockValidator());
      validatorRegistry.register('java', factory, ['java'], ['.java']);
      const custom: ChainShapeOptions = { matcherMethods: ['requestMatchers'], terminatorMethods: [] };

      const first = validatorRegistry.getForExtension('.java');
      const again = validatorRegistry.getForExtension('.java', { ...DEFAULT_CHAIN_SHAPE });
      const other = validatorRegistry.getForExtension('.java', custom);

      expect(again).toBe(first);
      expect(other).not.toBe(first);
      expect(factory).toHaveBeenCalledTimes(2);
      expect(factory).toHaveBeenLastCalledWith(custom);
    });
  });

  describe('getById', () => {
    it('returns null for an unknown id', () => {
      expect(validatorRegistry.getById('kotlin')).toBeNull();
    });
  });

  describe('disposeAll', () => {
    it('disposes every instance and creates fresh ones afterwards', () => {
      const mocks: ILanguageValidator[] = [];
      validatorRegistry.register('java', () => {
        const mock = createMockValidator();
        mocks.push(mock);
        return mock;
      }, ['java'], ['.java']);

      const first = validatorRegistry.getById('java');
      validatorRegistry.disposeAll();
      const second = validatorRegistry.getById('java');

      expect(mocks[0]?.dispose).toHaveBeenCalledTimes(1);
      expect(second).not.toBe(first);
      expect(validatorRegistry.isSupported('.java')).toBe(true);
    });
  });

  describe('clear', () => {
    it('removes every registration', () => {
      validatorRegistry.register('java', () => createMockValidator(), ['java'], ['.java']);

      validatorRegistry.clear();

      expect(validatorRegistry.isSupported('.java')).toBe(false);
      expect(validatorRegistry.getRegisteredValidators()).toEqual([]);
    });
  });
});
