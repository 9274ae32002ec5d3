/**
 * Tests for the JSON formatter.
 */
import { describe, it, expect } from 'vitest';
import { JsonFormatter } from '../../../../src/cli/formatters/json.js';
import { createFormatter, CompactFormatter, HumanFormatter } from '../../../../src/cli/formatters/index.js';
import { mixedResult } from '../../../helpers/results.js';

describe('JsonFormatter', () => {
  it('prints issues and summary as JSON', () => {
    const result = mixedResult();

    expect(JSON.parse(new JsonFormatter().format(result))).toEqual({
      issues: result.issues,
      summary: result.summary,
    });
  });

  it('filters to errors', () => {
    const parsed: unknown = JSON.parse(new JsonFormatter({ errorsOnly: true }).format(mixedResult()));

    expect(parsed).toMatchObject({ issues: [{ message: 'second', severity: 'error' }] });
  });
});

describe('createFormatter', () => {
  const base = { colors: false, verbose: false, errorsOnly: false };

  it('picks the formatter for the format', () => {
    expect(createFormatter({ ...base, format: 'json' })).toBeInstanceOf(JsonFormatter);
    expect(createFormatter({ ...base, format: 'compact' })).toBeInstanceOf(CompactFormatter);
    expect(createFormatter({ ...base, format: 'human' })).toBeInstanceOf(HumanFormatter);
  });
});
