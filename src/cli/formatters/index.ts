/**
 * Output formatter exports.
 */
import type { FormatOptions, IFormatter } from './types.js';
import { HumanFormatter } from './human.js';
import { JsonFormatter } from './json.js';
import { CompactFormatter } from './compact.js';

export * from './types.js';
export { HumanFormatter, JsonFormatter, CompactFormatter };

/**
 * Create the formatter for `options.format`.
 */
export function createFormatter(options: FormatOptions): IFormatter {
  switch (options.format) {
    case 'json':
      return new JsonFormatter(options);
    case 'compact':
      return new CompactFormatter(options);
    case 'human':
      return new HumanFormatter(options);
  }
}
