/**
 * JSON output formatter for machine consumption.
 */
import type { AnalysisResult } from '../../core/analysis/types.js';
import { visibleIssues, type IFormatter, type FormatOptions } from './types.js';

export class JsonFormatter implements IFormatter {
  private errorsOnly: boolean;

  constructor(options: Partial<FormatOptions> = {}) {
    this.errorsOnly = options.errorsOnly ?? false;
  }

  format(result: AnalysisResult): string {
    return JSON.stringify(
      {
        issues: visibleIssues(result, this.errorsOnly),
        summary: result.summary,
      },
      null,
      2
    );
  }
}
