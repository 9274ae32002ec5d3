/**
 * Compact output formatter for CI/pre-commit hooks.
 * Provides single-line per issue output for easy parsing.
 */

import type { AnalysisIssue, AnalysisResult } from '../../core/analysis/types.js';
import { SEVERITY_LABELS, visibleIssues, type IFormatter, type FormatOptions } from './types.js';

/**
 * Format: file:line:column: SEVERITY [rule] message
 */
export class CompactFormatter implements IFormatter {
  private errorsOnly: boolean;

  constructor(options: Partial<FormatOptions> = {}) {
    this.errorsOnly = options.errorsOnly ?? false;
  }

  format(result: AnalysisResult): string {
    const lines = visibleIssues(result, this.errorsOnly).map((issue) => this.formatIssue(issue));

    lines.push('');
    lines.push(this.formatSummary(result));

    return lines.join('\n');
  }

  private formatIssue(issue: AnalysisIssue): string {
    const severity = SEVERITY_LABELS[issue.severity];
    return `${issue.file}:${issue.line}:${issue.column}: ${severity} [${issue.ruleId}] ${issue.message}`;
  }

  private formatSummary(result: AnalysisResult): string {
    const { summary } = result;
    if (summary.total === 0) {
      return `✓ No issues in ${summary.filesAnalyzed} file(s)`;
    }

    const parts: string[] = [];
    if (summary.bySeverity.error > 0) parts.push(`${summary.bySeverity.error} error(s)`);
    if (summary.bySeverity.warning > 0) parts.push(`${summary.bySeverity.warning} warning(s)`);
    if (summary.bySeverity.info > 0) parts.push(`${summary.bySeverity.info} info`);

    return `${parts.join(', ')} in ${summary.filesAnalyzed} file(s)`;
  }
}
