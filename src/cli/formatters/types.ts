/**
 * Formatter type definitions.
 */
import type { AnalysisIssue, AnalysisResult } from '../../core/analysis/types.js';
import type { OutputFormat } from '../../core/config/schema.js';

export type { OutputFormat } from '../../core/config/schema.js';

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  /** Output format */
  format: OutputFormat;
  /** Use colors in output */
  colors: boolean;
  /** Verbose output */
  verbose: boolean;
  /** Only show errors, hide warnings and info (default: false) */
  errorsOnly: boolean;
}

/**
 * Interface for output formatters.
 */
export interface IFormatter {
  format(result: AnalysisResult): string;
}

/**
 * Issues a formatter should print.
 */
export function visibleIssues(result: AnalysisResult, errorsOnly: boolean): AnalysisIssue[] {
  return errorsOnly
    ? result.issues.filter((issue) => issue.severity === 'error')
    : result.issues;
}

export const SEVERITY_LABELS = {
  error: 'ERROR',
  warning: 'WARN',
  info: 'INFO',
} as const;
