/**
 * Core type definitions for the analysis engine.
 * Shared by the engine, the CLI and the formatters.
 */

import type { Config, Severity, UrlPatternOrderRule } from '../config/schema.js';

// ---------------------------------------------------------------------------
// Severities
// ---------------------------------------------------------------------------

export type AnalysisSeverity = Severity;

export const ANALYSIS_SEVERITIES: readonly AnalysisSeverity[] = ['error', 'warning', 'info'];

const SEVERITY_ORDER: Record<AnalysisSeverity, number> = {
  error: 0,
  warning: 1,
  info: 2,
};

export function compareSeverity(a: AnalysisSeverity, b: AnalysisSeverity): number {
  return SEVERITY_ORDER[a] - SEVERITY_ORDER[b];
}

export function severityAtLeast(
  severity: AnalysisSeverity,
  threshold: AnalysisSeverity,
): boolean {
  return SEVERITY_ORDER[severity] <= SEVERITY_ORDER[threshold];
}

export function isAnalysisSeverity(value: string): value is AnalysisSeverity {
  return (ANALYSIS_SEVERITIES as readonly string[]).includes(value);
}

// ---------------------------------------------------------------------------
// Issues
// ---------------------------------------------------------------------------

export const URL_PATTERN_ORDER_RULE_ID = 'url-pattern-order';

export interface SecondaryIssueLocation {
  label: string;
  line: number;
  column: number;
  /** Source text at the location */
  text: string;
}

export interface AnalysisIssue {
  ruleId: string;
  severity: AnalysisSeverity;
  /** Path relative to the project root, forward slashes */
  file: string;
  line: number;
  column: number;
  endLine: number;
  endColumn: number;
  message: string;
  secondary: SecondaryIssueLocation[];
}

// ---------------------------------------------------------------------------
// Summary & Result
// ---------------------------------------------------------------------------

export interface AnalysisSummary {
  total: number;
  bySeverity: Record<AnalysisSeverity, number>;
  filesAnalyzed: number;
  /** Files that could not be read or parsed */
  filesSkipped: number;
}

export interface AnalysisResult {
  issues: AnalysisIssue[];
  summary: AnalysisSummary;
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface AnalysisOptions {
  /** Files, directories or globs relative to the project root (default: config files.include) */
  paths?: string[];
  /** Config file path relative to the project root */
  configPath?: string;
  /** Pre-loaded configuration; skips loading from disk */
  config?: Config;
  /** Minimum severity to report (default: info) */
  severity?: AnalysisSeverity;
}

export interface SourceAnalysisOptions {
  rule?: Partial<UrlPatternOrderRule>;
}
