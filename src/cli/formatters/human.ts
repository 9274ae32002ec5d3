/**
 * Human-readable output formatter.
 */
import chalk from 'chalk';
import type { AnalysisIssue, AnalysisResult, AnalysisSeverity } from '../../core/analysis/types.js';
import { SEVERITY_LABELS, visibleIssues, type IFormatter, type FormatOptions } from './types.js';

type Color = 'red' | 'green' | 'yellow' | 'blue' | 'cyan' | 'dim' | 'bold';

const SEVERITY_COLORS: Record<AnalysisSeverity, Color> = {
  error: 'red',
  warning: 'yellow',
  info: 'blue',
};

export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      format: 'human',
      colors: options.colors ?? true,
      verbose: options.verbose ?? false,
      errorsOnly: options.errorsOnly ?? false,
    };
  }

  format(result: AnalysisResult): string {
    const lines: string[] = [];
    const issues = visibleIssues(result, this.options.errorsOnly);

    if (issues.length === 0) {
      lines.push(this.colorize('✓ No ordering issues found.', 'green'));
      lines.push('');
    }

    // Issues arrive sorted by file
    let currentFile: string | null = null;
    for (const issue of issues) {
      if (issue.file !== currentFile) {
        if (currentFile !== null) lines.push('');
        currentFile = issue.file;
        lines.push(this.colorize(issue.file, 'bold'));
      }
      lines.push(...this.formatIssue(issue));
    }
    if (currentFile !== null) lines.push('');

    lines.push(this.formatSummary(result));
    return lines.join('\n');
  }

  private formatIssue(issue: AnalysisIssue): string[] {
    const label = this.colorize(SEVERITY_LABELS[issue.severity], SEVERITY_COLORS[issue.severity]);
    const lines = [`   ${issue.line}:${issue.column}  ${label}  ${issue.message}`];

    for (const location of issue.secondary) {
      lines.push(
        `      ${this.colorize(`↳ ${location.label}: ${location.text} at ${location.line}:${location.column}`, 'dim')}`
      );
    }

    if (this.options.verbose) {
      lines.push(`      ${this.colorize(`rule: ${issue.ruleId}`, 'dim')}`);
    }

    return lines;
  }

  private formatSummary(result: AnalysisResult): string {
    const { summary } = result;
    const lines: string[] = [];

    lines.push('═'.repeat(60));

    const errorText = this.colorize(`${summary.bySeverity.error} error(s)`, 'red');
    const warningText = this.colorize(`${summary.bySeverity.warning} warning(s)`, 'yellow');
    const infoText = this.colorize(`${summary.bySeverity.info} info`, 'blue');

    lines.push(`SUMMARY: ${errorText}, ${warningText}, ${infoText}`);
    lines.push(`Files analyzed: ${summary.filesAnalyzed}`);

    if (summary.filesSkipped > 0) {
      lines.push(`Files skipped: ${summary.filesSkipped}`);
    }

    return lines.join('\n');
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'blue':
        return chalk.blue(text);
      case 'cyan':
        return chalk.cyan(text);
      case 'dim':
        return chalk.dim(text);
      case 'bold':
        return chalk.bold(text);
    }
  }
}
