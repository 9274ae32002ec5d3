/**
 * CLI command for URL pattern order checks.
 */
import { Command } from 'commander';
import { loadConfig } from '../../core/config/loader.js';
import { OutputFormatSchema, type ExitCodes } from '../../core/config/schema.js';
import { runAnalysis } from '../../core/analysis/engine.js';
import { isAnalysisSeverity, type AnalysisResult } from '../../core/analysis/types.js';
import { createFormatter } from '../formatters/index.js';
import { ConfigError, ErrorCodes, getErrorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface CheckOptions {
  format?: string;
  config?: string;
  severity?: string;
  errorsOnly?: boolean;
  /** Set to false by --no-color */
  color?: boolean;
  quiet?: boolean;
  verbose?: boolean;
}

export interface CheckOutcome {
  output: string;
  exitCode: number;
  result: AnalysisResult;
}

/**
 * Create the check command.
 */
export function createCheckCommand(): Command {
  return new Command('check')
    .description('Find URL patterns declared after a broader pattern on the same security chain')
    .argument('[paths...]', 'Files, directories or glob patterns to check (default: files.include from config)')
    .option('--format <format>', 'Output format: human, json, or compact')
    .option('--config <path>', 'Path to config file')
    .option('--severity <level>', 'Minimum severity to report (error, warning, info)')
    .option('--errors-only', 'Only show errors in output (still runs all checks)')
    .option('--no-color', 'Disable colored output')
    .option('--quiet', 'Suppress diagnostics')
    .option('--verbose', 'Show detailed output')
    .action(async (paths: string[], options: CheckOptions) => {
      try {
        const outcome = await runCheck(process.cwd(), paths, options);
        console.log(outcome.output);
        process.exitCode = outcome.exitCode;
      } catch (error) {
        logger.error(getErrorMessage(error));
        process.exit(1);
      }
    });
}

/**
 * Run the check and render its output. Does not print or exit.
 */
export async function runCheck(
  projectRoot: string,
  paths: string[],
  options: CheckOptions = {}
): Promise<CheckOutcome> {
  if (options.quiet) {
    logger.setLevel('silent');
  } else if (options.verbose) {
    logger.setLevel('debug');
  }

  const config = await loadConfig(projectRoot, options.config);

  const format = OutputFormatSchema.safeParse(options.format ?? config.output.format);
  if (!format.success) {
    throw new ConfigError(
      ErrorCodes.INVALID_CONFIG,
      `Invalid format: ${options.format}. Valid formats: ${OutputFormatSchema.options.join(', ')}`
    );
  }

  if (options.severity !== undefined && !isAnalysisSeverity(options.severity)) {
    throw new ConfigError(
      ErrorCodes.INVALID_CONFIG,
      `Invalid severity: ${options.severity}. Valid severities: error, warning, info`
    );
  }
  const severity = options.severity;

  const result = await runAnalysis(projectRoot, { paths, config, severity });
  logger.debug(`Analyzed ${result.summary.filesAnalyzed} file(s)`);

  const formatter = createFormatter({
    format: format.data,
    colors: options.color !== false && config.output.colors,
    verbose: options.verbose ?? false,
    errorsOnly: options.errorsOnly ?? false,
  });

  return {
    output: formatter.format(result),
    exitCode: getExitCode(result, config.exit_codes),
    result,
  };
}

/**
 * Exit code for a result: error code when any error was reported,
 * warning code for warnings or info only, success code when clean.
 */
export function getExitCode(result: AnalysisResult, exitCodes: ExitCodes): number {
  if (result.summary.bySeverity.error > 0) {
    return exitCodes.error;
  }
  if (result.summary.total > 0) {
    return exitCodes.warning;
  }
  return exitCodes.success;
}
