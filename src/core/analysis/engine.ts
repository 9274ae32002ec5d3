/**
 * Analysis engine - resolves files, parses them into source models, runs
 * the URL pattern order analysis on every rule chain and returns sorted
 * issues with a summary.
 */

import * as path from 'node:path';
import { loadConfig } from '../config/loader.js';
import { UrlPatternOrderRuleSchema, type Config, type UrlPatternOrderRule } from '../config/schema.js';
import {
  createOrderAnalysisContext,
  reportConflicts,
  type OrderAnalysisContext,
  type ReportSink,
  type SecondaryLocation,
} from '../ordering/index.js';
import { validatorRegistry } from '../../validators/index.js';
import type { ChainShapeOptions, SourceModel, SourceSite } from '../../validators/index.js';
import { globFiles, fileExists, isDirectory, relativePath } from '../../utils/file-system.js';
import { loadIgnoreFile } from '../../utils/ignore-file.js';
import { SystemError, ErrorCodes, getErrorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import {
  URL_PATTERN_ORDER_RULE_ID,
  compareSeverity,
  severityAtLeast,
  type AnalysisIssue,
  type AnalysisOptions,
  type AnalysisResult,
  type AnalysisSeverity,
  type AnalysisSummary,
  type SourceAnalysisOptions,
} from './types.js';

const log = logger.child('analysis');

// ---------------------------------------------------------------------------
// Issue collection
// ---------------------------------------------------------------------------

/**
 * Report sink that turns conflicts into issues for one file.
 */
export class IssueCollector implements ReportSink<SourceSite> {
  readonly issues: AnalysisIssue[] = [];

  constructor(
    private readonly file: string,
    private readonly severity: AnalysisSeverity,
    private readonly ruleId: string = URL_PATTERN_ORDER_RULE_ID,
  ) {}

  report(message: string, primary: SourceSite, secondary: SecondaryLocation<SourceSite>[]): void {
    this.issues.push({
      ruleId: this.ruleId,
      severity: this.severity,
      file: this.file,
      line: primary.location.line,
      column: primary.location.column,
      endLine: primary.endLocation.line,
      endColumn: primary.endLocation.column,
      message,
      secondary: secondary.map(({ label, site }) => ({
        label,
        line: site.location.line,
        column: site.location.column,
        text: site.text,
      })),
    });
  }
}

function chainShapeOf(rule: UrlPatternOrderRule): ChainShapeOptions {
  return {
    matcherMethods: rule.matcher_methods,
    terminatorMethods: rule.terminator_methods,
  };
}

/**
 * Run the order analysis on every rule node of a parsed model.
 */
export function analyzeModel(
  model: SourceModel,
  file: string,
  rule: UrlPatternOrderRule,
  context: OrderAnalysisContext = createOrderAnalysisContext(),
): AnalysisIssue[] {
  if (!rule.enabled) {
    return [];
  }
  const collector = new IssueCollector(file, rule.severity);
  for (const node of model.ruleNodes) {
    reportConflicts(node, collector, context);
  }
  return collector.issues.sort(compareIssues);
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Analyze the given project.
 *
 * 1. Loads config (unless provided).
 * 2. Resolves files and drops those matched by .pathorderignore.
 * 3. Parses each file and runs the order analysis on its rule chains.
 * 4. Filters by severity threshold and sorts by location.
 */
export async function runAnalysis(
  projectRoot: string,
  options: AnalysisOptions = {},
): Promise<AnalysisResult> {
  const config = options.config ?? await loadConfig(projectRoot, options.configPath);
  const rule = config.rules.url_pattern_order;
  const shape = chainShapeOf(rule);

  const files = await resolveFiles(projectRoot, options.paths ?? [], config);
  log.debug(`Resolved ${files.length} file(s)`);

  // One compile cache for the whole pass
  const context = createOrderAnalysisContext();
  let issues: AnalysisIssue[] = [];
  let filesAnalyzed = 0;
  let filesSkipped = 0;

  for (const file of files) {
    const validator = validatorRegistry.getForExtension(path.extname(file), shape);
    if (!validator) {
      continue;
    }

    let model: SourceModel;
    try {
      model = await validator.parseFile(path.resolve(projectRoot, file));
    } catch (error) {
      log.warn(`Skipping ${file}: ${getErrorMessage(error)}`);
      filesSkipped++;
      continue;
    }
    if (model.parseError) {
      log.warn(`Skipping ${file}: ${model.parseError}`);
      filesSkipped++;
      continue;
    }

    filesAnalyzed++;
    issues.push(...analyzeModel(model, file, rule, context));
  }

  if (options.severity) {
    const threshold = options.severity;
    issues = issues.filter((issue) => severityAtLeast(issue.severity, threshold));
  }

  issues.sort(compareIssues);

  return {
    issues,
    summary: buildSummary(issues, filesAnalyzed, filesSkipped),
  };
}

/**
 * Analyze in-memory source code. No config or file system is involved.
 */
export async function analyzeSource(
  sourceCode: string,
  filePath: string = 'SecurityConfig.java',
  options: SourceAnalysisOptions = {},
): Promise<AnalysisIssue[]> {
  const rule = UrlPatternOrderRuleSchema.parse(options.rule ?? {});
  const validator = validatorRegistry.getForExtension(path.extname(filePath), chainShapeOf(rule));
  if (!validator) {
    throw new SystemError(
      ErrorCodes.UNSUPPORTED_FILE,
      `No validator registered for ${filePath}`,
      { filePath },
    );
  }
  const model = await validator.parseFile(filePath, sourceCode);
  if (model.parseError) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Failed to parse ${filePath}: ${model.parseError}`,
      { filePath },
    );
  }
  return analyzeModel(model, filePath.replace(/\\/g, '/'), rule);
}

/**
 * Resolve the files to analyze, relative to the project root.
 *
 * With no paths, uses `files.include`/`files.exclude` from config.
 * Directories are scanned with the same patterns; other paths that
 * aren't files are treated as globs.
 */
export async function resolveFiles(
  projectRoot: string,
  paths: string[],
  config: Config,
): Promise<string[]> {
  const { include, exclude } = config.files;
  const found = new Set<string>();

  if (paths.length === 0) {
    for (const file of await globFiles(include, { cwd: projectRoot, absolute: false, ignore: exclude })) {
      found.add(file);
    }
  }

  for (const p of paths) {
    const absolute = path.resolve(projectRoot, p);
    if (await isDirectory(absolute)) {
      const matches = await globFiles(include, { cwd: absolute, absolute: true, ignore: exclude });
      for (const match of matches) {
        found.add(relativePath(projectRoot, match));
      }
    } else if (await fileExists(absolute)) {
      found.add(relativePath(projectRoot, absolute));
    } else {
      for (const match of await globFiles(p, { cwd: projectRoot, absolute: false, ignore: exclude })) {
        found.add(match);
      }
    }
  }

  const ignoreFilter = await loadIgnoreFile(projectRoot);
  return ignoreFilter
    .filter([...found])
    .filter((file) => validatorRegistry.isSupported(path.extname(file)))
    .sort();
}

// ---------------------------------------------------------------------------
// Sorting & Summary
// ---------------------------------------------------------------------------

function compareIssues(a: AnalysisIssue, b: AnalysisIssue): number {
  if (a.file !== b.file) return a.file < b.file ? -1 : 1;
  return a.line - b.line || a.column - b.column || compareSeverity(a.severity, b.severity);
}

function buildSummary(
  issues: AnalysisIssue[],
  filesAnalyzed: number,
  filesSkipped: number,
): AnalysisSummary {
  const bySeverity: Record<AnalysisSeverity, number> = { error: 0, warning: 0, info: 0 };
  for (const issue of issues) {
    bySeverity[issue.severity]++;
  }

  return {
    total: issues.length,
    bySeverity,
    filesAnalyzed,
    filesSkipped,
  };
}
