/**
 * Barrel export for the analysis engine.
 */

export * from './types.js';
export {
  runAnalysis,
  analyzeSource,
  analyzeModel,
  resolveFiles,
  IssueCollector,
} from './engine.js';
