/**
 * URL pattern order analysis.
 *
 * Flags a pattern declared after a broader pattern on the same chain: the
 * broader rule always wins, so the later one is dead configuration.
 */

import { MatchRuleCache } from './ant-pattern.js';
import { collectPriorPatterns } from './chain-walker.js';
import type {
  ConflictFinding,
  Pattern,
  ReportSink,
  RuleNode,
} from './types.js';

/** Label of the secondary location pointing at the broader pattern. */
export const LESS_RESTRICTIVE_LABEL = 'less restrictive';

/**
 * State for one analysis pass. Create one per pass, or omit it and each
 * call gets a fresh one.
 */
export interface OrderAnalysisContext {
  readonly matchRules: MatchRuleCache;
}

export function createOrderAnalysisContext(): OrderAnalysisContext {
  return { matchRules: new MatchRuleCache() };
}

/**
 * Find the conflicts introduced by the patterns of `node`.
 * Returns at most one finding per pattern.
 */
export function checkNode<S>(
  node: RuleNode<S>,
  context: OrderAnalysisContext = createOrderAnalysisContext()
): ConflictFinding<S>[] {
  const declaration = node.asPatternDeclaration();
  if (!declaration || declaration.patterns.length === 0) {
    return [];
  }

  const prior = collectPriorPatterns(node);
  if (prior.length === 0) {
    return [];
  }

  const findings: ConflictFinding<S>[] = [];
  for (const pattern of declaration.patterns) {
    const broader = findBroaderPattern(pattern, prior, context);
    if (broader) {
      findings.push({ offending: pattern, broader });
    }
  }
  return findings;
}

/**
 * Most recently declared prior pattern that matches `pattern`, if any.
 */
function findBroaderPattern<S>(
  pattern: Pattern<S>,
  prior: readonly Pattern<S>[],
  context: OrderAnalysisContext
): Pattern<S> | null {
  for (let i = prior.length - 1; i >= 0; i--) {
    const candidate = prior[i];
    if (context.matchRules.get(candidate.value).matches(pattern.value)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Message shown on the offending pattern.
 */
export function formatConflictMessage<S>(finding: ConflictFinding<S>): string {
  return (
    'Reorder the URL patterns from most to less specific, the pattern ' +
    `"${finding.offending.value}" should occur before "${finding.broader.value}".`
  );
}

/**
 * Check `node` and send each conflict to `sink`.
 * Returns the findings that were reported.
 */
export function reportConflicts<S>(
  node: RuleNode<S>,
  sink: ReportSink<S>,
  context?: OrderAnalysisContext
): ConflictFinding<S>[] {
  const findings = checkNode(node, context);
  for (const finding of findings) {
    sink.report(formatConflictMessage(finding), finding.offending.site, [
      { label: LESS_RESTRICTIVE_LABEL, site: finding.broader.site },
    ]);
  }
  return findings;
}
