/**
 * Types for URL-pattern ordering analysis.
 *
 * The analyzer reads a chain of rule declarations through the narrow
 * {@link RuleNode} view, so it never depends on the shape of the syntax tree
 * that produced the chain. `S` is the source site type the front end uses
 * for reporting; the analyzer passes it through untouched.
 */

/**
 * A literal URL pattern declared on a rule node.
 */
export interface Pattern<S> {
  readonly value: string;
  /** Where the pattern was declared. Used for reporting only. */
  readonly site: S;
}

/**
 * A rule node that declares URL patterns.
 */
export interface PatternDeclaration<S> {
  /** Literal patterns in left-to-right declaration order. */
  readonly patterns: readonly Pattern<S>[];
}

/**
 * Read-only view of one node of a rule-declaration chain.
 */
export interface RuleNode<S> {
  /** Returns the declaration when this node carries URL patterns. */
  asPatternDeclaration(): PatternDeclaration<S> | null;

  /** True for the authorization root; nothing before it is compared. */
  isTerminator(): boolean;

  /** The node this one was declared on top of. */
  predecessor(): RuleNode<S> | null;
}

/**
 * Compiled Ant-style pattern.
 */
export interface MatchRule {
  readonly pattern: string;
  matches(text: string): boolean;
}

/**
 * A pattern that can never be reached because a broader pattern was
 * declared before it on the same chain.
 */
export interface ConflictFinding<S> {
  readonly offending: Pattern<S>;
  readonly broader: Pattern<S>;
}

/**
 * Extra location attached to a report.
 */
export interface SecondaryLocation<S> {
  readonly label: string;
  readonly site: S;
}

/**
 * Receives conflicts as rendered reports.
 */
export interface ReportSink<S> {
  report(message: string, primary: S, secondary: SecondaryLocation<S>[]): void;
}
