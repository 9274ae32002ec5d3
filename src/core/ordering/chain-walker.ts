/**
 * Walks a rule-declaration chain towards its root.
 */

import type { Pattern, RuleNode } from './types.js';

/**
 * Yields the nodes declared before `node`, nearest first, stopping before
 * the terminator. The terminator itself is never yielded.
 */
export function* predecessors<S>(node: RuleNode<S>): Generator<RuleNode<S>> {
  let current = node.predecessor();
  while (current && !current.isTerminator()) {
    yield current;
    current = current.predecessor();
  }
}

/**
 * Collect every pattern declared before `node` on its chain, oldest first.
 */
export function collectPriorPatterns<S>(node: RuleNode<S>): Pattern<S>[] {
  // Nearest node first; each group keeps its own left-to-right order.
  const groups: (readonly Pattern<S>[])[] = [];
  for (const previous of predecessors(node)) {
    const declaration = previous.asPatternDeclaration();
    if (declaration && declaration.patterns.length > 0) {
      groups.push(declaration.patterns);
    }
  }

  const prior: Pattern<S>[] = [];
  for (let i = groups.length - 1; i >= 0; i--) {
    prior.push(...groups[i]);
  }
  return prior;
}
