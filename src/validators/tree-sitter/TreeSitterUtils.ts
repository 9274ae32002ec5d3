/**
 * Shared tree-sitter utilities for AST-based language front ends.
 * Provides common traversal, extraction, and location helpers.
 */

import Parser from 'tree-sitter';
import type { SourceLocation, SourceSite } from '../semantic.types.js';

/**
 * Context for tree-sitter parsing operations.
 */
export interface TreeSitterContext {
  /** The tree-sitter parser instance */
  parser: Parser;
  /** The parsed syntax tree */
  tree: Parser.Tree;
  /** The source code being parsed */
  sourceCode: string;
}

/**
 * Buffer size for parsing `sourceCode`. The binding's default only holds
 * 32K characters and rejects longer input.
 */
export function parseBufferSize(sourceCode: string): number {
  return sourceCode.length * 2 + 1;
}

/**
 * Creates a tree-sitter parsing context.
 */
export function createContext(
  parser: Parser,
  sourceCode: string
): TreeSitterContext {
  return {
    parser,
    tree: parser.parse(sourceCode, undefined, { bufferSize: parseBufferSize(sourceCode) }),
    sourceCode,
  };
}

/**
 * Gets the source text of a syntax node.
 */
export function getNodeText(
  node: Parser.SyntaxNode,
  sourceCode: string
): string {
  return sourceCode.slice(node.startIndex, node.endIndex);
}

/**
 * Converts a tree-sitter node start position to SourceLocation.
 * Tree-sitter uses 0-based positions, we use 1-based.
 */
export function getLocation(node: Parser.SyntaxNode): SourceLocation {
  return {
    line: node.startPosition.row + 1,
    column: node.startPosition.column + 1,
  };
}

/**
 * Converts a tree-sitter node end position to SourceLocation (1-based).
 */
export function getEndLocation(node: Parser.SyntaxNode): SourceLocation {
  return {
    line: node.endPosition.row + 1,
    column: node.endPosition.column + 1,
  };
}

/**
 * Source site of a node, for reporting.
 */
export function getSite(node: Parser.SyntaxNode, sourceCode: string): SourceSite {
  return {
    location: getLocation(node),
    endLocation: getEndLocation(node),
    text: getNodeText(node, sourceCode),
  };
}

/**
 * Stable key of a node within one tree.
 */
export function nodeKey(node: Parser.SyntaxNode): string {
  return `${node.type}:${node.startIndex}:${node.endIndex}`;
}

/**
 * Finds all descendant nodes matching the given types, in source order.
 */
export function findNodesOfType(
  root: Parser.SyntaxNode,
  types: string[]
): Parser.SyntaxNode[] {
  const results: Parser.SyntaxNode[] = [];
  const typeSet = new Set(types);

  walkTree(root, (node) => {
    if (typeSet.has(node.type)) {
      results.push(node);
    }
  });

  return results;
}

/**
 * Walks the AST depth-first in pre-order, calling the callback for each node.
 * Uses an explicit stack: long call chains nest deeply.
 */
export function walkTree(
  root: Parser.SyntaxNode,
  callback: (node: Parser.SyntaxNode) => void
): void {
  const stack: Parser.SyntaxNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    callback(node);
    const children = node.children;
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
  }
}

/**
 * Finds the closest ancestor node matching one of the given types.
 */
export function getParentOfType(
  node: Parser.SyntaxNode,
  types: string[]
): Parser.SyntaxNode | null {
  const typeSet = new Set(types);
  let current = node.parent;

  while (current) {
    if (typeSet.has(current.type)) {
      return current;
    }
    current = current.parent;
  }

  return null;
}

/**
 * Gets all named children of a specific type.
 */
export function getChildrenOfType(
  node: Parser.SyntaxNode,
  type: string
): Parser.SyntaxNode[] {
  return node.namedChildren.filter((child) => child.type === type);
}

/**
 * Strips any number of wrapping parenthesized expressions.
 */
export function unwrapParentheses(
  node: Parser.SyntaxNode,
  parenthesizedType = 'parenthesized_expression'
): Parser.SyntaxNode {
  let current = node;
  while (current.type === parenthesizedType) {
    const inner = current.namedChildren.find((child) => !isComment(child));
    if (!inner) break;
    current = inner;
  }
  return current;
}

/**
 * True for comment nodes, which tree-sitter grammars place among named children.
 */
export function isComment(node: Parser.SyntaxNode): boolean {
  return node.type === 'comment' || node.type === 'line_comment' || node.type === 'block_comment';
}
