/**
 * Language-agnostic source model types.
 * The analysis engine only sees these; language front ends produce them
 * from whatever parser they use.
 */

import type { RuleNode } from '../core/ordering/types.js';

/**
 * Supported programming languages.
 */
export type SupportedLanguage = 'java';

/**
 * Source location in a file.
 */
export interface SourceLocation {
  /** 1-based line number */
  line: number;
  /** 1-based column number */
  column: number;
}

/**
 * Source range of an expression, with its raw text.
 */
export interface SourceSite {
  location: SourceLocation;
  endLocation: SourceLocation;
  /** Raw source text of the expression */
  text: string;
}

/**
 * Parsed view of one source file.
 */
export interface SourceModel {
  filePath: string;
  fileName: string;
  extension: string;
  language: SupportedLanguage;
  lineCount: number;
  /** Every URL-pattern-bearing rule declaration, in source order */
  ruleNodes: RuleNode<SourceSite>[];
  /** Set when the parser could not read the file */
  parseError?: string;
}

/**
 * Options shared by language front ends.
 */
export interface ChainShapeOptions {
  /** Invocations whose string arguments are URL patterns */
  matcherMethods: readonly string[];
  /** Invocations that start a fresh authorization chain */
  terminatorMethods: readonly string[];
}

export const DEFAULT_CHAIN_SHAPE: Readonly<ChainShapeOptions> = Object.freeze({
  matcherMethods: ['antMatchers'],
  terminatorMethods: ['authorizeRequests'],
});
