/**
 * Java security-chain extraction using tree-sitter.
 *
 * Spring Security rules are written as fluent call chains:
 *
 *   http.authorizeRequests()
 *       .antMatchers("/admin/**").hasRole("ADMIN")
 *       .antMatchers("/admin/login").permitAll();
 *
 * Each call's receiver is the call written before it, so the receiver
 * link is the chain's predecessor link.
 */

import Parser from 'tree-sitter';
import Java from 'tree-sitter-java';
import type { Pattern, PatternDeclaration, RuleNode } from '../../core/ordering/types.js';
import type { ChainShapeOptions, SourceModel, SourceSite } from '../semantic.types.js';
import { DEFAULT_CHAIN_SHAPE } from '../semantic.types.js';
import { JavaConstantResolver } from './java-constants.js';
import {
  createContext,
  findNodesOfType,
  getNodeText,
  getSite,
  isComment,
  nodeKey,
  unwrapParentheses,
} from './TreeSitterUtils.js';

/** Java tree-sitter node types for invocations */
const JavaInvocationNodes = {
  METHOD_INVOCATION: 'method_invocation',
  ARGUMENT_LIST: 'argument_list',
} as const;

/**
 * Creates a Java parser instance.
 */
export function createJavaParser(): Parser {
  const parser = new Parser();
  parser.setLanguage(Java);
  return parser;
}

/**
 * Shared state of the rule nodes of one file.
 */
interface JavaChainContext {
  sourceCode: string;
  resolver: JavaConstantResolver;
  matcherMethods: ReadonlySet<string>;
  terminatorMethods: ReadonlySet<string>;
  /** One rule node per invocation, so chains share their nodes */
  nodes: Map<string, JavaRuleNode>;
}

/**
 * Rule node view of a `method_invocation`.
 */
export class JavaRuleNode implements RuleNode<SourceSite> {
  private declaration: PatternDeclaration<SourceSite> | null | undefined;

  constructor(
    readonly invocation: Parser.SyntaxNode,
    private readonly ctx: JavaChainContext
  ) {}

  /** Invoked method name, e.g. `antMatchers`. */
  get methodName(): string {
    const name = this.invocation.childForFieldName('name');
    return name ? getNodeText(name, this.ctx.sourceCode) : '';
  }

  asPatternDeclaration(): PatternDeclaration<SourceSite> | null {
    if (this.declaration === undefined) {
      this.declaration = this.ctx.matcherMethods.has(this.methodName)
        ? { patterns: this.extractPatterns() }
        : null;
    }
    return this.declaration;
  }

  isTerminator(): boolean {
    return this.ctx.terminatorMethods.has(this.methodName);
  }

  predecessor(): JavaRuleNode | null {
    const receiver = this.invocation.childForFieldName('object');
    if (!receiver) {
      return null;
    }
    const target = unwrapParentheses(receiver);
    return target.type === JavaInvocationNodes.METHOD_INVOCATION
      ? getRuleNode(target, this.ctx)
      : null;
  }

  /**
   * Arguments that resolve to String constants; others are dropped.
   */
  private extractPatterns(): Pattern<SourceSite>[] {
    const args = this.invocation.childForFieldName('arguments');
    if (!args || args.type !== JavaInvocationNodes.ARGUMENT_LIST) {
      return [];
    }

    const patterns: Pattern<SourceSite>[] = [];
    for (const arg of args.namedChildren) {
      if (isComment(arg)) continue;
      const value = this.ctx.resolver.resolve(arg);
      if (value !== null) {
        patterns.push({ value, site: getSite(arg, this.ctx.sourceCode) });
      }
    }
    return patterns;
  }
}

function getRuleNode(invocation: Parser.SyntaxNode, ctx: JavaChainContext): JavaRuleNode {
  const key = nodeKey(invocation);
  let node = ctx.nodes.get(key);
  if (!node) {
    node = new JavaRuleNode(invocation, ctx);
    ctx.nodes.set(key, node);
  }
  return node;
}

/**
 * Extracts a SourceModel from Java source code.
 * Returns a model with `parseError` set and no rule nodes if parsing fails.
 */
export function extractJavaSecurityModel(
  parser: Parser,
  sourceCode: string,
  filePath: string,
  fileName: string,
  extension: string,
  options: ChainShapeOptions = DEFAULT_CHAIN_SHAPE
): SourceModel {
  const baseModel: SourceModel = {
    filePath,
    fileName,
    extension,
    language: 'java',
    lineCount: calculateLineCount(sourceCode),
    ruleNodes: [],
  };

  let root: Parser.SyntaxNode;
  try {
    root = createContext(parser, sourceCode).tree.rootNode;
  } catch (error) {
    return {
      ...baseModel,
      parseError: error instanceof Error ? error.message : String(error),
    };
  }

  const ctx: JavaChainContext = {
    sourceCode,
    resolver: new JavaConstantResolver(root, sourceCode),
    matcherMethods: new Set(options.matcherMethods),
    terminatorMethods: new Set(options.terminatorMethods),
    nodes: new Map(),
  };

  const ruleNodes = findNodesOfType(root, [JavaInvocationNodes.METHOD_INVOCATION])
    .map((invocation) => getRuleNode(invocation, ctx))
    .filter((node) => node.asPatternDeclaration() !== null)
    .sort((a, b) => a.invocation.startIndex - b.invocation.startIndex || a.invocation.endIndex - b.invocation.endIndex);

  return { ...baseModel, ruleNodes };
}

function calculateLineCount(sourceCode: string): number {
  if (sourceCode === '') return 0;
  const lines = sourceCode.split('\n');
  return lines[lines.length - 1] === '' ? lines.length - 1 : lines.length;
}
