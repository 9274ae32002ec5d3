/**
 * Tests for Java rule chain extraction.
 */
import { describe, it, expect, vi } from 'vitest';
import { checkNode } from '../../../../src/core/ordering/order-analyzer.js';
import type { RuleNode } from '../../../../src/core/ordering/types.js';
import type { ChainShapeOptions, SourceSite } from '../../../../src/validators/semantic.types.js';
import {
  createJavaParser,
  extractJavaSecurityModel,
  JavaRuleNode,
} from '../../../../src/validators/tree-sitter/java-ast.js';

const parser = createJavaParser();

function extract(source: string, options?: ChainShapeOptions) {
  return extractJavaSecurityModel(parser, source, '/src/SecurityConfig.java', 'SecurityConfig.java', '.java', options);
}

function patternValues(node: RuleNode<SourceSite> | undefined): string[] {
  return node?.asPatternDeclaration()?.patterns.map((p) => p.value) ?? [];
}

/** [offending, broader] per finding, over every rule node of the source */
function conflictsIn(source: string, options?: ChainShapeOptions): [string, string][] {
  return extract(source, options).ruleNodes.flatMap((node) =>
    checkNode(node).map((f): [string, string] => [f.offending.value, f.broader.value])
  );
}

/** Wraps chain statements in a configure method. */
function config(...statements: string[]): string {
  return [
    'public class SecurityConfig {',
    '  protected void configure(HttpSecurity http) throws Exception {',
    ...statements.map((s) => `    ${s}`),
    '  }',
    '}',
    '',
  ].join('\n');
}

describe('extractJavaSecurityModel', () => {
  const basic = config(
    'http.authorizeRequests()',
    '    .antMatchers("/admin/**").hasRole("ADMIN")',
    '    .antMatchers("/admin/login").permitAll();'
  );

  it('fills the file metadata', () => {
    const model = extract(basic);

    expect(model.filePath).toBe('/src/SecurityConfig.java');
    expect(model.fileName).toBe('SecurityConfig.java');
    expect(model.extension).toBe('.java');
    expect(model.language).toBe('java');
    expect(model.lineCount).toBe(7);
    expect(model.parseError).toBeUndefined();
  });

  it('lists matcher calls in source order', () => {
    const model = extract(basic);

    expect(model.ruleNodes).toHaveLength(2);
    expect(patternValues(model.ruleNodes[0])).toEqual(['/admin/**']);
    expect(patternValues(model.ruleNodes[1])).toEqual(['/admin/login']);
  });

  it('records where each pattern was written', () => {
    const pattern = extract(basic).ruleNodes[1]?.asPatternDeclaration()?.patterns[0];

    expect(pattern?.site).toEqual({
      location: { line: 5, column: 22 },
      endLocation: { line: 5, column: 36 },
      text: '"/admin/login"',
    });
  });

  it('links each call to the call it is made on', () => {
    const [first, second] = extract(basic).ruleNodes;

    const hasRole = second?.predecessor();
    expect(hasRole).toBeInstanceOf(JavaRuleNode);
    expect(hasRole instanceof JavaRuleNode ? hasRole.methodName : '').toBe('hasRole');
    expect(hasRole?.predecessor()).toBe(first);
    expect(first?.predecessor()?.isTerminator()).toBe(true);
    expect(first?.predecessor()?.predecessor()).toBeNull();
  });

  it('finds the out-of-order pattern', () => {
    expect(conflictsIn(basic)).toEqual([['/admin/login', '/admin/**']]);
  });

  it('accepts a chain ordered from specific to broad', () => {
    const source = config(
      'http.authorizeRequests()',
      '    .antMatchers("/admin/login").permitAll()',
      '    .antMatchers("/admin/**").hasRole("ADMIN")',
      '    .anyRequest().authenticated();'
    );

    expect(conflictsIn(source)).toEqual([]);
  });

  it('looks through parenthesized receivers', () => {
    const source = config(
      '((http.authorizeRequests().antMatchers("/**").permitAll()))',
      '    .antMatchers("/a").denyAll();'
    );

    expect(conflictsIn(source)).toEqual([['/a', '/**']]);
  });

  it('stops at a later authorizeRequests call', () => {
    const source = config(
      'http.antMatchers("/**").permitAll()',
      '    .and().authorizeRequests()',
      '    .antMatchers("/a").denyAll();'
    );

    expect(conflictsIn(source)).toEqual([]);
  });

  it('keeps separate statements apart', () => {
    const source = config(
      'http.authorizeRequests().antMatchers("/**").permitAll();',
      'http.authorizeRequests().antMatchers("/a").denyAll();'
    );

    expect(conflictsIn(source)).toEqual([]);
  });

  it('drops arguments that are not String constants', () => {
    const source = config(
      'http.authorizeRequests()',
      '    .antMatchers(HttpMethod.GET, "/api/**").permitAll()',
      '    .antMatchers(HttpMethod.POST, "/api/items").authenticated();'
    );
    const model = extract(source);

    expect(patternValues(model.ruleNodes[0])).toEqual(['/api/**']);
    expect(conflictsIn(source)).toEqual([['/api/items', '/api/**']]);
  });

  it('skips comments between arguments', () => {
    const source = config('http.authorizeRequests().antMatchers(/* admin */ "/admin/**", // all\n "/x").permitAll();');

    expect(patternValues(extract(source).ruleNodes[0])).toEqual(['/admin/**', '/x']);
  });

  it('resolves constants used as patterns', () => {
    const source = [
      'public class SecurityConfig {',
      '  private static final String ADMIN = "/admin";',
      '',
      '  protected void configure(HttpSecurity http) throws Exception {',
      '    http.authorizeRequests()',
      '        .antMatchers(ADMIN + "/**").hasRole("ADMIN")',
      '        .antMatchers(ADMIN + "/users").hasRole("ADMIN");',
      '  }',
      '}',
    ].join('\n');

    expect(conflictsIn(source)).toEqual([['/admin/users', '/admin/**']]);
  });

  it('ignores methods that are not matchers', () => {
    const source = config('http.authorizeRequests().mvcMatchers("/**").permitAll().mvcMatchers("/a").denyAll();');

    expect(extract(source).ruleNodes).toEqual([]);
  });

  it('follows the configured method names', () => {
    const source = config(
      'http.authorizeHttpRequests(auth -> auth',
      '    .requestMatchers("/api/**").authenticated()',
      '    .requestMatchers("/api/public").permitAll());'
    );
    const options: ChainShapeOptions = {
      matcherMethods: ['requestMatchers'],
      terminatorMethods: ['authorizeHttpRequests'],
    };

    expect(extract(source, options).ruleNodes).toHaveLength(2);
    expect(conflictsIn(source, options)).toEqual([['/api/public', '/api/**']]);
    expect(conflictsIn(source)).toEqual([]);
  });

  it('returns an empty model for an empty file', () => {
    const model = extract('');

    expect(model.lineCount).toBe(0);
    expect(model.ruleNodes).toEqual([]);
  });

  it('reports a parser failure on the model', () => {
    const failing = createJavaParser();
    vi.spyOn(failing, 'parse').mockImplementation(() => {
      throw new Error('parser exploded');
    });

    const model = extractJavaSecurityModel(failing, basic, '/src/A.java', 'A.java', '.java');

    expect(model.parseError).toBe('parser exploded');
    expect(model.ruleNodes).toEqual([]);
    expect(model.lineCount).toBe(7);
  });
});
