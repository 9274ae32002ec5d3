/**
 * Compile-time String constant resolution for Java expressions.
 *
 * Resolves string literals, text blocks, parentheses, `+` concatenation
 * and references to `final` String fields declared in the same file.
 * Anything else resolves to null.
 */

import type Parser from 'tree-sitter';
import {
  getNodeText,
  getChildrenOfType,
  nodeKey,
  unwrapParentheses,
  walkTree,
} from './TreeSitterUtils.js';

/** Java node types that declare a type with a body of members. */
const JavaTypeDeclarationNodes = {
  CLASS_DECLARATION: 'class_declaration',
  INTERFACE_DECLARATION: 'interface_declaration',
  ENUM_DECLARATION: 'enum_declaration',
  RECORD_DECLARATION: 'record_declaration',
  ANNOTATION_TYPE_DECLARATION: 'annotation_type_declaration',
} as const;

const TYPE_DECLARATION_TYPES: string[] = Object.values(JavaTypeDeclarationNodes);

/** Member node types that may declare constants. */
const JavaMemberNodes = {
  FIELD_DECLARATION: 'field_declaration',
  CONSTANT_DECLARATION: 'constant_declaration',
  ENUM_BODY_DECLARATIONS: 'enum_body_declarations',
  VARIABLE_DECLARATOR: 'variable_declarator',
  MODIFIERS: 'modifiers',
} as const;

/** Expression node types the resolver understands. */
const JavaExpressionNodes = {
  STRING_LITERAL: 'string_literal',
  PARENTHESIZED_EXPRESSION: 'parenthesized_expression',
  BINARY_EXPRESSION: 'binary_expression',
  IDENTIFIER: 'identifier',
  FIELD_ACCESS: 'field_access',
} as const;

/** Node types that bring locals or parameters into scope. */
const JavaLocalScopeNodes = {
  BLOCK: 'block',
  CONSTRUCTOR_BODY: 'constructor_body',
  SWITCH_BLOCK_STATEMENT_GROUP: 'switch_block_statement_group',
  METHOD_DECLARATION: 'method_declaration',
  CONSTRUCTOR_DECLARATION: 'constructor_declaration',
  LAMBDA_EXPRESSION: 'lambda_expression',
  CATCH_CLAUSE: 'catch_clause',
  ENHANCED_FOR_STATEMENT: 'enhanced_for_statement',
  FOR_STATEMENT: 'for_statement',
  TRY_WITH_RESOURCES_STATEMENT: 'try_with_resources_statement',
} as const;

/** Declaration node types found inside local scopes. */
const JavaLocalDeclarationNodes = {
  LOCAL_VARIABLE_DECLARATION: 'local_variable_declaration',
  FORMAL_PARAMETER: 'formal_parameter',
  SPREAD_PARAMETER: 'spread_parameter',
  CATCH_FORMAL_PARAMETER: 'catch_formal_parameter',
  INFERRED_PARAMETERS: 'inferred_parameters',
  RESOURCE_SPECIFICATION: 'resource_specification',
  RESOURCE: 'resource',
} as const;

const STRING_TYPE_NAMES = new Set(['String', 'java.lang.String']);

const SIMPLE_ESCAPES: Record<string, string> = {
  b: '\b',
  s: ' ',
  t: '\t',
  n: '\n',
  f: '\f',
  r: '\r',
  '"': '"',
  "'": "'",
  '\\': '\\',
};

interface ConstantField {
  /** Key of the field's declarator, for cycle detection */
  key: string;
  value: Parser.SyntaxNode;
}

/**
 * Decode the escapes of a Java string body.
 * Returns null for an escape the Java compiler would reject.
 */
export function decodeJavaEscapes(body: string): string | null {
  let result = '';
  let i = 0;
  while (i < body.length) {
    const ch = body[i];
    if (ch !== '\\') {
      result += ch;
      i++;
      continue;
    }

    const next = body[i + 1];
    if (next === undefined) {
      return null;
    }

    if (next === 'u') {
      let j = i + 1;
      while (body[j] === 'u') j++;
      const hex = body.slice(j, j + 4);
      if (!/^[0-9a-fA-F]{4}$/.test(hex)) {
        return null;
      }
      result += String.fromCharCode(parseInt(hex, 16));
      i = j + 4;
      continue;
    }

    if (next in SIMPLE_ESCAPES) {
      result += SIMPLE_ESCAPES[next];
      i += 2;
      continue;
    }

    if (next >= '0' && next <= '7') {
      // \0 to \377
      const maxDigits = next <= '3' ? 3 : 2;
      let j = i + 1;
      let digits = '';
      while (digits.length < maxDigits && body[j] !== undefined && body[j] >= '0' && body[j] <= '7') {
        digits += body[j];
        j++;
      }
      result += String.fromCharCode(parseInt(digits, 8));
      i = j;
      continue;
    }

    if (next === '\n') {
      // Line continuation, text blocks only
      i += 2;
      continue;
    }

    return null;
  }
  return result;
}

/**
 * Content of a text block, with incidental indentation removed and escapes decoded.
 */
export function decodeJavaTextBlock(raw: string): string | null {
  const normalized = raw.replace(/\r\n?/g, '\n');
  if (!normalized.startsWith('"""') || !normalized.endsWith('"""') || normalized.length < 6) {
    return null;
  }
  const afterOpening = normalized.slice(3, -3);
  const firstNewline = afterOpening.indexOf('\n');
  if (firstNewline < 0 || afterOpening.slice(0, firstNewline).trim() !== '') {
    return null;
  }

  const lines = afterOpening.slice(firstNewline + 1).split('\n');
  const lastIndex = lines.length - 1;
  const closingOnOwnLine = lines[lastIndex].trim() === '';

  let indent = Number.POSITIVE_INFINITY;
  lines.forEach((line, index) => {
    if (line.trim() === '' && index !== lastIndex) return;
    const leading = line.length - line.trimStart().length;
    indent = Math.min(indent, leading);
  });
  if (!Number.isFinite(indent)) indent = 0;

  const stripped = lines.map((line, index) => {
    if (index === lastIndex && closingOnOwnLine) return '';
    if (line.trim() === '') return '';
    return line.slice(indent).trimEnd();
  });

  return decodeJavaEscapes(stripped.join('\n'));
}

/**
 * Value of a Java string literal's source text, or null when malformed.
 */
export function decodeJavaStringLiteral(raw: string): string | null {
  if (raw.startsWith('"""')) {
    return decodeJavaTextBlock(raw);
  }
  if (raw.length < 2 || !raw.startsWith('"') || !raw.endsWith('"')) {
    return null;
  }
  return decodeJavaEscapes(raw.slice(1, -1));
}

/**
 * Resolves expressions of one Java file to String constants.
 */
export class JavaConstantResolver {
  /** Constant fields per type declaration key */
  private fieldsByType = new Map<string, Map<string, ConstantField>>();
  /** Type declaration key per simple type name (first declaration wins) */
  private typesByName = new Map<string, string>();

  constructor(root: Parser.SyntaxNode, private readonly sourceCode: string) {
    this.indexTypeDeclarations(root);
  }

  /**
   * Resolve `node` to its String constant value, or null when it is not one.
   */
  resolve(node: Parser.SyntaxNode): string | null {
    return this.resolveNode(node, new Set());
  }

  private resolveNode(node: Parser.SyntaxNode, visiting: Set<string>): string | null {
    switch (node.type) {
      case JavaExpressionNodes.STRING_LITERAL:
        return decodeJavaStringLiteral(getNodeText(node, this.sourceCode));

      case JavaExpressionNodes.PARENTHESIZED_EXPRESSION: {
        const inner = unwrapParentheses(node);
        return inner === node ? null : this.resolveNode(inner, visiting);
      }

      case JavaExpressionNodes.BINARY_EXPRESSION: {
        const operator =
          node.childForFieldName('operator') ?? node.children.find((child) => child.type === '+');
        const left = node.childForFieldName('left');
        const right = node.childForFieldName('right');
        if (operator?.type !== '+' || !left || !right) {
          return null;
        }
        const leftValue = this.resolveNode(left, visiting);
        if (leftValue === null) return null;
        const rightValue = this.resolveNode(right, visiting);
        return rightValue === null ? null : leftValue + rightValue;
      }

      case JavaExpressionNodes.IDENTIFIER:
        return this.resolveField(this.lookupInScope(node), visiting);

      case JavaExpressionNodes.FIELD_ACCESS: {
        const object = node.childForFieldName('object');
        const field = node.childForFieldName('field');
        if (!object || !field) {
          return null;
        }
        // `Outer.Inner.NAME` qualifies by its last segment
        const typeName = getNodeText(object, this.sourceCode).split('.').pop() ?? '';
        const typeKey = this.typesByName.get(typeName.trim());
        const constant = typeKey
          ? this.fieldsByType.get(typeKey)?.get(getNodeText(field, this.sourceCode))
          : undefined;
        return this.resolveField(constant, visiting);
      }

      default:
        return null;
    }
  }

  private resolveField(
    constant: ConstantField | undefined,
    visiting: Set<string>
  ): string | null {
    if (!constant || visiting.has(constant.key)) {
      return null;
    }
    visiting.add(constant.key);
    try {
      return this.resolveNode(constant.value, visiting);
    } finally {
      visiting.delete(constant.key);
    }
  }

  /**
   * Finds the constant an identifier names. Scopes are searched from the
   * innermost outwards, so a local or parameter of the same name hides
   * the field.
   */
  private lookupInScope(identifier: Parser.SyntaxNode): ConstantField | undefined {
    const name = getNodeText(identifier, this.sourceCode);
    let child = identifier;
    let scope = identifier.parent;
    while (scope) {
      if (TYPE_DECLARATION_TYPES.includes(scope.type)) {
        const constant = this.fieldsByType.get(nodeKey(scope))?.get(name);
        if (constant) {
          return constant;
        }
      } else if (this.localNamesInScope(scope, child).includes(name)) {
        return undefined;
      }
      child = scope;
      scope = scope.parent;
    }
    return undefined;
  }

  /**
   * Names that `scope` declares and that are visible from its descendant `child`.
   */
  private localNamesInScope(scope: Parser.SyntaxNode, child: Parser.SyntaxNode): string[] {
    switch (scope.type) {
      case JavaLocalScopeNodes.BLOCK:
      case JavaLocalScopeNodes.CONSTRUCTOR_BODY:
      case JavaLocalScopeNodes.SWITCH_BLOCK_STATEMENT_GROUP:
        // Locals are visible from their declaration onwards
        return getChildrenOfType(scope, JavaLocalDeclarationNodes.LOCAL_VARIABLE_DECLARATION)
          .filter((declaration) => declaration.endIndex <= child.startIndex)
          .flatMap((declaration) => this.declaratorNames(declaration));

      case JavaLocalScopeNodes.METHOD_DECLARATION:
      case JavaLocalScopeNodes.CONSTRUCTOR_DECLARATION:
      case JavaLocalScopeNodes.LAMBDA_EXPRESSION:
        return this.parameterNames(scope.childForFieldName('parameters'));

      case JavaLocalScopeNodes.CATCH_CLAUSE:
        return getChildrenOfType(scope, JavaLocalDeclarationNodes.CATCH_FORMAL_PARAMETER)
          .flatMap((parameter) => this.nameOf(parameter));

      case JavaLocalScopeNodes.ENHANCED_FOR_STATEMENT:
        return this.nameOf(scope);

      case JavaLocalScopeNodes.FOR_STATEMENT:
        return scope.namedChildren
          .filter((node) => node.type === JavaLocalDeclarationNodes.LOCAL_VARIABLE_DECLARATION)
          .flatMap((declaration) => this.declaratorNames(declaration));

      case JavaLocalScopeNodes.TRY_WITH_RESOURCES_STATEMENT:
        return getChildrenOfType(scope, JavaLocalDeclarationNodes.RESOURCE_SPECIFICATION)
          .flatMap((spec) => getChildrenOfType(spec, JavaLocalDeclarationNodes.RESOURCE))
          .flatMap((resource) => this.nameOf(resource));

      default:
        return [];
    }
  }

  private parameterNames(parameters: Parser.SyntaxNode | null): string[] {
    if (!parameters) {
      return [];
    }
    // `x -> ...`
    if (parameters.type === JavaExpressionNodes.IDENTIFIER) {
      return [getNodeText(parameters, this.sourceCode)];
    }
    if (parameters.type === JavaLocalDeclarationNodes.INFERRED_PARAMETERS) {
      return getChildrenOfType(parameters, JavaExpressionNodes.IDENTIFIER)
        .map((identifier) => getNodeText(identifier, this.sourceCode));
    }
    return parameters.namedChildren.flatMap((parameter) => {
      if (parameter.type === JavaLocalDeclarationNodes.FORMAL_PARAMETER) {
        return this.nameOf(parameter);
      }
      if (parameter.type === JavaLocalDeclarationNodes.SPREAD_PARAMETER) {
        return this.declaratorNames(parameter);
      }
      return [];
    });
  }

  private declaratorNames(declaration: Parser.SyntaxNode): string[] {
    return getChildrenOfType(declaration, JavaMemberNodes.VARIABLE_DECLARATOR)
      .flatMap((declarator) => this.nameOf(declarator));
  }

  private nameOf(node: Parser.SyntaxNode): string[] {
    const name = node.childForFieldName('name');
    return name ? [getNodeText(name, this.sourceCode)] : [];
  }

  private indexTypeDeclarations(root: Parser.SyntaxNode): void {
    walkTree(root, (node) => {
      if (!TYPE_DECLARATION_TYPES.includes(node.type)) {
        return;
      }
      const key = nodeKey(node);
      const nameNode = node.childForFieldName('name');
      if (nameNode) {
        const name = getNodeText(nameNode, this.sourceCode);
        if (!this.typesByName.has(name)) {
          this.typesByName.set(name, key);
        }
      }
      this.fieldsByType.set(key, this.collectConstantFields(node));
    });
  }

  private collectConstantFields(declaration: Parser.SyntaxNode): Map<string, ConstantField> {
    const fields = new Map<string, ConstantField>();
    const body = declaration.childForFieldName('body');
    if (!body) {
      return fields;
    }

    const implicitlyFinal =
      declaration.type === JavaTypeDeclarationNodes.INTERFACE_DECLARATION ||
      declaration.type === JavaTypeDeclarationNodes.ANNOTATION_TYPE_DECLARATION;

    const members = [
      ...body.namedChildren,
      ...getChildrenOfType(body, JavaMemberNodes.ENUM_BODY_DECLARATIONS).flatMap((n) => n.namedChildren),
    ];

    for (const member of members) {
      if (
        member.type !== JavaMemberNodes.FIELD_DECLARATION &&
        member.type !== JavaMemberNodes.CONSTANT_DECLARATION
      ) {
        continue;
      }
      if (!implicitlyFinal && !this.hasModifier(member, 'final')) {
        continue;
      }
      const type = member.childForFieldName('type');
      if (!type || !STRING_TYPE_NAMES.has(getNodeText(type, this.sourceCode))) {
        continue;
      }
      for (const declarator of getChildrenOfType(member, JavaMemberNodes.VARIABLE_DECLARATOR)) {
        const name = declarator.childForFieldName('name');
        const value = declarator.childForFieldName('value');
        if (name && value) {
          fields.set(getNodeText(name, this.sourceCode), { key: nodeKey(declarator), value });
        }
      }
    }
    return fields;
  }

  private hasModifier(member: Parser.SyntaxNode, modifier: string): boolean {
    return getChildrenOfType(member, JavaMemberNodes.MODIFIERS).some((modifiers) =>
      modifiers.children.some((child) => child.type === modifier)
    );
  }
}
