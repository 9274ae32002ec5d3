/**
 * Java validator using tree-sitter for AST analysis.
 * Produces a SourceModel of the Spring Security rule chains in a file.
 */
import * as path from 'node:path';
import type Parser from 'tree-sitter';
import type { ILanguageValidator } from './interface.types.js';
import type {
  ChainShapeOptions,
  SourceModel,
  SupportedLanguage,
} from './semantic.types.js';
import { DEFAULT_CHAIN_SHAPE } from './semantic.types.js';
import { createJavaParser, extractJavaSecurityModel } from './tree-sitter/java-ast.js';
import { readFile } from '../utils/file-system.js';

export class JavaValidator implements ILanguageValidator {
  readonly supportedLanguages: SupportedLanguage[] = ['java'];
  readonly supportedExtensions = ['.java'];

  private parser: Parser | null = null;

  constructor(private readonly options: ChainShapeOptions = DEFAULT_CHAIN_SHAPE) {}

  async parseFile(filePath: string, content?: string): Promise<SourceModel> {
    const sourceCode = content ?? await readFile(filePath);
    return extractJavaSecurityModel(
      this.getParser(),
      sourceCode,
      filePath,
      path.basename(filePath),
      path.extname(filePath),
      this.options
    );
  }

  dispose(): void {
    this.parser = null;
  }

  private getParser(): Parser {
    this.parser ??= createJavaParser();
    return this.parser;
  }
}
