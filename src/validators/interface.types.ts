/**
 * Language validator interface definition.
 */

import type {
  SourceModel,
  SupportedLanguage,
  ChainShapeOptions,
} from './semantic.types.js';

/**
 * Language validator interface.
 *
 * Produces a SourceModel; the ordering analysis runs on the model, not on
 * the language-specific AST.
 */
export interface ILanguageValidator {
  /** Languages this validator supports */
  readonly supportedLanguages: SupportedLanguage[];

  /** File extensions this validator handles */
  readonly supportedExtensions: string[];

  /**
   * Parse a source file into a SourceModel.
   * @param filePath Path to the file
   * @param content Optional pre-loaded content to avoid re-reading from disk
   */
  parseFile(filePath: string, content?: string): Promise<SourceModel>;

  /**
   * Release resources.
   */
  dispose(): void;
}

/**
 * Factory function for creating validators.
 * Used for lazy instantiation.
 */
export type ValidatorFactory = (options: ChainShapeOptions) => ILanguageValidator;
