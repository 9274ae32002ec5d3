/**
 * Validator registry for managing language validators.
 * New languages plug in by registering a factory for their extensions.
 */

import type { SupportedLanguage, ChainShapeOptions } from './semantic.types.js';
import type { ILanguageValidator, ValidatorFactory } from './interface.types.js';
import { DEFAULT_CHAIN_SHAPE } from './semantic.types.js';

/**
 * Validator registration info.
 */
interface ValidatorRegistration {
  factory: ValidatorFactory;
  languages: SupportedLanguage[];
  extensions: string[];
  /** Instances keyed by the chain shape they were created with */
  instances: Map<string, ILanguageValidator>;
}

/**
 * Registry for language validators.
 * Singleton pattern - one registry for the application.
 */
class ValidatorRegistry {
  private registrations = new Map<string, ValidatorRegistration>();
  private extensionMap = new Map<string, string>();

  /**
   * Register a language validator.
   *
   * @param id Unique identifier for the validator (e.g., 'java')
   * @param factory Factory function to create the validator
   * @param languages Languages this validator supports
   * @param extensions File extensions this validator handles
   */
  register(
    id: string,
    factory: ValidatorFactory,
    languages: SupportedLanguage[],
    extensions: string[]
  ): void {
    this.registrations.set(id, {
      factory,
      languages,
      extensions,
      instances: new Map(),
    });

    for (const ext of extensions) {
      this.extensionMap.set(ext.toLowerCase(), id);
    }
  }

  /**
   * Get a validator for a specific file extension.
   * Returns null if no validator is registered for the extension.
   */
  getForExtension(
    extension: string,
    options: ChainShapeOptions = DEFAULT_CHAIN_SHAPE
  ): ILanguageValidator | null {
    const id = this.extensionMap.get(extension.toLowerCase());
    return id ? this.getById(id, options) : null;
  }

  /**
   * Get a validator by ID.
   * Creates the instance lazily if not already created for these options.
   */
  getById(
    id: string,
    options: ChainShapeOptions = DEFAULT_CHAIN_SHAPE
  ): ILanguageValidator | null {
    const registration = this.registrations.get(id);

    if (!registration) {
      return null;
    }

    const key = JSON.stringify([options.matcherMethods, options.terminatorMethods]);
    let instance = registration.instances.get(key);
    if (!instance) {
      instance = registration.factory(options);
      registration.instances.set(key, instance);
    }
    return instance;
  }

  /**
   * Check if a file extension is supported.
   */
  isSupported(extension: string): boolean {
    return this.extensionMap.has(extension.toLowerCase());
  }

  /**
   * Get all supported extensions.
   */
  getSupportedExtensions(): string[] {
    return Array.from(this.extensionMap.keys());
  }

  /**
   * Get all registered validator IDs.
   */
  getRegisteredValidators(): string[] {
    return Array.from(this.registrations.keys());
  }

  /**
   * Dispose all validator instances.
   */
  disposeAll(): void {
    for (const registration of this.registrations.values()) {
      for (const instance of registration.instances.values()) {
        instance.dispose();
      }
      registration.instances.clear();
    }
  }

  /**
   * Clear all registrations.
   * Mainly for testing.
   */
  clear(): void {
    this.disposeAll();
    this.registrations.clear();
    this.extensionMap.clear();
  }
}

/**
 * Global validator registry instance.
 */
export const validatorRegistry = new ValidatorRegistry();

export type { ValidatorRegistry };
