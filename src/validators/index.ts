/**
 * Language validator exports barrel file.
 */

// Core types
export * from './semantic.types.js';
export * from './interface.types.js';

// Validator registry
export * from './validator-registry.js';

// Built-in validators
export * from './java.js';
export * from './tree-sitter/java-ast.js';
export * from './tree-sitter/java-constants.js';

// Registration (ensures validators are registered when barrel is imported)
import './register.js';
