/**
 * pathorder - URL pattern order checks for Spring Security configuration.
 * Main library exports barrel file.
 */

// Ordering analysis
export * from './core/ordering/index.js';

// Configuration
export * from './core/config/index.js';

// Analysis engine
export * from './core/analysis/index.js';

// Validators
export * from './validators/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
