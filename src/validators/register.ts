/**
 * Validator registration module.
 * Registers the built-in language validators with the registry.
 * Import this module to ensure validators are available before use.
 */

import { validatorRegistry } from './validator-registry.js';
import { JavaValidator } from './java.js';

validatorRegistry.register('java', (options) => new JavaValidator(options), ['java'], ['.java']);
