/**
 * URL pattern ordering barrel file.
 */
export * from './types.js';
export * from './ant-pattern.js';
export * from './chain-walker.js';
export * from './order-analyzer.js';
