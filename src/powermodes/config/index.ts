/**
 * Configuration Handling
 */

export * from './config-value.js';
export * from './key-order.js';
export * from './validation.js';
export * from './config-loader.js';
export * from './config-validator.js';
