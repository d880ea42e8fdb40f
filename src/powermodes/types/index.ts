/**
 * Power Modes - Type Definitions
 */

export * from './config-value.js';
export * from './mode.js';
export * from './outcome.js';
