/**
 * powermodes
 *
 * Applies named power modes: each mode maps plugin identifiers to plugin
 * configuration, and every plugin controls one facet of the system's power
 * behaviour.
 */

export * from './types/index.js';
export * from './errors.js';
export * from './plugin/index.js';
export * from './config/index.js';
export * from './registry/index.js';
export * from './reporter/index.js';
export * from './command-executor/index.js';
export * from './mode-applier/index.js';
export * from './plugins/index.js';
