/**
 * Plugin Registry Component
 */

export * from './plugin-registry.js';
