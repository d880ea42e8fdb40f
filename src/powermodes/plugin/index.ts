/**
 * Plugin Contract
 */

export * from './plugin.js';
