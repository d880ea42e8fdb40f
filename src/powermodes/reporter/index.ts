/**
 * Outcome Reporter Component
 */

export * from './outcome-reporter.js';
