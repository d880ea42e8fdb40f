/**
 * Mode Applier Component
 */

export * from './mode-applier.js';
