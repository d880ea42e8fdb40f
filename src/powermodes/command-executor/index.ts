/**
 * Command Executor Component
 */

export * from './command-executor.js';
