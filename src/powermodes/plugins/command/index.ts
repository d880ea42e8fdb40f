export * from './command-plugin.js';
