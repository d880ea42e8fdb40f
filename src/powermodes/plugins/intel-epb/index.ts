export * from './intel-epb-plugin.js';
