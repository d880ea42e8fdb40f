export * from './nmi-watchdog-plugin.js';
