/**
 * Built-in Plugins
 *
 * Loader for the plugins shipped with powermodes.
 */

import type { CommandExecutor } from '../command-executor/command-executor.js';
import { PluginRegistry } from '../registry/plugin-registry.js';
import { CommandPlugin } from './command/command-plugin.js';
import { IntelEpbPlugin } from './intel-epb/intel-epb-plugin.js';
import { NmiWatchdogPlugin } from './nmi-watchdog/nmi-watchdog-plugin.js';

export * from './command/index.js';
export * from './intel-epb/index.js';
export * from './nmi-watchdog/index.js';

export interface BuiltinRegistryOptions {
  executor?: CommandExecutor;
  /** Root that procfs and sysfs paths are resolved against */
  root?: string;
}

/**
 * Creates a sealed registry holding every built-in plugin.
 */
export function createBuiltinRegistry(options: BuiltinRegistryOptions = {}): PluginRegistry {
  return new PluginRegistry()
    .register('command', new CommandPlugin({ executor: options.executor }))
    .register('nmi_watchdog', new NmiWatchdogPlugin({ root: options.root }))
    .register('intel_epb', new IntelEpbPlugin({ root: options.root }))
    .seal();
}
