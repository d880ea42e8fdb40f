/**
 * Plugin Registry
 *
 * Maps plugin identifiers used in configuration files to plugin instances.
 * Populated once by a loader, sealed, then only read.
 */

import { RegistryError } from '../errors.js';
import type { Plugin } from '../plugin/plugin.js';
import { createSubsystemLogger } from '../../logging/subsystem.js';

/** Letters, digits (never first) and underscores */
export const PLUGIN_ID_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export interface PluginDescriptor {
  id: string;
  plugin: Plugin;
  /** Whether the plugin offers an interactive configuration flow */
  interactive: boolean;
}

export function isValidPluginId(id: string): boolean {
  return PLUGIN_ID_PATTERN.test(id);
}

export class PluginRegistry {
  private readonly plugins = new Map<string, PluginDescriptor>();
  private sealed = false;
  private readonly logger = createSubsystemLogger('powermodes/registry');

  /**
   * Registers a plugin under `id`. Fails for malformed or duplicate ids and
   * after the registry was sealed.
   */
  register<T>(id: string, plugin: Plugin<T>): this {
    if (this.sealed) {
      throw new RegistryError('REGISTRY_SEALED', `Cannot register "${id}": registry is sealed`, id);
    }
    if (!isValidPluginId(id)) {
      throw new RegistryError(
        'REGISTRY_INVALID_ID',
        `Invalid plugin identifier "${id}" (letters, digits and underscores; no leading digit)`,
        id,
      );
    }
    if (this.plugins.has(id)) {
      throw new RegistryError('REGISTRY_CONFLICT', `Plugin "${id}" is already registered`, id);
    }

    this.plugins.set(id, { id, plugin, interactive: typeof plugin.interact === 'function' });
    this.logger.debug('Plugin registered', { id, version: plugin.version });
    return this;
  }

  /** Exact, case-sensitive lookup */
  resolve(id: string): Plugin | undefined {
    return this.plugins.get(id)?.plugin;
  }

  has(id: string): boolean {
    return this.plugins.has(id);
  }

  describe(id: string): PluginDescriptor | undefined {
    return this.plugins.get(id);
  }

  /** Descriptors in registration order */
  list(): PluginDescriptor[] {
    return [...this.plugins.values()];
  }

  get size(): number {
    return this.plugins.size;
  }

  seal(): this {
    this.sealed = true;
    return this;
  }

  isSealed(): boolean {
    return this.sealed;
  }
}
