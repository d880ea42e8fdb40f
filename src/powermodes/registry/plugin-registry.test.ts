import * as fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { RegistryError } from '../errors.js';
import { pluginIdArbitrary, RecordingPlugin } from '../test-setup.js';
import { configBoolean } from '../config/config-value.js';
import { isValidPluginId, PluginRegistry } from './plugin-registry.js';

class InteractivePlugin extends RecordingPlugin {
  async interact() {
    return configBoolean(true);
  }
}

function registryError(run: () => unknown): RegistryError {
  try {
    run();
  } catch (error) {
    if (error instanceof RegistryError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a RegistryError');
}

describe('PluginRegistry', () => {
  it('resolves registered plugins by exact identifier', () => {
    const plugin = new RecordingPlugin();
    const registry = new PluginRegistry().register('nmi_watchdog', plugin);

    expect(registry.resolve('nmi_watchdog')).toBe(plugin);
    expect(registry.resolve('NMI_watchdog')).toBeUndefined();
    expect(registry.resolve('missing')).toBeUndefined();
    expect(registry.has('nmi_watchdog')).toBe(true);
  });

  it('rejects a second plugin under the same identifier', () => {
    const registry = new PluginRegistry().register('command', new RecordingPlugin());

    const error = registryError(() => registry.register('command', new RecordingPlugin()));

    expect(error.code).toBe('REGISTRY_CONFLICT');
    expect(error.message).toBe('Plugin "command" is already registered');
    expect(registry.size).toBe(1);
  });

  it('rejects malformed identifiers', () => {
    const registry = new PluginRegistry();

    expect(registryError(() => registry.register('1abc', new RecordingPlugin())).code).toBe('REGISTRY_INVALID_ID');
    expect(registryError(() => registry.register('nmi-watchdog', new RecordingPlugin())).code).toBe(
      'REGISTRY_INVALID_ID',
    );
  });

  it('refuses registration once sealed', () => {
    const registry = new PluginRegistry().register('alpha', new RecordingPlugin()).seal();

    expect(registry.isSealed()).toBe(true);
    expect(registryError(() => registry.register('beta', new RecordingPlugin())).code).toBe('REGISTRY_SEALED');
    expect(registry.resolve('alpha')).toBeDefined();
  });

  it('lists descriptors in registration order', () => {
    const registry = new PluginRegistry()
      .register('zeta', new RecordingPlugin())
      .register('alpha', new InteractivePlugin());

    expect(registry.list().map(({ id, interactive }) => [id, interactive])).toEqual([
      ['zeta', false],
      ['alpha', true],
    ]);
    expect(registry.describe('alpha')?.plugin.version).toBe('0.0.1');
  });
});

describe('isValidPluginId', () => {
  it('accepts letters, digits and underscores without a leading digit', () => {
    expect(isValidPluginId('intel_epb')).toBe(true);
    expect(isValidPluginId('_private2')).toBe(true);
    expect(isValidPluginId('2fast')).toBe(false);
    expect(isValidPluginId('')).toBe(false);
    expect(isValidPluginId('with space')).toBe(false);
  });
});

describe('PluginRegistry properties', () => {
  it('resolves every well-formed identifier it registered', () => {
    fc.assert(
      fc.property(fc.uniqueArray(pluginIdArbitrary, { maxLength: 8 }), (ids) => {
        const registry = new PluginRegistry();
        const plugins = ids.map((id) => {
          const plugin = new RecordingPlugin();
          registry.register(id, plugin);
          return plugin;
        });

        ids.forEach((id, index) => expect(registry.resolve(id)).toBe(plugins[index]));
        expect(registry.size).toBe(ids.length);
      }),
    );
  });
});
