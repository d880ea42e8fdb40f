import { describe, expect, it } from 'vitest';
import { PluginRegistry } from '../registry/plugin-registry.js';
import { RecordingPlugin } from '../test-setup.js';
import type { ConfigValue } from '../types/config-value.js';
import { configBoolean, configInteger, configString, configTableOf } from './config-value.js';
import { validateConfiguration } from './config-validator.js';

function buildRegistry() {
  const alpha = new RecordingPlugin({ accepts: ['boolean'], stateful: true });
  const beta = new RecordingPlugin({ accepts: ['boolean'] });
  const registry = new PluginRegistry().register('alpha', alpha).register('beta', beta);
  return { registry, alpha, beta };
}

function config(entries: Array<[string, ConfigValue]>) {
  return new Map(entries);
}

describe('validateConfiguration', () => {
  it('collects every problem without applying anything', () => {
    const { registry, alpha, beta } = buildRegistry();

    const report = validateConfiguration(
      config([
        ['quiet', configTableOf({ alpha: configBoolean(true), beta: configBoolean(true) })],
        ['loud', configTableOf({ beta: configInteger(3), ghost: configInteger(1) })],
        ['broken', configString('x')],
        ['empty', configTableOf({})],
      ]),
      registry,
    );

    expect(report.warnings.map((warning) => warning.message)).toEqual([
      'Mode "broken" must be a table, got a string. Ignoring it.',
      'Mode "empty" is empty. Ignoring it.',
      'Unknown plugin "ghost" in mode(s) "loud"',
      'Plugin "alpha" is not configured in mode(s) "loud". You may get a partially configured system while switching modes.',
    ]);
    expect(report.errors).toEqual([{ mode: 'loud', plugin: 'beta', message: 'beta in mode "loud": got an integer' }]);
    expect(report.usableModes).toEqual(['quiet']);
    expect(report.valid).toBe(false);
    expect(alpha.applyCalls).toHaveLength(0);
    expect(beta.applyCalls).toHaveLength(0);
  });

  it('accepts a consistent configuration', () => {
    const { registry } = buildRegistry();

    const report = validateConfiguration(
      config([
        ['quiet', configTableOf({ alpha: configBoolean(false) })],
        ['loud', configTableOf({ alpha: configBoolean(true), beta: configString('skip') })],
      ]),
      registry,
    );

    expect(report).toEqual({ valid: true, usableModes: ['quiet', 'loud'], warnings: [], errors: [] });
  });

  it('lists every mode that references an unknown plugin', () => {
    const { registry } = buildRegistry();

    const report = validateConfiguration(
      config([
        ['a', configTableOf({ ghost: configBoolean(true) })],
        ['b', configTableOf({ ghost: configBoolean(false) })],
      ]),
      registry,
    );

    expect(report.warnings).toEqual([{ plugin: 'ghost', message: 'Unknown plugin "ghost" in mode(s) "a", "b"' }]);
    expect(report.valid).toBe(true);
  });

  it('is invalid without any usable mode', () => {
    const { registry } = buildRegistry();

    const report = validateConfiguration(config([['broken', configBoolean(true)]]), registry);

    expect(report.valid).toBe(false);
    expect(report.usableModes).toEqual([]);
    expect(report.errors).toEqual([]);
  });

  it('records a throwing configure as an error', () => {
    const registry = new PluginRegistry().register('alpha', new RecordingPlugin({ throwOnConfigure: 'boom' }));

    const report = validateConfiguration(config([['m', configTableOf({ alpha: configBoolean(true) })]]), registry);

    expect(report.errors.map((error) => error.message)).toEqual(['alpha in mode "m": plugin threw: boom']);
    expect(report.valid).toBe(false);
  });
});
