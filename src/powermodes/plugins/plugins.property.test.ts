/**
 * Property tests shared by every built-in plugin.
 */

import * as fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import type { CommandExecutor } from '../command-executor/command-executor.js';
import { configValueArbitrary } from '../test-setup.js';
import { createBuiltinRegistry } from './index.js';

const executor: CommandExecutor = {
  run: () => Promise.reject(new Error('configure must not run commands')),
};

describe('built-in plugins', () => {
  const registry = createBuiltinRegistry({ executor, root: '/nonexistent-powermodes-root' });

  it('registers the shipped plugins and seals the registry', () => {
    expect(registry.list().map(({ id }) => id)).toEqual(['command', 'nmi_watchdog', 'intel_epb']);
    expect(registry.isSealed()).toBe(true);
  });

  it('configure is total and deterministic for any value', () => {
    fc.assert(
      fc.property(configValueArbitrary(3), (raw) => {
        for (const { plugin } of registry.list()) {
          const first = plugin.configure(raw);
          expect(plugin.configure(raw)).toEqual(first);
        }
      }),
      { numRuns: 200 },
    );
  });

  it('accepts the skip sentinel only for stateful plugins', () => {
    const skip = { kind: 'string', value: 'skip' } as const;

    expect(registry.list().map(({ id, plugin }) => [id, plugin.configure(skip).ok])).toEqual([
      ['command', false],
      ['nmi_watchdog', true],
      ['intel_epb', true],
    ]);
  });
});
