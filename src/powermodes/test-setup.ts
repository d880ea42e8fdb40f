/**
 * Property-Based Testing Setup
 *
 * Shared fast-check generators for configuration values, plugin identifiers
 * and modes, plus a recording plugin double.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import * as fc from 'fast-check';
import { ApplyError, ConfigError } from './errors.js';
import {
  APPLIED,
  applyFailed,
  configured,
  isSkipSentinel,
  rejected,
  skipped,
  type ApplyContext,
  type ApplyResult,
  type ConfigureResult,
  type Plugin,
  type ValidatedConfig,
} from './plugin/plugin.js';
import {
  describeKind,
  configBoolean,
  configInteger,
  configSequence,
  configString,
  configTable,
} from './config/config-value.js';
import type { ConfigTable, ConfigValue, ConfigValueKind } from './types/config-value.js';
import type { Mode } from './types/mode.js';

export const pluginIdArbitrary: fc.Arbitrary<string> = fc.stringMatching(/^[a-z_][a-z0-9_]{0,11}$/);

export const tableKeyArbitrary: fc.Arbitrary<string> = fc.stringMatching(/^[a-z][a-z0-9-]{0,9}$/);

const leafArbitrary: fc.Arbitrary<ConfigValue> = fc.oneof(
  fc.string({ maxLength: 16 }).map(configString),
  fc.integer({ min: -1_000_000, max: 1_000_000 }).map(configInteger),
  fc.boolean().map(configBoolean),
);

// Nested values up to `depth` levels
export const configValueArbitrary: (depth?: number) => fc.Arbitrary<ConfigValue> = fc.memo((depth) =>
  depth <= 1
    ? leafArbitrary
    : fc.oneof(
        leafArbitrary,
        fc.array(configValueArbitrary(depth - 1), { maxLength: 3 }).map(configSequence),
        fc
          .uniqueArray(fc.tuple(tableKeyArbitrary, configValueArbitrary(depth - 1)), {
            maxLength: 3,
            selector: ([key]) => key,
          })
          .map(configTable),
      ),
);

/** One command table with every field drawn independently */
export const commandTableArbitrary: fc.Arbitrary<ConfigTable> = fc
  .record(
    {
      command: fc.oneof(
        fc.string({ minLength: 1, maxLength: 20 }).map(configString),
        fc.array(fc.string({ minLength: 1, maxLength: 8 }).map(configString), { minLength: 1, maxLength: 4 }).map(configSequence),
      ),
      'allow-stdin': fc.boolean().map(configBoolean),
      'show-stdout': fc.boolean().map(configBoolean),
      'show-stderr': fc.boolean().map(configBoolean),
      'warning-on-failure': fc.boolean().map(configBoolean),
    },
    { requiredKeys: ['command'] },
  )
  .map((fields) => {
    const entries: Array<[string, ConfigValue]> = [];
    for (const [key, value] of Object.entries(fields)) {
      if (value !== undefined) {
        entries.push([key, value]);
      }
    }
    return configTable(entries);
  });

/**
 * Modes whose keys are drawn from `ids` (possibly repeated across modes, never
 * within one) with arbitrary values.
 */
export function modeArbitrary(ids: readonly string[], name = 'test'): fc.Arbitrary<Mode> {
  return fc
    .uniqueArray(fc.tuple(fc.constantFrom(...ids), configValueArbitrary(2)), {
      maxLength: ids.length,
      selector: ([id]) => id,
    })
    .map((entries) => ({ name, plugins: configTable(entries) }));
}

export interface RecordingPluginBehaviour {
  /** Value kinds `configure` accepts; any kind when absent */
  accepts?: ConfigValueKind[];
  throwOnConfigure?: string;
  failApply?: string;
  throwOnApply?: string;
  warnings?: string[];
  delayMs?: number;
  stateful?: boolean;
  /** Shared log of applied plugin names, in completion order */
  journal?: string[];
  name?: string;
}

/**
 * Plugin double recording every configure and apply call.
 */
export class RecordingPlugin implements Plugin<ConfigValue> {
  readonly version = '0.0.1';
  readonly description = 'records calls';
  readonly stateful?: boolean;
  readonly configureCalls: ConfigValue[] = [];
  readonly applyCalls: Array<ValidatedConfig<ConfigValue>> = [];

  constructor(private readonly behaviour: RecordingPluginBehaviour = {}) {
    this.stateful = behaviour.stateful;
  }

  configure(raw: ConfigValue): ConfigureResult<ConfigValue> {
    this.configureCalls.push(raw);
    if (this.behaviour.throwOnConfigure) {
      throw new Error(this.behaviour.throwOnConfigure);
    }
    if (isSkipSentinel(raw)) {
      return skipped();
    }
    const accepts = this.behaviour.accepts;
    if (accepts && !accepts.includes(raw.kind)) {
      return rejected(new ConfigError(`got ${describeKind(raw)}`));
    }
    return configured(raw);
  }

  async apply(config: ValidatedConfig<ConfigValue>, context: ApplyContext): Promise<ApplyResult> {
    this.applyCalls.push(config);
    if (this.behaviour.delayMs !== undefined) {
      await sleep(this.behaviour.delayMs);
    }
    for (const warning of this.behaviour.warnings ?? []) {
      context.warn(warning);
    }
    this.behaviour.journal?.push(this.behaviour.name ?? context.plugin);
    if (this.behaviour.throwOnApply) {
      throw new Error(this.behaviour.throwOnApply);
    }
    if (this.behaviour.failApply) {
      return applyFailed(new ApplyError(this.behaviour.failApply, { attempted: 'record' }));
    }
    return APPLIED;
  }
}
