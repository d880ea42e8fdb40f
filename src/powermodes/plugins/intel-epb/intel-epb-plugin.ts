/**
 * Intel EPB Plugin
 *
 * Sets the Intel Performance and Energy Bias Hint on every CPU that exposes
 * it. 0 favours performance, 15 favours energy saving.
 */

import { existsSync, readdirSync } from 'node:fs';
import path from 'node:path';
import { ApplyError, ConfigError } from '../../errors.js';
import {
  APPLIED,
  applyFailed,
  isSkipSentinel,
  skipped,
  SKIP_SENTINEL,
  type ApplyContext,
  type ApplyResult,
  type ConfigureResult,
  type Plugin,
  type ValidatedConfig,
} from '../../plugin/plugin.js';
import { configString, describeKind } from '../../config/config-value.js';
import { expectIntegerInRange, validateWith } from '../../config/validation.js';
import type { ConfigValue } from '../../types/config-value.js';
import { promptSelect } from '../../../terminal/prompt-select.js';
import { kernelPath, writeKernelValue } from '../sysfs.js';

export const CPU_DIRECTORY = '/sys/devices/system/cpu';
export const EPB_MIN = 0;
export const EPB_MAX = 15;

export const EPB_TOKENS: Readonly<Record<string, number>> = {
  performance: 0,
  'balance-performance': 4,
  normal: 6,
  default: 6,
  'normal-powersave': 7,
  'balance-power': 8,
  power: 15,
};

const CPU_ENTRY = /^cpu(\d+)$/;

export interface EpbTarget {
  cpu: string;
  file: string;
}

export interface IntelEpbPluginOptions {
  root?: string;
}

function describeAccepted(): string {
  const tokens = Object.keys(EPB_TOKENS)
    .map((token) => `"${token}"`)
    .join(', ');
  return `an integer between ${EPB_MIN} and ${EPB_MAX}, "${SKIP_SENTINEL}" or one of ${tokens}`;
}

export class IntelEpbPlugin implements Plugin<number> {
  readonly version = '1.0.0';
  readonly description = 'Sets the Intel Performance and Energy Bias Hint';
  readonly stateful = true;

  private readonly cpuDirectory: string;

  constructor(options: IntelEpbPluginOptions = {}) {
    this.cpuDirectory = kernelPath(options.root ?? '/', CPU_DIRECTORY);
  }

  configure(raw: ConfigValue): ConfigureResult<number> {
    if (isSkipSentinel(raw)) {
      return skipped();
    }
    return validateWith(() => {
      if (raw.kind === 'integer') {
        return expectIntegerInRange(raw, EPB_MIN, EPB_MAX, '', 'EPB value');
      }
      const token = raw.kind === 'string' && Object.hasOwn(EPB_TOKENS, raw.value) ? EPB_TOKENS[raw.value] : undefined;
      if (token !== undefined) {
        return token;
      }
      const got = raw.kind === 'string' ? `"${raw.value}"` : describeKind(raw);
      throw new ConfigError(`expected ${describeAccepted()}, got ${got}`);
    });
  }

  /**
   * Lists the CPUs in numeric order, splitting them by whether they expose an
   * EPB attribute.
   */
  listTargets(): { supported: EpbTarget[]; unsupported: string[] } {
    let entries: string[];
    try {
      entries = readdirSync(this.cpuDirectory);
    } catch (error) {
      throw new ApplyError('No CPUs detected', { attempted: `list ${this.cpuDirectory}`, cause: error });
    }

    const cpus = entries
      .map((entry) => CPU_ENTRY.exec(entry))
      .filter((match): match is RegExpExecArray => match !== null)
      .sort((a, b) => Number(a[1]) - Number(b[1]))
      .map((match) => match[0]);

    const supported: EpbTarget[] = [];
    const unsupported: string[] = [];
    for (const cpu of cpus) {
      const file = path.join(this.cpuDirectory, cpu, 'power', 'energy_perf_bias');
      if (existsSync(file)) {
        supported.push({ cpu, file });
      } else {
        unsupported.push(cpu);
      }
    }
    return { supported, unsupported };
  }

  async apply(config: ValidatedConfig<number>, context: ApplyContext): Promise<ApplyResult> {
    if (config.state === 'skipped') {
      return APPLIED;
    }

    let targets: { supported: EpbTarget[]; unsupported: string[] };
    try {
      targets = this.listTargets();
    } catch (error) {
      if (error instanceof ApplyError) {
        return applyFailed(error);
      }
      throw error;
    }

    const { supported, unsupported } = targets;
    if (supported.length === 0) {
      return applyFailed(
        new ApplyError(unsupported.length === 0 ? 'No CPUs detected' : 'EPB is not supported in this system', {
          attempted: `set EPB ${config.value}`,
        }),
      );
    }
    if (unsupported.length > 0) {
      context.warn(`The following CPUs don't support EPB: ${unsupported.join(', ')}`);
    }

    const failures: ApplyError[] = [];
    for (const target of supported) {
      try {
        writeKernelValue(target.file, `${config.value}\n`, `Failed to set Intel EPB for ${target.cpu}`);
      } catch (error) {
        if (!(error instanceof ApplyError)) {
          throw error;
        }
        failures.push(error);
      }
    }

    if (failures.length === supported.length) {
      return applyFailed(
        new ApplyError(failures.map((failure) => failure.message).join('; '), {
          attempted: `set EPB ${config.value} on ${supported.length} CPU(s)`,
        }),
      );
    }
    for (const failure of failures) {
      context.warn(failure.message);
    }

    context.logger.info('Intel EPB set', { value: config.value, cpus: supported.length - failures.length });
    return APPLIED;
  }

  async interact(): Promise<ConfigValue> {
    const choice = await promptSelect('Intel EPB', [
      ...Object.entries(EPB_TOKENS)
        .filter(([token]) => token !== 'default')
        .map(([token, value]) => ({ value: token, label: token, hint: String(value) })),
      { value: SKIP_SENTINEL, label: 'Leave unchanged' },
    ]);
    return configString(choice);
  }
}
