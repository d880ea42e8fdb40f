/**
 * NMI Watchdog Plugin
 *
 * Enables or disables the kernel's non-maskable interrupt watchdog. Disabling
 * it saves a little power on laptops.
 */

import { ApplyError, ConfigError } from '../../errors.js';
import {
  APPLIED,
  applyFailed,
  configured,
  isSkipSentinel,
  rejected,
  skipped,
  SKIP_SENTINEL,
  type ApplyContext,
  type ApplyResult,
  type ConfigureResult,
  type Plugin,
  type ValidatedConfig,
} from '../../plugin/plugin.js';
import { configBoolean, configString, describeKind } from '../../config/config-value.js';
import type { ConfigValue } from '../../types/config-value.js';
import { promptSelect } from '../../../terminal/prompt-select.js';
import { kernelPath, writeKernelValue } from '../sysfs.js';

export const NMI_WATCHDOG_FILE = '/proc/sys/kernel/nmi_watchdog';

export interface NmiWatchdogPluginOptions {
  /** Filesystem root the kernel interface lives under */
  root?: string;
}

export class NmiWatchdogPlugin implements Plugin<boolean> {
  readonly version = '1.0.0';
  readonly description = 'Enables or disables the NMI watchdog';
  readonly stateful = true;

  private readonly file: string;

  constructor(options: NmiWatchdogPluginOptions = {}) {
    this.file = kernelPath(options.root ?? '/', NMI_WATCHDOG_FILE);
  }

  configure(raw: ConfigValue): ConfigureResult<boolean> {
    if (isSkipSentinel(raw)) {
      return skipped();
    }
    if (raw.kind === 'boolean') {
      return configured(raw.value);
    }
    return rejected(new ConfigError(`expected a boolean or "${SKIP_SENTINEL}", got ${describeKind(raw)}`));
  }

  async apply(config: ValidatedConfig<boolean>, context: ApplyContext): Promise<ApplyResult> {
    if (config.state === 'skipped') {
      return APPLIED;
    }

    const action = config.value ? 'enable' : 'disable';
    try {
      writeKernelValue(this.file, config.value ? '1\n' : '0\n', `Failed to ${action} NMI watchdog`);
    } catch (error) {
      if (error instanceof ApplyError) {
        return applyFailed(error);
      }
      throw error;
    }

    context.logger.info(`NMI watchdog ${action}d`, { file: this.file });
    return APPLIED;
  }

  async interact(): Promise<ConfigValue> {
    const choice = await promptSelect('NMI watchdog', [
      { value: 'enable', label: 'Enable' },
      { value: 'disable', label: 'Disable', hint: 'saves power' },
      { value: SKIP_SENTINEL, label: 'Leave unchanged' },
    ]);
    return choice === SKIP_SENTINEL ? configString(SKIP_SENTINEL) : configBoolean(choice === 'enable');
  }
}
