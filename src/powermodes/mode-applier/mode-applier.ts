/**
 * Mode Applier
 *
 * Drives one mode application: resolves every plugin key of the mode through
 * the registry, configures each plugin with its value, applies the ones that
 * configured successfully and aggregates the per-plugin outcomes.
 *
 * A failing plugin never stops the others. No order is promised between
 * distinct plugins' apply steps; with the default `parallel` strategy they
 * run concurrently.
 */

import { EventEmitter } from 'node:events';
import { performance } from 'node:perf_hooks';
import { ApplyError, ConfigError, UnknownPluginError, describeError } from '../errors.js';
import type { ApplyContext, ApplyResult, ConfigureResult, Plugin, ValidatedConfig } from '../plugin/plugin.js';
import type { PluginRegistry } from '../registry/plugin-registry.js';
import type { OutcomeReporter } from '../reporter/outcome-reporter.js';
import type { ConfigValue } from '../types/config-value.js';
import type { Mode } from '../types/mode.js';
import { isFailure, type ModeOutcome, type ModeStatus, type PluginOutcome } from '../types/outcome.js';
import { createSubsystemLogger } from '../../logging/subsystem.js';

export type ApplyStrategy = 'parallel' | 'sequential';

export interface ModeApplierOptions {
  strategy: ApplyStrategy;
}

interface PendingApply {
  index: number;
  id: string;
  plugin: Plugin;
  config: ValidatedConfig<unknown>;
  startedAt: number;
}

export function resolveModeStatus(outcomes: readonly PluginOutcome[]): ModeStatus {
  const failures = outcomes.filter(isFailure).length;
  if (failures === 0) {
    return 'success';
  }
  return failures < outcomes.length ? 'partial' : 'failed';
}

export class ModeApplier extends EventEmitter {
  private readonly options: ModeApplierOptions;
  private readonly logger = createSubsystemLogger('powermodes/applier');

  constructor(
    private readonly registry: PluginRegistry,
    private readonly reporter: OutcomeReporter,
    options: Partial<ModeApplierOptions> = {},
  ) {
    super();
    this.options = {
      strategy: 'parallel',
      ...options,
    };
  }

  async applyMode(mode: Mode): Promise<ModeOutcome> {
    const entries = [...mode.plugins.entries];
    const outcomes: Array<PluginOutcome | undefined> = new Array(entries.length);
    const pending: PendingApply[] = [];

    this.logger.info('Applying mode', {
      mode: mode.name,
      plugins: entries.map(([id]) => id),
      strategy: this.options.strategy,
    });

    entries.forEach(([id, raw], index) => {
      const startedAt = performance.now();
      const plugin = this.registry.resolve(id);
      if (!plugin) {
        const error = new UnknownPluginError(id);
        this.logger.warn('Unknown plugin', { plugin: id, mode: mode.name });
        outcomes[index] = this.finish(id, 'unknown-plugin', startedAt, [], error.message);
        return;
      }

      const result = this.configurePlugin(id, plugin, raw);
      if (!result.ok) {
        outcomes[index] = this.finish(id, 'config-error', startedAt, [], result.error.detail);
        return;
      }

      pending.push({ index, id, plugin, config: result.config, startedAt });
    });

    const run = (item: PendingApply) =>
      this.applyPlugin(mode.name, item).then((outcome) => {
        outcomes[item.index] = outcome;
      });

    if (this.options.strategy === 'parallel') {
      await Promise.all(pending.map(run));
    } else {
      for (const item of pending) {
        await run(item);
      }
    }

    const ordered = outcomes.filter((outcome): outcome is PluginOutcome => outcome !== undefined);
    for (const outcome of ordered) {
      if (isFailure(outcome)) {
        this.reporter.failure(outcome.plugin, outcome);
      }
    }

    const status = resolveModeStatus(ordered);
    const modeOutcome: ModeOutcome = {
      mode: mode.name,
      outcomes: ordered,
      success: status === 'success',
      status,
    };

    this.reporter.summary(modeOutcome);
    this.emit('modeApplied', modeOutcome);
    this.logger.info('Mode applied', {
      mode: mode.name,
      status,
      failures: ordered.filter(isFailure).map((outcome) => outcome.plugin),
    });

    return modeOutcome;
  }

  private configurePlugin(id: string, plugin: Plugin, raw: ConfigValue): ConfigureResult<unknown> {
    try {
      return plugin.configure(raw);
    } catch (error) {
      this.logger.error('Plugin configure threw', { plugin: id, error: describeError(error) });
      return { ok: false, error: new ConfigError(`plugin threw: ${describeError(error)}`, { plugin: id }) };
    }
  }

  private async applyPlugin(mode: string, item: PendingApply): Promise<PluginOutcome> {
    const warnings: string[] = [];
    const context: ApplyContext = {
      plugin: item.id,
      mode,
      logger: this.logger.child(item.id),
      warn: (detail) => {
        warnings.push(detail);
        this.reporter.warning(item.id, detail);
      },
    };

    let result: ApplyResult;
    try {
      result = await item.plugin.apply(item.config, context);
    } catch (error) {
      const attempted = `apply ${item.id}`;
      result = {
        ok: false,
        error: error instanceof ApplyError ? error : new ApplyError(`plugin threw: ${describeError(error)}`, { attempted, cause: error }),
      };
    }

    if (!result.ok) {
      return this.finish(item.id, 'apply-error', item.startedAt, warnings, describeError(result.error));
    }
    const kind = item.config.state === 'skipped' ? 'skipped' : 'success';
    return this.finish(item.id, kind, item.startedAt, warnings);
  }

  private finish(
    plugin: string,
    kind: PluginOutcome['kind'],
    startedAt: number,
    warnings: string[],
    detail?: string,
  ): PluginOutcome {
    const outcome: PluginOutcome = {
      plugin,
      kind,
      warnings,
      durationMs: Math.round((performance.now() - startedAt) * 10) / 10,
      ...(detail === undefined ? {} : { detail }),
    };
    this.emit('pluginOutcome', outcome);
    return outcome;
  }
}

/**
 * Applies `mode` with plugins from `registry`, reporting to `reporter`.
 */
export function applyMode(
  mode: Mode,
  registry: PluginRegistry,
  reporter: OutcomeReporter,
  options?: Partial<ModeApplierOptions>,
): Promise<ModeOutcome> {
  return new ModeApplier(registry, reporter, options).applyMode(mode);
}
