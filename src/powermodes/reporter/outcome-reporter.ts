/**
 * Outcome Reporter
 *
 * Receives warnings, per-plugin failures and the mode summary from the mode
 * applier. The console reporter renders them for an operator; the collecting
 * reporter keeps them for inspection.
 */

import { logError, logSuccess, logWarn } from '../../logger.js';
import { defaultRuntime, type RuntimeEnv } from '../../runtime.js';
import type { ModeOutcome, PluginOutcome } from '../types/outcome.js';
import { isFailure } from '../types/outcome.js';

export interface OutcomeReporter {
  warning(plugin: string, detail: string): void;
  failure(plugin: string, outcome: PluginOutcome): void;
  summary(outcome: ModeOutcome): void;
}

export function formatFailure(outcome: PluginOutcome): string {
  return `${outcome.plugin} error: ${outcome.detail ?? outcome.kind}`;
}

export function formatSummary(outcome: ModeOutcome): string {
  switch (outcome.status) {
    case 'success':
      return `Mode "${outcome.mode}" applied`;
    case 'partial': {
      const failed = outcome.outcomes.filter(isFailure).length;
      return `Mode "${outcome.mode}" partially applied (${failed} of ${outcome.outcomes.length} plugins failed)`;
    }
    case 'failed':
      return `Mode "${outcome.mode}" failed`;
  }
}

export class ConsoleOutcomeReporter implements OutcomeReporter {
  constructor(private readonly runtime: RuntimeEnv = defaultRuntime) {}

  warning(plugin: string, detail: string): void {
    logWarn(`${plugin} warning: ${detail}`, this.runtime);
  }

  failure(_plugin: string, outcome: PluginOutcome): void {
    logError(formatFailure(outcome), this.runtime);
  }

  summary(outcome: ModeOutcome): void {
    const line = formatSummary(outcome);
    if (outcome.status === 'success') {
      logSuccess(line, this.runtime);
    } else if (outcome.status === 'partial') {
      logWarn(line, this.runtime);
    } else {
      logError(line, this.runtime);
    }
  }
}

export type ReportedEvent =
  | { type: 'warning'; plugin: string; detail: string }
  | { type: 'failure'; plugin: string; outcome: PluginOutcome }
  | { type: 'summary'; outcome: ModeOutcome };

export class CollectingOutcomeReporter implements OutcomeReporter {
  readonly events: ReportedEvent[] = [];

  warning(plugin: string, detail: string): void {
    this.events.push({ type: 'warning', plugin, detail });
  }

  failure(plugin: string, outcome: PluginOutcome): void {
    this.events.push({ type: 'failure', plugin, outcome });
  }

  summary(outcome: ModeOutcome): void {
    this.events.push({ type: 'summary', outcome });
  }

  warnings(plugin?: string): string[] {
    return this.events.flatMap((event) =>
      event.type === 'warning' && (plugin === undefined || event.plugin === plugin) ? [event.detail] : [],
    );
  }

  failures(): PluginOutcome[] {
    return this.events.flatMap((event) => (event.type === 'failure' ? [event.outcome] : []));
  }
}
