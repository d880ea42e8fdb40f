/**
 * Outcome Types
 *
 * Per-plugin and mode-level results of applying a mode.
 */

export type PluginOutcomeKind = 'success' | 'skipped' | 'config-error' | 'apply-error' | 'unknown-plugin';

export interface PluginOutcome {
  /** Plugin identifier as written in the mode */
  plugin: string;
  kind: PluginOutcomeKind;
  /** Error detail for the failure kinds */
  detail?: string;
  /** Non-fatal warnings the plugin reported while applying */
  warnings: string[];
  /** Time spent in configure + apply, in milliseconds */
  durationMs: number;
}

export type ModeStatus = 'success' | 'partial' | 'failed';

export interface ModeOutcome {
  mode: string;
  /** One entry per plugin key, in the mode's table order */
  outcomes: PluginOutcome[];
  /** True iff no counted failure occurred */
  success: boolean;
  status: ModeStatus;
}

const FAILURE_KINDS: ReadonlySet<PluginOutcomeKind> = new Set(['config-error', 'apply-error', 'unknown-plugin']);

export function isFailure(outcome: PluginOutcome): boolean {
  return FAILURE_KINDS.has(outcome.kind);
}
