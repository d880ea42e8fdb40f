/**
 * Plugin Contract
 *
 * Every handler for one facet of power configuration implements this
 * interface. `configure` is pure and validates an untyped value; `apply`
 * performs the side effect for a value its own `configure` produced.
 */

import type { ConfigError, ApplyError } from '../errors.js';
import type { SubsystemLogger } from '../../logging/subsystem.js';
import type { ConfigValue } from '../types/config-value.js';

/** Reserved string meaning "leave this facet as it currently is" */
export const SKIP_SENTINEL = 'skip';

export type ValidatedConfig<T> =
  | { readonly state: 'configured'; readonly value: T }
  | { readonly state: 'skipped' };

export type ConfigureResult<T> =
  | { readonly ok: true; readonly config: ValidatedConfig<T> }
  | { readonly ok: false; readonly error: ConfigError };

export type ApplyResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: ApplyError };

export interface ApplyContext {
  /** Identifier the plugin is registered under */
  readonly plugin: string;
  /** Name of the mode being applied */
  readonly mode: string;
  /** Reports a non-fatal warning through the outcome reporter */
  warn(detail: string): void;
  readonly logger: SubsystemLogger;
}

export interface Plugin<TConfig = unknown> {
  readonly version: string;
  readonly description: string;
  /**
   * Set by plugins that manage persistent OS state; validation warns when
   * such a plugin is missing from some modes.
   */
  readonly stateful?: boolean;

  configure(raw: ConfigValue): ConfigureResult<TConfig>;

  apply(config: ValidatedConfig<TConfig>, context: ApplyContext): Promise<ApplyResult>;

  /** Optional interactive flow producing a value to feed into `configure` */
  interact?(): Promise<ConfigValue>;
}

export function configured<T>(value: T): ConfigureResult<T> {
  return { ok: true, config: { state: 'configured', value } };
}

export function skipped<T>(): ConfigureResult<T> {
  return { ok: true, config: { state: 'skipped' } };
}

export function rejected<T>(error: ConfigError): ConfigureResult<T> {
  return { ok: false, error };
}

export const APPLIED: ApplyResult = { ok: true };

export function applyFailed(error: ApplyError): ApplyResult {
  return { ok: false, error };
}

export function isSkipSentinel(raw: ConfigValue): boolean {
  return raw.kind === 'string' && raw.value === SKIP_SENTINEL;
}
