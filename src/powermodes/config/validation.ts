/**
 * Configuration Validation Helpers
 *
 * Small checks shared by plugin `configure` implementations. Each throws a
 * ConfigError locating the offending value; `validateWith` turns that into a
 * ConfigureResult.
 */

import { ConfigError } from '../errors.js';
import { configured, rejected, type ConfigureResult } from '../plugin/plugin.js';
import type { ConfigSequence, ConfigTable, ConfigValue } from '../types/config-value.js';
import { describeKind } from './config-value.js';

export function validateWith<T>(build: () => T): ConfigureResult<T> {
  try {
    return configured(build());
  } catch (error) {
    if (error instanceof ConfigError) {
      return rejected(error);
    }
    throw error;
  }
}

export function fieldPath(path: string, key: string | number): string {
  if (typeof key === 'number') {
    return `${path}[${key}]`;
  }
  return path ? `${path}.${key}` : key;
}

export function expectTable(value: ConfigValue, path: string, what = 'value'): ConfigTable {
  if (value.kind !== 'table') {
    throw new ConfigError(`${what} must be a table, got ${describeKind(value)}`, { path });
  }
  return value;
}

export function expectSequence(value: ConfigValue, path: string, what = 'value'): ConfigSequence {
  if (value.kind !== 'sequence') {
    throw new ConfigError(`${what} must be a list, got ${describeKind(value)}`, { path });
  }
  return value;
}

export function expectBoolean(value: ConfigValue, path: string, what = 'value'): boolean {
  if (value.kind !== 'boolean') {
    throw new ConfigError(`${what} must be a boolean, got ${describeKind(value)}`, { path });
  }
  return value.value;
}

export function expectIntegerInRange(value: ConfigValue, min: number, max: number, path: string, what = 'value'): number {
  if (value.kind !== 'integer') {
    throw new ConfigError(`${what} must be an integer, got ${describeKind(value)}`, { path });
  }
  if (value.value < min || value.value > max) {
    throw new ConfigError(`${what} must be between ${min} and ${max}, got ${value.value}`, { path });
  }
  return value.value;
}

/**
 * Reads an optional boolean field, falling back to `fallback` when absent.
 */
export function optionalBoolean(table: ConfigTable, key: string, fallback: boolean, path: string): boolean {
  const value = table.entries.get(key);
  if (value === undefined) {
    return fallback;
  }
  return expectBoolean(value, fieldPath(path, key), `"${key}"`);
}

export function rejectUnknownKeys(table: ConfigTable, allowed: readonly string[], path: string): void {
  const unknown = [...table.entries.keys()].filter((key) => !allowed.includes(key));
  if (unknown.length > 0) {
    const list = unknown.map((key) => `"${key}"`).join(', ');
    throw new ConfigError(`unrecognized field${unknown.length > 1 ? 's' : ''} ${list}`, { path });
  }
}
