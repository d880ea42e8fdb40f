/**
 * Configuration Value Helpers
 *
 * Builders for the ConfigValue union, conversion from a parsed TOML tree and
 * back to plain data for display.
 */

import { ConfigFileError } from '../errors.js';
import type {
  ConfigBoolean,
  ConfigInteger,
  ConfigSequence,
  ConfigString,
  ConfigTable,
  ConfigValue,
  ConfigValueKind,
} from '../types/config-value.js';
import { keyOrderPath, type KeyOrder } from './key-order.js';

export function configString(value: string): ConfigString {
  return { kind: 'string', value };
}

export function configInteger(value: number): ConfigInteger {
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`${value} is not a safe integer`);
  }
  return { kind: 'integer', value };
}

export function configBoolean(value: boolean): ConfigBoolean {
  return { kind: 'boolean', value };
}

export function configSequence(items: readonly ConfigValue[]): ConfigSequence {
  return { kind: 'sequence', items: [...items] };
}

export function configTable(entries: Iterable<readonly [string, ConfigValue]>): ConfigTable {
  const map = new Map<string, ConfigValue>();
  for (const [key, value] of entries) {
    if (map.has(key)) {
      throw new RangeError(`duplicate key "${key}" in table`);
    }
    map.set(key, value);
  }
  return { kind: 'table', entries: map };
}

export function configTableOf(record: Record<string, ConfigValue>): ConfigTable {
  return configTable(Object.entries(record));
}

const KIND_LABELS: Record<ConfigValueKind, string> = {
  string: 'a string',
  integer: 'an integer',
  boolean: 'a boolean',
  sequence: 'a list',
  table: 'a table',
};

/** Human label for a value's shape, e.g. "a boolean" */
export function describeKind(value: ConfigValue): string {
  return KIND_LABELS[value.kind];
}

export type PlainValue = string | number | boolean | PlainValue[] | { [key: string]: PlainValue };

export function toPlainValue(value: ConfigValue): PlainValue {
  switch (value.kind) {
    case 'string':
    case 'integer':
    case 'boolean':
      return value.value;
    case 'sequence':
      return value.items.map(toPlainValue);
    case 'table': {
      const out: { [key: string]: PlainValue } = {};
      for (const [key, entry] of value.entries) {
        out[key] = toPlainValue(entry);
      }
      return out;
    }
  }
}

function joinPath(path: string, key: string | number): string {
  if (typeof key === 'number') {
    return `${path}[${key}]`;
  }
  return path ? `${path}.${key}` : key;
}

function isPlainRecord(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function orderedKeys(record: Record<string, unknown>, order: readonly string[] | undefined): string[] {
  const keys = Object.keys(record);
  if (!order) {
    return keys;
  }
  return [...order.filter((key) => Object.hasOwn(record, key)), ...keys.filter((key) => !order.includes(key))];
}

function convertParsed(value: unknown, path: string, segments: readonly string[], keyOrder?: KeyOrder): ConfigValue {
  if (typeof value === 'string') {
    return configString(value);
  }
  if (typeof value === 'boolean') {
    return configBoolean(value);
  }
  if (typeof value === 'bigint') {
    throw new ConfigFileError(`${path || 'value'}: integer ${value} is out of range`);
  }
  if (typeof value === 'number') {
    if (!Number.isInteger(value)) {
      throw new ConfigFileError(`${path || 'value'}: floating point values are not supported`);
    }
    if (!Number.isSafeInteger(value)) {
      throw new ConfigFileError(`${path || 'value'}: integer ${value} is out of range`);
    }
    return configInteger(value);
  }
  if (Array.isArray(value)) {
    return configSequence(
      value.map((item: unknown, index) =>
        convertParsed(item, joinPath(path, index), [...segments, String(index)], keyOrder),
      ),
    );
  }
  if (typeof value === 'object' && value !== null && isPlainRecord(value)) {
    const keys = orderedKeys(value, keyOrder?.get(keyOrderPath(segments)));
    return configTable(
      keys.map((key) => [key, convertParsed(value[key], joinPath(path, key), [...segments, key], keyOrder)] as const),
    );
  }
  if (value instanceof Date) {
    throw new ConfigFileError(`${path || 'value'}: dates and times are not supported`);
  }
  throw new ConfigFileError(`${path || 'value'}: unsupported value`);
}

/**
 * Converts a value produced by the TOML parser into a ConfigValue.
 * Floats, dates and times have no ConfigValue shape and are rejected.
 * Without `keyOrder` tables take the parsed objects' own key order.
 */
export function fromParsedValue(value: unknown, keyOrder?: KeyOrder): ConfigValue {
  return convertParsed(value, '', [], keyOrder);
}
