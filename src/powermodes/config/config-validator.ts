/**
 * Configuration Validator
 *
 * Checks a whole configuration against a registry without side effects:
 * every (mode, plugin) pair goes through the plugin's `configure`.
 */

import { describeError } from '../errors.js';
import type { PluginRegistry } from '../registry/plugin-registry.js';
import type { ConfigTable } from '../types/config-value.js';
import type { PowerModesConfig } from '../types/mode.js';
import { describeKind } from './config-value.js';

export interface ValidationIssue {
  mode?: string;
  plugin?: string;
  message: string;
}

export interface ValidationReport {
  /** True iff at least one mode is usable and no plugin rejected its value */
  valid: boolean;
  /** Modes whose every known plugin accepted its value, in file order */
  usableModes: string[];
  warnings: ValidationIssue[];
  errors: ValidationIssue[];
}

function formatModeList(modes: readonly string[]): string {
  return modes.map((mode) => `"${mode}"`).join(', ');
}

export function validateConfiguration(config: PowerModesConfig, registry: PluginRegistry): ValidationReport {
  const warnings: ValidationIssue[] = [];
  const errors: ValidationIssue[] = [];
  const modes: Array<[string, ConfigTable]> = [];

  for (const [name, value] of config) {
    if (value.kind !== 'table') {
      warnings.push({ mode: name, message: `Mode "${name}" must be a table, got ${describeKind(value)}. Ignoring it.` });
    } else if (value.entries.size === 0) {
      warnings.push({ mode: name, message: `Mode "${name}" is empty. Ignoring it.` });
    } else {
      modes.push([name, value]);
    }
  }

  const unknown = new Map<string, string[]>();
  const rejectedModes = new Set<string>();

  for (const [mode, table] of modes) {
    for (const [id, raw] of table.entries) {
      const plugin = registry.resolve(id);
      if (!plugin) {
        unknown.set(id, [...(unknown.get(id) ?? []), mode]);
        continue;
      }

      let detail: string | undefined;
      try {
        const result = plugin.configure(raw);
        detail = result.ok ? undefined : result.error.detail;
      } catch (error) {
        detail = `plugin threw: ${describeError(error)}`;
      }
      if (detail !== undefined) {
        errors.push({ mode, plugin: id, message: `${id} in mode "${mode}": ${detail}` });
        rejectedModes.add(mode);
      }
    }
  }

  for (const [id, referencing] of unknown) {
    warnings.push({ plugin: id, message: `Unknown plugin "${id}" in mode(s) ${formatModeList(referencing)}` });
  }

  for (const { id, plugin } of registry.list()) {
    if (!plugin.stateful) {
      continue;
    }
    const missing = modes.filter(([, table]) => !table.entries.has(id)).map(([mode]) => mode);
    if (missing.length > 0 && missing.length < modes.length) {
      warnings.push({
        plugin: id,
        message:
          `Plugin "${id}" is not configured in mode(s) ${formatModeList(missing)}. ` +
          'You may get a partially configured system while switching modes.',
      });
    }
  }

  const usableModes = modes.map(([mode]) => mode).filter((mode) => !rejectedModes.has(mode));
  return {
    valid: usableModes.length > 0 && errors.length === 0,
    usableModes,
    warnings,
    errors,
  };
}
