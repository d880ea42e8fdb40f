/**
 * Configuration Loader
 *
 * Reads a TOML configuration file into the ordered mode map and resolves
 * modes by name.
 */

import { readFileSync } from 'node:fs';
import { parse } from 'smol-toml';
import { ConfigFileError, ModeNotFoundError, describeError } from '../errors.js';
import type { ConfigValue } from '../types/config-value.js';
import type { Mode, PowerModesConfig } from '../types/mode.js';
import { describeKind, fromParsedValue } from './config-value.js';
import { scanKeyOrder } from './key-order.js';
import { createSubsystemLogger } from '../../logging/subsystem.js';

const logger = createSubsystemLogger('powermodes/config');

/**
 * Parses TOML text. `source` names the file in error messages.
 */
export function parseConfigText(text: string, source = '<config>'): PowerModesConfig {
  let parsed: unknown;
  try {
    parsed = parse(text);
  } catch (error) {
    throw new ConfigFileError(`Invalid TOML in ${source}: ${describeError(error)}`, { file: source, cause: error });
  }

  let root: ConfigValue;
  try {
    root = fromParsedValue(parsed, scanKeyOrder(text));
  } catch (error) {
    throw new ConfigFileError(`Invalid value in ${source}: ${describeError(error)}`, { file: source, cause: error });
  }
  if (root.kind !== 'table') {
    throw new ConfigFileError(`Invalid configuration in ${source}: expected a table, got ${describeKind(root)}`, {
      file: source,
    });
  }
  return root.entries;
}

export function loadConfigFile(file: string): PowerModesConfig {
  let text: string;
  try {
    text = readFileSync(file, 'utf8');
  } catch (error) {
    throw new ConfigFileError(`Failed to read configuration file ${file}: ${describeError(error)}`, {
      file,
      cause: error,
    });
  }

  const config = parseConfigText(text, file);
  logger.debug('Configuration loaded', { file, modes: [...config.keys()] });
  return config;
}

export function resolveMode(config: PowerModesConfig, name: string): Mode {
  const value = config.get(name);
  if (value === undefined) {
    throw new ModeNotFoundError(name);
  }
  if (value.kind !== 'table') {
    throw new ModeNotFoundError(name, `must be a table, got ${describeKind(value)}`);
  }
  return { name, plugins: value };
}

/** Names of the modes that can be applied, in file order */
export function listModes(config: PowerModesConfig): string[] {
  return [...config].filter(([, value]) => value.kind === 'table').map(([name]) => name);
}
