/**
 * Mode
 *
 * A named table of plugin identifier to configuration value. Modes are the
 * entries of the top-level configuration table.
 */

import type { ConfigTable, ConfigValue } from './config-value.js';

export interface Mode {
  /** Mode identity; unique among its siblings */
  name: string;
  /** Plugin identifier to raw configuration, in file order */
  plugins: ConfigTable;
}

/** Parsed configuration file: mode name to (not yet checked) mode value */
export type PowerModesConfig = ReadonlyMap<string, ConfigValue>;
