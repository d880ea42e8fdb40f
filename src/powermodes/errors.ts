/**
 * Power Modes Errors
 *
 * Shared error hierarchy. Configuration errors never have side effects; apply
 * errors may leave a facet partially configured and say what was attempted.
 */

export type PowerModesErrorCode =
  | 'CONFIG_INVALID'
  | 'APPLY_FAILED'
  | 'COMMAND_SPAWN'
  | 'UNKNOWN_PLUGIN'
  | 'REGISTRY_CONFLICT'
  | 'REGISTRY_INVALID_ID'
  | 'REGISTRY_SEALED'
  | 'CONFIG_FILE'
  | 'MODE_NOT_FOUND'
  | 'PROMPT_CANCELLED';

export class PowerModesError extends Error {
  readonly code: PowerModesErrorCode;
  readonly plugin?: string;

  constructor(code: PowerModesErrorCode, message: string, options?: { plugin?: string; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'PowerModesError';
    this.code = code;
    this.plugin = options?.plugin;
  }
}

/**
 * A configuration value does not match the shape a plugin documents.
 * `path` locates the offending value inside the plugin's value, e.g. `[2].show-stdout`.
 */
export class ConfigError extends PowerModesError {
  readonly path: string;

  constructor(message: string, options?: { path?: string; plugin?: string }) {
    super('CONFIG_INVALID', message, { plugin: options?.plugin });
    this.name = 'ConfigError';
    this.path = options?.path ?? '';
  }

  /** Message prefixed with the value path, when there is one */
  get detail(): string {
    return this.path ? `${this.path}: ${this.message}` : this.message;
  }
}

export class ApplyError extends PowerModesError {
  /** Description of the side effect that was attempted */
  readonly attempted: string;

  constructor(
    message: string,
    options: { attempted: string; plugin?: string; cause?: unknown; code?: 'APPLY_FAILED' | 'COMMAND_SPAWN' },
  ) {
    super(options.code ?? 'APPLY_FAILED', message, { plugin: options.plugin, cause: options.cause });
    this.name = 'ApplyError';
    this.attempted = options.attempted;
  }
}

/** The command executor could not start a child process at all. */
export class CommandSpawnError extends ApplyError {
  constructor(message: string, options: { attempted: string; cause?: unknown }) {
    super(message, { ...options, code: 'COMMAND_SPAWN' });
    this.name = 'CommandSpawnError';
  }
}

export class UnknownPluginError extends PowerModesError {
  constructor(plugin: string) {
    super('UNKNOWN_PLUGIN', 'unknown plugin', { plugin });
    this.name = 'UnknownPluginError';
  }
}

export class RegistryError extends PowerModesError {
  constructor(code: 'REGISTRY_CONFLICT' | 'REGISTRY_INVALID_ID' | 'REGISTRY_SEALED', message: string, plugin?: string) {
    super(code, message, { plugin });
    this.name = 'RegistryError';
  }
}

export class ConfigFileError extends PowerModesError {
  readonly file?: string;

  constructor(message: string, options?: { file?: string; cause?: unknown }) {
    super('CONFIG_FILE', message, { cause: options?.cause });
    this.name = 'ConfigFileError';
    this.file = options?.file;
  }
}

export class ModeNotFoundError extends PowerModesError {
  readonly mode: string;

  constructor(mode: string, reason?: string) {
    super('MODE_NOT_FOUND', reason ? `Power mode "${mode}" ${reason}` : `Power mode "${mode}" not in configuration file`);
    this.name = 'ModeNotFoundError';
    this.mode = mode;
  }
}

export class PromptCancelledError extends PowerModesError {
  constructor() {
    super('PROMPT_CANCELLED', 'Cancelled.');
    this.name = 'PromptCancelledError';
  }
}

/**
 * Formats any thrown value for a report line.
 */
export function describeError(error: unknown): string {
  if (error instanceof ConfigError) {
    return error.detail;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
