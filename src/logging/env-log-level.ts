import { ALLOWED_LOG_LEVELS, type LogLevel, tryParseLogLevel } from './levels.js';
import { loggingState } from './state.js';

export const LOG_LEVEL_ENV = 'POWERMODES_LOG_LEVEL';
export const LOG_FILE_ENV = 'POWERMODES_LOG_FILE';

export function resolveEnvLogLevelOverride(): LogLevel | undefined {
  const raw = process.env[LOG_LEVEL_ENV];
  const trimmed = typeof raw === 'string' ? raw.trim() : '';
  if (!trimmed) {
    loggingState.invalidEnvLogLevelValue = null;
    return undefined;
  }
  const parsed = tryParseLogLevel(trimmed);
  if (parsed) {
    loggingState.invalidEnvLogLevelValue = null;
    return parsed;
  }
  if (loggingState.invalidEnvLogLevelValue !== trimmed) {
    loggingState.invalidEnvLogLevelValue = trimmed;
    process.stderr.write(
      `[powermodes] Ignoring invalid ${LOG_LEVEL_ENV}="${trimmed}" (allowed: ${ALLOWED_LOG_LEVELS.join('|')}).\n`,
    );
  }
  return undefined;
}

export function resolveEnvLogFile(): string | undefined {
  const raw = process.env[LOG_FILE_ENV]?.trim();
  return raw ? raw : undefined;
}
