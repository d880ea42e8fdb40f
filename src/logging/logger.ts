import fs from 'node:fs';
import path from 'node:path';
import { Logger as TsLogger } from 'tslog';
import { resolveEnvLogFile, resolveEnvLogLevelOverride } from './env-log-level.js';
import { type LogLevel, isLevelEnabled, levelToMinLevel } from './levels.js';
import { type LogObj, type LoggerSettings, loggingState } from './state.js';

export type { LoggerSettings } from './state.js';

export type LoggerResolvedSettings = {
  level: LogLevel;
  consoleLevel: LogLevel;
  file?: string;
};

function isTestRun(): boolean {
  return process.env.VITEST === 'true';
}

export function resolveLoggerSettings(): LoggerResolvedSettings {
  const override = loggingState.overrideSettings;
  const envLevel = resolveEnvLogLevelOverride();
  const quiet = isTestRun() && !override;
  const level = override?.level ?? envLevel ?? (quiet ? 'silent' : 'info');
  const consoleLevel = override?.consoleLevel ?? envLevel ?? (quiet ? 'silent' : 'warn');
  const file = override ? override.file : resolveEnvLogFile();
  return { level, consoleLevel, file };
}

/**
 * Whether the file logger takes messages at `level`. Callers check this
 * before touching tslog, which is never built while the level is silent.
 */
export function isFileLogLevelEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return isLevelEnabled(level, resolveLoggerSettings().level);
}

function settingsKey(settings: LoggerResolvedSettings): string {
  return `${settings.level}|${settings.file ?? ''}`;
}

function appendLogLine(file: string, line: string): void {
  try {
    fs.appendFileSync(file, line, { encoding: 'utf8' });
  } catch {
    // logging never fails the caller
  }
}

function buildLogger(settings: LoggerResolvedSettings): TsLogger<LogObj> {
  const logger = new TsLogger<LogObj>({
    name: 'powermodes',
    minLevel: levelToMinLevel(settings.level),
    type: 'hidden',
  });

  const file = settings.file;
  if (file) {
    try {
      fs.mkdirSync(path.dirname(file), { recursive: true });
    } catch {
      // appends below fail silently in the same way
    }
    logger.attachTransport((logObj: LogObj) => {
      const time = logObj.date?.toISOString() ?? new Date().toISOString();
      appendLogLine(file, `${JSON.stringify({ ...logObj, time })}\n`);
    });
  }

  return logger;
}

/**
 * Returns the process-wide file logger, rebuilding it when the resolved
 * settings changed since the last call.
 */
export function getLogger(): TsLogger<LogObj> {
  const settings = resolveLoggerSettings();
  const key = settingsKey(settings);
  if (!loggingState.cachedLogger || loggingState.cachedSettingsKey !== key) {
    loggingState.cachedLogger = buildLogger(settings);
    loggingState.cachedSettingsKey = key;
  }
  return loggingState.cachedLogger;
}

export function getChildLogger(bindings: Record<string, unknown>): TsLogger<LogObj> {
  const name = JSON.stringify(bindings);
  return getLogger().getSubLogger({ name });
}

// Test helpers
export function setLoggerOverride(settings: LoggerSettings | null): void {
  loggingState.overrideSettings = settings;
  loggingState.cachedLogger = null;
  loggingState.cachedSettingsKey = null;
}

export function resetLogger(): void {
  loggingState.cachedLogger = null;
  loggingState.cachedSettingsKey = null;
  loggingState.overrideSettings = null;
}
