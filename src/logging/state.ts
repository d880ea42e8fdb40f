import type { Logger as TsLogger } from 'tslog';
import type { LogLevel } from './levels.js';

export type LogObj = { date?: Date } & Record<string, unknown>;

export type LoggerSettings = {
  level?: LogLevel;
  file?: string;
  consoleLevel?: LogLevel;
};

type LoggingState = {
  cachedLogger: TsLogger<LogObj> | null;
  cachedSettingsKey: string | null;
  overrideSettings: LoggerSettings | null;
  invalidEnvLogLevelValue: string | null;
};

export const loggingState: LoggingState = {
  cachedLogger: null,
  cachedSettingsKey: null,
  overrideSettings: null,
  invalidEnvLogLevelValue: null,
};
