import chalk from 'chalk';
import { getChildLogger, isFileLogLevelEnabled, resolveLoggerSettings } from './logger.js';
import { isLevelEnabled, type LogLevel } from './levels.js';

type EmitLevel = Exclude<LogLevel, 'silent'>;

export type SubsystemLogger = {
  subsystem: string;
  trace: (message: string, meta?: Record<string, unknown>) => void;
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
  fatal: (message: string, meta?: Record<string, unknown>) => void;
  child: (name: string) => SubsystemLogger;
};

const LEVEL_COLORS: Record<EmitLevel, (text: string) => string> = {
  trace: chalk.gray,
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
  fatal: chalk.redBright,
};

function formatMetaSuffix(meta: Record<string, unknown>): string {
  const parts = Object.entries(meta).map(([key, value]) => {
    const rendered = typeof value === 'string' ? value : JSON.stringify(value);
    return `${key}=${rendered}`;
  });
  return parts.length > 0 ? ` ${parts.join(' ')}` : '';
}

export function formatConsoleLine(
  subsystem: string,
  level: EmitLevel,
  message: string,
  meta?: Record<string, unknown>,
): string {
  const { consoleMessage, ...rest } = meta ?? {};
  const text = typeof consoleMessage === 'string' ? consoleMessage : `${message}${formatMetaSuffix(rest)}`;
  const prefix = `[${subsystem}]`;
  return `${process.stderr.isTTY ? LEVEL_COLORS[level](prefix) : prefix} ${text}`;
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  const emit = (level: EmitLevel, message: string, meta?: Record<string, unknown>) => {
    if (isFileLogLevelEnabled(level)) {
      const payload = meta ? { ...meta } : {};
      delete payload.consoleMessage;
      getChildLogger({ subsystem })[level](message, payload);
    }

    const { consoleLevel } = resolveLoggerSettings();
    if (isLevelEnabled(level, consoleLevel)) {
      process.stderr.write(`${formatConsoleLine(subsystem, level, message, meta)}\n`);
    }
  };

  return {
    subsystem,
    trace: (message, meta) => emit('trace', message, meta),
    debug: (message, meta) => emit('debug', message, meta),
    info: (message, meta) => emit('info', message, meta),
    warn: (message, meta) => emit('warn', message, meta),
    error: (message, meta) => emit('error', message, meta),
    fatal: (message, meta) => emit('fatal', message, meta),
    child: (name) => createSubsystemLogger(`${subsystem}/${name}`),
  };
}
