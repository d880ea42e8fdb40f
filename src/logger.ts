import chalk from 'chalk';
import { getLogger, isFileLogLevelEnabled } from './logging/logger.js';
import { defaultRuntime, type RuntimeEnv } from './runtime.js';

let verbose = false;

export function setVerbose(value: boolean): void {
  verbose = value;
}

function recordToFile(level: 'info' | 'warn' | 'error' | 'debug', message: string): void {
  if (isFileLogLevelEnabled(level)) {
    getLogger()[level](message);
  }
}

function colorize(color: (text: string) => string, text: string, stream: NodeJS.WriteStream): string {
  return stream.isTTY ? color(text) : text;
}

export function logInfo(message: string, runtime: RuntimeEnv = defaultRuntime): void {
  recordToFile('info', message);
  runtime.log(message);
}

export function logSuccess(message: string, runtime: RuntimeEnv = defaultRuntime): void {
  recordToFile('info', message);
  runtime.log(colorize(chalk.green, message, process.stdout));
}

export function logWarn(message: string, runtime: RuntimeEnv = defaultRuntime): void {
  recordToFile('warn', message);
  runtime.error(colorize(chalk.yellow, message, process.stderr));
}

export function logError(message: string, runtime: RuntimeEnv = defaultRuntime): void {
  recordToFile('error', message);
  runtime.error(colorize(chalk.red, message, process.stderr));
}

export function logDebug(message: string, runtime: RuntimeEnv = defaultRuntime): void {
  recordToFile('debug', message);
  if (verbose) {
    runtime.log(colorize(chalk.gray, message, process.stdout));
  }
}
