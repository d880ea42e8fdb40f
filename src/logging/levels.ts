export const ALLOWED_LOG_LEVELS = [
  'silent',
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
] as const;

export type LogLevel = (typeof ALLOWED_LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return (ALLOWED_LOG_LEVELS as readonly string[]).includes(value);
}

export function tryParseLogLevel(level?: string): LogLevel | undefined {
  if (typeof level !== 'string') {
    return undefined;
  }
  const candidate = level.trim().toLowerCase();
  return isLogLevel(candidate) ? candidate : undefined;
}

export function levelToMinLevel(level: LogLevel): number {
  // tslog level ordering: trace=1 .. fatal=6 (0 is silly)
  const map: Record<LogLevel, number> = {
    trace: 1,
    debug: 2,
    info: 3,
    warn: 4,
    error: 5,
    fatal: 6,
    silent: Number.POSITIVE_INFINITY,
  };
  return map[level];
}

/**
 * Whether a message at `level` passes a threshold of `threshold`.
 */
export function isLevelEnabled(level: Exclude<LogLevel, 'silent'>, threshold: LogLevel): boolean {
  if (threshold === 'silent') {
    return false;
  }
  return levelToMinLevel(level) >= levelToMinLevel(threshold);
}
