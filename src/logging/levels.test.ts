import { describe, expect, it } from 'vitest';
import { isLevelEnabled, levelToMinLevel, tryParseLogLevel } from './levels.js';

describe('tryParseLogLevel', () => {
  it('accepts allowed levels case-insensitively', () => {
    expect(tryParseLogLevel('debug')).toBe('debug');
    expect(tryParseLogLevel(' WARN ')).toBe('warn');
  });

  it('rejects unknown levels', () => {
    expect(tryParseLogLevel('loud')).toBeUndefined();
    expect(tryParseLogLevel(undefined)).toBeUndefined();
  });
});

describe('isLevelEnabled', () => {
  it('compares against the threshold', () => {
    expect(isLevelEnabled('info', 'warn')).toBe(false);
    expect(isLevelEnabled('warn', 'warn')).toBe(true);
    expect(isLevelEnabled('error', 'info')).toBe(true);
  });

  it('never passes the silent threshold', () => {
    expect(isLevelEnabled('fatal', 'silent')).toBe(false);
  });

  it('maps levels onto tslog ordering', () => {
    expect(levelToMinLevel('trace')).toBe(1);
    expect(levelToMinLevel('fatal')).toBe(6);
    expect(levelToMinLevel('silent')).toBe(Number.POSITIVE_INFINITY);
  });
});
