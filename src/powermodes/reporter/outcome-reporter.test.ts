import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createTestRuntime } from '../../test-utils/runtime.js';
import { disableTty } from '../../test-utils/tty.js';
import type { ModeOutcome, PluginOutcome } from '../types/outcome.js';
import {
  CollectingOutcomeReporter,
  ConsoleOutcomeReporter,
  formatFailure,
  formatSummary,
} from './outcome-reporter.js';

function outcome(plugin: string, kind: PluginOutcome['kind'], detail?: string): PluginOutcome {
  return { plugin, kind, warnings: [], durationMs: 0, ...(detail === undefined ? {} : { detail }) };
}

function modeOutcome(status: ModeOutcome['status'], outcomes: PluginOutcome[]): ModeOutcome {
  return { mode: 'laptop', outcomes, status, success: status === 'success' };
}

describe('formatSummary', () => {
  it('renders each status', () => {
    expect(formatSummary(modeOutcome('success', []))).toBe('Mode "laptop" applied');
    expect(formatSummary(modeOutcome('failed', [outcome('a', 'apply-error')]))).toBe('Mode "laptop" failed');
    expect(
      formatSummary(
        modeOutcome('partial', [outcome('a', 'success'), outcome('b', 'unknown-plugin'), outcome('c', 'skipped')]),
      ),
    ).toBe('Mode "laptop" partially applied (1 of 3 plugins failed)');
  });
});

describe('formatFailure', () => {
  it('falls back to the kind without detail', () => {
    expect(formatFailure(outcome('intel_epb', 'apply-error', 'EPB is not supported in this system'))).toBe(
      'intel_epb error: EPB is not supported in this system',
    );
    expect(formatFailure(outcome('ghost', 'unknown-plugin'))).toBe('ghost error: unknown-plugin');
  });
});

describe('ConsoleOutcomeReporter', () => {
  let restoreTty: () => void;

  beforeEach(() => {
    restoreTty = disableTty();
  });

  afterEach(() => {
    restoreTty();
  });

  it('writes warnings and failures to stderr and success to stdout', () => {
    const { runtime, log, error } = createTestRuntime();
    const reporter = new ConsoleOutcomeReporter(runtime);

    reporter.warning('command', 'command 1 (false) exited with code 1');
    reporter.failure('ghost', outcome('ghost', 'unknown-plugin', 'unknown plugin'));
    reporter.summary(modeOutcome('success', []));

    expect(error.mock.calls).toEqual([['command warning: command 1 (false) exited with code 1'], ['ghost error: unknown plugin']]);
    expect(log.mock.calls).toEqual([['Mode "laptop" applied']]);
  });

  it('writes partial and failed summaries to stderr', () => {
    const { runtime, log, error } = createTestRuntime();
    const reporter = new ConsoleOutcomeReporter(runtime);

    reporter.summary(modeOutcome('partial', [outcome('a', 'success'), outcome('b', 'config-error', 'bad')]));
    reporter.summary(modeOutcome('failed', [outcome('b', 'config-error', 'bad')]));

    expect(log).not.toHaveBeenCalled();
    expect(error.mock.calls).toEqual([
      ['Mode "laptop" partially applied (1 of 2 plugins failed)'],
      ['Mode "laptop" failed'],
    ]);
  });
});

describe('CollectingOutcomeReporter', () => {
  it('filters recorded warnings by plugin', () => {
    const reporter = new CollectingOutcomeReporter();

    reporter.warning('command', 'first');
    reporter.warning('intel_epb', 'second');
    reporter.failure('ghost', outcome('ghost', 'unknown-plugin', 'unknown plugin'));

    expect(reporter.warnings()).toEqual(['first', 'second']);
    expect(reporter.warnings('intel_epb')).toEqual(['second']);
    expect(reporter.failures().map((failure) => failure.plugin)).toEqual(['ghost']);
  });
});
