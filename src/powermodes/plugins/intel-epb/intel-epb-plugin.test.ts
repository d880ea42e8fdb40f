import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { select } from '@clack/prompts';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { configBoolean, configInteger, configString } from '../../config/config-value.js';
import type { ApplyContext } from '../../plugin/plugin.js';
import type { ConfigValue } from '../../types/config-value.js';
import { createSubsystemLogger } from '../../../logging/subsystem.js';
import { CPU_DIRECTORY, IntelEpbPlugin } from './intel-epb-plugin.js';

vi.mock('@clack/prompts', () => ({
  select: vi.fn(),
  isCancel: vi.fn(() => false),
  cancel: vi.fn(),
}));

type EpbAttribute = 'file' | 'directory' | 'none';

describe('IntelEpbPlugin', () => {
  let root: string;
  let cpuDirectory: string;

  const createContext = () => {
    const warn = vi.fn<(detail: string) => void>();
    const context: ApplyContext = {
      plugin: 'intel_epb',
      mode: 'laptop',
      warn,
      logger: createSubsystemLogger('powermodes/test'),
    };
    return { context, warn };
  };

  const addCpu = (name: string, attribute: EpbAttribute = 'file') => {
    const power = path.join(cpuDirectory, name, 'power');
    mkdirSync(path.join(cpuDirectory, name), { recursive: true });
    if (attribute === 'file') {
      mkdirSync(power, { recursive: true });
      writeFileSync(path.join(power, 'energy_perf_bias'), '6\n');
    } else if (attribute === 'directory') {
      mkdirSync(path.join(power, 'energy_perf_bias'), { recursive: true });
    }
  };

  const readEpb = (name: string) => readFileSync(path.join(cpuDirectory, name, 'power', 'energy_perf_bias'), 'utf8');

  const configuredValue = (raw: ConfigValue) => {
    const result = new IntelEpbPlugin({ root }).configure(raw);
    return result.ok && result.config.state === 'configured' ? result.config.value : undefined;
  };

  const configureError = (raw: ConfigValue) => {
    const result = new IntelEpbPlugin({ root }).configure(raw);
    return result.ok ? undefined : result.error.detail;
  };

  beforeEach(() => {
    root = mkdtempSync(path.join(os.tmpdir(), 'powermodes-epb-'));
    cpuDirectory = path.join(root, CPU_DIRECTORY);
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
    vi.clearAllMocks();
  });

  describe('configure', () => {
    it('accepts integers from 0 to 15', () => {
      expect(configuredValue(configInteger(0))).toBe(0);
      expect(configuredValue(configInteger(15))).toBe(15);
      expect(configureError(configInteger(16))).toBe('EPB value must be between 0 and 15, got 16');
      expect(configureError(configInteger(-1))).toBe('EPB value must be between 0 and 15, got -1');
    });

    it('maps named policies onto their values', () => {
      expect(configuredValue(configString('performance'))).toBe(0);
      expect(configuredValue(configString('balance-performance'))).toBe(4);
      expect(configuredValue(configString('default'))).toBe(6);
      expect(configuredValue(configString('normal-powersave'))).toBe(7);
      expect(configuredValue(configString('balance-power'))).toBe(8);
      expect(configuredValue(configString('power'))).toBe(15);
    });

    it('rejects unknown names and other shapes', () => {
      const accepted =
        'expected an integer between 0 and 15, "skip" or one of "performance", "balance-performance", ' +
        '"normal", "default", "normal-powersave", "balance-power", "power"';

      expect(configureError(configString('turbo'))).toBe(`${accepted}, got "turbo"`);
      expect(configureError(configString('toString'))).toBe(`${accepted}, got "toString"`);
      expect(configureError(configBoolean(true))).toBe(`${accepted}, got a boolean`);
    });

    it('skips on the sentinel', () => {
      expect(new IntelEpbPlugin({ root }).configure(configString('skip'))).toEqual({
        ok: true,
        config: { state: 'skipped' },
      });
    });
  });

  describe('apply', () => {
    it('writes the value to every supported CPU and warns about the rest', async () => {
      addCpu('cpu0');
      addCpu('cpu1');
      addCpu('cpu2', 'none');
      mkdirSync(path.join(cpuDirectory, 'cpufreq'));
      mkdirSync(path.join(cpuDirectory, 'cpuidle'));
      const { context, warn } = createContext();

      const result = await new IntelEpbPlugin({ root }).apply({ state: 'configured', value: 8 }, context);

      expect(result).toEqual({ ok: true });
      expect(readEpb('cpu0')).toBe('8\n');
      expect(readEpb('cpu1')).toBe('8\n');
      expect(warn.mock.calls).toEqual([["The following CPUs don't support EPB: cpu2"]]);
    });

    it('lists CPUs in numeric order', () => {
      addCpu('cpu10');
      addCpu('cpu2');
      addCpu('cpu1', 'none');

      const { supported, unsupported } = new IntelEpbPlugin({ root }).listTargets();

      expect(supported.map((target) => target.cpu)).toEqual(['cpu2', 'cpu10']);
      expect(unsupported).toEqual(['cpu1']);
    });

    it('fails when no CPU is detected', async () => {
      const { context } = createContext();

      const result = await new IntelEpbPlugin({ root }).apply({ state: 'configured', value: 6 }, context);

      expect(!result.ok && result.error.message).toBe('No CPUs detected');
    });

    it('fails when no CPU supports EPB', async () => {
      addCpu('cpu0', 'none');
      addCpu('cpu1', 'none');
      const { context } = createContext();

      const result = await new IntelEpbPlugin({ root }).apply({ state: 'configured', value: 6 }, context);

      expect(!result.ok && result.error.message).toBe('EPB is not supported in this system');
    });

    it('downgrades some failed writes to warnings', async () => {
      addCpu('cpu0');
      addCpu('cpu1', 'directory');
      const { context, warn } = createContext();

      const result = await new IntelEpbPlugin({ root }).apply({ state: 'configured', value: 15 }, context);

      expect(result.ok).toBe(true);
      expect(readEpb('cpu0')).toBe('15\n');
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn.mock.calls[0]?.[0]).toMatch(/^Failed to set Intel EPB for cpu1: EISDIR/);
    });

    it('fails when every write fails', async () => {
      addCpu('cpu0', 'directory');
      const { context, warn } = createContext();

      const result = await new IntelEpbPlugin({ root }).apply({ state: 'configured', value: 0 }, context);

      expect(result.ok).toBe(false);
      expect(!result.ok && result.error.message).toMatch(/^Failed to set Intel EPB for cpu0: EISDIR/);
      expect(warn).not.toHaveBeenCalled();
    });

    it('leaves every CPU untouched when skipped', async () => {
      addCpu('cpu0');
      const { context } = createContext();

      await new IntelEpbPlugin({ root }).apply({ state: 'skipped' }, context);

      expect(readEpb('cpu0')).toBe('6\n');
    });
  });

  it('offers the named policies interactively', async () => {
    vi.mocked(select).mockResolvedValueOnce('balance-power');
    const plugin = new IntelEpbPlugin({ root });

    const raw = await plugin.interact();

    expect(raw).toEqual({ kind: 'string', value: 'balance-power' });
    expect(configuredValue(raw)).toBe(8);
  });
});
