import { writeFileSync } from 'node:fs';
import { cancel, isCancel, select } from '@clack/prompts';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { configBoolean, configInteger, configString } from '../../config/config-value.js';
import { PromptCancelledError } from '../../errors.js';
import type { ApplyContext } from '../../plugin/plugin.js';
import { createSubsystemLogger } from '../../../logging/subsystem.js';
import { NMI_WATCHDOG_FILE, NmiWatchdogPlugin } from './nmi-watchdog-plugin.js';

vi.mock('node:fs');
vi.mock('@clack/prompts', () => ({
  select: vi.fn(),
  isCancel: vi.fn(() => false),
  cancel: vi.fn(),
}));

const mockWriteFileSync = vi.mocked(writeFileSync);

const context: ApplyContext = {
  plugin: 'nmi_watchdog',
  mode: 'laptop',
  warn: () => undefined,
  logger: createSubsystemLogger('powermodes/test'),
};

describe('NmiWatchdogPlugin', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('accepts booleans and the skip sentinel', () => {
    const plugin = new NmiWatchdogPlugin();

    expect(plugin.configure(configBoolean(false))).toEqual({ ok: true, config: { state: 'configured', value: false } });
    expect(plugin.configure(configString('skip'))).toEqual({ ok: true, config: { state: 'skipped' } });
  });

  it('rejects anything else', () => {
    const result = new NmiWatchdogPlugin().configure(configInteger(1));

    expect(!result.ok && result.error.message).toBe('expected a boolean or "skip", got an integer');
  });

  it('writes 1 to enable and 0 to disable', async () => {
    const plugin = new NmiWatchdogPlugin();

    await plugin.apply({ state: 'configured', value: true }, context);
    await plugin.apply({ state: 'configured', value: false }, context);

    expect(mockWriteFileSync.mock.calls).toEqual([
      [NMI_WATCHDOG_FILE, '1\n', 'utf8'],
      [NMI_WATCHDOG_FILE, '0\n', 'utf8'],
    ]);
  });

  it('resolves the file under a relocated root', async () => {
    await new NmiWatchdogPlugin({ root: '/tmp/fake-root' }).apply({ state: 'configured', value: true }, context);

    expect(mockWriteFileSync).toHaveBeenCalledWith('/tmp/fake-root/proc/sys/kernel/nmi_watchdog', '1\n', 'utf8');
  });

  it('fails with an ApplyError when the write fails', async () => {
    mockWriteFileSync.mockImplementationOnce(() => {
      throw new Error('EACCES: permission denied');
    });

    const result = await new NmiWatchdogPlugin().apply({ state: 'configured', value: false }, context);

    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.message).toBe('Failed to disable NMI watchdog: EACCES: permission denied');
    expect(!result.ok && result.error.attempted).toBe('write "0\\n" to /proc/sys/kernel/nmi_watchdog');
  });

  it('leaves the watchdog alone when skipped', async () => {
    const result = await new NmiWatchdogPlugin().apply({ state: 'skipped' }, context);

    expect(result).toEqual({ ok: true });
    expect(mockWriteFileSync).not.toHaveBeenCalled();
  });

  it('turns the interactive choice into a value configure accepts', async () => {
    const plugin = new NmiWatchdogPlugin();
    vi.mocked(select).mockResolvedValueOnce('disable').mockResolvedValueOnce('skip');

    const disable = await plugin.interact();
    const skip = await plugin.interact();

    expect(disable).toEqual({ kind: 'boolean', value: false });
    expect(skip).toEqual({ kind: 'string', value: 'skip' });
    expect(plugin.configure(disable).ok).toBe(true);
  });

  it('throws when the prompt is cancelled', async () => {
    vi.mocked(select).mockResolvedValueOnce(Symbol('clack:cancel'));
    vi.mocked(isCancel).mockReturnValueOnce(true);

    await expect(new NmiWatchdogPlugin().interact()).rejects.toBeInstanceOf(PromptCancelledError);
    expect(cancel).toHaveBeenCalledWith('Cancelled.');
  });
});
