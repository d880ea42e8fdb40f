import { vi } from 'vitest';
import type { RuntimeEnv } from '../runtime.js';

export function createTestRuntime() {
  const log = vi.fn<(...args: unknown[]) => void>();
  const error = vi.fn<(...args: unknown[]) => void>();
  const runtime: RuntimeEnv = {
    log,
    error,
    exit: (code: number): never => {
      throw new Error(`exit ${code}`);
    },
  };
  return { runtime, log, error };
}
