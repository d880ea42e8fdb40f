import { writeFileSync } from 'node:fs';
import path from 'node:path';
import { ApplyError } from '../errors.js';

/** Joins an absolute kernel interface path onto a (possibly relocated) filesystem root */
export function kernelPath(root: string, file: string): string {
  return path.join(root, file);
}

/**
 * Writes `value` to a procfs/sysfs attribute. Failures become an ApplyError
 * prefixed with `failure`.
 */
export function writeKernelValue(file: string, value: string, failure: string): void {
  try {
    writeFileSync(file, value, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ApplyError(`${failure}: ${reason}`, {
      attempted: `write ${JSON.stringify(value)} to ${file}`,
      cause: error,
    });
  }
}
