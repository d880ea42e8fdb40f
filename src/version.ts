import { readFileSync } from 'node:fs';

const PACKAGE_NAME = 'powermodes';

const PACKAGE_JSON_CANDIDATES = ['../package.json', '../../package.json'] as const;

function readPackageVersion(candidate: URL): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(candidate, 'utf8'));
  } catch {
    // missing or unreadable candidate
    return null;
  }
  if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'name' in parsed &&
    parsed.name === PACKAGE_NAME &&
    'version' in parsed &&
    typeof parsed.version === 'string'
  ) {
    return parsed.version.trim() || null;
  }
  return null;
}

export function resolveVersionFromModuleUrl(moduleUrl: string): string | null {
  for (const candidate of PACKAGE_JSON_CANDIDATES) {
    const version = readPackageVersion(new URL(candidate, moduleUrl));
    if (version) {
      return version;
    }
  }
  return null;
}

// package.json next to src/ or dist/
export const VERSION = resolveVersionFromModuleUrl(import.meta.url) ?? '0.0.0';
