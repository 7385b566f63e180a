/**
 * CLI Version
 *
 * Role:
 *   Read the package version once and cache it.
 *
 * Responsibilities:
 *   - Resolve `package.json` relative to this module, never the working directory
 *   - Fall back to a sentinel when the manifest is unreadable
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

export const PKG_VERSION_FALLBACK = 'unknown';

const pkgPath = fileURLToPath(new URL('../../../../package.json', import.meta.url));

let cachedPkgVersion: string | undefined;

function readVersion(text: string): string {
  const parsed: unknown = JSON.parse(text);
  if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'version' in parsed &&
    typeof parsed.version === 'string'
  ) {
    return parsed.version;
  }
  return PKG_VERSION_FALLBACK;
}

/**
 * Read and cache the package version.
 *
 * A read failure is reported on stderr and yields `PKG_VERSION_FALLBACK`;
 * `--version` must still answer.
 */
function getPkgVersion(errorConsole: Pick<typeof console, 'error'> = console): string {
  if (cachedPkgVersion !== undefined) {
    return cachedPkgVersion;
  }
  try {
    // eslint-disable-next-line security/detect-non-literal-fs-filename -- fixed path beside the module
    cachedPkgVersion = readVersion(readFileSync(pkgPath, 'utf8'));
  } catch (error) {
    errorConsole.error(`[version] Failed to read package.json: ${String(error)}`);
    cachedPkgVersion = PKG_VERSION_FALLBACK;
  }
  return cachedPkgVersion;
}

export function getPackageVersion(): string {
  return getPkgVersion();
}

export const __test__ = {
  getPkgVersion,
  readVersion,
  resetCache: (): void => {
    cachedPkgVersion = undefined;
  },
};
