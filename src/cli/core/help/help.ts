/**
 * CLI Help & Version
 *
 * Role:
 *   Single entry point for the CLI's informational output.
 */

import { getPackageVersion } from '../version/version.ts';
export { showHelp } from './formatter.ts';

export const PACKAGE_NAME = 'ci-decision-engine';

/**
 * Return the version string printed by `--version`, e.g. `ci-decision-engine v1.2.3`.
 */
export function showVersion(): string {
  return `${PACKAGE_NAME} v${getPackageVersion()}`;
}
