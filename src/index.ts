/**
 * CI Decision Engine
 *
 * Change classification, job skip planning and baseline regression gates
 * for CI pipelines.
 */

import { getPackageVersion } from './cli/core/version/version.ts';

export const VERSION = getPackageVersion();

export * from './cli/core/index.ts';
export * from './config/index.ts';
export * from './engine/index.ts';
export * from './errors/errors.ts';
