#!/usr/bin/env node
/**
 * CI Decision Engine — CLI entry
 *
 * Runs `ci-decide` when executed directly; otherwise re-exports the CLI
 * surface for programmatic use.
 */

import { pathToFileURL } from 'node:url';

import { runEntrypoint } from './core/index.ts';

export * from './core/index.ts';

const entryUrl = process.argv[1] === undefined ? null : pathToFileURL(process.argv[1]).href;

if (entryUrl !== null && import.meta.url === entryUrl) {
  runEntrypoint();
}
