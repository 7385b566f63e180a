/**
 * CLI Validation
 *
 * Role:
 *   Validate the change source selection and directory paths.
 *
 * Responsibilities:
 *   - Require exactly one way of obtaining the change set
 *   - Ensure directory paths are safe (no directory traversal)
 */

import fs from 'node:fs';
import path from 'node:path';

import { CliError, hasErrorProperty } from '../../errors/errors.ts';

/**
 * Where the changed file list comes from.
 */
export type ChangeSource =
  | { readonly kind: 'list'; readonly files: readonly string[] }
  | { readonly kind: 'file'; readonly path: string }
  | { readonly kind: 'git'; readonly base: string; readonly head: string };

export interface ChangeSourceInput {
  readonly files?: readonly string[] | undefined;
  readonly filesFrom?: string | undefined;
  readonly base?: string | undefined;
  readonly head?: string | undefined;
}

const CHANGE_SOURCE_HINT = 'use one of --files, --files-from, or --base with --head';

/**
 * Resolve the single change source the user selected.
 *
 * `--files` may repeat and takes comma-separated lists; an empty list is a
 * valid (empty) change set.
 *
 * @throws {CliError} when zero or several sources are given, or `--base`
 *   and `--head` are not given together.
 */
export function resolveChangeSource(input: ChangeSourceInput): ChangeSource {
  if ((input.base === undefined) !== (input.head === undefined)) {
    throw new CliError('CLI_INVALID_ARGUMENT', '--base and --head must be given together');
  }

  const selected = [
    input.files === undefined ? null : '--files',
    input.filesFrom === undefined ? null : '--files-from',
    input.base === undefined ? null : '--base/--head',
  ].filter((name): name is string => name !== null);

  if (selected.length === 0) {
    throw new CliError('CLI_INVALID_ARGUMENT', `No change source given; ${CHANGE_SOURCE_HINT}`);
  }
  if (selected.length > 1) {
    throw new CliError(
      'CLI_INVALID_ARGUMENT',
      `Conflicting change sources (${selected.join(', ')}); ${CHANGE_SOURCE_HINT}`,
    );
  }

  if (input.files !== undefined) {
    const files = input.files
      .flatMap((entry) => entry.split(','))
      .map((file) => file.trim())
      .filter((file) => file.length > 0);
    return { kind: 'list', files };
  }
  if (input.filesFrom !== undefined) {
    if (input.filesFrom.trim().length === 0) {
      throw new CliError('CLI_INVALID_ARGUMENT', '--files-from requires a path');
    }
    return { kind: 'file', path: input.filesFrom };
  }

  const base = input.base?.trim() ?? '';
  const head = input.head?.trim() ?? '';
  if (base.length === 0 || head.length === 0) {
    throw new CliError('CLI_INVALID_ARGUMENT', '--base and --head require a git revision');
  }
  if (base.startsWith('-') || head.startsWith('-')) {
    throw new CliError('CLI_INVALID_ARGUMENT', 'Git revisions must not start with "-"');
  }
  return { kind: 'git', base, head };
}

function isOutside(relativePath: string): boolean {
  return (
    relativePath === '..' ||
    relativePath.startsWith(`..${path.sep}`) ||
    path.isAbsolute(relativePath)
  );
}

/**
 * Ensure that `inputPath` resolves to a directory that lives under `baseDir`.
 *
 * The resolved path (and its realpath, when it exists) must stay inside the
 * base directory, so neither `..` nor a symlink can escape it.
 *
 * @throws {CliError} when the resolved path escapes the base directory.
 */
export function ensureSafeDirectoryPath(
  baseDir: string,
  inputPath: string,
  label = 'Directory',
): string {
  const resolvedBase = path.resolve(baseDir);
  const reject = (): never => {
    throw new CliError('CLI_INVALID_PATH', `${label} must be within ${resolvedBase}`, {
      details: { resolvedBase, inputPath },
    });
  };

  // Windows-style separators on POSIX could hide a traversal.
  if (path.sep !== '\\' && inputPath.includes('\\')) {
    reject();
  }

  const resolvedPath = path.resolve(resolvedBase, inputPath);
  if (isOutside(path.relative(resolvedBase, resolvedPath))) {
    reject();
  }

  let realResolved: string | undefined;
  try {
    // eslint-disable-next-line security/detect-non-literal-fs-filename
    realResolved = fs.realpathSync(resolvedPath);
  } catch (error) {
    // Not created yet: nothing to follow.
    if (!(hasErrorProperty(error, 'code') && error.code === 'ENOENT')) {
      throw error;
    }
  }

  if (realResolved !== undefined) {
    const realBase = fs.realpathSync(resolvedBase);
    if (isOutside(path.relative(realBase, realResolved))) {
      reject();
    }
  }

  return resolvedPath;
}
