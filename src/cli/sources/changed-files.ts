/**
 * Changed File Sources
 *
 * Produces the change set from git or from a newline-delimited list.
 *
 * A failed git diff is an error, never an empty list: an empty change set
 * is a meaningful input that can skip every job group.
 */

import { type ExecFileException, execFile } from 'node:child_process';
import { readFile } from 'node:fs/promises';

import { InputError, ProcessError } from '../../errors/errors.ts';

export interface GitDiffOptions {
  readonly base: string;
  readonly head: string;
  readonly cwd?: string;
}

/**
 * Split newline-delimited output into trimmed, non-empty lines.
 */
export function parseFileList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Callback form of `execFile` with string output.
 */
export type ExecFileFn = (
  file: string,
  args: readonly string[],
  options: { readonly cwd: string; readonly encoding: 'utf8'; readonly maxBuffer: number },
  callback: (error: ExecFileException | null, stdout: string, stderr: string) => void,
) => unknown;

/** Large diffs list many paths; the default 1 MiB buffer is too small. */
const GIT_MAX_BUFFER = 64 * 1024 * 1024;

/**
 * Split NUL-terminated `git diff -z` output. Paths are kept byte for byte,
 * spaces included.
 */
export function parseNulList(output: string): string[] {
  return output.split('\0').filter((entry) => entry.length > 0);
}

/**
 * List files changed between two git revisions.
 *
 * Runs `git -c core.quotePath=false diff --name-only -z`, so paths with
 * non-ASCII bytes or whitespace come back verbatim instead of C-quoted.
 *
 * @throws {ProcessError} when git cannot be run or the diff fails.
 */
export function listChangedFiles(
  { base, head, cwd }: GitDiffOptions,
  execFileFn: ExecFileFn = execFile,
): Promise<string[]> {
  const args = ['-c', 'core.quotePath=false', 'diff', '--name-only', '-z', base, head];

  return new Promise((resolve, reject) => {
    // Argument array, no shell.
    // eslint-disable-next-line sonarjs/no-os-command-from-path
    execFileFn(
      'git',
      args,
      { cwd: cwd ?? process.cwd(), encoding: 'utf8', maxBuffer: GIT_MAX_BUFFER },
      (error, stdout, stderr) => {
        if (error === null) {
          resolve(parseNulList(stdout));
          return;
        }

        const details: { command: string; exitCode?: number; stderr?: string } = {
          command: `git ${args.join(' ')}`,
        };
        if (typeof error.code === 'number') {
          details.exitCode = error.code;
        }
        const trimmed = stderr.trim();
        if (trimmed.length > 0) {
          details.stderr = trimmed;
        }
        const suffix = details.stderr === undefined ? '' : `: ${details.stderr}`;
        reject(
          new ProcessError('PROCESS_SPAWN_FAILED', `git diff ${base} ${head} failed${suffix}`, {
            cause: error,
            details,
          }),
        );
      },
    );
  });
}

/**
 * Read a newline-delimited list of changed files.
 *
 * @throws {InputError} when the file cannot be read.
 */
export async function readFileList(filePath: string): Promise<string[]> {
  try {
    return parseFileList(await readFile(filePath, 'utf8'));
  } catch (error) {
    throw new InputError('INPUT_READ_FAILED', `Cannot read changed file list ${filePath}`, {
      cause: error,
      details: { filePath },
    });
  }
}
