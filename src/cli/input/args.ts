/**
 * CLI Argument Parsing
 *
 * Role:
 *   Handle all argument parsing, validation, and normalization.
 *
 * Responsibilities:
 *   - Parse raw argv into structured CLIArgs
 *   - Require exactly one change source
 *   - Map parse errors to descriptive CliErrors
 */

import { parseArgs } from 'node:util';

import { DEFAULT_CONFIG_PATH } from '../../config/loader.ts';
import { CliError, hasErrorProperty } from '../../errors/errors.ts';
import { DEFAULT_BASELINE_DIR } from '../store/baseline-store.ts';
import { type ChangeSource, resolveChangeSource } from './validation.ts';

export const DEFAULT_OUTPUT_DIR = './ci-decision';
export const DEFAULT_LOG_DIR = './logs';

/* -------------------------------------------------------------------------- */
/* CLI argument model                                                          */
/* -------------------------------------------------------------------------- */

export interface CLIArgs {
  readonly config: string;
  /** Null only when `--help` or `--version` short-circuits the run. */
  readonly changeSource: ChangeSource | null;
  readonly metrics?: string;
  readonly baselineDir: string;
  readonly appendBaseline: boolean;
  readonly outputDir: string;
  readonly logDir: string;
  readonly structuredLogs: boolean;
  readonly verbose: boolean;
  readonly help: boolean;
  readonly version: boolean;
}

/* -------------------------------------------------------------------------- */
/* Argument parsing                                                            */
/* -------------------------------------------------------------------------- */

const OPTIONS = {
  config: { type: 'string' },
  files: { type: 'string', multiple: true },
  'files-from': { type: 'string' },
  base: { type: 'string' },
  head: { type: 'string' },
  metrics: { type: 'string' },
  'baseline-dir': { type: 'string' },
  'append-baseline': { type: 'boolean' },
  'output-dir': { type: 'string' },
  'log-dir': { type: 'string' },
  'structured-logs': { type: 'boolean' },
  verbose: { type: 'boolean' },
  debug: { type: 'boolean' },
  help: { type: 'boolean' },
  version: { type: 'boolean' },
} as const;

type RawCliValues = {
  readonly config?: string;
  readonly files?: readonly string[];
  readonly 'files-from'?: string;
  readonly base?: string;
  readonly head?: string;
  readonly metrics?: string;
  readonly 'baseline-dir'?: string;
  readonly 'append-baseline'?: boolean;
  readonly 'output-dir'?: string;
  readonly 'log-dir'?: string;
  readonly 'structured-logs'?: boolean;
  readonly verbose?: boolean;
  readonly debug?: boolean;
  readonly help?: boolean;
  readonly version?: boolean;
};

/**
 * Parse the raw argv array into structured CLI arguments.
 *
 * @throws {CliError} when parsing fails or validation rejects the inputs.
 */
export function parseCliArgs(argv: readonly string[] = process.argv.slice(2)): CLIArgs {
  let values: RawCliValues;
  let positionals: readonly string[];
  try {
    ({ values, positionals } = parseArgs({
      args: [...argv],
      strict: true,
      allowPositionals: true,
      options: OPTIONS,
    }));
  } catch (error) {
    throw mapParseArgsError(error);
  }
  return normalizeCliArgs(values, positionals);
}

function requirePath(option: string, value: string | undefined, fallback: string): string {
  const resolved = value ?? fallback;
  if (resolved.trim().length === 0) {
    throw new CliError('CLI_INVALID_ARGUMENT', `--${option} requires a path`);
  }
  return resolved;
}

/**
 * Normalize the `parseArgs` output into our CLI shape and enforce validation rules.
 */
function normalizeCliArgs(values: RawCliValues, positionals: readonly string[]): CLIArgs {
  if (positionals.length > 0) {
    throw new CliError('CLI_INVALID_ARGUMENT', `Unexpected argument: ${positionals[0]}`);
  }

  const metrics =
    values.metrics === undefined ? undefined : requirePath('metrics', values.metrics, '');
  const help = values.help === true;
  const version = values.version === true;

  return {
    config: requirePath('config', values.config, DEFAULT_CONFIG_PATH),
    changeSource:
      help || version
        ? null
        : resolveChangeSource({
            files: values.files,
            filesFrom: values['files-from'],
            base: values.base,
            head: values.head,
          }),
    ...(metrics === undefined ? {} : { metrics }),
    baselineDir: requirePath('baseline-dir', values['baseline-dir'], DEFAULT_BASELINE_DIR),
    appendBaseline: values['append-baseline'] === true,
    outputDir: requirePath('output-dir', values['output-dir'], DEFAULT_OUTPUT_DIR),
    logDir: requirePath('log-dir', values['log-dir'], DEFAULT_LOG_DIR),
    structuredLogs: values['structured-logs'] === true,
    verbose: values.verbose === true || values.debug === true,
    help,
    version,
  };
}

/**
 * Translate `parseArgs` errors into `CliError` instances with user-friendly messages.
 */
function mapParseArgsError(error: unknown): CliError {
  if (!(error instanceof Error)) {
    return new CliError('CLI_PARSE_ERROR', String(error));
  }

  const code = hasErrorProperty(error, 'code') ? error.code : undefined;
  const option = /'(--?[\w-]+)/.exec(error.message)?.[1];

  if (code === 'ERR_PARSE_ARGS_UNKNOWN_OPTION') {
    return new CliError('CLI_UNKNOWN_OPTION', `Unknown option: ${option ?? error.message}`, {
      cause: error,
    });
  }

  if (code === 'ERR_PARSE_ARGS_INVALID_OPTION_VALUE' && option !== undefined) {
    return new CliError('CLI_INVALID_ARGUMENT', `${option} requires a value`, { cause: error });
  }

  return new CliError('CLI_PARSE_ERROR', error.message, { cause: error });
}
