/**
 * CLI Entrypoint
 *
 * Role:
 *   Handle process-level concerns (broken pipe, signals, uncaught errors).
 *
 * Responsibilities:
 *   - Parse argv and answer `--help` / `--version`
 *   - Set up EPIPE error handling
 *   - Map SIGINT/SIGTERM to exit codes 130/143
 *   - Report unexpected failures with a redacted argv
 */

import { AppError, formatErrorMessage } from '../../../errors/errors.ts';
import { executeWithArgs, type MainDeps, type MainResult } from '../../execution/execution.ts';
import { type CLIArgs, parseCliArgs } from '../../input/args.ts';
import { showHelp } from '../help/formatter.ts';
import { showVersion } from '../help/help.ts';

type Signal = 'SIGINT' | 'SIGTERM';

export interface EntrypointDeps {
  readonly mainFn?: () => Promise<MainResult>;
  readonly console?: Pick<typeof console, 'error'>;
  /** Optional graceful shutdown handler invoked on SIGINT/SIGTERM */
  readonly onSignal?: (signal: Signal) => Promise<void> | void;
}

/* -------------------------------------------------------------------------- */
/* Main                                                                       */
/* -------------------------------------------------------------------------- */

/**
 * Parse arguments, handle help and version, and run a decision.
 *
 * Argument errors are reported with a usage hint and exit code 1.
 */
export async function main(deps: MainDeps = {}): Promise<MainResult> {
  const { argv = process.argv.slice(2), ...rest } = deps;
  const out = deps.console ?? console;

  let args: CLIArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    out.error(`❌ ${formatErrorMessage(error)}\nRun ci-decide --help for usage.`);
    return { exitCode: 1 };
  }

  if (args.help) {
    out.log(showHelp());
    return { exitCode: 0 };
  }

  if (args.version) {
    out.log(showVersion());
    return { exitCode: 0 };
  }

  return executeWithArgs(args, rest);
}

/* -------------------------------------------------------------------------- */
/* Process handlers                                                           */
/* -------------------------------------------------------------------------- */

/**
 * Ignore EPIPE (output piped into `head` and the like); rethrow anything else.
 */
function handleBrokenPipe(err: NodeJS.ErrnoException): void {
  if (err.code === 'EPIPE') {
    return;
  }

  throw err;
}

function setupBrokenPipeHandlers(): void {
  for (const stream of [process.stdout, process.stderr]) {
    if (!stream.listeners('error').includes(handleBrokenPipe)) {
      stream.on('error', handleBrokenPipe);
    }
  }
}

/**
 * Register SIGINT/SIGTERM handlers.
 *
 * @returns Cleanup function that unregisters the signal listeners.
 */
function setupSignalHandlers(
  deps: EntrypointDeps,
  errorConsole: Pick<typeof console, 'error'>,
): () => void {
  let handling = false;

  const createHandler = (signal: Signal) => (): void => {
    if (handling) {
      return;
    }
    handling = true;

    if (deps.onSignal) {
      try {
        const maybe = deps.onSignal(signal);
        if (maybe instanceof Promise) {
          maybe.catch((e: unknown) => errorConsole.error('\nWARN: signal handler failed:', e));
        }
      } catch (e) {
        errorConsole.error('\nWARN: signal handler failed:', e);
      }
    }

    // 128 + signal number
    process.exitCode = signal === 'SIGINT' ? 130 : 143;
  };

  const sigintHandler = createHandler('SIGINT');
  const sigtermHandler = createHandler('SIGTERM');

  process.on('SIGINT', sigintHandler);
  process.on('SIGTERM', sigtermHandler);

  return () => {
    process.off('SIGINT', sigintHandler);
    process.off('SIGTERM', sigtermHandler);
  };
}

/**
 * Scrub argv values for logging: long-option values and positionals may carry
 * paths or revisions, so only option names and short flags survive.
 */
export function sanitizeArgs(argv: readonly string[]): string[] {
  return argv.map((arg) => {
    if (arg.startsWith('--')) {
      const [key = arg, value] = arg.split('=', 2);
      return value === undefined ? key : `${key}=<redacted>`;
    }
    if (arg.startsWith('-')) {
      return arg;
    }
    return '<redacted>';
  });
}

/* -------------------------------------------------------------------------- */
/* Entrypoint                                                                 */
/* -------------------------------------------------------------------------- */

/**
 * Run the CLI with broken-pipe handling, signal handling and top-level error
 * reporting. The exit code of `mainFn` is kept unless a signal set one first.
 */
export function runEntrypoint(deps: EntrypointDeps = {}): void {
  const { mainFn = () => main() } = deps;
  const errorConsole = deps.console ?? console;

  setupBrokenPipeHandlers();
  const removeSignalHandlers = setupSignalHandlers(deps, errorConsole);

  void mainFn()
    .then((result) => {
      process.exitCode ??= result.exitCode;
    })
    .catch((error: unknown) => {
      const wrapped = new AppError(
        'UNEXPECTED_ERROR',
        error instanceof Error ? error.message : String(error),
        {
          cause: error,
          details: { context: { argv: sanitizeArgs(process.argv.slice(2)) } },
        },
      );
      errorConsole.error('\n❌ Fatal error:', wrapped);
      process.exitCode = 1;
    })
    .finally(removeSignalHandlers);
}

export const __test__ = {
  handleBrokenPipe,
};
