/**
 * Shared error hierarchy for consistent error handling.
 *
 * Configuration errors are always fatal and name the offending rule, job group
 * or metric. Input errors reject malformed change sets and metric data.
 * Neither is retried: the decision core is deterministic.
 */

export type ErrorCode =
  | 'CLI_INVALID_ARGUMENT'
  | 'CLI_UNKNOWN_OPTION'
  | 'CLI_PARSE_ERROR'
  | 'CLI_INVALID_PATH'
  | 'CONFIG_INVALID'
  | 'CONFIG_INVALID_PATTERN'
  | 'CONFIG_UNKNOWN_CATEGORY'
  | 'CONFIG_UNKNOWN_METRIC'
  | 'CONFIG_DUPLICATE'
  | 'CONFIG_READ_FAILED'
  | 'INPUT_INVALID_CHANGE_SET'
  | 'INPUT_INVALID_METRIC'
  | 'INPUT_READ_FAILED'
  | 'BASELINE_READ_FAILED'
  | 'BASELINE_APPEND_FAILED'
  | 'PROCESS_SPAWN_FAILED'
  | 'UNEXPECTED_ERROR';

/**
 * Error details for configuration problems.
 */
export type ConfigurationErrorDetails = {
  /** Rule category, job group or metric the problem was found in */
  readonly subject?: string;
  /** Source file, when the configuration came from disk */
  readonly filePath?: string;
  /** Individual validation issues, formatted as `path: message` */
  readonly issues?: readonly string[];
};

/**
 * Error details for process operations.
 */
export type ProcessErrorDetails = {
  /** The process exit code, if available */
  readonly exitCode?: number;
  /** The command that was executed */
  readonly command: string;
  /** Any stderr output from the process */
  readonly stderr?: string;
};

export interface ErrorDetails {
  readonly [key: string]: unknown;
}

export class AppError extends Error {
  readonly code: ErrorCode;
  readonly details?: ErrorDetails;
  public override cause?: unknown;

  constructor(
    code: ErrorCode,
    message: string,
    options?: { cause?: unknown; details?: ErrorDetails },
  ) {
    super(message);
    this.code = code;
    if (options?.details !== undefined) {
      this.details = options.details;
    }
    // Chain stack traces when cause is an Error for better debugging
    if (options?.cause instanceof Error) {
      this.cause = options.cause;
      const currentStack = this.stack;
      const causeStack = options.cause.stack;
      if (
        (currentStack === undefined || currentStack === '') &&
        causeStack !== undefined &&
        causeStack !== ''
      ) {
        this.stack = String(causeStack);
      }
    } else if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
    this.name = this.constructor.name;
  }
}

/** Malformed or inconsistent rule, policy or metric definitions. */
export class ConfigurationError extends AppError {}
/** Malformed change-set or metric-sample data. */
export class InputError extends AppError {}
/** Baseline persistence failures (read or append). */
export class BaselineStoreError extends AppError {}
export class CliError extends AppError {}
export class ProcessError extends AppError {}

/**
 * Format an arbitrary error into a concise string for logging or display.
 */
export function formatErrorMessage(error: unknown): string {
  if (error instanceof AppError) {
    return `${error.code}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Narrow an unknown value to an AppError.
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Narrow an unknown value to a ConfigurationError.
 */
export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

/**
 * Check whether an unknown value has the given property name.
 * Useful before accessing properties on caught errors.
 */
export function hasErrorProperty<T extends string>(
  error: unknown,
  prop: T,
): error is Record<T, unknown> {
  return typeof error === 'object' && error !== null && Reflect.has(error, prop);
}
