/**
 * Tests for shared error hierarchy.
 */

import { describe, expect, it } from 'vitest';

import {
  AppError,
  BaselineStoreError,
  CliError,
  ConfigurationError,
  formatErrorMessage,
  hasErrorProperty,
  InputError,
  isAppError,
  isConfigurationError,
  ProcessError,
} from './errors.ts';

describe('errors', () => {
  it('constructs AppError with code, message, name, and optional metadata', () => {
    const cause = new Error('root cause');
    const details = { subject: 'docs' };
    const err = new AppError('CONFIG_INVALID', 'Bad rule', { cause, details });

    expect(err.code).toBe('CONFIG_INVALID');
    expect(err.message).toBe('Bad rule');
    expect(err.name).toBe('AppError');
    expect(err.details).toEqual(details);
    expect(err.cause).toBe(cause);
  });

  it('constructs AppError without metadata', () => {
    const err = new AppError('UNEXPECTED_ERROR', 'Unknown failure');

    expect(err.details).toBeUndefined();
    expect(err.cause).toBeUndefined();
  });

  it('keeps non-Error causes as-is', () => {
    const err = new AppError('UNEXPECTED_ERROR', 'Wrapped', { cause: 'plain string' });

    expect(err.cause).toBe('plain string');
  });

  it('uses cause stack when its own stack is empty', () => {
    const originalPrepare = Error.prepareStackTrace;
    Error.prepareStackTrace = () => '';

    try {
      const cause = new Error('root cause');
      cause.stack = 'cause-stack';
      const err = new AppError('CLI_PARSE_ERROR', 'Parse failed', { cause });

      expect(err.stack).toBe('cause-stack');
    } finally {
      Error.prepareStackTrace = originalPrepare;
    }
  });

  it('names subclasses after their constructor', () => {
    const errors = [
      new ConfigurationError('CONFIG_UNKNOWN_CATEGORY', 'unknown'),
      new InputError('INPUT_INVALID_CHANGE_SET', 'bad path'),
      new BaselineStoreError('BASELINE_READ_FAILED', 'unreadable'),
      new CliError('CLI_INVALID_ARGUMENT', 'bad flag'),
      new ProcessError('PROCESS_SPAWN_FAILED', 'git missing'),
    ];

    expect(errors.map((e) => e.name)).toEqual([
      'ConfigurationError',
      'InputError',
      'BaselineStoreError',
      'CliError',
      'ProcessError',
    ]);
    expect(errors.every((e) => e instanceof AppError)).toBe(true);
  });

  it('formats AppError with code and message', () => {
    const err = new ConfigurationError('CONFIG_UNKNOWN_CATEGORY', 'Job group "perf" is broken');

    expect(formatErrorMessage(err)).toBe('CONFIG_UNKNOWN_CATEGORY: Job group "perf" is broken');
  });

  it('formats standard Error messages and non-errors', () => {
    expect(formatErrorMessage(new Error('plain'))).toBe('plain');
    expect(formatErrorMessage(42)).toBe('42');
  });

  it('narrows with type guards', () => {
    const config = new ConfigurationError('CONFIG_INVALID', 'x');
    const input = new InputError('INPUT_INVALID_METRIC', 'y');

    expect(isAppError(config)).toBe(true);
    expect(isAppError(new Error('z'))).toBe(false);
    expect(isConfigurationError(config)).toBe(true);
    expect(isConfigurationError(input)).toBe(false);
  });

  it('checks for error properties', () => {
    expect(hasErrorProperty({ code: 'ENOENT' }, 'code')).toBe(true);
    expect(hasErrorProperty({}, 'code')).toBe(false);
    expect(hasErrorProperty(null, 'code')).toBe(false);
    expect(hasErrorProperty('code', 'code')).toBe(false);
  });
});
