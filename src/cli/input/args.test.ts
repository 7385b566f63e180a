/**
 * CLI Argument Parsing Tests
 */

import { describe, expect, it } from 'vitest';

import { captureError } from '../../__test-utils__/utils/errors.ts';
import { CliError } from '../../errors/errors.ts';
import { parseCliArgs } from './args.ts';

describe('CLI Argument Parsing', () => {
  it('applies defaults', () => {
    expect(parseCliArgs(['--files', 'README.md'])).toEqual({
      config: '.ci-decision.yaml',
      changeSource: { kind: 'list', files: ['README.md'] },
      baselineDir: '.ci-baseline',
      appendBaseline: false,
      outputDir: './ci-decision',
      logDir: './logs',
      structuredLogs: false,
      verbose: false,
      help: false,
      version: false,
    });
  });

  it('parses every option', () => {
    const args = parseCliArgs([
      '--config',
      'ci/decision.yml',
      '--base',
      'origin/main',
      '--head',
      'HEAD',
      '--metrics',
      'metrics.json',
      '--baseline-dir',
      'history',
      '--append-baseline',
      '--output-dir',
      'out',
      '--log-dir',
      'out/logs',
      '--structured-logs',
      '--verbose',
    ]);

    expect(args).toEqual({
      config: 'ci/decision.yml',
      changeSource: { kind: 'git', base: 'origin/main', head: 'HEAD' },
      metrics: 'metrics.json',
      baselineDir: 'history',
      appendBaseline: true,
      outputDir: 'out',
      logDir: 'out/logs',
      structuredLogs: true,
      verbose: true,
      help: false,
      version: false,
    });
  });

  it('merges repeated and comma-separated --files values', () => {
    const args = parseCliArgs(['--files', 'a.md, b.md', '--files', 'src/c.ts']);

    expect(args.changeSource).toEqual({ kind: 'list', files: ['a.md', 'b.md', 'src/c.ts'] });
  });

  it('accepts an empty --files list as an empty change set', () => {
    expect(parseCliArgs(['--files', '']).changeSource).toEqual({ kind: 'list', files: [] });
  });

  it('treats --debug as --verbose', () => {
    expect(parseCliArgs(['--files', 'a.md', '--debug']).verbose).toBe(true);
  });

  it('does not require a change source for --help or --version', () => {
    expect(parseCliArgs(['--help'])).toMatchObject({ help: true, changeSource: null });
    expect(parseCliArgs(['--version'])).toMatchObject({ version: true, changeSource: null });
  });

  describe('errors', () => {
    it('rejects unknown options', () => {
      const error = captureError(() => parseCliArgs(['--files', 'a.md', '--jobs', 'x']));

      expect(error).toBeInstanceOf(CliError);
      expect(error).toMatchObject({
        code: 'CLI_UNKNOWN_OPTION',
        message: 'Unknown option: --jobs',
      });
    });

    it('rejects positional arguments', () => {
      expect(() => parseCliArgs(['--files', 'a.md', 'extra'])).toThrow(
        'Unexpected argument: extra',
      );
    });

    it('rejects a blank path option', () => {
      expect(() => parseCliArgs(['--files', 'a.md', '--output-dir', ' '])).toThrow(
        '--output-dir requires a path',
      );
    });

    it('requires a change source', () => {
      expect(captureError(() => parseCliArgs([]))).toMatchObject({
        code: 'CLI_INVALID_ARGUMENT',
        message:
          'No change source given; use one of --files, --files-from, or --base with --head',
      });
    });

    it('rejects a missing option value', () => {
      expect(captureError(() => parseCliArgs(['--config']))).toBeInstanceOf(CliError);
    });
  });
});
