/**
 * Run Logger Tests
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createTempDir, removeTempDir } from '../../__test-utils__/utils/temp-utils.ts';
import { createRunLogger } from './logger.ts';
import type { TraceContext } from './tracing.ts';

const TRACE: TraceContext = {
  traceId: '0123456789abcdef0123456789abcdef',
  spanId: 'fedcba9876543210',
  samplingDecision: true,
};
const clock = (): Date => new Date('2024-03-10T12:00:00.000Z');

let logDir = '';

beforeEach(async () => {
  logDir = await createTempDir('run-logger-');
});

afterEach(async () => {
  await removeTempDir(logDir);
});

async function readLines(file: string): Promise<string[]> {
  return (await readFile(file, 'utf8')).split('\n').filter((line) => line.length > 0);
}

describe('Run Logger', () => {
  it('writes plain lines with timestamp, component and trace prefix', async () => {
    const logger = await createRunLogger({ logDir, traceContext: TRACE, clock });

    logger.info('Run started');
    logger.warn('two\nlines', 'config');
    logger.debug('hidden at info level');
    await logger.close();

    expect(logger.logPath).toBe(path.join(logDir, 'decision.log'));
    expect(await readLines(logger.logPath)).toEqual([
      '[2024-03-10T12:00:00.000Z] [ci-decide] [trace=01234567] Run started',
      '[2024-03-10T12:00:00.000Z] [config] [trace=01234567] WARN: two',
      '[2024-03-10T12:00:00.000Z] [config] [trace=01234567] WARN: lines',
    ]);
  });

  it('keeps debug entries at debug level', async () => {
    const logger = await createRunLogger({ logDir, traceContext: TRACE, clock, level: 'debug' });

    logger.debug('details');
    await logger.close();

    expect(await readLines(logger.logPath)).toEqual([
      '[2024-03-10T12:00:00.000Z] [ci-decide] [trace=01234567] DEBUG: details',
    ]);
  });

  it('writes one JSON object per line in structured mode', async () => {
    const logger = await createRunLogger({
      logDir,
      traceContext: TRACE,
      clock,
      structured: true,
    });

    logger.error('Run failed', 'engine');
    await logger.close();

    const [line] = await readLines(logger.logPath);
    expect(JSON.parse(line ?? '')).toEqual({
      timestamp: '2024-03-10T12:00:00.000Z',
      level: 'error',
      component: 'engine',
      message: 'Run failed',
      traceId: TRACE.traceId,
      spanId: TRACE.spanId,
      sampled: true,
    });
  });

  it('ignores entries logged after close', async () => {
    const logger = await createRunLogger({ logDir, traceContext: TRACE, clock });

    logger.info('kept');
    await logger.close();
    logger.info('dropped');
    await logger.close();

    expect(await readLines(logger.logPath)).toHaveLength(1);
  });

  it('creates the log directory', async () => {
    const nested = path.join(logDir, 'nested', 'logs');
    const logger = await createRunLogger({ logDir: nested, clock });

    logger.info('hello');
    await logger.close();

    expect(await readLines(path.join(nested, 'decision.log'))).toHaveLength(1);
    expect(logger.traceContext.traceId).toMatch(/^[a-f0-9]{32}$/);
  });
});
