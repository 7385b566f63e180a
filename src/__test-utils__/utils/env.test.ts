/**
 * Tests for environment helpers.
 */

import { afterEach, describe, expect, it } from 'vitest';

import { restoreEnv, snapshotEnv, withEnv } from './env.ts';

const KEY = 'CI_DECISION_ENV_HELPER_TEST';

describe('env helpers', () => {
  afterEach(() => {
    delete process.env[KEY];
  });

  it('restores a snapshot, including unset keys', () => {
    const unset = snapshotEnv([KEY]);
    process.env[KEY] = 'before';
    const set = snapshotEnv([KEY]);

    process.env[KEY] = 'after';
    restoreEnv(set);
    expect(process.env[KEY]).toBe('before');

    restoreEnv(unset);
    expect(KEY in process.env).toBe(false);
  });

  it('applies updates only for the duration of the callback', async () => {
    process.env[KEY] = 'outer';

    const seen = await withEnv({ [KEY]: 'inner' }, () => process.env[KEY]);

    expect(seen).toBe('inner');
    expect(process.env[KEY]).toBe('outer');
  });

  it('unsets variables and restores them after a failure', async () => {
    process.env[KEY] = 'set';

    await expect(
      withEnv({ [KEY]: undefined }, () => {
        expect(process.env[KEY]).toBeUndefined();
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(process.env[KEY]).toBe('set');
  });
});
