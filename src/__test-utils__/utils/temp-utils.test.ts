/**
 * Tests for shared temp directory utilities.
 */

import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { describe, expect, it } from 'vitest';

import { createTempDir, removeTempDir, writeTempFile } from './temp-utils.ts';

describe('temp utils', () => {
  it('creates, fills and removes a temp directory', async () => {
    const dir = await createTempDir('temp-utils-');
    expect(path.basename(dir).startsWith('temp-utils-')).toBe(true);

    const file = await writeTempFile(dir, 'list.txt', 'README.md\n');
    expect(file).toBe(path.join(dir, 'list.txt'));
    expect(readFileSync(file, 'utf8')).toBe('README.md\n');

    await removeTempDir(dir);
    expect(existsSync(dir)).toBe(false);
  });

  it('ignores directories that are already gone', async () => {
    const dir = await createTempDir();
    await removeTempDir(dir);

    await expect(removeTempDir(dir)).resolves.toBeUndefined();
  });
});
