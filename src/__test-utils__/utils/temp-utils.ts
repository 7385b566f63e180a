/**
 * Shared temp directory helpers.
 *
 * Every test that touches the file system works inside its own directory
 * under the OS temp dir and removes it afterwards.
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

/**
 * Create a fresh temporary directory.
 * Caller must clean up with removeTempDir().
 */
export async function createTempDir(prefix: string = 'ci-decision-'): Promise<string> {
  return mkdtemp(path.join(tmpdir(), prefix));
}

/**
 * Write a file inside a directory and return its full path.
 */
export async function writeTempFile(dir: string, name: string, content: string): Promise<string> {
  const filePath = path.join(dir, name);
  await writeFile(filePath, content, 'utf8');
  return filePath;
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}
