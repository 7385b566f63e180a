/**
 * Environment helpers for tests that read `process.env` directly.
 */

export type EnvValues = Readonly<Record<string, string | undefined>>;

/**
 * Set or unset variables; `undefined` deletes the key rather than storing
 * the string "undefined".
 */
function applyEnv(values: EnvValues): void {
  for (const [key, value] of Object.entries(values)) {
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
}

export function snapshotEnv(keys: readonly string[]): EnvValues {
  return Object.fromEntries(keys.map((key) => [key, process.env[key]]));
}

export function restoreEnv(snapshot: EnvValues): void {
  applyEnv(snapshot);
}

/**
 * Run `fn` with the given variables applied, restoring the previous values
 * afterwards even when it throws.
 */
export async function withEnv<T>(updates: EnvValues, fn: () => Promise<T> | T): Promise<T> {
  const snapshot = snapshotEnv(Object.keys(updates));
  applyEnv(updates);
  try {
    return await fn();
  } finally {
    restoreEnv(snapshot);
  }
}
