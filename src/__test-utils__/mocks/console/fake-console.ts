/**
 * Console stand-in for CLI tests.
 *
 * Covers the two methods the CLI writes through (`MainDeps['console']`).
 */

import type { Mock } from 'vitest';
import { vi } from 'vitest';

export interface FakeConsole {
  readonly log: Mock<unknown[], void>;
  readonly error: Mock<unknown[], void>;
}

export function fakeConsole(): FakeConsole {
  return {
    log: vi.fn<unknown[], void>(),
    error: vi.fn<unknown[], void>(),
  };
}

/**
 * Lines printed through one console method, arguments joined by spaces.
 */
export function printedLines(method: Mock<unknown[], void>): string[] {
  return method.mock.calls.map((args) => args.map(String).join(' '));
}
