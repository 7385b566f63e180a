/**
 * Error capture helper for tests.
 *
 * Returns the thrown value so assertions can inspect `code` and `details`
 * without casting.
 */

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

/**
 * Async counterpart of {@link captureError}.
 */
export async function captureRejection(fn: () => Promise<unknown>): Promise<unknown> {
  try {
    await fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected promise to reject');
}
