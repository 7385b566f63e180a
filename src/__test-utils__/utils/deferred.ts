/**
 * Deferred promise helper used by tests.
 */

export interface Deferred<T> {
  readonly promise: Promise<T>;
  readonly resolve: (value: T) => void;
  readonly reject: (error: unknown) => void;
}

/**
 * Create a promise whose settlement the test controls.
 */
export function createDeferred<T>(): Deferred<T> {
  let handlers: Pick<Deferred<T>, 'resolve' | 'reject'> | undefined;
  const promise = new Promise<T>((resolve, reject) => {
    handlers = { resolve, reject };
  });
  if (handlers === undefined) {
    throw new Error('Promise executor did not run synchronously');
  }
  return { promise, ...handlers };
}
