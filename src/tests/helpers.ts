import { TemplateError } from '../errors';

/**
 * Runs `fn` and returns the `TemplateError` it throws.
 *
 * Fails the test when `fn` returns normally; rethrows anything that is not a
 * `TemplateError`.
 */
export function captureError(fn: () => unknown): TemplateError {
  try {
    fn();
  } catch (error) {
    if (error instanceof TemplateError) return error;
    throw error;
  }
  throw new Error('Expected the call to throw');
}

/**
 * A promise together with its settle functions.
 */
export type Deferred<T> = {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
};

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
