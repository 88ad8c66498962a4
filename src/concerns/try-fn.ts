/** Result tuple type for tryFn */
export type TryResult<T> = [ok: true, err: null, data: T] | [ok: false, err: Error, data: undefined];

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * tryFn - error-as-value wrapper around an async call.
 *
 * Never rejects: the outcome is always one of the two tuple shapes.
 */
export async function tryFn<T>(fnOrPromise: (() => Promise<T>) | Promise<T>): Promise<TryResult<T>> {
  try {
    const data = typeof fnOrPromise === 'function' ? await fnOrPromise() : await fnOrPromise;
    return [true, null, data];
  } catch (error: unknown) {
    return [false, toError(error), undefined];
  }
}

/**
 * Synchronous version of tryFn for cases where you know the function is synchronous
 */
export function tryFnSync<T>(fn: () => T): TryResult<T> {
  try {
    const result = fn();
    return [true, null, result];
  } catch (err: unknown) {
    return [false, toError(err), undefined];
  }
}

export default tryFn;
