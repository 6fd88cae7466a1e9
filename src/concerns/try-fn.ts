/** Result tuple type for tryFn */
export type TryResult<T> = [ok: true, err: null, data: T] | [ok: false, err: Error, data: undefined];

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * tryFn - runs a function (sync or async) or awaits a promise and reports the
 * outcome as an `[ok, err, data]` tuple instead of throwing.
 *
 * Synchronous throws from a function that would have returned a promise are
 * reported through the returned promise as well.
 */
export function tryFn<T>(fnOrPromise: () => Promise<T>): Promise<TryResult<Awaited<T>>>;
export function tryFn<T>(fnOrPromise: Promise<T>): Promise<TryResult<Awaited<T>>>;
export function tryFn<T>(fnOrPromise: (() => Promise<T>) | Promise<T>): Promise<TryResult<Awaited<T>>> {
  let pending: Promise<T>;

  if (typeof fnOrPromise === 'function') {
    try {
      pending = fnOrPromise();
    } catch (error: unknown) {
      return Promise.resolve([false, toError(error), undefined]);
    }
  } else {
    pending = fnOrPromise;
  }

  return Promise.resolve(pending)
    .then((data): TryResult<Awaited<T>> => [true, null, data])
    .catch((error: unknown): TryResult<Awaited<T>> => [false, toError(error), undefined]);
}

export default tryFn;
