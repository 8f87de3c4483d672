/**
 * Helpers for code paths that stay synchronous until a handler hands back a
 * promise.
 */

export type MaybePromise<T> = T | Promise<T>;

export function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  if (value === null || (typeof value !== 'object' && typeof value !== 'function')) {
    return false;
  }
  return 'then' in value && typeof value.then === 'function';
}

/**
 * Run `next` on `value` now, or once it settles when it is a thenable.
 */
export function thenOrNow<R>(value: unknown, next: (resolved: unknown) => R): MaybePromise<R> {
  if (isPromiseLike(value)) {
    return Promise.resolve(value).then(next);
  }
  return next(value);
}
