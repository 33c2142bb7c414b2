/**
 * Type guard to check if a value is a PromiseLike object.
 *
 * A PromiseLike is any object that has a `then` method, which includes
 * native Promises and custom thenables.
 *
 * @example
 * ```ts
 * const result = hooks.before();
 * if (isPromiseLike(result)) {
 *   await result;
 * }
 * ```
 */
export function isPromiseLike<T = unknown>(
  value: unknown
): value is PromiseLike<T> {
  return (
    typeof value === "object" &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

const AsyncFunction = (async () => {}).constructor;

/**
 * Whether `fn` was declared with the `async` keyword.
 * Functions returning a Promise without it are not detected.
 */
export function isAsyncFunction(fn: unknown): boolean {
  return typeof fn === "function" && fn instanceof AsyncFunction;
}
