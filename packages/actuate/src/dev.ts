/**
 * Development-only diagnostics and the library's log line format.
 *
 * `process.env.NODE_ENV` is replaced by bundlers at build time, so the
 * `dev.*` helpers disappear from production bundles.
 */

/** Prefix carried by every line the library logs. */
export const LOG_PREFIX = "[actuate]";

/**
 * Check if running in development mode, optionally running `fn` when so.
 *
 * @example
 * ```ts
 * dev(() => {
 *   checkPolicyOrder(spec);
 * });
 * ```
 */
export function dev(fn?: () => void): boolean {
  if (process.env.NODE_ENV === "production") {
    return false;
  }

  if (fn) {
    fn();
  }

  return true;
}

export namespace dev {
  export function log(message: string, ...args: unknown[]): void {
    if (process.env.NODE_ENV !== "production") {
      console.log(`${LOG_PREFIX} ${message}`, ...args);
    }
  }

  export function warn(message: string, ...args: unknown[]): void {
    if (process.env.NODE_ENV !== "production") {
      console.warn(`${LOG_PREFIX} ${message}`, ...args);
    }
  }

  export function error(message: string, ...args: unknown[]): void {
    if (process.env.NODE_ENV !== "production") {
      console.error(`${LOG_PREFIX} ${message}`, ...args);
    }
  }

  /**
   * Assert a condition only in development.
   * Throws in development when the condition is false.
   */
  export function assert(condition: boolean, message: string): void {
    if (process.env.NODE_ENV !== "production") {
      if (!condition) {
        throw new Error(`${LOG_PREFIX} Assertion failed: ${message}`);
      }
    }
  }
}
