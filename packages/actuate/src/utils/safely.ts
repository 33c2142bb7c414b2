/**
 * Runs `fn` and hands any thrown error to `report` instead of propagating it.
 * Used for cleanup hooks that must never break the caller.
 */
export function safely(fn: () => void, report: (error: unknown) => void): void {
  try {
    fn();
  } catch (error) {
    report(error);
  }
}
