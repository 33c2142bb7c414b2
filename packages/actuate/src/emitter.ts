export type Listener<T> = (payload: T) => void;

/**
 * Minimal pub/sub used for store change notifications.
 *
 * @template T - The type of payload emitted to listeners
 */
export interface Emitter<T> {
  /**
   * Subscribe a listener.
   *
   * @returns Unsubscribe function (idempotent)
   */
  on(listener: Listener<T>): VoidFunction;

  /**
   * Emit to every listener registered at the time of the call.
   * A throwing listener is reported through `onError`; the rest still run.
   */
  emit(payload: T): void;

  /** Remove all registered listeners. */
  clear(): void;

  /** Number of registered listeners */
  readonly size: number;
}

/**
 * Creates an event emitter.
 *
 * @example
 * ```ts
 * const changes = emitter<number>((error) => logger.error(error));
 * const off = changes.on((count) => render(count));
 * changes.emit(1);
 * off();
 * ```
 */
export function emitter<T>(onError: (error: unknown) => void): Emitter<T> {
  const listeners = new Set<Listener<T>>();

  return {
    on(listener) {
      // Wrap so the same function can be subscribed twice.
      const entry: Listener<T> = (payload) => listener(payload);
      listeners.add(entry);
      return () => {
        listeners.delete(entry);
      };
    },
    emit(payload) {
      // Snapshot: listeners may unsubscribe while we iterate.
      const copy = Array.from(listeners);
      for (let i = 0; i < copy.length; i++) {
        try {
          copy[i](payload);
        } catch (error) {
          onError(error);
        }
      }
    },
    clear() {
      listeners.clear();
    },
    get size() {
      return listeners.size;
    },
  };
}
