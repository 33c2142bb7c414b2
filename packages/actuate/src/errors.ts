/**
 * Custom error classes for actuate.
 * Using named error classes helps with error identification and handling.
 */

/**
 * Base class for all actuate errors.
 */
export class ActuateError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ActuateError";
  }
}

// =============================================================================
// Store Errors
// =============================================================================

/**
 * Thrown when the store is used in a way the dispatch pipeline cannot honor:
 * a sync dispatch of an async action, dispatching the same action instance
 * twice, or a sync hook that returns a Promise.
 */
export class StoreError extends ActuateError {
  constructor(message: string) {
    super(message);
    this.name = "StoreError";
  }
}

/**
 * Thrown when two policies that own the same extension point are layered
 * onto one action.
 */
export class IncompatiblePoliciesError extends ActuateError {
  constructor(
    readonly actionName: string,
    readonly first: string,
    readonly second: string
  ) {
    super(
      `The ${second} policy cannot be combined with the ${first} policy ` +
        `(action "${actionName}").`
    );
    this.name = "IncompatiblePoliciesError";
  }
}

/**
 * Throw from `before` or `reduce` to drop the dispatch silently.
 * The action ends with `status.isDispatchAborted`; `after` still runs.
 */
export class AbortDispatchError extends ActuateError {
  constructor() {
    super("Dispatch aborted.");
    this.name = "AbortDispatchError";
  }
}

// =============================================================================
// User-facing Errors
// =============================================================================

export interface UserErrorOptions {
  reason?: string;
  cause?: unknown;
  code?: string | number;
  /** Whether a UI should show a dialog for this error (default: true) */
  ifOpenDialog?: boolean;
  /** Short text for a UI that shows no dialog. */
  errorText?: string;
  props?: Readonly<Record<string, unknown>>;
}

/**
 * A recoverable error meant to be shown to the user.
 *
 * The store queues these instead of rethrowing them (unless an error
 * observer asks for a rethrow). A UserError may wrap another through
 * `cause`; `reason` adds a secondary line.
 */
export class UserError extends ActuateError {
  readonly reason: string | undefined;
  readonly code: string | number | undefined;
  readonly ifOpenDialog: boolean;
  readonly errorText: string | undefined;
  readonly props: Readonly<Record<string, unknown>>;

  constructor(message: string, options: UserErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "UserError";
    this.reason = options.reason;
    this.code = options.code;
    this.ifOpenDialog = options.ifOpenDialog ?? true;
    this.errorText = options.errorText;
    this.props = options.props ?? {};
  }

  protected options(): UserErrorOptions {
    return {
      reason: this.reason,
      cause: this.cause,
      code: this.code,
      ifOpenDialog: this.ifOpenDialog,
      errorText: this.errorText,
      props: this.props,
    };
  }

  /** Same error with a different dialog flag. */
  withDialog(ifOpenDialog: boolean): UserError {
    return new UserError(this.message, { ...this.options(), ifOpenDialog });
  }

  get noDialog(): UserError {
    return this.withDialog(false);
  }

  /** Appends to the reason, or sets it when there is none. */
  addReason(reason: string): UserError {
    return new UserError(this.message, {
      ...this.options(),
      reason: this.reason ? `${this.reason}\n\n${reason}` : reason,
    });
  }

  withProps(props: Readonly<Record<string, unknown>>): UserError {
    return new UserError(this.message, {
      ...this.options(),
      props: { ...this.props, ...props },
    });
  }

  /**
   * The first cause in the chain that is not itself a UserError,
   * or `undefined` when the chain only holds user errors.
   */
  hardCause(): unknown {
    let cause = this.cause;
    while (cause instanceof UserError) {
      cause = cause.cause;
    }
    return cause;
  }

  withoutHardCause(): UserError {
    const cause = this.cause;
    return new UserError(this.message, {
      ...this.options(),
      cause: cause instanceof UserError ? cause.withoutHardCause() : undefined,
    });
  }

  /**
   * Message and reason, followed by the messages of nested user errors.
   * Each part is separated by a blank line.
   */
  override toString(): string {
    const parts = [this.message];
    if (this.reason) parts.push(this.reason);
    let cause = this.cause;
    while (cause instanceof UserError) {
      parts.push(cause.message);
      if (cause.reason) parts.push(cause.reason);
      cause = cause.cause;
    }
    return parts.join("\n\n");
  }
}

/**
 * The user-facing error for a missing Internet connection.
 */
export class ConnectionError extends UserError {
  constructor(options: UserErrorOptions = {}) {
    super("There is no Internet", {
      reason: "Please, verify your connection.",
      errorText: "No Internet connection",
      ...options,
    });
    this.name = "ConnectionError";
  }

  static readonly noConnectivity = new ConnectionError();

  override withDialog(ifOpenDialog: boolean): ConnectionError {
    return new ConnectionError({ ...this.options(), ifOpenDialog });
  }
}

// =============================================================================
// Policy Errors
// =============================================================================

/**
 * Thrown when an optimistic sync loop keeps finding new local values
 * after every request.
 */
export class TooManyFollowUpsError extends ActuateError {
  constructor(readonly actionName: string, readonly limit: number) {
    super(`Too many follow-up requests in action ${actionName} (> ${limit}).`);
    this.name = "TooManyFollowUpsError";
  }
}

/**
 * Thrown when a push-aware sync action's `sendValueToServer` finishes
 * without reporting the server revision.
 */
export class MissingServerRevisionError extends ActuateError {
  constructor(readonly actionName: string) {
    super(
      `${actionName}: sendValueToServer() must call informServerRevision(). ` +
        `Use stableSync() when there is no server push.`
    );
    this.name = "MissingServerRevisionError";
  }
}

/**
 * Throw from an optional callback to say it is not provided.
 */
export class NotImplementedError extends ActuateError {
  constructor(what: string) {
    super(`${what} is not implemented.`);
    this.name = "NotImplementedError";
  }
}

/**
 * Thrown by `waitCondition` when the state never satisfied the predicate.
 */
export class TimeoutError extends ActuateError {
  constructor(readonly timeoutMillis: number) {
    super(`Condition not met within ${timeoutMillis}ms.`);
    this.name = "TimeoutError";
  }
}

/**
 * Wraps a failure of the persistence backend.
 */
export class PersistError extends ActuateError {
  constructor(
    readonly operation: "persist" | "read" | "delete" | "saveInitial",
    cause: unknown
  ) {
    super(`Persistor failed to ${operation}.`, { cause });
    this.name = "PersistError";
  }
}
