import { describe, it, expect, vi } from "vitest";
import { UserError } from "../errors";
import { action } from "./action";
import { logActions, logAndRethrowErrors, swallowErrors } from "./observers";
import { store } from "./store";

const quietLogger = () => ({ log: vi.fn(), warn: vi.fn(), error: vi.fn() });

const increment = action<number>({
  name: "increment",
  reduce: ({ state }) => state + 1,
});

const failing = action<number, [error: Error]>({
  name: "save",
  reduce: ({ args: [error] }) => {
    throw error;
  },
});

const blocked = action<number>({
  name: "blocked",
  abortDispatch: () => true,
  reduce: () => 0,
});

describe("observers", () => {
  it("should log the start and outcome of each action", () => {
    const logger = quietLogger();
    const app = store({ state: 0, actionObservers: [logActions(logger)] });

    app.dispatchSync(increment());
    app.dispatchSync(failing(new UserError("Nope")));
    app.dispatchSync(blocked());

    expect(logger.log.mock.calls).toEqual([
      ["[actuate] ▶ increment #1"],
      ["[actuate] ◀ increment #1 ok"],
      ["[actuate] ▶ save #2"],
      ["[actuate] ◀ save #2 failed"],
      ["[actuate] ◀ blocked #2 aborted"],
    ]);
  });

  it("should log and rethrow even user errors", () => {
    const logger = quietLogger();
    const error = new UserError("Nope");
    const app = store({ state: 0, errorObserver: logAndRethrowErrors(logger) });

    expect(() => app.dispatchSync(failing(error))).toThrow(error);
    expect(logger.error).toHaveBeenCalledWith("[actuate] save failed.", error);
    expect(app.errors).toEqual([error]);
  });

  it("should swallow every error", () => {
    const error = new TypeError("broken");
    const app = store({ state: 0, errorObserver: swallowErrors() });

    const status = app.dispatchSync(failing(error));

    expect(status.isCompletedFailed).toBe(true);
    expect(status.originalError).toBe(error);
    expect(app.state).toBe(0);
  });
});
