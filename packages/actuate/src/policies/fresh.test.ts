import { describe, it, expect, vi, beforeEach } from "vitest";
import { action } from "../core/action";
import { policyKey } from "../core/keys";
import { store } from "../core/store";
import { UserError } from "../errors";
import { delay } from "../utils/delay";
import { fresh, removeAllFreshKeys, removeFreshKey } from "./fresh";

describe("fresh", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
  });

  it("should skip dispatches while the data is fresh", () => {
    const reduce = vi.fn(() => null);
    const loadProfile = action<number>({ reduce }).use(fresh({ freshFor: 1000 }));
    const app = store({ state: 0 });

    app.dispatch(loadProfile());
    vi.advanceTimersByTime(500);
    const skipped = app.dispatchSync(loadProfile());
    vi.advanceTimersByTime(500);
    app.dispatch(loadProfile());

    expect(skipped.isDispatchAborted).toBe(true);
    expect(reduce).toHaveBeenCalledTimes(2);
  });

  it("should not extend freshness when the load fails", () => {
    let fail = true;
    const reduce = vi.fn(() => {
      if (fail) throw new UserError("offline");
      return null;
    });
    const loadProfile = action<number>({ reduce }).use(fresh());
    const app = store({ state: 0 });

    app.dispatch(loadProfile());
    fail = false;
    app.dispatch(loadProfile());
    const skipped = app.dispatchSync(loadProfile());

    expect(reduce).toHaveBeenCalledTimes(2);
    expect(skipped.isDispatchAborted).toBe(true);
  });

  it("should clear the entry when a forced reload fails", () => {
    const reduce = vi.fn((self: { args: readonly [boolean, boolean] }) => {
      if (self.args[1]) throw new UserError("offline");
      return null;
    });
    const loadProfile = action<number, [force: boolean, fail: boolean]>({ reduce }).use(
      fresh<[force: boolean, fail: boolean]>({ freshFor: 1000, ignoreFresh: (force) => force })
    );
    const app = store({ state: 0 });
    const key = policyKey(loadProfile);

    app.dispatch(loadProfile(false, false));
    vi.advanceTimersByTime(300);
    app.dispatch(loadProfile(true, true));

    expect(app.policyTables.fresh.has(key)).toBe(false);
  });

  it("should leave stale data stale when its reload fails", () => {
    let fail = false;
    const reduce = vi.fn(() => {
      if (fail) throw new UserError("offline");
      return null;
    });
    const loadProfile = action<number>({ reduce }).use(fresh({ freshFor: 1000 }));
    const app = store({ state: 0 });
    const key = policyKey(loadProfile);

    app.dispatch(loadProfile());
    vi.advanceTimersByTime(999);
    expect(app.policyTables.fresh.get(key)?.expiresAt).toBe(1000);
    vi.advanceTimersByTime(1);
    fail = true;
    app.dispatch(loadProfile());

    expect(reduce).toHaveBeenCalledTimes(2);
    expect(app.policyTables.fresh.has(key)).toBe(false);
  });

  it("should keep a newer write when an older dispatch fails", async () => {
    const loadProfile = action<number, [force: boolean, fail: boolean]>({
      async reduce({ args: [, fail] }) {
        await delay(fail ? 100 : 10);
        if (fail) throw new UserError("offline");
        return null;
      },
    }).use(fresh<[force: boolean, fail: boolean]>({ freshFor: 1000, ignoreFresh: (force) => force }));
    const app = store({ state: 0 });
    const key = policyKey(loadProfile);

    const failing = app.dispatch(loadProfile(false, true));
    await vi.advanceTimersByTimeAsync(50);
    app.dispatch(loadProfile(true, false));
    await vi.advanceTimersByTimeAsync(50);
    await failing;

    expect(app.policyTables.fresh.get(key)?.expiresAt).toBe(1050);
    expect(app.dispatch(loadProfile(false, false))).toMatchObject({ isDispatchAborted: true });
  });

  it("should separate keys and let callers expire them", () => {
    const reduce = vi.fn(() => null);
    const loadItem = action<number, [id: string]>({ reduce }).use(
      fresh({ keyParams: (id) => id })
    );
    const app = store({ state: 0 });

    app.dispatch(loadItem("a"));
    app.dispatch(loadItem("b"));
    app.dispatch(loadItem("a"));
    removeFreshKey(app, policyKey(loadItem, "a"));
    app.dispatch(loadItem("a"));
    app.dispatch(loadItem("b"));
    removeAllFreshKeys(app);
    app.dispatch(loadItem("b"));

    expect(reduce).toHaveBeenCalledTimes(4);
  });
});
