import { describe, it, expect, vi } from "vitest";
import { IncompatiblePoliciesError, StoreError } from "../errors";
import { is } from "../is";
import { definePolicy } from "../policies/policy";
import { retry } from "../policies/retry";
import { throttle } from "../policies/throttle";
import { action, assertCompatible } from "./action";
import { store } from "./store";

describe("action", () => {
  describe("spec", () => {
    it("should be a callable spec with a name", () => {
      const increment = action<number, [by: number]>({
        name: "increment",
        reduce: ({ state, args: [by] }) => state + by,
      });

      const instance = increment(2);

      expect(is(increment, "action.spec")).toBe(true);
      expect(is(instance, "action")).toBe(true);
      expect(increment.displayName).toBe("increment");
      expect(instance.name).toBe("increment");
      expect(instance.type).toBe(increment);
      expect(instance.args).toEqual([2]);
      expect(instance.toString()).toBe("Action increment");
    });

    it("should generate a name when none is given", () => {
      const first = action<number>({ reduce: () => null });
      const second = action<number>({ reduce: () => null });

      expect(first.displayName).toBe("action-1");
      expect(second.displayName).toBe("action-2");
    });

    it("should return a new spec from use and leave the original alone", () => {
      const load = action<number>({ name: "load", reduce: async () => 1 });
      const throttled = load.use(throttle());
      const both = throttled.use(retry());

      expect(load.policies).toEqual([]);
      expect(throttled.policies.map((p) => p.name)).toEqual(["throttle"]);
      expect(both.policies.map((p) => p.name)).toEqual(["throttle", "retry"]);
      expect(both.displayName).toBe("load");
    });

    it("should reject a policy whose slots are taken", () => {
      const owners = [
        { name: "throttle", slots: ["gate" as const] },
        { name: "retry", slots: ["reduceLoop" as const, "retry" as const] },
      ];

      expect(() =>
        assertCompatible("load", owners, { name: "debounce", slots: ["reduceLoop"] })
      ).toThrow(IncompatiblePoliciesError);
      expect(() =>
        assertCompatible("load", owners, { name: "checkInternet", slots: ["connectivity"] })
      ).not.toThrow();
    });
  });

  describe("classification", () => {
    it("should be sync when no hook is async", () => {
      const sync = action<number>({ reduce: () => 1 });

      expect(sync().isSync()).toBe(true);
    });

    it("should be async when reduce is declared async", () => {
      const asyncReduce = action<number>({ reduce: async () => 1 });

      expect(asyncReduce().isSync()).toBe(false);
    });

    it("should be async when before is declared async", () => {
      const asyncBefore = action<number>({ before: async () => {}, reduce: () => 1 });

      expect(asyncBefore().isSync()).toBe(false);
    });

    it("should be async when a policy suspends", () => {
      const retried = action<number>({ reduce: () => 1 }).use(retry());

      expect(retried().isSync()).toBe(false);
    });
  });

  describe("hooks", () => {
    it("should run hooks in pipeline order", () => {
      const calls: string[] = [];
      const tracer = <TSlot extends "gate" | "connectivity">(label: string, slot: TSlot) =>
        definePolicy<TSlot, []>(label, [slot], false, () => ({
          abortDispatch() {
            calls.push(`${label}.abortDispatch`);
            return false;
          },
          before() {
            calls.push(`${label}.before`);
          },
          wrapReduce(next) {
            calls.push(`${label}.wrapReduce`);
            return next();
          },
          after() {
            calls.push(`${label}.after`);
          },
        }));

      const traced = action<number>({
        name: "traced",
        abortDispatch() {
          calls.push("own.abortDispatch");
          return false;
        },
        before() {
          calls.push("own.before");
        },
        wrapReduce(reduce) {
          calls.push("own.wrapReduce");
          return reduce();
        },
        reduce({ state }) {
          calls.push("own.reduce");
          return state + 1;
        },
        after() {
          calls.push("own.after");
        },
      })
        .use(tracer("a", "gate"))
        .use(tracer("b", "connectivity"));

      const app = store({ state: 0 });
      app.dispatchSync(traced());

      expect(app.state).toBe(1);
      expect(calls).toEqual([
        "own.abortDispatch",
        "a.abortDispatch",
        "b.abortDispatch",
        "a.before",
        "b.before",
        "own.before",
        "b.wrapReduce",
        "a.wrapReduce",
        "own.wrapReduce",
        "own.reduce",
        "own.after",
        "a.after",
        "b.after",
      ]);
    });

    it("should stop asking once one abortDispatch says yes", () => {
      const calls: string[] = [];
      const gate = definePolicy<"gate", []>("gate", ["gate"], false, () => ({
        abortDispatch() {
          calls.push("gate");
          return false;
        },
      }));
      const blocked = action<number>({
        abortDispatch: () => true,
        reduce: () => 1,
      }).use(gate);

      const app = store({ state: 0 });
      const status = app.dispatchSync(blocked());

      expect(status.isDispatchAborted).toBe(true);
      expect(calls).toEqual([]);
      expect(app.state).toBe(0);
    });

    it("should log a throwing after and keep running the others", () => {
      const logger = { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
      const failure = new Error("after failed");
      const ran: string[] = [];
      const tail = definePolicy<"gate", []>("tail", ["gate"], false, () => ({
        after() {
          ran.push("tail");
        },
      }));
      const noisy = action<number>({
        name: "noisy",
        reduce: () => 1,
        after() {
          throw failure;
        },
      }).use(tail);

      const app = store({ state: 0, logger });
      const status = app.dispatchSync(noisy());

      expect(status.isCompletedOk).toBe(true);
      expect(ran).toEqual(["tail"]);
      expect(logger.error).toHaveBeenCalledTimes(1);
      expect(logger.error).toHaveBeenCalledWith(
        '[actuate] Method "noisy.after()" threw an error.',
        failure
      );
    });
  });

  describe("instances", () => {
    it("should not reach the store before dispatch", () => {
      const noop = action<number>({ name: "noop", reduce: () => null });

      expect(() => noop().state).toThrow(StoreError);
    });

    it("should refuse a second dispatch of the same instance", () => {
      const noop = action<number>({ name: "noop", reduce: () => null });
      const app = store({ state: 0 });
      const instance = noop();

      app.dispatch(instance);

      expect(() => app.dispatch(instance)).toThrow(
        "Action noop was already dispatched. Create a new instance to dispatch again."
      );
    });

    it("should remember the state at dispatch time", () => {
      let seen: number[] = [];
      const bump = action<number>({
        reduce(self) {
          self.dispatchState(self.state + 10);
          seen = [self.initialState, self.state];
          return null;
        },
      });
      const app = store({ state: 1 });

      app.dispatchSync(bump());

      expect(seen).toEqual([1, 11]);
      expect(app.state).toBe(11);
    });
  });
});
