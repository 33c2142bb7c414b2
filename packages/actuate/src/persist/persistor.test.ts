import { describe, it, expect, vi } from "vitest";
import {
  DEFAULT_PERSIST_THROTTLE,
  loggingPersistor,
  noopPersistor,
  resolveThrottle,
  type Persistor,
} from "./persistor";

describe("persistor", () => {
  describe("resolveThrottle", () => {
    it("should default to two seconds", () => {
      expect(resolveThrottle({})).toBe(DEFAULT_PERSIST_THROTTLE);
      expect(DEFAULT_PERSIST_THROTTLE).toBe(2000);
    });

    it("should treat null as no throttle", () => {
      expect(resolveThrottle({ throttle: null })).toBe(0);
    });

    it("should keep an explicit value", () => {
      expect(resolveThrottle({ throttle: 250 })).toBe(250);
    });
  });

  describe("loggingPersistor", () => {
    const memory = () => {
      const persistDifference = vi.fn(async () => {});
      const persistor: Persistor<string> = {
        throttle: 500,
        readState: async () => "saved",
        deleteState: async () => {},
        persistDifference,
      };
      return { persistor, persistDifference };
    };

    it("should log each call and delegate it", async () => {
      const logger = { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
      const { persistor, persistDifference } = memory();
      const logged = loggingPersistor(persistor, logger);

      await expect(logged.readState()).resolves.toBe("saved");
      await logged.persistDifference({ lastPersistedState: "a", newState: "b" });
      await logged.deleteState();

      expect(logged.throttle).toBe(500);
      expect(persistDifference).toHaveBeenCalledWith({
        lastPersistedState: "a",
        newState: "b",
      });
      expect(logger.log.mock.calls).toEqual([
        ["[actuate] Persistor: read state."],
        ["[actuate] Persistor: persist difference.", "b"],
        ["[actuate] Persistor: delete state."],
      ]);
    });

    it("should save the initial state as a difference from nothing", async () => {
      const logger = { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
      const { persistor, persistDifference } = memory();
      const logged = loggingPersistor(persistor, logger);

      await logged.saveInitialState?.("first");

      expect(persistDifference).toHaveBeenCalledWith({
        lastPersistedState: undefined,
        newState: "first",
      });
      expect(logger.log).toHaveBeenCalledWith(
        "[actuate] Persistor: save initial state.",
        "first"
      );
    });
  });

  describe("noopPersistor", () => {
    it("should read nothing and write every change", async () => {
      const persistor = noopPersistor<number>();

      await expect(persistor.readState()).resolves.toBeUndefined();
      expect(resolveThrottle(persistor)).toBe(0);
    });
  });
});
