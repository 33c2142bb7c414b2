import { describe, it, expect } from "vitest";
import {
  ActuateError,
  ConnectionError,
  IncompatiblePoliciesError,
  PersistError,
  TooManyFollowUpsError,
  UserError,
} from "./errors";

describe("errors", () => {
  describe("UserError", () => {
    it("should default to opening a dialog", () => {
      const error = new UserError("Invalid name");

      expect(error).toBeInstanceOf(ActuateError);
      expect(error.name).toBe("UserError");
      expect(error.ifOpenDialog).toBe(true);
      expect(error.noDialog.ifOpenDialog).toBe(false);
    });

    it("should keep every other field when the dialog flag changes", () => {
      const error = new UserError("Invalid name", {
        reason: "Names need a letter.",
        code: 42,
        props: { field: "name" },
      });
      const copy = error.withDialog(false);

      expect(copy.message).toBe("Invalid name");
      expect(copy.reason).toBe("Names need a letter.");
      expect(copy.code).toBe(42);
      expect(copy.props).toEqual({ field: "name" });
    });

    it("should append reasons", () => {
      const error = new UserError("Save failed").addReason("Try again.").addReason("Or later.");

      expect(error.reason).toBe("Try again.\n\nOr later.");
    });

    it("should merge props", () => {
      const error = new UserError("x", { props: { a: 1 } }).withProps({ b: 2 });

      expect(error.props).toEqual({ a: 1, b: 2 });
    });

    it("should join message, reason and nested user errors", () => {
      const inner = new UserError("Server rejected it", { reason: "Quota exceeded." });
      const error = new UserError("Save failed", { reason: "Nothing was saved.", cause: inner });

      expect(error.toString()).toBe(
        "Save failed\n\nNothing was saved.\n\nServer rejected it\n\nQuota exceeded."
      );
    });

    it("should find the first cause that is not a user error", () => {
      const hard = new TypeError("boom");
      const error = new UserError("outer", { cause: new UserError("inner", { cause: hard }) });

      expect(error.hardCause()).toBe(hard);
      expect(error.withoutHardCause().hardCause()).toBeUndefined();
      expect(new UserError("plain").hardCause()).toBeUndefined();
    });
  });

  describe("ConnectionError", () => {
    it("should carry the no-internet texts", () => {
      const error = ConnectionError.noConnectivity;

      expect(error.message).toBe("There is no Internet");
      expect(error.reason).toBe("Please, verify your connection.");
      expect(error.errorText).toBe("No Internet connection");
    });

    it("should stay a ConnectionError when the dialog flag changes", () => {
      const error = ConnectionError.noConnectivity.withDialog(false);

      expect(error).toBeInstanceOf(ConnectionError);
      expect(error.ifOpenDialog).toBe(false);
    });
  });

  describe("messages", () => {
    it("should name both policies when they cannot be combined", () => {
      const error = new IncompatiblePoliciesError("save", "throttle", "fresh");

      expect(error.message).toBe(
        'The fresh policy cannot be combined with the throttle policy (action "save").'
      );
    });

    it("should report the follow-up limit", () => {
      expect(new TooManyFollowUpsError("toggleLike", 3).message).toBe(
        "Too many follow-up requests in action toggleLike (> 3)."
      );
    });

    it("should keep the persistor failure as cause", () => {
      const cause = new Error("disk full");
      const error = new PersistError("persist", cause);

      expect(error.message).toBe("Persistor failed to persist.");
      expect(error.cause).toBe(cause);
    });
  });
});
