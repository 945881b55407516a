import { describe, it, expect } from "vitest";
import { TaggedError, type TagOf, type ErrorByTag } from "./tagged-error";

// =============================================================================
// Test Error Classes
// =============================================================================

class UnknownUnitError extends TaggedError("UnknownUnitError", {
  message: (p: { unit: string; input: string }) => `unknown unit ${p.unit} in ${p.input}`,
}) {}

class SignError extends TaggedError("SignError", {
  message: (p: { sign: string }) => `bad sign ${p.sign}`,
}) {}

class ForgeryProbeError extends TaggedError("ForgeryProbeError", {
  message: (p: { _tag?: string; name?: string; input: string }) => `probe ${p.input}`,
}) {}

type TestError = UnknownUnitError | SignError;

// =============================================================================
// Construction Tests
// =============================================================================

describe("TaggedError", () => {
  describe("construction", () => {
    it("creates error with correct _tag", () => {
      const error = new UnknownUnitError({ unit: "X", input: "P1X" });
      expect(error._tag).toBe("UnknownUnitError");
    });

    it("uses the tag as name", () => {
      const error = new UnknownUnitError({ unit: "X", input: "P1X" });
      expect(error.name).toBe("UnknownUnitError");
    });

    it("builds the message from props", () => {
      const error = new UnknownUnitError({ unit: "X", input: "P1X" });
      expect(error.message).toBe("unknown unit X in P1X");
    });

    it("preserves props as instance properties", () => {
      const error = new UnknownUnitError({ unit: "X", input: "P1X" });
      expect(error.unit).toBe("X");
      expect(error.input).toBe("P1X");
    });

    it("is instanceof Error, its own class and TaggedError", () => {
      const error = new SignError({ sign: "*" });
      expect(error instanceof Error).toBe(true);
      expect(error instanceof SignError).toBe(true);
      expect(error instanceof UnknownUnitError).toBe(false);
      expect(error instanceof TaggedError).toBe(true);
    });

    it("has stack trace", () => {
      const error = new SignError({ sign: "*" });
      expect(typeof error.stack).toBe("string");
    });

    it("has no cause", () => {
      const error = new SignError({ sign: "*" });
      expect("cause" in error).toBe(false);
    });
  });

  // ===========================================================================
  // Reserved Keys Tests
  // ===========================================================================

  describe("reserved keys", () => {
    it("strips _tag from props to prevent discriminant forgery", () => {
      const error = new ForgeryProbeError({ _tag: "SignError", input: "P1D" });
      expect(error._tag).toBe("ForgeryProbeError");
      expect(error.input).toBe("P1D");
    });

    it("strips name from props", () => {
      const error = new ForgeryProbeError({ name: "Other", input: "P1D" });
      expect(error.name).toBe("ForgeryProbeError");
    });
  });

  // ===========================================================================
  // Matching Tests
  // ===========================================================================

  describe("match", () => {
    const describeError = (error: TestError): string =>
      TaggedError.match(error, {
        UnknownUnitError: (e) => `unit:${e.unit}`,
        SignError: (e) => `sign:${e.sign}`,
      });

    it("calls the handler for the error's tag", () => {
      expect(describeError(new UnknownUnitError({ unit: "Q", input: "P1Q" }))).toBe("unit:Q");
      expect(describeError(new SignError({ sign: "~" }))).toBe("sign:~");
    });
  });

  describe("isTaggedError", () => {
    it("accepts factory-made errors only", () => {
      expect(TaggedError.isTaggedError(new SignError({ sign: "*" }))).toBe(true);
      expect(TaggedError.isTaggedError(new Error("plain"))).toBe(false);
      expect(TaggedError.isTaggedError({ _tag: "SignError" })).toBe(false);
    });
  });

  describe("type helpers", () => {
    it("extracts tags and variants", () => {
      const tag: TagOf<TestError> = "SignError";
      const variant: ErrorByTag<TestError, "SignError"> = new SignError({ sign: "-" });
      expect(tag).toBe("SignError");
      expect(variant.sign).toBe("-");
    });
  });
});
