import { describe, it, expect } from "vitest";
import {
  EmptyOrSignOnlyInputError,
  MalformedFieldNumberError,
  MissingFieldNumberError,
  MissingPeriodMarkerError,
  NoFieldsMatchedError,
  TrailingTextError,
  isPeriodParseError,
  type PeriodParseError,
} from "./errors";
import { TaggedError } from "./tagged-error";

const samples: PeriodParseError[] = [
  new EmptyOrSignOnlyInputError({ input: "-" }),
  new MissingPeriodMarkerError({ input: "1D" }),
  new MissingFieldNumberError({ input: "PTM", designator: "M", field: "minutes" }),
  new MalformedFieldNumberError({
    input: "P1,2,3D",
    designator: "D",
    field: "days",
    text: "1,2,3",
    reason: "invalid-digits",
  }),
  new TrailingTextError({ input: "PT1H!", part: "time", remaining: "!" }),
  new NoFieldsMatchedError({ input: "PT" }),
];

describe("period parse errors", () => {
  it("tags every kind distinctly", () => {
    expect(samples.map((e) => e._tag)).toEqual([
      "EmptyOrSignOnlyInputError",
      "MissingPeriodMarkerError",
      "MissingFieldNumberError",
      "MalformedFieldNumberError",
      "TrailingTextError",
      "NoFieldsMatchedError",
    ]);
  });

  it("can be matched exhaustively", () => {
    const hints = samples.map((error) =>
      TaggedError.match(error, {
        EmptyOrSignOnlyInputError: () => "empty",
        MissingPeriodMarkerError: () => "no P",
        MissingFieldNumberError: (e) => `no number for ${e.field}`,
        MalformedFieldNumberError: (e) => `bad ${e.text}`,
        TrailingTextError: (e) => `left ${e.remaining} in ${e.part}`,
        NoFieldsMatchedError: () => "no fields",
      })
    );
    expect(hints).toEqual([
      "empty",
      "no P",
      "no number for minutes",
      "bad 1,2,3",
      "left ! in time",
      "no fields",
    ]);
  });

  it("explains out-of-range numbers", () => {
    const error = new MalformedFieldNumberError({
      input: "P99999999999999999Y",
      designator: "Y",
      field: "years",
      text: "99999999999999999",
      reason: "out-of-range",
    });
    expect(error.message).toBe(
      "invalid number '99999999999999999' before the 'Y' designator (out of the 64-bit range): P99999999999999999Y"
    );
  });

  describe("isPeriodParseError", () => {
    it("accepts every parse error", () => {
      expect(samples.every(isPeriodParseError)).toBe(true);
    });

    it("rejects other errors", () => {
      class OtherError extends TaggedError("OtherError", {
        message: (p: { input: string }) => p.input,
      }) {}

      expect(isPeriodParseError(new OtherError({ input: "P1D" }))).toBe(false);
      expect(isPeriodParseError(new Error("P1D"))).toBe(false);
      expect(isPeriodParseError({ _tag: "NoFieldsMatchedError", input: "P" })).toBe(false);
    });
  });
});
