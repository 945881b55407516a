import { describe, it, expect } from "vitest";
import { isNormalized, normalizeComponents } from "./normalize";
import type { PeriodComponents } from "./types";

const none: PeriodComponents = {
  years: 0n,
  months: 0n,
  days: 0n,
  hours: 0n,
  minutes: 0n,
  seconds: 0n,
};

describe("normalizeComponents", () => {
  it("folds whole years out of months", () => {
    const out = normalizeComponents({ ...none, months: 24n });
    expect(out.years).toBe(2n);
    expect(out.months).toBe(0n);
  });

  it("keeps the remainder in months", () => {
    const out = normalizeComponents({ ...none, years: 1n, months: 14n });
    expect([out.years, out.months]).toEqual([2n, 2n]);
  });

  it("leaves an already canonical value alone", () => {
    const out = normalizeComponents({ ...none, years: 1n, months: 11n });
    expect([out.years, out.months]).toEqual([1n, 11n]);
  });

  it("preserves the month total across mixed signs", () => {
    const out = normalizeComponents({ ...none, years: -1n, months: 13n });
    expect([out.years, out.months]).toEqual([0n, 1n]);
    expect(out.years * 12n + out.months).toBe(1n);
  });

  it("truncates toward zero for negative totals", () => {
    const out = normalizeComponents({ ...none, months: -25n });
    expect([out.years, out.months]).toEqual([-2n, -1n]);

    const mixed = normalizeComponents({ ...none, years: 1n, months: -13n });
    expect([mixed.years, mixed.months]).toEqual([0n, -1n]);
  });

  it("never carries days, hours, minutes or seconds", () => {
    const out = normalizeComponents({
      years: 0n,
      months: 0n,
      days: 400n,
      hours: 48n,
      minutes: 120n,
      seconds: 7200000n,
    });
    expect(out).toEqual({
      years: 0n,
      months: 0n,
      days: 400n,
      hours: 48n,
      minutes: 120n,
      seconds: 7200000n,
    });
  });

  it("copies extra properties through", () => {
    const out = normalizeComponents({ ...none, months: 12n, negative: true, input: "-P12M" });
    expect(out.negative).toBe(true);
    expect(out.input).toBe("-P12M");
    expect(out.years).toBe(1n);
  });

  it("is idempotent", () => {
    const once = normalizeComponents({ ...none, years: 3n, months: 31n });
    expect(normalizeComponents(once)).toEqual(once);
  });

  it("does not modify its input", () => {
    const input = { ...none, months: 12n };
    normalizeComponents(input);
    expect(input.months).toBe(12n);
  });
});

describe("isNormalized", () => {
  it("is true when months are within a year", () => {
    expect(isNormalized({ ...none, years: 1n, months: 11n })).toBe(true);
    expect(isNormalized({ ...none, months: -11n })).toBe(true);
  });

  it("is false when a year could be carried", () => {
    expect(isNormalized({ ...none, months: 12n })).toBe(false);
  });

  it("is false when years and months disagree in sign", () => {
    expect(isNormalized({ ...none, years: 1n, months: -1n })).toBe(false);
  });
});
