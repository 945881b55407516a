/**
 * Grammar scanner for ISO-8601 period text.
 *
 * Walks `[+-]P[nY][nM][nW][nD][T[nH][nM][nS]]` left to right. Each field step
 * takes the current scan state and returns a new one, so nothing is shared
 * between calls.
 */

import { type Result, ok, err } from "./core";
import {
  EmptyOrSignOnlyInputError,
  MalformedFieldNumberError,
  MissingFieldNumberError,
  MissingPeriodMarkerError,
  NoFieldsMatchedError,
  TrailingTextError,
  type PeriodParseError,
} from "./errors";
import { fitsFixedPoint, parseFixedPoint } from "./fixed-point";
import {
  MILLIS_PER_SECOND,
  type Designator,
  type PeriodField,
  type PeriodComponents,
  type PeriodPart,
  type RawPeriod,
} from "./types";

/**
 * Position in the text being scanned.
 * `matched` turns true once any field has been read.
 */
export interface ScanState {
  readonly input: string;
  readonly rest: string;
  readonly matched: boolean;
}

interface FieldStep {
  readonly value: bigint;
  readonly state: ScanState;
}

type FieldSpec = readonly [designator: Designator, field: PeriodField];

const TIME_FIELDS: readonly FieldSpec[] = [
  ["H", "hours"],
  ["M", "minutes"],
  ["S", "seconds"],
];

const DATE_FIELDS: readonly FieldSpec[] = [
  ["Y", "years"],
  ["M", "months"],
  ["W", "weeks"],
  ["D", "days"],
];

type WholeComponent = Exclude<keyof PeriodComponents, "seconds">;

const WHOLE_COMPONENTS: readonly (readonly [Designator, WholeComponent])[] = [
  ["Y", "years"],
  ["M", "months"],
  ["D", "days"],
  ["H", "hours"],
  ["M", "minutes"],
];

const ZERO_LITERAL = "P0";

/**
 * Reads one field terminated by `designator`.
 *
 * Seconds keep their fixed-point scale; every other field must be whole and is
 * returned as a plain count.
 */
export function scanField(
  state: ScanState,
  designator: Designator,
  field: PeriodField
): Result<FieldStep, PeriodParseError> {
  const at = state.rest.indexOf(designator);
  if (at < 0) return ok({ value: 0n, state });
  if (at === 0) {
    return err(new MissingFieldNumberError({ input: state.input, designator, field }));
  }

  const text = state.rest.slice(0, at);
  const parsed = parseFixedPoint(text);
  if (!parsed.ok) {
    return err(
      new MalformedFieldNumberError({
        input: state.input,
        designator,
        field,
        text,
        reason: parsed.error,
      })
    );
  }

  let value = parsed.value;
  if (field !== "seconds") {
    if (value % MILLIS_PER_SECOND !== 0n) {
      return err(
        new MalformedFieldNumberError({
          input: state.input,
          designator,
          field,
          text,
          reason: "fraction-not-allowed",
        })
      );
    }
    value /= MILLIS_PER_SECOND;
  }

  return ok({
    value,
    state: { input: state.input, rest: state.rest.slice(at + 1), matched: true },
  });
}

interface PartScan {
  readonly values: Partial<Record<PeriodField, bigint>>;
  readonly state: ScanState;
}

/**
 * Reads a fixed sequence of fields from one part and checks nothing is left over.
 */
function scanPart(
  state: ScanState,
  part: PeriodPart,
  fields: readonly FieldSpec[]
): Result<PartScan, PeriodParseError> {
  const values: Partial<Record<PeriodField, bigint>> = {};
  let current = state;

  for (const [designator, field] of fields) {
    const step = scanField(current, designator, field);
    if (!step.ok) return step;
    values[field] = step.value.value;
    current = step.value.state;
  }

  if (current.rest.length !== 0) {
    return err(
      new TrailingTextError({ input: state.input, part, remaining: current.rest })
    );
  }

  return ok({ values, state: current });
}

/**
 * Scans period text into its raw components.
 *
 * The time part is read before the date part, so a bad time field is reported
 * even when the date part is also wrong.
 *
 * @example
 * ```typescript
 * scanPeriod("-P1W2DT3.5S");
 * // ok({ years: 0n, months: 0n, days: 9n, hours: 0n, minutes: 0n,
 * //      seconds: 3500n, negative: true, input: "-P1W2DT3.5S" })
 * ```
 */
export function scanPeriod(input: string): Result<RawPeriod, PeriodParseError> {
  if (input === "" || input === "-" || input === "+") {
    return err(new EmptyOrSignOnlyInputError({ input }));
  }

  if (input === ZERO_LITERAL) {
    return ok({
      years: 0n,
      months: 0n,
      days: 0n,
      hours: 0n,
      minutes: 0n,
      seconds: 0n,
      negative: false,
      input,
    });
  }

  let body = input;
  let negative = false;
  if (body.startsWith("-")) {
    negative = true;
    body = body.slice(1);
  } else if (body.startsWith("+")) {
    body = body.slice(1);
  }

  if (!body.startsWith("P")) {
    return err(new MissingPeriodMarkerError({ input }));
  }
  body = body.slice(1);

  const t = body.indexOf("T");
  const datePart = t >= 0 ? body.slice(0, t) : body;

  let state: ScanState = { input, rest: "", matched: false };
  let time: Partial<Record<PeriodField, bigint>> = {};
  if (t >= 0) {
    const scanned = scanPart({ ...state, rest: body.slice(t + 1) }, "time", TIME_FIELDS);
    if (!scanned.ok) return scanned;
    time = scanned.value.values;
    state = scanned.value.state;
  }

  const date = scanPart({ ...state, rest: datePart }, "date", DATE_FIELDS);
  if (!date.ok) return date;
  state = date.value.state;

  if (!state.matched) {
    return err(new NoFieldsMatchedError({ input }));
  }

  const { years = 0n, months = 0n, weeks = 0n, days = 0n } = date.value.values;
  const { hours = 0n, minutes = 0n, seconds = 0n } = time;
  return checkComponentRange({
    years,
    months,
    days: weeks * 7n + days,
    hours,
    minutes,
    seconds,
    negative,
    input,
  });
}

/**
 * Rejects a period holding a whole component that could not be written back
 * as field text, such as days built from folding in a large week count.
 *
 * Seconds are not checked here; they were range-checked when read.
 *
 * @example
 * ```typescript
 * checkComponentRange({ ...raw, days: 14000000000000000n });
 * // err: MalformedFieldNumberError, designator "D", reason "out-of-range"
 * ```
 */
export function checkComponentRange<T extends RawPeriod>(
  period: T
): Result<T, PeriodParseError> {
  for (const [designator, field] of WHOLE_COMPONENTS) {
    const value = period[field];
    if (!fitsFixedPoint(value)) {
      return err(
        new MalformedFieldNumberError({
          input: period.input,
          designator,
          field,
          text: value.toString(),
          reason: "out-of-range",
        })
      );
    }
  }
  return ok(period);
}
