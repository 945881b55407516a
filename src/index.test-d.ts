/**
 * Type tests for iso-period
 * Checked by `tsc --noEmit` (the file is in the project's include list).
 */
/* eslint-disable @typescript-eslint/no-unused-vars */
import { expectType } from "tsd";
import {
  parse,
  parseOrThrow,
  createPeriodParser,
  TaggedError,
  Period,
  type Result,
  type PeriodParseError,
  type ErrorByTag,
  type PeriodParseEvent,
  type TrailingTextError,
} from "./index";

// =============================================================================
// TEST 1: parse returns a Result over the closed error union
// =============================================================================

function _test1() {
  const result = parse("P1D");
  expectType<Result<Period, PeriodParseError>>(result);

  if (result.ok) {
    expectType<Period>(result.value);
    expectType<bigint>(result.value.days);
  } else {
    expectType<PeriodParseError>(result.error);
    expectType<string>(result.error.input);
  }
}

// =============================================================================
// TEST 2: parseOrThrow returns the value directly
// =============================================================================

function _test2() {
  expectType<Period>(parseOrThrow("PT1H"));
}

// =============================================================================
// TEST 3: exhaustive matching narrows each variant
// =============================================================================

function _test3(error: PeriodParseError) {
  const text = TaggedError.match(error, {
    EmptyOrSignOnlyInputError: () => "empty",
    MissingPeriodMarkerError: (e) => e.input,
    MissingFieldNumberError: (e) => e.designator,
    MalformedFieldNumberError: (e) => e.reason,
    TrailingTextError: (e) => e.remaining,
    NoFieldsMatchedError: () => 0,
  });
  expectType<string | number>(text);
}

// =============================================================================
// TEST 4: variant extraction by tag
// =============================================================================

function _test4(error: ErrorByTag<PeriodParseError, "TrailingTextError">) {
  expectType<TrailingTextError>(error);
  expectType<"date" | "time">(error.part);
}

// =============================================================================
// TEST 5: events carry the period or the error
// =============================================================================

function _test5() {
  createPeriodParser({
    onEvent: (event) => {
      expectType<PeriodParseEvent>(event);
      if (event.type === "period_parse_success") {
        expectType<Period>(event.period);
      } else {
        expectType<PeriodParseError>(event.error);
      }
    },
  });
}

// =============================================================================
// TEST 6: the namespace and the type share a name
// =============================================================================

function _test6() {
  const p: Period = Period.make({ years: 1n });
  expectType<string>(Period.format(p));
  expectType<boolean>(Period.equals(p, Period.zero));
}
