/**
 * iso-period
 *
 * Lossless ISO-8601 period parsing, normalization and formatting.
 *
 * ## Overview
 *
 * "P1Y2M3DT4H5M6.5S" is parsed into exact bigint component counts, with seconds
 * kept as thousandths, so no value passes through floating point. Normalization
 * only folds months into years; days are never turned into months because a
 * month has no fixed number of days.
 *
 * Failures are values, not exceptions: `parse` returns a `Result` whose error
 * side is one of six tagged error classes (`PeriodParseError`).
 *
 * ## Entry Points
 *
 * - `iso-period` - everything
 * - `iso-period/core` - only the `Result` primitives
 *
 * ## Quick Start
 *
 * ```typescript
 * import { parse, Period, TaggedError } from "iso-period";
 *
 * const result = parse(userInput);
 * if (result.ok) {
 *   console.log(Period.format(result.value));
 * } else {
 *   console.log(TaggedError.match(result.error, {
 *     EmptyOrSignOnlyInputError: () => "Enter a period",
 *     MissingPeriodMarkerError: () => "Periods start with P",
 *     MissingFieldNumberError: (e) => `Missing number before ${e.designator}`,
 *     MalformedFieldNumberError: (e) => `Bad number "${e.text}"`,
 *     TrailingTextError: (e) => `Unexpected "${e.remaining}"`,
 *     NoFieldsMatchedError: () => "Add at least one field, e.g. P1D",
 *   }));
 * }
 * ```
 */

// =============================================================================
// Core - Result primitives
// =============================================================================

export {
  type Result,
  ok,
  err,
  isOk,
  isErr,
  map,
  mapError,
  match,
  andThen,
} from "./core";

// =============================================================================
// Tagged Errors
// =============================================================================

export {
  TaggedError,
  type TaggedErrorBase,
  type TaggedErrorCreateOptions,
  type TaggedErrorConstructor,
  type TagOf,
  type ErrorByTag,
} from "./tagged-error";

export {
  EmptyOrSignOnlyInputError,
  MissingPeriodMarkerError,
  MissingFieldNumberError,
  MalformedFieldNumberError,
  TrailingTextError,
  NoFieldsMatchedError,
  isPeriodParseError,
  type PeriodParseError,
  type MalformedNumberReason,
} from "./errors";

// =============================================================================
// Period
// =============================================================================

export { Period, type PeriodType } from "./period";

export type {
  PeriodComponents,
  PeriodField,
  PeriodPart,
  Designator,
  RawPeriod,
} from "./types";

// =============================================================================
// Parsing
// =============================================================================

export {
  parse,
  parseStrict,
  parseOrThrow,
  createPeriodParser,
  type PeriodParser,
  type PeriodParserOptions,
  type PeriodParseEvent,
} from "./parse";

export { parseFixedPoint, fitsFixedPoint } from "./fixed-point";
export { scanPeriod, scanField, checkComponentRange, type ScanState } from "./scanner";
export { normalizeComponents } from "./normalize";

// =============================================================================
// Logging
// =============================================================================

export {
  createParseLogger,
  errorLogFields,
  type PeriodLogger,
  type ParseLoggerOptions,
} from "./logger";
