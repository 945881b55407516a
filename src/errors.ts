/**
 * Parse failures, one class per kind.
 *
 * Every error carries `input`, the complete text handed to the parser, so a
 * caller can report it without keeping the original around.
 */

import { TaggedError } from "./tagged-error";
import type { Designator, PeriodField, PeriodPart } from "./types";

/**
 * Why a field's digits could not be turned into a value.
 * - `invalid-digits`: not `[sign]digits[(.|,)digits]`
 * - `out-of-range`: the fixed-point value does not fit in a signed 64-bit integer
 * - `fraction-not-allowed`: a non-zero fraction on a field other than seconds
 */
export type MalformedNumberReason =
  | "invalid-digits"
  | "out-of-range"
  | "fraction-not-allowed";

const reasonText: Record<MalformedNumberReason, string> = {
  "invalid-digits": "not a decimal number",
  "out-of-range": "out of the 64-bit range",
  "fraction-not-allowed": "only seconds may have a fraction",
};

export class EmptyOrSignOnlyInputError extends TaggedError("EmptyOrSignOnlyInputError", {
  message: (p: { input: string }) =>
    `cannot parse a blank string as a period: "${p.input}"`,
}) {}

export class MissingPeriodMarkerError extends TaggedError("MissingPeriodMarkerError", {
  message: (p: { input: string }) =>
    `expected 'P' period mark at the start: ${p.input}`,
}) {}

export class MissingFieldNumberError extends TaggedError("MissingFieldNumberError", {
  message: (p: { input: string; designator: Designator; field: PeriodField }) =>
    `expected a number before the '${p.designator}' designator: ${p.input}`,
}) {}

export class MalformedFieldNumberError extends TaggedError("MalformedFieldNumberError", {
  message: (p: {
    input: string;
    designator: Designator;
    field: PeriodField;
    text: string;
    reason: MalformedNumberReason;
  }) =>
    `invalid number '${p.text}' before the '${p.designator}' designator (${reasonText[p.reason]}): ${p.input}`,
}) {}

export class TrailingTextError extends TaggedError("TrailingTextError", {
  message: (p: { input: string; part: PeriodPart; remaining: string }) =>
    `unexpected remaining components ${p.remaining}: ${p.input}`,
}) {}

export class NoFieldsMatchedError extends TaggedError("NoFieldsMatchedError", {
  message: (p: { input: string }) =>
    `expected 'Y', 'M', 'W', 'D', 'H', 'M', or 'S' designator: ${p.input}`,
}) {}

/**
 * Every way `parse` can fail.
 */
export type PeriodParseError =
  | EmptyOrSignOnlyInputError
  | MissingPeriodMarkerError
  | MissingFieldNumberError
  | MalformedFieldNumberError
  | TrailingTextError
  | NoFieldsMatchedError;

const parseErrorTags: ReadonlySet<string> = new Set<PeriodParseError["_tag"]>([
  "EmptyOrSignOnlyInputError",
  "MissingPeriodMarkerError",
  "MissingFieldNumberError",
  "MalformedFieldNumberError",
  "TrailingTextError",
  "NoFieldsMatchedError",
]);

/**
 * Type guard for errors produced by this library's parser.
 * Useful around `parseOrThrow`, which throws these directly.
 */
export function isPeriodParseError(value: unknown): value is PeriodParseError {
  return TaggedError.isTaggedError(value) && parseErrorTags.has(value._tag);
}
