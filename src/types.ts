/**
 * Shared shapes for the scanner, the normalizer and the Period value.
 */

/**
 * The six stored components of a period.
 *
 * Weeks have no slot of their own: they are folded into `days` when parsed.
 * `seconds` is fixed-point, in thousandths of a second.
 */
export interface PeriodComponents {
  readonly years: bigint;
  readonly months: bigint;
  readonly days: bigint;
  readonly hours: bigint;
  readonly minutes: bigint;
  readonly seconds: bigint;
}

/** Unit letters that terminate a field. */
export type Designator = "Y" | "M" | "W" | "D" | "H" | "S";

/** The field a designator was parsed for (`M` is months or minutes depending on the part). */
export type PeriodField =
  | "years"
  | "months"
  | "weeks"
  | "days"
  | "hours"
  | "minutes"
  | "seconds";

/** Which side of the `T` separator a piece of text came from. */
export type PeriodPart = "date" | "time";

/**
 * Output of the scanner, before normalization.
 * `input` is kept only for error messages.
 */
export interface RawPeriod extends PeriodComponents {
  readonly negative: boolean;
  readonly input: string;
}

/** Fixed-point scale of the `seconds` component. */
export const MILLIS_PER_SECOND = 1000n;
