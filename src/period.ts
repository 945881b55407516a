/**
 * iso-period/period
 *
 * The Period value: exact component counts of an ISO-8601 period plus one
 * overall sign. Values are frozen; every operation returns a new Period.
 */

import { isNormalized as componentsNormalized, normalizeComponents } from "./normalize";
import { MILLIS_PER_SECOND, type PeriodComponents, type RawPeriod } from "./types";

// =============================================================================
// Period Type
// =============================================================================

/**
 * A parsed or constructed period.
 *
 * `seconds` is in thousandths of a second. `negative` applies to every
 * component at once; a zero period is never negative.
 */
export interface Period extends PeriodComponents {
  readonly _tag: "Period";
  readonly negative: boolean;
}

const COMPONENT_KEYS = [
  "years",
  "months",
  "days",
  "hours",
  "minutes",
  "seconds",
] as const satisfies readonly (keyof PeriodComponents)[];

function allZero(c: PeriodComponents): boolean {
  return COMPONENT_KEYS.every((key) => c[key] === 0n);
}

function create(c: PeriodComponents, negative: boolean): Period {
  return Object.freeze({
    _tag: "Period",
    years: c.years,
    months: c.months,
    days: c.days,
    hours: c.hours,
    minutes: c.minutes,
    seconds: c.seconds,
    negative: negative && !allZero(c),
  });
}

// =============================================================================
// Constructors
// =============================================================================

/**
 * Create a Period from components. Missing components are zero.
 *
 * @example
 * ```typescript
 * const p = Period.make({ days: 10n, seconds: 1500n }, true)  // -P10DT1.5S
 * ```
 */
export function make(components: Partial<PeriodComponents> = {}, negative = false): Period {
  return create(
    {
      years: components.years ?? 0n,
      months: components.months ?? 0n,
      days: components.days ?? 0n,
      hours: components.hours ?? 0n,
      minutes: components.minutes ?? 0n,
      seconds: components.seconds ?? 0n,
    },
    negative
  );
}

/**
 * Wrap scanner output as a Period, dropping the original text.
 */
export function fromRaw(raw: RawPeriod): Period {
  return create(raw, raw.negative);
}

/**
 * The zero period. Every spelling of zero ("P0D", "PT0S", "P0", ...) parses to this.
 */
export const zero: Period = make();

// =============================================================================
// Operations
// =============================================================================

/**
 * Flip the overall sign. Zero stays zero.
 */
export function negate(period: Period): Period {
  return create(period, !period.negative);
}

/**
 * Clear the overall sign.
 */
export function abs(period: Period): Period {
  return period.negative ? negate(period) : period;
}

/**
 * Fold whole multiples of 12 months into years.
 *
 * @example
 * ```typescript
 * Period.format(Period.normalize(Period.make({ months: 30n })))  // "P2Y6M"
 * ```
 */
export function normalize(period: Period): Period {
  return create(normalizeComponents(period), period.negative);
}

/**
 * Components with the overall sign applied.
 *
 * @example
 * ```typescript
 * Period.signed(Period.make({ days: 3n }, true)).days  // -3n
 * ```
 */
export function signed(period: Period): PeriodComponents {
  const factor = period.negative ? -1n : 1n;
  return {
    years: period.years * factor,
    months: period.months * factor,
    days: period.days * factor,
    hours: period.hours * factor,
    minutes: period.minutes * factor,
    seconds: period.seconds * factor,
  };
}

// =============================================================================
// Comparisons & Predicates
// =============================================================================

/**
 * Check if two periods have the same signed components.
 * How either was spelled does not matter: "-P1D" equals "P-1D".
 */
export function equals(a: Period, b: Period): boolean {
  const sa = signed(a);
  const sb = signed(b);
  return COMPONENT_KEYS.every((key) => sa[key] === sb[key]);
}

/**
 * Check if every component is zero.
 */
export function isZero(period: Period): boolean {
  return allZero(period);
}

/**
 * Check if the overall sign is negative.
 */
export function isNegative(period: Period): boolean {
  return period.negative;
}

/**
 * Check if the period is non-zero and not negative.
 */
export function isPositive(period: Period): boolean {
  return !period.negative && !allZero(period);
}

/**
 * Check if normalizing would leave the period unchanged.
 */
export function isNormalized(period: Period): boolean {
  return componentsNormalized(period);
}

/**
 * Type guard to check if a value is a Period.
 */
export function isPeriod(value: unknown): value is Period {
  return (
    typeof value === "object" &&
    value !== null &&
    "_tag" in value &&
    value._tag === "Period" &&
    "negative" in value &&
    typeof value.negative === "boolean" &&
    COMPONENT_KEYS.every((key) => key in value && typeof Reflect.get(value, key) === "bigint")
  );
}

// =============================================================================
// Formatting
// =============================================================================

function formatSeconds(millis: bigint): string {
  const sign = millis < 0n ? "-" : "";
  const magnitude = millis < 0n ? -millis : millis;
  const whole = magnitude / MILLIS_PER_SECOND;
  const fraction = magnitude % MILLIS_PER_SECOND;
  if (fraction === 0n) return `${sign}${whole}`;
  const digits = fraction.toString().padStart(3, "0").replace(/0+$/, "");
  return `${sign}${whole}.${digits}`;
}

/**
 * Format a period as ISO-8601 text.
 *
 * Zero components are left out and weeks are never written (they were folded
 * into days). The zero period is "P0D". Parsing the output gives back an equal
 * period, as long as seconds are in tenths (which all parsed values are).
 *
 * @example
 * ```typescript
 * Period.format(Period.make({ years: 1n, days: 3n, seconds: 6500n }, true))  // "-P1Y3DT6.5S"
 * Period.format(Period.zero)  // "P0D"
 * ```
 */
export function format(period: Period): string {
  if (allZero(period)) return "P0D";

  let text = period.negative ? "-P" : "P";
  if (period.years !== 0n) text += `${period.years}Y`;
  if (period.months !== 0n) text += `${period.months}M`;
  if (period.days !== 0n) text += `${period.days}D`;

  let time = "";
  if (period.hours !== 0n) time += `${period.hours}H`;
  if (period.minutes !== 0n) time += `${period.minutes}M`;
  if (period.seconds !== 0n) time += `${formatSeconds(period.seconds)}S`;

  return time === "" ? text : `${text}T${time}`;
}

// =============================================================================
// Namespace Export
// =============================================================================

/**
 * Period namespace with all functions for convenient access.
 *
 * @example
 * ```typescript
 * import { Period, parseOrThrow } from "iso-period";
 *
 * const billing = parseOrThrow("P18M");
 * Period.format(billing);                      // "P1Y6M"
 * Period.equals(billing, parseOrThrow("P1Y6M")); // true
 * ```
 */
export const Period = {
  // Constructors
  make,
  fromRaw,
  zero,

  // Operations
  negate,
  abs,
  normalize,
  signed,

  // Comparisons & Predicates
  equals,
  isZero,
  isNegative,
  isPositive,
  isNormalized,
  isPeriod,

  // Formatting
  format,
} as const;

export type { Period as PeriodType };
