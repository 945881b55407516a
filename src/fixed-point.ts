/**
 * Fixed-point decimal parsing for period fields.
 *
 * A field's text becomes a bigint scaled by 1000. Only the first fractional
 * digit is kept (truncated, never rounded), so "1.5", "1,5" and "1.59" are all
 * 1500. The parser knows nothing about units; the scanner decides which fields
 * may keep a fraction.
 */

import { type Result, ok, err } from "./core";
import type { MalformedNumberReason } from "./errors";
import { MILLIS_PER_SECOND } from "./types";

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

const INTEGER_PART = /^[+-]?\d+$/;
const FRACTION_PART = /^\d*$/;

/**
 * Finds the fractional separator: the first '.', otherwise the first ','.
 */
function separatorIndex(text: string): number {
  const dot = text.indexOf(".");
  return dot >= 0 ? dot : text.indexOf(",");
}

/**
 * Parses the numeric text of one field into thousandths.
 *
 * @example
 * ```typescript
 * parseFixedPoint("12");      // ok(12000n)
 * parseFixedPoint("1,5");     // ok(1500n)
 * parseFixedPoint("1.23456"); // ok(1200n)
 * parseFixedPoint("1x");      // err("invalid-digits")
 * ```
 */
export function parseFixedPoint(text: string): Result<bigint, MalformedNumberReason> {
  const dec = separatorIndex(text);

  let whole = text;
  let tenths = "0";
  if (dec >= 0) {
    whole = text.slice(0, dec);
    const fraction = text.slice(dec + 1);
    if (!FRACTION_PART.test(fraction)) return err("invalid-digits");
    if (fraction.length > 0) tenths = fraction.charAt(0);
  }

  if (!INTEGER_PART.test(whole)) return err("invalid-digits");

  const value = BigInt(`${whole}${tenths}00`);
  if (!fitsInt64(value)) return err("out-of-range");

  return ok(value);
}

function fitsInt64(value: bigint): boolean {
  return value >= INT64_MIN && value <= INT64_MAX;
}

/**
 * Whether a whole count can be written back as field text and parsed again,
 * i.e. whether `count * 1000` is still a signed 64-bit value.
 *
 * @example
 * ```typescript
 * fitsFixedPoint(9223372036854775n); // true
 * fitsFixedPoint(9223372036854776n); // false
 * ```
 */
export function fitsFixedPoint(count: bigint): boolean {
  return fitsInt64(count * MILLIS_PER_SECOND);
}
