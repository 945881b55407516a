/**
 * iso-period/parse
 *
 * Entry points that turn ISO-8601 period text into a `Period`.
 *
 * ## Which one to use
 *
 * - `parse()` for untrusted text: returns a `Result`, never throws.
 * - `parseOrThrow()` for literals in code ("P1D", "PT30M") that are known to be valid.
 * - `createPeriodParser()` when you want a fixed normalization setting and an
 *   event stream for logging.
 *
 * @example
 * ```typescript
 * const r = parse("P1Y14M");
 * if (r.ok) {
 *   Period.format(r.value); // "P2Y2M"
 * } else {
 *   r.error._tag;           // e.g. "MissingPeriodMarkerError"
 * }
 * ```
 */

import { type Result, andThen, map, match, ok } from "./core";
import type { PeriodParseError } from "./errors";
import { normalizeComponents } from "./normalize";
import { fromRaw, type Period } from "./period";
import { checkComponentRange, scanPeriod } from "./scanner";
import type { RawPeriod } from "./types";

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse with an explicit normalization flag.
 *
 * With `normalize` set, whole multiples of 12 months become years ("P24M" is
 * "P2Y"). Nothing else is carried: days never become months. A carry that
 * pushes years past what the parser itself accepts is an `out-of-range` error.
 */
export function parseStrict(
  text: string,
  normalize: boolean
): Result<Period, PeriodParseError> {
  const scanned = andThen(scanPeriod(text), (raw): Result<RawPeriod, PeriodParseError> =>
    normalize ? checkComponentRange(normalizeComponents(raw)) : ok(raw)
  );
  return map(scanned, fromRaw);
}

/**
 * Parse ISO-8601 period text, normalizing by default.
 *
 * A leading '+' or '-' is accepted ("-P10D"). The zero period may be written
 * "P0Y", "P0M", "P0W", "P0D", "PT0H", "PT0M", "PT0S" or "P0"; a bare "P" is
 * rejected.
 *
 * @example
 * ```typescript
 * parse("P24M");        // ok: years 2n, months 0n
 * parse("P24M", false); // ok: years 0n, months 24n
 * parse("PT1,5S");      // ok: seconds 1500n
 * parse("1Y");          // err: MissingPeriodMarkerError
 * ```
 */
export function parse(
  text: string,
  normalize = true
): Result<Period, PeriodParseError> {
  return parseStrict(text, normalize);
}

/**
 * Parse, throwing the parse error on failure.
 *
 * Meant for literals written in code. Use `parse()` for anything a user typed.
 *
 * @throws {PeriodParseError} If the text is not a valid period
 */
export function parseOrThrow(text: string, normalize = true): Period {
  const result = parseStrict(text, normalize);
  if (!result.ok) throw result.error;
  return result.value;
}

// =============================================================================
// Configured Parser
// =============================================================================

/**
 * Emitted once per parse by a configured parser.
 */
export type PeriodParseEvent =
  | { type: "period_parse_success"; input: string; period: Period; ts: number }
  | { type: "period_parse_error"; input: string; error: PeriodParseError; ts: number };

export interface PeriodParserOptions {
  /**
   * Fold whole years out of months.
   * @default true
   */
  normalize?: boolean;
  /**
   * Listener for parse events. Runs synchronously inside each call.
   * Use this for logging (see `createParseLogger`) or metrics.
   */
  onEvent?: (event: PeriodParseEvent) => void;
}

export interface PeriodParser {
  parse(text: string): Result<Period, PeriodParseError>;
  parseOrThrow(text: string): Period;
}

/**
 * Create a parser with fixed options.
 *
 * @example
 * ```typescript
 * const parser = createPeriodParser({
 *   normalize: false,
 *   onEvent: createParseLogger(logger),
 * });
 *
 * parser.parse("P18M"); // ok: months 18n, logged at debug
 * ```
 */
export function createPeriodParser(options: PeriodParserOptions = {}): PeriodParser {
  const normalize = options.normalize ?? true;
  const onEvent = options.onEvent;

  const run = (text: string): Result<Period, PeriodParseError> => {
    const result = parseStrict(text, normalize);
    if (onEvent) {
      const ts = Date.now();
      onEvent(
        match<Period, PeriodParseError, PeriodParseEvent>(result, {
          ok: (period) => ({ type: "period_parse_success", input: text, period, ts }),
          err: (error) => ({ type: "period_parse_error", input: text, error, ts }),
        })
      );
    }
    return result;
  };

  return {
    parse: run,
    parseOrThrow(text) {
      const result = run(text);
      if (!result.ok) throw result.error;
      return result.value;
    },
  };
}
