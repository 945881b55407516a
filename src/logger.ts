/**
 * Logging bridge - turns parse events into structured log lines.
 *
 * Works with any logger that takes `(object, message)`: Pino, Bunyan, or a thin
 * console wrapper. Payloads hold only strings and booleans, so JSON loggers
 * never see a bigint.
 *
 * @example
 * ```typescript
 * import pino from "pino";
 *
 * const parser = createPeriodParser({ onEvent: createParseLogger(pino()) });
 * parser.parse("P1X");
 * // {"level":40,"input":"P1X","errorTag":"TrailingTextError","part":"date","remaining":"1X","msg":"Rejected period"}
 * ```
 */

import type { PeriodParseError } from "./errors";
import type { PeriodParseEvent } from "./parse";
import { format } from "./period";
import { TaggedError } from "./tagged-error";

type LogMethod = (obj: Record<string, unknown>, msg: string) => void;

/**
 * The subset of a structured logger this bridge calls: `debug` or `info` for
 * successes, depending on `successLevel`, and `warn` for failures.
 */
export interface PeriodLogger {
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
}

export interface ParseLoggerOptions {
  /**
   * Level for successful parses. Failures always log at `warn`.
   * @default "debug"
   */
  successLevel?: "debug" | "info";
}

/**
 * Fields specific to each kind of failure.
 */
export function errorLogFields(error: PeriodParseError): Record<string, string> {
  return TaggedError.match(error, {
    EmptyOrSignOnlyInputError: () => ({}),
    MissingPeriodMarkerError: () => ({}),
    MissingFieldNumberError: (e) => ({ designator: e.designator, field: e.field }),
    MalformedFieldNumberError: (e) => ({
      designator: e.designator,
      field: e.field,
      text: e.text,
      reason: e.reason,
    }),
    TrailingTextError: (e) => ({ part: e.part, remaining: e.remaining }),
    NoFieldsMatchedError: () => ({}),
  });
}

/**
 * Create an `onEvent` listener that writes each parse event to `logger`.
 */
export function createParseLogger(
  logger: PeriodLogger,
  options: ParseLoggerOptions = {}
): (event: PeriodParseEvent) => void {
  const successLevel = options.successLevel ?? "debug";

  return (event) => {
    switch (event.type) {
      case "period_parse_success":
        logger[successLevel](
          {
            input: event.input,
            period: format(event.period),
            negative: event.period.negative,
          },
          "Parsed period"
        );
        return;
      case "period_parse_error":
        logger.warn(
          {
            input: event.input,
            errorTag: event.error._tag,
            ...errorLogFields(event.error),
          },
          "Rejected period"
        );
        return;
    }
  };
}
