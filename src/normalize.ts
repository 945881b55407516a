/**
 * Period normalization.
 *
 * The only carry is months into years: twelve months are always one year.
 * Days, hours, minutes and seconds are left exactly as parsed because their
 * relation to months depends on the calendar (a month has 28 to 31 days, a day
 * may have 23 or 25 hours).
 */

import type { PeriodComponents } from "./types";

const MONTHS_PER_YEAR = 12n;

/**
 * Folds whole multiples of 12 months into years.
 *
 * Division truncates toward zero and the remainder takes the sign of the total,
 * so `years * 12n + months` is unchanged. Any other properties of `components`
 * (the sign flag, the original input) are copied through.
 *
 * @example
 * ```typescript
 * normalizeComponents(Period.make({ months: 26n }));
 * // years: 2n, months: 2n
 *
 * normalizeComponents(Period.make({ years: -1n, months: 13n }));
 * // years: 0n, months: 1n
 * ```
 */
export function normalizeComponents<T extends PeriodComponents>(components: T): T {
  const totalMonths = components.years * MONTHS_PER_YEAR + components.months;
  return {
    ...components,
    years: totalMonths / MONTHS_PER_YEAR,
    months: totalMonths % MONTHS_PER_YEAR,
  };
}

/**
 * Whether normalizing would change nothing.
 */
export function isNormalized(components: PeriodComponents): boolean {
  const totalMonths = components.years * MONTHS_PER_YEAR + components.months;
  return (
    components.years === totalMonths / MONTHS_PER_YEAR &&
    components.months === totalMonths % MONTHS_PER_YEAR
  );
}
