import { decimalsOf } from "../../utils/strings.js";

/** Share of values the chosen digit counts must exceed */
export const DECIMALS_COVERAGE = 0.8;

/**
 * Decimal places to keep when synthesizing a float column.
 *
 * Whole numbers count as one digit. Digit counts are ranked by how many values show them (ties keep first-seen
 * order); the shortest prefix of that ranking covering more than 80% of the
 * values is taken, and its largest digit count is returned.
 *
 * @example
 * countDecimals([1.5, 2.25, 3.125, 4.0]) // 3
 */
export function countDecimals(values: readonly number[]): number {
  if (values.length === 0) return 0;

  const tally = new Map<number, number>();
  for (const value of values) {
    // Whole members of a float column are written with one place, e.g. 4.0
    const digits = Number.isInteger(value) ? 1 : decimalsOf(value);
    tally.set(digits, (tally.get(digits) ?? 0) + 1);
  }

  const ranked = [...tally.entries()].sort((a, b) => b[1] - a[1]);

  let cumulative = 0;
  let decimals = 0;
  for (const [digits, count] of ranked) {
    cumulative += count;
    decimals = Math.max(decimals, digits);
    if (cumulative / values.length > DECIMALS_COVERAGE) break;
  }

  return decimals;
}
