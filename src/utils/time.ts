/**
 * Time conversion utilities for loan and investment calculations.
 */

/**
 * Converts years to monthly periods.
 * Fractional years give fractional periods; the closed-form formulas accept them.
 *
 * @param years - Number of years
 * @returns Number of months
 */
export function yearsToMonths(years: number): number {
  return years * 12;
}

/**
 * Lists whole-year tenures from `fromYears` up to and including `toYears`.
 * Returns an empty list when the range is empty.
 */
export function tenureRange(fromYears: number, toYears: number): number[] {
  const tenures: number[] = [];
  for (let years = fromYears; years <= toYears; years++) {
    tenures.push(years);
  }
  return tenures;
}
