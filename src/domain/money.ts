// =============================================================================
// Money — Decimal type scoped to cost arithmetic
// =============================================================================

import { Decimal } from "decimal.js";

/**
 * Decimal constructor with its own precision so cost sums never drift and
 * no global Decimal configuration is touched.
 */
export const Money = Decimal.clone({
  precision: 20,
  rounding: Decimal.ROUND_HALF_EVEN,
});

export type Money = Decimal;

export const ZERO: Money = new Money(0);

export function money(value: Decimal.Value): Money {
  return new Money(value);
}
