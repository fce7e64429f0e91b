export const QUANTITY_DECIMALS = 6;

/**
 * Reads a quantity that may arrive as text: `pg` returns NUMERIC and BIGINT columns as
 * strings, and legacy data files sometimes quote numbers. Unparseable text reads as 0.
 */
export function toNumber(value: number | string): number {
  const parsed = typeof value === 'number' ? value : parseFloat(value);
  return Number.isFinite(parsed) ? parsed : 0;
}

/** Rounds to the precision of the `numeric(18,6)` quantity columns. */
export function roundQuantity(value: number): number {
  return Number(value.toFixed(QUANTITY_DECIMALS));
}
