/**
 * Rounding and division helpers shared by every cost engine.
 *
 * Ceiling operations go through `ceilWithTolerance`, applied to the value already
 * scaled to the rounding step, so that 0.1 * 3 * 1000 (= 300.00000000000006) does
 * not round up a whole step.
 */

/** Smallest denominator used when a quantity would otherwise be ≤ 0 */
export const MIN_DIVISOR = 1;

/** Overshoot below which a scaled value still counts as on the grid */
export const CEIL_TOLERANCE = 1e-9;

export const ceilWithTolerance = (value: number): number => Math.ceil(value - CEIL_TOLERANCE);

/** True when `value` cannot be used as a denominator as-is */
export const needsDivisorGuard = (value: number): boolean => !Number.isFinite(value) || value <= 0;

/** Denominator floored at MIN_DIVISOR (non-finite values also fall back to it) */
export const safeDivisor = (value: number): number =>
  needsDivisorGuard(value) ? MIN_DIVISOR : value;

export const clampNonNegative = (value: number): number =>
  Number.isFinite(value) && value > 0 ? value : 0;

export const ceilToDecimals = (value: number, decimals: number): number => {
  const factor = 10 ** decimals;
  return ceilWithTolerance(value * factor) / factor;
};

export const ceilToMultiple = (value: number, multiple: number): number => {
  if (multiple <= 0) return ceilWithTolerance(value);
  return ceilWithTolerance(value / multiple) * multiple;
};

export const ceilWhole = (value: number): number => ceilWithTolerance(value);

/**
 * Spread an amount over a piece volume: ceiling to 3 decimals, never negative.
 * Returns 0 when the volume is ≤ 0.
 */
export function allocatePerPiece(amount: number, volume: number): number {
  if (!Number.isFinite(volume) || volume <= 0) return 0;
  return clampNonNegative(ceilToDecimals(amount / volume, 3));
}

export const sum = (values: number[]): number => values.reduce((total, n) => total + n, 0);
