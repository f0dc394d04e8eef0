/**
 * Decimal rounding with explicit midpoint handling.
 *
 * The scaled value is re-read at 15 significant digits before rounding so
 * that inputs such as 2.675 (stored as 2.67499999...) are treated as the
 * decimal midpoint they were written as. The re-read value is only taken
 * when it lies within a few ulps of the scaled one.
 *
 * @module stages/rounding
 */

import type { RoundingMode } from '../schemas/common.js';

export const MAX_ROUNDING_DIGITS = 15;

// Doubles at or above 2^52 have no fractional bits
const INTEGRAL_LIMIT = 2 ** 52;
const MIDPOINT_TOLERANCE_ULPS = 4;

function toWrittenDecimal(scaled: number): number {
  const corrected = Number(scaled.toPrecision(15));
  const tolerance = MIDPOINT_TOLERANCE_ULPS * Number.EPSILON * Math.abs(scaled);
  return Math.abs(corrected - scaled) <= tolerance ? corrected : scaled;
}

function roundScaled(scaled: number, mode: RoundingMode): number {
  const floor = Math.floor(scaled);
  const fraction = scaled - floor;
  const nearest = fraction < 0.5 ? floor : floor + 1;

  switch (mode) {
    case 'toZero':
      return Math.trunc(scaled);
    case 'toNegativeInfinity':
      return floor;
    case 'toPositiveInfinity':
      return Math.ceil(scaled);
    case 'awayFromZero':
      if (fraction === 0.5) {
        return scaled < 0 ? floor : floor + 1;
      }
      return nearest;
    case 'toEven':
      if (fraction === 0.5) {
        return floor % 2 === 0 ? floor : floor + 1;
      }
      return nearest;
  }
}

/**
 * Round to `decimals` fractional digits.
 *
 * @example
 * ```typescript
 * roundTo(2.5, 0, 'toEven');       // 2
 * roundTo(3.5, 0, 'toEven');       // 4
 * roundTo(2.5, 0, 'awayFromZero'); // 3
 * ```
 * @throws RangeError when `decimals` is not an integer in [0, 15]
 */
export function roundTo(value: number, decimals: number, mode: RoundingMode): number {
  if (!Number.isInteger(decimals) || decimals < 0 || decimals > MAX_ROUNDING_DIGITS) {
    throw new RangeError(`Rounding digits must be between 0 and ${MAX_ROUNDING_DIGITS}.`);
  }
  if (!Number.isFinite(value)) {
    return value;
  }

  const factor = 10 ** decimals;
  const raw = value * factor;
  if (Math.abs(raw) >= INTEGRAL_LIMIT) {
    return value;
  }

  const scaled = toWrittenDecimal(raw);
  const rounded = roundScaled(scaled, mode);
  const result = rounded / factor;
  // Collapse -0
  return result === 0 ? 0 : result;
}
