import type { Macros } from "../schema";

/** Smallest factor a portion request can resolve to. */
export const MIN_SERVINGS_FACTOR = 0.25;

export interface PortionResult {
  servings: number;
  macros: Macros;
}

/**
 * Round to one decimal on the exact binary value. Only values that are
 * exactly halfway (x.x5 with nothing after) count as ties; those go to the
 * even tenth.
 */
export function round1(value: number): number {
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) return value;

  // 30 digits is far below the spacing of doubles at any halfway value
  const [whole, frac] = Math.abs(value).toFixed(30).split(".");
  const isTie = frac[1] === "5" && /^0*$/.test(frac.slice(2));
  if (!isTie) {
    return Number(value.toFixed(1));
  }

  let tenths = Number(whole) * 10 + Number(frac[0]);
  if (tenths % 2 === 1) {
    tenths += 1;
  }
  return (Math.sign(value) * tenths) / 10;
}

/**
 * Clamp the requested servings from below only. Zero or negative requests
 * resolve to MIN_SERVINGS_FACTOR; large values pass through unchanged.
 */
export function effectiveServings(servings: number): number {
  return Math.max(MIN_SERVINGS_FACTOR, servings);
}

/**
 * Scale per-serving macros by the effective factor, one decimal per field.
 */
export function scalePortion(macros: Macros, servings: number): PortionResult {
  const factor = effectiveServings(servings);
  return {
    servings: factor,
    macros: {
      protein: round1(macros.protein * factor),
      carbs: round1(macros.carbs * factor),
      fats: round1(macros.fats * factor),
      calories: round1(macros.calories * factor),
    },
  };
}
