/**
 * math — Core numerical utilities.
 *
 * All computation in this module is pure (no I/O, no state).
 */

// ─── Angle utilities ─────────────────────────────────────────────────────────

/** Convert degrees to radians */
export const DEG2RAD = Math.PI / 180

/** Convert radians to degrees */
export const RAD2DEG = 180 / Math.PI

/**
 * Floored modulo: the result has the sign of the divisor.
 * JavaScript's % truncates, so -1 % 30 is -1; trueMod(-1, 30) is 29.
 * The result is always in [0, m) for positive m.
 */
export function trueMod(x: number, m: number): number {
  const r = ((x % m) + m) % m
  // (tiny negative + m) can round up to m itself
  return r >= m ? 0 : r
}

/** Normalize an angle in degrees to [0, 360) */
export function mod360(deg: number): number {
  return trueMod(deg, 360)
}

/** Normalize an angle in degrees to [-180, 180) */
export function normalizeDeg180(deg: number): number {
  deg = mod360(deg)
  return deg >= 180 ? deg - 360 : deg
}

// ─── Scalar helpers ──────────────────────────────────────────────────────────

/** Clamp x into [lo, hi] */
export function clamp(x: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, x))
}

/**
 * Linear map of x from [inMin, inMax] to [outMin, outMax], clamped to the
 * output range. Reversed ranges (outMin > outMax) are allowed.
 */
export function linlin(
  inMin: number,
  inMax: number,
  outMin: number,
  outMax: number,
  x: number,
): number {
  if (inMax === inMin) return outMin
  const t = clamp((x - inMin) / (inMax - inMin), 0, 1)
  return outMin + t * (outMax - outMin)
}
