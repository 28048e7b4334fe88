/**
 * position — Simplified azimuth/altitude of the Moon.
 *
 * This is a visual model, not an ephemeris. It keeps the parts of lunar
 * motion that are visible from a fixed spot over a night and a year and
 * drops everything else:
 *
 *   - The Moon transits (crosses the meridian, due south) at local midnight,
 *     which is exactly true only near full moon. Hour angle H = 15° × hour.
 *   - Declination swings seasonally: a full moon sits opposite the Sun, so
 *     it rides high in winter and low in summer.
 *       δ_season = 23.44° × cos(2π (month − 0.5) / 12)
 *     peaks at the December/January boundary and bottoms out mid-year.
 *   - The Moon's own orbit adds a ±5.14° wobble over a tropical month,
 *     driven by the Julian Date:
 *       δ_orbit = 5.14° × sin(2π (JD − JD₀) / 27.321582)
 *
 * Altitude and azimuth then come from the standard horizon transform for
 * the site latitude φ:
 *
 *   sin(alt) = sin φ sin δ + cos φ cos δ cos H
 *   az       = atan2(sin H, cos H sin φ − tan δ cos φ) + 180°
 *
 * For |δ| < |φ| the diurnal circle stays clear of the zenith, so azimuth
 * turns once per day without reversing: east at rising, south at midnight,
 * west at setting (north at midnight, turning the other way, south of the
 * equator). The result is continuous and 24 h periodic in hour. Sites with
 * |φ| ≤ MAX_DECLINATION can see the sweep reverse; config rejects them.
 */

import type { SkyPosition } from '../types.js'
import { DEG2RAD, RAD2DEG, clamp, mod360 } from '../math/index.js'
import { REFERENCE_NEW_MOON_JD } from '../phase/index.js'

// ─── Constants ────────────────────────────────────────────────────────────────

/** Latitude of the default observation site (Cavendish, PEI), degrees north */
export const DEFAULT_LATITUDE = 46.493

/** Obliquity of the ecliptic, degrees */
export const OBLIQUITY = 23.44

/** Inclination of the lunar orbit to the ecliptic, degrees */
export const LUNAR_INCLINATION = 5.14

/** Largest |declination| the model produces, degrees */
export const MAX_DECLINATION = OBLIQUITY + LUNAR_INCLINATION

/** Tropical month in days (equinox to equinox) */
export const TROPICAL_MONTH = 27.321582

/** Hour of day at which the modelled Moon crosses the meridian */
export const TRANSIT_HOUR = 0

// ─── Model ───────────────────────────────────────────────────────────────────

/**
 * Heuristic declination for a calendar month and Julian Date, degrees.
 */
export function heuristicDeclination(jd: number, month: number): number {
  const seasonal = OBLIQUITY * Math.cos((2 * Math.PI * (month - 0.5)) / 12)
  const orbital = LUNAR_INCLINATION * Math.sin((2 * Math.PI * (jd - REFERENCE_NEW_MOON_JD)) / TROPICAL_MONTH)
  return seasonal + orbital
}

/**
 * Approximate Moon position for the given date and hour.
 *
 * @param jd - Julian Date; only drives the monthly declination wobble
 * @param month - Calendar month 1-12; drives the seasonal swing
 * @param hour - Local hour of day, may be fractional (22.5 = 22:30)
 * @param latitude - Observer latitude in degrees (north positive)
 * @returns Azimuth in [0, 360) and unclamped altitude
 */
export function simplifiedPosition(
  jd: number,
  month: number,
  hour: number,
  latitude = DEFAULT_LATITUDE,
): SkyPosition {
  const H = 15 * (hour - TRANSIT_HOUR) * DEG2RAD
  const dec = heuristicDeclination(jd, month) * DEG2RAD
  const phi = latitude * DEG2RAD

  const sinAlt = Math.sin(phi) * Math.sin(dec) + Math.cos(phi) * Math.cos(dec) * Math.cos(H)
  const altitude = Math.asin(clamp(sinAlt, -1, 1)) * RAD2DEG

  const azimuth = mod360(
    Math.atan2(Math.sin(H), Math.cos(H) * Math.sin(phi) - Math.tan(dec) * Math.cos(phi)) * RAD2DEG + 180,
  )

  return { azimuth, altitude }
}
