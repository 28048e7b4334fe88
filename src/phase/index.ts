/**
 * phase — Mean lunar phase from a Julian Date.
 *
 * The phase is the fraction of the current lunation elapsed since the last
 * new moon, using a constant mean synodic month anchored at a known new
 * moon. The true Moon runs up to ~14 hours ahead of or behind the mean
 * model; that is well inside what the installation can show or hear.
 */

import type { MoonPhaseName } from '../types.js'
import { trueMod } from '../math/index.js'

// ─── Constants ────────────────────────────────────────────────────────────────

/** Mean synodic month in days */
export const SYNODIC_MONTH = 29.530588853

/** Julian Date of the new moon of 2000 Jan 6 (~14:24 UTC), the cycle anchor */
export const REFERENCE_NEW_MOON_JD = 2451550.1

// ─── Phase ───────────────────────────────────────────────────────────────────

/**
 * Phase fraction in [0, 1): 0 = new moon, 0.25 = first quarter,
 * 0.5 = full moon, 0.75 = last quarter.
 * Dates before the reference epoch wrap the same way as dates after it.
 */
export function phaseFraction(jd: number): number {
  return moonAgeDays(jd) / SYNODIC_MONTH
}

/** Days since the last mean new moon, in [0, SYNODIC_MONTH) */
export function moonAgeDays(jd: number): number {
  return trueMod(jd - REFERENCE_NEW_MOON_JD, SYNODIC_MONTH)
}

/**
 * Illuminated fraction of the disc for a phase, 0 at new moon, 1 at full.
 */
export function illuminatedFraction(phase: number): number {
  return (1 - Math.cos(2 * Math.PI * phase)) / 2
}

const PHASE_SEQUENCE: readonly MoonPhaseName[] = [
  'new-moon',
  'waxing-crescent',
  'first-quarter',
  'waxing-gibbous',
  'full-moon',
  'waning-gibbous',
  'last-quarter',
  'waning-crescent',
]

/**
 * Map a phase fraction to one of eight named phases.
 * Each name covers an eighth of the cycle centred on its nominal point,
 * so 'full-moon' spans [0.4375, 0.5625).
 */
export function phaseName(phase: number): MoonPhaseName {
  const index = Math.floor(trueMod(phase + 1 / 16, 1) * 8) % 8
  return PHASE_SEQUENCE[index] ?? 'new-moon'
}

// ─── Upcoming events ─────────────────────────────────────────────────────────

/** Julian Date of the next mean new moon strictly after jd */
export function nextNewMoonJD(jd: number): number {
  return jd + (SYNODIC_MONTH - moonAgeDays(jd))
}

/** Julian Date of the next mean full moon strictly after jd */
export function nextFullMoonJD(jd: number): number {
  const half = SYNODIC_MONTH / 2
  const age = moonAgeDays(jd)
  return age < half ? jd + (half - age) : jd + (SYNODIC_MONTH - age) + half
}
