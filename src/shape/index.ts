/**
 * shape — Rasterized lunar silhouette for a phase.
 *
 * Pixel (x, y) is sampled at its centre (x + ½, y + ½) against a disc of
 * radius r = size / 2. Inside the disc, each row has a half-chord
 * w = √(r² − dy²) and the pixel's horizontal position across that chord is
 * u = dx / w ∈ (−1, 1).
 *
 * The terminator is the projection of the lit hemisphere's edge, an
 * ellipse whose horizontal half-axis is w·cos(2πp). So with k = cos(2πp):
 *
 *   waxing (p ≤ ½):  lit iff  u > k    light grows from the right edge
 *   waning (p > ½):  lit iff −u > k    light recedes toward the left edge
 *
 * k runs 1 → −1 → 1 over the cycle, so p = 0 lights nothing, p = ½ lights
 * the whole disc, and mask(p) is the left-right mirror of mask(1 − p).
 * Pixel centres never land exactly on the rim for an integer size, so
 * |u| < 1 strictly and the two extremes are exact.
 */

import type { MaskCell, MoonShapeMask } from '../types.js'
import { MASK_LIT, MASK_OUTSIDE, MASK_SHADOW } from '../types.js'
import { InvalidConfigurationError } from '../errors/index.js'

/**
 * Render the silhouette of the Moon at a phase.
 *
 * @param phase - Phase fraction; values outside [0, 1] are not wrapped
 * @param diameter - Mask width and height in pixels, a positive integer
 * @throws InvalidConfigurationError for a non-positive or fractional diameter
 */
export function generateMoonShape(phase: number, diameter: number): MoonShapeMask {
  if (!Number.isInteger(diameter) || diameter <= 0) {
    throw new InvalidConfigurationError('moonDiameter', `expected a positive integer, got ${diameter}`)
  }

  const size = diameter
  const r = size / 2
  const k = Math.cos(2 * Math.PI * phase)
  const waxing = phase <= 0.5
  const cells = new Uint8Array(size * size)

  for (let y = 0; y < size; y++) {
    const dy = y + 0.5 - r
    const halfChord = Math.sqrt(Math.max(0, r * r - dy * dy))

    for (let x = 0; x < size; x++) {
      const dx = x + 0.5 - r
      if (dx * dx + dy * dy > r * r) continue // MASK_OUTSIDE

      const u = dx / halfChord
      const lit = waxing ? u > k : -u > k
      cells[y * size + x] = lit ? MASK_LIT : MASK_SHADOW
    }
  }

  return { size, phase, cells }
}

/** Cell at (x, y); out-of-range coordinates read as outside the disc */
export function maskCell(mask: MoonShapeMask, x: number, y: number): MaskCell {
  if (x < 0 || y < 0 || x >= mask.size || y >= mask.size) return MASK_OUTSIDE
  const v = mask.cells[y * mask.size + x]
  return v === MASK_LIT ? MASK_LIT : v === MASK_SHADOW ? MASK_SHADOW : MASK_OUTSIDE
}

/** Lit pixels as a fraction of disc pixels (0 for an empty disc) */
export function litFraction(mask: MoonShapeMask): number {
  let disc = 0
  let lit = 0
  for (const v of mask.cells) {
    if (v === MASK_OUTSIDE) continue
    disc++
    if (v === MASK_LIT) lit++
  }
  return disc === 0 ? 0 : lit / disc
}

const GLYPHS: Record<MaskCell, string> = {
  [MASK_OUTSIDE]: ' ',
  [MASK_SHADOW]: '.',
  [MASK_LIT]: '#',
}

/**
 * Text rendering, one string per row: '#' lit, '.' shadow, ' ' outside.
 */
export function renderMask(mask: MoonShapeMask): string[] {
  const rows: string[] = []
  for (let y = 0; y < mask.size; y++) {
    let row = ''
    for (let x = 0; x < mask.size; x++) row += GLYPHS[maskCell(mask, x, y)]
    rows.push(row)
  }
  return rows
}
