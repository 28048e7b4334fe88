/**
 * mapping — Moon quantities to synth parameter values.
 */

import type { LinearRange, MappingConfig } from '../types.js'
import { linlin } from '../math/index.js'

/** Phase 0-1 → depth 0.3-0.8; altitude 0-90° → glint 0.2-0.8 */
export const DEFAULT_MAPPING: MappingConfig = {
  depth: { inMin: 0, inMax: 1, outMin: 0.3, outMax: 0.8 },
  glint: { inMin: 0, inMax: 90, outMin: 0.2, outMax: 0.8 },
}

/** Apply one range, clamped to its output */
export function applyRange(range: LinearRange, x: number): number {
  return linlin(range.inMin, range.inMax, range.outMin, range.outMax, x)
}

export function phaseToDepth(phase: number, mapping: MappingConfig = DEFAULT_MAPPING): number {
  return applyRange(mapping.depth, phase)
}

/** Below the horizon counts as 0° */
export function altitudeToGlint(altitude: number, mapping: MappingConfig = DEFAULT_MAPPING): number {
  return applyRange(mapping.glint, Math.max(0, altitude))
}
