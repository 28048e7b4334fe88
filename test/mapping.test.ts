import { describe, it, expect } from 'vitest'
import { DEFAULT_MAPPING, altitudeToGlint, applyRange, phaseToDepth } from '../src/mapping/index.js'

describe('phaseToDepth', () => {
  it('spans 0.3 at new moon to 0.8 at the end of the cycle', () => {
    expect(phaseToDepth(0)).toBe(0.3)
    expect(phaseToDepth(1)).toBeCloseTo(0.8, 12)
    expect(phaseToDepth(0.5)).toBeCloseTo(0.55, 12)
  })
})

describe('altitudeToGlint', () => {
  it('maps 0-90° onto 0.2-0.8', () => {
    expect(altitudeToGlint(0)).toBe(0.2)
    expect(altitudeToGlint(45)).toBeCloseTo(0.5, 12)
    expect(altitudeToGlint(90)).toBeCloseTo(0.8, 12)
  })

  it('treats a Moon below the horizon as on it', () => {
    expect(altitudeToGlint(-35)).toBe(0.2)
  })

  it('accepts custom ranges', () => {
    const mapping = { ...DEFAULT_MAPPING, glint: { inMin: 0, inMax: 60, outMin: 0, outMax: 1 } }
    expect(altitudeToGlint(30, mapping)).toBe(0.5)
    expect(altitudeToGlint(75, mapping)).toBe(1)
  })
})

describe('applyRange', () => {
  it('clamps to the output', () => {
    expect(applyRange({ inMin: 10, inMax: 20, outMin: 1, outMax: 2 }, 25)).toBe(2)
  })
})
