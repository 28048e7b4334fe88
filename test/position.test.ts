import { describe, it, expect } from 'vitest'
import {
  DEFAULT_LATITUDE,
  MAX_DECLINATION,
  heuristicDeclination,
  simplifiedPosition,
} from '../src/position/index.js'

const JD = 2460451.5416666665

/** Shortest signed difference b − a between two azimuths */
const azDelta = (a: number, b: number) => ((b - a + 540) % 360) - 180

describe('simplifiedPosition', () => {
  it('transits due south at local midnight', () => {
    const pos = simplifiedPosition(JD, 1, 0)
    expect(pos.azimuth).toBeCloseTo(180, 9)
    // Upper culmination: 90° − φ + δ
    expect(pos.altitude).toBeCloseTo(90 - DEFAULT_LATITUDE + heuristicDeclination(JD, 1), 6)
  })

  it('rides higher in winter than in summer', () => {
    const winter = simplifiedPosition(JD, 12, 0).altitude
    const summer = simplifiedPosition(JD, 6, 0).altitude
    expect(winter).toBeGreaterThan(summer + 40)
  })

  it('sits below the horizon at noon, towards the north', () => {
    for (const month of [1, 4, 7, 10]) {
      const pos = simplifiedPosition(JD, month, 12)
      expect(pos.altitude).toBeLessThan(0)
      expect(Math.abs(azDelta(0, pos.azimuth))).toBeLessThan(1e-6)
    }
  })

  it('rises in the east and sets in the west', () => {
    const rising = simplifiedPosition(JD, 1, 18)
    const setting = simplifiedPosition(JD, 1, 6)
    expect(rising.azimuth).toBeGreaterThan(0)
    expect(rising.azimuth).toBeLessThan(180)
    expect(setting.azimuth).toBeGreaterThan(180)
    expect(setting.azimuth).toBeLessThan(360)
  })

  it('is periodic over 24 hours', () => {
    for (const hour of [0, 5.5, 13.25, 21.75]) {
      const a = simplifiedPosition(JD, 3, hour)
      const b = simplifiedPosition(JD, 3, hour + 24)
      expect(azDelta(a.azimuth, b.azimuth)).toBeCloseTo(0, 6)
      expect(b.altitude).toBeCloseTo(a.altitude, 6)
    }
  })

  it('moves continuously and sweeps azimuth one way through the day', () => {
    for (let month = 1; month <= 12; month++) {
      for (const jd of [JD, JD + 7.3, JD + 13.6]) {
        let prev = simplifiedPosition(jd, month, 0)
        for (let minute = 1; minute <= 24 * 60; minute++) {
          const next = simplifiedPosition(jd, month, minute / 60)
          const step = azDelta(prev.azimuth, next.azimuth)
          expect(step).toBeGreaterThan(0)
          expect(step).toBeLessThan(2)
          expect(Math.abs(next.altitude - prev.altitude)).toBeLessThan(0.5)
          prev = next
        }
      }
    }
  })

  it('keeps azimuth in [0, 360) and altitude unclamped', () => {
    for (let hour = 0; hour < 24; hour += 0.5) {
      const { azimuth, altitude } = simplifiedPosition(JD, 6, hour)
      expect(azimuth).toBeGreaterThanOrEqual(0)
      expect(azimuth).toBeLessThan(360)
      expect(altitude).toBeGreaterThanOrEqual(-90)
      expect(altitude).toBeLessThanOrEqual(90)
    }
    expect(simplifiedPosition(JD, 6, 12).altitude).toBeLessThan(-60)
  })

  it('uses the latitude it is given', () => {
    const south = simplifiedPosition(JD, 1, 0, -40)
    expect(south.altitude).toBeCloseTo(90 - Math.abs(-40 - heuristicDeclination(JD, 1)), 6)
  })
})

describe('heuristicDeclination', () => {
  it('stays within obliquity plus inclination', () => {
    for (let month = 1; month <= 12; month++) {
      for (let d = 0; d < 28; d += 0.5) {
        expect(Math.abs(heuristicDeclination(JD + d, month))).toBeLessThanOrEqual(MAX_DECLINATION)
      }
    }
  })
})
