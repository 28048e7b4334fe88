import { describe, it, expect, vi } from 'vitest'
import type { CalendarTime, ConditionSource, ParameterSink, WeatherCondition } from '../src/types.js'
import { Installation, computeMoonState } from '../src/api/index.js'
import { DEFAULT_CONFIG } from '../src/config/index.js'
import { fixedConditionSource } from '../src/weather/index.js'
import { InvalidConfigurationError } from '../src/errors/index.js'

const MAY_EVENING: CalendarTime = {
  year: 2024,
  month: 5,
  day: 20,
  hour: 22,
  minute: 0,
  second: 0,
  utcOffsetHours: -3,
}

function recordingSink() {
  const set = vi.fn<ParameterSink['set']>()
  const setWeather = vi.fn<ParameterSink['setWeather']>()
  return { set, setWeather }
}

function sequenceSource(...conditions: WeatherCondition[]): ConditionSource {
  let i = 0
  return { poll: () => conditions[Math.min(i++, conditions.length - 1)] ?? 'clear' }
}

const quietLogger = () => ({ info: vi.fn(), warn: vi.fn() })

describe('computeMoonState', () => {
  it('derives every quantity for one evening', () => {
    const state = computeMoonState(MAY_EVENING, DEFAULT_CONFIG)

    expect(state.time).toBe(MAY_EVENING)
    expect(state.julianDate).toBeCloseTo(2460451.5416667, 6)
    expect(state.phase).toBeCloseTo(0.4312282, 6)
    expect(state.phaseName).toBe('waxing-gibbous')
    expect(state.position.azimuth).toBeCloseTo(150.9028, 3)
    expect(state.position.altitude).toBeCloseTo(16.8514, 3)
    expect(state.screen.visible).toBe(true)
    expect(state.screen.x).toBeCloseTo(32.963, 2)
    expect(state.screen.y).toBeCloseTo(52.0168, 2)
    expect(state.shape.size).toBe(6)
    expect(state.shape.phase).toBe(state.phase)
    expect(state.depth).toBeCloseTo(0.3 + 0.5 * state.phase, 12)
    expect(state.glint).toBeCloseTo(0.2 + (0.6 * state.position.altitude) / 90, 12)
  })

  it('is deterministic', () => {
    const a = computeMoonState(MAY_EVENING, DEFAULT_CONFIG)
    const b = computeMoonState({ ...MAY_EVENING }, DEFAULT_CONFIG)
    expect(b.julianDate).toBe(a.julianDate)
    expect(b.phase).toBe(a.phase)
    expect(b.position).toEqual(a.position)
    expect(Array.from(b.shape.cells)).toEqual(Array.from(a.shape.cells))
  })

  it('clamps glint for a Moon below the horizon', () => {
    const state = computeMoonState({ ...MAY_EVENING, hour: 12 }, DEFAULT_CONFIG)
    expect(state.position.altitude).toBeLessThan(0)
    expect(state.screen.visible).toBe(false)
    expect(state.glint).toBe(0.2)
  })
})

describe('Installation', () => {
  it('rejects a degenerate view at construction', () => {
    expect(() => new Installation({ config: { view: { fov: 0 } }, time: MAY_EVENING })).toThrow(
      InvalidConfigurationError,
    )
  })

  it('reads the wall clock when no time is given', () => {
    const installation = new Installation({ now: () => new Date('2024-05-21T01:00:00Z') })
    expect(installation.time).toEqual(MAY_EVENING)
  })

  it('pushes every parameter on start', async () => {
    const sink = recordingSink()
    const installation = new Installation({
      time: MAY_EVENING,
      conditionSource: fixedConditionSource('snowy'),
      sink,
      logger: quietLogger(),
    })
    const state = await installation.start()

    expect(sink.set).toHaveBeenCalledWith('depth', state.depth)
    expect(sink.set).toHaveBeenCalledWith('glint', state.glint)
    expect(sink.setWeather).toHaveBeenCalledWith('snowy')
  })

  it('recomputes once for a batch of clock changes', () => {
    const sink = recordingSink()
    const installation = new Installation({ time: MAY_EVENING, sink })

    const state = installation.setTime({ hour: 0, minute: 0, day: 21 })
    expect(sink.set).toHaveBeenCalledTimes(2)
    expect(installation.time).toEqual({ ...MAY_EVENING, day: 21, hour: 0 })
    expect(installation.moon).toBe(state)
    expect(state.position.azimuth).toBeCloseTo(180, 9)
  })

  it('jumps to the current wall-clock time', () => {
    const installation = new Installation({ time: { ...MAY_EVENING, year: 2020 } })
    const state = installation.useCurrentTime(new Date('2024-05-21T01:00:00Z'))
    expect(state.time).toEqual(MAY_EVENING)
  })

  it('cycles the weather mode and sends the effective condition', async () => {
    const sink = recordingSink()
    const installation = new Installation({
      time: MAY_EVENING,
      conditionSource: fixedConditionSource('snowy'),
      sink,
      logger: quietLogger(),
    })
    await installation.start()

    expect(installation.cycleWeather()).toBe('clear')
    expect(sink.setWeather).toHaveBeenLastCalledWith('clear')
    expect(installation.weather.displayState()).toBe('Clear')

    for (let i = 0; i < 4; i++) installation.cycleWeather()
    expect(installation.weather.mode).toBe('auto')
    expect(sink.setWeather).toHaveBeenLastCalledWith('snowy')
  })

  it('reports and pushes only real weather changes', async () => {
    const sink = recordingSink()
    const logger = quietLogger()
    const installation = new Installation({
      time: MAY_EVENING,
      conditionSource: sequenceSource('clear', 'rainy'),
      sink,
      logger,
    })
    await installation.start()
    expect(sink.setWeather).toHaveBeenCalledTimes(1)

    await expect(installation.pollWeather()).resolves.toEqual({ changed: true, previous: 'clear', current: 'rainy' })
    expect(sink.setWeather).toHaveBeenCalledTimes(2)
    expect(logger.info).toHaveBeenCalledWith('Weather changed: clear -> rainy')

    await expect(installation.pollWeather()).resolves.toEqual({ changed: false, previous: 'rainy', current: 'rainy' })
    expect(sink.setWeather).toHaveBeenCalledTimes(2)
  })

  it('ignores polled changes hidden by a manual override', async () => {
    const installation = new Installation({
      time: MAY_EVENING,
      conditionSource: sequenceSource('clear', 'snowy'),
      logger: quietLogger(),
    })
    await installation.start()
    installation.cycleWeather()
    installation.cycleWeather()

    await expect(installation.pollWeather()).resolves.toEqual({ changed: false, previous: 'cloudy', current: 'cloudy' })
  })

  it('refreshes the clock and the weather together', async () => {
    const poll = vi.fn<() => WeatherCondition>().mockReturnValueOnce('clear').mockReturnValue('cloudy')
    const sink = recordingSink()
    const installation = new Installation({
      time: { ...MAY_EVENING, year: 2020 },
      conditionSource: { poll },
      sink,
      logger: quietLogger(),
    })
    await installation.start()

    const state = await installation.refresh(new Date('2024-05-21T01:00:00Z'))
    expect(state.time).toEqual(MAY_EVENING)
    expect(poll).toHaveBeenCalledTimes(2)
    expect(sink.setWeather).toHaveBeenLastCalledWith('cloudy')
  })

  it('describes its state for the console', async () => {
    const installation = new Installation({ time: MAY_EVENING, logger: quietLogger() })
    await installation.start()

    expect(installation.describe()).toEqual([
      '=== Moon at 2024-05-20 22:00 (UTC-3) ===',
      'Location:   lat 46.49300, lon -63.38729, view 180°',
      'Julian Date: 2460451.54167',
      'Phase:      0.43 🌔 Waxing Gibbous',
      'Position:   azimuth 150.90°, altitude 16.85°',
      'Screen:     x 32.96, y 52.02',
      'Visible:    yes',
      'Synth:      depth 0.52, glint 0.31',
      'Weather:    Auto (clear)',
    ])
  })
})
