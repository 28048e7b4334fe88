/**
 * api — The moon pipeline and the installation that owns its state.
 *
 * computeMoonState() is the whole pure pipeline for one wall-clock reading:
 *
 *   CalendarTime → Julian Date → phase ─────────→ shape mask
 *                              ↘ sky position → screen point
 *                                 phase, altitude → depth, glint
 *
 * Installation holds what the running piece needs between calls: the
 * current clock reading, the last MoonState, and the WeatherResolver. It
 * owns no timers. A scheduler calls refreshMoon() for redraws and
 * pollWeather() on its weather cadence; key handlers call cycleWeather()
 * and refresh().
 */

import type {
  CalendarTime,
  ConditionSource,
  InstallationConfig,
  Logger,
  MoonState,
  ParameterSink,
  WeatherCondition,
  WeatherMode,
} from '../types.js'
import { PHASE_DISPLAY } from '../types.js'
import { calendarFromDate, calendarToJD, formatCalendar, fractionalHour } from '../time/index.js'
import { phaseFraction, phaseName } from '../phase/index.js'
import { simplifiedPosition } from '../position/index.js'
import { projectToScreen } from '../projection/index.js'
import { generateMoonShape } from '../shape/index.js'
import { altitudeToGlint, phaseToDepth } from '../mapping/index.js'
import { resolveConfig, type ConfigOverrides } from '../config/index.js'
import { WeatherResolver, fixedConditionSource, type PollResult } from '../weather/index.js'

// ─── Pure pipeline ────────────────────────────────────────────────────────────

/**
 * Derive every moon quantity for a wall-clock reading.
 *
 * @param time - Wall-clock reading; its own utcOffsetHours is used
 * @param config - Site, view and mapping (see resolveConfig)
 * @throws InvalidConfigurationError if the view or diameter is degenerate
 *
 * @example
 * ```ts
 * const state = computeMoonState(
 *   { year: 2024, month: 5, day: 20, hour: 22, minute: 0, second: 0, utcOffsetHours: -3 },
 *   DEFAULT_CONFIG,
 * )
 * state.phase          // 0.4312…
 * state.screen.visible // true
 * ```
 */
export function computeMoonState(time: CalendarTime, config: InstallationConfig): MoonState {
  const julianDate = calendarToJD(time)
  const phase = phaseFraction(julianDate)
  const position = simplifiedPosition(julianDate, time.month, fractionalHour(time), config.site.latitude)
  const screen = projectToScreen(position, config.view)
  const shape = generateMoonShape(phase, config.moonDiameter)

  return {
    time,
    julianDate,
    phase,
    phaseName: phaseName(phase),
    position,
    screen,
    shape,
    depth: phaseToDepth(phase, config.mapping),
    glint: altitudeToGlint(position.altitude, config.mapping),
  }
}

// ─── Installation ─────────────────────────────────────────────────────────────

export interface InstallationOptions {
  /** Config overrides merged onto DEFAULT_CONFIG */
  config?: ConfigOverrides
  /** Starting clock reading (default: the wall clock at construction) */
  time?: CalendarTime
  /** Live weather (default: always clear) */
  conditionSource?: ConditionSource
  /** Synth engine receiving mapped values */
  sink?: ParameterSink
  logger?: Logger
  /** Wall clock (default () => new Date()) */
  now?: () => Date
}

/** Outcome of a periodic weather poll, as seen by the sound */
export interface WeatherChange {
  changed: boolean
  previous: WeatherCondition
  current: WeatherCondition
}

export class Installation {
  readonly config: InstallationConfig
  readonly weather: WeatherResolver

  private _time: CalendarTime
  private _moon: MoonState
  private readonly sink: ParameterSink | undefined
  private readonly logger: Logger
  private readonly now: () => Date

  constructor(options: InstallationOptions = {}) {
    this.config = resolveConfig(options.config)
    this.sink = options.sink
    this.logger = options.logger ?? console
    this.now = options.now ?? (() => new Date())
    this.weather = new WeatherResolver(options.conditionSource ?? fixedConditionSource('clear'), {
      logger: this.logger,
      now: this.now,
    })

    this._time = options.time ?? calendarFromDate(this.now(), this.config.utcOffsetHours)
    this._moon = computeMoonState(this._time, this.config)
  }

  /** Current clock reading */
  get time(): CalendarTime {
    return this._time
  }

  /** State derived from the current clock reading */
  get moon(): MoonState {
    return this._moon
  }

  /**
   * Seed the weather and push every parameter to the sink once.
   */
  async start(): Promise<MoonState> {
    await this.weather.init()
    this.pushMoon()
    this.pushWeather()
    return this._moon
  }

  /**
   * Change any subset of clock fields and recompute once for the batch.
   */
  setTime(patch: Partial<CalendarTime>): MoonState {
    this._time = { ...this._time, ...patch }
    return this.refreshMoon()
  }

  /** Read the wall clock at the configured offset and recompute. */
  useCurrentTime(now: Date = this.now()): MoonState {
    this._time = calendarFromDate(now, this.config.utcOffsetHours)
    return this.refreshMoon()
  }

  /** Recompute the moon for the current clock reading and push depth/glint. */
  refreshMoon(): MoonState {
    this._moon = computeMoonState(this._time, this.config)
    this.pushMoon()
    return this._moon
  }

  /** Manual key: next weather mode; the sound follows the new effective state. */
  cycleWeather(): WeatherMode {
    const mode = this.weather.cycleManual()
    this.pushWeather()
    return mode
  }

  /**
   * Refresh key: jump to the current time and re-poll the weather now.
   */
  async refresh(now: Date = this.now()): Promise<MoonState> {
    this.useCurrentTime(now)
    await this.weather.forceUpdate()
    this.pushWeather()
    return this._moon
  }

  /**
   * Body of the periodic weather poll. Pushes to the sink only when the
   * effective condition changed.
   */
  async pollWeather(): Promise<WeatherChange> {
    const result: PollResult = await this.weather.update()
    const current = this.weather.effectiveState()
    const previous = result.changed ? result.previous : current
    if (result.changed) {
      this.pushWeather()
      this.logger.info(`Weather changed: ${previous} -> ${current}`)
    }
    return { changed: result.changed, previous, current }
  }

  /** Status lines for the console */
  describe(): string[] {
    const m = this._moon
    const { site, view } = this.config
    const { name, symbol } = PHASE_DISPLAY[m.phaseName]
    return [
      `=== Moon at ${formatCalendar(m.time)} (UTC${formatOffset(m.time.utcOffsetHours)}) ===`,
      `Location:   lat ${site.latitude.toFixed(5)}, lon ${site.longitude.toFixed(5)}, view ${view.viewAzimuth}°`,
      `Julian Date: ${m.julianDate.toFixed(5)}`,
      `Phase:      ${m.phase.toFixed(2)} ${symbol} ${name}`,
      `Position:   azimuth ${m.position.azimuth.toFixed(2)}°, altitude ${m.position.altitude.toFixed(2)}°`,
      `Screen:     x ${m.screen.x.toFixed(2)}, y ${m.screen.y.toFixed(2)}`,
      `Visible:    ${m.screen.visible ? 'yes' : 'no'}`,
      `Synth:      depth ${m.depth.toFixed(2)}, glint ${m.glint.toFixed(2)}`,
      `Weather:    ${this.weather.displayState()} (${this.weather.effectiveState()})`,
    ]
  }

  // ─── Internal ───────────────────────────────────────────────────────────────

  private pushMoon(): void {
    this.sink?.set('depth', this._moon.depth)
    this.sink?.set('glint', this._moon.glint)
  }

  private pushWeather(): void {
    this.sink?.setWeather(this.weather.effectiveState())
  }
}

/** -3 → '-3', 5.5 → '+5.5', 0 → '+0' */
function formatOffset(hours: number): string {
  return hours < 0 ? String(hours) : `+${hours}`
}
