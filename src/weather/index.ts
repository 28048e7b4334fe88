/**
 * weather — Manual/automatic weather resolution.
 *
 * Two layers decide the condition the sound follows:
 *
 *   manual override   set by the user cycling auto → clear → cloudy → rainy → snowy
 *   auto condition    the last value polled from a ConditionSource
 *
 * The effective state is the override when one is set, otherwise the auto
 * condition. 'auto' is only ever a mode, never an effective state.
 *
 * Polls may be asynchronous. They are chained so they settle in call order,
 * and each settles by assigning its fields in one synchronous step; readers
 * see either the state before a poll or the state after it. A failing source
 * leaves the last known condition in place and is reported to the logger.
 */

import type {
  ConditionSource,
  Logger,
  WeatherCondition,
  WeatherMode,
} from '../types.js'
import { WEATHER_LABELS, WEATHER_MODES } from '../types.js'

export { OpenMeteoConditionSource, conditionFromWeatherCode } from './open-meteo.js'
export type { OpenMeteoOptions } from './open-meteo.js'

export interface WeatherResolverOptions {
  /** Condition assumed until the first successful poll (default 'clear') */
  initialCondition?: WeatherCondition
  /** Receives poll failures (default console) */
  logger?: Logger
  /** Clock for lastPollTime (default () => new Date()) */
  now?: () => Date
}

/** Outcome of one poll */
export interface PollResult {
  ok: boolean
  previous: WeatherCondition
  current: WeatherCondition
  /** Effective state differs from before the poll */
  changed: boolean
}

/** A source that always reports the same condition */
export function fixedConditionSource(condition: WeatherCondition): ConditionSource {
  return { poll: () => condition }
}

export class WeatherResolver {
  private manualOverride: WeatherCondition | null = null
  private autoCondition: WeatherCondition
  private _lastPollTime: Date | null = null
  private _lastError: Error | null = null
  private pending: Promise<unknown> = Promise.resolve()

  private readonly source: ConditionSource
  private readonly initialCondition: WeatherCondition
  private readonly logger: Logger
  private readonly now: () => Date

  constructor(source: ConditionSource, options: WeatherResolverOptions = {}) {
    this.source = source
    this.initialCondition = options.initialCondition ?? 'clear'
    this.autoCondition = this.initialCondition
    this.logger = options.logger ?? console
    this.now = options.now ?? (() => new Date())
  }

  /**
   * Reset to automatic mode and seed the auto condition with a first poll.
   */
  async init(): Promise<PollResult> {
    this.manualOverride = null
    this.autoCondition = this.initialCondition
    this._lastPollTime = null
    this._lastError = null
    return this.poll()
  }

  /**
   * Advance the manual mode one step around the cycle and return it.
   * Reaching 'auto' drops the override.
   */
  cycleManual(): WeatherMode {
    const index = WEATHER_MODES.indexOf(this.mode)
    const next = WEATHER_MODES[(index + 1) % WEATHER_MODES.length] ?? 'auto'
    this.manualOverride = next === 'auto' ? null : next
    return next
  }

  /** Re-poll the source on the periodic cadence. Never touches the override. */
  update(): Promise<PollResult> {
    return this.poll()
  }

  /** Re-poll immediately, outside the periodic cadence. */
  forceUpdate(): Promise<PollResult> {
    return this.poll()
  }

  /** Condition the sound follows; never 'auto' */
  effectiveState(): WeatherCondition {
    return this.manualOverride ?? this.autoCondition
  }

  /** Label of the nominal mode for on-screen feedback ("Auto", "Rainy", …) */
  displayState(): string {
    return WEATHER_LABELS[this.mode]
  }

  /** Nominal mode: the override, or 'auto' when none is set */
  get mode(): WeatherMode {
    return this.manualOverride ?? 'auto'
  }

  /** Last condition reported by the source */
  get polledCondition(): WeatherCondition {
    return this.autoCondition
  }

  get lastPollTime(): Date | null {
    return this._lastPollTime
  }

  /** Error from the most recent poll, null if it succeeded */
  get lastError(): Error | null {
    return this._lastError
  }

  // ─── Internal ───────────────────────────────────────────────────────────────

  private poll(): Promise<PollResult> {
    const run = this.pending.then(() => this.pollOnce())
    // Keep the chain alive whatever this poll does
    this.pending = run.catch(() => undefined)
    return run
  }

  private async pollOnce(): Promise<PollResult> {
    let condition: WeatherCondition
    try {
      condition = await this.source.poll()
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err))
      const kept = this.autoCondition
      this._lastError = error
      this.logger.warn(`Weather poll failed, keeping ${kept}: ${error.message}`)
      return { ok: false, previous: kept, current: kept, changed: false }
    }

    // The override may have moved while the source was pending
    const previousEffective = this.effectiveState()
    const previous = this.autoCondition
    this.autoCondition = condition
    this._lastPollTime = this.now()
    this._lastError = null

    return {
      ok: true,
      previous,
      current: condition,
      changed: this.effectiveState() !== previousEffective,
    }
  }
}
