/**
 * Live condition source backed by the Open-Meteo forecast API.
 *
 * Reads the current WMO weather code for the site and folds it into the
 * four conditions the installation knows. Uses the global fetch (Node 20).
 * A request still pending after timeoutMs is aborted and the poll rejects.
 */

import type { ConditionSource, Site, WeatherCondition } from '../types.js'
import { requirePositive } from '../errors/index.js'

const OPEN_METEO_FORECAST_URL = 'https://api.open-meteo.com/v1/forecast'
const DEFAULT_TIMEOUT_MS = 10_000

export interface OpenMeteoOptions {
  /** Override the API endpoint (self-hosted instances) */
  baseUrl?: string
  /** fetch implementation (default globalThis.fetch) */
  fetch?: typeof fetch
  /** Abort a request that takes longer than this (default 10 000 ms) */
  timeoutMs?: number
}

/**
 * Fold a WMO weather interpretation code into a condition.
 *
 *   0-1            clear (clear sky, mainly clear)
 *   2-3, 45, 48    cloudy (partly cloudy, overcast, fog)
 *   71-77, 85-86   snowy (snowfall, snow grains, snow showers)
 *   everything else with precipitation: rainy (drizzle, rain, showers, thunder)
 *
 * Unknown codes count as cloudy.
 */
export function conditionFromWeatherCode(code: number): WeatherCondition {
  if (code === 0 || code === 1) return 'clear'
  if ((code >= 71 && code <= 77) || code === 85 || code === 86) return 'snowy'
  if ((code >= 51 && code <= 67) || (code >= 80 && code <= 82) || code >= 95) return 'rainy'
  return 'cloudy'
}

export class OpenMeteoConditionSource implements ConditionSource {
  private readonly site: Site
  private readonly baseUrl: string
  private readonly fetchImpl: typeof fetch
  private readonly timeoutMs: number

  constructor(site: Site, options: OpenMeteoOptions = {}) {
    this.site = site
    this.baseUrl = options.baseUrl ?? OPEN_METEO_FORECAST_URL
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init))
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    requirePositive('weather.timeoutMs', this.timeoutMs)
  }

  /** Request URL for the current weather code at the site */
  get url(): string {
    const params = new URLSearchParams({
      latitude: this.site.latitude.toFixed(4),
      longitude: this.site.longitude.toFixed(4),
      current: 'weather_code',
    })
    return `${this.baseUrl}?${params.toString()}`
  }

  async poll(): Promise<WeatherCondition> {
    let res: Response
    try {
      res = await this.fetchImpl(this.url, { signal: AbortSignal.timeout(this.timeoutMs) })
    } catch (err) {
      if (isTimeout(err)) throw new Error(`Open-Meteo request timed out after ${this.timeoutMs} ms`)
      throw err
    }
    if (!res.ok) throw new Error(`Open-Meteo request failed: ${res.status} ${res.statusText}`)

    const body: unknown = await res.json()
    const code = readWeatherCode(body)
    if (code === null) throw new Error('Open-Meteo response has no current.weather_code')
    return conditionFromWeatherCode(code)
  }
}

function isTimeout(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'name' in err && err.name === 'TimeoutError'
}

function readWeatherCode(body: unknown): number | null {
  if (typeof body !== 'object' || body === null || !('current' in body)) return null
  const current = body.current
  if (typeof current !== 'object' || current === null || !('weather_code' in current)) return null
  const code = current.weather_code
  return typeof code === 'number' && Number.isFinite(code) ? code : null
}
