/**
 * config — Installation defaults, overrides and validation.
 *
 * Defaults describe the reference site: the north shore of Prince Edward
 * Island looking south over a 120° window, drawn on a 128×64 display, clock
 * on Atlantic Daylight Time. Any field can be overridden in code or, for the
 * handful that operators change on site, through the environment.
 */

import type { InstallationConfig, LinearRange, Site, ViewConfig } from '../types.js'
import { DEFAULT_MAPPING } from '../mapping/index.js'
import { validateView } from '../projection/index.js'
import { MAX_DECLINATION } from '../position/index.js'
import { InvalidConfigurationError, requireFinite } from '../errors/index.js'

// ─── Defaults ─────────────────────────────────────────────────────────────────

export const DEFAULT_SITE: Site = {
  latitude: 46.493,
  longitude: -63.38729,
  elevation: 4,
  name: 'Cavendish, PEI',
}

const DEFAULT_MOON_DIAMETER = 6

export const DEFAULT_VIEW: ViewConfig = {
  viewAzimuth: 180,
  fov: 120,
  width: 128,
  height: 64,
  radius: DEFAULT_MOON_DIAMETER / 2,
}

export const DEFAULT_CONFIG: InstallationConfig = {
  site: DEFAULT_SITE,
  view: DEFAULT_VIEW,
  moonDiameter: DEFAULT_MOON_DIAMETER,
  utcOffsetHours: -3,
  mapping: DEFAULT_MAPPING,
}

// ─── Overrides ───────────────────────────────────────────────────────────────

/** Any subset of InstallationConfig, nested objects included */
export interface ConfigOverrides {
  site?: Partial<Site>
  view?: Partial<ViewConfig>
  moonDiameter?: number
  utcOffsetHours?: number
  mapping?: {
    depth?: Partial<LinearRange>
    glint?: Partial<LinearRange>
  }
}

/**
 * Merge overrides onto the defaults and validate the result.
 *
 * Every nested object is copied, so mutating a resolved config never
 * reaches the defaults.
 *
 * @throws InvalidConfigurationError for a degenerate view, a diameter that is
 *   not a positive integer, an out-of-range latitude or offset
 */
export function resolveConfig(overrides: ConfigOverrides = {}, base: InstallationConfig = DEFAULT_CONFIG): InstallationConfig {
  const moonDiameter = overrides.moonDiameter ?? base.moonDiameter
  // The projection keeps a disc of the drawn size on screen unless told otherwise
  const radius = overrides.view?.radius ?? (overrides.moonDiameter !== undefined ? moonDiameter / 2 : base.view.radius)

  const config: InstallationConfig = {
    site: { ...base.site, ...overrides.site },
    view: { ...base.view, ...overrides.view, radius },
    moonDiameter,
    utcOffsetHours: overrides.utcOffsetHours ?? base.utcOffsetHours,
    mapping: {
      depth: { ...base.mapping.depth, ...overrides.mapping?.depth },
      glint: { ...base.mapping.glint, ...overrides.mapping?.glint },
    },
  }
  validateConfig(config)
  return config
}

export function validateConfig(config: InstallationConfig): void {
  const { site, moonDiameter, utcOffsetHours } = config

  requireFinite('site.latitude', site.latitude)
  if (Math.abs(site.latitude) > 90) {
    throw new InvalidConfigurationError('site.latitude', `must be within ±90°, got ${site.latitude}`)
  }
  // Nearer the equator the Moon can pass the zenith and the azimuth sweep reverses
  if (Math.abs(site.latitude) <= MAX_DECLINATION) {
    throw new InvalidConfigurationError(
      'site.latitude',
      `must be more than ${MAX_DECLINATION.toFixed(2)}° from the equator, got ${site.latitude}`,
    )
  }
  requireFinite('site.longitude', site.longitude)

  validateView(config.view)

  if (!Number.isInteger(moonDiameter) || moonDiameter <= 0) {
    throw new InvalidConfigurationError('moonDiameter', `expected a positive integer, got ${moonDiameter}`)
  }

  requireFinite('utcOffsetHours', utcOffsetHours)
  if (Math.abs(utcOffsetHours) > 14) {
    throw new InvalidConfigurationError('utcOffsetHours', `must be within ±14 hours, got ${utcOffsetHours}`)
  }
}

// ─── Environment ─────────────────────────────────────────────────────────────

const ENV_KEYS = {
  latitude: 'LUNAR_LATITUDE',
  longitude: 'LUNAR_LONGITUDE',
  viewAzimuth: 'LUNAR_VIEW_AZIMUTH',
  fov: 'LUNAR_FOV',
  utcOffsetHours: 'LUNAR_UTC_OFFSET',
} as const

/**
 * Read overrides from environment variables. Unset or empty variables are
 * ignored; anything that does not parse as a number throws.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  const read = (key: string): number | undefined => {
    const raw = env[key]
    if (raw === undefined || raw.trim() === '') return undefined
    const value = Number(raw)
    if (!Number.isFinite(value)) {
      throw new InvalidConfigurationError(key, `expected a number, got '${raw}'`)
    }
    return value
  }

  const overrides: ConfigOverrides = {}
  const latitude = read(ENV_KEYS.latitude)
  const longitude = read(ENV_KEYS.longitude)
  const viewAzimuth = read(ENV_KEYS.viewAzimuth)
  const fov = read(ENV_KEYS.fov)
  const utcOffsetHours = read(ENV_KEYS.utcOffsetHours)

  if (latitude !== undefined || longitude !== undefined) {
    const site: Partial<Site> = {}
    if (latitude !== undefined) site.latitude = latitude
    if (longitude !== undefined) site.longitude = longitude
    overrides.site = site
  }
  if (viewAzimuth !== undefined || fov !== undefined) {
    const view: Partial<ViewConfig> = {}
    if (viewAzimuth !== undefined) view.viewAzimuth = viewAzimuth
    if (fov !== undefined) view.fov = fov
    overrides.view = view
  }
  if (utcOffsetHours !== undefined) overrides.utcOffsetHours = utcOffsetHours

  return overrides
}
