// ─── Sky geometry ────────────────────────────────────────────────────────────

/** Azimuth + altitude in degrees */
export interface SkyPosition {
  /** Degrees from North, measured clockwise (0 = N, 90 = E, 180 = S, 270 = W) */
  azimuth: number
  /** Degrees above the horizon (negative = below) */
  altitude: number
}

// ─── Time ────────────────────────────────────────────────────────────────────

/**
 * Wall-clock reading at a fixed UTC offset.
 * Fields are taken as given: day 31 in a 30-day month is not rolled over.
 */
export interface CalendarTime {
  readonly year: number
  /** 1-12 */
  readonly month: number
  /** 1-31 */
  readonly day: number
  /** 0-23 */
  readonly hour: number
  readonly minute: number
  readonly second: number
  /** Local time minus UTC, in hours (-3 = Atlantic Daylight Time) */
  readonly utcOffsetHours: number
}

// ─── Observation site ────────────────────────────────────────────────────────

export interface Site {
  /** Geodetic latitude in degrees (north positive) */
  latitude: number
  /** Longitude in degrees (east positive) */
  longitude: number
  /** Height above sea level in meters */
  elevation: number
  name?: string
}

// ─── Screen ──────────────────────────────────────────────────────────────────

/** Viewing direction and canvas the sky is projected onto */
export interface ViewConfig {
  /** Azimuth at the horizontal centre of the canvas, degrees */
  viewAzimuth: number
  /** Horizontal field of view, degrees */
  fov: number
  /** Canvas width in pixels */
  width: number
  /** Canvas height in pixels */
  height: number
  /** Radius of the drawn disc; keeps the disc inside the canvas */
  radius: number
}

export interface ScreenPoint {
  x: number
  y: number
  /** Above the horizon and inside the field of view */
  visible: boolean
}

// ─── Moon shape ──────────────────────────────────────────────────────────────

/** Cell values of a MoonShapeMask */
export const MASK_OUTSIDE = 0
export const MASK_SHADOW = 1
export const MASK_LIT = 2

export type MaskCell = typeof MASK_OUTSIDE | typeof MASK_SHADOW | typeof MASK_LIT

/** Rasterized silhouette of the Moon for one phase */
export interface MoonShapeMask {
  /** Width and height in pixels */
  size: number
  /** Phase the mask was rendered for */
  phase: number
  /** Row-major size × size cells, one of MASK_OUTSIDE / MASK_SHADOW / MASK_LIT */
  cells: Uint8Array
}

// ─── Moon phase ──────────────────────────────────────────────────────────────

export type MoonPhaseName =
  | 'new-moon'
  | 'waxing-crescent'
  | 'first-quarter'
  | 'waxing-gibbous'
  | 'full-moon'
  | 'waning-gibbous'
  | 'last-quarter'
  | 'waning-crescent'

export const PHASE_DISPLAY: Record<MoonPhaseName, { name: string; symbol: string }> = {
  'new-moon':        { name: 'New Moon',        symbol: '🌑' },
  'waxing-crescent': { name: 'Waxing Crescent', symbol: '🌒' },
  'first-quarter':   { name: 'First Quarter',   symbol: '🌓' },
  'waxing-gibbous':  { name: 'Waxing Gibbous',  symbol: '🌔' },
  'full-moon':       { name: 'Full Moon',       symbol: '🌕' },
  'waning-gibbous':  { name: 'Waning Gibbous',  symbol: '🌖' },
  'last-quarter':    { name: 'Last Quarter',    symbol: '🌗' },
  'waning-crescent': { name: 'Waning Crescent', symbol: '🌘' },
}

// ─── Weather ─────────────────────────────────────────────────────────────────

/** A concrete sky condition */
export type WeatherCondition = 'clear' | 'cloudy' | 'rainy' | 'snowy'

/** Nominal mode chosen by the user; 'auto' follows the polled condition */
export type WeatherMode = 'auto' | WeatherCondition

/** Manual cycle order, starting from 'auto' */
export const WEATHER_MODES: readonly WeatherMode[] = ['auto', 'clear', 'cloudy', 'rainy', 'snowy']

export const WEATHER_LABELS: Record<WeatherMode, string> = {
  auto: 'Auto',
  clear: 'Clear',
  cloudy: 'Cloudy',
  rainy: 'Rainy',
  snowy: 'Snowy',
}

/** Supplies the current condition, synchronously or not */
export interface ConditionSource {
  poll(): WeatherCondition | Promise<WeatherCondition>
}

// ─── Parameter mapping ───────────────────────────────────────────────────────

export type ParameterName = 'depth' | 'glint'

/** Receives mapped control values (the synthesis engine) */
export interface ParameterSink {
  set(name: ParameterName, value: number): void
  setWeather(condition: WeatherCondition): void
}

/** Input range → output range of one mapping */
export interface LinearRange {
  inMin: number
  inMax: number
  outMin: number
  outMax: number
}

export interface MappingConfig {
  /** Phase fraction → depth */
  depth: LinearRange
  /** Altitude in degrees → glint */
  glint: LinearRange
}

// ─── Installation ────────────────────────────────────────────────────────────

export interface InstallationConfig {
  site: Site
  view: ViewConfig
  /** Diameter of the drawn Moon in pixels */
  moonDiameter: number
  /** Fixed offset used for wall-clock readings */
  utcOffsetHours: number
  mapping: MappingConfig
}

/** Everything derived from one CalendarTime */
export interface MoonState {
  time: CalendarTime
  julianDate: number
  /** 0 = new, 0.5 = full */
  phase: number
  phaseName: MoonPhaseName
  position: SkyPosition
  screen: ScreenPoint
  shape: MoonShapeMask
  /** Mapped synth parameters */
  depth: number
  glint: number
}

/** Minimal logger surface; console satisfies it */
export type Logger = Pick<Console, 'info' | 'warn'>
