/**
 * lunar-ambience — Moon phase, sky position and weather for an ambient
 * sound installation at a fixed observation point.
 *
 * Everything here is synchronous and pure except the WeatherResolver,
 * which owns the manual/automatic weather mode, and the Installation that
 * ties the pieces together. Neither owns a timer; the host schedules.
 *
 * Quick start:
 *   import { Installation } from 'lunar-ambience'
 *
 *   const piece = new Installation({ sink: engine })
 *   await piece.start()
 *   piece.setTime({ hour: 23 })
 *   console.log(piece.describe().join('\n'))
 */

// ─── Primary API ──────────────────────────────────────────────────────────────

export { computeMoonState, Installation } from './api/index.js'
export type { InstallationOptions, WeatherChange } from './api/index.js'

// ─── Building blocks ──────────────────────────────────────────────────────────

export {
  calendarToJD,
  calendarFromDate,
  dateToJD,
  jdToDate,
  fractionalHour,
  J2000,
} from './time/index.js'
export {
  phaseFraction,
  phaseName,
  moonAgeDays,
  illuminatedFraction,
  nextNewMoonJD,
  nextFullMoonJD,
  SYNODIC_MONTH,
  REFERENCE_NEW_MOON_JD,
} from './phase/index.js'
export { simplifiedPosition, heuristicDeclination, MAX_DECLINATION } from './position/index.js'
export { projectToScreen, azimuthOffset, isInFieldOfView } from './projection/index.js'
export { generateMoonShape, maskCell, litFraction, renderMask } from './shape/index.js'
export {
  WeatherResolver,
  fixedConditionSource,
  OpenMeteoConditionSource,
  conditionFromWeatherCode,
} from './weather/index.js'
export type { WeatherResolverOptions, PollResult, OpenMeteoOptions } from './weather/index.js'
export { phaseToDepth, altitudeToGlint, DEFAULT_MAPPING } from './mapping/index.js'
export {
  resolveConfig,
  configFromEnv,
  DEFAULT_CONFIG,
  DEFAULT_SITE,
  DEFAULT_VIEW,
} from './config/index.js'
export type { ConfigOverrides } from './config/index.js'
export { InvalidConfigurationError } from './errors/index.js'

// ─── Types ────────────────────────────────────────────────────────────────────

export type {
  CalendarTime,
  SkyPosition,
  Site,
  ViewConfig,
  ScreenPoint,
  MoonShapeMask,
  MaskCell,
  MoonPhaseName,
  MoonState,
  WeatherCondition,
  WeatherMode,
  ConditionSource,
  ParameterName,
  ParameterSink,
  LinearRange,
  MappingConfig,
  InstallationConfig,
  Logger,
} from './types.js'

// ─── Constants ────────────────────────────────────────────────────────────────

export {
  MASK_OUTSIDE,
  MASK_SHADOW,
  MASK_LIT,
  PHASE_DISPLAY,
  WEATHER_MODES,
  WEATHER_LABELS,
} from './types.js'
