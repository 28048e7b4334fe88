/**
 * projection — Sky position to canvas coordinates.
 *
 * The canvas shows a horizontal window of `fov` degrees centred on
 * `viewAzimuth`, from the horizon (bottom edge) to the zenith (top edge):
 *
 *   offset = azimuth − viewAzimuth, wrapped to [−180, 180)
 *   x      = (offset + fov/2) / fov × width
 *   y      = height − altitude / 90 × height
 *
 * The point is then clamped so a disc of `radius` stays fully on the
 * canvas. Visibility is decided on the angles, before clamping.
 */

import type { SkyPosition, ScreenPoint, ViewConfig } from '../types.js'
import { clamp, normalizeDeg180 } from '../math/index.js'
import { InvalidConfigurationError, requireFinite, requirePositive } from '../errors/index.js'

/** Altitude shown at the top edge of the canvas, degrees */
export const ZENITH_ALTITUDE = 90

/**
 * Signed angular distance from the view centre to an azimuth, in [−180, 180).
 * Negative = left of centre.
 */
export function azimuthOffset(azimuth: number, viewAzimuth: number): number {
  return normalizeDeg180(azimuth - viewAzimuth)
}

/**
 * True when the azimuth falls in the closed window [viewAzimuth − fov/2,
 * viewAzimuth + fov/2], across the 0/360 seam.
 */
export function isInFieldOfView(azimuth: number, viewAzimuth: number, fov: number): boolean {
  return Math.abs(azimuthOffset(azimuth, viewAzimuth)) <= fov / 2
}

/**
 * Throw InvalidConfigurationError for a view that cannot be drawn.
 */
export function validateView(view: ViewConfig): void {
  requireFinite('view.viewAzimuth', view.viewAzimuth)
  requirePositive('view.fov', view.fov)
  if (view.fov > 360) {
    throw new InvalidConfigurationError('view.fov', `field of view cannot exceed 360°, got ${view.fov}`)
  }
  requirePositive('view.width', view.width)
  requirePositive('view.height', view.height)
  requireFinite('view.radius', view.radius)
  if (view.radius < 0) {
    throw new InvalidConfigurationError('view.radius', `expected a non-negative radius, got ${view.radius}`)
  }
  if (2 * view.radius > Math.min(view.width, view.height)) {
    throw new InvalidConfigurationError(
      'view.radius',
      `a disc of radius ${view.radius} does not fit a ${view.width}×${view.height} canvas`,
    )
  }
}

/**
 * Project a sky position onto the canvas.
 *
 * @throws InvalidConfigurationError if the view is degenerate
 */
export function projectToScreen(pos: SkyPosition, view: ViewConfig): ScreenPoint {
  validateView(view)
  const { viewAzimuth, fov, width, height, radius } = view

  const offset = azimuthOffset(pos.azimuth, viewAzimuth)
  const rawX = ((offset + fov / 2) / fov) * width
  const rawY = height - (clamp(pos.altitude, 0, ZENITH_ALTITUDE) / ZENITH_ALTITUDE) * height

  return {
    x: clamp(rawX, radius, width - radius),
    y: clamp(rawY, radius, height - radius),
    visible: pos.altitude > 0 && Math.abs(offset) <= fov / 2,
  }
}
