/**
 * errors — Error types raised to callers.
 *
 * Numeric routines are total over their domains and never throw. The only
 * condition reported upward is a configuration that cannot produce a
 * meaningful picture: a zero-width field of view, an empty canvas, a mask
 * with no pixels.
 */

/** A view, canvas, mask or installation setting outside its usable range */
export class InvalidConfigurationError extends RangeError {
  /** Name of the offending setting, e.g. 'fov' or 'view.width' */
  readonly setting: string

  constructor(setting: string, message: string) {
    super(`Invalid configuration for ${setting}: ${message}`)
    this.name = 'InvalidConfigurationError'
    this.setting = setting
  }
}

/** Throw unless value is a finite number strictly greater than zero. */
export function requirePositive(setting: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidConfigurationError(setting, `expected a positive number, got ${value}`)
  }
}

/** Throw unless value is a finite number. */
export function requireFinite(setting: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new InvalidConfigurationError(setting, `expected a finite number, got ${value}`)
  }
}
