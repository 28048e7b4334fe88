/**
 * time — Calendar to Julian Date conversion and wall-clock snapshots.
 *
 * The installation keeps its clock as a CalendarTime: a plain wall-clock
 * reading plus a fixed numeric UTC offset. There is no timezone database
 * and no daylight-saving switch; the offset is whatever the operator set.
 *
 * Julian Date follows the standard algorithm (Meeus, Astronomical
 * Algorithms, ch. 7) with the Gregorian correction:
 *
 *   if M <= 2: Y -= 1, M += 12
 *   A = floor(Y / 100),  B = 2 - A + floor(A / 4)
 *   JD = floor(365.25 (Y + 4716)) + floor(30.6001 (M + 1)) + D + B - 1524.5
 *
 * where D is the UTC day of month with the time of day as a fraction.
 */

import type { CalendarTime } from '../types.js'

// ─── Constants ────────────────────────────────────────────────────────────────

/** Julian Date of J2000.0 epoch (2000 Jan 1, 12:00 TT) */
export const J2000 = 2451545.0

/** Julian Date of the Unix epoch (1970 Jan 1, 00:00 UTC) */
export const UNIX_EPOCH_JD = 2440587.5

/** Seconds per day */
export const SECONDS_PER_DAY = 86400.0

const MS_PER_DAY = SECONDS_PER_DAY * 1000

// ─── Julian Date ─────────────────────────────────────────────────────────────

/**
 * Convert a wall-clock reading to a Julian Date (UTC).
 *
 * Fields are not validated: 31 April, minute 75 and the like go through the
 * arithmetic unchanged and yield whatever date the formula gives.
 */
export function calendarToJD(time: CalendarTime): number {
  let y = time.year
  let m = time.month
  if (m <= 2) {
    y -= 1
    m += 12
  }

  const a = Math.floor(y / 100)
  const b = 2 - a + Math.floor(a / 4)

  // Local time of day minus the offset gives UTC
  const dayFraction =
    (time.hour + time.minute / 60 + time.second / 3600 - time.utcOffsetHours) / 24

  return (
    Math.floor(365.25 * (y + 4716)) +
    Math.floor(30.6001 * (m + 1)) +
    (time.day + dayFraction) +
    b -
    1524.5
  )
}

/**
 * Convert a JavaScript Date (UTC) to Julian Date in UTC.
 */
export function dateToJD(date: Date): number {
  return date.getTime() / MS_PER_DAY + UNIX_EPOCH_JD
}

/**
 * Convert a Julian Date in UTC to a JavaScript Date.
 */
export function jdToDate(jd: number): Date {
  return new Date((jd - UNIX_EPOCH_JD) * MS_PER_DAY)
}

// ─── Wall clock ──────────────────────────────────────────────────────────────

/**
 * Read the wall clock of a fixed-offset zone at the given instant.
 * Seconds are truncated to whole seconds.
 *
 * @param date - Instant to read
 * @param utcOffsetHours - Local time minus UTC, in hours
 */
export function calendarFromDate(date: Date, utcOffsetHours: number): CalendarTime {
  // Shift the instant so its UTC fields read as local time
  const local = new Date(date.getTime() + utcOffsetHours * 3600000)
  return {
    year: local.getUTCFullYear(),
    month: local.getUTCMonth() + 1,
    day: local.getUTCDate(),
    hour: local.getUTCHours(),
    minute: local.getUTCMinutes(),
    second: local.getUTCSeconds(),
    utcOffsetHours,
  }
}

/** Hour of day including minutes and seconds, e.g. 22:30 → 22.5 */
export function fractionalHour(time: CalendarTime): number {
  return time.hour + time.minute / 60 + time.second / 3600
}

/** 'YYYY-MM-DD HH:MM' for log lines */
export function formatCalendar(time: CalendarTime): string {
  const pad = (n: number, w = 2) => String(n).padStart(w, '0')
  return `${pad(time.year, 4)}-${pad(time.month)}-${pad(time.day)} ${pad(time.hour)}:${pad(time.minute)}`
}
