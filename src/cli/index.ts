#!/usr/bin/env node
/**
 * lunar-ambience CLI
 *
 * Commands:
 *   lunar-ambience state [YYYY-MM-DD] [HH:MM]   Moon state at a local wall-clock time
 *   lunar-ambience phase [YYYY-MM-DD]           Phase, age and next new/full moon
 *   lunar-ambience mask [phase] [diameter]      Text rendering of the silhouette
 *   lunar-ambience weather                      Poll Open-Meteo once for the site
 *
 * Site, view and UTC offset come from the defaults plus LUNAR_* environment
 * variables (see config/).
 */

import type { CalendarTime } from '../types.js'
import { PHASE_DISPLAY } from '../types.js'
import { Installation } from '../api/index.js'
import { configFromEnv, resolveConfig } from '../config/index.js'
import { calendarFromDate, calendarToJD, jdToDate } from '../time/index.js'
import {
  illuminatedFraction,
  moonAgeDays,
  nextFullMoonJD,
  nextNewMoonJD,
  phaseFraction,
  phaseName,
} from '../phase/index.js'
import { generateMoonShape, litFraction, renderMask } from '../shape/index.js'
import { OpenMeteoConditionSource } from '../weather/index.js'

const args = process.argv.slice(2)
const command = args[0]

async function main() {
  switch (command) {
    case 'state':
      cmdState(args[1], args[2])
      break
    case 'phase':
      cmdPhase(args[1])
      break
    case 'mask':
      cmdMask(args[1], args[2])
      break
    case 'weather':
      await cmdWeather()
      break
    default:
      printHelp()
      process.exit(command ? 1 : 0)
  }
}

function printHelp() {
  console.log(`lunar-ambience — Moon phase, position and weather for an ambient installation

Commands:
  state [YYYY-MM-DD] [HH:MM]   Moon state at a local wall-clock time (default now)
  phase [YYYY-MM-DD]           Phase, age and next new/full moon (default today)
  mask [phase] [diameter]      Render the silhouette (phase 0-1, default 0.25; diameter default 16)
  weather                      Poll Open-Meteo once for the configured site

Environment:
  LUNAR_LATITUDE, LUNAR_LONGITUDE, LUNAR_VIEW_AZIMUTH, LUNAR_FOV, LUNAR_UTC_OFFSET

Examples:
  lunar-ambience state 2024-05-20 22:00
  lunar-ambience mask 0.6 24
  LUNAR_UTC_OFFSET=-4 lunar-ambience phase`)
}

function cmdState(dateStr?: string, timeStr?: string) {
  const overrides = configFromEnv()
  const { utcOffsetHours } = resolveConfig(overrides)
  const time = dateStr
    ? parseWallClock(dateStr, timeStr ?? '00:00', utcOffsetHours)
    : calendarFromDate(new Date(), utcOffsetHours)

  const installation = new Installation({ config: overrides, time })
  for (const line of installation.describe()) console.log(line)
}

function cmdPhase(dateStr?: string) {
  const { utcOffsetHours } = resolveConfig(configFromEnv())
  const time = dateStr
    ? parseWallClock(dateStr, '00:00', utcOffsetHours)
    : calendarFromDate(new Date(), utcOffsetHours)

  const jd = calendarToJD(time)
  const phase = phaseFraction(jd)
  const { name, symbol } = PHASE_DISPLAY[phaseName(phase)]

  console.log(`Moon phase for ${fmtDay(time)}:`)
  console.log(`  Phase:        ${phase.toFixed(4)} ${symbol} ${name}`)
  console.log(`  Illumination: ${(illuminatedFraction(phase) * 100).toFixed(1)}%`)
  console.log(`  Age:          ${moonAgeDays(jd).toFixed(2)} days`)
  console.log(`  Next new:     ${fmtJD(nextNewMoonJD(jd))}`)
  console.log(`  Next full:    ${fmtJD(nextFullMoonJD(jd))}`)
}

function cmdMask(phaseStr?: string, diameterStr?: string) {
  const phase = phaseStr !== undefined ? parseFloat(phaseStr) : 0.25
  const diameter = diameterStr !== undefined ? parseInt(diameterStr, 10) : 16
  if (isNaN(phase) || phase < 0 || phase > 1) {
    console.error(`Invalid phase: ${phaseStr}. Use a number between 0 and 1.`)
    process.exit(1)
  }

  const mask = generateMoonShape(phase, diameter)
  for (const row of renderMask(mask)) console.log(row)
  console.log(`phase ${phase} — ${(litFraction(mask) * 100).toFixed(1)}% of disc pixels lit`)
}

async function cmdWeather() {
  const config = resolveConfig(configFromEnv())
  const source = new OpenMeteoConditionSource(config.site)
  console.log(`Polling ${source.url}`)
  const condition = await source.poll()
  console.log(`Current condition: ${condition}`)
}

/** Parse 'YYYY-MM-DD' and 'HH:MM' as a local wall-clock reading, or exit. */
function parseWallClock(dateStr: string, timeStr: string, utcOffsetHours: number): CalendarTime {
  const d = /^(\d{4})-(\d{2})-(\d{2})$/.exec(dateStr)
  const t = /^(\d{1,2}):(\d{2})$/.exec(timeStr)
  if (!d || !t) {
    console.error(`Invalid date/time: ${dateStr} ${timeStr}. Use YYYY-MM-DD HH:MM format.`)
    process.exit(1)
  }
  return {
    year: Number(d[1]),
    month: Number(d[2]),
    day: Number(d[3]),
    hour: Number(t[1]),
    minute: Number(t[2]),
    second: 0,
    utcOffsetHours,
  }
}

function fmtDay(time: CalendarTime): string {
  return `${time.year}-${String(time.month).padStart(2, '0')}-${String(time.day).padStart(2, '0')}`
}

/** Format a Julian Date as a short UTC string. */
function fmtJD(jd: number): string {
  return jdToDate(jd).toISOString().slice(0, 16).replace('T', ' ') + ' UTC'
}

main().catch(err => {
  console.error(err instanceof Error ? err.message : String(err))
  process.exit(1)
})
