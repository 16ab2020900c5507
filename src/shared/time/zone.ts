/**
 * Time Zone Helpers
 *
 * Plant-local wall-clock conversions built on Intl.DateTimeFormat.
 * All plants monitored by one deployment share a single zone (Asia/Bangkok by default).
 */

import type { OperatingHours, ZonedParts } from "../types"

export const DEFAULT_TIME_ZONE = "Asia/Bangkok"

const formatterCache = new Map<string, Intl.DateTimeFormat>()

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timeZone)
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      hourCycle: "h23",
    })
    formatterCache.set(timeZone, formatter)
  }
  return formatter
}

/**
 * Split an instant into its wall-clock parts in `timeZone`
 */
export function zonedParts(date: Date, timeZone: string = DEFAULT_TIME_ZONE): ZonedParts {
  const values: Record<string, number> = {}
  for (const part of getFormatter(timeZone).formatToParts(date)) {
    if (part.type !== "literal") {
      values[part.type] = parseInt(part.value, 10)
    }
  }

  const wallClockMs = Date.UTC(
    values.year,
    values.month - 1,
    values.day,
    values.hour,
    values.minute,
    values.second
  )
  const instantMs = Math.floor(date.getTime() / 1000) * 1000

  return {
    year: values.year,
    month: values.month,
    day: values.day,
    hour: values.hour,
    minute: values.minute,
    second: values.second,
    offsetMinutes: Math.round((wallClockMs - instantMs) / 60000),
  }
}

function pad(value: number, width: number = 2): string {
  return String(Math.abs(value)).padStart(width, "0")
}

function formatOffset(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? "-" : "+"
  const hours = Math.floor(Math.abs(offsetMinutes) / 60)
  const minutes = Math.abs(offsetMinutes) % 60
  return `${sign}${pad(hours)}:${pad(minutes)}`
}

/**
 * ISO-8601 civil time with explicit offset, e.g. 2025-04-30T08:15:00+07:00
 */
export function toZonedIso(epochSeconds: number, timeZone: string = DEFAULT_TIME_ZONE): string {
  const p = zonedParts(new Date(epochSeconds * 1000), timeZone)
  return (
    `${pad(p.year, 4)}-${pad(p.month)}-${pad(p.day)}` +
    `T${pad(p.hour)}:${pad(p.minute)}:${pad(p.second)}${formatOffset(p.offsetMinutes)}`
  )
}

/**
 * Short stamp used in alert texts and fingerprints: YYYY-MM-DD HH:mm
 */
export function formatAlertTime(epochSeconds: number, timeZone: string = DEFAULT_TIME_ZONE): string {
  const p = zonedParts(new Date(epochSeconds * 1000), timeZone)
  return `${pad(p.year, 4)}-${pad(p.month)}-${pad(p.day)} ${pad(p.hour)}:${pad(p.minute)}`
}

/**
 * Vendor date parameter (YYYYMMDD) for the local day containing `date`, shifted by `dayOffset` days
 */
export function formatVendorDate(
  date: Date,
  timeZone: string = DEFAULT_TIME_ZONE,
  dayOffset: number = 0
): string {
  const p = zonedParts(date, timeZone)
  const shifted = new Date(Date.UTC(p.year, p.month - 1, p.day + dayOffset))
  return (
    `${pad(shifted.getUTCFullYear(), 4)}` +
    `${pad(shifted.getUTCMonth() + 1)}` +
    `${pad(shifted.getUTCDate())}`
  )
}

export function isWithinOperatingHours(
  date: Date,
  hours: OperatingHours,
  timeZone: string = DEFAULT_TIME_ZONE
): boolean {
  const { hour } = zonedParts(date, timeZone)
  return hour >= hours.startHour && hour <= hours.endHour
}

export function epochSeconds(date: Date): number {
  return date.getTime() / 1000
}
