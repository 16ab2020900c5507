/**
 * Shared Types
 */

/**
 * Wall-clock parts of an instant in a given IANA zone
 */
export interface ZonedParts {
  year: number
  month: number
  day: number
  hour: number
  minute: number
  second: number
  /** Offset from UTC in minutes (+420 for UTC+7) */
  offsetMinutes: number
}

export interface OperatingHours {
  /** First local hour (inclusive) in which notifications are delivered */
  startHour: number
  /** Last local hour (inclusive) in which notifications are delivered */
  endHour: number
}
