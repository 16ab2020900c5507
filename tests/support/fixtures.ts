/**
 * Test fixtures: times are on 2025-04-30 in Asia/Bangkok (UTC+7)
 */

import { ingest } from "../../src/application/telemetry/SampleStore"
import type { Device, RawEntry, Series } from "../../src/domain/telemetry/Telemetry"

export const PLANT = "Riverside"

/**
 * Epoch seconds of HH:mm local time
 */
export function bkk(hour: number, minute: number = 0): number {
  return Date.UTC(2025, 3, 30, hour - 7, minute) / 1000
}

export function at(hour: number, minute: number = 0): Date {
  return new Date(bkk(hour, minute) * 1000)
}

export function device(serial: string, plant: string = PLANT): Device {
  return { serial, plant, entityId: `entity-${serial}` }
}

/**
 * Raw entries every 15 minutes starting at HH:mm
 */
export function rawReadings(
  hour: number,
  minute: number,
  values: Array<number | null>
): RawEntry[] {
  return values.map((value, i) => ({
    start: bkk(hour, minute + i * 15),
    value,
    units: "W",
  }))
}

export function readings(hour: number, minute: number, values: Array<number | null>): Series {
  return ingest(rawReadings(hour, minute, values))
}
