/**
 * Peer Underperformance Rule
 *
 * Compares the inverters of one plant at the latest timestamp any of them
 * reported. The best inverter is the reference; every other inverter with a
 * reading at that timestamp is underperforming when it produces less than
 * `peerRatio` of the reference. Skipped entirely while the reference is at or
 * under `peerFloorW`, where the spread is mostly noise.
 */

import type { RuleOutcome } from "../../domain/issue/Issue"
import type { PlantSeries } from "../../domain/telemetry/Telemetry"
import { formatAlertTime } from "../../shared/time/zone"
import { lastPresent } from "../telemetry/SampleStore"
import { toKw, type RuleContext } from "./context"

interface PeerReading {
  serial: string
  value: number
}

export function latestReadings(seriesBySerial: PlantSeries): { epoch: number; readings: PeerReading[] } | null {
  let latestEpoch: number | null = null
  for (const series of seriesBySerial.values()) {
    const last = lastPresent(series)
    if (last && (latestEpoch === null || last.epoch > latestEpoch)) {
      latestEpoch = last.epoch
    }
  }
  if (latestEpoch === null) {
    return null
  }

  const readings: PeerReading[] = []
  for (const [serial, series] of seriesBySerial) {
    const sample = series.find((s) => s.epoch === latestEpoch)
    if (sample && sample.value !== null) {
      readings.push({ serial, value: sample.value })
    }
  }

  readings.sort((a, b) => b.value - a.value || a.serial.localeCompare(b.serial))
  return { epoch: latestEpoch, readings }
}

export function evaluatePeerUnderperformance(
  plant: string,
  seriesBySerial: PlantSeries,
  ctx: RuleContext
): RuleOutcome[] {
  const latest = latestReadings(seriesBySerial)
  if (!latest || latest.readings.length === 0) {
    return []
  }

  const [reference] = latest.readings
  if (!(reference.value > ctx.thresholds.peerFloorW)) {
    return []
  }

  const limit = reference.value * ctx.thresholds.peerRatio
  const time = formatAlertTime(latest.epoch, ctx.timeZone)

  return latest.readings.map((reading, rank) => {
    const key = { plant, scope: reading.serial, kind: "underperforming" as const }
    const kw = toKw(reading.value)
    const recoveryMessage = `${plant}, inverter ${reading.serial} is now performing normally at ${kw} kW.`

    if (rank === 0 || reading.value >= limit) {
      return { key, candidate: null, recoveryMessage }
    }

    return {
      key,
      candidate: {
        key,
        details: `value:${kw},time:${time}`,
        message: `${plant}, inverter ${reading.serial} is underperforming with ${kw} kW.\nTime: ${time}`,
      },
      recoveryMessage,
    }
  })
}
