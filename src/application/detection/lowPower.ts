/**
 * Low Power / Power Drop Rule
 *
 * Looks at the trailing readings of one device:
 * - low_power: the last `lowPowerRun` readings are all under the low floor
 * - power_drop: the last reading is under the low floor and the one before it
 *   was above the high floor
 * While the last reading is under the low floor without matching either
 * pattern, the rule abstains. A last reading at or above the floor clears both.
 */

import type { RuleOutcome } from "../../domain/issue/Issue"
import type { Device, Series } from "../../domain/telemetry/Telemetry"
import { formatAlertTime } from "../../shared/time/zone"
import { presentSamples } from "../telemetry/SampleStore"
import { deviceKey, toKw, type RuleContext } from "./context"

export function evaluateLowPower(series: Series, device: Device, ctx: RuleContext): RuleOutcome[] {
  const { lowPowerFloorW, highPowerFloorW, lowPowerRun, minLowPowerSamples } = ctx.thresholds
  const samples = presentSamples(series)
  if (samples.length < Math.max(minLowPowerSamples, lowPowerRun, 2)) {
    return []
  }

  const lowKey = deviceKey(device, "low_power")
  const dropKey = deviceKey(device, "power_drop")
  const last = samples[samples.length - 1]
  const previous = samples[samples.length - 2]
  const label = `${device.plant}, inverter ${device.serial}`

  if (last.value >= lowPowerFloorW) {
    const currentKw = toKw(last.value)
    return [
      {
        key: lowKey,
        candidate: null,
        recoveryMessage: `${label} has recovered from low power. Current value: ${currentKw} kW`,
      },
      {
        key: dropKey,
        candidate: null,
        recoveryMessage: `${label} has recovered from power drop. Current value: ${currentKw} kW`,
      },
    ]
  }

  const run = samples.slice(-lowPowerRun)
  if (run.every((s) => s.value < lowPowerFloorW)) {
    const start = formatAlertTime(run[0].epoch, ctx.timeZone)
    const end = formatAlertTime(last.epoch, ctx.timeZone)
    return [
      {
        key: lowKey,
        candidate: {
          key: lowKey,
          details: `start:${start},end:${end},value:${last.value}`,
          message: `${label} detects low power.\nFrom ${start} to ${end}`,
        },
        recoveryMessage: `${label} has recovered from low power.`,
      },
    ]
  }

  if (previous.value > highPowerFloorW) {
    const start = formatAlertTime(previous.epoch, ctx.timeZone)
    const end = formatAlertTime(last.epoch, ctx.timeZone)
    return [
      {
        key: dropKey,
        candidate: {
          key: dropKey,
          details: `start:${start},end:${end},from:${previous.value},to:${last.value}`,
          message: `${label} detects high power drop.\nFrom ${start} to ${end}`,
        },
        recoveryMessage: `${label} has recovered from power drop.`,
      },
    ]
  }

  return []
}
