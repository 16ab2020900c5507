/**
 * Staleness Rule
 *
 * A device is outdated when its newest reading is more than
 * `staleAfterSeconds` older than now. Abstains when there is no reading at all.
 */

import type { RuleOutcome } from "../../domain/issue/Issue"
import type { Device, Series } from "../../domain/telemetry/Telemetry"
import { formatAlertTime } from "../../shared/time/zone"
import { lastPresent } from "../telemetry/SampleStore"
import { deviceKey, type RuleContext } from "./context"

export function evaluateStaleness(series: Series, device: Device, ctx: RuleContext): RuleOutcome[] {
  const last = lastPresent(series)
  if (!last) {
    return []
  }

  const key = deviceKey(device, "outdated")
  const ageSeconds = ctx.now.getTime() / 1000 - last.epoch
  const recoveryMessage = `${device.plant}, inverter ${device.serial} is now up-to-date.`

  if (ageSeconds <= ctx.thresholds.staleAfterSeconds) {
    return [{ key, candidate: null, recoveryMessage }]
  }

  const lastUpdate = formatAlertTime(last.epoch, ctx.timeZone)
  return [
    {
      key,
      candidate: {
        key,
        details: `last_update:${lastUpdate}`,
        message: `${device.plant}, inverter ${device.serial} outdated.\nLast update: ${lastUpdate}`,
      },
      recoveryMessage,
    },
  ]
}

export function isStale(outcomes: readonly RuleOutcome[]): boolean {
  return outcomes.some((o) => o.key.kind === "outdated" && o.candidate !== null)
}
