/**
 * Deactivation Rule
 *
 * A device that returned rows for the polling window but no reading in any of
 * them is deactivated. Unlike staleness this needs no historical value.
 * An empty series is no data: the rule abstains.
 */

import type { RuleOutcome } from "../../domain/issue/Issue"
import type { Device, Series } from "../../domain/telemetry/Telemetry"
import { hasData } from "../telemetry/SampleStore"
import { deviceKey } from "./context"

export function evaluateDeactivation(series: Series, device: Device): RuleOutcome[] {
  const key = deviceKey(device, "deactivated")
  const recoveryMessage = `${device.plant}, inverter ${device.serial} is reporting again.`

  if (series.length === 0) {
    return []
  }

  if (hasData(series)) {
    return [{ key, candidate: null, recoveryMessage }]
  }

  return [
    {
      key,
      candidate: {
        key,
        details: "deactivated",
        message: `${device.plant}, inverter ${device.serial} is deactivated.`,
      },
      recoveryMessage,
    },
  ]
}
