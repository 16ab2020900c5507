/**
 * Shared inputs and formatting for the detection rules
 */

import type { DetectionThresholds } from "../../shared/config"
import type { IssueKey, IssueKind } from "../../domain/issue/Issue"
import type { Device } from "../../domain/telemetry/Telemetry"

export interface RuleContext {
  now: Date
  thresholds: DetectionThresholds
  timeZone: string
}

export function deviceKey(device: Device, kind: IssueKind): IssueKey {
  return { plant: device.plant, scope: device.serial, kind }
}

/**
 * Watts to kilowatts, rounded to two decimals for display
 */
export function toKw(watts: number): number {
  return Math.round((watts / 1000) * 100) / 100
}
