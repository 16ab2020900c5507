/**
 * Plant Monitor
 *
 * Per-cycle entry points of the detection core. Runs the rules over already
 * ingested series and hands each outcome to the dispatcher.
 */

import type { RuleOutcome } from "../../domain/issue/Issue"
import type { Device, PlantSeries, Series } from "../../domain/telemetry/Telemetry"
import type { DetectionThresholds } from "../../shared/config"
import { DEFAULT_THRESHOLDS } from "../../shared/config"
import { DEFAULT_TIME_ZONE, epochSeconds } from "../../shared/time/zone"
import type { AlertDispatcher, DispatchResult } from "../alert/AlertDispatcher"
import type { DeduplicationLedger } from "../ledger/DeduplicationLedger"
import type { RuleContext } from "../detection/context"
import { evaluateDeactivation } from "../detection/deactivation"
import { evaluateLowPower } from "../detection/lowPower"
import { evaluatePeerUnderperformance } from "../detection/peerUnderperformance"
import { evaluateStaleness, isStale } from "../detection/staleness"

export class PlantMonitor {
  constructor(
    private dispatcher: AlertDispatcher,
    private ledger: DeduplicationLedger,
    private thresholds: DetectionThresholds = DEFAULT_THRESHOLDS,
    private timeZone: string = DEFAULT_TIME_ZONE
  ) {}

  /**
   * Device-scoped rules: deactivation, staleness, and low power / power drop.
   * Low power is only judged on a device that is not outdated.
   */
  evaluateDevice(series: Series, device: Device, now: Date): RuleOutcome[] {
    const ctx = this.context(now)
    const outcomes = [...evaluateDeactivation(series, device)]

    const staleness = evaluateStaleness(series, device, ctx)
    outcomes.push(...staleness)

    if (staleness.length > 0 && !isStale(staleness)) {
      outcomes.push(...evaluateLowPower(series, device, ctx))
    }
    return outcomes
  }

  async processDevice(series: Series, device: Device, now: Date): Promise<DispatchResult[]> {
    return this.dispatcher.dispatchAll(this.evaluateDevice(series, device, now), now)
  }

  async processPlant(plant: string, seriesBySerial: PlantSeries, now: Date): Promise<DispatchResult[]> {
    const outcomes = evaluatePeerUnderperformance(plant, seriesBySerial, this.context(now))
    return this.dispatcher.dispatchAll(outcomes, now)
  }

  sweep(now: Date): string[] {
    const removed = this.ledger.sweep(epochSeconds(now))
    if (removed.length > 0) {
      console.log(`[PlantMonitor] Swept ${removed.length} expired ledger entries`)
    }
    return removed
  }

  private context(now: Date): RuleContext {
    return { now, thresholds: this.thresholds, timeZone: this.timeZone }
  }
}
