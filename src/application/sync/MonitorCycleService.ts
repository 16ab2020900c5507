/**
 * Monitor Cycle Service
 *
 * Runs one poll cycle across every plant in the device inventory.
 *
 * Key Features:
 * - Bounded-concurrency fetch of today's power series (10 at a time)
 * - Ledger loaded at cycle start, swept and saved at cycle end
 * - Failures isolated per device and per plant
 * - Plants with no data at all (night, plant-wide outage) are skipped
 */

import type { LedgerEntries, LedgerRepository } from "../../domain/ledger/Ledger"
import type { NotificationSink } from "../../domain/notification/Notification"
import type { Device, DeviceInventory, Series, TelemetrySource } from "../../domain/telemetry/Telemetry"
import type { AlertPolicy, DetectionThresholds } from "../../shared/config"
import { DEFAULT_POLICY, DEFAULT_THRESHOLDS } from "../../shared/config"
import { errorMessage } from "../../shared/errors"
import { formatVendorDate } from "../../shared/time/zone"
import { AlertDispatcher } from "../alert/AlertDispatcher"
import type { DispatchAction, DispatchResult } from "../alert/AlertDispatcher"
import { DeduplicationLedger } from "../ledger/DeduplicationLedger"
import { PlantMonitor } from "../monitor/PlantMonitor"
import { hasData, ingest } from "../telemetry/SampleStore"

export interface MonitorCycleOptions {
  thresholds: DetectionThresholds
  policy: AlertPolicy
  fetchConcurrency: number
}

export interface DeviceFetchResult {
  device: Device
  success: boolean
  series: Series
  error?: string
}

export interface MonitorCycleSummary {
  plants: number
  plantsSkipped: number
  devices: number
  fetchFailures: number
  evaluationErrors: number
  actions: Record<DispatchAction, number>
  delivered: number
  ledgerEntries: number
  ledgerSaved: boolean
  results: DispatchResult[]
  duration: number
}

const DEFAULT_OPTIONS: MonitorCycleOptions = {
  thresholds: DEFAULT_THRESHOLDS,
  policy: DEFAULT_POLICY,
  fetchConcurrency: 10,
}

export class MonitorCycleService {
  private options: MonitorCycleOptions

  constructor(
    private source: TelemetrySource,
    private inventory: DeviceInventory,
    private ledgerRepository: LedgerRepository,
    private sink: NotificationSink,
    options: Partial<MonitorCycleOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options }
  }

  async runCycle(now: Date = new Date()): Promise<MonitorCycleSummary> {
    const startTime = Date.now()
    const { thresholds, policy } = this.options

    const plants = await this.inventory.load()
    const devices = [...plants.values()].flat()

    console.log(`[MonitorCycle] Starting cycle for ${plants.size} plants, ${devices.length} inverters`)

    const fetched = await this.fetchAll(devices, now)
    const bySerial = new Map<string, DeviceFetchResult>()
    for (const result of fetched) {
      bySerial.set(`${result.device.plant}\u0000${result.device.serial}`, result)
    }

    const ledger = new DeduplicationLedger(await this.loadLedger(), policy)
    const dispatcher = new AlertDispatcher(ledger, this.sink, policy)
    const monitor = new PlantMonitor(dispatcher, ledger, thresholds, policy.timeZone)

    const results: DispatchResult[] = []
    let plantsSkipped = 0
    let evaluationErrors = 0

    for (const [plant, plantDevices] of plants) {
      const available = plantDevices
        .map((device) => bySerial.get(`${plant}\u0000${device.serial}`))
        .filter((r): r is DeviceFetchResult => r !== undefined && r.success)

      if (!available.some((r) => hasData(r.series))) {
        plantsSkipped++
        console.log(`[MonitorCycle] Plant ${plant}: no readings in window, skipping`)
        continue
      }

      for (const { device, series } of available) {
        try {
          results.push(...(await monitor.processDevice(series, device, now)))
        } catch (error) {
          evaluationErrors++
          console.error(`[MonitorCycle] Error evaluating inverter ${device.serial} (${plant}):`, error)
        }
      }

      try {
        const seriesBySerial = new Map(available.map((r) => [r.device.serial, r.series] as const))
        results.push(...(await monitor.processPlant(plant, seriesBySerial, now)))
      } catch (error) {
        evaluationErrors++
        console.error(`[MonitorCycle] Error comparing inverters of plant ${plant}:`, error)
      }
    }

    monitor.sweep(now)
    const ledgerSaved = await this.saveLedger(ledger.snapshot())

    const actions: Record<DispatchAction, number> = { Sent: 0, Suppressed: 0, Resolved: 0, NoOp: 0 }
    for (const result of results) {
      actions[result.action]++
    }
    const delivered = results.filter((r) => r.delivered).length
    const fetchFailures = fetched.filter((r) => !r.success).length
    const duration = Date.now() - startTime

    console.log(
      `[MonitorCycle] Completed: ${devices.length - fetchFailures}/${devices.length} inverters fetched, ` +
      `${actions.Sent} sent, ${actions.Resolved} resolved, ${actions.Suppressed} suppressed ` +
      `(${delivered} delivered) in ${duration}ms`
    )

    return {
      plants: plants.size,
      plantsSkipped,
      devices: devices.length,
      fetchFailures,
      evaluationErrors,
      actions,
      delivered,
      ledgerEntries: ledger.size,
      ledgerSaved,
      results,
      duration,
    }
  }

  /**
   * Fetch and ingest today's series for every device
   */
  async fetchAll(devices: readonly Device[], now: Date): Promise<DeviceFetchResult[]> {
    const { policy, thresholds, fetchConcurrency } = this.options
    const startDate = formatVendorDate(now, policy.timeZone)
    const endDate = formatVendorDate(now, policy.timeZone, 1)

    try {
      await this.source.authenticate()
    } catch (error) {
      console.error(`[MonitorCycle] Vendor authentication failed: ${errorMessage(error)}`)
    }

    const CONCURRENT_LIMIT = Math.max(1, fetchConcurrency)
    const results: DeviceFetchResult[] = []

    for (let i = 0; i < devices.length; i += CONCURRENT_LIMIT) {
      const batch = devices.slice(i, i + CONCURRENT_LIMIT)
      const batchResults = await Promise.allSettled(
        batch.map((device) => this.source.fetchPowerSeries(device, startDate, endDate))
      )

      batchResults.forEach((batchResult, index) => {
        const device = batch[index]
        if (batchResult.status === "fulfilled") {
          const series = ingest(batchResult.value, {
            gapThresholdSeconds: thresholds.gapThresholdSeconds,
            timeZone: policy.timeZone,
          })
          results.push({ device, success: true, series })
        } else {
          const error = errorMessage(batchResult.reason)
          console.error(`[MonitorCycle] Error fetching inverter ${device.serial} (${device.plant}): ${error}`)
          results.push({ device, success: false, series: [], error })
        }
      })
    }

    return results
  }

  private async loadLedger(): Promise<LedgerEntries> {
    try {
      return await this.ledgerRepository.load()
    } catch (error) {
      console.error(`[MonitorCycle] Could not load ledger, starting empty: ${errorMessage(error)}`)
      return new Map()
    }
  }

  private async saveLedger(entries: LedgerEntries): Promise<boolean> {
    try {
      await this.ledgerRepository.save(entries)
      return true
    } catch (error) {
      console.error(`[MonitorCycle] Could not save ledger: ${errorMessage(error)}`)
      return false
    }
  }
}
