/**
 * Telemetry Domain Types
 *
 * Inverter power readings as the monitor sees them.
 * Values are raw vendor watts; a missing reading is `null`, never zero.
 */

/**
 * One slot of the vendor's timeseries response, as decoded from JSON
 */
export interface RawEntry {
  start?: number | string | null
  value?: unknown
  units?: string | null
}

export interface Sample {
  /** Integer seconds since the Unix epoch (UTC) */
  epoch: number
  /** Civil time in the plant zone with explicit offset, e.g. 2025-04-30T08:15:00+07:00 */
  timestamp: string
  value: number | null
  units: string
}

/**
 * Samples of one device, ascending by epoch, one sample per epoch
 */
export type Series = readonly Sample[]

/**
 * A sample known to carry a reading
 */
export type PresentSample = Sample & { value: number }

export interface Device {
  serial: string
  plant: string
  /** Vendor entity identifier used in API paths */
  entityId: string
}

/**
 * Devices grouped by plant name, in inventory order
 */
export type PlantInventory = ReadonlyMap<string, readonly Device[]>

/**
 * Series of every device in one plant, keyed by serial
 */
export type PlantSeries = ReadonlyMap<string, Series>

export interface TelemetrySource {
  authenticate(): Promise<string>
  /**
   * Fetch raw power entries for one device.
   * @param startDate - Local date, YYYYMMDD
   * @param endDate - Local date, YYYYMMDD (exclusive)
   */
  fetchPowerSeries(device: Device, startDate: string, endDate: string): Promise<RawEntry[]>
}

export interface DeviceInventory {
  load(): Promise<PlantInventory>
}
