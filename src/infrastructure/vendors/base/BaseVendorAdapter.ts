/**
 * Base Vendor Adapter
 *
 * Abstract base class for monitoring-portal adapters.
 * Each vendor implementation must extend this class and implement all abstract methods.
 */

import type { Device, RawEntry, TelemetrySource } from "../../../domain/telemetry/Telemetry"
import { ConfigurationError } from "../../../shared/errors"
import type { VendorConfig } from "../types"

export abstract class BaseVendorAdapter implements TelemetrySource {
  protected config: VendorConfig

  constructor(config: VendorConfig) {
    this.config = config
  }

  /**
   * Authenticate with vendor API and return access token
   * Should implement token caching internally
   */
  abstract authenticate(): Promise<string>

  /**
   * Get generation power entries for one inverter
   * @param startDate - Local date, YYYYMMDD
   * @param endDate - Local date, YYYYMMDD
   */
  abstract fetchPowerSeries(device: Device, startDate: string, endDate: string): Promise<RawEntry[]>

  /**
   * Normalize one vendor-specific timeseries slot; null drops it
   */
  protected abstract normalizeEntry(rawData: unknown): RawEntry | null

  /**
   * Get API base URL from config or environment variables
   */
  protected getApiBaseUrl(): string {
    if (this.config.apiBaseUrl) {
      return this.config.apiBaseUrl
    }

    const envVarName = `${this.config.vendorType.toUpperCase()}_API_BASE_URL`
    const baseUrl = process.env[envVarName]

    if (!baseUrl) {
      throw new ConfigurationError(
        `API base URL not configured. Please set ${envVarName} environment variable or provide apiBaseUrl in config.`,
        envVarName
      )
    }

    return baseUrl
  }

  protected getStringCredential(name: string): string {
    const value = this.config.credentials[name]
    if (typeof value !== "string" || !value) {
      throw new ConfigurationError(`${this.config.name} credentials missing: ${name} is required`)
    }
    return value
  }
}
