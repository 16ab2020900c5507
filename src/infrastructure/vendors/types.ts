/**
 * Vendor Adapter Types
 *
 * Standardized types for monitoring-portal adapters.
 */

export interface VendorCredentials {
  [key: string]: string | number | boolean
}

export type VendorType = "AURORA_VISION"

export interface VendorConfig {
  id: string
  name: string
  vendorType: VendorType
  apiBaseUrl?: string // Optional - can be read from environment variables instead
  credentials: VendorCredentials
  /** IANA zone the vendor should bucket samples in */
  timeZone: string
  maxRetries?: number
  retryDelayMs?: number
}

export interface AuroraApiResponse {
  result?: unknown
}
