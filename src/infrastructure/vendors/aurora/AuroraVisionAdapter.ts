/**
 * Aurora Vision Vendor Adapter
 *
 * Implements the Aurora Vision (FIMER) monitoring API integration.
 *
 * Key Features:
 * - API key + basic auth login, token reused across requests
 * - Optional token caching in DynamoDB (config table)
 * - 15-minute GenerationPower averages per inverter
 * - Retries with linear back-off; a 401 drops the cached token
 */

import { GetCommand, UpdateCommand } from "@aws-sdk/lib-dynamodb"
import type { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb"
import type { Device, RawEntry } from "../../../domain/telemetry/Telemetry"
import { VendorApiError, errorMessage } from "../../../shared/errors"
import { BaseVendorAdapter } from "../base/BaseVendorAdapter"
import { basicAuthHeader, pooledFetch, sleep } from "../httpClient"
import type { AuroraApiResponse } from "../types"

const TOKEN_LIFETIME_SECONDS = 60 * 60

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

export class AuroraVisionAdapter extends BaseVendorAdapter {
  private token: string | null = null
  private tokenRejected = false
  private dynamoClient?: DynamoDBDocumentClient
  private tokenTableName: string = "config"

  /**
   * Set DynamoDB client for token storage
   */
  setTokenStorage(dynamoClient: DynamoDBDocumentClient, tableName: string = "config") {
    this.dynamoClient = dynamoClient
    this.tokenTableName = tableName
  }

  private get maxRetries(): number {
    return this.config.maxRetries ?? 3
  }

  private get retryDelayMs(): number {
    return this.config.retryDelayMs ?? 1000
  }

  private async getTokenFromDB(): Promise<string | null> {
    if (!this.dynamoClient) {
      return null
    }

    try {
      const response = await this.dynamoClient.send(
        new GetCommand({
          TableName: this.tokenTableName,
          Key: {
            PK: "VENDOR",
            SK: this.config.id,
          },
        })
      )

      const item = response.Item
      if (!item || typeof item.access_token !== "string") {
        return null
      }

      if (typeof item.token_expires_at === "string") {
        const expiresAt = new Date(item.token_expires_at)
        if (expiresAt <= new Date()) {
          return null
        }
      }

      return item.access_token
    } catch (error) {
      console.error("[AuroraVision] Error getting token from DB:", error)
      return null
    }
  }

  private async storeTokenInDB(token: string): Promise<void> {
    if (!this.dynamoClient) {
      return
    }

    try {
      const expiresAt = new Date(Date.now() + TOKEN_LIFETIME_SECONDS * 1000)
      await this.dynamoClient.send(
        new UpdateCommand({
          TableName: this.tokenTableName,
          Key: {
            PK: "VENDOR",
            SK: this.config.id,
          },
          UpdateExpression: "SET access_token = :token, token_expires_at = :expires",
          ExpressionAttributeValues: {
            ":token": token,
            ":expires": expiresAt.toISOString(),
          },
        })
      )
    } catch (error) {
      console.error("[AuroraVision] Error storing token:", error)
    }
  }

  async authenticate(): Promise<string> {
    if (this.token) {
      return this.token
    }

    const cachedToken = this.tokenRejected ? null : await this.getTokenFromDB()
    if (cachedToken) {
      this.token = cachedToken
      return cachedToken
    }

    const token = await this.withRetry("authenticate", () => this.login())
    this.token = token
    await this.storeTokenInDB(token)
    return token
  }

  private async login(): Promise<string> {
    const apiKey = this.getStringCredential("apiKey")
    const username = this.getStringCredential("username")
    const password = this.getStringCredential("password")

    const response = await pooledFetch(`${this.getApiBaseUrl()}/authenticate`, {
      method: "GET",
      headers: {
        "X-AuroraVision-ApiKey": apiKey,
        "Content-Type": "application/json",
        Authorization: basicAuthHeader(username, password),
      },
    })

    if (!response.ok) {
      const errorText = await response.text()
      throw new VendorApiError(
        `Aurora Vision authentication failed: ${response.status} - ${errorText}`,
        response.status
      )
    }

    const data: unknown = await response.json()
    const token = isRecord(data) ? data.result : undefined
    if (typeof token !== "string" || !token) {
      throw new VendorApiError("Aurora Vision authentication failed: token not found in the response")
    }

    return token
  }

  async fetchPowerSeries(device: Device, startDate: string, endDate: string): Promise<RawEntry[]> {
    const params = new URLSearchParams({
      sampleSize: "Min15",
      startDate,
      endDate,
      timeZone: this.config.timeZone,
    })
    const endpoint =
      `/v1/stats/power/timeseries/${encodeURIComponent(device.entityId)}` +
      `/GenerationPower/average?${params.toString()}`

    const data = await this.withRetry(`fetch ${device.serial}`, () => this.getWithToken(endpoint))
    if (!Array.isArray(data.result)) {
      return []
    }

    const entries: RawEntry[] = []
    for (const raw of data.result) {
      const entry = this.normalizeEntry(raw)
      if (entry) {
        entries.push(entry)
      }
    }
    return entries
  }

  protected normalizeEntry(rawData: unknown): RawEntry | null {
    if (!isRecord(rawData)) {
      return null
    }
    const { start, value, units } = rawData
    return {
      start: typeof start === "number" || typeof start === "string" ? start : null,
      value,
      units: typeof units === "string" ? units : "",
    }
  }

  private async getWithToken(endpoint: string): Promise<AuroraApiResponse> {
    const token = await this.authenticate()
    const username = this.getStringCredential("username")
    const password = this.getStringCredential("password")

    const response = await pooledFetch(`${this.getApiBaseUrl()}${endpoint}`, {
      method: "GET",
      headers: {
        "X-AuroraVision-Token": token,
        "Content-Type": "application/json",
        Authorization: basicAuthHeader(username, password),
      },
    })

    if (response.status === 401) {
      this.token = null
      this.tokenRejected = true
    }

    if (!response.ok) {
      throw new VendorApiError(`Aurora Vision request failed: ${response.status} ${response.statusText}`, response.status)
    }

    const data: unknown = await response.json()
    return isRecord(data) ? data : {}
  }

  private async withRetry<T>(label: string, operation: () => Promise<T>): Promise<T> {
    let attempt = 0
    for (;;) {
      attempt++
      try {
        return await operation()
      } catch (error) {
        if (attempt >= this.maxRetries) {
          if (error instanceof VendorApiError) {
            throw error
          }
          throw new VendorApiError(`Aurora Vision ${label} failed after ${attempt} attempts: ${errorMessage(error)}`)
        }
        console.warn(`[AuroraVision] ${label} attempt ${attempt} failed: ${errorMessage(error)}`)
        await sleep(this.retryDelayMs * attempt)
      }
    }
  }
}
