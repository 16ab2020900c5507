/**
 * Monitor Configuration
 *
 * Reads deployment settings from environment variables.
 * Detection thresholds are all expressed in raw vendor watts and seconds.
 */

import { ConfigurationError } from "../errors"
import type { OperatingHours } from "../types"
import { DEFAULT_TIME_ZONE } from "../time/zone"

export interface DetectionThresholds {
  /** Max seconds between consecutive present samples before the later one is treated as a break */
  gapThresholdSeconds: number
  /** A device whose last reading is older than this is outdated */
  staleAfterSeconds: number
  /** Peer comparison only runs when the best inverter produces more than this (W) */
  peerFloorW: number
  /** Fraction of the best inverter's output under which a peer is underperforming */
  peerRatio: number
  lowPowerFloorW: number
  highPowerFloorW: number
  /** Consecutive readings under the low floor that make a sustained low-power period */
  lowPowerRun: number
  minLowPowerSamples: number
}

export interface AlertPolicy {
  suppressionWindowSeconds: number
  retentionSeconds: number
  operatingHours: OperatingHours
  timeZone: string
}

export type LedgerStoreKind = "dynamodb" | "file"

export interface MonitorConfig {
  thresholds: DetectionThresholds
  policy: AlertPolicy
  aurora: {
    baseUrl: string
    apiKey: string
    username: string
    password: string
  }
  telegram: {
    botToken: string
    chatId: string
    apiBaseUrl: string
  }
  ledger: {
    store: LedgerStoreKind
    tableName: string
    filePath: string
  }
  tokenTableName: string
  inventoryPath: string
  fetchConcurrency: number
}

export const DEFAULT_THRESHOLDS: DetectionThresholds = {
  gapThresholdSeconds: 15 * 60,
  staleAfterSeconds: 30 * 60,
  peerFloorW: 50_000,
  peerRatio: 0.25,
  lowPowerFloorW: 5_000,
  highPowerFloorW: 50_000,
  lowPowerRun: 3,
  minLowPowerSamples: 4,
}

export const DEFAULT_POLICY: AlertPolicy = {
  suppressionWindowSeconds: 15 * 60,
  retentionSeconds: 15 * 60,
  operatingHours: { startHour: 8, endHour: 16 },
  timeZone: DEFAULT_TIME_ZONE,
}

type Env = Record<string, string | undefined>

function required(env: Env, name: string): string {
  const value = env[name]?.trim()
  if (!value) {
    throw new ConfigurationError(`${name} environment variable is not set`, name)
  }
  return value
}

function numberFrom(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim()
  if (!raw) {
    return fallback
  }
  const parsed = Number(raw)
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`${name} must be a number, got "${raw}"`, name)
  }
  return parsed
}

function ledgerStoreFrom(env: Env): LedgerStoreKind {
  const raw = (env.LEDGER_STORE || "dynamodb").trim().toLowerCase()
  if (raw === "dynamodb" || raw === "file") {
    return raw
  }
  throw new ConfigurationError(`LEDGER_STORE must be "dynamodb" or "file", got "${raw}"`, "LEDGER_STORE")
}

export function loadThresholds(env: Env = process.env): DetectionThresholds {
  return {
    gapThresholdSeconds: numberFrom(env, "GAP_THRESHOLD_SECONDS", DEFAULT_THRESHOLDS.gapThresholdSeconds),
    staleAfterSeconds: numberFrom(env, "STALE_AFTER_SECONDS", DEFAULT_THRESHOLDS.staleAfterSeconds),
    peerFloorW: numberFrom(env, "PEER_FLOOR_W", DEFAULT_THRESHOLDS.peerFloorW),
    peerRatio: numberFrom(env, "PEER_RATIO", DEFAULT_THRESHOLDS.peerRatio),
    lowPowerFloorW: numberFrom(env, "LOW_POWER_FLOOR_W", DEFAULT_THRESHOLDS.lowPowerFloorW),
    highPowerFloorW: numberFrom(env, "HIGH_POWER_FLOOR_W", DEFAULT_THRESHOLDS.highPowerFloorW),
    lowPowerRun: DEFAULT_THRESHOLDS.lowPowerRun,
    minLowPowerSamples: DEFAULT_THRESHOLDS.minLowPowerSamples,
  }
}

export function loadAlertPolicy(env: Env = process.env): AlertPolicy {
  const startHour = numberFrom(env, "ALERT_START_HOUR", DEFAULT_POLICY.operatingHours.startHour)
  const endHour = numberFrom(env, "ALERT_END_HOUR", DEFAULT_POLICY.operatingHours.endHour)
  if (startHour < 0 || endHour > 23 || startHour > endHour) {
    throw new ConfigurationError(
      `Invalid alert window ${startHour}-${endHour}; hours must satisfy 0 <= start <= end <= 23`,
      "ALERT_START_HOUR"
    )
  }

  return {
    suppressionWindowSeconds: numberFrom(
      env,
      "SUPPRESSION_WINDOW_SECONDS",
      DEFAULT_POLICY.suppressionWindowSeconds
    ),
    retentionSeconds: numberFrom(env, "LEDGER_RETENTION_SECONDS", DEFAULT_POLICY.retentionSeconds),
    operatingHours: { startHour, endHour },
    timeZone: env.MONITOR_TIME_ZONE?.trim() || DEFAULT_POLICY.timeZone,
  }
}

export function loadMonitorConfig(env: Env = process.env): MonitorConfig {
  return {
    thresholds: loadThresholds(env),
    policy: loadAlertPolicy(env),
    aurora: {
      baseUrl: required(env, "AURORA_API_BASE_URL").replace(/\/+$/, ""),
      apiKey: required(env, "AURORA_API_KEY"),
      username: required(env, "AURORA_USERNAME"),
      password: required(env, "AURORA_PASSWORD"),
    },
    telegram: {
      botToken: required(env, "TELEGRAM_BOT_TOKEN"),
      chatId: required(env, "TELEGRAM_CHAT_ID"),
      apiBaseUrl: env.TELEGRAM_API_BASE_URL?.trim() || "https://api.telegram.org",
    },
    ledger: {
      store: ledgerStoreFrom(env),
      tableName: env.LEDGER_TABLE?.trim() || "alert-ledger",
      filePath: env.LEDGER_FILE?.trim() || "message_history.json",
    },
    tokenTableName: env.TOKEN_TABLE?.trim() || "config",
    inventoryPath: env.DEVICE_INVENTORY_FILE?.trim() || "config/devices.json",
    fetchConcurrency: numberFrom(env, "FETCH_CONCURRENCY", 10),
  }
}
