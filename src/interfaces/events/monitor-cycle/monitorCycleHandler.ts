/**
 * Monitor Cycle Lambda Handler
 *
 * EventBridge trigger: Runs every 10 minutes
 * Fetches today's inverter power, evaluates alert rules and sends deduplicated
 * notifications. Delivery itself is limited to the configured alert hours.
 */

import type { EventBridgeEvent } from "aws-lambda"
import { DynamoDBClient } from "@aws-sdk/client-dynamodb"
import { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb"
import { MonitorCycleService } from "../../../application/sync/MonitorCycleService"
import type { LedgerRepository } from "../../../domain/ledger/Ledger"
import { DynamoDBLedgerRepository } from "../../../infrastructure/dynamodb/repositories/LedgerRepository"
import { FileDeviceInventory } from "../../../infrastructure/inventory/FileDeviceInventory"
import { FileLedgerRepository } from "../../../infrastructure/ledger/FileLedgerRepository"
import { TelegramNotifier } from "../../../infrastructure/notifications/TelegramNotifier"
import { AuroraVisionAdapter } from "../../../infrastructure/vendors/aurora/AuroraVisionAdapter"
import { loadMonitorConfig } from "../../../shared/config"
import type { MonitorConfig } from "../../../shared/config"

export function createMonitorCycleService(
  config: MonitorConfig,
  dynamoClient: DynamoDBDocumentClient
): MonitorCycleService {
  const adapter = new AuroraVisionAdapter({
    id: "aurora-vision",
    name: "Aurora Vision",
    vendorType: "AURORA_VISION",
    apiBaseUrl: config.aurora.baseUrl,
    credentials: {
      apiKey: config.aurora.apiKey,
      username: config.aurora.username,
      password: config.aurora.password,
    },
    timeZone: config.policy.timeZone,
  })
  adapter.setTokenStorage(dynamoClient, config.tokenTableName)

  const ledgerRepository: LedgerRepository =
    config.ledger.store === "file"
      ? new FileLedgerRepository(config.ledger.filePath)
      : new DynamoDBLedgerRepository(dynamoClient, config.ledger.tableName)

  return new MonitorCycleService(
    adapter,
    new FileDeviceInventory(config.inventoryPath),
    ledgerRepository,
    new TelegramNotifier(config.telegram),
    {
      thresholds: config.thresholds,
      policy: config.policy,
      fetchConcurrency: config.fetchConcurrency,
    }
  )
}

let service: MonitorCycleService | null = null

function getService(): MonitorCycleService {
  if (!service) {
    const dynamoClient = DynamoDBDocumentClient.from(new DynamoDBClient({}))
    service = createMonitorCycleService(loadMonitorConfig(), dynamoClient)
  }
  return service
}

export async function handler(
  event: EventBridgeEvent<"Scheduled Event", unknown>
): Promise<void> {
  console.log("[MonitorCycle] Event received:", JSON.stringify(event, null, 2))

  try {
    const summary = await getService().runCycle(new Date())
    const { results, ...totals } = summary

    console.log("[MonitorCycle] Cycle completed:", JSON.stringify(totals, null, 2))

    if (summary.devices > 0 && summary.fetchFailures === summary.devices) {
      throw new Error(
        `All ${summary.devices} inverters failed to fetch. Check logs for details.`
      )
    }
  } catch (error) {
    console.error("[MonitorCycle] Error:", error)
    throw error
  }
}
