/**
 * DynamoDB Ledger Repository Implementation
 *
 * Implements LedgerRepository using a single DynamoDB table.
 * One item per active issue: PK = ISSUE#<issue key>.
 *
 * The table is small (one item per open issue), so load is a full scan and
 * save rewrites the table: puts for current entries, deletes for keys that
 * are no longer present.
 * TTL: one day after the last notification, as a backstop for abandoned items.
 */

import {
  BatchWriteCommand,
  DynamoDBDocumentClient,
  ScanCommand,
} from "@aws-sdk/lib-dynamodb"
import type { BatchWriteCommandInput } from "@aws-sdk/lib-dynamodb"
import type { LedgerEntries, LedgerEntry, LedgerRepository } from "../../../domain/ledger/Ledger"
import { PersistenceError, errorMessage } from "../../../shared/errors"
import { sleep } from "../../vendors/httpClient"

const KEY_PREFIX = "ISSUE#"
const BATCH_SIZE = 25
const TTL_SECONDS = 24 * 60 * 60
const MAX_WRITE_ATTEMPTS = 4

type WriteRequest =
  | { PutRequest: { Item: Record<string, unknown> } }
  | { DeleteRequest: { Key: Record<string, unknown> } }

type TableWriteRequests = NonNullable<BatchWriteCommandInput["RequestItems"]>[string]

export function mapEntryToItem(entry: LedgerEntry): Record<string, unknown> {
  return {
    PK: `${KEY_PREFIX}${entry.issueKey}`,
    issue_key: entry.issueKey,
    timestamp: entry.timestamp,
    details: entry.details,
    message: entry.message,
    ttl: Math.floor(entry.timestamp) + TTL_SECONDS,
  }
}

export function mapItemToEntry(item: Record<string, unknown>): LedgerEntry | null {
  const { issue_key: issueKey, timestamp, details, message } = item
  if (typeof issueKey !== "string" || typeof timestamp !== "number") {
    return null
  }
  return {
    issueKey,
    timestamp,
    details: typeof details === "string" ? details : null,
    message: typeof message === "string" ? message : "",
  }
}

export class DynamoDBLedgerRepository implements LedgerRepository {
  private client: DynamoDBDocumentClient
  private tableName: string
  private retryDelayMs: number

  constructor(client: DynamoDBDocumentClient, tableName: string = "alert-ledger", retryDelayMs: number = 100) {
    this.client = client
    this.tableName = tableName
    this.retryDelayMs = retryDelayMs
  }

  async load(): Promise<LedgerEntries> {
    const entries: LedgerEntries = new Map()
    try {
      for (const item of await this.scanAll()) {
        const entry = mapItemToEntry(item)
        if (entry) {
          entries.set(entry.issueKey, entry)
        } else {
          console.warn(`[LedgerRepository] Skipping malformed ledger item ${String(item.PK)}`)
        }
      }
    } catch (error) {
      throw new PersistenceError(`Failed to load ledger from ${this.tableName}: ${errorMessage(error)}`, error)
    }
    return entries
  }

  async save(entries: ReadonlyMap<string, LedgerEntry>): Promise<void> {
    try {
      const existing = await this.scanAll("PK")
      const keep = new Set([...entries.keys()].map((key) => `${KEY_PREFIX}${key}`))

      const requests: WriteRequest[] = []
      for (const entry of entries.values()) {
        requests.push({ PutRequest: { Item: mapEntryToItem(entry) } })
      }
      for (const item of existing) {
        if (typeof item.PK === "string" && !keep.has(item.PK)) {
          requests.push({ DeleteRequest: { Key: { PK: item.PK } } })
        }
      }

      // BatchWriteItem supports up to 25 items per batch
      for (let i = 0; i < requests.length; i += BATCH_SIZE) {
        await this.writeBatch(requests.slice(i, i + BATCH_SIZE))
      }
    } catch (error) {
      throw new PersistenceError(`Failed to save ledger to ${this.tableName}: ${errorMessage(error)}`, error)
    }
  }

  /**
   * Writes one batch, resending throttled requests (UnprocessedItems) with linear back-off
   */
  private async writeBatch(batch: TableWriteRequests): Promise<void> {
    let pending = batch
    for (let attempt = 1; ; attempt++) {
      const response = await this.client.send(
        new BatchWriteCommand({
          RequestItems: {
            [this.tableName]: pending,
          },
        })
      )

      const unprocessed = response.UnprocessedItems?.[this.tableName] ?? []
      if (unprocessed.length === 0) {
        return
      }
      if (attempt >= MAX_WRITE_ATTEMPTS) {
        throw new PersistenceError(
          `${unprocessed.length} ledger writes still unprocessed after ${attempt} attempts`
        )
      }

      console.warn(`[LedgerRepository] ${unprocessed.length} writes unprocessed, retrying`)
      await sleep(this.retryDelayMs * attempt)
      pending = unprocessed
    }
  }

  private async scanAll(projection?: string): Promise<Record<string, unknown>[]> {
    const items: Record<string, unknown>[] = []
    let startKey: Record<string, unknown> | undefined

    do {
      const response = await this.client.send(
        new ScanCommand({
          TableName: this.tableName,
          ...(projection ? { ProjectionExpression: projection } : {}),
          ...(startKey ? { ExclusiveStartKey: startKey } : {}),
        })
      )
      items.push(...(response.Items ?? []))
      startKey = response.LastEvaluatedKey
    } while (startKey)

    return items
  }
}
