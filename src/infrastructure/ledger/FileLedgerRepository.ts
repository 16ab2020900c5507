/**
 * File Ledger Repository
 *
 * Keeps the ledger in a JSON document keyed by issue key:
 * { "<issue key>": { "timestamp": 1714441200.5, "details": "...", "message": "..." } }
 * Used for local runs; a missing file is an empty ledger.
 */

import { promises as fs } from "fs"
import path from "path"
import type { LedgerEntries, LedgerEntry, LedgerRepository } from "../../domain/ledger/Ledger"
import { PersistenceError, errorMessage } from "../../shared/errors"

interface StoredEntry {
  timestamp: number
  details: string | null
  message: string
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

export class FileLedgerRepository implements LedgerRepository {
  constructor(private filePath: string) {}

  async load(): Promise<LedgerEntries> {
    let raw: string
    try {
      raw = await fs.readFile(this.filePath, "utf8")
    } catch (error) {
      if (isRecord(error) && error.code === "ENOENT") {
        return new Map()
      }
      throw new PersistenceError(`Failed to read ledger file ${this.filePath}: ${errorMessage(error)}`, error)
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    } catch (error) {
      throw new PersistenceError(`Ledger file ${this.filePath} is not valid JSON: ${errorMessage(error)}`, error)
    }
    if (!isRecord(parsed)) {
      throw new PersistenceError(`Ledger file ${this.filePath} must contain a JSON object`)
    }

    const entries: LedgerEntries = new Map()
    for (const [issueKey, value] of Object.entries(parsed)) {
      if (!isRecord(value) || typeof value.timestamp !== "number") {
        console.warn(`[FileLedger] Skipping malformed entry ${issueKey}`)
        continue
      }
      entries.set(issueKey, {
        issueKey,
        timestamp: value.timestamp,
        details: typeof value.details === "string" ? value.details : null,
        message: typeof value.message === "string" ? value.message : "",
      })
    }
    return entries
  }

  async save(entries: ReadonlyMap<string, LedgerEntry>): Promise<void> {
    const document: Record<string, StoredEntry> = {}
    for (const entry of entries.values()) {
      document[entry.issueKey] = {
        timestamp: entry.timestamp,
        details: entry.details,
        message: entry.message,
      }
    }

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true })
      const tempPath = `${this.filePath}.tmp`
      await fs.writeFile(tempPath, JSON.stringify(document, null, 2), "utf8")
      await fs.rename(tempPath, this.filePath)
    } catch (error) {
      throw new PersistenceError(`Failed to write ledger file ${this.filePath}: ${errorMessage(error)}`, error)
    }
  }
}
