/**
 * Deduplication Ledger
 *
 * In-memory store of active issues for one poll cycle. Loaded from a
 * LedgerRepository at cycle start, mutated by the dispatcher, swept and
 * saved at cycle end.
 *
 * - shouldNotify: suppress only an identical fingerprint inside the window
 * - resolve: remove and return, so a recovery is announced at most once
 * - sweep: drop entries past retention, whether or not they resolved
 */

import type { LedgerEntries, LedgerEntry } from "../../domain/ledger/Ledger"
import { DEFAULT_POLICY } from "../../shared/config"

export interface LedgerWindows {
  suppressionWindowSeconds: number
  retentionSeconds: number
}

export class DeduplicationLedger {
  private entries: LedgerEntries
  private windows: LedgerWindows

  constructor(
    initial: Iterable<[string, LedgerEntry]> = [],
    windows: LedgerWindows = DEFAULT_POLICY
  ) {
    this.entries = new Map(initial)
    this.windows = windows
  }

  /**
   * @param now - Epoch seconds
   */
  shouldNotify(issueKey: string, details: string | null, now: number): boolean {
    const existing = this.entries.get(issueKey)
    if (!existing) {
      return true
    }

    const withinWindow = now - existing.timestamp < this.windows.suppressionWindowSeconds
    return !(withinWindow && existing.details === details)
  }

  record(issueKey: string, details: string | null, message: string, now: number): LedgerEntry {
    const entry: LedgerEntry = { issueKey, timestamp: now, details, message }
    this.entries.set(issueKey, entry)
    return entry
  }

  resolve(issueKey: string): LedgerEntry | null {
    const existing = this.entries.get(issueKey)
    if (!existing) {
      return null
    }
    this.entries.delete(issueKey)
    return existing
  }

  /**
   * Remove every entry whose last notification is at least the retention
   * window old. Returns the removed keys.
   */
  sweep(now: number): string[] {
    const cutoff = now - this.windows.retentionSeconds
    const removed: string[] = []
    for (const [key, entry] of this.entries) {
      if (entry.timestamp <= cutoff) {
        this.entries.delete(key)
        removed.push(key)
      }
    }
    return removed
  }

  get(issueKey: string): LedgerEntry | null {
    return this.entries.get(issueKey) ?? null
  }

  has(issueKey: string): boolean {
    return this.entries.has(issueKey)
  }

  get size(): number {
    return this.entries.size
  }

  snapshot(): LedgerEntries {
    return new Map(this.entries)
  }
}
