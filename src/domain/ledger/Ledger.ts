/**
 * Ledger Domain Types
 *
 * The ledger remembers the last notification sent for every active issue.
 * Entries are keyed by the flattened issue key (see formatIssueKey).
 */

export interface LedgerEntry {
  issueKey: string
  /** Float epoch seconds of the last notification */
  timestamp: number
  details: string | null
  message: string
}

export type LedgerEntries = Map<string, LedgerEntry>

export interface LedgerRepository {
  load(): Promise<LedgerEntries>
  save(entries: ReadonlyMap<string, LedgerEntry>): Promise<void>
}
