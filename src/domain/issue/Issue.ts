/**
 * Issue Domain Types
 *
 * An issue is one anomaly condition on one inverter, identified by
 * (plant, scope, kind). Only one active issue may exist per key.
 */

export const ISSUE_KINDS = [
  "outdated",
  "underperforming",
  "low_power",
  "power_drop",
  "deactivated",
] as const

export type IssueKind = (typeof ISSUE_KINDS)[number]

export interface IssueKey {
  plant: string
  /** Device serial the issue is about */
  scope: string
  kind: IssueKind
}

export interface IssueCandidate {
  key: IssueKey
  /** Fingerprint of the magnitudes and timestamps that justified the issue */
  details: string
  message: string
}

/**
 * Result of evaluating one rule for one key.
 * `candidate` is null when the condition was checked and does not hold.
 */
export interface RuleOutcome {
  key: IssueKey
  candidate: IssueCandidate | null
  recoveryMessage: string
}

export function formatIssueKey(key: IssueKey): string {
  return `${key.plant}_${key.scope}_${key.kind}`
}

export function resolutionKey(key: IssueKey): string {
  return `${formatIssueKey(key)}_resolved`
}
