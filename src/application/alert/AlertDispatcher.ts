/**
 * Alert Dispatcher
 *
 * Turns rule outcomes into notifications, consulting the ledger:
 * - candidate, new or changed           -> record, deliver  -> "Sent"
 * - candidate, identical within window  ->                  -> "Suppressed"
 * - no candidate, ledger entry existed  -> remove, recovery -> "Resolved"
 * - no candidate, nothing recorded      ->                  -> "NoOp"
 *
 * Delivery (alerts and recoveries alike) only happens inside the operating
 * hours. Outside them the ledger is still updated and the action is "Suppressed".
 */

import type { RuleOutcome } from "../../domain/issue/Issue"
import { formatIssueKey, resolutionKey } from "../../domain/issue/Issue"
import type { NotificationSink } from "../../domain/notification/Notification"
import type { AlertPolicy } from "../../shared/config"
import { DEFAULT_POLICY } from "../../shared/config"
import { errorMessage } from "../../shared/errors"
import { epochSeconds, isWithinOperatingHours } from "../../shared/time/zone"
import type { DeduplicationLedger } from "../ledger/DeduplicationLedger"

export type DispatchAction = "Sent" | "Suppressed" | "Resolved" | "NoOp"

export interface DispatchResult {
  action: DispatchAction
  issueKey: string
  message?: string
  /** Whether the sink accepted the message; false when nothing was sent */
  delivered: boolean
}

export class AlertDispatcher {
  constructor(
    private ledger: DeduplicationLedger,
    private sink: NotificationSink,
    private policy: AlertPolicy = DEFAULT_POLICY
  ) {}

  async dispatch(outcome: RuleOutcome, now: Date): Promise<DispatchResult> {
    const issueKey = formatIssueKey(outcome.key)
    const nowSeconds = epochSeconds(now)
    const { candidate } = outcome

    if (!candidate) {
      const resolved = this.ledger.resolve(issueKey)
      if (!resolved) {
        return { action: "NoOp", issueKey, delivered: false }
      }

      const message = outcome.recoveryMessage
      if (!this.canDeliver(now)) {
        console.log(`[AlertDispatcher] ${issueKey} resolved outside alert hours, recovery not sent`)
        return { action: "Suppressed", issueKey, message, delivered: false }
      }

      const delivered = await this.deliver(resolutionKey(outcome.key), message)
      return { action: "Resolved", issueKey, message, delivered }
    }

    if (!this.ledger.shouldNotify(issueKey, candidate.details, nowSeconds)) {
      return { action: "Suppressed", issueKey, message: candidate.message, delivered: false }
    }

    // The attempt is what gets deduplicated, so record before delivering
    this.ledger.record(issueKey, candidate.details, candidate.message, nowSeconds)

    if (!this.canDeliver(now)) {
      return { action: "Suppressed", issueKey, message: candidate.message, delivered: false }
    }

    const delivered = await this.deliver(issueKey, candidate.message)
    return { action: "Sent", issueKey, message: candidate.message, delivered }
  }

  async dispatchAll(outcomes: readonly RuleOutcome[], now: Date): Promise<DispatchResult[]> {
    const results: DispatchResult[] = []
    for (const outcome of outcomes) {
      results.push(await this.dispatch(outcome, now))
    }
    return results
  }

  private canDeliver(now: Date): boolean {
    return isWithinOperatingHours(now, this.policy.operatingHours, this.policy.timeZone)
  }

  private async deliver(tag: string, message: string): Promise<boolean> {
    try {
      const ok = await this.sink.send(message)
      if (!ok) {
        console.warn(`[AlertDispatcher] Delivery of ${tag} was rejected by the notification sink`)
      }
      return ok
    } catch (error) {
      console.error(`[AlertDispatcher] Delivery of ${tag} failed: ${errorMessage(error)}`)
      return false
    }
  }
}
