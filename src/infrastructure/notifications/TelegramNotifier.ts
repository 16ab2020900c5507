/**
 * Telegram Notifier
 *
 * NotificationSink backed by the Telegram Bot API (sendMessage, HTML parse mode).
 * Messages are plain text, escaped for HTML. Failures are logged and reported
 * as false; no retries here.
 */

import type { NotificationSink } from "../../domain/notification/Notification"
import { errorMessage } from "../../shared/errors"
import { pooledFetch } from "../vendors/httpClient"

export interface TelegramConfig {
  botToken: string
  chatId: string
  apiBaseUrl?: string
  timeoutMs?: number
}

export function escapeHtml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;")
}

export class TelegramNotifier implements NotificationSink {
  constructor(private config: TelegramConfig) {}

  async send(message: string): Promise<boolean> {
    const baseUrl = this.config.apiBaseUrl ?? "https://api.telegram.org"
    const url = `${baseUrl}/bot${this.config.botToken}/sendMessage`

    try {
      const response = await pooledFetch(
        url,
        {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify({
            chat_id: this.config.chatId,
            text: escapeHtml(message),
            parse_mode: "HTML",
          }),
        },
        this.config.timeoutMs ?? 10_000
      )

      if (!response.ok) {
        console.error(`[Telegram] sendMessage failed: ${response.status} ${response.statusText}`)
      }
      return response.ok
    } catch (error) {
      console.error(`[Telegram] sendMessage failed: ${errorMessage(error)}`)
      return false
    }
  }
}
