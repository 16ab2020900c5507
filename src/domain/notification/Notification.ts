/**
 * Notification Sink
 *
 * Delivery channel for alert texts. Implementations report failure by
 * resolving to false; retries belong to the transport.
 */

export interface NotificationSink {
  send(message: string): Promise<boolean>
}
