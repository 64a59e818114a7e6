import type { Artifact } from '../artifacts'
import { toError } from '../errors'
import type { ChartRequest } from '../models'
import { NoopLogger, type Logger } from '../utils'

/**
 * Body of the follow-up message. `text` mirrors `description` for consumers that
 * still read the older field name.
 */
export interface NotificationPayload {
  readonly text: string
  readonly description: string
  readonly image_path: string
  readonly chat_id: number | null
  readonly subscriber_list: string | null
  readonly ticker: string
  readonly timeframe: string
}

/**
 * Outbound side of the transport
 */
export interface NotificationChannel {
  send(frames: readonly (string | Uint8Array)[]): Promise<void>
}

export interface NotifierConfig {
  /** Routing frame placed before the JSON body */
  destination?: string
  /** When false, notify() logs and returns without sending */
  enabled?: boolean
}

export const DEFAULT_NOTIFICATION_DESTINATION = 'telegram'

export function buildNotificationPayload(request: ChartRequest, artifact: Artifact): NotificationPayload {
  return {
    text: request.description,
    description: request.description,
    image_path: artifact.path,
    chat_id: request.chatId ?? null,
    subscriber_list: request.subscriberList ?? null,
    ticker: artifact.ticker,
    timeframe: artifact.timeframe
  }
}

/**
 * `[destination, JSON.stringify(["ok", "send_message", payload])]`
 */
export function encodeNotification(destination: string, payload: NotificationPayload): string[] {
  return [destination, JSON.stringify(['ok', 'send_message', payload])]
}

/**
 * Human readable description of where the notification is routed
 */
export function describeDestination(request: Pick<ChartRequest, 'chatId' | 'subscriberList'>): string {
  if (request.chatId !== undefined) return `chat_id: ${request.chatId}`
  if (request.subscriberList !== undefined) return `subscriber_list: ${request.subscriberList}`
  return 'default destination'
}

/**
 * Announces finished artifacts. Failures are logged and reported through the
 * return value; they never undo the artifact that was already written.
 */
export class Notifier {
  readonly destination: string
  readonly enabled: boolean

  constructor(
    private readonly channel: NotificationChannel,
    config: NotifierConfig = {},
    private readonly logger: Logger = new NoopLogger()
  ) {
    this.destination = config.destination ?? DEFAULT_NOTIFICATION_DESTINATION
    this.enabled = config.enabled ?? true
  }

  /**
   * @returns true when the message was handed to the channel
   */
  async notify(request: ChartRequest, artifact: Artifact, context: Record<string, unknown> = {}): Promise<boolean> {
    if (!this.enabled) {
      this.logger.debug('Notifications disabled, skipping', { ...context, path: artifact.path })
      return false
    }

    const payload = buildNotificationPayload(request, artifact)
    try {
      await this.channel.send(encodeNotification(this.destination, payload))
    } catch (error) {
      this.logger.error('Failed to send chart notification', {
        ...context,
        destination: this.destination,
        error: toError(error).message
      })
      return false
    }

    this.logger.info(`Notification sent to ${describeDestination(request)}`, {
      ...context,
      destination: this.destination
    })
    return true
  }
}
