import type { NotificationChannel } from '../notifications'

/**
 * Address and routing identity of the chart service on the message bus
 */
export interface TransportConfig {
  /** e.g. `tcp://127.0.0.1:6565` */
  readonly endpoint: string
  /** Routing identity announced to the broker */
  readonly identity: string
}

export const DEFAULT_TRANSPORT_CONFIG: TransportConfig = {
  endpoint: 'tcp://127.0.0.1:6565',
  identity: 'chart-renderer'
}

/**
 * Multi-part message transport. Inbound messages arrive as frame arrays;
 * outbound notifications share the same connection.
 */
export interface MessageTransport extends NotificationChannel {
  connect(): Promise<void>
  /** Ends when the transport is closed */
  receive(): AsyncIterable<Buffer[]>
  close(): Promise<void>
  isConnected(): boolean
}
