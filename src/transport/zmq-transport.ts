import { Dealer } from 'zeromq'
import { TransportError, toError } from '../errors'
import { NoopLogger, type Logger } from '../utils'
import type { MessageTransport, TransportConfig } from './message-transport.interface'

/**
 * ZeroMQ DEALER socket connected to the broker under a fixed routing identity
 */
export class ZmqTransport implements MessageTransport {
  private socket?: Dealer

  constructor(
    private readonly config: TransportConfig,
    private readonly logger: Logger = new NoopLogger()
  ) {}

  async connect(): Promise<void> {
    if (this.socket) {
      this.logger.info('Transport already connected', { endpoint: this.config.endpoint })
      return
    }

    try {
      const socket = new Dealer({ routingId: this.config.identity })
      socket.connect(this.config.endpoint)
      this.socket = socket
    } catch (error) {
      throw new TransportError(`Failed to connect to ${this.config.endpoint}`, toError(error))
    }

    this.logger.info(`Connecting to ${this.config.endpoint} as '${this.config.identity}'`, {
      endpoint: this.config.endpoint,
      identity: this.config.identity
    })
  }

  async *receive(): AsyncIterable<Buffer[]> {
    const socket = this.requireSocket()
    try {
      for await (const frames of socket) {
        yield frames
      }
    } catch (error) {
      // Closing the socket interrupts a pending receive
      if (!socket.closed) {
        throw new TransportError('Failed to receive message', toError(error))
      }
    }
  }

  async send(frames: readonly (string | Uint8Array)[]): Promise<void> {
    const socket = this.requireSocket()
    try {
      await socket.send([...frames])
    } catch (error) {
      throw new TransportError('Failed to send message', toError(error))
    }
  }

  async close(): Promise<void> {
    if (!this.socket) return
    this.socket.close()
    this.socket = undefined
    this.logger.info('Transport closed', { endpoint: this.config.endpoint })
  }

  isConnected(): boolean {
    return this.socket !== undefined && !this.socket.closed
  }

  private requireSocket(): Dealer {
    if (!this.socket) {
      throw new TransportError('Transport not connected')
    }
    return this.socket
  }
}
