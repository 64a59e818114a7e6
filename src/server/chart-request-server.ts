import { EventEmitter } from 'node:events'
import { v4 as uuidv4 } from 'uuid'
import type { Artifact } from '../artifacts'
import { isChartError, toError } from '../errors'
import type { ChartRequest } from '../models'
import { decodeChartEnvelope } from '../models'
import type { Notifier } from '../notifications'
import type { ChartRenderer } from '../render'
import { extractPayload, ZmqTransport, type MessageTransport, type TransportConfig } from '../transport'
import { NoopLogger, type Logger } from '../utils'

/**
 * Server state
 */
export enum ServerState {
  IDLE = 'idle',
  STARTING = 'starting',
  RUNNING = 'running',
  STOPPING = 'stopping',
  STOPPED = 'stopped',
  ERROR = 'error'
}

/**
 * What is known about a request at the time it is logged
 */
export interface RequestContext {
  requestId: string
  ticker?: string
  timeframe?: string
}

export interface ChartRequestServerDependencies {
  readonly renderer: ChartRenderer
  readonly notifier: Notifier
  /** Defaults to a ZeroMQ dealer built from the transport config */
  readonly transport?: MessageTransport
  readonly logger?: Logger
}

/**
 * Server lifecycle events (listener signatures for `on`)
 */
export interface ChartRequestServerEvents {
  start: []
  stop: []
  rendered: [artifact: Artifact, context: RequestContext]
  failed: [error: Error, context: RequestContext]
}

/**
 * Message loop in front of the rendering pipeline. Requests are handled one at a
 * time, each to completion (decode, render, write, notify) before the next is read.
 * A failing request is logged and counted; the loop keeps going.
 */
export class ChartRequestServer extends EventEmitter {
  private readonly transport: MessageTransport
  private readonly renderer: ChartRenderer
  private readonly notifier: Notifier
  private readonly logger: Logger
  private state: ServerState = ServerState.IDLE
  private stats = {
    startTime: 0,
    received: 0,
    rendered: 0,
    failed: 0,
    notificationsFailed: 0
  }

  constructor(
    readonly config: TransportConfig,
    deps: ChartRequestServerDependencies
  ) {
    super()
    this.logger = deps.logger ?? new NoopLogger()
    this.transport = deps.transport ?? new ZmqTransport(config, this.logger)
    this.renderer = deps.renderer
    this.notifier = deps.notifier
  }

  /**
   * Connects and consumes messages until {@link stop} is called or the transport ends
   */
  async start(): Promise<void> {
    if (this.state !== ServerState.IDLE && this.state !== ServerState.STOPPED) {
      throw new Error(`Cannot start server in state: ${this.state}`)
    }

    this.state = ServerState.STARTING
    this.stats.startTime = Date.now()

    try {
      await this.transport.connect()
      this.state = ServerState.RUNNING
      this.emit('start')
      this.logger.info('Awaiting incoming chart messages', { endpoint: this.config.endpoint })

      for await (const frames of this.transport.receive()) {
        if (!this.isRunning()) break
        await this.handleMessage(frames)
      }
    } catch (error) {
      if (this.isShuttingDown()) {
        return
      }
      this.state = ServerState.ERROR
      throw error
    }

    if (this.isRunning()) {
      this.state = ServerState.STOPPED
    }
  }

  async stop(): Promise<void> {
    if (this.state !== ServerState.RUNNING && this.state !== ServerState.STARTING) {
      return
    }

    this.state = ServerState.STOPPING
    await this.transport.close()
    this.state = ServerState.STOPPED
    this.emit('stop')
  }

  getState(): ServerState {
    return this.state
  }

  getStats(): Readonly<typeof this.stats> {
    return { ...this.stats }
  }

  /**
   * Runs one message through the pipeline.
   * @returns the artifact, or undefined when the request failed
   */
  async handleMessage(frames: readonly Uint8Array[]): Promise<Artifact | undefined> {
    const context: RequestContext = { requestId: uuidv4() }
    this.stats.received++

    try {
      const envelope = decodeChartEnvelope(extractPayload(frames))
      const request = envelope.request
      context.ticker = request.ticker
      context.timeframe = request.timeframe

      this.logRequest(request, envelope.channel, envelope.command, context)

      const result = await this.renderer.render(request, { ...context })
      this.logger.info(`Chart saved to ${result.artifact.path}`, {
        ...context,
        bytes: result.artifact.bytes,
        durationMs: result.durationMs
      })

      const sent = await this.notifier.notify(request, result.artifact, { ...context })
      if (!sent && this.notifier.enabled) {
        this.stats.notificationsFailed++
      }

      this.stats.rendered++
      this.emit('rendered', result.artifact, context)
      return result.artifact
    } catch (error) {
      const failure = toError(error)
      this.stats.failed++
      this.logger.error(`Chart request failed: ${failure.message}`, {
        ...context,
        error: failure.name,
        code: isChartError(failure) ? failure.code : undefined
      })
      this.emit('failed', failure, context)
      return undefined
    }
  }

  private isRunning(): boolean {
    return this.state === ServerState.RUNNING
  }

  private isShuttingDown(): boolean {
    return this.state === ServerState.STOPPING || this.state === ServerState.STOPPED
  }

  private logRequest(request: ChartRequest, channel: string, command: string, context: RequestContext): void {
    const first = request.candles[0]
    const last = request.candles[request.candles.length - 1]

    this.logger.info(
      `New chart request for ${request.ticker} @ ${request.timeframe} [${request.candles.length} candles]`,
      {
        ...context,
        channel,
        command,
        title: request.title,
        from: first ? new Date(first.timestamp).toISOString() : undefined,
        to: last ? new Date(last.timestamp).toISOString() : undefined,
        description: request.description
      }
    )
  }
}
