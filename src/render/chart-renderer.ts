import type { Artifact, ArtifactWriter } from '../artifacts'
import { buildChartLayout, formatPrice, type ChartLayout, type RenderLayer } from '../layout'
import type { ChartRequest } from '../models'
import { NoopLogger, type Logger } from '../utils'
import { createCanvasSurface } from './canvas-surface'
import { Compositor } from './compositor'
import type { SurfaceFactory } from './drawing-surface'

export interface ChartRendererDependencies {
  readonly writer: ArtifactWriter
  readonly surfaceFactory?: SurfaceFactory
  readonly logger?: Logger
}

export interface RenderResult {
  readonly artifact: Artifact
  readonly layout: ChartLayout
  /** Layers that produced at least one primitive, in draw order */
  readonly layers: RenderLayer[]
  readonly durationMs: number
}

/**
 * Request → layout → composite → PNG → file. Every call works on fresh state, so
 * concurrent renders do not interfere except through the output directory.
 */
export class ChartRenderer {
  private readonly writer: ArtifactWriter
  private readonly surfaceFactory: SurfaceFactory
  private readonly logger: Logger

  constructor(deps: ChartRendererDependencies) {
    this.writer = deps.writer
    this.surfaceFactory = deps.surfaceFactory ?? createCanvasSurface
    this.logger = deps.logger ?? new NoopLogger()
  }

  /**
   * @throws EmptySeriesError before anything is drawn when the request has no candles
   * @throws IoError when the image cannot be written
   */
  async render(request: ChartRequest, context: Record<string, unknown> = {}): Promise<RenderResult> {
    const startTime = Date.now()
    const layout = buildChartLayout(request)

    this.logger.debug('Price range', {
      ...context,
      low: formatPrice(layout.stats.sessionLow),
      high: formatPrice(layout.stats.sessionHigh)
    })

    const surface = this.surfaceFactory(layout.frame.width, layout.frame.height)
    const layers = new Compositor(surface).composite(layout.layers)
    const png = await surface.encodePng()
    const artifact = await this.writer.write(request, png)

    return { artifact, layout, layers, durationMs: Date.now() - startTime }
  }
}
