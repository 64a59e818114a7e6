import { createCanvas, type Canvas, type SKRSContext2D } from '@napi-rs/canvas'
import { toCssColor, type Rgba } from '../colors'
import type { Point } from '../scales'
import type { RasterSurface, TextStyle } from './drawing-surface'

export const FONT_FAMILY = 'sans-serif'

/**
 * Raster surface backed by a Skia canvas
 */
export class CanvasSurface implements RasterSurface {
  private readonly canvas: Canvas
  private readonly ctx: SKRSContext2D

  constructor(
    readonly width: number,
    readonly height: number
  ) {
    this.canvas = createCanvas(width, height)
    this.ctx = this.canvas.getContext('2d')
  }

  fillRect(x: number, y: number, width: number, height: number, color: Rgba): void {
    this.ctx.fillStyle = toCssColor(color)
    this.ctx.fillRect(x, y, width, height)
  }

  fillPolygon(points: readonly Point[], color: Rgba): void {
    const [first, ...rest] = points
    if (!first) return
    const ctx = this.ctx
    ctx.fillStyle = toCssColor(color)
    ctx.beginPath()
    ctx.moveTo(first.x, first.y)
    for (const point of rest) {
      ctx.lineTo(point.x, point.y)
    }
    ctx.closePath()
    ctx.fill()
  }

  strokeLine(from: Point, to: Point, color: Rgba, width: number, dash: readonly number[] = []): void {
    const ctx = this.ctx
    ctx.strokeStyle = toCssColor(color)
    ctx.lineWidth = width
    ctx.setLineDash([...dash])
    ctx.beginPath()
    ctx.moveTo(from.x, from.y)
    ctx.lineTo(to.x, to.y)
    ctx.stroke()
    ctx.setLineDash([])
  }

  fillText(text: string, x: number, y: number, style: TextStyle): void {
    const ctx = this.ctx
    ctx.fillStyle = toCssColor(style.color)
    ctx.font = `${style.bold ? 'bold ' : ''}${style.size}px ${FONT_FAMILY}`
    ctx.textAlign = style.align
    ctx.textBaseline = 'middle'
    ctx.fillText(text, x, y)
  }

  async encodePng(): Promise<Buffer> {
    return this.canvas.encode('png')
  }
}

export function createCanvasSurface(width: number, height: number): CanvasSurface {
  return new CanvasSurface(width, height)
}
