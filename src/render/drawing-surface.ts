import type { Rgba } from '../colors'
import type { TextAlign } from '../layout'
import type { Point } from '../scales'

export interface TextStyle {
  readonly size: number
  readonly color: Rgba
  readonly align: TextAlign
  readonly bold?: boolean
}

/**
 * The 2D drawing capability the compositor relies on. Text is anchored at its
 * vertical middle.
 */
export interface DrawingSurface {
  readonly width: number
  readonly height: number
  fillRect(x: number, y: number, width: number, height: number, color: Rgba): void
  fillPolygon(points: readonly Point[], color: Rgba): void
  strokeLine(from: Point, to: Point, color: Rgba, width: number, dash?: readonly number[]): void
  fillText(text: string, x: number, y: number, style: TextStyle): void
}

/**
 * A drawing surface that can be rasterized to PNG bytes
 */
export interface RasterSurface extends DrawingSurface {
  encodePng(): Promise<Buffer>
}

export type SurfaceFactory = (width: number, height: number) => RasterSurface
