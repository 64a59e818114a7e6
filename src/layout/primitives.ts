import type { Rgba } from '../colors'
import type { Point } from '../scales'

/**
 * Back-to-front compositing order. Overlays sit behind candle geometry and the
 * statistics table is always drawn last.
 */
export enum RenderLayer {
  Background = 'background',
  Grid = 'grid',
  Zones = 'zones',
  VLines = 'vlines',
  Volume = 'volume',
  Wicks = 'wicks',
  Bodies = 'bodies',
  Markers = 'markers',
  PriceLine = 'price-line',
  Table = 'table'
}

export const RENDER_ORDER: readonly RenderLayer[] = [
  RenderLayer.Background,
  RenderLayer.Grid,
  RenderLayer.Zones,
  RenderLayer.VLines,
  RenderLayer.Volume,
  RenderLayer.Wicks,
  RenderLayer.Bodies,
  RenderLayer.Markers,
  RenderLayer.PriceLine,
  RenderLayer.Table
]

export interface RectPrimitive {
  readonly kind: 'rect'
  readonly x: number
  readonly y: number
  readonly width: number
  readonly height: number
  readonly fill: Rgba
}

export interface TrianglePrimitive {
  readonly kind: 'triangle'
  readonly points: readonly [Point, Point, Point]
  readonly fill: Rgba
}

export interface LinePrimitive {
  readonly kind: 'line'
  readonly from: Point
  readonly to: Point
  readonly stroke: Rgba
  readonly width: number
  /** Canvas dash pattern; solid when absent */
  readonly dash?: readonly number[]
}

export type TextAlign = 'left' | 'center' | 'right'

export interface TextPrimitive {
  readonly kind: 'text'
  readonly text: string
  readonly x: number
  readonly y: number
  readonly size: number
  readonly color: Rgba
  readonly align: TextAlign
  readonly bold?: boolean
}

export type Primitive = RectPrimitive | TrianglePrimitive | LinePrimitive | TextPrimitive

export type LayerSet = Readonly<Record<RenderLayer, readonly Primitive[]>>

export function emptyLayerSet(): Record<RenderLayer, Primitive[]> {
  return {
    [RenderLayer.Background]: [],
    [RenderLayer.Grid]: [],
    [RenderLayer.Zones]: [],
    [RenderLayer.VLines]: [],
    [RenderLayer.Volume]: [],
    [RenderLayer.Wicks]: [],
    [RenderLayer.Bodies]: [],
    [RenderLayer.Markers]: [],
    [RenderLayer.PriceLine]: [],
    [RenderLayer.Table]: []
  }
}
