import { RENDER_ORDER, type LayerSet, type Primitive, type RenderLayer } from '../layout'
import type { DrawingSurface } from './drawing-surface'

/**
 * Paints layers onto a surface strictly in {@link RENDER_ORDER}. The order never
 * depends on the request; an empty layer is simply a no-op.
 */
export class Compositor {
  constructor(private readonly surface: DrawingSurface) {}

  /**
   * @returns the layers that contributed at least one primitive, in draw order
   */
  composite(layers: LayerSet): RenderLayer[] {
    const drawn: RenderLayer[] = []
    for (const layer of RENDER_ORDER) {
      const primitives = layers[layer]
      if (primitives.length === 0) continue
      for (const primitive of primitives) {
        this.draw(primitive)
      }
      drawn.push(layer)
    }
    return drawn
  }

  private draw(primitive: Primitive): void {
    switch (primitive.kind) {
      case 'rect':
        this.surface.fillRect(primitive.x, primitive.y, primitive.width, primitive.height, primitive.fill)
        break
      case 'triangle':
        this.surface.fillPolygon(primitive.points, primitive.fill)
        break
      case 'line':
        this.surface.strokeLine(primitive.from, primitive.to, primitive.stroke, primitive.width, primitive.dash)
        break
      case 'text':
        this.surface.fillText(primitive.text, primitive.x, primitive.y, {
          size: primitive.size,
          color: primitive.color,
          align: primitive.align,
          bold: primitive.bold
        })
        break
    }
  }
}
