export { CanvasSurface, createCanvasSurface, FONT_FAMILY } from './canvas-surface'
export { ChartRenderer } from './chart-renderer'
export type { ChartRendererDependencies, RenderResult } from './chart-renderer'
export { Compositor } from './compositor'
export type { DrawingSurface, RasterSurface, SurfaceFactory, TextStyle } from './drawing-surface'
