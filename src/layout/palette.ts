import { rgba } from '../colors'

export const BACKGROUND = rgba(255, 255, 255)
export const TEXT = rgba(0, 0, 0)
export const AXIS_TEXT = rgba(60, 60, 60)
export const AXIS_LINE = rgba(150, 150, 150)
export const GRID_MAJOR = rgba(235, 235, 235)
export const GRID_MINOR = rgba(240, 240, 240)
export const GRID_VERTICAL = rgba(245, 245, 245)
export const WICK = rgba(70, 70, 70)
export const UP = rgba(0, 150, 0)
export const DOWN = rgba(180, 0, 0)
export const TABLE_CELL = rgba(220, 220, 220)
export const PRICE_LABEL_TEXT = rgba(255, 255, 255)

/** Opacity applied on top of every volume bar colour */
export const VOLUME_OPACITY = 0.8
