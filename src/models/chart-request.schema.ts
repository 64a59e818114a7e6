import { z } from 'zod'

/**
 * True for a bare file name: no directory part, not absolute, not `.` or `..`
 */
export function isPlainFilename(name: string): boolean {
  return name !== '.' && name !== '..' && !/[\\/]/.test(name) && !/^[a-z]:/i.test(name)
}

/**
 * Signal marker as sent in `plots.marks`
 * @example { time: 1718000000000, position: "above", color: "#FF0000", text: "4h", size: 1.5 }
 */
export const markSchema = z.object({
  time: z.number().int(),
  position: z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .pipe(z.enum(['above', 'below'])),
  color: z.string(),
  text: z.string().nullish(),
  size: z.number().positive().nullish()
})

/**
 * Shaded region as sent in `plots.zones`; x are timestamps, y are prices
 */
export const zoneSchema = z.object({
  x1: z.number(),
  x2: z.number(),
  y1: z.number(),
  y2: z.number(),
  color: z.string()
})

export const vlineSchema = z.object({
  time: z.number().int(),
  color: z.string()
})

/**
 * Every overlay list is optional; unknown plot kinds are ignored
 */
export const plotsSchema = z
  .object({
    marks: z.array(markSchema).nullish(),
    zones: z.array(zoneSchema).nullish(),
    vlines: z.array(vlineSchema).nullish()
  })
  .passthrough()

/**
 * A data row: `[timestamp, open, high, low, close, volume?]` unless `cols` says otherwise
 */
export const rowSchema = z.array(z.number()).min(5)

export const chartDataSchema = z.object({
  title: z.string(),
  ticker: z.string().min(1),
  timeframe: z.string().min(1),
  cols: z.array(z.string()),
  data: z.array(rowSchema),
  candle_colors: z.array(z.string()),
  volume_colors: z.array(z.string()).nullish(),
  plots: plotsSchema,
  desc: z.string(),
  chat_id: z.number().int().nullish(),
  subscriber_list: z.string().nullish(),
  image_filename: z
    .string()
    .min(1)
    .refine(isPlainFilename, 'image_filename must be a plain file name without directories')
    .nullish()
})

/**
 * `["chart", "request", {...}]`
 */
export const chartEnvelopeSchema = z.tuple([z.string(), z.string(), z.unknown()])

export type ChartData = z.infer<typeof chartDataSchema>
export type MarkData = z.infer<typeof markSchema>
