import { z } from 'zod'
import palettesJson from '../../../data/palettes.json'
import { InvalidConfigError } from '../errors/errors'

const channel = z.number().int().min(0).max(255)

const paletteSchema = z
  .object({
    name: z.string().min(1),
    interpolation: z.enum(['linear', 'nearest']),
    stops: z.array(z.tuple([channel, channel, channel])).min(2),
    positions: z.array(z.number().min(0).max(1)).optional(),
  })
  .superRefine((palette, ctx) => {
    const { positions } = palette
    if (!positions) return
    if (positions.length !== palette.stops.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['positions'], message: 'needs one position per stop' })
    }
    if (positions.some((position, index) => index > 0 && position < positions[index - 1])) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['positions'], message: 'must be ascending' })
    }
  })

const paletteFileSchema = z.object({ palettes: z.array(paletteSchema).min(1) })

export type Rgb = readonly [number, number, number]
export type Palette = z.infer<typeof paletteSchema>

export function parsePalettes(input: unknown): Palette[] {
  const result = paletteFileSchema.safeParse(input)
  if (!result.success) {
    throw new InvalidConfigError(
      result.error.issues.map((issue) => `palettes.${issue.path.join('.')}: ${issue.message}`),
    )
  }
  return result.data.palettes
}

export const PALETTES: readonly Palette[] = Object.freeze(parsePalettes(palettesJson))

export function paletteIndexOf(name: string, palettes: readonly Palette[] = PALETTES): number {
  const index = palettes.findIndex((palette) => palette.name === name)
  if (index < 0) {
    throw new InvalidConfigError([
      `palette: unknown palette '${name}' (known: ${palettes.map((palette) => palette.name).join(', ')})`,
    ])
  }
  return index
}

const positionAt = (palette: Palette, index: number): number =>
  palette.positions ? palette.positions[index] : index / (palette.stops.length - 1)

/** Colour for a normalized intensity; values outside [0, 1] are clamped. */
export function colorAt(palette: Palette, value: number): Rgb {
  const t = Number.isFinite(value) ? Math.min(1, Math.max(0, value)) : 0
  const { stops } = palette
  let upper = 1
  while (upper < stops.length - 1 && positionAt(palette, upper) < t) {
    upper += 1
  }
  const lower = upper - 1
  const from = positionAt(palette, lower)
  const to = positionAt(palette, upper)
  const fraction = to > from ? Math.min(1, Math.max(0, (t - from) / (to - from))) : 0

  if (palette.interpolation === 'nearest') {
    return fraction < 0.5 ? stops[lower] : stops[upper]
  }
  const a = stops[lower]
  const b = stops[upper]
  return [
    Math.round(a[0] + (b[0] - a[0]) * fraction),
    Math.round(a[1] + (b[1] - a[1]) * fraction),
    Math.round(a[2] + (b[2] - a[2]) * fraction),
  ]
}
