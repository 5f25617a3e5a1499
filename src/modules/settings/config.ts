import { z } from 'zod'
import { InvalidConfigError } from '../errors/errors'

export const FREQ_SCALES = ['linear', 'log', 'mel'] as const
export const STYLES = ['horizontal', 'waterfall'] as const
export const DENSITIES = ['cell', 'half'] as const
export const WINDOW_TYPES = ['hann', 'hamming', 'blackman'] as const

export type FreqScale = (typeof FREQ_SCALES)[number]
export type AnimationStyle = (typeof STYLES)[number]
export type RenderDensity = (typeof DENSITIES)[number]
export type WindowType = (typeof WINDOW_TYPES)[number]
export type Aggregation = 'max' | 'mean'

export const MIN_ZOOM = 1
export const MAX_ZOOM = 64

const isPowerOfTwo = (value: number) => value > 0 && (value & (value - 1)) === 0

/** Pixel rows packed into one character cell for each render density. */
export const subRowsFor = (density: RenderDensity): number => (density === 'half' ? 2 : 1)

export const spectrogramConfigSchema = z
  .object({
    fftSize: z.number().int().min(16).max(65_536),
    windowLength: z.number().int().min(16),
    hop: z.number().int().min(1),
    sampleRate: z.number().int().positive(),
    alpha: z.union([z.literal(1), z.literal(2)]),
    window: z.enum(WINDOW_TYPES),
    preEmphasis: z.number().gt(0).lt(1).nullable(),
    dbFloor: z.number().finite(),
    dbCeiling: z.number().finite(),
    normalize: z.boolean(),
    normalizeRange: z.enum(['full', 'visible']),
    clampFloor: z.boolean(),
    aggregation: z.enum(['max', 'mean']),
    zoom: z.number().min(MIN_ZOOM).max(MAX_ZOOM),
    freqScale: z.enum(FREQ_SCALES),
    style: z.enum(STYLES),
    density: z.enum(DENSITIES),
    palette: z.string().min(1),
    overview: z.boolean(),
    fullscreen: z.boolean(),
    detailed: z.boolean(),
    device: z.string().min(1).nullable(),
    realtime: z.boolean(),
    queueCapacity: z.number().int().min(1),
    blockSize: z.number().int().min(1),
    fps: z.number().int().min(1).max(240),
    captureTimeoutMs: z.number().int().positive(),
    readTimeoutMs: z.number().int().positive(),
    imageWidth: z.number().int().min(1).max(16_384),
    imageHeight: z.number().int().min(1).max(16_384),
  })
  .superRefine((config, ctx) => {
    if (!isPowerOfTwo(config.fftSize)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['fftSize'], message: 'must be a power of two' })
    }
    if (config.windowLength > config.fftSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['windowLength'],
        message: `must not exceed fftSize (${config.fftSize})`,
      })
    }
    if (config.hop > config.windowLength) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['hop'],
        message: `must not exceed windowLength (${config.windowLength})`,
      })
    }
    if (config.dbFloor >= config.dbCeiling) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['dbFloor'], message: 'must be below dbCeiling' })
    }
    if (config.imageHeight % subRowsFor(config.density) !== 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['imageHeight'],
        message: `must be a multiple of ${subRowsFor(config.density)} for ${config.density} density`,
      })
    }
  })

export type SpectrogramConfig = Readonly<z.infer<typeof spectrogramConfigSchema>>
export type SpectrogramConfigInput = Partial<z.input<typeof spectrogramConfigSchema>>

export const DEFAULT_CONFIG: SpectrogramConfig = Object.freeze({
  fftSize: 1024,
  windowLength: 1024,
  hop: 256,
  sampleRate: 48_000,
  alpha: 1,
  window: 'hann',
  preEmphasis: null,
  dbFloor: -80,
  dbCeiling: 0,
  normalize: false,
  normalizeRange: 'full',
  clampFloor: false,
  aggregation: 'max',
  zoom: 1,
  freqScale: 'linear',
  style: 'waterfall',
  density: 'cell',
  palette: 'viridis',
  overview: false,
  fullscreen: false,
  detailed: false,
  device: null,
  realtime: false,
  queueCapacity: 64,
  blockSize: 1024,
  fps: 30,
  captureTimeoutMs: 5_000,
  readTimeoutMs: 10_000,
  imageWidth: 800,
  imageHeight: 600,
})

const formatIssuePath = (path: (string | number)[]) => (path.length > 0 ? `${path.join('.')}: ` : '')

/**
 * Merges overrides onto the defaults and validates the result. Every violated rule is reported
 * at once; nothing is clamped into range.
 */
export function resolveConfig(overrides: SpectrogramConfigInput = {}): SpectrogramConfig {
  return parseConfig({ ...DEFAULT_CONFIG, ...overrides })
}

/** Validates a complete, loosely typed configuration such as one assembled from flags. */
export function parseConfig(input: unknown): SpectrogramConfig {
  const result = spectrogramConfigSchema.safeParse(input)
  if (!result.success) {
    throw new InvalidConfigError(result.error.issues.map((issue) => `${formatIssuePath(issue.path)}${issue.message}`))
  }
  return Object.freeze(result.data)
}

export const binCountFor = (config: Pick<SpectrogramConfig, 'fftSize'>): number => config.fftSize / 2 + 1

export const binSpacingHz = (config: Pick<SpectrogramConfig, 'fftSize' | 'sampleRate'>): number =>
  config.sampleRate / config.fftSize
