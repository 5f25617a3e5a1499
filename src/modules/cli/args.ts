import { parseArgs } from 'node:util'
import { InvalidConfigError, describeError } from '../errors/errors'
import type { LogLevel } from '../logging/logger'
import { paletteIndexOf } from '../render/palette'
import { DEFAULT_CONFIG, parseConfig, type SpectrogramConfig } from '../settings/config'

export const USAGE = 'Usage: sgram [mic|wav|FILE] [FILE] [flags]'

export const RESOLUTIONS = ['low', 'medium', 'high', 'ultra'] as const
export type Resolution = (typeof RESOLUTIONS)[number]

export type InputSelection = { kind: 'mic' } | { kind: 'file'; path: string }

export interface CliInvocation {
  input: InputSelection
  config: SpectrogramConfig
  pngPath: string | null
  csvPath: string | null
  logFile: string
  logLevel: LogLevel
  /** Process the input without a terminal UI, export, and exit. */
  headless: boolean
}

export type CliParseResult = { kind: 'help' } | { kind: 'version' } | { kind: 'run'; invocation: CliInvocation }

const OPTIONS = {
  fft: { type: 'string' },
  win: { type: 'string' },
  hop: { type: 'string' },
  'sample-rate': { type: 'string' },
  floor: { type: 'string' },
  ceil: { type: 'string' },
  fps: { type: 'string' },
  zoom: { type: 'string' },
  palette: { type: 'string' },
  style: { type: 'string' },
  render: { type: 'string' },
  resolution: { type: 'string' },
  'freq-scale': { type: 'string' },
  window: { type: 'string' },
  alpha: { type: 'string' },
  'pre-emphasis': { type: 'string' },
  normalize: { type: 'boolean' },
  'normalize-range': { type: 'string' },
  'clamp-floor': { type: 'boolean' },
  aggregation: { type: 'string' },
  detailed: { type: 'boolean' },
  fullscreen: { type: 'boolean' },
  overview: { type: 'boolean' },
  realtime: { type: 'boolean' },
  device: { type: 'string' },
  'png-path': { type: 'string' },
  'csv-path': { type: 'string' },
  'image-width': { type: 'string' },
  'image-height': { type: 'string' },
  'queue-capacity': { type: 'string' },
  'log-file': { type: 'string' },
  'log-level': { type: 'string' },
  headless: { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
  version: { type: 'boolean', short: 'V' },
} as const

const NUMERIC_FLAGS: Array<[keyof typeof OPTIONS, keyof SpectrogramConfig]> = [
  ['fft', 'fftSize'],
  ['win', 'windowLength'],
  ['hop', 'hop'],
  ['sample-rate', 'sampleRate'],
  ['floor', 'dbFloor'],
  ['ceil', 'dbCeiling'],
  ['fps', 'fps'],
  ['zoom', 'zoom'],
  ['alpha', 'alpha'],
  ['pre-emphasis', 'preEmphasis'],
  ['image-width', 'imageWidth'],
  ['image-height', 'imageHeight'],
  ['queue-capacity', 'queueCapacity'],
]

const TEXT_FLAGS: Array<[keyof typeof OPTIONS, keyof SpectrogramConfig]> = [
  ['palette', 'palette'],
  ['style', 'style'],
  ['render', 'density'],
  ['freq-scale', 'freqScale'],
  ['window', 'window'],
  ['normalize-range', 'normalizeRange'],
  ['aggregation', 'aggregation'],
]

const BOOLEAN_FLAGS: Array<[keyof typeof OPTIONS, keyof SpectrogramConfig]> = [
  ['normalize', 'normalize'],
  ['clamp-floor', 'clampFloor'],
  ['detailed', 'detailed'],
  ['fullscreen', 'fullscreen'],
  ['overview', 'overview'],
  ['realtime', 'realtime'],
]

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

const isResolution = (value: string): value is Resolution => RESOLUTIONS.some((resolution) => resolution === value)
const isLogLevel = (value: string): value is LogLevel => LOG_LEVELS.some((level) => level === value)

export function resolveInput(positionals: string[]): InputSelection {
  const [source, file] = positionals
  if (source === undefined) {
    throw new InvalidConfigError([`source: missing (${USAGE})`])
  }
  const keyword = source.toLowerCase()
  if (keyword === 'mic') {
    return { kind: 'mic' }
  }
  if (keyword === 'wav' || keyword === 'file') {
    if (file === undefined) {
      throw new InvalidConfigError([`source: missing FILE after '${source}'`])
    }
    return { kind: 'file', path: file }
  }
  return { kind: 'file', path: source }
}

/**
 * Parses `sgram [mic|wav|FILE] [FILE] [flags]`. Flag values are validated together with the
 * rest of the configuration so every problem is reported at once.
 */
export function parseCliArgs(argv: string[]): CliParseResult {
  const parse = () => parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true })
  let parsed: ReturnType<typeof parse>
  try {
    parsed = parse()
  } catch (error) {
    throw new InvalidConfigError([describeError(error)])
  }
  const { values, positionals } = parsed
  if (values.help) return { kind: 'help' }
  if (values.version) return { kind: 'version' }

  const issues: string[] = []
  const raw: Record<string, unknown> = { ...DEFAULT_CONFIG }
  for (const [flag, key] of NUMERIC_FLAGS) {
    const text = values[flag]
    if (typeof text !== 'string') continue
    const value = Number(text)
    if (text.trim() === '' || Number.isNaN(value)) {
      issues.push(`--${flag}: '${text}' is not a number`)
    } else {
      raw[key] = value
    }
  }
  for (const [flag, key] of TEXT_FLAGS) {
    const text = values[flag]
    if (typeof text === 'string') raw[key] = text.toLowerCase()
  }
  for (const [flag, key] of BOOLEAN_FLAGS) {
    if (values[flag] === true) raw[key] = true
  }
  if (values.win === undefined && values.fft !== undefined) {
    // Window defaults to the full transform length.
    raw.windowLength = raw.fftSize
  }
  if (values.device !== undefined) {
    raw.device = values.device
  }

  const resolution = values.resolution ?? 'medium'
  if (!isResolution(resolution)) {
    issues.push(`--resolution: expected one of ${RESOLUTIONS.join(', ')} (got '${resolution}')`)
  } else if (values.render === undefined && (resolution === 'high' || resolution === 'ultra')) {
    raw.density = 'half'
  }

  const logLevel = values['log-level'] ?? 'info'
  if (!isLogLevel(logLevel)) {
    issues.push(`--log-level: expected one of ${LOG_LEVELS.join(', ')} (got '${logLevel}')`)
  }

  let input: InputSelection | null = null
  try {
    input = resolveInput(positionals)
  } catch (error) {
    issues.push(...(error instanceof InvalidConfigError ? error.issues : [describeError(error)]))
  }

  let config: SpectrogramConfig | null = null
  try {
    config = parseConfig(raw)
    paletteIndexOf(config.palette)
  } catch (error) {
    issues.push(...(error instanceof InvalidConfigError ? error.issues : [describeError(error)]))
  }

  if (issues.length > 0 || !input || !config || !isLogLevel(logLevel)) {
    throw new InvalidConfigError(issues)
  }
  return {
    kind: 'run',
    invocation: {
      input,
      config,
      pngPath: values['png-path'] ?? null,
      csvPath: values['csv-path'] ?? null,
      logFile: values['log-file'] ?? 'logs/sgram.jsonl',
      logLevel,
      headless: values.headless === true,
    },
  }
}

export const HELP_TEXT = [
  USAGE,
  '',
  'Sources: mic (default capture device), wav FILE, or a FILE path directly.',
  '',
  'Analysis:  --fft=N --win=L --hop=H --sample-rate=HZ --window=hann|hamming|blackman',
  '           --alpha=1|2 --pre-emphasis=B --normalize --normalize-range=full|visible --clamp-floor',
  'Display:   --floor=DB --ceil=DB --zoom=Z --freq-scale=linear|log|mel --style=waterfall|horizontal',
  '           --render=cell|half --resolution=low|medium|high|ultra --palette=NAME --aggregation=max|mean',
  '           --overview --detailed --fullscreen --fps=N',
  'Input:     --device=SUBSTRING --realtime --queue-capacity=N',
  'Export:    --png-path=FILE --csv-path=FILE --image-width=PX --image-height=PX --headless',
  'Logging:   --log-file=FILE --log-level=debug|info|warn|error',
  '',
  '--normalize-range=visible takes the band from the startup --zoom; zooming later does not change it.',
  'Negative values need the = form, e.g. --floor=-90.',
].join('\n')
