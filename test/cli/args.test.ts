import { describe, expect, it } from 'vitest'
import { HELP_TEXT, parseCliArgs, resolveInput, type CliInvocation } from '../../src/modules/cli/args'
import { InvalidConfigError } from '../../src/modules/errors/errors'
import { DEFAULT_CONFIG } from '../../src/modules/settings/config'

const invocationOf = (argv: string[]): CliInvocation => {
  const result = parseCliArgs(argv)
  if (result.kind !== 'run') {
    throw new Error(`expected a run invocation, got ${result.kind}`)
  }
  return result.invocation
}

const issuesOf = (argv: string[]): string[] => {
  try {
    parseCliArgs(argv)
  } catch (error) {
    if (error instanceof InvalidConfigError) return error.issues
    throw error
  }
  return []
}

describe('resolveInput', () => {
  it('recognises the source keywords case-insensitively', () => {
    expect(resolveInput(['MIC'])).toEqual({ kind: 'mic' })
    expect(resolveInput(['wav', 'take.wav'])).toEqual({ kind: 'file', path: 'take.wav' })
    expect(resolveInput(['file', 'take.wav'])).toEqual({ kind: 'file', path: 'take.wav' })
  })

  it('treats anything else as a file path', () => {
    expect(resolveInput(['recordings/take.wav'])).toEqual({ kind: 'file', path: 'recordings/take.wav' })
  })
})

describe('parseCliArgs', () => {
  it('uses the defaults for a bare source', () => {
    expect(invocationOf(['mic'])).toEqual({
      input: { kind: 'mic' },
      config: DEFAULT_CONFIG,
      pngPath: null,
      csvPath: null,
      logFile: 'logs/sgram.jsonl',
      logLevel: 'info',
      headless: false,
    })
  })

  it('maps flags onto the configuration', () => {
    const invocation = invocationOf([
      'wav',
      'take.wav',
      '--fft',
      '2048',
      '--hop=512',
      '--palette=Heat',
      '--floor=-90',
      '--normalize',
      '--device',
      'USB',
      '--png-path',
      'out.png',
      '--headless',
    ])
    expect(invocation.input).toEqual({ kind: 'file', path: 'take.wav' })
    expect(invocation.config).toMatchObject({
      fftSize: 2048,
      windowLength: 2048,
      hop: 512,
      palette: 'heat',
      dbFloor: -90,
      normalize: true,
      device: 'USB',
    })
    expect(invocation.pngPath).toBe('out.png')
    expect(invocation.headless).toBe(true)
  })

  it('keeps an explicit window length', () => {
    expect(invocationOf(['mic', '--fft=2048', '--win=1024']).config.windowLength).toBe(1024)
  })

  it('switches to half density for the finer resolution presets unless --render is given', () => {
    expect(invocationOf(['mic', '--resolution=high']).config.density).toBe('half')
    expect(invocationOf(['mic', '--resolution=ultra', '--render=cell']).config.density).toBe('cell')
    expect(invocationOf(['mic', '--resolution=low']).config.density).toBe('cell')
  })

  it('answers help and version requests before anything else', () => {
    expect(parseCliArgs(['--help'])).toEqual({ kind: 'help' })
    expect(parseCliArgs(['-V'])).toEqual({ kind: 'version' })
  })

  it('reports every problem at once', () => {
    const issues = issuesOf(['mic', '--fft', 'abc', '--palette=sepia', '--log-level=loud'])
    expect(issues).toContain("--fft: 'abc' is not a number")
    expect(issues).toContain('--log-level: expected one of debug, info, warn, error (got \'loud\')')
    expect(issues.some((issue) => issue.startsWith("palette: unknown palette 'sepia'"))).toBe(true)
  })

  it('reports configuration rules by field', () => {
    expect(issuesOf(['mic', '--fft=1000'])).toEqual(['fftSize: must be a power of two'])
  })

  it('needs a source', () => {
    expect(issuesOf([])).toEqual(['source: missing (Usage: sgram [mic|wav|FILE] [FILE] [flags])'])
    expect(issuesOf(['wav'])).toEqual(["source: missing FILE after 'wav'"])
  })

  it('explains that the visible normalization band follows the startup zoom', () => {
    expect(HELP_TEXT.split('\n')).toContain(
      '--normalize-range=visible takes the band from the startup --zoom; zooming later does not change it.',
    )
  })

  it('rejects unknown flags', () => {
    expect(() => parseCliArgs(['mic', '--bogus'])).toThrow(InvalidConfigError)
  })
})
