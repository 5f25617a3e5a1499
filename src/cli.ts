import { emitKeypressEvents } from 'node:readline'
import { FileSampleSource } from './modules/capture/file-source'
import { LiveSampleSource } from './modules/capture/live-source'
import type { SampleSource } from './modules/capture/source'
import { SubprocessCaptureBackend } from './modules/capture/subprocess-backend'
import { HELP_TEXT, parseCliArgs, type CliInvocation } from './modules/cli/args'
import { KeyDispatcher, applyViewCommand, type ExportKind, type KeyPress } from './modules/cli/keys'
import { composeScreen } from './modules/cli/screen'
import { describeError, isSpectrogramError } from './modules/errors/errors'
import { JsonlFileLogSink, initializeLogger, logError, logInfo, shutdownLogger } from './modules/logging/logger'
import { SpectrogramEngine, type ExportOutcome } from './modules/pipeline/engine'
import { PALETTES, paletteIndexOf } from './modules/render/palette'
import { createViewStateStore, initialViewState } from './modules/settings/view-state'

const VERSION = '0.1.0'
const ENTER_SCREEN = '\u001b[?1049h\u001b[?25l\u001b[2J'
const LEAVE_SCREEN = '\u001b[0m\u001b[?25h\u001b[?1049l'

function createSource(invocation: CliInvocation): SampleSource {
  const { config, input } = invocation
  if (input.kind === 'mic') {
    return new LiveSampleSource(new SubprocessCaptureBackend({ sampleRate: config.sampleRate }), {
      targetRate: config.sampleRate,
      device: config.device,
      timeoutMs: config.captureTimeoutMs,
    })
  }
  return new FileSampleSource(input.path, {
    targetRate: config.sampleRate,
    blockSize: config.blockSize,
    realtime: config.realtime,
    readTimeoutMs: config.readTimeoutMs,
  })
}

const describeOutcome = (outcome: ExportOutcome): string => {
  if (!outcome.ok) {
    return `Export failed: ${outcome.error}`
  }
  const label = outcome.result.kind === 'image' ? 'PNG' : 'CSV'
  return outcome.result.written ? `Saved ${label} to ${outcome.result.path}` : `Nothing to save yet (${label})`
}

const exportWith = (engine: SpectrogramEngine, kind: ExportKind, path: string | null): Promise<ExportOutcome> =>
  kind === 'image' ? engine.exportImage(path) : engine.exportMatrix(path)

async function runHeadless(engine: SpectrogramEngine, invocation: CliInvocation): Promise<number> {
  // A live source never drains; Ctrl+C ends the capture and still exports.
  const controller = new AbortController()
  const onInterrupt = () => controller.abort()
  process.once('SIGINT', onInterrupt)
  try {
    await engine.start()
    await engine.run({ untilDrained: true, signal: controller.signal })
  } finally {
    process.off('SIGINT', onInterrupt)
  }
  const outcomes = await Promise.all([
    engine.exportImage(invocation.pngPath),
    engine.exportMatrix(invocation.csvPath),
  ])
  outcomes.forEach((outcome) => console.log(describeOutcome(outcome)))
  const { totalRows, totalSeconds, droppedChunks } = engine.metrics
  console.log(`rows: ${totalRows} | time: ${totalSeconds.toFixed(2)}s | dropped chunks: ${droppedChunks}`)
  return outcomes.every((outcome) => outcome.ok) ? 0 : 1
}

async function runInteractive(engine: SpectrogramEngine, invocation: CliInvocation): Promise<number> {
  const stdin = process.stdin
  const stdout = process.stdout
  const controller = new AbortController()
  const dispatcher = new KeyDispatcher()
  let message: string | null = null

  const draw = () => {
    stdout.write(
      composeScreen({
        size: { columns: stdout.columns || 80, rows: stdout.rows || 24 },
        view: engine.view.get(),
        config: engine.config,
        history: engine.history,
        projection: engine.projectionOptions(),
        metrics: engine.metrics,
        source: engine.source.state,
        prompt: dispatcher.prompt,
        message,
      }),
    )
  }

  const onKeypress = (_: string | undefined, key: KeyPress | undefined) => {
    const command = dispatcher.handle(key ?? {})
    if (!command || applyViewCommand(engine.view, command)) {
      return
    }
    if (command.type === 'quit') {
      controller.abort()
      return
    }
    if (command.type === 'export') {
      const path = command.path ?? (command.kind === 'image' ? invocation.pngPath : invocation.csvPath)
      message = 'Saving...'
      void exportWith(engine, command.kind, path).then((outcome) => {
        message = describeOutcome(outcome)
      })
    }
  }

  emitKeypressEvents(stdin)
  if (stdin.isTTY) stdin.setRawMode(true)
  stdin.on('keypress', onKeypress)
  stdin.resume()
  stdout.write(ENTER_SCREEN)
  try {
    await engine.start()
    await engine.run({ signal: controller.signal, onFrame: draw })
    return 0
  } finally {
    stdin.off('keypress', onKeypress)
    if (stdin.isTTY) stdin.setRawMode(false)
    stdin.pause()
    stdout.write(LEAVE_SCREEN)
  }
}

export async function main(argv: string[]): Promise<number> {
  let invocation: CliInvocation
  try {
    const parsed = parseCliArgs(argv)
    if (parsed.kind === 'help') {
      console.log(HELP_TEXT)
      return 0
    }
    if (parsed.kind === 'version') {
      console.log(VERSION)
      return 0
    }
    invocation = parsed.invocation
  } catch (error) {
    if (isSpectrogramError(error, 'InvalidConfig')) {
      console.error(error.message)
      console.error(HELP_TEXT)
      return 2
    }
    throw error
  }

  await initializeLogger(new JsonlFileLogSink(invocation.logFile), { level: invocation.logLevel })
  const { config } = invocation
  const view = createViewStateStore(initialViewState(config, paletteIndexOf(config.palette)), PALETTES.length)
  const engine = new SpectrogramEngine({ config, source: createSource(invocation), view })
  await logInfo('sgram starting', { input: invocation.input, headless: invocation.headless })

  try {
    const interactive = !invocation.headless && process.stdout.isTTY === true
    return interactive ? await runInteractive(engine, invocation) : await runHeadless(engine, invocation)
  } catch (error) {
    console.error(`sgram: ${describeError(error)}`)
    await logError('sgram failed', { error: describeError(error) })
    return 1
  } finally {
    await engine.stop()
    await shutdownLogger()
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code
  },
  (error: unknown) => {
    console.error(error)
    process.exitCode = 1
  },
)
