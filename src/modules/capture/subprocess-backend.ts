import { execFile, spawn, type ChildProcessByStdio } from 'node:child_process'
import type { Readable } from 'node:stream'
import { promisify } from 'node:util'
import { CaptureFailedError, describeError } from '../errors/errors'
import { logDebug, logWarn } from '../logging/logger'
import type { CaptureBackend, CaptureDevice, CaptureHandlers, CaptureStream } from './live-source'

const execFileAsync = promisify(execFile)

export type RecorderProgram = 'arecord' | 'sox'

export interface RecorderDevice extends CaptureDevice {
  program: RecorderProgram
}

export interface SubprocessBackendOptions {
  sampleRate?: number
  /** Grace period between SIGTERM and SIGKILL when closing. */
  killTimeoutMs?: number
  listTimeoutMs?: number
}

const ARECORD_LINE = /^card\s+(\d+):\s*[^[]*\[([^\]]*)\],\s*device\s+(\d+):\s*[^[]*\[([^\]]*)\]/

/** Parses `arecord -l` output into capture devices. Lines that are not card entries are skipped. */
export function parseArecordDevices(output: string, sampleRate = 48_000): RecorderDevice[] {
  const devices: RecorderDevice[] = []
  for (const line of output.split('\n')) {
    const match = ARECORD_LINE.exec(line.trim())
    if (!match) continue
    const [, card, cardName, device, deviceName] = match
    devices.push({
      id: `hw:${card},${device}`,
      name: `${cardName.trim()}: ${deviceName.trim()}`,
      sampleRate,
      channels: 1,
      format: 's16le',
      program: 'arecord',
      isDefault: devices.length === 0,
    })
  }
  return devices
}

export const soxDefaultDevice = (sampleRate = 48_000): RecorderDevice => ({
  id: 'default',
  name: 'Default input (sox)',
  sampleRate,
  channels: 1,
  format: 's16le',
  program: 'sox',
  isDefault: true,
})

export function recorderArguments(device: RecorderDevice): string[] {
  const rate = String(device.sampleRate)
  const channels = String(device.channels)
  if (device.program === 'arecord') {
    return ['-q', '-D', device.id, '-r', rate, '-f', 'S16_LE', '-c', channels, '-t', 'raw']
  }
  return ['-q', '-d', '-r', rate, '-e', 'signed-integer', '-b', '16', '-c', channels, '-t', 'raw', '-']
}

/**
 * Captures through the ALSA `arecord` utility, or `sox` when ALSA lists nothing, reading raw
 * signed 16-bit little-endian PCM from the child's stdout.
 */
export class SubprocessCaptureBackend implements CaptureBackend<RecorderDevice> {
  readonly name = 'subprocess'
  #sampleRate: number
  #killTimeoutMs: number
  #listTimeoutMs: number

  constructor(options: SubprocessBackendOptions = {}) {
    this.#sampleRate = options.sampleRate ?? 48_000
    this.#killTimeoutMs = options.killTimeoutMs ?? 1_000
    this.#listTimeoutMs = options.listTimeoutMs ?? 1_500
  }

  async listDevices(): Promise<RecorderDevice[]> {
    try {
      const { stdout } = await execFileAsync('arecord', ['-l'], { timeout: this.#listTimeoutMs, encoding: 'utf8' })
      const devices = parseArecordDevices(stdout, this.#sampleRate)
      if (devices.length > 0) {
        return devices
      }
    } catch (error) {
      await logDebug('arecord device listing unavailable', { error: describeError(error) })
    }
    return [soxDefaultDevice(this.#sampleRate)]
  }

  async open(device: RecorderDevice, handlers: CaptureHandlers): Promise<CaptureStream> {
    const child = spawn(device.program, recorderArguments(device), { stdio: ['ignore', 'pipe', 'ignore'] })
    await new Promise<void>((resolve, reject) => {
      const onSpawn = () => {
        child.off('error', onError)
        resolve()
      }
      const onError = (error: Error) => {
        child.off('spawn', onSpawn)
        reject(new CaptureFailedError(`Could not start ${device.program}`, { device: device.id }, error))
      }
      child.once('spawn', onSpawn)
      child.once('error', onError)
    })

    let closing = false
    child.stdout.on('data', (chunk: Buffer) => {
      handlers.onData(new Uint8Array(chunk.buffer, chunk.byteOffset, chunk.byteLength))
    })
    child.stdout.on('error', (error) => handlers.onError(error))
    child.on('error', (error) => handlers.onError(error))
    child.on('close', (code, signal) => {
      if (closing) return
      if (code !== 0 && code !== null) {
        handlers.onError(new CaptureFailedError(`${device.program} exited with code ${code}`, { code, signal }))
        return
      }
      handlers.onEnd()
    })

    return {
      close: async () => {
        closing = true
        await terminate(child, this.#killTimeoutMs)
      },
    }
  }
}

async function terminate(child: ChildProcessByStdio<null, Readable, null>, killTimeoutMs: number): Promise<void> {
  if (child.exitCode !== null || child.signalCode !== null) {
    return
  }
  const exited = new Promise<void>((resolve) => {
    child.once('exit', () => resolve())
  })
  child.kill('SIGTERM')
  const timer = setTimeout(() => {
    void logWarn('Recorder ignored SIGTERM; killing', { pid: child.pid ?? null })
    child.kill('SIGKILL')
  }, killTimeoutMs)
  try {
    await exited
  } finally {
    clearTimeout(timer)
  }
}
