import { randomUUID } from 'node:crypto'
import { readFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, describe, expect, it, vi } from 'vitest'
import {
  JsonlFileLogSink,
  MemoryLogSink,
  getActiveLogSession,
  initializeLogger,
  logDebug,
  logInfo,
  logWarn,
  shutdownLogger,
  type LogSink,
} from '../../src/modules/logging/logger'

describe('logger', () => {
  const directory = join(tmpdir(), `sgram-logs-${randomUUID()}`)

  afterEach(async () => {
    await shutdownLogger()
    vi.restoreAllMocks()
    await rm(directory, { recursive: true, force: true })
  })

  it('tags every entry with the active session', async () => {
    const sink = new MemoryLogSink()
    const session = await initializeLogger(sink)
    await logInfo('Engine starting', { fftSize: 1024 })

    expect(sink.entries.map((entry) => entry.message)).toEqual(['Logger initialised', 'Engine starting'])
    expect(sink.entries.every((entry) => entry.sessionId === session.id)).toBe(true)
    expect(sink.entries[1].details).toEqual({ fftSize: 1024 })
  })

  it('keeps the first session when initialised twice', async () => {
    const first = await initializeLogger(new MemoryLogSink())
    const second = await initializeLogger(new MemoryLogSink())
    expect(second.id).toBe(first.id)
  })

  it('drops entries below the configured level', async () => {
    const sink = new MemoryLogSink()
    await initializeLogger(sink, { level: 'warn' })
    await logDebug('noise')
    await logInfo('chatter')
    await logWarn('queue overflow')
    expect(sink.entries.map((entry) => [entry.level, entry.message])).toEqual([['warn', 'queue overflow']])
  })

  it('closes the session on shutdown and ignores later entries', async () => {
    const sink = new MemoryLogSink()
    await initializeLogger(sink)
    await shutdownLogger()
    await logInfo('too late')

    expect(getActiveLogSession()).toBeNull()
    expect(sink.entries.at(-1)?.message).toBe('Logger shutting down')
    expect(sink.closedSessions).toHaveLength(1)
    expect(typeof sink.closedSessions[0].endedAt).toBe('number')
  })

  it('warns instead of throwing when the sink fails', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const failing: LogSink = {
      append: async () => {
        throw new Error('disk full')
      },
      close: async () => {},
    }
    await initializeLogger(failing)
    await expect(logInfo('still running')).resolves.toBeUndefined()
    expect(warn).toHaveBeenCalledWith('[Logger] Failed to persist log entry', expect.any(Error))
  })

  it('appends one JSON document per line to a file', async () => {
    const path = join(directory, 'nested', 'sgram.jsonl')
    await initializeLogger(new JsonlFileLogSink(path))
    await logInfo('Export completed', { kind: 'image' })
    await shutdownLogger()

    const lines = (await readFile(path, 'utf8')).trimEnd().split('\n')
    expect(lines).toHaveLength(3)
    expect(JSON.parse(lines[1])).toMatchObject({ level: 'info', message: 'Export completed', details: { kind: 'image' } })
  })
})
