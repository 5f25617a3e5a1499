import { appendFile, mkdir } from 'node:fs/promises'
import { dirname } from 'node:path'
import { randomUUID } from 'node:crypto'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface LogSessionRecord {
  id: string
  startedAt: number
  endedAt?: number
}

export interface LogEntryRecord {
  sessionId: string
  timestamp: number
  level: LogLevel
  message: string
  details?: Record<string, unknown>
}

export interface LogSink {
  append(entry: LogEntryRecord): Promise<void>
  close(session: LogSessionRecord): Promise<void>
}

/** Appends one JSON document per line; the parent directory is created on first write. */
export class JsonlFileLogSink implements LogSink {
  #path: string
  #directoryReady: Promise<unknown> | null = null

  constructor(path: string) {
    this.#path = path
  }

  get path(): string {
    return this.#path
  }

  async append(entry: LogEntryRecord): Promise<void> {
    this.#directoryReady ??= mkdir(dirname(this.#path), { recursive: true })
    await this.#directoryReady
    await appendFile(this.#path, `${JSON.stringify(entry)}\n`, 'utf8')
  }

  async close(): Promise<void> {
    this.#directoryReady = null
  }
}

export class MemoryLogSink implements LogSink {
  readonly entries: LogEntryRecord[] = []
  readonly closedSessions: LogSessionRecord[] = []

  async append(entry: LogEntryRecord): Promise<void> {
    this.entries.push(entry)
  }

  async close(session: LogSessionRecord): Promise<void> {
    this.closedSessions.push(session)
  }
}

let activeSession: LogSessionRecord | null = null
let activeSink: LogSink | null = null
let minimumLevel: LogLevel = 'debug'

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 }

export async function initializeLogger(
  sink: LogSink,
  options: { level?: LogLevel } = {},
): Promise<LogSessionRecord> {
  if (!activeSession) {
    activeSink = sink
    minimumLevel = options.level ?? 'debug'
    activeSession = { id: randomUUID(), startedAt: Date.now() }
    await logInfo('Logger initialised')
  }
  return activeSession
}

export async function shutdownLogger(): Promise<void> {
  if (activeSession && activeSink) {
    await logInfo('Logger shutting down')
    const finished: LogSessionRecord = { ...activeSession, endedAt: Date.now() }
    const sink = activeSink
    activeSession = null
    activeSink = null
    try {
      await sink.close(finished)
    } catch (error) {
      console.warn('[Logger] Failed to close log sink', error)
    }
  }
}

export async function log(level: LogLevel, message: string, details?: Record<string, unknown>): Promise<void> {
  if (!activeSession || !activeSink) return
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel]) return
  try {
    await activeSink.append({
      sessionId: activeSession.id,
      timestamp: Date.now(),
      level,
      message,
      details,
    })
  } catch (error) {
    console.warn('[Logger] Failed to persist log entry', error)
  }
}

export function logDebug(message: string, details?: Record<string, unknown>): Promise<void> {
  return log('debug', message, details)
}

export function logInfo(message: string, details?: Record<string, unknown>): Promise<void> {
  return log('info', message, details)
}

export function logWarn(message: string, details?: Record<string, unknown>): Promise<void> {
  return log('warn', message, details)
}

export function logError(message: string, details?: Record<string, unknown>): Promise<void> {
  return log('error', message, details)
}

export function getActiveLogSession(): LogSessionRecord | null {
  return activeSession
}
