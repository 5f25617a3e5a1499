import { logDebug, logWarn } from '../logging/logger'

export interface TelemetryEvent {
  type:
    | 'throughput'
    | 'chunks-dropped'
    | 'export-completed'
    | 'export-failed'
    | 'capture-state'
  payload: Record<string, unknown>
  timestamp: number
}

export interface TelemetrySink {
  record(event: TelemetryEvent): void
  flush(): Promise<void>
}

/** Forwards events to the session log; failures are logged at warn level. */
export class LoggingTelemetrySink implements TelemetrySink {
  #pending: Promise<void> = Promise.resolve()

  record(event: TelemetryEvent): void {
    const write = event.type === 'export-failed' ? logWarn : logDebug
    this.#pending = this.#pending.then(() => write(`[Telemetry] ${event.type}`, event.payload))
  }

  async flush(): Promise<void> {
    await this.#pending
  }
}

export class MemoryTelemetrySink implements TelemetrySink {
  readonly events: TelemetryEvent[] = []
  flushCount = 0

  record(event: TelemetryEvent): void {
    this.events.push(event)
  }

  async flush(): Promise<void> {
    this.flushCount += 1
  }

  ofType(type: TelemetryEvent['type']): TelemetryEvent[] {
    return this.events.filter((event) => event.type === type)
  }
}

export const telemetrySink: TelemetrySink = new LoggingTelemetrySink()
