export type TelemetryEvent =
  | {
      type: 'command_finished'
      payload: { argv: string[]; ok: boolean; exitCode: number | null; durationMs: number }
    }
  | {
      type: 'context_entered'
      payload: { depth: number; keys: string[] }
    }
  | {
      type: 'context_exited'
      payload: { depth: number }
    }

export interface TelemetrySink {
  emit(event: TelemetryEvent): void
}

export class NoopTelemetrySink implements TelemetrySink {
  emit(_event: TelemetryEvent): void {}
}

/** Writes one JSON line per event to stderr so stdout stays free for command output. */
export class ConsoleTelemetrySink implements TelemetrySink {
  emit(event: TelemetryEvent): void {
    console.error(JSON.stringify({ ts: Date.now(), ...event }))
  }
}
