/**
 * Command runner: templated subprocess execution against the live context.
 *
 * Each command line is split on single spaces, every token is resolved
 * against `contexts.current` plus per-call bindings, a `* <command>` trace
 * line is written, and the executable is started directly (no shell).
 *
 * Failure channels are kept apart:
 * - non-zero exit or signal → `{ ok: false, output }` / exit code
 * - unresolvable template → MissingBindingError (thrown)
 * - executable missing or not runnable → CommandLaunchError (thrown)
 *
 * There is no timeout: a hung child hangs the caller.
 */

import { execFile, spawn } from 'node:child_process'
import type { ContextBindings } from '../../core/context/runContext.js'
import type { ContextStack } from '../../core/context/contextStack.js'
import type { CommandResult, Runner } from '../../core/ports/runner.js'
import { NoopTelemetrySink, type TelemetrySink } from '../../core/ports/telemetry.js'
import { resolveTemplate } from '../../core/template/resolveTemplate.js'
import { CommandLaunchError } from '../../core/errors.js'

const DEFAULT_MAX_BUFFER = 16 * 1024 * 1024

export type CommandRunnerOptions = {
  contexts: ContextStack
  /** Receives the trace line for every command before it starts. */
  trace: (line: string) => void
  telemetry?: TelemetrySink
  maxBuffer?: number
}

export function splitCommandLine(commandLine: string): string[] {
  return commandLine.split(' ')
}

export class CommandRunner implements Runner {
  readonly #contexts: ContextStack
  readonly #trace: (line: string) => void
  readonly #telemetry: TelemetrySink
  readonly #maxBuffer: number

  constructor(opts: CommandRunnerOptions) {
    this.#contexts = opts.contexts
    this.#trace = opts.trace
    this.#telemetry = opts.telemetry ?? new NoopTelemetrySink()
    this.#maxBuffer = opts.maxBuffer ?? DEFAULT_MAX_BUFFER
  }

  /** Split and resolve without running anything. */
  resolve(commandLine: string, extra: ContextBindings = {}): string[] {
    const context = this.#contexts.current
    return splitCommandLine(commandLine).map((token) => resolveTemplate(token, context, extra))
  }

  async run(commandLine: string, extra: ContextBindings = {}): Promise<CommandResult> {
    const [file, ...args] = this.#prepare(commandLine, extra)
    const startedAt = Date.now()

    const result = await new Promise<CommandResult & { exitCode: number | null }>((resolve, reject) => {
      execFile(file, args, { encoding: 'utf8', maxBuffer: this.#maxBuffer }, (error, stdout, stderr) => {
        if (!error) {
          resolve({ ok: true, output: stdout, exitCode: 0 })
          return
        }
        const code: unknown = error.code
        // Spawn failures carry an errno string (ENOENT, EACCES); exits carry a number.
        if (typeof code === 'string' && isLaunchFailure(code)) {
          reject(new CommandLaunchError(file, { cause: error }))
          return
        }
        resolve({
          ok: false,
          output: stderr.length > 0 ? stderr : stdout,
          exitCode: typeof code === 'number' ? code : null,
        })
      })
    })

    this.#telemetry.emit({
      type: 'command_finished',
      payload: { argv: [file, ...args], ok: result.ok, exitCode: result.exitCode, durationMs: Date.now() - startedAt },
    })
    return { ok: result.ok, output: result.output }
  }

  async attach(commandLine: string, extra: ContextBindings = {}): Promise<number> {
    const [file, ...args] = this.#prepare(commandLine, extra)
    const startedAt = Date.now()

    const exitCode = await new Promise<number>((resolve, reject) => {
      const child = spawn(file, args, { stdio: 'inherit' })
      child.once('error', (error) => {
        reject(new CommandLaunchError(file, { cause: error }))
      })
      child.once('close', (code) => {
        resolve(code ?? 1)
      })
    })

    this.#telemetry.emit({
      type: 'command_finished',
      payload: { argv: [file, ...args], ok: exitCode === 0, exitCode, durationMs: Date.now() - startedAt },
    })
    return exitCode
  }

  #prepare(commandLine: string, extra: ContextBindings): [string, ...string[]] {
    const [file = '', ...args] = this.resolve(commandLine, extra)
    if (file === '') throw new CommandLaunchError(commandLine)
    this.#trace(`* ${[file, ...args].join(' ')}`)
    return [file, ...args]
  }
}

function isLaunchFailure(code: string): boolean {
  return code === 'ENOENT' || code === 'EACCES' || code === 'EPERM' || code === 'ENOEXEC'
}
