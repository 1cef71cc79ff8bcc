import type { ContextBindings } from '../../src/core/context/runContext.js'
import type { ContextStack } from '../../src/core/context/contextStack.js'
import type { CommandResult, Runner } from '../../src/core/ports/runner.js'
import { resolveTemplate } from '../../src/core/template/resolveTemplate.js'
import { splitCommandLine } from '../../src/infrastructure/exec/commandRunner.js'

export type RecordedCall = { mode: 'run' | 'attach'; argv: string[] }

/**
 * In-process Runner: resolves command lines exactly like CommandRunner but
 * records them instead of spawning anything.
 */
export class RecordingRunner implements Runner {
  readonly calls: RecordedCall[] = []

  constructor(
    private readonly contexts: ContextStack,
    private readonly respond: (argv: string[]) => CommandResult = () => ({ ok: true, output: '' }),
    private readonly attachExitCode = 0,
  ) {}

  async run(commandLine: string, extra: ContextBindings = {}): Promise<CommandResult> {
    const argv = this.resolve(commandLine, extra)
    this.calls.push({ mode: 'run', argv })
    return this.respond(argv)
  }

  async attach(commandLine: string, extra: ContextBindings = {}): Promise<number> {
    this.calls.push({ mode: 'attach', argv: this.resolve(commandLine, extra) })
    return this.attachExitCode
  }

  /** Resolved commands joined with spaces, for compact assertions. */
  get lines(): string[] {
    return this.calls.map((call) => call.argv.join(' '))
  }

  private resolve(commandLine: string, extra: ContextBindings): string[] {
    const context = this.contexts.current
    return splitCommandLine(commandLine).map((token) => resolveTemplate(token, context, extra))
  }
}
