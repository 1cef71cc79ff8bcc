import type { ContextStack } from '../../../core/context/contextStack.js'
import type { CommandResult, Runner } from '../../../core/ports/runner.js'
import type { IO } from '../io.js'

/** What every lifecycle command runs against. */
export type CommandDeps = {
  contexts: ContextStack
  runner: Runner
  io: IO
}

export async function confirm(io: IO, question: string): Promise<boolean> {
  const answer = (await io.prompt(question)).trim().toLowerCase()
  return answer === 'y' || answer === 'yes'
}

/** Writes a failed step's output to stderr and returns the exit code to use. */
export function reportFailure(io: IO, step: string, result: CommandResult): number {
  const detail = result.output.trim()
  io.stderr(detail ? `${step} failed:\n${detail}\n` : `${step} failed.\n`)
  return 1
}
