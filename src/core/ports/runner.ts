/**
 * Runner port: how lifecycle operations reach the outside world.
 *
 * Command lines are split on single spaces BEFORE templates are resolved,
 * so a placeholder may expand to a value containing spaces, but a literal
 * argument containing a space cannot be written. There is no quoting.
 */

import type { ContextBindings } from '../context/runContext.js'

export type CommandResult = {
  ok: boolean
  /** stdout on success; on failure stderr, or stdout when stderr is empty. */
  output: string
}

export interface Runner {
  /** Run to completion capturing output. Non-zero exit is reported, not thrown. */
  run(commandLine: string, extra?: ContextBindings): Promise<CommandResult>
  /** Run with the terminal attached (editor, tmux attach). Resolves to the exit code. */
  attach(commandLine: string, extra?: ContextBindings): Promise<number>
}
