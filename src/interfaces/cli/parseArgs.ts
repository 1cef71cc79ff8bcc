import yargs, { type Argv } from 'yargs'
import { UsageError } from '../../core/errors.js'
import type { IO } from './io.js'
import type { Invocation, ProjectCommand } from './dispatch.js'

export const USAGE = `A tmux session manager with optional virtualenv support.

Usage:
  muxenv list
  muxenv edit my-project
  muxenv rebuild my-project
  muxenv delete my-project
  muxenv my-project`

const PROJECT_COMMANDS: ReadonlyArray<{ command: Exclude<ProjectCommand, 'start'>; description: string }> = [
  { command: 'edit', description: "Edit a project's configuration" },
  { command: 'rebuild', description: "Delete a project's virtualenv and create a new one" },
  { command: 'delete', description: "Delete a project's virtualenv and configuration" },
]

/**
 * Turns raw arguments into an {@link Invocation}.
 *
 * A single bare argument is a project to start, except the literal `list`.
 * Anything else must be `<edit|rebuild|delete> <project>`.
 *
 * Resolves to `null` when yargs handled the request itself (`--help`); the
 * help text goes to `io.stdout`.
 *
 * @throws {UsageError} after printing usage to stderr
 */
export async function parseInvocation(argv: string[], io: IO): Promise<Invocation | null> {
  let invocation: Invocation | null = null

  const parser: Argv = yargs()
    .scriptName('muxenv')
    .usage(USAGE)
    .strict()
    .help()
    .version(false)
    .exitProcess(false)
    .showHelpOnFail(false)
    .fail((message, error, y) => {
      if (error) throw error
      y.showHelp((text) => io.stderr(`${text}\n`))
      throw new UsageError(message)
    })

  if (argv.length === 1) {
    parser.command(
      '$0 <project>',
      'Start or attach to a project session',
      (y) => y.positional('project', { type: 'string', demandOption: true }),
      (args) => {
        invocation = args.project === 'list'
          ? { command: 'list' }
          : { command: 'start', projectName: args.project }
      },
    )
  } else {
    for (const { command, description } of PROJECT_COMMANDS) {
      parser.command(
        `${command} <project>`,
        description,
        (y) => y.positional('project', { type: 'string', demandOption: true }),
        (args) => {
          invocation = { command, projectName: args.project }
        },
      )
    }
    parser.demandCommand(1, 'Specify a command or a project name')
  }

  // With a parse callback yargs hands its output over instead of printing it.
  await parser.parseAsync(argv, {}, (error, _args, output) => {
    if (!error && output) io.stdout(`${output}\n`)
  })
  return invocation
}
