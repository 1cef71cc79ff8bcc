import { confirm, reportFailure, type CommandDeps } from './utils.js'
import { removeVirtualenv } from './virtualenv.js'

export async function deleteProject(projectName: string, deps: CommandDeps): Promise<number> {
  const { io, runner, contexts } = deps
  const question = contexts.current.virtualenv_configured
    ? `Delete ${projectName} and its virtualenv? [y/N] `
    : `Delete ${projectName}? [y/N] `

  if (!(await confirm(io, question))) {
    io.stdout('Aborted.\n')
    return 0
  }

  if (contexts.current.virtualenv_configured) {
    const removed = await removeVirtualenv(deps)
    if (removed !== 0) return removed
  }

  const result = await runner.run('rm {config_file_name}')
  if (!result.ok) return reportFailure(io, 'Removing configuration', result)

  io.stdout(`Deleted ${projectName}.\n`)
  return 0
}
