import { confirm, type CommandDeps } from './utils.js'
import { createVirtualenv, removeVirtualenv } from './virtualenv.js'

export async function rebuildProject(projectName: string, deps: CommandDeps): Promise<number> {
  const { io } = deps
  if (!deps.contexts.current.virtualenv_configured) {
    io.stderr(`${projectName} has no virtualenv configured\n`)
    return 1
  }

  if (!(await confirm(io, `Delete and recreate the virtualenv for ${projectName}? [y/N] `))) {
    io.stdout('Aborted.\n')
    return 0
  }

  const removed = await removeVirtualenv(deps)
  if (removed !== 0) return removed
  return createVirtualenv(deps)
}
