import { reportFailure, type CommandDeps } from './utils.js'

export const CREATE_VIRTUALENV =
  '{virtualenv_command} -p {virtualenv_python_binary} {virtualenv_use_site_packages} {virtualenv_path}'
export const REMOVE_VIRTUALENV = 'rm -rf {virtualenv_path}'

/** Creates `{virtualenv_path}`; returns 0 or the failure exit code. */
export async function createVirtualenv(deps: CommandDeps): Promise<number> {
  const result = await deps.runner.run(CREATE_VIRTUALENV)
  if (!result.ok) return reportFailure(deps.io, 'Creating virtualenv', result)
  return 0
}

export async function removeVirtualenv(deps: CommandDeps): Promise<number> {
  const result = await deps.runner.run(REMOVE_VIRTUALENV)
  if (!result.ok) return reportFailure(deps.io, 'Removing virtualenv', result)
  return 0
}
