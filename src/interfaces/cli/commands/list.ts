import { readdir } from 'node:fs/promises'
import { projectNameFromFile } from '../../../config/projectConfig.js'
import { isNotFoundError } from '../../../shared/fsErrors.js'
import type { CommandDeps } from './utils.js'

export async function listProjects(deps: CommandDeps): Promise<number> {
  const configPath = deps.contexts.current.config_path

  let entries: string[]
  try {
    entries = await readdir(configPath)
  } catch (error) {
    if (isNotFoundError(error)) return 0
    throw error
  }

  const names = entries
    .map(projectNameFromFile)
    .filter((name): name is string => name !== null)
    .sort()

  for (const name of names) {
    deps.io.stdout(`${name}\n`)
  }
  return 0
}
