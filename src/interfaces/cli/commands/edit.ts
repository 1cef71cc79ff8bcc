import { existsSync } from 'node:fs'
import { mkdir, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { renderProjectTemplate } from './templates.js'
import type { CommandDeps } from './utils.js'

/**
 * Opens the project's file in `$EDITOR`, writing a starter template first
 * when the project does not exist yet. Needs the path only, never the
 * parsed contents, so it works on files that do not validate.
 *
 * `$EDITOR` may carry arguments (`code --wait`); it is split on spaces like
 * any other command line.
 */
export async function editProject(projectName: string, configFile: string, deps: CommandDeps): Promise<number> {
  const { io, runner } = deps
  const editor = deps.contexts.current.editor?.split(' ').filter((word) => word.length > 0) ?? []
  if (editor.length === 0) {
    io.stderr('EDITOR is not set\n')
    return 1
  }

  if (!existsSync(configFile)) {
    await mkdir(dirname(configFile), { recursive: true })
    await writeFile(configFile, renderProjectTemplate(projectName), 'utf8')
    io.stdout(`Created ${configFile}\n`)
  }

  const bindings: { [key: string]: string } = { config_file_name: configFile }
  const placeholders = editor.map((word, index) => {
    bindings[`editor_${index}`] = word
    return `{editor_${index}}`
  })
  return runner.attach(`${placeholders.join(' ')} {config_file_name}`, bindings)
}
