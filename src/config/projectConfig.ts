import { readFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { dirname, join, resolve } from 'node:path'
import { parse as parseYaml } from 'yaml'
import { z } from 'zod'
import {
  NO_SITE_PACKAGES,
  SYSTEM_SITE_PACKAGES,
  type ContextOverrides,
  type WindowDefinition,
} from '../core/context/runContext.js'
import { ProjectConfigError } from '../core/errors.js'
import { isNotFoundError } from '../shared/fsErrors.js'

// ============================================================================
// Schema
// ============================================================================

const ScalarSchema = z.union([z.string(), z.number(), z.boolean()])

// A key whose entries are all commented out parses as null.
function nullAsUnset<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === null ? undefined : value), schema)
}

// The session name doubles as the virtualenv directory name, and tmux rewrites
// "." and ":" in session names.
export const SessionNameSchema = z
  .string()
  .min(1)
  .regex(/^[^/.:]+$/, 'must not contain "/", "." or ":"')

export const WindowSchema = z.object({
  name: z.string().min(1),
  layout: z.string().min(1).optional(),
  panes: nullAsUnset(z.array(z.string()).default([])),
}).strict()

export const ProjectFileSchema = z.object({
  session_name: SessionNameSchema,
  project_root: z.string().min(1).optional(),
  environment: nullAsUnset(z.record(ScalarSchema).default({})),
  windows: nullAsUnset(z.array(WindowSchema).default([])),
  virtualenv: z.object({
    python_binary: z.string().min(1).optional(),
    use_site_packages: z.boolean().default(false),
  }).strict().nullable().optional(),
}).strict()

export type ProjectFile = z.infer<typeof ProjectFileSchema>

// ============================================================================
// Paths
// ============================================================================

export const PROJECT_FILE_EXTENSION = '.yml'

export function projectConfigPath(configPath: string, projectName: string): string {
  return join(configPath, `${projectName}${PROJECT_FILE_EXTENSION}`)
}

export function projectNameFromFile(fileName: string): string | null {
  if (!fileName.endsWith(PROJECT_FILE_EXTENSION)) return null
  const name = fileName.slice(0, -PROJECT_FILE_EXTENSION.length)
  return name.length > 0 ? name : null
}

export function expandHome(path: string, home: string): string {
  if (path === '~') return home
  if (path.startsWith('~/')) return join(home, path.slice(2))
  return path
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Reads and validates a project file and flattens it into context overrides.
 *
 * @throws {ProjectConfigError} when the file is missing, unreadable, not YAML,
 * or does not match {@link ProjectFileSchema}
 */
export async function loadProjectConfig(
  path: string,
  opts: { virtualenvsPath: string; homeDir?: string },
): Promise<ContextOverrides> {
  let raw: string
  try {
    raw = await readFile(path, 'utf8')
  } catch (error) {
    if (isNotFoundError(error)) {
      throw new ProjectConfigError(path, 'no such project configuration', { cause: error })
    }
    throw new ProjectConfigError(path, 'unable to read project configuration', { cause: error })
  }

  let document: unknown
  try {
    document = parseYaml(raw)
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error)
    throw new ProjectConfigError(path, `invalid YAML: ${detail}`, { cause: error })
  }

  const parsed = ProjectFileSchema.safeParse(document ?? {})
  if (!parsed.success) {
    throw new ProjectConfigError(path, `invalid project configuration: ${formatIssues(parsed.error)}`)
  }

  return toContextOverrides(path, parsed.data, {
    virtualenvsPath: opts.virtualenvsPath,
    home: opts.homeDir ?? homedir(),
  })
}

export function toContextOverrides(
  path: string,
  file: ProjectFile,
  opts: { virtualenvsPath: string; home: string },
): ContextOverrides {
  const environment: { [name: string]: string } = {}
  for (const [name, value] of Object.entries(file.environment)) {
    environment[name] = String(value)
  }

  const windows: WindowDefinition[] = file.windows.map((window) => ({
    name: window.name,
    layout: window.layout ?? null,
    panes: window.panes,
  }))

  const virtualenv = file.virtualenv ?? null
  const virtualenvPath = virtualenv ? virtualenvPathFor(path, file.session_name, opts.virtualenvsPath) : null

  return {
    config_file_name: path,
    project_root: expandHome(file.project_root ?? '~', opts.home),
    session_name: file.session_name,
    virtualenv_configured: virtualenv !== null,
    virtualenv_path: virtualenvPath,
    virtualenv_python_binary: virtualenv ? virtualenv.python_binary ?? 'python3' : null,
    virtualenv_use_site_packages: virtualenv?.use_site_packages ? SYSTEM_SITE_PACKAGES : NO_SITE_PACKAGES,
    environment,
    windows,
  }
}

/**
 * `{virtualenvs_path}/{session_name}`. `rebuild` and `delete` remove this
 * directory recursively, so it must be a direct child of the virtualenvs
 * directory.
 */
function virtualenvPathFor(path: string, sessionName: string, virtualenvsPath: string): string {
  const virtualenvPath = join(virtualenvsPath, sessionName)
  if (dirname(resolve(virtualenvPath)) !== resolve(virtualenvsPath)) {
    throw new ProjectConfigError(path, `session_name "${sessionName}" does not name a directory inside ${virtualenvsPath}`)
  }
  return virtualenvPath
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ')
}
