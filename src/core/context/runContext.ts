/**
 * Run context: the key/value environment that command templates resolve against.
 *
 * The base context carries process-wide paths read from the environment.
 * Project overlays add the per-project fields below plus any extra keys the
 * caller needs; the key set is open.
 */

export type ContextValue =
  | string
  | number
  | boolean
  | null
  | readonly ContextValue[]
  | { readonly [key: string]: ContextValue }

export type ContextBindings = { readonly [key: string]: ContextValue }

export type WindowDefinition = {
  name: string
  layout: string | null
  panes: string[]
}

export type RunContextFields = {
  editor: string | null
  config_path: string
  virtualenvs_path: string
  tmux_command: string
  virtualenv_command: string

  config_file_name: string | null
  project_root: string | null
  session_name: string | null
  virtualenv_configured: boolean
  virtualenv_path: string | null
  virtualenv_python_binary: string | null
  virtualenv_use_site_packages: string

  // Read by lifecycle operations rather than substituted into templates.
  environment: { [name: string]: string }
  windows: WindowDefinition[]
}

export type RunContext = Readonly<RunContextFields> & ContextBindings

/** Overlay keys: known fields keep their types, anything else is a plain binding. */
export type ContextOverrides = Partial<RunContextFields> & ContextBindings

export type ContextPaths = {
  editor: string | null
  configPath: string
  virtualenvsPath: string
  tmuxCommand: string
  virtualenvCommand: string
}

export const NO_SITE_PACKAGES = '--no-site-packages'
export const SYSTEM_SITE_PACKAGES = '--system-site-packages'

export function createBaseContext(paths: ContextPaths): RunContext {
  const base: RunContext = {
    editor: paths.editor,
    config_path: paths.configPath,
    virtualenvs_path: paths.virtualenvsPath,
    tmux_command: paths.tmuxCommand,
    virtualenv_command: paths.virtualenvCommand,

    config_file_name: null,
    project_root: null,
    session_name: null,
    virtualenv_configured: false,
    virtualenv_path: null,
    virtualenv_python_binary: null,
    virtualenv_use_site_packages: NO_SITE_PACKAGES,

    environment: {},
    windows: [],
  }
  return Object.freeze(base)
}
