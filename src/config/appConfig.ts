import { z } from 'zod'
import { homedir } from 'node:os'
import { join } from 'node:path'
import type { ContextPaths } from '../core/context/runContext.js'

export type AppConfig = {
  telemetry: {
    sink: 'none' | 'console'
  }
  paths: ContextPaths
}

// Empty strings behave as unset so `MUXENV_CONFIGS= muxenv list` falls back to the default.
const optionalSetting = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.string().optional(),
)

const EnvSchema = z.object({
  MUXENV_TELEMETRY_SINK: z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.enum(['none', 'console']).default('none'),
  ),

  // Paths
  MUXENV_CONFIGS: optionalSetting,
  MUXENV_VIRTUALENVS: optionalSetting,

  // Executables
  MUXENV_TMUX_COMMAND: optionalSetting,
  MUXENV_VIRTUALENV_COMMAND: optionalSetting,
  EDITOR: optionalSetting,
})

export function loadAppConfig(
  env: NodeJS.ProcessEnv,
  opts?: { homeDir?: string },
): AppConfig {
  const parsed = EnvSchema.parse(env)
  const home = opts?.homeDir ?? homedir()

  const config: AppConfig = {
    telemetry: {
      sink: parsed.MUXENV_TELEMETRY_SINK,
    },
    paths: {
      editor: parsed.EDITOR ?? null,
      configPath: parsed.MUXENV_CONFIGS ?? join(home, '.muxenv'),
      virtualenvsPath: parsed.MUXENV_VIRTUALENVS ?? join(home, '.virtualenvs'),
      tmuxCommand: parsed.MUXENV_TMUX_COMMAND ?? 'tmux',
      virtualenvCommand: parsed.MUXENV_VIRTUALENV_COMMAND ?? 'virtualenv',
    },
  }

  return config
}
