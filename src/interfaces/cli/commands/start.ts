import { existsSync } from 'node:fs'
import type { ContextBindings, RunContext, WindowDefinition } from '../../../core/context/runContext.js'
import { resolveTemplate } from '../../../core/template/resolveTemplate.js'
import { reportFailure, type CommandDeps } from './utils.js'
import { createVirtualenv } from './virtualenv.js'

export type SessionStep = {
  label: string
  command: string
  bindings: ContextBindings
}

const TMUX = '{tmux_command}'
const ACTIVATE_VIRTUALENV = 'source {virtualenv_path}/bin/activate'

/**
 * Starts the project's tmux session, or attaches when it is already running.
 *
 * Each build step is run in order and the first failure stops the build;
 * a partly built session is left for the user to inspect.
 */
export async function startProject(projectName: string, deps: CommandDeps): Promise<number> {
  const { runner, io, contexts } = deps

  const existing = await runner.run(`${TMUX} has-session -t {session_name}`)
  if (existing.ok) {
    return runner.attach(`${TMUX} attach-session -t {session_name}`)
  }

  const context = contexts.current
  if (context.virtualenv_configured && context.virtualenv_path && !existsSync(context.virtualenv_path)) {
    io.stdout(`Creating virtualenv for ${projectName}...\n`)
    const created = await createVirtualenv(deps)
    if (created !== 0) return created
  }

  for (const step of buildSessionSteps(context)) {
    const result = await runner.run(step.command, step.bindings)
    if (!result.ok) return reportFailure(io, step.label, result)
  }

  return runner.attach(`${TMUX} attach-session -t {session_name}`)
}

/**
 * Plans the tmux calls that build a fresh session.
 *
 * Values that may contain spaces (pane commands, environment entries) travel
 * as per-step bindings so each expands inside a single argument.
 */
export function buildSessionSteps(context: RunContext): SessionStep[] {
  const envBindings: Record<string, string> = {}
  const envFlags: string[] = []
  const steps: SessionStep[] = []

  Object.entries(context.environment).forEach(([name, value], index) => {
    envBindings[`env_${index}`] = `${name}=${value}`
    envFlags.push(`-e {env_${index}}`)
  })
  const withEnv = (command: string): string => [command, ...envFlags].join(' ')

  const [first, ...rest] = context.windows
  const firstWindowFlag = first ? ' -n {window}' : ''
  steps.push({
    label: 'Creating session',
    command: withEnv(`${TMUX} new-session -d -s {session_name} -c {project_root}${firstWindowFlag}`),
    bindings: first ? { ...envBindings, window: first.name } : envBindings,
  })

  Object.entries(context.environment).forEach(([name, value]) => {
    steps.push({
      label: `Setting ${name}`,
      command: `${TMUX} set-environment -t {session_name} {name} {value}`,
      bindings: { name, value },
    })
  })

  if (first) steps.push(...windowSteps(context, first, { created: true, withEnv, envBindings }))
  for (const window of rest) {
    steps.push(...windowSteps(context, window, { created: false, withEnv, envBindings }))
  }

  return steps
}

function windowSteps(
  context: RunContext,
  window: WindowDefinition,
  opts: { created: boolean; withEnv: (command: string) => string; envBindings: ContextBindings },
): SessionStep[] {
  const steps: SessionStep[] = []
  const target = '{session_name}:{window}'
  const bindings = { window: window.name }

  if (!opts.created) {
    steps.push({
      label: `Creating window ${window.name}`,
      command: opts.withEnv(`${TMUX} new-window -t {session_name} -n {window} -c {project_root}`),
      bindings: { ...opts.envBindings, ...bindings },
    })
  }

  // A window without panes still gets the virtualenv activated in its shell.
  const panes: Array<string | null> = window.panes.length > 0 ? window.panes : [null]
  panes.forEach((pane, index) => {
    if (index > 0) {
      steps.push({
        label: `Splitting window ${window.name}`,
        command: opts.withEnv(`${TMUX} split-window -t ${target} -c {project_root}`),
        bindings: { ...opts.envBindings, ...bindings },
      })
    }
    if (context.virtualenv_configured) {
      steps.push({
        label: `Activating virtualenv in ${window.name}`,
        command: `${TMUX} send-keys -t ${target} {keys} Enter`,
        bindings: { ...bindings, keys: resolveTemplate(ACTIVATE_VIRTUALENV, context) },
      })
    }
    if (pane !== null) {
      steps.push({
        label: `Running "${pane}" in ${window.name}`,
        command: `${TMUX} send-keys -t ${target} {keys} Enter`,
        bindings: { ...bindings, keys: pane },
      })
    }
  })

  if (window.layout) {
    steps.push({
      label: `Applying layout to ${window.name}`,
      command: `${TMUX} select-layout -t ${target} {layout}`,
      bindings: { ...bindings, layout: window.layout },
    })
  }

  return steps
}
