/**
 * Project dispatcher: one invocation → at most one lifecycle operation.
 *
 * | command | loads project file | runs inside overlay |
 * |---------|--------------------|---------------------|
 * | list    | no                 | no (base context)   |
 * | start   | yes                | yes                 |
 * | edit    | no (path only)     | no (base context)   |
 * | rebuild | yes                | yes                 |
 * | delete  | yes                | yes                 |
 */

import type { ContextOverrides } from '../../core/context/runContext.js'
import type { ContextStack } from '../../core/context/contextStack.js'
import { projectConfigPath } from '../../config/projectConfig.js'

export type LifecycleCommand = 'list' | 'start' | 'edit' | 'rebuild' | 'delete'

export type ProjectCommand = Exclude<LifecycleCommand, 'list'>

export type Invocation =
  | { command: 'list' }
  | { command: ProjectCommand; projectName: string }

export interface LifecycleOperations {
  list(): Promise<number>
  start(projectName: string): Promise<number>
  edit(projectName: string, configFile: string): Promise<number>
  rebuild(projectName: string): Promise<number>
  delete(projectName: string): Promise<number>
}

export type DispatchDeps = {
  contexts: ContextStack
  operations: LifecycleOperations
  /** Reads a project file into overlay keys; its errors propagate untouched. */
  loadProjectConfig: (path: string) => Promise<ContextOverrides>
}

export async function dispatch(invocation: Invocation, deps: DispatchDeps): Promise<number> {
  const { contexts, operations } = deps
  if (invocation.command === 'list') {
    return operations.list()
  }

  const { command, projectName } = invocation
  const configFile = projectConfigPath(contexts.current.config_path, projectName)

  switch (command) {
    case 'edit':
      return operations.edit(projectName, configFile)
    case 'start':
    case 'rebuild':
    case 'delete': {
      const overrides = await deps.loadProjectConfig(configFile)
      return contexts.withContext(overrides, () => runProjectCommand(command, projectName, operations))
    }
    default:
      return assertNever(command)
  }
}

function runProjectCommand(
  command: 'start' | 'rebuild' | 'delete',
  projectName: string,
  operations: LifecycleOperations,
): Promise<number> {
  switch (command) {
    case 'start':
      return operations.start(projectName)
    case 'rebuild':
      return operations.rebuild(projectName)
    case 'delete':
      return operations.delete(projectName)
    default:
      return assertNever(command)
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled lifecycle command: ${String(value)}`)
}
