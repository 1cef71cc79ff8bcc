import type { IO } from './io.js'
import { parseInvocation } from './parseArgs.js'
import { dispatch, type LifecycleOperations } from './dispatch.js'
import { loadAppConfig } from '../../config/appConfig.js'
import { loadProjectConfig } from '../../config/projectConfig.js'
import { createBaseContext } from '../../core/context/runContext.js'
import { ContextStack } from '../../core/context/contextStack.js'
import { ConsoleTelemetrySink, NoopTelemetrySink, type TelemetrySink } from '../../core/ports/telemetry.js'
import type { Runner } from '../../core/ports/runner.js'
import { CommandRunner } from '../../infrastructure/exec/commandRunner.js'
import type { CommandDeps } from './commands/utils.js'
import { listProjects } from './commands/list.js'
import { startProject } from './commands/start.js'
import { editProject } from './commands/edit.js'
import { rebuildProject } from './commands/rebuild.js'
import { deleteProject } from './commands/delete.js'

/**
 * CLI adapter: parse arguments → build the base context → dispatch one
 * lifecycle operation.
 *
 * This is the only place engine errors are caught: the message goes to
 * stderr and the exit code is 1.
 */
export async function runCli(opts: {
  argv: string[]
  env: NodeJS.ProcessEnv
  io: IO
  homeDir?: string
  /** Replaces the subprocess runner; tests pass a recording fake. */
  createRunner?: (contexts: ContextStack) => Runner
}): Promise<number> {
  const { argv, env, io } = opts

  try {
    const invocation = await parseInvocation(argv, io)
    if (!invocation) return 0

    const config = loadAppConfig(env, { homeDir: opts.homeDir })
    const telemetry: TelemetrySink =
      config.telemetry.sink === 'console' ? new ConsoleTelemetrySink() : new NoopTelemetrySink()
    const contexts = new ContextStack(createBaseContext(config.paths), { telemetry })
    const runner = opts.createRunner
      ? opts.createRunner(contexts)
      : new CommandRunner({ contexts, telemetry, trace: (line) => io.stdout(`${line}\n`) })

    return await dispatch(invocation, {
      contexts,
      operations: createLifecycleOperations({ contexts, runner, io }),
      loadProjectConfig: (path) =>
        loadProjectConfig(path, { virtualenvsPath: contexts.current.virtualenvs_path, homeDir: opts.homeDir }),
    })
  } catch (err) {
    io.stderr(`${err instanceof Error ? err.message : String(err)}\n`)
    return 1
  }
}

export function createLifecycleOperations(deps: CommandDeps): LifecycleOperations {
  return {
    list: () => listProjects(deps),
    start: (projectName) => startProject(projectName, deps),
    edit: (projectName, configFile) => editProject(projectName, configFile, deps),
    rebuild: (projectName) => rebuildProject(projectName, deps),
    delete: (projectName) => deleteProject(projectName, deps),
  }
}
