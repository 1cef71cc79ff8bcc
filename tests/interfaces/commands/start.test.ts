import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { ContextStack } from '../../../src/core/context/contextStack.js'
import type { ContextOverrides } from '../../../src/core/context/runContext.js'
import { buildSessionSteps, startProject } from '../../../src/interfaces/cli/commands/start.js'
import { RecordingRunner } from '../../helpers/recordingRunner.js'
import { createTestIO } from '../../helpers/testIO.js'
import { testBaseContext } from '../../helpers/baseContext.js'

const project: ContextOverrides = {
  config_file_name: '/home/test/.muxenv/web.yml',
  session_name: 'web',
  project_root: '/srv/web',
  environment: { PORT: '8080' },
  windows: [
    { name: 'editor', layout: null, panes: ['vim .'] },
    { name: 'servers', layout: 'tiled', panes: ['npm start', 'redis-server'] },
  ],
}

describe('buildSessionSteps', () => {
  it('plans session, environment, windows, panes and layouts in order', async () => {
    const contexts = new ContextStack(testBaseContext())
    const runner = new RecordingRunner(contexts)

    await contexts.withContext(project, async (context) => {
      for (const step of buildSessionSteps(context)) {
        await runner.run(step.command, step.bindings)
      }
    })

    expect(runner.calls.map((call) => call.argv)).toEqual([
      ['tmux', 'new-session', '-d', '-s', 'web', '-c', '/srv/web', '-n', 'editor', '-e', 'PORT=8080'],
      ['tmux', 'set-environment', '-t', 'web', 'PORT', '8080'],
      ['tmux', 'send-keys', '-t', 'web:editor', 'vim .', 'Enter'],
      ['tmux', 'new-window', '-t', 'web', '-n', 'servers', '-c', '/srv/web', '-e', 'PORT=8080'],
      ['tmux', 'send-keys', '-t', 'web:servers', 'npm start', 'Enter'],
      ['tmux', 'split-window', '-t', 'web:servers', '-c', '/srv/web', '-e', 'PORT=8080'],
      ['tmux', 'send-keys', '-t', 'web:servers', 'redis-server', 'Enter'],
      ['tmux', 'select-layout', '-t', 'web:servers', 'tiled'],
    ])
  })

  it('activates the virtualenv in every pane, including empty windows', async () => {
    const contexts = new ContextStack(testBaseContext())
    const runner = new RecordingRunner(contexts)

    await contexts.withContext(
      {
        session_name: 'py',
        project_root: '/srv/py',
        virtualenv_configured: true,
        virtualenv_path: '/venvs/py',
        windows: [{ name: 'shell', layout: null, panes: [] }],
      },
      async (context) => {
        for (const step of buildSessionSteps(context)) {
          await runner.run(step.command, step.bindings)
        }
      },
    )

    expect(runner.lines).toEqual([
      'tmux new-session -d -s py -c /srv/py -n shell',
      'tmux send-keys -t py:shell source /venvs/py/bin/activate Enter',
    ])
    expect(runner.calls[1]?.argv[4]).toBe('source /venvs/py/bin/activate')
  })

  it('creates a bare session when no windows are configured', () => {
    const contexts = new ContextStack(testBaseContext())
    return contexts.withContext({ session_name: 'bare', project_root: '/srv/bare' }, (context) => {
      expect(buildSessionSteps(context).map((step) => step.command)).toEqual([
        '{tmux_command} new-session -d -s {session_name} -c {project_root}',
      ])
    })
  })
})

describe('startProject', () => {
  let venvRoot: string

  beforeEach(() => {
    venvRoot = mkdtempSync(join(tmpdir(), 'muxenv-start-'))
  })

  afterEach(() => {
    rmSync(venvRoot, { recursive: true, force: true })
  })

  it('attaches to a running session without rebuilding it', async () => {
    const contexts = new ContextStack(testBaseContext())
    const runner = new RecordingRunner(contexts)
    const { io } = createTestIO()

    const code = await contexts.withContext(project, () => startProject('web', { contexts, runner, io }))

    expect(code).toBe(0)
    expect(runner.calls).toEqual([
      { mode: 'run', argv: ['tmux', 'has-session', '-t', 'web'] },
      { mode: 'attach', argv: ['tmux', 'attach-session', '-t', 'web'] },
    ])
  })

  it('builds the session and attaches when none is running', async () => {
    const contexts = new ContextStack(testBaseContext())
    const runner = new RecordingRunner(contexts, (argv) => ({ ok: argv[1] !== 'has-session', output: '' }))
    const { io } = createTestIO()

    const code = await contexts.withContext(project, () => startProject('web', { contexts, runner, io }))

    expect(code).toBe(0)
    expect(runner.lines[0]).toBe('tmux has-session -t web')
    expect(runner.lines[1]).toBe('tmux new-session -d -s web -c /srv/web -n editor -e PORT=8080')
    expect(runner.calls.at(-1)).toEqual({ mode: 'attach', argv: ['tmux', 'attach-session', '-t', 'web'] })
    expect(runner.calls).toHaveLength(10)
  })

  it('stops at the first failed step and reports its output', async () => {
    const contexts = new ContextStack(testBaseContext())
    const runner = new RecordingRunner(contexts, (argv) => {
      if (argv[1] === 'has-session') return { ok: false, output: "can't find session: web\n" }
      if (argv[1] === 'new-window') return { ok: false, output: 'create window failed: index in use\n' }
      return { ok: true, output: '' }
    })
    const { io, err } = createTestIO()

    const code = await contexts.withContext(project, () => startProject('web', { contexts, runner, io }))

    expect(code).toBe(1)
    expect(err.join('')).toBe('Creating window servers failed:\ncreate window failed: index in use\n')
    expect(runner.lines.at(-1)).toBe('tmux new-window -t web -n servers -c /srv/web -e PORT=8080')
    expect(runner.calls.some((call) => call.mode === 'attach')).toBe(false)
  })

  it('creates a missing virtualenv before building the session', async () => {
    const contexts = new ContextStack(testBaseContext())
    const runner = new RecordingRunner(contexts, (argv) => ({ ok: argv[1] !== 'has-session', output: '' }))
    const { io, out } = createTestIO()
    const venvPath = join(venvRoot, 'py')

    await contexts.withContext(
      {
        session_name: 'py',
        project_root: '/srv/py',
        virtualenv_configured: true,
        virtualenv_path: venvPath,
        virtualenv_python_binary: 'python3',
      },
      () => startProject('py', { contexts, runner, io }),
    )

    expect(runner.lines[1]).toBe(`virtualenv -p python3 --no-site-packages ${venvPath}`)
    expect(out).toEqual(['Creating virtualenv for py...\n'])
  })

  it('skips virtualenv creation when the directory exists', async () => {
    const contexts = new ContextStack(testBaseContext())
    const runner = new RecordingRunner(contexts, (argv) => ({ ok: argv[1] !== 'has-session', output: '' }))
    const { io } = createTestIO()

    await contexts.withContext(
      {
        session_name: 'py',
        project_root: '/srv/py',
        virtualenv_configured: true,
        virtualenv_path: venvRoot,
        virtualenv_python_binary: 'python3',
      },
      () => startProject('py', { contexts, runner, io }),
    )

    expect(runner.lines.some((line) => line.startsWith('virtualenv '))).toBe(false)
  })

  it('aborts when virtualenv creation fails', async () => {
    const contexts = new ContextStack(testBaseContext())
    const runner = new RecordingRunner(contexts, (argv) => {
      if (argv[0] === 'virtualenv') return { ok: false, output: 'python3.99: not found\n' }
      return { ok: argv[1] !== 'has-session', output: '' }
    })
    const { io, err } = createTestIO()

    const code = await contexts.withContext(
      {
        session_name: 'py',
        project_root: '/srv/py',
        virtualenv_configured: true,
        virtualenv_path: join(venvRoot, 'missing'),
        virtualenv_python_binary: 'python3.99',
      },
      () => startProject('py', { contexts, runner, io }),
    )

    expect(code).toBe(1)
    expect(err.join('')).toBe('Creating virtualenv failed:\npython3.99: not found\n')
    expect(runner.calls).toHaveLength(2)
  })
})
