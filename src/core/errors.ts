/**
 * Engine error taxonomy.
 *
 * Subprocess failures are NOT errors: the runner reports them through
 * `CommandResult.ok`. Everything here is fatal to the current operation
 * and propagates to the CLI adapter, which prints the message and exits 1.
 */

export class MissingBindingError extends Error {
  readonly kind = 'MissingBindingError'
  readonly binding: string
  readonly template: string

  constructor(binding: string, template: string) {
    super(`No value bound for "{${binding}}" in "${template}"`)
    this.name = 'MissingBindingError'
    this.binding = binding
    this.template = template
  }
}

export class CommandLaunchError extends Error {
  readonly kind = 'CommandLaunchError'
  readonly executable: string

  constructor(executable: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : ''
    super(`Unable to launch "${executable}"${reason}`, options)
    this.name = 'CommandLaunchError'
    this.executable = executable
  }
}

export class ProjectConfigError extends Error {
  readonly kind = 'ProjectConfigError'
  readonly path: string

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`${path}: ${message}`, options)
    this.name = 'ProjectConfigError'
    this.path = path
  }
}

export class UsageError extends Error {
  readonly kind = 'UsageError'

  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}
