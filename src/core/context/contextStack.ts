import type { ContextOverrides, RunContext } from './runContext.js'
import { NoopTelemetrySink, type TelemetrySink } from '../ports/telemetry.js'

/**
 * Single-owner stack of run contexts.
 *
 * `withContext` pushes `{ ...current, ...overrides }` for the duration of a
 * block and truncates back to the entry depth when the block settles, whether
 * it returns or throws. Frames are frozen shallow copies; the frame below is
 * never touched.
 *
 * Blocks must be awaited by whoever opened them: the stack relies on strict
 * nesting and is not safe to share between concurrently running blocks.
 */
export class ContextStack {
  readonly #frames: RunContext[]
  readonly #telemetry: TelemetrySink

  constructor(base: RunContext, opts?: { telemetry?: TelemetrySink }) {
    this.#frames = [Object.freeze({ ...base })]
    this.#telemetry = opts?.telemetry ?? new NoopTelemetrySink()
  }

  /** The context in effect right now. */
  get current(): RunContext {
    const top = this.#frames[this.#frames.length - 1]
    if (!top) throw new Error('ContextStack has no base frame')
    return top
  }

  /** Number of overlays above the base context. */
  get depth(): number {
    return this.#frames.length - 1
  }

  async withContext<T>(
    overrides: ContextOverrides,
    block: (context: RunContext) => T | Promise<T>,
  ): Promise<T> {
    const entryLength = this.#frames.length
    const context: RunContext = Object.freeze({ ...this.current, ...overrides })
    this.#frames.push(context)
    this.#telemetry.emit({
      type: 'context_entered',
      payload: { depth: this.depth, keys: Object.keys(overrides) },
    })

    try {
      return await block(context)
    } finally {
      this.#frames.length = entryLength
      this.#telemetry.emit({ type: 'context_exited', payload: { depth: this.depth } })
    }
  }
}
