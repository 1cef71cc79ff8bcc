import type { ContextBindings, ContextValue } from '../context/runContext.js'
import { MissingBindingError } from '../errors.js'

// `{{` and `}}` are literal braces; `{name}` is a placeholder.
const TOKEN_PATTERN = /\{\{|\}\}|\{([^{}]*)\}/g

/**
 * Expands `{name}` placeholders in `template` against `context` overlaid with
 * `extra` (extra wins). Pure: neither input is modified.
 *
 * A placeholder whose name is unbound, or bound to `null`, throws
 * {@link MissingBindingError}.
 */
export function resolveTemplate(
  template: string,
  context: ContextBindings,
  extra: ContextBindings = {},
): string {
  return template.replace(TOKEN_PATTERN, (token: string, name: string | undefined) => {
    if (token === '{{') return '{'
    if (token === '}}') return '}'
    const key = name ?? ''
    const value = lookup(key, context, extra)
    if (value === undefined || value === null) {
      throw new MissingBindingError(key, template)
    }
    return renderValue(value)
  })
}

export function renderValue(value: ContextValue): string {
  if (typeof value === 'string') return value
  if (typeof value === 'number' || typeof value === 'boolean') return String(value)
  return JSON.stringify(value)
}

function lookup(key: string, context: ContextBindings, extra: ContextBindings): ContextValue | undefined {
  if (Object.hasOwn(extra, key)) return extra[key]
  if (Object.hasOwn(context, key)) return context[key]
  return undefined
}
