import jexlModule from 'jexl'
import {ValidationError} from '../errors.js'
import type {EnvironmentDescriptor, RepositoryEvent} from '../types.js'

/** Values visible to `${{ }}` expressions and `if:` conditions. */
export type ExpressionContext = {
  matrix?: Readonly<Record<string, string>>;
  runner?: {os: string; label: string};
  event?: RepositoryEvent;
  /** GitHub-style aliases (`github.event_name`, `github.ref_name`). */
  github?: {event_name: string; ref: string; ref_name: string};
  job?: {id: string};
  env?: Readonly<Record<string, string | undefined>>;
}

const expressionPattern = /\$\{\{\s*(.+?)\s*\}\}/g
const wrappedPattern = /^\s*\$\{\{\s*([\s\S]+?)\s*\}\}\s*$/

const jexl = new jexlModule.Jexl()

jexl.addFunction('contains', (haystack: unknown, needle: unknown) => {
  if (Array.isArray(haystack)) {
    return haystack.includes(needle)
  }

  return String(haystack ?? '').toLowerCase().includes(String(needle ?? '').toLowerCase())
})
jexl.addFunction('startsWith', (value: unknown, prefix: unknown) =>
  String(value ?? '').toLowerCase().startsWith(String(prefix ?? '').toLowerCase()))
jexl.addFunction('endsWith', (value: unknown, suffix: unknown) =>
  String(value ?? '').toLowerCase().endsWith(String(suffix ?? '').toLowerCase()))

/**
 * Builds the expression context of a job instance.
 */
export function buildContext({event, matrix, environment, jobId, env}: {
  event: RepositoryEvent;
  matrix?: Readonly<Record<string, string>>;
  environment?: EnvironmentDescriptor;
  jobId?: string;
  env?: Readonly<Record<string, string | undefined>>;
}): ExpressionContext {
  const refName = event.branch ?? ''
  return {
    matrix: matrix ?? {},
    runner: environment ? {os: environment.os, label: environment.label} : undefined,
    event,
    github: {
      event_name: event.kind,
      ref: refName ? `refs/heads/${refName}` : '',
      ref_name: refName
    },
    job: jobId ? {id: jobId} : undefined,
    env: env ?? {}
  }
}

/**
 * Replaces every `${{ expr }}` in the template with the value of `expr`.
 * Undefined and null values become the empty string.
 * @throws ValidationError when an expression cannot be evaluated
 */
export function interpolate(template: string, context: ExpressionContext): string {
  return template.replaceAll(expressionPattern, (_match, expression: string) => {
    let value: unknown
    try {
      value = jexl.evalSync(expression, context)
    } catch (error) {
      throw new ValidationError(`Invalid expression "${expression}"`, {cause: error})
    }

    return value === undefined || value === null ? '' : String(value)
  })
}

export function interpolateRecord(
  record: Readonly<Record<string, string>>,
  context: ExpressionContext
): Record<string, string> {
  return Object.fromEntries(Object.entries(record).map(([key, value]) => [key, interpolate(value, context)]))
}

/**
 * Evaluates an `if:` condition. The expression may be wrapped in `${{ }}`.
 * Invalid expressions evaluate to false.
 */
export async function evaluateCondition(
  expression: string,
  context: ExpressionContext
): Promise<boolean> {
  const unwrapped = wrappedPattern.exec(expression)?.[1] ?? expression
  try {
    const result = await jexl.eval(unwrapped, context)
    return Boolean(result)
  } catch {
    return false
  }
}
