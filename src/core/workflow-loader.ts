import {readFile} from 'node:fs/promises'
import {basename, extname} from 'node:path'
import {parse as parseYaml} from 'yaml'
import {ValidationError} from '../errors.js'
import type {JobSpec, MatrixSpec, StepSpec, TriggerRules, Workflow} from '../types.js'
import {deepFreeze, isRecord, slugify} from './utils.js'

type Scalar = string | number | boolean

/** Longest `timeout-minutes` a job may declare (one year). */
export const maxTimeoutMinutes = 525_600

/**
 * Loads workflow documents (YAML or JSON) into immutable Workflow values.
 *
 * The accepted document is the subset of the GitHub Actions workflow syntax
 * needed to describe verification jobs:
 *
 * ```yaml
 * name: Build
 * on:
 *   push:
 *     branches: [master]
 *   pull_request:
 * jobs:
 *   build:
 *     runs-on: ${{ matrix.os }}
 *     strategy:
 *       matrix:
 *         os: [ubuntu-latest, windows-latest]
 *     steps:
 *       - uses: actions/checkout@v4
 *       - run: cargo check
 * ```
 */
export class WorkflowLoader {
  async load(filePath: string): Promise<Workflow> {
    const content = await readFile(filePath, 'utf8')
    return this.parse(content, filePath)
  }

  parse(content: string, filePath: string): Workflow {
    let input: unknown
    try {
      input = parseWorkflowFile(content, filePath)
    } catch (error) {
      throw new ValidationError(`Invalid workflow file ${filePath}`, {cause: error})
    }

    if (!isRecord(input)) {
      throw new ValidationError('Invalid workflow: document must be a mapping')
    }

    const name = optionalString(input.name, 'workflow name')
    const explicitId = optionalString(input.id, 'workflow id')
    const id = explicitId ?? slugify(name ?? basename(filePath).replace(/\.[^.]+$/, ''))
    this.validateIdentifier(id, 'workflow id')

    const triggers = this.parseTriggers(input.on)

    if (!isRecord(input.jobs) || Object.keys(input.jobs).length === 0) {
      throw new ValidationError('Invalid workflow: jobs must be a non-empty mapping')
    }

    const jobs = Object.entries(input.jobs).map(([jobId, job]) => this.parseJob(jobId, job))

    return deepFreeze({id, name, triggers, jobs})
  }

  private parseTriggers(on: unknown): TriggerRules {
    const triggers: TriggerRules = {}

    if (typeof on === 'string' || Array.isArray(on)) {
      const kinds: unknown[] = typeof on === 'string' ? [on] : on
      for (const kind of kinds) {
        if (kind === 'push') {
          triggers.push = {branches: []}
        } else if (kind === 'pull_request') {
          triggers.pullRequest = {}
        }
      }
    } else if (isRecord(on)) {
      if ('push' in on) {
        triggers.push = {branches: this.parseBranches(on.push)}
      }

      if ('pull_request' in on) {
        triggers.pullRequest = {}
      }
    } else {
      throw new ValidationError('Invalid workflow: "on" must be a string, a list or a mapping')
    }

    if (!triggers.push && !triggers.pullRequest) {
      throw new ValidationError('Invalid workflow: "on" must include push or pull_request')
    }

    return triggers
  }

  private parseBranches(push: unknown): string[] {
    if (push === null || push === undefined) {
      return []
    }

    if (!isRecord(push)) {
      throw new ValidationError('Invalid workflow: "on.push" must be a mapping')
    }

    if (push.branches === undefined) {
      return []
    }

    if (!Array.isArray(push.branches) || !push.branches.every(b => typeof b === 'string' && b.length > 0)) {
      throw new ValidationError('Invalid workflow: "on.push.branches" must be a list of branch names')
    }

    return push.branches.map(String)
  }

  private parseJob(jobId: string, job: unknown): JobSpec {
    this.validateIdentifier(jobId, 'job id')

    if (!isRecord(job)) {
      throw new ValidationError(`Invalid job ${jobId}: must be a mapping`)
    }

    const runsOn = job['runs-on']
    if (typeof runsOn !== 'string' || runsOn.trim() === '') {
      throw new ValidationError(`Invalid job ${jobId}: runs-on is required`)
    }

    if (!Array.isArray(job.steps) || job.steps.length === 0) {
      throw new ValidationError(`Invalid job ${jobId}: steps must be a non-empty list`)
    }

    const spec: JobSpec = {
      id: jobId,
      name: optionalString(job.name, `name of job ${jobId}`),
      runsOn,
      steps: this.parseSteps(jobId, job.steps),
      if: optionalString(job.if, `if of job ${jobId}`)
    }

    const timeout = job['timeout-minutes']
    if (timeout !== undefined) {
      if (typeof timeout !== 'number' || !(timeout > 0) || timeout > maxTimeoutMinutes) {
        throw new ValidationError(`Invalid job ${jobId}: timeout-minutes must be a positive number up to ${maxTimeoutMinutes}`)
      }

      spec.timeoutMinutes = timeout
    }

    if (job.strategy !== undefined) {
      if (!isRecord(job.strategy)) {
        throw new ValidationError(`Invalid job ${jobId}: strategy must be a mapping`)
      }

      if (job.strategy.matrix !== undefined) {
        spec.matrix = this.parseMatrix(jobId, job.strategy.matrix)
      }

      const failFast = job.strategy['fail-fast']
      if (failFast !== undefined) {
        if (typeof failFast !== 'boolean') {
          throw new ValidationError(`Invalid job ${jobId}: strategy.fail-fast must be a boolean`)
        }

        spec.failFast = failFast
      }
    }

    return spec
  }

  private parseMatrix(jobId: string, matrix: unknown): MatrixSpec {
    if (!isRecord(matrix)) {
      throw new ValidationError(`Invalid job ${jobId}: strategy.matrix must be a mapping`)
    }

    if ('include' in matrix) {
      throw new ValidationError(`Invalid job ${jobId}: matrix include is not supported`)
    }

    const axes: Record<string, string[]> = {}
    let exclude: Array<Record<string, string>> | undefined

    for (const [axis, values] of Object.entries(matrix)) {
      if (axis === 'exclude') {
        exclude = this.parseExclude(jobId, values)
        continue
      }

      this.validateIdentifier(axis, `matrix axis in job ${jobId}`)
      if (!Array.isArray(values) || values.length === 0 || !values.every(v => isScalar(v))) {
        throw new ValidationError(`Invalid job ${jobId}: matrix axis "${axis}" must be a non-empty list of scalars`)
      }

      axes[axis] = values.map(String)
    }

    if (Object.keys(axes).length === 0) {
      throw new ValidationError(`Invalid job ${jobId}: matrix must declare at least one axis`)
    }

    return exclude ? {axes, exclude} : {axes}
  }

  private parseExclude(jobId: string, exclude: unknown): Array<Record<string, string>> {
    if (!Array.isArray(exclude) || !exclude.every(e => isRecord(e))) {
      throw new ValidationError(`Invalid job ${jobId}: matrix exclude must be a list of mappings`)
    }

    return exclude.map(entry => this.parseScalarRecord(entry, `matrix exclude in job ${jobId}`))
  }

  private parseSteps(jobId: string, steps: unknown[]): StepSpec[] {
    const seen = new Set<string>()
    return steps.map((raw, index) => {
      if (!isRecord(raw)) {
        throw new ValidationError(`Invalid step ${index + 1} in job ${jobId}: must be a mapping`)
      }

      const step = this.parseStep(jobId, index, raw)
      const explicit = typeof raw.id === 'string'
      if (seen.has(step.id)) {
        if (explicit) {
          throw new ValidationError(`Duplicate step id in job ${jobId}: '${step.id}'`)
        }

        step.id = `${step.id}-${index + 1}`
      }

      seen.add(step.id)
      return step
    })
  }

  private parseStep(jobId: string, index: number, raw: Record<string, unknown>): StepSpec {
    const context = `step ${index + 1} in job ${jobId}`
    const hasUses = raw.uses !== undefined
    const hasRun = raw.run !== undefined

    if (hasUses === hasRun) {
      throw new ValidationError(`Invalid ${context}: exactly one of "uses" or "run" must be defined`)
    }

    const name = optionalString(raw.name, `name of ${context}`)
    const explicitId = optionalString(raw.id, `id of ${context}`)
    if (explicitId) {
      this.validateIdentifier(explicitId, `id of ${context}`)
    }

    const base = {
      name,
      if: optionalString(raw.if, `if of ${context}`),
      continueOnError: optionalBoolean(raw['continue-on-error'], `continue-on-error of ${context}`),
      env: raw.env === undefined ? undefined : this.parseScalarRecord(raw.env, `env of ${context}`)
    }

    if (hasUses) {
      if (typeof raw.uses !== 'string' || raw.uses.trim() === '') {
        throw new ValidationError(`Invalid ${context}: "uses" must be a non-empty string`)
      }

      const uses = raw.uses.trim()
      return {
        ...base,
        kind: 'capability',
        id: explicitId ?? slugify(name ?? uses.replace(/@.*$/, '')),
        uses,
        params: raw.with === undefined ? {} : this.parseScalarRecord(raw.with, `with of ${context}`)
      }
    }

    if (typeof raw.run !== 'string' || raw.run.trim() === '') {
      throw new ValidationError(`Invalid ${context}: "run" must be a non-empty string`)
    }

    return {
      ...base,
      kind: 'command',
      id: explicitId ?? (slugify(name ?? raw.run.split('\n')[0]) || `step-${index + 1}`),
      run: raw.run
    }
  }

  private parseScalarRecord(value: unknown, context: string): Record<string, string> {
    if (!isRecord(value)) {
      throw new ValidationError(`Invalid ${context}: must be a mapping`)
    }

    const result: Record<string, string> = {}
    for (const [key, entry] of Object.entries(value)) {
      if (!isScalar(entry)) {
        throw new ValidationError(`Invalid ${context}: "${key}" must be a string, number or boolean`)
      }

      result[key] = String(entry)
    }

    return result
  }

  private validateIdentifier(id: string, context: string): void {
    if (!/^[\w-]+$/.test(id)) {
      throw new ValidationError(`Invalid ${context}: '${id}' must contain only alphanumeric characters, underscore, and hyphen`)
    }
  }
}

export function parseWorkflowFile(content: string, filePath: string): unknown {
  const ext = extname(filePath).toLowerCase()
  if (ext === '.json') {
    return JSON.parse(content)
  }

  return parseYaml(content)
}

function isScalar(value: unknown): value is Scalar {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean'
}

function optionalString(value: unknown, context: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined
  }

  if (typeof value !== 'string') {
    throw new ValidationError(`Invalid ${context}: must be a string`)
  }

  return value
}

function optionalBoolean(value: unknown, context: string): boolean | undefined {
  if (value === undefined) {
    return undefined
  }

  if (typeof value !== 'boolean') {
    throw new ValidationError(`Invalid ${context}: must be a boolean`)
  }

  return value
}
