import {ValidationError} from '../errors.js'
import type {EnvironmentDescriptor, JobInstance, JobSpec, MatrixSpec, RepositoryEvent, RunnerOs} from '../types.js'
import {buildContext, interpolate} from './expression.js'
import {slugify} from './utils.js'

type Combination = Record<string, string>

/**
 * Expands a job into its concrete instances.
 *
 * A job without a matrix yields exactly one instance. A matrix job yields one
 * instance per combination of its axes: the cross product is built with the
 * first axis varying slowest, values in declaration order, then combinations
 * matching an `exclude` entry are dropped. Every instance shares the job's
 * steps and gets its own environment descriptor.
 *
 * Instance ids are unique among `taken`, which collects the ids of every
 * instance of the run: a slug already in use gets a `-2`, `-3`... suffix.
 */
export function expandJob(job: JobSpec, event: RepositoryEvent, taken: Set<string> = new Set()): JobInstance[] {
  const combinations = job.matrix ? expandMatrix(job.id, job.matrix) : [{}]
  const baseName = job.name ?? job.id

  return combinations.map(matrix => {
    const values = Object.values(matrix)
    const label = interpolate(job.runsOn, buildContext({event, matrix, jobId: job.id})).trim()
    if (label === '') {
      throw new ValidationError(`Job ${job.id}: runs-on resolves to an empty label`)
    }

    return {
      id: reserveId(values.length > 0 ? `${job.id}-${slugify(values.join('-'))}` : job.id, taken),
      jobId: job.id,
      displayName: values.length > 0 ? `${baseName} (${values.join(', ')})` : baseName,
      matrix,
      environment: describeEnvironment(label),
      steps: job.steps,
      timeoutMinutes: job.timeoutMinutes
    }
  })
}

export function expandMatrix(jobId: string, matrix: MatrixSpec): Combination[] {
  let combinations: Combination[] = [{}]
  for (const [axis, values] of Object.entries(matrix.axes)) {
    if (values.length === 0) {
      throw new ValidationError(`Job ${jobId}: matrix axis "${axis}" is empty`)
    }

    combinations = combinations.flatMap(partial => values.map(value => ({...partial, [axis]: value})))
  }

  const excluded = matrix.exclude ?? []
  const result = combinations.filter(combination => !excluded.some(rule => matchesRule(combination, rule)))

  if (result.length === 0) {
    throw new ValidationError(`Job ${jobId}: matrix exclude removes every combination`)
  }

  return result
}

/** Derives the runner OS from a runner label. */
export function describeEnvironment(label: string): EnvironmentDescriptor {
  return {label, os: runnerOs(label)}
}

function runnerOs(label: string): RunnerOs {
  const normalized = label.toLowerCase()
  if (normalized.startsWith('ubuntu') || normalized === 'linux') {
    return 'Linux'
  }

  if (normalized.startsWith('windows')) {
    return 'Windows'
  }

  if (normalized.startsWith('macos')) {
    return 'macOS'
  }

  return 'unknown'
}

function reserveId(base: string, taken: Set<string>): string {
  let id = base
  for (let n = 2; taken.has(id); n++) {
    id = `${base}-${n}`
  }

  taken.add(id)
  return id
}

function matchesRule(combination: Combination, rule: Readonly<Record<string, string>>): boolean {
  return Object.entries(rule).every(([axis, value]) => combination[axis] === value)
}
