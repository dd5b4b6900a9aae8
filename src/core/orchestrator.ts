import {ReportError} from '../errors.js'
import type {CacheStore} from '../engine/cache-store.js'
import type {Provisioner} from '../engine/provisioner.js'
import type {
  JobInstance,
  JobResult,
  JobSpec,
  JobStatus,
  RepositoryEvent,
  RunOutcome,
  RunStatus,
  VerityConfig,
  Workflow
} from '../types.js'
import {buildContext, evaluateCondition} from './expression.js'
import {JobRunner} from './job-runner.js'
import {expandJob} from './matrix.js'
import type {Reporter, RunContext} from './reporter.js'
import {generateRunId} from './run-store.js'
import type {StatusSink} from './status-sink.js'
import {concurrencyGroup, selectJobs} from './trigger.js'
import {deepFreeze} from './utils.js'

export type OrchestratorDependencies = {
  provisioner: Provisioner;
  reporter: Reporter;
  statusSink: StatusSink;
  cacheStore?: CacheStore;
}

export type RunOptions = {
  /** Repository checked out into every environment */
  sourceDir: string;
  /** Project configuration: concurrency, failFast, cancelInProgress */
  config?: VerityConfig;
  /** Environment variables visible to commands */
  env?: Readonly<Record<string, string>>;
  /** Aborting cancels every in-flight instance */
  signal?: AbortSignal;
  runId?: string;
}

/**
 * Reduces job results to the run status: failure when any job failed,
 * else cancelled when any job was cancelled, else success.
 */
export function aggregateStatus(jobs: ReadonlyArray<{status: JobStatus}>): RunStatus {
  if (jobs.some(job => job.status === 'failure')) {
    return 'failure'
  }

  if (jobs.some(job => job.status === 'cancelled')) {
    return 'cancelled'
  }

  return 'success'
}

type PlannedJob = {
  job: JobSpec;
  instances: JobInstance[];
}

/**
 * Runs a workflow for one repository event.
 *
 * ## Lifecycle
 *
 * 1. Trigger decision (no run when the event is rejected)
 * 2. Job `if:` conditions, then matrix expansion
 * 3. Every instance launched concurrently, up to `config.concurrency`
 * 4. Barrier: every instance finishes
 * 5. Aggregation, then a single call to the status sink
 *
 * A failing instance never stops its siblings unless `failFast` is set
 * (run-wide in the config, or per job with `strategy.fail-fast`).
 * With `cancelInProgress`, a run started for the same concurrency group
 * cancels the one in flight.
 */
export class Orchestrator {
  private readonly inFlight = new Map<string, AbortController>()
  private readonly runner: JobRunner

  constructor(private readonly deps: OrchestratorDependencies) {
    this.runner = new JobRunner(deps.provisioner, deps.reporter)
  }

  async run(workflow: Workflow, event: unknown, options: RunOptions): Promise<RunOutcome | undefined> {
    const {reporter} = this.deps
    const config = options.config ?? {}

    const decision = selectJobs(workflow, event)
    if (!decision.launch) {
      reporter.emit({event: 'RUN_SKIPPED', workflowId: workflow.id, reason: decision.reason})
      return undefined
    }

    const run: RunContext = {runId: options.runId ?? generateRunId(), workflowId: workflow.id}
    const planned = await this.plan(run, decision.jobs, decision.event)
    const instances = planned.flatMap(p => p.instances)

    reporter.emit({
      ...run,
      event: 'RUN_START',
      workflowName: workflow.name ?? workflow.id,
      trigger: decision.event,
      jobs: instances.map(i => ({id: i.id, displayName: i.displayName, environment: i.environment}))
    })

    const startedAt = new Date()
    const runController = new AbortController()
    const group = concurrencyGroup(workflow.id, decision.event)
    const release = this.link(options.signal, runController)

    if (config.cancelInProgress === true) {
      this.inFlight.get(group)?.abort(new Error(`Superseded by run ${run.runId}`))
      this.inFlight.set(group, runController)
    }

    let jobs: JobResult[]
    try {
      const tasks = planned.flatMap(({job, instances: jobInstances}) => {
        const jobController = new AbortController()
        const releaseJob = this.link(runController.signal, jobController)
        let remaining = jobInstances.length

        return jobInstances.map(instance => async () => {
          try {
            const result = await this.runner.run(instance, {
              ...run,
              event: decision.event,
              sourceDir: options.sourceDir,
              config,
              cacheStore: this.deps.cacheStore,
              env: options.env,
              signal: jobController.signal
            })

            if (result.status === 'failure') {
              if (config.failFast === true) {
                runController.abort(new Error(`Fail-fast: ${instance.id} failed`))
              } else if (job.failFast === true) {
                jobController.abort(new Error(`Fail-fast: ${instance.id} failed`))
              }
            }

            return result
          } finally {
            remaining--
            if (remaining === 0) {
              releaseJob()
            }
          }
        })
      })

      const settled = await withConcurrency(tasks, config.concurrency)
      jobs = settled.map((result, index) => result.status === 'fulfilled'
        ? result.value
        : crashedResult(instances[index], result.reason))
    } finally {
      release()
      if (this.inFlight.get(group) === runController) {
        this.inFlight.delete(group)
      }
    }

    const finishedAt = new Date()
    const outcome: RunOutcome = deepFreeze({
      ...run,
      event: decision.event,
      status: aggregateStatus(jobs),
      jobs,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime()
    })

    reporter.emit({
      ...run,
      event: 'RUN_FINISHED',
      status: outcome.status,
      durationMs: outcome.durationMs,
      counts: {
        success: jobs.filter(j => j.status === 'success').length,
        failure: jobs.filter(j => j.status === 'failure').length,
        cancelled: jobs.filter(j => j.status === 'cancelled').length
      }
    })

    try {
      await this.deps.statusSink.report(outcome)
    } catch (error) {
      throw new ReportError(run.runId, {cause: error})
    }

    return outcome
  }

  /**
   * Evaluates job conditions and expands the remaining jobs, in declaration order.
   */
  private async plan(run: RunContext, jobs: readonly JobSpec[], event: RepositoryEvent): Promise<PlannedJob[]> {
    const planned: PlannedJob[] = []
    const taken = new Set<string>()
    for (const job of jobs) {
      if (job.if !== undefined && !await evaluateCondition(job.if, buildContext({event, jobId: job.id}))) {
        this.deps.reporter.emit({...run, event: 'JOB_SKIPPED', jobId: job.id, displayName: job.name ?? job.id, reason: 'condition'})
        continue
      }

      planned.push({job, instances: expandJob(job, event, taken)})
    }

    return planned
  }

  /**
   * Aborts `child` when `parent` aborts. Returns a function detaching the listener.
   */
  private link(parent: AbortSignal | undefined, child: AbortController): () => void {
    if (!parent) {
      return () => undefined
    }

    const onAbort = () => {
      child.abort(parent.reason)
    }

    if (parent.aborted) {
      onAbort()
      return () => undefined
    }

    parent.addEventListener('abort', onAbort, {once: true})
    return () => {
      parent.removeEventListener('abort', onAbort)
    }
  }
}

/**
 * Runs tasks with at most `limit` in flight. Results keep the task order.
 * A limit that is not a positive integer puts every task in flight.
 */
async function withConcurrency<T>(
  tasks: Array<() => Promise<T>>,
  limit: number | undefined
): Promise<Array<PromiseSettledResult<T>>> {
  const results: Array<PromiseSettledResult<T>> = Array.from({length: tasks.length})
  const workers = limit !== undefined && Number.isInteger(limit) && limit >= 1
    ? Math.min(limit, tasks.length)
    : tasks.length
  let next = 0

  async function worker() {
    while (next < tasks.length) {
      const i = next++
      try {
        results[i] = {status: 'fulfilled', value: await tasks[i]()}
      } catch (error) {
        results[i] = {status: 'rejected', reason: error}
      }
    }
  }

  await Promise.all(Array.from({length: workers}, async () => worker()))
  return results
}

/**
 * Result standing in for an instance whose runner threw.
 */
function crashedResult(instance: JobInstance, error: unknown): JobResult {
  const message = error instanceof Error ? error.message : String(error)
  const now = new Date().toISOString()
  const result: JobResult = {
    instanceId: instance.id,
    jobId: instance.jobId,
    displayName: instance.displayName,
    matrix: instance.matrix,
    environment: instance.environment,
    status: 'failure',
    steps: [],
    failedStep: {stepId: 'runner', message},
    startedAt: now,
    finishedAt: now,
    durationMs: 0,
    logs: [{stream: 'stderr', line: message}]
  }
  return deepFreeze(result)
}
