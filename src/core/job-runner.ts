import type {CacheStore} from '../engine/cache-store.js'
import type {Environment, Provisioner} from '../engine/provisioner.js'
import type {PostJobHook} from '../capabilities/index.js'
import type {
  InvocationResult,
  JobInstance,
  JobResult,
  JobStatus,
  LogLine,
  RepositoryEvent,
  StepResult,
  StepSpec,
  VerityConfig
} from '../types.js'
import {buildContext, evaluateCondition} from './expression.js'
import type {JobRef, Reporter, RunContext, StepRef} from './reporter.js'
import {createInvocation} from './step-invocation.js'
import {deepFreeze, stepDisplayName} from './utils.js'

export type JobRunOptions = {
  runId: string;
  workflowId: string;
  event: RepositoryEvent;
  /** Repository the checkout capability copies from */
  sourceDir: string;
  config?: VerityConfig;
  cacheStore?: CacheStore;
  /** Environment variables visible to commands and `env.*` expressions */
  env?: Readonly<Record<string, string>>;
  /** Aborting cancels the instance after killing its in-flight step */
  signal?: AbortSignal;
}

type Halt = {status: 'failure' | 'cancelled'}

/**
 * Runs one job instance: provisions its environment, executes its steps in
 * order and produces exactly one frozen JobResult.
 *
 * The first step that fails halts the instance; the steps after it are
 * recorded as skipped and never executed. No step is retried.
 */
export class JobRunner {
  constructor(
    private readonly provisioner: Provisioner,
    private readonly reporter: Reporter
  ) {}

  async run(instance: JobInstance, options: JobRunOptions): Promise<JobResult> {
    const run: RunContext = {runId: options.runId, workflowId: options.workflowId}
    const job: JobRef = {id: instance.id, displayName: instance.displayName, environment: instance.environment}
    const startedAt = new Date()
    const logs: LogLine[] = []
    const steps: StepResult[] = []
    let failedStep: JobResult['failedStep']

    const finish = (status: JobStatus): JobResult => {
      const finishedAt = new Date()
      const durationMs = finishedAt.getTime() - startedAt.getTime()
      this.reporter.emit({...run, event: 'JOB_FINISHED', job, status, durationMs, failedStep: failedStep?.stepId})
      return deepFreeze({
        instanceId: instance.id,
        jobId: instance.jobId,
        displayName: instance.displayName,
        matrix: instance.matrix,
        environment: instance.environment,
        status,
        steps,
        failedStep,
        startedAt: startedAt.toISOString(),
        finishedAt: finishedAt.toISOString(),
        durationMs,
        logs
      })
    }

    this.reporter.emit({...run, event: 'JOB_STARTING', job})

    if (options.signal?.aborted) {
      for (const step of instance.steps) {
        this.recordUnrun(run, job, steps, step, 'cancelled')
      }

      return finish('cancelled')
    }

    const provisionRef: StepRef = {id: 'provision', displayName: `Set up ${instance.environment.label}`}
    let environment: Environment
    try {
      environment = await this.provisioner.provision(instance)
    } catch (error) {
      const message = errorMessage(error)
      logs.push({stream: 'stderr', line: message})
      steps.push({stepId: provisionRef.id, displayName: provisionRef.displayName, status: 'failure', durationMs: Date.now() - startedAt.getTime(), error: message})
      this.reporter.emit({...run, event: 'STEP_FAILED', job, step: provisionRef, message, continued: false})
      failedStep = {stepId: provisionRef.id, message}
      for (const step of instance.steps) {
        this.recordUnrun(run, job, steps, step, 'halted')
      }

      return finish('failure')
    }

    const deadline = linkDeadline(options.signal, instance.timeoutMinutes)
    const postJobHooks: PostJobHook[] = []
    let halt: Halt | undefined

    try {
      const expressions = buildContext({
        event: options.event,
        matrix: instance.matrix,
        environment: instance.environment,
        jobId: instance.jobId,
        env: options.env
      })

      for (const step of instance.steps) {
        if (halt) {
          this.recordUnrun(run, job, steps, step, halt.status === 'cancelled' ? 'cancelled' : 'halted')
          continue
        }

        if (deadline.signal.aborted) {
          if (deadline.timedOut) {
            const message = timeoutMessage(instance)
            const stepRef: StepRef = {id: step.id, displayName: stepDisplayName(step)}
            steps.push({stepId: step.id, displayName: stepRef.displayName, status: 'failure', durationMs: 0, error: message})
            this.reporter.emit({...run, event: 'STEP_FAILED', job, step: stepRef, message, continued: false})
            failedStep = {stepId: step.id, message}
            halt = {status: 'failure'}
          } else {
            halt = {status: 'cancelled'}
            this.recordUnrun(run, job, steps, step, 'cancelled')
          }

          continue
        }

        const stepRef: StepRef = {id: step.id, displayName: stepDisplayName(step)}

        if (step.if !== undefined && !await evaluateCondition(step.if, expressions)) {
          steps.push({stepId: step.id, displayName: stepRef.displayName, status: 'skipped', durationMs: 0})
          this.reporter.emit({...run, event: 'STEP_SKIPPED', job, step: stepRef, reason: 'condition'})
          continue
        }

        this.reporter.emit({...run, event: 'STEP_STARTING', job, step: stepRef})
        const stepStart = Date.now()
        const log = (entry: LogLine) => {
          logs.push(entry)
          this.reporter.emit({...run, event: 'STEP_LOG', job, step: stepRef, stream: entry.stream, line: entry.line})
        }

        let result: InvocationResult
        try {
          result = await createInvocation(step).execute({
            instance,
            environment,
            sourceDir: options.sourceDir,
            cacheStore: options.cacheStore,
            signal: deadline.signal,
            log,
            registerPostJob(hook) {
              postJobHooks.push(hook)
            },
            expressions,
            env: options.env ?? {},
            config: options.config ?? {}
          })
        } catch (error) {
          result = {exitCode: 1, error: errorMessage(error)}
        }

        const durationMs = Date.now() - stepStart

        if (deadline.timedOut) {
          const message = timeoutMessage(instance)
          log({stream: 'stderr', line: message})
          steps.push({stepId: step.id, displayName: stepRef.displayName, status: 'failure', exitCode: result.exitCode, durationMs, error: message})
          this.reporter.emit({...run, event: 'STEP_FAILED', job, step: stepRef, message, continued: false})
          failedStep = {stepId: step.id, message}
          halt = {status: 'failure'}
          continue
        }

        if (result.cancelled === true || (result.exitCode !== 0 && deadline.signal.aborted)) {
          steps.push({stepId: step.id, displayName: stepRef.displayName, status: 'cancelled', durationMs})
          this.reporter.emit({...run, event: 'STEP_SKIPPED', job, step: stepRef, reason: 'cancelled'})
          halt = {status: 'cancelled'}
          continue
        }

        if (result.exitCode === 0 && result.error === undefined) {
          steps.push({stepId: step.id, displayName: stepRef.displayName, status: 'success', exitCode: 0, durationMs})
          this.reporter.emit({...run, event: 'STEP_FINISHED', job, step: stepRef, durationMs})
          continue
        }

        const exitCode = result.exitCode === 0 ? 1 : result.exitCode
        const message = result.error ?? `exited with code ${exitCode}`
        const continued = step.continueOnError === true
        steps.push({stepId: step.id, displayName: stepRef.displayName, status: 'failure', exitCode, durationMs, error: message})
        this.reporter.emit({...run, event: 'STEP_FAILED', job, step: stepRef, exitCode, message, continued})

        if (!continued) {
          failedStep = {stepId: step.id, exitCode, message}
          halt = {status: 'failure'}
        }
      }

      if (!halt) {
        await this.runPostJobHooks(postJobHooks, logs)
      }
    } finally {
      deadline.dispose()
      try {
        await environment.release()
      } catch (error) {
        logs.push({stream: 'stderr', line: `warning: failed to release environment: ${errorMessage(error)}`})
      }
    }

    return finish(halt?.status ?? 'success')
  }

  private recordUnrun(
    run: RunContext,
    job: JobRef,
    steps: StepResult[],
    step: StepSpec,
    reason: 'halted' | 'cancelled'
  ): void {
    const stepRef: StepRef = {id: step.id, displayName: stepDisplayName(step)}
    steps.push({
      stepId: step.id,
      displayName: stepRef.displayName,
      status: reason === 'cancelled' ? 'cancelled' : 'skipped',
      durationMs: 0
    })
    this.reporter.emit({...run, event: 'STEP_SKIPPED', job, step: stepRef, reason})
  }

  /**
   * Post-job hooks never change the job status: a failing hook is logged.
   */
  private async runPostJobHooks(hooks: PostJobHook[], logs: LogLine[]): Promise<void> {
    const log = (entry: LogLine) => {
      logs.push(entry)
    }

    for (const hook of hooks) {
      try {
        await hook.run(log)
      } catch (error) {
        log({stream: 'stderr', line: `warning: post-job ${hook.name} failed: ${errorMessage(error)}`})
      }
    }
  }
}

/** Largest delay setTimeout honours (2^31 - 1 ms). */
const maxTimerDelayMs = 2_147_483_647

type Deadline = {
  signal: AbortSignal;
  readonly timedOut: boolean;
  dispose(): void;
}

/**
 * Derives the signal a job runs under: aborted by the parent signal or once
 * the job's time budget is spent.
 */
function linkDeadline(parent: AbortSignal | undefined, timeoutMinutes: number | undefined): Deadline {
  const controller = new AbortController()
  let timedOut = false

  const onAbort = () => {
    controller.abort(parent?.reason)
  }

  parent?.addEventListener('abort', onAbort, {once: true})
  if (parent?.aborted) {
    controller.abort(parent.reason)
  }

  let timer: NodeJS.Timeout | undefined
  // setTimeout clamps longer delays to 1ms, so long budgets are waited out in chunks
  const arm = (remainingMs: number) => {
    timer = setTimeout(() => {
      if (remainingMs > maxTimerDelayMs) {
        arm(remainingMs - maxTimerDelayMs)
        return
      }

      timedOut = true
      controller.abort(new Error(`timed out after ${timeoutMinutes} minutes`))
    }, Math.min(remainingMs, maxTimerDelayMs))
  }

  if (timeoutMinutes !== undefined) {
    arm(timeoutMinutes * 60_000)
  }

  return {
    signal: controller.signal,
    get timedOut() {
      return timedOut
    },
    dispose() {
      clearTimeout(timer)
      parent?.removeEventListener('abort', onAbort)
    }
  }
}

function timeoutMessage(instance: JobInstance): string {
  return `timed out after ${instance.timeoutMinutes ?? 0} minutes`
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
