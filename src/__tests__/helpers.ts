import {mkdtemp} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import {ProvisioningError} from '../errors.js'
import {Environment, Provisioner} from '../engine/provisioner.js'
import type {ExecRequest, ExecResult, OnLogLine} from '../engine/types.js'
import type {Reporter, RunEvent} from '../core/reporter.js'
import type {StatusSink} from '../core/status-sink.js'
import type {CommandStep, JobInstance, JobSpec, RunOutcome, StepSpec, Workflow} from '../types.js'

/**
 * Creates a temporary directory for test isolation.
 * Each test should use its own tmpdir to avoid interference.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'verity-test-'))
}

/**
 * Silent reporter.
 */
export const noopReporter: Reporter = {
  emit() {/* noop */}
}

/**
 * Returns a reporter that records every event for assertions.
 */
export function recordingReporter(): {reporter: Reporter; events: RunEvent[]} {
  const events: RunEvent[] = []
  const reporter: Reporter = {
    emit(event) {
      events.push(event)
    }
  }

  return {reporter, events}
}

/**
 * Status sink recording every reported outcome.
 */
export function recordingSink(): {sink: StatusSink; outcomes: RunOutcome[]} {
  const outcomes: RunOutcome[] = []
  const sink: StatusSink = {
    async report(outcome) {
      outcomes.push(outcome)
    }
  }

  return {sink, outcomes}
}

/** Scripted behaviour of one command in a fake environment. */
export type FakeCommand = {
  exitCode?: number;
  stdout?: string[];
  stderr?: string[];
  /** Resolve only after this many milliseconds, or when aborted */
  delayMs?: number;
}

/**
 * Environment that never spawns a process: each command is answered from a
 * script keyed by command text. Unscripted commands succeed silently.
 */
export class FakeEnvironment extends Environment {
  readonly executed: string[] = []
  released = false

  constructor(
    instance: JobInstance,
    private readonly script: Readonly<Record<string, FakeCommand>>,
    workdir = '/nonexistent'
  ) {
    super(instance.environment, workdir)
  }

  async exec(request: ExecRequest, onLogLine: OnLogLine): Promise<ExecResult> {
    const startedAt = new Date()
    this.executed.push(request.command)
    const scripted = this.script[request.command] ?? {}

    for (const line of scripted.stdout ?? []) {
      onLogLine({stream: 'stdout', line})
    }

    for (const line of scripted.stderr ?? []) {
      onLogLine({stream: 'stderr', line})
    }

    const cancelled = await waitOrAbort(scripted.delayMs ?? 0, request.signal)
    return {
      exitCode: cancelled ? 143 : scripted.exitCode ?? 0,
      startedAt,
      finishedAt: new Date(),
      cancelled,
      timedOut: false
    }
  }

  async release(): Promise<void> {
    this.released = true
  }
}

export type FakeProvisionerOptions = {
  script?: Readonly<Record<string, FakeCommand>>;
  /** Labels that fail to provision */
  unavailable?: readonly string[];
  workdir?: string;
}

/**
 * Provisioner handing out FakeEnvironments.
 */
export class FakeProvisioner extends Provisioner {
  readonly environments = new Map<string, FakeEnvironment>()

  constructor(private readonly options: FakeProvisionerOptions = {}) {
    super()
  }

  async provision(instance: JobInstance): Promise<FakeEnvironment> {
    if (this.options.unavailable?.includes(instance.environment.label)) {
      throw new ProvisioningError(instance.environment.label, 'no runner available')
    }

    const environment = new FakeEnvironment(instance, this.options.script ?? {}, this.options.workdir)
    this.environments.set(instance.id, environment)
    return environment
  }
}

/** Resolves true when aborted before `delayMs` elapsed, false otherwise. */
async function waitOrAbort(delayMs: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) {
    return true
  }

  if (delayMs === 0) {
    return false
  }

  return new Promise(resolve => {
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve(false)
    }, delayMs)

    function onAbort() {
      clearTimeout(timer)
      resolve(true)
    }

    signal?.addEventListener('abort', onAbort, {once: true})
  })
}

export function commandStep(id: string, run: string, extra: Partial<Omit<CommandStep, 'kind' | 'id' | 'run'>> = {}): CommandStep {
  return {kind: 'command', id, run, ...extra}
}

export function job(id: string, steps: StepSpec[], extra: Partial<JobSpec> = {}): JobSpec {
  return {id, runsOn: 'ubuntu-latest', steps, ...extra}
}

export function workflow(jobs: JobSpec[], extra: Partial<Workflow> = {}): Workflow {
  return {
    id: 'build',
    name: 'Build',
    triggers: {push: {branches: ['master']}, pullRequest: {}},
    jobs,
    ...extra
  }
}

export function instance(steps: StepSpec[], extra: Partial<JobInstance> = {}): JobInstance {
  return {
    id: 'check',
    jobId: 'check',
    displayName: 'check',
    matrix: {},
    environment: {label: 'ubuntu-latest', os: 'Linux'},
    steps,
    ...extra
  }
}
