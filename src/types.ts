// ---------------------------------------------------------------------------
// Shared verification domain types.
//
// These types are used by the workflow loader, the orchestrator, the job
// runner and the capability system. A loaded Workflow is deeply frozen and
// passed explicitly through every stage of a run.
// ---------------------------------------------------------------------------

// -- Events -----------------------------------------------------------------

export type PushEvent = {
  kind: 'push';
  /** Branch the push targets (e.g. "master"). */
  branch: string;
}

export type PullRequestEvent = {
  kind: 'pull_request';
  /** Base branch of the pull request, when known. */
  branch?: string;
  /** Pull request number, when known. */
  number?: number;
}

/** Repository event emitted by the version-control host. */
export type RepositoryEvent = PushEvent | PullRequestEvent

// -- Definitions (loaded from the workflow document) -------------------------

type StepBase = {
  id: string;
  /** Human-readable display name. Falls back to `id` when absent. */
  name?: string;
  /** Jexl condition; the step is skipped when it evaluates to falsy. */
  if?: string;
  /** When true the job continues even if this step fails. */
  continueOnError?: boolean;
  env?: Readonly<Record<string, string>>;
}

/** A step that invokes a named external capability (`uses:` + `with:`). */
export type CapabilityStep = StepBase & {
  kind: 'capability';
  /** Capability reference, e.g. "actions/checkout@v4". */
  uses: string;
  params: Readonly<Record<string, string>>;
}

/** A step that runs a shell command (`run:`). */
export type CommandStep = StepBase & {
  kind: 'command';
  run: string;
}

export type StepSpec = CapabilityStep | CommandStep

export type MatrixSpec = {
  /** Axis name to values, in declaration order. */
  axes: Readonly<Record<string, readonly string[]>>;
  /** Combinations to drop after the cross product. */
  exclude?: ReadonlyArray<Readonly<Record<string, string>>>;
}

/** A named verification task template. */
export type JobSpec = {
  id: string;
  name?: string;
  /** Runner label, possibly containing `${{ matrix.* }}` expressions. */
  runsOn: string;
  matrix?: MatrixSpec;
  steps: readonly StepSpec[];
  /** Jexl condition evaluated against the triggering event. */
  if?: string;
  timeoutMinutes?: number;
  /** Job-level override of the run's fail-fast policy. */
  failFast?: boolean;
}

export type TriggerRules = {
  /** Present when push events are accepted. An empty branch list accepts every branch. */
  push?: {branches: readonly string[]};
  /** Present when pull request events are accepted. */
  pullRequest?: Record<string, never>;
}

/** A loaded workflow. Immutable once returned by the loader. */
export type Workflow = {
  id: string;
  name?: string;
  triggers: TriggerRules;
  jobs: readonly JobSpec[];
}

// -- Execution --------------------------------------------------------------

export type RunnerOs = 'Linux' | 'Windows' | 'macOS' | 'unknown'

/** Target environment of one job instance. */
export type EnvironmentDescriptor = {
  /** Resolved runner label (e.g. "ubuntu-latest"). */
  label: string;
  os: RunnerOs;
}

/** One concrete execution of a JobSpec against one matrix combination. */
export type JobInstance = {
  id: string;
  jobId: string;
  displayName: string;
  matrix: Readonly<Record<string, string>>;
  environment: EnvironmentDescriptor;
  steps: readonly StepSpec[];
  timeoutMinutes?: number;
}

export type LogLine = {
  stream: 'stdout' | 'stderr';
  line: string;
}

/** What a step invocation reports back to the job runner. */
export type InvocationResult = {
  /** 0 = success, non-zero = failure */
  exitCode: number;
  /** True when the invocation was interrupted through its abort signal */
  cancelled?: boolean;
  /** Error message when the invocation could not complete normally */
  error?: string;
}

export type StepStatus = 'success' | 'failure' | 'skipped' | 'cancelled'

export type StepResult = {
  stepId: string;
  displayName: string;
  status: StepStatus;
  exitCode?: number;
  durationMs: number;
  error?: string;
}

export type JobStatus = 'success' | 'failure' | 'cancelled'

export type JobResult = {
  instanceId: string;
  jobId: string;
  displayName: string;
  matrix: Readonly<Record<string, string>>;
  environment: EnvironmentDescriptor;
  status: JobStatus;
  steps: readonly StepResult[];
  /** First step that halted the job. */
  failedStep?: {stepId: string; exitCode?: number; message: string};
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  logs: readonly LogLine[];
}

export type RunStatus = JobStatus

/** Aggregate result of every job instance launched for one event. */
export type RunOutcome = {
  runId: string;
  workflowId: string;
  event: RepositoryEvent;
  status: RunStatus;
  jobs: readonly JobResult[];
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}

// -- Project configuration --------------------------------------------------

/** Project-level `.verity.yml` configuration. */
export type VerityConfig = {
  workdir?: string;
  concurrency?: number;
  failFast?: boolean;
  /**
   * A run supersedes the in-flight run of its concurrency group. Only runs
   * started on the same `Orchestrator` see each other: each `verity run`
   * builds its own, so the flag takes effect for library callers only.
   */
  cancelInProgress?: boolean;
  /** Runner label to execution target. Only `host` is supported. */
  runners?: Record<string, 'host'>;
  /** Capability reference (without version) to builtin capability name. */
  capabilities?: Record<string, string>;
}

/** Type guard: returns true when the value is a recognised repository event. */
export function isRepositoryEvent(value: unknown): value is RepositoryEvent {
  if (typeof value !== 'object' || value === null || !('kind' in value)) {
    return false
  }

  if (value.kind === 'push') {
    return 'branch' in value && typeof value.branch === 'string' && value.branch.length > 0
  }

  return value.kind === 'pull_request'
}
