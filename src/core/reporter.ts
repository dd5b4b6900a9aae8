import pino from 'pino'
import type {EnvironmentDescriptor, JobStatus, RepositoryEvent, RunStatus} from '../types.js'

/** Reference to a step for display and keying purposes. */
export type StepRef = {
  id: string;
  displayName: string;
}

/** Reference to a job instance for display and keying purposes. */
export type JobRef = {
  id: string;
  displayName: string;
  environment: EnvironmentDescriptor;
}

/** Common fields identifying a run. */
export type RunContext = {
  runId: string;
  workflowId: string;
}

/**
 * Discriminated union of run execution events.
 *
 * Lifecycle:
 * 1. RUN_START - Event accepted, instances expanded
 *    OR RUN_SKIPPED - Event rejected, nothing launched
 * 2. JOB_SKIPPED - Job left out by its `if:` condition
 * 3. For each instance (concurrently):
 *    a. JOB_STARTING
 *    b. For each step, in order:
 *       STEP_STARTING, STEP_LOG*, then STEP_FINISHED or STEP_FAILED
 *       OR STEP_SKIPPED (condition, halted by an earlier failure, cancelled)
 *    c. JOB_FINISHED - with the instance status
 * 4. RUN_FINISHED - Aggregate status, after every instance finished
 */
export type RunStartEvent = RunContext & {
  event: 'RUN_START';
  workflowName: string;
  trigger: RepositoryEvent;
  jobs: JobRef[];
}

export type RunSkippedEvent = {
  event: 'RUN_SKIPPED';
  workflowId: string;
  reason: string;
}

export type JobSkippedEvent = RunContext & {
  event: 'JOB_SKIPPED';
  jobId: string;
  displayName: string;
  reason: 'condition';
}

export type JobStartingEvent = RunContext & {
  event: 'JOB_STARTING';
  job: JobRef;
}

export type StepStartingEvent = RunContext & {
  event: 'STEP_STARTING';
  job: JobRef;
  step: StepRef;
}

export type StepLogEvent = RunContext & {
  event: 'STEP_LOG';
  job: JobRef;
  step: StepRef;
  stream: 'stdout' | 'stderr';
  line: string;
}

export type StepFinishedEvent = RunContext & {
  event: 'STEP_FINISHED';
  job: JobRef;
  step: StepRef;
  durationMs: number;
}

export type StepFailedEvent = RunContext & {
  event: 'STEP_FAILED';
  job: JobRef;
  step: StepRef;
  exitCode?: number;
  message: string;
  /** True when the job carries on because the step allows failure. */
  continued: boolean;
}

export type StepSkippedEvent = RunContext & {
  event: 'STEP_SKIPPED';
  job: JobRef;
  step: StepRef;
  reason: 'condition' | 'halted' | 'cancelled';
}

export type JobFinishedEvent = RunContext & {
  event: 'JOB_FINISHED';
  job: JobRef;
  status: JobStatus;
  durationMs: number;
  failedStep?: string;
}

export type RunFinishedEvent = RunContext & {
  event: 'RUN_FINISHED';
  status: RunStatus;
  durationMs: number;
  counts: Record<JobStatus, number>;
}

export type RunEvent =
  | RunStartEvent
  | RunSkippedEvent
  | JobSkippedEvent
  | JobStartingEvent
  | StepStartingEvent
  | StepLogEvent
  | StepFinishedEvent
  | StepFailedEvent
  | StepSkippedEvent
  | JobFinishedEvent
  | RunFinishedEvent

/**
 * Interface for reporting run execution events.
 */
export type Reporter = {
  /** Reports run, job and step state transitions and output lines */
  emit(event: RunEvent): void;
}

/**
 * Reporter that outputs structured JSON logs via pino.
 * Suitable for CI/CD environments and log aggregation.
 */
export class ConsoleReporter implements Reporter {
  constructor(private readonly logger = pino({level: 'info'})) {}

  emit(event: RunEvent): void {
    switch (event.event) {
      case 'STEP_FAILED':
      case 'RUN_SKIPPED': {
        this.logger.warn(event)
        break
      }

      case 'STEP_LOG': {
        this.logger.debug(event)
        break
      }

      default: {
        this.logger.info(event)
      }
    }
  }
}

/**
 * Delegates emit() to multiple reporters.
 */
export class CompositeReporter implements Reporter {
  private readonly reporters: Reporter[]

  constructor(...reporters: Reporter[]) {
    this.reporters = reporters
  }

  emit(event: RunEvent): void {
    for (const reporter of this.reporters) {
      reporter.emit(event)
    }
  }
}
