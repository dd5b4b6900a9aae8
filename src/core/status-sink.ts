import pino from 'pino'
import type {RunOutcome} from '../types.js'
import type {RunStore} from './run-store.js'

/**
 * Output port receiving the final outcome of a run.
 *
 * The orchestrator calls `report()` exactly once per launched run, after
 * every job instance has finished.
 */
export type StatusSink = {
  report(outcome: RunOutcome): Promise<void>;
}

/**
 * Logs the aggregate status and per-job detail through pino.
 */
export class LogStatusSink implements StatusSink {
  constructor(private readonly logger = pino({level: 'info'})) {}

  async report(outcome: RunOutcome): Promise<void> {
    const summary = {
      runId: outcome.runId,
      workflowId: outcome.workflowId,
      status: outcome.status,
      durationMs: outcome.durationMs,
      jobs: outcome.jobs.map(job => ({
        id: job.instanceId,
        status: job.status,
        failedStep: job.failedStep
      }))
    }

    if (outcome.status === 'success') {
      this.logger.info(summary, 'run succeeded')
    } else {
      this.logger.error(summary, `run ${outcome.status === 'failure' ? 'failed' : 'cancelled'}`)
    }
  }
}

/**
 * Persists the outcome and its captured logs in a run store.
 */
export class RunStoreStatusSink implements StatusSink {
  constructor(private readonly store: RunStore) {}

  async report(outcome: RunOutcome): Promise<void> {
    await this.store.save(outcome)
  }
}

/**
 * Forwards the outcome to several sinks, in order.
 */
export class CompositeStatusSink implements StatusSink {
  private readonly sinks: StatusSink[]

  constructor(...sinks: StatusSink[]) {
    this.sinks = sinks
  }

  async report(outcome: RunOutcome): Promise<void> {
    for (const sink of this.sinks) {
      await sink.report(outcome)
    }
  }
}
