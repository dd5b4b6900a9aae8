import {mkdir, readdir, readFile, rename, writeFile} from 'node:fs/promises'
import {randomUUID} from 'node:crypto'
import {join} from 'node:path'
import {isNotFoundError, RunNotFoundError, RunStoreError} from '../errors.js'
import type {LogLine, RunOutcome, RunStatus} from '../types.js'

/** Stored outcome: every job result without its captured logs. */
export type RunRecord = Omit<RunOutcome, 'jobs'> & {
  jobs: Array<Omit<RunOutcome['jobs'][number], 'logs'>>;
}

export type RunSummary = {
  runId: string;
  workflowId: string;
  status: RunStatus;
  startedAt: string;
  durationMs: number;
  jobCount: number;
}

/**
 * Generates a run identifier.
 * @returns Run ID in format: `{timestamp}-{uuid-prefix}`
 */
export function generateRunId(): string {
  return `${Date.now()}-${randomUUID().slice(0, 8)}`
}

/**
 * Persists run outcomes under `<workdir>/runs/`.
 *
 * ## Layout
 *
 * ```
 * runs/<runId>/run.json           outcome without logs
 * runs/<runId>/<instanceId>.log   captured lines, one JSON object per line
 * ```
 *
 * A run is written to `runs/.<runId>.tmp/` then renamed into place, so a
 * listed run is always complete.
 */
export class RunStore {
  constructor(readonly workdir: string) {}

  runPath(runId: string): string {
    validateId(runId)
    return join(this.workdir, 'runs', runId)
  }

  async save(outcome: RunOutcome): Promise<void> {
    const target = this.runPath(outcome.runId)
    const staging = join(this.workdir, 'runs', `.${outcome.runId}.tmp`)

    const record: RunRecord = {
      ...outcome,
      jobs: outcome.jobs.map(({logs: _logs, ...job}) => job)
    }

    for (const job of outcome.jobs) {
      validateId(job.instanceId)
    }

    try {
      await mkdir(staging, {recursive: true})
      await writeFile(join(staging, 'run.json'), JSON.stringify(record, null, 2), 'utf8')
      for (const job of outcome.jobs) {
        const lines = job.logs.map(line => JSON.stringify(line)).join('\n')
        await writeFile(join(staging, `${job.instanceId}.log`), lines.length > 0 ? lines + '\n' : '', 'utf8')
      }

      await rename(staging, target)
    } catch (error) {
      throw new RunStoreError('RUN_SAVE_FAILED', `Failed to save run ${outcome.runId}`, {cause: error})
    }
  }

  /**
   * Lists stored runs, newest first.
   */
  async list(): Promise<RunSummary[]> {
    let names: string[]
    try {
      const entries = await readdir(join(this.workdir, 'runs'), {withFileTypes: true})
      names = entries.filter(e => e.isDirectory() && !e.name.startsWith('.')).map(e => e.name)
    } catch (error) {
      if (isNotFoundError(error)) {
        return []
      }

      throw new RunStoreError('RUN_LIST_FAILED', 'Failed to list runs', {cause: error})
    }

    const records = await Promise.all(names.map(async runId => this.read(runId)))
    return records
      .map(record => ({
        runId: record.runId,
        workflowId: record.workflowId,
        status: record.status,
        startedAt: record.startedAt,
        durationMs: record.durationMs,
        jobCount: record.jobs.length
      }))
      .sort((a, b) => b.startedAt.localeCompare(a.startedAt) || b.runId.localeCompare(a.runId))
  }

  async read(runId: string): Promise<RunRecord> {
    const path = join(this.runPath(runId), 'run.json')
    let content: string
    try {
      content = await readFile(path, 'utf8')
    } catch (error) {
      if (isNotFoundError(error)) {
        throw new RunNotFoundError(runId, {cause: error})
      }

      throw new RunStoreError('RUN_READ_FAILED', `Failed to read run ${runId}`, {cause: error})
    }

    return JSON.parse(content) as RunRecord
  }

  /**
   * Reads the captured output of one job instance.
   */
  async logs(runId: string, instanceId: string): Promise<LogLine[]> {
    validateId(instanceId)
    const path = join(this.runPath(runId), `${instanceId}.log`)
    let content: string
    try {
      content = await readFile(path, 'utf8')
    } catch (error) {
      if (isNotFoundError(error)) {
        throw new RunNotFoundError(`${runId}/${instanceId}`, {cause: error})
      }

      throw new RunStoreError('RUN_READ_FAILED', `Failed to read logs of ${runId}/${instanceId}`, {cause: error})
    }

    return content
      .split('\n')
      .filter(line => line.length > 0)
      .map(line => JSON.parse(line) as LogLine)
  }
}

function validateId(id: string): void {
  if (!/^[\w.-]+$/.test(id) || id.includes('..')) {
    throw new RunStoreError('INVALID_RUN_ID', `Invalid identifier: ${id}. Must contain only alphanumeric characters, dots, dashes, and underscores.`)
  }
}
