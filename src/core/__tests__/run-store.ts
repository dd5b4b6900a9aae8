import test from 'ava'
import {RunNotFoundError, RunStoreError} from '../../errors.js'
import {RunStore, generateRunId} from '../run-store.js'
import type {JobResult, RunOutcome} from '../../types.js'
import {createTmpDir} from '../../__tests__/helpers.js'

function jobResult(instanceId: string, status: JobResult['status'] = 'success'): JobResult {
  return {
    instanceId,
    jobId: instanceId,
    displayName: instanceId,
    matrix: {},
    environment: {label: 'ubuntu-latest', os: 'Linux'},
    status,
    steps: [{stepId: 'check', displayName: 'Run cargo check', status, durationMs: 5}],
    startedAt: '2026-01-01T00:00:00.000Z',
    finishedAt: '2026-01-01T00:00:01.000Z',
    durationMs: 1000,
    logs: [{stream: 'stdout', line: `${instanceId} ok`}]
  }
}

function outcome(runId: string, startedAt: string, jobs: JobResult[] = [jobResult('lint')]): RunOutcome {
  return {
    runId,
    workflowId: 'build',
    event: {kind: 'push', branch: 'master'},
    status: 'success',
    jobs,
    startedAt,
    finishedAt: startedAt,
    durationMs: 1000
  }
}

test('generateRunId: timestamp then uuid prefix', t => {
  t.regex(generateRunId(), /^\d+-[\da-f]{8}$/)
})

test('save then read returns the outcome without logs', async t => {
  const store = new RunStore(await createTmpDir())
  await store.save(outcome('run-1', '2026-01-01T00:00:00.000Z'))

  const record = await store.read('run-1')
  t.is(record.status, 'success')
  t.deepEqual(record.event, {kind: 'push', branch: 'master'})
  t.false('logs' in record.jobs[0])
  t.is(record.jobs[0].steps[0].stepId, 'check')
})

test('logs returns the captured lines of one instance', async t => {
  const store = new RunStore(await createTmpDir())
  await store.save(outcome('run-1', '2026-01-01T00:00:00.000Z', [jobResult('build-ubuntu-latest'), jobResult('lint')]))

  t.deepEqual(await store.logs('run-1', 'lint'), [{stream: 'stdout', line: 'lint ok'}])
})

test('list returns runs newest first', async t => {
  const store = new RunStore(await createTmpDir())
  await store.save(outcome('older', '2026-01-01T00:00:00.000Z'))
  await store.save(outcome('newer', '2026-01-02T00:00:00.000Z', [jobResult('a'), jobResult('b', 'failure')]))

  const runs = await store.list()
  t.deepEqual(runs.map(r => r.runId), ['newer', 'older'])
  t.is(runs[0].jobCount, 2)
})

test('list on a fresh workdir is empty', async t => {
  t.deepEqual(await new RunStore(await createTmpDir()).list(), [])
})

test('read of an unknown run throws RunNotFoundError', async t => {
  const store = new RunStore(await createTmpDir())
  const error = await t.throwsAsync(store.read('missing'), {instanceOf: RunNotFoundError})
  t.is(error?.code, 'RUN_NOT_FOUND')
})

test('logs of an unknown instance throws RunNotFoundError', async t => {
  const store = new RunStore(await createTmpDir())
  await store.save(outcome('run-1', '2026-01-01T00:00:00.000Z'))
  await t.throwsAsync(store.logs('run-1', 'nope'), {instanceOf: RunNotFoundError})
})

test('identifiers escaping the store are rejected', async t => {
  const store = new RunStore(await createTmpDir())
  const error = await t.throwsAsync(store.read('../etc'), {instanceOf: RunStoreError})
  t.is(error?.code, 'INVALID_RUN_ID')
})

test('saving the same run twice fails', async t => {
  const store = new RunStore(await createTmpDir())
  await store.save(outcome('run-1', '2026-01-01T00:00:00.000Z'))
  const error = await t.throwsAsync(store.save(outcome('run-1', '2026-01-01T00:00:00.000Z')), {instanceOf: RunStoreError})
  t.is(error?.code, 'RUN_SAVE_FAILED')
})
