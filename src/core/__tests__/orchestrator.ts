import test from 'ava'
import {ReportError} from '../../errors.js'
import {Orchestrator, aggregateStatus} from '../orchestrator.js'
import type {RunOutcome} from '../../types.js'
import {
  FakeProvisioner,
  commandStep,
  job,
  noopReporter,
  recordingReporter,
  recordingSink,
  workflow,
  type FakeCommand
} from '../../__tests__/helpers.js'

const push = {kind: 'push', branch: 'master'} as const
const runOptions = {sourceDir: '/nonexistent'}

const buildMatrix = job('build', [commandStep('check', 'cargo check --target ${{ matrix.os }}')], {
  runsOn: '${{ matrix.os }}',
  matrix: {axes: {os: ['ubuntu-latest', 'windows-latest', 'macos-latest']}}
})
const checkFormat = job('check-format', [commandStep('fmt', 'cargo fmt -- --check')])
const lint = job('lint', [commandStep('clippy', 'cargo clippy')])

function orchestrator(script: Record<string, FakeCommand> = {}) {
  const {sink, outcomes} = recordingSink()
  const {reporter, events} = recordingReporter()
  const provisioner = new FakeProvisioner({script})
  return {orchestrator: new Orchestrator({provisioner, reporter, statusSink: sink}), outcomes, events, provisioner}
}

// -- aggregateStatus ---------------------------------------------------------

test('aggregateStatus: failure wins over cancelled and success', t => {
  t.is(aggregateStatus([{status: 'success'}, {status: 'cancelled'}, {status: 'failure'}]), 'failure')
})

test('aggregateStatus: cancelled without failure is cancelled', t => {
  t.is(aggregateStatus([{status: 'success'}, {status: 'cancelled'}]), 'cancelled')
})

test('aggregateStatus: all success is success', t => {
  t.is(aggregateStatus([{status: 'success'}, {status: 'success'}]), 'success')
})

test('aggregateStatus: no jobs is success', t => {
  t.is(aggregateStatus([]), 'success')
})

// -- runs --------------------------------------------------------------------

test('one failing matrix instance fails the run while siblings succeed', async t => {
  const {orchestrator: o, outcomes} = orchestrator({'cargo check --target windows-latest': {exitCode: 101}})

  const outcome = await o.run(workflow([buildMatrix, checkFormat, lint]), push, runOptions)

  t.is(outcome?.status, 'failure')
  t.deepEqual(outcome?.jobs.map(j => [j.instanceId, j.status]), [
    ['build-ubuntu-latest', 'success'],
    ['build-windows-latest', 'failure'],
    ['build-macos-latest', 'success'],
    ['check-format', 'success'],
    ['lint', 'success']
  ])
  t.is(outcomes.length, 1)
  t.is<RunOutcome | undefined, RunOutcome | undefined>(outcomes[0], outcome)
})

test('every job succeeding yields success and one report', async t => {
  const {orchestrator: o, outcomes} = orchestrator()

  const outcome = await o.run(workflow([buildMatrix, checkFormat, lint]), {kind: 'pull_request', branch: 'feature/x', number: 7}, runOptions)

  t.is(outcome?.status, 'success')
  t.is(outcome?.jobs.length, 5)
  t.is(outcomes.length, 1)
})

test('rejected event launches nothing and reports nothing', async t => {
  const {orchestrator: o, outcomes, events, provisioner} = orchestrator()

  const outcome = await o.run(workflow([lint]), {kind: 'push', branch: 'develop'}, runOptions)

  t.is(outcome, undefined)
  t.is(outcomes.length, 0)
  t.is(provisioner.environments.size, 0)
  t.deepEqual(events, [{event: 'RUN_SKIPPED', workflowId: 'build', reason: 'Branch "develop" does not match master'}])
})

test('unrecognized event kind launches nothing', async t => {
  const {orchestrator: o, outcomes} = orchestrator()

  const outcome = await o.run(workflow([lint]), {kind: 'release', tag: 'v1'}, runOptions)

  t.is(outcome, undefined)
  t.is(outcomes.length, 0)
})

test('job whose condition is false is left out', async t => {
  const {orchestrator: o, events} = orchestrator()
  const pushOnly = job('publish', [commandStep('publish', 'echo publish')], {if: 'github.event_name == "push"'})

  const outcome = await o.run(workflow([lint, pushOnly]), {kind: 'pull_request', number: 3}, runOptions)

  t.deepEqual(outcome?.jobs.map(j => j.instanceId), ['lint'])
  t.true(events.some(e => e.event === 'JOB_SKIPPED' && e.jobId === 'publish'))
})

test('instance ids stay unique across jobs', async t => {
  const {orchestrator: o} = orchestrator()
  const matrixJob = job('build', [commandStep('check', 'make')], {matrix: {axes: {target: ['x']}}})

  const outcome = await o.run(workflow([matrixJob, job('build-x', [commandStep('check', 'make')])]), push, runOptions)

  t.deepEqual(outcome?.jobs.map(j => [j.jobId, j.instanceId]), [['build', 'build-x'], ['build-x', 'build-x-2']])
})

test('run id is taken from the options', async t => {
  const {orchestrator: o} = orchestrator()
  const outcome = await o.run(workflow([lint]), push, {...runOptions, runId: 'run-42'})
  t.is(outcome?.runId, 'run-42')
  t.is(outcome?.workflowId, 'build')
})

test('outcome is frozen', async t => {
  const {orchestrator: o} = orchestrator()
  const outcome = await o.run(workflow([lint]), push, runOptions)
  t.true(Object.isFrozen(outcome))
  t.true(Object.isFrozen(outcome?.jobs))
})

// -- fail-fast ---------------------------------------------------------------

test('without fail-fast a failure does not stop a slow sibling', async t => {
  const {orchestrator: o} = orchestrator({'exit 1': {exitCode: 1}, 'slow build': {delayMs: 50}})

  const outcome = await o.run(workflow([
    job('quick', [commandStep('fail', 'exit 1')]),
    job('slow', [commandStep('build', 'slow build')])
  ]), push, runOptions)

  t.is(outcome?.status, 'failure')
  t.deepEqual(outcome?.jobs.map(j => j.status), ['failure', 'success'])
})

test('run-wide fail-fast cancels in-flight siblings', async t => {
  const {orchestrator: o} = orchestrator({'exit 1': {exitCode: 1}, 'slow build': {delayMs: 5000}})

  const outcome = await o.run(workflow([
    job('quick', [commandStep('fail', 'exit 1')]),
    job('slow', [commandStep('build', 'slow build')])
  ]), push, {...runOptions, config: {failFast: true}})

  t.is(outcome?.status, 'failure')
  t.deepEqual(outcome?.jobs.map(j => j.status), ['failure', 'cancelled'])
})

test('job-level fail-fast only cancels instances of the same job', async t => {
  const {orchestrator: o} = orchestrator({
    'check ubuntu-latest': {exitCode: 1},
    'check windows-latest': {delayMs: 5000},
    'slow lint': {delayMs: 50}
  })

  const matrixJob = job('build', [commandStep('check', 'check ${{ matrix.os }}')], {
    runsOn: '${{ matrix.os }}',
    matrix: {axes: {os: ['ubuntu-latest', 'windows-latest']}},
    failFast: true
  })

  const outcome = await o.run(workflow([matrixJob, job('lint', [commandStep('lint', 'slow lint')])]), push, runOptions)

  t.deepEqual(outcome?.jobs.map(j => [j.instanceId, j.status]), [
    ['build-ubuntu-latest', 'failure'],
    ['build-windows-latest', 'cancelled'],
    ['lint', 'success']
  ])
})

// -- cancellation ------------------------------------------------------------

test('aborting the external signal yields cancelled, not failure', async t => {
  const {orchestrator: o} = orchestrator({'slow build': {delayMs: 5000}})
  const controller = new AbortController()
  setTimeout(() => {
    controller.abort()
  }, 20)

  const outcome = await o.run(workflow([
    job('a', [commandStep('build', 'slow build')]),
    job('b', [commandStep('build', 'slow build')])
  ]), push, {...runOptions, signal: controller.signal})

  t.is(outcome?.status, 'cancelled')
  t.deepEqual(outcome?.jobs.map(j => j.status), ['cancelled', 'cancelled'])
})

test('superseding run cancels the in-flight run of the same group', async t => {
  const {orchestrator: o, outcomes} = orchestrator({'slow build': {delayMs: 5000}, 'quick build': {}})
  const config = {cancelInProgress: true}

  const first = o.run(workflow([job('build', [commandStep('build', 'slow build')])]), push, {...runOptions, config, runId: 'first'})
  await new Promise(resolve => {
    setTimeout(resolve, 20)
  })
  const second = await o.run(workflow([job('build', [commandStep('build', 'quick build')])]), push, {...runOptions, config, runId: 'second'})

  const superseded = await first
  t.is(superseded?.status, 'cancelled')
  t.is(second?.status, 'success')
  t.deepEqual(outcomes.map(outcome => [outcome.runId, outcome.status]).sort(), [['first', 'cancelled'], ['second', 'success']])
})

test('runs of different groups do not cancel each other', async t => {
  const {orchestrator: o} = orchestrator({'slow build': {delayMs: 50}})
  const config = {cancelInProgress: true}
  const definition = workflow([job('build', [commandStep('build', 'slow build')])])

  const [onMaster, onPr] = await Promise.all([
    o.run(definition, push, {...runOptions, config}),
    o.run(definition, {kind: 'pull_request', number: 12}, {...runOptions, config})
  ])

  t.is(onMaster?.status, 'success')
  t.is(onPr?.status, 'success')
})

test('without cancelInProgress a second run leaves the first alone', async t => {
  const {orchestrator: o} = orchestrator({'slow build': {delayMs: 50}})
  const definition = workflow([job('build', [commandStep('build', 'slow build')])])

  const [first, second] = await Promise.all([
    o.run(definition, push, runOptions),
    o.run(definition, push, runOptions)
  ])

  t.is(first?.status, 'success')
  t.is(second?.status, 'success')
})

// -- concurrency -------------------------------------------------------------

test('concurrency 1 runs instances one after another', async t => {
  const {orchestrator: o, events} = orchestrator({'slow build': {delayMs: 10}})

  await o.run(workflow([
    job('a', [commandStep('build', 'slow build')]),
    job('b', [commandStep('build', 'slow build')])
  ]), push, {...runOptions, config: {concurrency: 1}})

  const lifecycle = events
    .filter(e => e.event === 'JOB_STARTING' || e.event === 'JOB_FINISHED')
    .map(e => e.event === 'JOB_STARTING' || e.event === 'JOB_FINISHED' ? `${e.event}:${e.job.id}` : '')
  t.deepEqual(lifecycle, ['JOB_STARTING:a', 'JOB_FINISHED:a', 'JOB_STARTING:b', 'JOB_FINISHED:b'])
})

test('a concurrency that is not a positive integer runs every instance', async t => {
  const {orchestrator: o} = orchestrator()

  const outcome = await o.run(workflow([checkFormat, lint]), push, {...runOptions, config: {concurrency: Number.NaN}})

  t.is(outcome?.status, 'success')
  t.deepEqual(outcome?.jobs.map(j => [j.instanceId, j.status]), [['check-format', 'success'], ['lint', 'success']])
})

// -- reporting ---------------------------------------------------------------

test('a failing status sink surfaces as ReportError', async t => {
  const o = new Orchestrator({
    provisioner: new FakeProvisioner(),
    reporter: noopReporter,
    statusSink: {
      async report() {
        throw new Error('host API unreachable')
      }
    }
  })

  const error = await t.throwsAsync(async () => o.run(workflow([lint]), push, runOptions), {instanceOf: ReportError})
  t.is(error?.code, 'REPORT_FAILED')
})

test('emits RUN_START then RUN_FINISHED with counts', async t => {
  const {orchestrator: o, events} = orchestrator({'cargo check --target windows-latest': {exitCode: 1}})

  await o.run(workflow([buildMatrix]), push, {...runOptions, runId: 'run-7'})

  const start = events.find(e => e.event === 'RUN_START')
  const finish = events.at(-1)
  t.deepEqual(start?.event === 'RUN_START' ? start.jobs.map(j => j.id) : [], ['build-ubuntu-latest', 'build-windows-latest', 'build-macos-latest'])
  t.deepEqual(finish?.event === 'RUN_FINISHED' ? finish.counts : undefined, {success: 2, failure: 1, cancelled: 0})
})
