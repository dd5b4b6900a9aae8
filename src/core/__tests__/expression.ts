import test from 'ava'
import {ValidationError} from '../../errors.js'
import {buildContext, evaluateCondition, interpolate, interpolateRecord} from '../expression.js'

const push = {kind: 'push', branch: 'master'} as const
const context = buildContext({
  event: push,
  matrix: {os: 'windows-latest', toolchain: 'stable'},
  environment: {label: 'windows-latest', os: 'Windows'},
  jobId: 'build',
  env: {CARGO_TERM_COLOR: 'always'}
})

// -- buildContext --------------------------------------------------------------

test('buildContext: exposes github aliases of the event', t => {
  t.deepEqual(context.github, {event_name: 'push', ref: 'refs/heads/master', ref_name: 'master'})
  t.deepEqual(buildContext({event: {kind: 'pull_request', number: 3}}).github, {event_name: 'pull_request', ref: '', ref_name: ''})
})

test('buildContext: runner and job are set only when known', t => {
  t.deepEqual(context.runner, {os: 'Windows', label: 'windows-latest'})
  t.deepEqual(context.job, {id: 'build'})
  const bare = buildContext({event: push})
  t.is(bare.runner, undefined)
  t.is(bare.job, undefined)
})

// -- interpolate ---------------------------------------------------------------

test('interpolate: replaces every expression', t => {
  t.is(interpolate('cargo build --target ${{ matrix.os }} +${{matrix.toolchain}}', context), 'cargo build --target windows-latest +stable')
})

test('interpolate: undefined values become empty strings', t => {
  t.is(interpolate('[${{ matrix.missing }}]', context), '[]')
})

test('interpolate: text without expressions is unchanged', t => {
  t.is(interpolate('echo $HOME', context), 'echo $HOME')
})

test('interpolate: reads runner and env values', t => {
  t.is(interpolate('${{ runner.os }}-${{ env.CARGO_TERM_COLOR }}', context), 'Windows-always')
})

test('interpolate: invalid expression throws ValidationError', t => {
  const error = t.throws(() => interpolate('${{ matrix.os == }}', context), {instanceOf: ValidationError})
  t.is(error?.message, 'Invalid expression "matrix.os =="')
})

test('interpolateRecord: interpolates every value', t => {
  t.deepEqual(interpolateRecord({key: '${{ runner.os }}-lint', path: 'target'}, context), {key: 'Windows-lint', path: 'target'})
})

// -- evaluateCondition ---------------------------------------------------------

test('evaluateCondition: bare and wrapped expressions', async t => {
  t.true(await evaluateCondition('runner.os == "Windows"', context))
  t.true(await evaluateCondition('${{ github.event_name == "push" }}', context))
  t.false(await evaluateCondition('matrix.toolchain == "nightly"', context))
})

test('evaluateCondition: helper functions are case-insensitive', async t => {
  t.true(await evaluateCondition('startsWith(github.ref_name, "MAST")', context))
  t.true(await evaluateCondition('contains(matrix.os, "Windows")', context))
  t.true(await evaluateCondition('endsWith(runner.label, "latest")', context))
})

test('evaluateCondition: invalid expression is false', async t => {
  t.false(await evaluateCondition('runner.os ==', context))
})
