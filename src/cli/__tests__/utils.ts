import process from 'node:process'
import {mkdir, writeFile} from 'node:fs/promises'
import {join, resolve} from 'node:path'
import test from 'ava'
import {InvalidArgumentError} from 'commander'
import {ValidationError} from '../../errors.js'
import {parsePositiveInteger, resolveWorkdir, resolveWorkflowFile} from '../utils.js'
import {createTmpDir} from '../../__tests__/helpers.js'

test('resolveWorkdir: flag wins over config', t => {
  t.is(resolveWorkdir({workdir: '/tmp/flag'}, {workdir: '/tmp/config'}), '/tmp/flag')
})

test('resolveWorkdir: config, then default, when no flag or env', t => {
  if (process.env.VERITY_WORKDIR !== undefined) {
    t.pass()
    return
  }

  t.is(resolveWorkdir({}, {workdir: '/tmp/config'}), '/tmp/config')
  t.is(resolveWorkdir({}), resolve('.verity'))
})

test('resolveWorkflowFile: a file path is returned as is', async t => {
  const dir = await createTmpDir()
  const file = join(dir, 'ci.yml')
  await writeFile(file, 'on: push\n')
  t.is(await resolveWorkflowFile(file), file)
})

test('resolveWorkflowFile: finds .github/workflows/build.yml first', async t => {
  const dir = await createTmpDir()
  await mkdir(join(dir, '.github', 'workflows'), {recursive: true})
  await writeFile(join(dir, '.github', 'workflows', 'build.yml'), 'on: push\n')
  await writeFile(join(dir, 'verity.yml'), 'on: push\n')

  t.is(await resolveWorkflowFile(dir), join(dir, '.github', 'workflows', 'build.yml'))
})

test('resolveWorkflowFile: falls back to verity.yml', async t => {
  const dir = await createTmpDir()
  await writeFile(join(dir, 'verity.yml'), 'on: push\n')
  t.is(await resolveWorkflowFile(dir), join(dir, 'verity.yml'))
})

test('resolveWorkflowFile: throws when nothing is found', async t => {
  const dir = await createTmpDir()
  const error = await t.throwsAsync(resolveWorkflowFile(dir), {instanceOf: ValidationError})
  t.regex(error?.message ?? '', /^No workflow file found in /)
})

test('resolveWorkflowFile: throws for a missing path', async t => {
  await t.throwsAsync(resolveWorkflowFile(join(await createTmpDir(), 'missing.yml')), {instanceOf: ValidationError})
})

test('parsePositiveInteger: accepts positive integers', t => {
  t.is(parsePositiveInteger('4'), 4)
})

test('parsePositiveInteger: rejects anything else', t => {
  for (const value of ['abc', '0', '-2', '1.5', '']) {
    t.throws(() => parsePositiveInteger(value), {instanceOf: InvalidArgumentError})
  }
})
