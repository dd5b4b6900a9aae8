import test from 'ava'
import {deepFreeze, formatDuration, isRecord, slugify, stepDisplayName} from '../utils.js'
import {commandStep} from '../../__tests__/helpers.js'

test('slugify: lowercases and replaces separators', t => {
  t.is(slugify('Check Format'), 'check-format')
  t.is(slugify('actions/checkout'), 'actions-checkout')
})

test('slugify: strips accents and trims dashes', t => {
  t.is(slugify('  Vérification!  '), 'verification')
})

test('slugify: collapses runs of dashes', t => {
  t.is(slugify('cargo  --  check'), 'cargo-check')
})

test('isRecord: only plain objects', t => {
  t.true(isRecord({}))
  t.false(isRecord([]))
  t.false(isRecord(null))
  t.false(isRecord('x'))
})

test('deepFreeze: freezes nested objects and arrays', t => {
  const value = deepFreeze({jobs: [{steps: [{id: 'a'}]}]})
  t.true(Object.isFrozen(value))
  t.true(Object.isFrozen(value.jobs))
  t.true(Object.isFrozen(value.jobs[0].steps[0]))
})

test('stepDisplayName: name, then uses, then first line of run', t => {
  t.is(stepDisplayName(commandStep('a', 'cargo check', {name: 'Check'})), 'Check')
  t.is(stepDisplayName({kind: 'capability', id: 'c', uses: 'actions/checkout@v4', params: {}}), 'Run actions/checkout@v4')
  t.is(stepDisplayName(commandStep('a', '  cargo fmt\ncargo check\n')), 'Run cargo fmt')
})

test('formatDuration: milliseconds, seconds and minutes', t => {
  t.is(formatDuration(250), '250ms')
  t.is(formatDuration(1500), '1.5s')
  t.is(formatDuration(125_000), '2m 5s')
})
