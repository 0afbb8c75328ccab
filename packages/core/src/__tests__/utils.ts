import test from 'ava'
import {elapsedMs, formatDuration, isNotFound} from '../utils.js'

test('formatDuration picks a unit by magnitude', t => {
  t.is(formatDuration(250), '250ms')
  t.is(formatDuration(1500), '1.5s')
  t.is(formatDuration(125_000), '2m 5s')
})

test('elapsedMs subtracts ISO timestamps', t => {
  t.is(elapsedMs('2024-09-09T03:00:00.000Z', '2024-09-09T03:00:01.250Z'), 1250)
})

test('isNotFound only matches ENOENT errors', t => {
  t.true(isNotFound(Object.assign(new Error('missing'), {code: 'ENOENT'})))
  t.false(isNotFound(Object.assign(new Error('denied'), {code: 'EACCES'})))
  t.false(isNotFound('ENOENT'))
})
