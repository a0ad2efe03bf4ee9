/**
 * Unit tests for duration parsing
 *
 * @module tests/unit/durations
 */

import { describe, it, expect } from 'vitest'
import { parseDurationSeconds } from '../../lib/durations.js'
import { InvalidDurationError } from '../../error.js'

describe('parseDurationSeconds', () => {
  it.each([
    ['10', 10],
    ['10s', 10],
    ['1m', 60],
    ['2h', 7200],
    ['1d', 86400],
    ['1.5m', 90],
    ['0.25s', 0.25],
  ])('parses %s as %d seconds', (input, expected) => {
    expect(parseDurationSeconds(input)).toBe(expected)
  })

  it('accepts upper-case units', () => {
    expect(parseDurationSeconds('2H')).toBe(7200)
    expect(parseDurationSeconds('3S')).toBe(3)
  })

  it('ignores surrounding whitespace', () => {
    expect(parseDurationSeconds('  5m \n')).toBe(300)
  })

  it.each(['', '0', '0s', '0.0m', '-5', '1m30s', '10 s', '10x', 'abc', '.5', 's'])(
    'rejects %j',
    (input) => {
      expect(() => parseDurationSeconds(input)).toThrow(InvalidDurationError)
    }
  )

  it('explains a non-positive value', () => {
    expect(() => parseDurationSeconds('0')).toThrow('Invalid duration "0": duration must be > 0')
  })

  it('explains a malformed value', () => {
    expect(() => parseDurationSeconds('1m30s')).toThrow(
      'Invalid duration "1m30s": expected like 10, 10s, 1m, 2h, 1d'
    )
  })
})
