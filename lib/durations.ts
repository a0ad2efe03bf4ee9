/**
 * Duration parsing for human-readable intervals ("10", "10s", "1.5m", "2h", "1d")
 * @module lib/durations
 */

import { InvalidDurationError } from '../error.js'

const DURATION_PATTERN = /^(?<num>\d+(?:\.\d+)?)(?<unit>[smhd]?)$/i

const UNIT_SECONDS: Record<string, number> = {
  s: 1,
  m: 60,
  h: 3600,
  d: 86400,
}

/**
 * Parses a duration string into seconds. Bare numbers are seconds.
 *
 * @throws InvalidDurationError for malformed, composite or non-positive input
 */
export function parseDurationSeconds(text: string): number {
  const match = DURATION_PATTERN.exec(text.trim())
  const num = match?.groups?.['num']
  if (!match || num === undefined) {
    throw new InvalidDurationError(text, 'expected like 10, 10s, 1m, 2h, 1d')
  }

  const value = Number(num)
  if (value <= 0) {
    throw new InvalidDurationError(text, 'duration must be > 0')
  }

  const unit = (match.groups?.['unit'] || 's').toLowerCase()
  return value * (UNIT_SECONDS[unit] ?? 1)
}
