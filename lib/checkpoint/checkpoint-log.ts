/**
 * Checkpoint Log - append-only CSV audit trail of driver lifecycle events
 *
 * Each append is a synchronous write of one row; the header is written only
 * when the file is created. Nothing here rewrites or truncates the log.
 *
 * @module lib/checkpoint/checkpoint-log
 */

import fs from 'node:fs'
import path from 'node:path'
import { errorCode } from '../../error.js'
import { checkpointLogger } from '../logger.js'
import type { CheckpointRecord, Rect } from '../../types/domain.js'

export const CHECKPOINT_FIELDS = [
  'event',
  'ts_utc',
  'count',
  'filename',
  'out_dir',
  'interval_seconds',
  'display',
  'region',
  'send',
  'session_id',
] as const

/** Renders a region as left,top,width,height (empty when absent) */
export function formatRegion(region: Rect | undefined): string {
  if (!region) return ''
  return `${region.left},${region.top},${region.width},${region.height}`
}

/** Quotes a CSV field when it contains a delimiter, quote or line break */
export function escapeCsvField(value: string): string {
  if (!/[",\r\n]/.test(value)) return value
  return `"${value.replace(/"/g, '""')}"`
}

/** Serializes a record into one CSV line (no trailing newline) */
export function toCsvRow(record: CheckpointRecord): string {
  const fields = [
    record.event,
    record.tsUtc,
    String(record.count),
    record.filename,
    record.outDir,
    String(record.intervalSeconds),
    String(record.display),
    formatRegion(record.region),
    record.send,
    record.sessionId,
  ]
  return fields.map(escapeCsvField).join(',')
}

/**
 * Appends one checkpoint row, creating the file (with header) and its directory if needed.
 */
export function appendCheckpoint(csvPath: string, record: CheckpointRecord): void {
  fs.mkdirSync(path.dirname(csvPath), { recursive: true })
  const writeHeader = !fs.existsSync(csvPath)

  const header = writeHeader ? `${CHECKPOINT_FIELDS.join(',')}\n` : ''
  fs.appendFileSync(csvPath, `${header}${toCsvRow(record)}\n`, 'utf-8')
  checkpointLogger().debug`${record.event} #${record.count} -> ${csvPath}`
}

// =============================================================================
// SUMMARY
// =============================================================================

export interface CheckpointSummary {
  captures: number
  lastRow?: string
}

/**
 * Counts capture rows and returns the last row of a checkpoint log.
 * A missing log summarizes as zero captures.
 */
export function summarizeCheckpoints(csvPath: string): CheckpointSummary {
  let text: string
  try {
    text = fs.readFileSync(csvPath, 'utf-8')
  } catch (err) {
    if (errorCode(err) === 'ENOENT') return { captures: 0 }
    throw err
  }

  const rows = text.split('\n').filter((line) => line.length > 0).slice(1)
  const captures = rows.filter((row) => row.startsWith('capture,')).length

  return { captures, lastRow: rows.at(-1) }
}
