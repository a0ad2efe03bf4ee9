/**
 * Capture Retention - keeps the newest N captures in the output directory
 *
 * Only PNG files carrying the capture prefix are considered, so checkpoint
 * logs, pidfiles and unrelated images in the same directory are never touched.
 * Never throws: the driver logs the outcome and keeps capturing.
 *
 * @module lib/retention/capture-cleanup
 */

import fs from 'node:fs'
import path from 'node:path'
import { errorMessage } from '../../error.js'

export interface PruneOptions {
  outDir: string
  /** File name prefix of captures (e.g. "shot_") */
  prefix: string
  /** Number of newest captures to keep */
  keep: number
}

export interface PruneResult {
  /** Captures left in place, newest first */
  kept: string[]
  /** Captures deleted, newest first */
  deleted: string[]
  /** Captures that could not be deleted, with the reason */
  failed: Array<{ name: string; reason: string }>
  /** Set when the directory could not be listed */
  error?: string
}

interface Capture {
  name: string
  modifiedMs: number
}

/** True for "<prefix>...png" (extension case-insensitive) */
export function isCaptureName(name: string, prefix: string): boolean {
  return name.startsWith(prefix) && name.toLowerCase().endsWith('.png') && name.length > prefix.length + '.png'.length
}

/**
 * Deletes every capture beyond the newest `keep`, ordered by modification
 * time with the file name breaking ties.
 */
export function pruneCaptures(options: PruneOptions): PruneResult {
  const { outDir, prefix, keep } = options

  let captures: Capture[]
  try {
    captures = listCaptures(outDir, prefix)
  } catch (err) {
    return { kept: [], deleted: [], failed: [], error: errorMessage(err) }
  }

  const result: PruneResult = { kept: [], deleted: [], failed: [] }
  captures.forEach((capture, index) => {
    if (index < keep) {
      result.kept.push(capture.name)
      return
    }
    try {
      fs.unlinkSync(path.join(outDir, capture.name))
      result.deleted.push(capture.name)
    } catch (err) {
      result.failed.push({ name: capture.name, reason: errorMessage(err) })
    }
  })
  return result
}

/** Captures in outDir, newest first */
function listCaptures(outDir: string, prefix: string): Capture[] {
  return fs
    .readdirSync(outDir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && isCaptureName(entry.name, prefix))
    .map((entry) => ({
      name: entry.name,
      modifiedMs: fs.statSync(path.join(outDir, entry.name)).mtimeMs,
    }))
    .sort((a, b) => b.modifiedMs - a.modifiedMs || b.name.localeCompare(a.name))
}
