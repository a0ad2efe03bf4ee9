/**
 * Pidfile I/O - single integer plus newline
 *
 * Reads are total: a missing, empty or garbled pidfile reads as "no pid".
 *
 * @module lib/process/pidfile
 */

import fs from 'node:fs'
import path from 'node:path'
import { errorCode, errorMessage } from '../../error.js'
import { pidfileLogger } from '../logger.js'

const log = pidfileLogger()

/**
 * Reads the pid recorded in a pidfile.
 *
 * @returns The pid, or undefined when the file is missing, empty or not an integer
 */
export function readPidfile(pidfile: string): number | undefined {
  let text: string
  try {
    text = fs.readFileSync(pidfile, 'utf-8')
  } catch (err) {
    if (errorCode(err) !== 'ENOENT') {
      log.debug`Unreadable pidfile ${pidfile}: ${errorMessage(err)}`
    }
    return undefined
  }

  const firstLine = text
    .split('\n')
    .map((line) => line.trim())
    .find((line) => line.length > 0)
  if (!firstLine || !/^-?\d+$/.test(firstLine)) return undefined

  return Number.parseInt(firstLine, 10)
}

/**
 * Writes (overwrites) a pidfile, creating parent directories as needed.
 */
export function writePidfile(pidfile: string, pid: number): void {
  fs.mkdirSync(path.dirname(pidfile), { recursive: true })
  fs.writeFileSync(pidfile, `${pid}\n`, 'utf-8')
}

/**
 * Creates a pidfile only if none exists.
 *
 * @returns False when another pidfile is already in place
 */
export function createPidfileExclusive(pidfile: string, pid: number): boolean {
  fs.mkdirSync(path.dirname(pidfile), { recursive: true })
  try {
    fs.writeFileSync(pidfile, `${pid}\n`, { encoding: 'utf-8', flag: 'wx' })
    return true
  } catch (err) {
    if (errorCode(err) === 'EEXIST') return false
    throw err
  }
}

/**
 * Deletes a pidfile, best-effort.
 *
 * @returns True when the file is gone afterwards (including when it never existed)
 */
export function removePidfile(pidfile: string): boolean {
  try {
    fs.unlinkSync(pidfile)
    return true
  } catch (err) {
    if (errorCode(err) === 'ENOENT') return true
    log.warning`Could not remove pidfile ${pidfile}: ${errorMessage(err)}`
    return false
  }
}
