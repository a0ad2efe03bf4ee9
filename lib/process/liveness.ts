/**
 * Process Liveness - status classification and graceful/forceful stop
 *
 * All OS interaction goes through a ProcessProbe so status and stop logic
 * can be exercised with test doubles.
 *
 * @module lib/process/liveness
 */

import { errorCode } from '../../error.js'
import { FORCE_KILL_WAIT_MS, STOP_POLL_INTERVAL_MS } from '../../const.js'
import { readPidfile } from './pidfile.js'
import { pidfileLogger } from '../logger.js'
import type { DriverStatus } from '../../types/domain.js'

const log = pidfileLogger()

export type SignalKind = 'graceful' | 'forceful'

/** OS process inspection and signalling */
export interface ProcessProbe {
  exists(pid: number): boolean
  signal(pid: number, kind: SignalKind): void
}

const SIGNALS: Record<SignalKind, NodeJS.Signals> = {
  graceful: 'SIGTERM',
  forceful: 'SIGKILL',
}

/**
 * Probe backed by process.kill().
 *
 * exists() sends signal 0: EPERM means the process lives under another user,
 * ESRCH means it is gone, and any other failure is reported as not alive.
 */
export const systemProbe: ProcessProbe = {
  exists(pid: number): boolean {
    if (!Number.isInteger(pid) || pid <= 0) return false
    try {
      process.kill(pid, 0)
      return true
    } catch (err) {
      return errorCode(err) === 'EPERM'
    }
  },

  signal(pid: number, kind: SignalKind): void {
    try {
      process.kill(pid, SIGNALS[kind])
    } catch (err) {
      if (errorCode(err) === 'ESRCH') return
      throw err
    }
  },
}

/**
 * Classifies the process recorded in a pidfile. Never modifies the pidfile.
 */
export function checkStatus(pidfile: string, probe: ProcessProbe = systemProbe): DriverStatus {
  const pid = readPidfile(pidfile)
  if (pid === undefined) {
    return { pidfile, running: false, stalePidfile: false }
  }

  const alive = probe.exists(pid)
  return { pidfile, pid, running: alive, stalePidfile: !alive }
}

export interface StopOptions {
  timeoutSeconds: number
  force: boolean
  /** Poll period override, mostly for tests */
  pollIntervalMs?: number
}

/**
 * Signals a process to exit and waits for it, escalating when asked.
 *
 * @returns True when the process is confirmed gone
 */
export async function stopProcess(
  pid: number,
  options: StopOptions,
  probe: ProcessProbe = systemProbe
): Promise<boolean> {
  const pollMs = options.pollIntervalMs ?? STOP_POLL_INTERVAL_MS
  if (!probe.exists(pid)) return true

  log.info`Sending graceful stop to pid ${pid}`
  probe.signal(pid, 'graceful')
  if (await waitForExit(pid, options.timeoutSeconds * 1000, pollMs, probe)) return true

  if (!options.force) {
    log.warning`Pid ${pid} still alive after ${options.timeoutSeconds}s`
    return false
  }

  log.warning`Pid ${pid} ignored graceful stop, sending forceful kill`
  probe.signal(pid, 'forceful')
  return waitForExit(pid, FORCE_KILL_WAIT_MS, pollMs, probe)
}

/** Polls liveness until the process is gone or the wait elapses */
async function waitForExit(
  pid: number,
  waitMs: number,
  pollMs: number,
  probe: ProcessProbe
): Promise<boolean> {
  const deadline = Date.now() + waitMs
  while (probe.exists(pid)) {
    if (Date.now() >= deadline) return false
    await delay(Math.min(pollMs, Math.max(deadline - Date.now(), 0)))
  }
  return true
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}
