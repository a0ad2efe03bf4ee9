/**
 * Driver Module
 *
 * Long-running orchestrator for periodic screen capture.
 * Owns the pidfile, runs the capture/deliver/checkpoint cycle and guarantees
 * cleanup on every exit path.
 *
 * Lifecycle: idle → starting → running → stopping → stopped
 *
 * 1. Starting - refuse to run beside a live instance, reclaim a stale pidfile,
 *    write our own, record the start checkpoint
 * 2. Running - capture, deliver (if configured), record, sweep retention, sleep
 * 3. Stopping - capture limit reached, abort signal observed, or a cycle threw
 * 4. Stopped - stop checkpoint written and pidfile removed, whatever the cause
 *
 * NOTE: Capture and delivery errors are never retried; they end the run.
 * NOTE: The sleep between captures is sliced so an abort is seen within SLEEP_SLICE_MS.
 * NOTE: abandon() performs the stopping steps synchronously for a process that
 *       is about to exit without waiting for run() to unwind.
 *
 * @module driver
 */

import path from 'node:path'
import { randomUUID } from 'node:crypto'
import { AlreadyRunningError } from './error.js'
import { SLEEP_SLICE_MS } from './const.js'
import { capturePng, timestampedFilename, type CaptureBackend } from './lib/capture/capture-invoker.js'
import { appendCheckpoint, formatRegion } from './lib/checkpoint/checkpoint-log.js'
import { checkStatus, systemProbe, type ProcessProbe } from './lib/process/liveness.js'
import { createPidfileExclusive, removePidfile, writePidfile } from './lib/process/pidfile.js'
import { pruneCaptures } from './lib/retention/capture-cleanup.js'
import { driverLogger, retentionLogger } from './lib/logger.js'
import type { Dispatcher } from './lib/delivery/dispatcher.js'
import type { CheckpointEvent, DriverState, ResolvedDriverConfig } from './types/domain.js'

const log = driverLogger()

/** Collaborators injected into the driver */
export interface DriverDependencies {
  backend: CaptureBackend
  dispatcher?: Dispatcher
  probe?: ProcessProbe
  /** Pid written to the pidfile; defaults to this process */
  pid?: number
  now?: () => Date
  sessionId?: string
}

export type StopReason = 'limit' | 'cancelled'

/** Result of a run that ended without error */
export interface DriverRunResult {
  captures: number
  reason: StopReason
  sessionId: string
}

/**
 * Periodic capture driver. One instance runs once.
 */
export class Driver {
  #config: ResolvedDriverConfig
  #backend: CaptureBackend
  #dispatcher: Dispatcher | undefined
  #probe: ProcessProbe
  #pid: number
  #now: () => Date
  #sessionId: string
  #state: DriverState = 'idle'
  #count = 0

  constructor(config: ResolvedDriverConfig, deps: DriverDependencies) {
    this.#config = config
    this.#backend = deps.backend
    this.#dispatcher = deps.dispatcher
    this.#probe = deps.probe ?? systemProbe
    this.#pid = deps.pid ?? process.pid
    this.#now = deps.now ?? (() => new Date())
    this.#sessionId = deps.sessionId ?? randomUUID()
  }

  get state(): DriverState {
    return this.#state
  }

  get captureCount(): number {
    return this.#count
  }

  get sessionId(): string {
    return this.#sessionId
  }

  /**
   * Runs until the capture limit is reached or the signal aborts.
   *
   * @param signal - Aborted by the caller (typically on SIGINT/SIGTERM)
   * @throws AlreadyRunningError before touching anything when another instance holds the pidfile
   * @throws Any capture or delivery error, after cleanup has run
   */
  async run(signal?: AbortSignal): Promise<DriverRunResult> {
    if (this.#state !== 'idle') throw new Error(`Driver already ${this.#state}`)

    this.#state = 'starting'
    try {
      this.#claimPidfile()
    } catch (err) {
      this.#state = 'stopped'
      throw err
    }

    try {
      this.#checkpoint('start')
      this.#logStartup()
      this.#state = 'running'

      while (!signal?.aborted && this.#state === 'running') {
        await this.#runCycle()
        if (this.#state !== 'running') break

        const { maxShots } = this.#config
        if (maxShots !== undefined && this.#count >= maxShots) {
          log.info`Reached capture limit of ${maxShots}`
          return this.#result('limit')
        }

        await this.#sleep(this.#config.intervalSeconds * 1000, signal)
      }

      log.info`Stop requested, shutting down after ${this.#count} capture(s)`
      return this.#result('cancelled')
    } finally {
      this.#shutdown()
    }
  }

  // ===========================================================================
  // STARTING
  // ===========================================================================

  /**
   * Claims the pidfile: live owner → AlreadyRunningError, stale owner → replaced.
   */
  #claimPidfile(): void {
    const { pidfile } = this.#config
    const status = checkStatus(pidfile, this.#probe)

    if (status.running && status.pid !== undefined && status.pid !== this.#pid) {
      throw new AlreadyRunningError(status.pid, pidfile)
    }
    if (status.stalePidfile) {
      log.warning`Removing stale pidfile ${pidfile} (pid ${status.pid})`
      removePidfile(pidfile)
    } else if (status.pid !== undefined) {
      log.debug`Pidfile ${pidfile} already names this process`
      removePidfile(pidfile)
    }

    if (createPidfileExclusive(pidfile, this.#pid)) return

    // Either another instance won the race or a leftover file could not be removed
    const current = checkStatus(pidfile, this.#probe)
    if (current.running && current.pid !== undefined && current.pid !== this.#pid) {
      throw new AlreadyRunningError(current.pid, pidfile)
    }
    writePidfile(pidfile, this.#pid)
  }

  #logStartup(): void {
    const { outDir, intervalSeconds, display, region, pidfile, delivery } = this.#config
    log.info`Driver started (pid ${this.#pid}, session ${this.#sessionId})`
    log.info`out_dir: ${outDir}, interval: ${intervalSeconds}s, display: ${display}, region: ${formatRegion(region) || 'none'}`
    log.info`pidfile: ${pidfile}, send: ${delivery.kind}`
  }

  // ===========================================================================
  // RUNNING
  // ===========================================================================

  /** One capture → deliver → checkpoint → retention pass */
  async #runCycle(): Promise<void> {
    const { outDir, filenamePrefix, display, region } = this.#config
    const filename = timestampedFilename(filenamePrefix, this.#now())
    const outPath = path.join(outDir, filename)

    await capturePng({ outPath, display, region, backend: this.#backend })
    this.#count++
    log.info`${this.#count} Saved: ${outPath}`

    if (this.#dispatcher) {
      const outcome = await this.#dispatcher.deliver({
        filePath: outPath,
        sequence: this.#count,
        message: `shotloop capture ${this.#count}: ${filename}`,
      })
      log.debug`Delivery via ${this.#dispatcher.mode}: ${outcome}`
    }
    if (this.#state !== 'running') return

    this.#checkpoint('capture', filename)
    this.#applyRetention()
  }

  #applyRetention(): void {
    const { keep, outDir, filenamePrefix } = this.#config
    if (keep === undefined) return

    const retention = retentionLogger()
    const result = pruneCaptures({ outDir, prefix: filenamePrefix, keep })
    if (result.error) retention.warning`Retention sweep failed: ${result.error}`
    for (const { name, reason } of result.failed) retention.warning`Could not delete ${name}: ${reason}`
    if (result.deleted.length > 0) retention.info`Deleted ${result.deleted.length} old capture(s)`
  }

  /** Sleeps in slices of at most SLEEP_SLICE_MS, returning early once aborted */
  async #sleep(ms: number, signal?: AbortSignal): Promise<void> {
    const deadline = Date.now() + ms
    while (!signal?.aborted) {
      const remaining = deadline - Date.now()
      if (remaining <= 0) return
      await new Promise((resolve) => setTimeout(resolve, Math.min(remaining, SLEEP_SLICE_MS)))
    }
  }

  // ===========================================================================
  // STOPPING
  // ===========================================================================

  /**
   * Writes the stop checkpoint and releases the pidfile right away.
   * No-op unless running. The pending cycle records nothing further and
   * run() skips its own cleanup afterwards.
   */
  abandon(): void {
    if (this.#state !== 'running') return

    log.warning`Abandoning run after ${this.#count} capture(s)`
    this.#shutdown()
  }

  #shutdown(): void {
    if (this.#state === 'stopping' || this.#state === 'stopped') return
    this.#state = 'stopping'
    try {
      this.#checkpoint('stop')
    } finally {
      if (!removePidfile(this.#config.pidfile)) {
        log.warning`Leaving pidfile ${this.#config.pidfile} behind`
      }
      this.#state = 'stopped'
      log.info`Driver stopped after ${this.#count} capture(s)`
    }
  }

  #checkpoint(event: CheckpointEvent, filename = ''): void {
    const { checkpointCsv, outDir, intervalSeconds, display, region, delivery } = this.#config
    appendCheckpoint(checkpointCsv, {
      event,
      tsUtc: this.#now().toISOString(),
      count: this.#count,
      filename,
      outDir,
      intervalSeconds,
      display,
      region,
      send: delivery.kind,
      sessionId: this.#sessionId,
    })
  }

  #result(reason: StopReason): DriverRunResult {
    return { captures: this.#count, reason, sessionId: this.#sessionId }
  }
}
