#!/usr/bin/env node
/**
 * shotloop entry point
 *
 * Turns SIGINT/SIGTERM into an abort of the running command and maps the
 * command's result onto the process exit code.
 *
 * @module main
 */

import { runCli } from './cli.js'
import { FORCED_SHUTDOWN_MS } from './const.js'
import { cliLogger } from './lib/logger.js'
import type { Driver } from './driver.js'

const log = cliLogger()
const controller = new AbortController()
let activeDriver: Driver | undefined

/** Releases the driver's pidfile and records its stop, then exits */
function forceExit(): never {
  activeDriver?.abandon()
  process.exit(1)
}

/**
 * First signal requests a graceful stop; a second one, or a stop that takes
 * longer than FORCED_SHUTDOWN_MS, exits immediately.
 */
function requestShutdown(signal: NodeJS.Signals): void {
  if (controller.signal.aborted) {
    log.warning`${signal} received again, exiting without waiting`
    forceExit()
  }

  log.info`${signal} received, stopping after the current step...`
  controller.abort()

  setTimeout(() => {
    log.error`Forced shutdown after ${FORCED_SHUTDOWN_MS} ms`
    forceExit()
  }, FORCED_SHUTDOWN_MS).unref()
}

process.on('SIGTERM', requestShutdown)
process.on('SIGINT', requestShutdown)

process.on('uncaughtException', (err: Error) => {
  log.fatal`Uncaught exception: ${err}`
  forceExit()
})

process.on('unhandledRejection', (reason: unknown) => {
  log.error`Unhandled rejection: ${reason}`
})

process.exitCode = await runCli(process.argv.slice(2), {
  env: process.env,
  cwd: process.cwd(),
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
  signal: controller.signal,
  onDriverStart: (driver) => {
    activeDriver = driver
  },
})
