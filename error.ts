/**
 * Custom error classes for shotloop
 * @module error
 */

/**
 * Error thrown when flags, env vars or env files combine into an invalid configuration
 * Surfaced to the user before anything is written
 */
export class ConfigurationError extends Error {
  readonly setting?: string

  constructor(message: string, setting?: string) {
    super(setting ? `${setting}: ${message}` : message)
    this.setting = setting
    this.name = 'ConfigurationError'
  }
}

/**
 * Error thrown when a duration string does not match <number>[s|m|h|d]
 */
export class InvalidDurationError extends Error {
  readonly input: string

  constructor(input: string, reason: string) {
    super(`Invalid duration "${input}": ${reason}`)
    this.input = input
    this.name = 'InvalidDurationError'
  }
}

/**
 * Error thrown when the pidfile names a live process
 * The existing pidfile is left untouched
 */
export class AlreadyRunningError extends Error {
  readonly pid: number
  readonly pidfile: string

  constructor(pid: number, pidfile: string) {
    super(`Driver already running (pid ${pid}) per pidfile: ${pidfile}`)
    this.pid = pid
    this.pidfile = pidfile
    this.name = 'AlreadyRunningError'
  }
}

/**
 * Error thrown when the requested monitor index is not reported by the backend
 */
export class DisplayNotAvailableError extends Error {
  readonly display: number
  readonly available: number

  constructor(display: number, available: number) {
    const message =
      display < 0
        ? `Display must be >= 0 (got ${display})`
        : `Display ${display} not available; found ${available} displays`
    super(message)
    this.display = display
    this.available = available
    this.name = 'DisplayNotAvailableError'
  }
}

/** Captured output of a failed external step */
export interface FailedStep {
  command: string
  exitCode: number
  stdout: string
  stderr: string
}

/**
 * Error thrown when a sink rejects or fails a delivery
 * Aborts the current capture cycle; the driver still records its stop checkpoint
 */
export class DeliveryFailedError extends Error {
  readonly step: string
  readonly detail?: FailedStep

  constructor(step: string, detail?: FailedStep, options?: { cause?: unknown }) {
    super(DeliveryFailedError.describe(step, detail), options)
    this.step = step
    this.detail = detail
    this.name = 'DeliveryFailedError'
  }

  static describe(step: string, detail?: FailedStep): string {
    if (!detail) return `${step} failed`
    return [
      `${step} failed (exit ${detail.exitCode}).`,
      `cmd: ${detail.command}`,
      `stdout:\n${detail.stdout}`,
      `stderr:\n${detail.stderr}`,
    ].join('\n')
  }
}

/**
 * Error thrown when the git sink's repository is not a git working tree
 */
export class NotAGitRepoError extends DeliveryFailedError {
  readonly repoDir: string

  constructor(repoDir: string, detail?: FailedStep) {
    super(`git rev-parse in ${repoDir}`, detail)
    this.repoDir = repoDir
    this.name = 'NotAGitRepoError'
  }
}

// =============================================================================
// HELPERS
// =============================================================================

/** Message of an unknown thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/** Errno-style code of an unknown thrown value (ENOENT, ESRCH, ...) */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code
  }
  return undefined
}
