/**
 * Command-line interface
 *
 * Wires commander commands onto the resolver, driver and lifecycle helpers.
 * Every collaborator that touches the outside world (screen, processes, git,
 * network, console) is injected so commands can be exercised in-process.
 *
 * Exit codes: 0 success (status: running), 1 failure (status: not running).
 *
 * @module cli
 */

import path from 'node:path'
import { Command, CommanderError } from 'commander'
import { Driver } from './driver.js'
import {
  AlreadyRunningError,
  ConfigurationError,
  DeliveryFailedError,
  DisplayNotAvailableError,
  errorMessage,
} from './error.js'
import { DEFAULT_STOP_TIMEOUT_SECONDS } from './const.js'
import {
  resolveCapture,
  resolveDriver,
  resolveDuration,
  resolveLocations,
  resolvePath,
  type CaptureFlags,
  type DeliveryFlags,
  type DriverFlags,
  type LocationFlags,
  type ResolveContext,
} from './lib/config/config-resolver.js'
import { findDefaultEnvFile, loadEnvFile } from './lib/config/env-file.js'
import { capturePng, timestampedFilename, type CaptureBackend } from './lib/capture/capture-invoker.js'
import { DesktopCaptureBackend } from './lib/capture/desktop-backend.js'
import { summarizeCheckpoints } from './lib/checkpoint/checkpoint-log.js'
import { createDispatcher } from './lib/delivery/dispatcher.js'
import { runPreflight } from './lib/delivery/preflight.js'
import type { CommandRunner } from './lib/delivery/command-runner.js'
import { checkStatus, stopProcess, systemProbe, type ProcessProbe } from './lib/process/liveness.js'
import { removePidfile } from './lib/process/pidfile.js'
import { cliLogger, initializeLogging } from './lib/logger.js'
import type { Rect } from './types/domain.js'

const log = cliLogger()

/** Outside-world collaborators; everything but env, cwd and output has a real default */
export interface CliDependencies {
  env: NodeJS.ProcessEnv
  cwd: string
  stdout: (line: string) => void
  stderr: (line: string) => void
  backend?: CaptureBackend
  probe?: ProcessProbe
  runCommand?: CommandRunner
  fetch?: typeof fetch
  /** Aborted to stop a running driver */
  signal?: AbortSignal
  /** Receives the driver before it runs, so a forced exit can abandon it */
  onDriverStart?: (driver: Driver) => void
}

interface GlobalOptions {
  envFile?: string
  verbose?: boolean
}

interface CaptureOptions extends CaptureFlags {
  out?: string
}

interface StatusOptions extends LocationFlags {
  quiet?: boolean
  checkpoints?: boolean
}

interface StopOptions extends LocationFlags {
  timeout: string
  force?: boolean
}

interface PreflightOptions extends DeliveryFlags {
  dir?: string
}

/** Errors whose message is the whole story for the user */
const EXPECTED_ERRORS = [
  ConfigurationError,
  AlreadyRunningError,
  DisplayNotAvailableError,
  DeliveryFailedError,
] as const

// =============================================================================
// ENTRY
// =============================================================================

/**
 * Parses and runs one command line (arguments after the executable).
 *
 * @returns Process exit code
 */
export async function runCli(argv: readonly string[], deps: CliDependencies): Promise<number> {
  const state = { exitCode: 0 }
  const program = createProgram(deps, state)

  try {
    await program.parseAsync([...argv], { from: 'user' })
    return state.exitCode
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode
    if (!EXPECTED_ERRORS.some((type) => err instanceof type)) log.error`Unexpected failure: ${err}`
    deps.stderr(`Error: ${errorMessage(err)}`)
    return 1
  }
}

/**
 * Builds the commander program. Commands report their exit code through state.
 */
export function createProgram(deps: CliDependencies, state: { exitCode: number }): Command {
  const ctx: ResolveContext = { env: deps.env, cwd: deps.cwd }
  const backend = (): CaptureBackend => deps.backend ?? new DesktopCaptureBackend()
  const probe = deps.probe ?? systemProbe
  const dispatcherDeps = { runCommand: deps.runCommand, fetch: deps.fetch }

  const program = new Command()
    .name('shotloop')
    .description('Periodic screen capture with git or HTTP delivery')
    .version('0.1.0')
    .option('--env-file <path>', 'load KEY=VALUE settings from this file')
    .option('-v, --verbose', 'debug logging')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => deps.stdout(text.trimEnd()),
      writeErr: (text) => deps.stderr(text.trimEnd()),
    })

  program.hook('preAction', async () => {
    const { envFile, verbose } = program.opts<GlobalOptions>()
    loadSettingsFile(envFile, deps)
    await initializeLogging(verbose ?? false, deps.env)
  })

  // ===========================================================================
  // info
  // ===========================================================================

  program
    .command('info')
    .description('List monitors (index 0 is the whole virtual desktop)')
    .action(async () => {
      const monitors = await backend().listMonitors()
      renderMonitorTable(monitors).forEach((line) => deps.stdout(line))
      if (monitors.length > 2) deps.stdout('Tip: use --display N (1..N) to capture a specific display.')
    })

  // ===========================================================================
  // capture
  // ===========================================================================

  addDeliveryOptions(
    program
      .command('capture')
      .description('Take one screenshot, optionally delivering it')
      .option('--out <path>', 'output file')
      .option('--dir <dir>', 'output directory (timestamped file name)')
      .option('--display <n>', 'display index, 0 for all displays')
      .option('--region <coords...>', 'absolute region as x y w h, overrides --display')
  ).action(async (options: CaptureOptions) => {
    if (options.out && options.dir) throw new ConfigurationError('use either --out or --dir (not both)')

    const config = resolveCapture(options, ctx)
    const outPath = options.out
      ? resolvePath(options.out, deps.cwd)
      : path.join(config.outDir, timestampedFilename(config.filenamePrefix))

    const saved = await capturePng({
      outPath,
      display: config.display,
      region: config.region,
      backend: backend(),
    })
    deps.stdout(`Saved screenshot: ${saved}`)

    const dispatcher = createDispatcher(config.delivery, dispatcherDeps)
    if (dispatcher) {
      const outcome = await dispatcher.deliver({
        filePath: saved,
        sequence: 1,
        message: `shotloop capture: ${path.basename(saved)}`,
      })
      deps.stdout(`Delivered via ${dispatcher.mode}: ${outcome}`)
    }
  })

  // ===========================================================================
  // driver
  // ===========================================================================

  addDeliveryOptions(
    program
      .command('driver')
      .description('Capture on an interval until stopped')
      .option('--dir <dir>', 'output directory')
      .option('--interval <duration>', 'time between captures: 10, 10s, 1m, 2h, 1d')
      .option('--display <n>', 'display index, 0 for all displays')
      .option('--region <coords...>', 'absolute region as x y w h, overrides --display')
      .option('--pidfile <path>', 'lock file (default <dir>/shotloop.pid)')
      .option('--max-shots <n>', 'stop after this many captures')
      .option('--checkpoint-csv <path>', 'checkpoint log (default <dir>/shotloop_checkpoints.csv)')
      .option('--keep <n>', 'keep only the newest N captures in <dir>')
  ).action(async (options: DriverFlags) => {
    const config = resolveDriver(options, ctx)
    const driver = new Driver(config, {
      backend: backend(),
      dispatcher: createDispatcher(config.delivery, dispatcherDeps),
      probe,
    })

    deps.onDriverStart?.(driver)
    const result = await driver.run(deps.signal)
    deps.stdout(`Driver stopped after ${result.captures} capture(s) (${result.reason})`)
  })

  // ===========================================================================
  // status
  // ===========================================================================

  program
    .command('status')
    .description('Report whether a driver is running (exit 0 running, 1 not running)')
    .option('--pidfile <path>', 'lock file to inspect')
    .option('--dir <dir>', 'output directory holding the default pidfile')
    .option('-q, --quiet', 'print nothing; exit code only')
    .option('--checkpoints', 'also summarize the checkpoint log')
    .option('--checkpoint-csv <path>', 'checkpoint log to summarize (default <dir>/shotloop_checkpoints.csv)')
    .action((options: StatusOptions) => {
      const locations = resolveLocations(options, ctx)
      const status = checkStatus(locations.pidfile, probe)
      const print = (line: string) => {
        if (!options.quiet) deps.stdout(line)
      }

      if (status.running) {
        print(`RUNNING pid=${status.pid} pidfile=${status.pidfile}`)
      } else if (status.pid === undefined) {
        print(`NOT RUNNING (pidfile missing/empty) pidfile=${status.pidfile}`)
      } else {
        print(`NOT RUNNING (stale pidfile) pid=${status.pid} pidfile=${status.pidfile}`)
      }

      if (options.checkpoints) {
        const summary = summarizeCheckpoints(locations.checkpointCsv)
        print(`captures: ${summary.captures}`)
        print(`last: ${summary.lastRow ?? '<none>'}`)
      }

      state.exitCode = status.running ? 0 : 1
    })

  // ===========================================================================
  // stop
  // ===========================================================================

  program
    .command('stop')
    .description('Stop a running driver (exit 0 stopped or not running, 1 still alive)')
    .option('--pidfile <path>', 'lock file naming the driver')
    .option('--dir <dir>', 'output directory holding the default pidfile')
    .option('--timeout <seconds>', 'graceful wait', String(DEFAULT_STOP_TIMEOUT_SECONDS))
    .option('--force', 'kill forcefully after the timeout')
    .action(async (options: StopOptions) => {
      const timeoutSeconds = resolveDuration(options.timeout, 'timeout')
      const { pidfile } = resolveLocations(options, ctx)
      const status = checkStatus(pidfile, probe)

      if (!status.running || status.pid === undefined) {
        if (status.stalePidfile) removePidfile(pidfile)
        deps.stdout(`NOT RUNNING pidfile=${pidfile}`)
        return
      }

      const stopped = await stopProcess(status.pid, { timeoutSeconds, force: options.force ?? false }, probe)
      if (!stopped) {
        deps.stdout(`STILL RUNNING pid=${status.pid}${options.force ? '' : ' (retry with --force)'}`)
        state.exitCode = 1
        return
      }

      removePidfile(pidfile)
      deps.stdout(`STOPPED pid=${status.pid}`)
    })

  // ===========================================================================
  // preflight
  // ===========================================================================

  addDeliveryOptions(
    program
      .command('preflight')
      .description('Check the output directory and delivery sink are ready')
      .option('--dir <dir>', 'output directory')
  ).action(async (options: PreflightOptions) => {
    const config = resolveCapture(options, ctx)
    const checks = await runPreflight({
      outDir: config.outDir,
      delivery: config.delivery,
      runCommand: deps.runCommand,
    })

    for (const check of checks) {
      deps.stdout(`${check.ok ? '[ok]  ' : '[FAIL]'} ${check.name}: ${check.detail}`)
    }
    state.exitCode = checks.every((check) => check.ok) ? 0 : 1
  })

  return program
}

// =============================================================================
// HELPERS
// =============================================================================

function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value]
}

function addDeliveryOptions(command: Command): Command {
  return command
    .option('--send <mode>', 'deliver each capture: none, git or http')
    .option('--git-repo <dir>', 'git working tree (default: current directory)')
    .option('--git-remote <name>', 'remote to push to')
    .option('--git-branch <name>', 'branch to push HEAD to')
    .option('--no-git-push', 'commit without pushing')
    .option('--git-push-every <n>', 'push on captures 1, N+1, 2N+1, ...')
    .option('--http-url <url>', 'upload endpoint')
    .option('--http-header <line>', '"Name: Value" header, repeatable', collect)
    .option('--http-method <method>', 'upload method')
    .option('--http-field <name>', 'multipart field name for the file')
}

/** Loads --env-file, or the first default env file found in cwd */
function loadSettingsFile(envFile: string | undefined, deps: CliDependencies): void {
  if (envFile) {
    const filePath = resolvePath(envFile, deps.cwd)
    try {
      loadEnvFile(filePath, deps.env)
    } catch (err) {
      throw new ConfigurationError(`cannot read ${filePath}: ${errorMessage(err)}`, 'env file')
    }
    return
  }

  const found = findDefaultEnvFile(deps.cwd)
  if (found) loadEnvFile(found, deps.env)
}

/** Fixed-width table of monitors */
export function renderMonitorTable(monitors: readonly Rect[]): string[] {
  const header = ['index', 'left', 'top', 'width', 'height']
  const rows = monitors.map((monitor, index) =>
    [index, monitor.left, monitor.top, monitor.width, monitor.height].map(String)
  )
  const widths = header.map((title, column) =>
    Math.max(title.length, ...rows.map((row) => row[column]?.length ?? 0))
  )
  const format = (cells: string[]) =>
    cells.map((cell, column) => cell.padStart(widths[column] ?? 0)).join('  ')

  return [format(header), ...rows.map(format)]
}
