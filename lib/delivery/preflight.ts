/**
 * Preflight - readiness checks for the output directory and the configured sink
 *
 * Every check runs even after an earlier one fails, so one pass reports
 * everything that needs fixing. Nothing is pushed or uploaded.
 *
 * @module lib/delivery/preflight
 */

import fs from 'node:fs'
import path from 'node:path'
import { errorMessage } from '../../error.js'
import { runCommand, type CommandRunner } from './command-runner.js'
import { stagePath } from './git-delivery.js'
import type { DeliveryConfig, GitDeliveryConfig, HttpDeliveryConfig } from '../../types/domain.js'

export interface PreflightCheck {
  name: string
  ok: boolean
  detail: string
}

export interface PreflightOptions {
  outDir: string
  delivery: DeliveryConfig
  runCommand?: CommandRunner
}

/** Probe name used to ask git whether files in outDir would be ignored */
const IGNORE_PROBE_NAME = '.shotloop_ignore_probe.png'

/**
 * Runs all checks for the given output directory and sink.
 */
export async function runPreflight(options: PreflightOptions): Promise<PreflightCheck[]> {
  const { outDir, delivery, runCommand: run = runCommand } = options
  const checks = [checkOutDir(outDir)]

  if (delivery.kind === 'git') checks.push(...(await checkGit(outDir, delivery, run)))
  if (delivery.kind === 'http') checks.push(checkHttp(delivery))

  return checks
}

function checkOutDir(outDir: string): PreflightCheck {
  const name = 'out_dir writable'
  try {
    fs.mkdirSync(outDir, { recursive: true })
    fs.accessSync(outDir, fs.constants.W_OK)
    return { name, ok: true, detail: outDir }
  } catch (err) {
    return { name, ok: false, detail: `${outDir}: ${errorMessage(err)}` }
  }
}

async function checkGit(
  outDir: string,
  config: GitDeliveryConfig,
  run: CommandRunner
): Promise<PreflightCheck[]> {
  const git = async (name: string, args: string[], okDetail: (stdout: string) => string) => {
    const result = await run('git', args, config.repoDir)
    const ok = result.exitCode === 0
    const detail = ok ? okDetail(result.stdout.trim()) : result.stderr.trim() || `exit ${result.exitCode}`
    return { name, ok, detail }
  }

  const checks: PreflightCheck[] = [
    await git('git work tree', ['rev-parse', '--is-inside-work-tree'], () => config.repoDir),
    await git(`git remote '${config.remote}'`, ['remote', 'get-url', config.remote], (url) => url),
  ]

  // check-ignore exits 0 when the path IS ignored
  const probe = stagePath(config.repoDir, path.join(outDir, IGNORE_PROBE_NAME))
  const ignored = await run('git', ['check-ignore', '-q', probe], config.repoDir)
  checks.push({
    name: 'captures not ignored',
    ok: ignored.exitCode === 1,
    detail:
      ignored.exitCode === 0
        ? `${outDir} is ignored by gitignore rules`
        : ignored.exitCode === 1
          ? outDir
          : ignored.stderr.trim() || `exit ${ignored.exitCode}`,
  })

  checks.push(
    await git('remote reachable', ['ls-remote', '-q', config.remote, 'HEAD'], () => config.remote)
  )
  if (config.push) {
    checks.push(
      await git(
        'push permitted (dry-run)',
        ['push', '--dry-run', config.remote, `HEAD:${config.branch}`],
        () => `${config.remote}/${config.branch}`
      )
    )
  }

  return checks
}

function checkHttp(config: HttpDeliveryConfig): PreflightCheck {
  const name = 'upload url'
  try {
    const url = new URL(config.url)
    const ok = url.protocol === 'http:' || url.protocol === 'https:'
    return { name, ok, detail: ok ? url.toString() : `unsupported protocol ${url.protocol}` }
  } catch {
    return { name, ok: false, detail: `not an absolute URL: ${config.url}` }
  }
}
