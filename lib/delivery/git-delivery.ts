/**
 * Git Delivery - stages, commits and optionally pushes a capture
 *
 * Stateless service with single options object parameter.
 * Throws on any failing git step (the driver treats it as fatal for the cycle).
 *
 * Authentication (SSH key or token) must already be configured for the remote.
 *
 * @module lib/delivery/git-delivery
 */

import path from 'node:path'
import { DeliveryFailedError, NotAGitRepoError } from '../../error.js'
import { runCommand, type CommandResult, type CommandRunner } from './command-runner.js'
import { gitLogger } from '../logger.js'
import type { GitDeliveryConfig } from '../../types/domain.js'

const log = gitLogger()

/** Options for git delivery */
export interface GitDeliveryOptions {
  filePath: string
  config: GitDeliveryConfig
  message: string
  /** Push after committing; defaults to config.push */
  push?: boolean
  runCommand?: CommandRunner
}

export type GitDeliveryOutcome = 'unchanged' | 'committed' | 'pushed'

/**
 * Path to stage: relative to the repo when the file lives inside it.
 */
export function stagePath(repoDir: string, filePath: string): string {
  const relative = path.relative(repoDir, filePath)
  if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) return filePath
  return relative
}

/**
 * Adds the file, commits when something is staged, then pushes when requested.
 *
 * @returns 'unchanged' when nothing was staged (no commit, no push)
 * @throws NotAGitRepoError when repoDir is not a work tree
 * @throws DeliveryFailedError when any other git step exits non-zero
 */
export async function deliverToGit(options: GitDeliveryOptions): Promise<GitDeliveryOutcome> {
  const { filePath, config, message, runCommand: run = runCommand } = options
  const push = options.push ?? config.push
  const repo = config.repoDir
  const git = (...args: string[]): Promise<CommandResult> => run('git', args, repo)

  const revParse = await git('rev-parse', '--is-inside-work-tree')
  if (revParse.exitCode !== 0) throw new NotAGitRepoError(repo, revParse)

  requireOk(await git('add', '--', stagePath(repo, filePath)), 'git add')

  const diff = await git('diff', '--cached', '--quiet')
  if (diff.exitCode === 0) {
    log.info`Nothing staged for ${filePath}, skipping commit`
    return 'unchanged'
  }
  if (diff.exitCode !== 1) requireOk(diff, 'git diff --cached')

  requireOk(await git('commit', '-m', message), 'git commit')
  if (!push) {
    log.info`Committed ${filePath}`
    return 'committed'
  }

  requireOk(await git('push', config.remote, `HEAD:${config.branch}`), 'git push')
  log.info`Committed and pushed ${filePath} to ${config.remote}/${config.branch}`
  return 'pushed'
}

function requireOk(result: CommandResult, step: string): void {
  if (result.exitCode === 0) return
  throw new DeliveryFailedError(step, result)
}
