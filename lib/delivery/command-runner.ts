/**
 * Command Runner - external process execution for sinks
 *
 * Commands never throw on a non-zero exit; callers inspect exitCode.
 * Every command is bounded by a timeout, and git never prompts for
 * credentials, so a sink cannot block the driver indefinitely.
 *
 * @module lib/delivery/command-runner
 */

import { execa } from 'execa'
import { GIT_COMMAND_TIMEOUT_MS } from '../../const.js'
import type { FailedStep } from '../../error.js'

/** Outcome of one external command */
export type CommandResult = FailedStep

export type CommandRunner = (
  file: string,
  args: readonly string[],
  cwd: string
) => Promise<CommandResult>

export interface CommandRunnerOptions {
  timeoutMs?: number
}

/**
 * Builds a runner over execa with captured output.
 * A command that cannot be spawned or that times out reports exit code -1.
 */
export function createCommandRunner(options: CommandRunnerOptions = {}): CommandRunner {
  const { timeoutMs = GIT_COMMAND_TIMEOUT_MS } = options

  return async (file, args, cwd) => {
    const result = await execa(file, args, {
      cwd,
      reject: false,
      stdin: 'ignore',
      timeout: timeoutMs,
      env: { GIT_TERMINAL_PROMPT: '0' },
    })

    const stderr = String(result.stderr ?? '')
    return {
      command: [file, ...args].join(' '),
      exitCode: result.timedOut ? -1 : result.exitCode ?? -1,
      stdout: String(result.stdout ?? ''),
      stderr: result.timedOut ? `timed out after ${timeoutMs} ms${stderr ? `\n${stderr}` : ''}` : stderr,
    }
  }
}

export const runCommand: CommandRunner = createCommandRunner()
