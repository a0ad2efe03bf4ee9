/**
 * Recording command runner
 *
 * Answers git invocations from a table keyed by subcommand (first argument),
 * defaulting to exit 0, and keeps every call for inspection.
 * @module tests/helpers/command-recorder
 */

import type { CommandResult, CommandRunner } from '../../lib/delivery/command-runner.js'

export interface RecordedCommand {
  file: string
  args: string[]
  cwd: string
}

export type ScriptedResult = Partial<Omit<CommandResult, 'command'>>

export function createCommandRecorder(script: Record<string, ScriptedResult> = {}): {
  run: CommandRunner
  calls: RecordedCommand[]
} {
  const calls: RecordedCommand[] = []

  const run: CommandRunner = async (file, args, cwd) => {
    calls.push({ file, args: [...args], cwd })
    const scripted = script[args[0] ?? ''] ?? {}
    return {
      command: [file, ...args].join(' '),
      exitCode: scripted.exitCode ?? 0,
      stdout: scripted.stdout ?? '',
      stderr: scripted.stderr ?? '',
    }
  }

  return { run, calls }
}
