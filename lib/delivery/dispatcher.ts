/**
 * Delivery Dispatcher - one "deliver this file" contract over every sink
 *
 * Owns the git push-batching policy; sinks themselves stay stateless.
 * No retries here: a failed delivery propagates to the caller.
 *
 * @module lib/delivery/dispatcher
 */

import { deliverToGit, type GitDeliveryOutcome } from './git-delivery.js'
import { deliverToHttp } from './http-delivery.js'
import { runCommand, type CommandRunner } from './command-runner.js'
import { deliveryLogger } from '../logger.js'
import type { DeliveryConfig, SendMode } from '../../types/domain.js'

const log = deliveryLogger()

/** One capture handed to a sink */
export interface DeliveryRequest {
  filePath: string
  /** 1-based capture number within the run */
  sequence: number
  message: string
}

export type DeliveryOutcome = GitDeliveryOutcome | 'uploaded'

export interface Dispatcher {
  readonly mode: Exclude<SendMode, 'none'>
  deliver(request: DeliveryRequest): Promise<DeliveryOutcome>
}

/** Collaborators the sinks run on */
export interface DispatcherDependencies {
  runCommand?: CommandRunner
  fetch?: typeof fetch
}

/**
 * Push on captures 1, N+1, 2N+1, ...
 */
export function shouldPush(sequence: number, pushEvery: number): boolean {
  const every = Math.max(1, Math.floor(pushEvery))
  return (sequence - 1) % every === 0
}

/**
 * Builds the dispatcher for a delivery config.
 *
 * @returns undefined when delivery is disabled
 */
export function createDispatcher(
  config: DeliveryConfig,
  deps: DispatcherDependencies = {}
): Dispatcher | undefined {
  switch (config.kind) {
    case 'none':
      return undefined

    case 'git':
      return {
        mode: 'git',
        deliver: (request) => {
          const push = config.push && shouldPush(request.sequence, config.pushEvery)
          log.debug`Git delivery #${request.sequence} (push: ${push})`
          return deliverToGit({
            filePath: request.filePath,
            config,
            message: request.message,
            push,
            runCommand: deps.runCommand ?? runCommand,
          })
        },
      }

    case 'http':
      return {
        mode: 'http',
        deliver: async (request) => {
          await deliverToHttp({ filePath: request.filePath, config, fetch: deps.fetch })
          return 'uploaded'
        },
      }
  }
}
