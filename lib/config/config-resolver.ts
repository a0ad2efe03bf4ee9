/**
 * Configuration Resolver - merges CLI flags, environment and defaults
 *
 * Precedence for every setting: CLI flag > environment variable > default.
 * Env files are merged into the environment before resolution (see env-file).
 * All validation happens here so the driver only ever sees a valid config.
 *
 * @module lib/config/config-resolver
 */

import os from 'node:os'
import path from 'node:path'
import { ConfigurationError, InvalidDurationError } from '../../error.js'
import { parseDurationSeconds } from '../durations.js'
import { parseHeaderLine } from '../delivery/http-delivery.js'
import {
  DEFAULT_CHECKPOINT_NAME,
  DEFAULT_DISPLAY,
  DEFAULT_FILENAME_PREFIX,
  DEFAULT_GIT_BRANCH,
  DEFAULT_GIT_REMOTE,
  DEFAULT_HTTP_FIELD,
  DEFAULT_HTTP_METHOD,
  DEFAULT_INTERVAL,
  DEFAULT_PIDFILE_NAME,
  ENV_CHECKPOINT_CSV,
  ENV_DISPLAY,
  ENV_FILENAME_PREFIX,
  ENV_GIT_BRANCH,
  ENV_GIT_PUSH_EVERY,
  ENV_GIT_REMOTE,
  ENV_GIT_REPO,
  ENV_HTTP_URL,
  ENV_INTERVAL,
  ENV_OUT_DIR,
  ENV_PIDFILE,
  ENV_REGION,
  ENV_SEND,
} from '../../const.js'
import type {
  DeliveryConfig,
  Rect,
  ResolvedCaptureConfig,
  ResolvedDriverConfig,
} from '../../types/domain.js'

// =============================================================================
// INPUT SHAPES (as parsed by the CLI: strings until validated here)
// =============================================================================

export interface DeliveryFlags {
  send?: string
  gitRepo?: string
  gitRemote?: string
  gitBranch?: string
  /** False when --no-git-push is given */
  gitPush?: boolean
  gitPushEvery?: string
  httpUrl?: string
  httpHeader?: string[]
  httpMethod?: string
  httpField?: string
}

export interface CaptureFlags extends DeliveryFlags {
  dir?: string
  display?: string
  region?: string[]
}

export interface DriverFlags extends CaptureFlags {
  interval?: string
  pidfile?: string
  maxShots?: string
  checkpointCsv?: string
  keep?: string
}

export interface LocationFlags {
  dir?: string
  pidfile?: string
  checkpointCsv?: string
}

export interface ResolveContext {
  env: NodeJS.ProcessEnv
  cwd: string
}

// =============================================================================
// PRIMITIVES
// =============================================================================

/** Trimmed env value; blank counts as unset */
function envValue(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim()
  return value ? value : undefined
}

/** Absolute path with a leading ~ expanded */
export function resolvePath(value: string, cwd: string): string {
  const expanded =
    value === '~' || value.startsWith('~/') ? path.join(os.homedir(), value.slice(1)) : value
  return path.resolve(cwd, expanded)
}

function parseInteger(value: string, setting: string, min: number): number {
  const trimmed = value.trim()
  if (!/^[-+]?\d+$/.test(trimmed)) {
    throw new ConfigurationError(`must be an integer (got "${value}")`, setting)
  }
  const parsed = Number.parseInt(trimmed, 10)
  if (parsed < min) throw new ConfigurationError(`must be >= ${min} (got ${parsed})`, setting)
  return parsed
}

/**
 * Parses a region from "x y w h" or "x,y,w,h".
 *
 * @returns undefined for blank input
 * @throws ConfigurationError unless there are exactly 4 integers with width/height > 0
 */
export function parseRegion(value: string, setting = ENV_REGION): Rect | undefined {
  const cleaned = value.replace(/,/g, ' ').trim()
  if (!cleaned) return undefined

  const parts = cleaned.split(/\s+/)
  if (parts.length !== 4 || parts.some((part) => !/^[-+]?\d+$/.test(part))) {
    throw new ConfigurationError(`expected 4 integers like "x y w h" or "x,y,w,h" (got "${value}")`, setting)
  }

  const [left = 0, top = 0, width = 0, height = 0] = parts.map((part) => Number.parseInt(part, 10))
  if (width <= 0 || height <= 0) {
    throw new ConfigurationError('width and height must be > 0', setting)
  }
  return { left, top, width, height }
}

/** Duration in seconds, with parser errors reported against the setting */
export function resolveDuration(value: string, setting: string): number {
  try {
    return parseDurationSeconds(value)
  } catch (err) {
    if (err instanceof InvalidDurationError) throw new ConfigurationError(err.message, setting)
    throw err
  }
}

// =============================================================================
// DELIVERY
// =============================================================================

const GIT_FLAGS = ['gitRepo', 'gitRemote', 'gitBranch', 'gitPushEvery'] as const
const HTTP_FLAGS = ['httpUrl', 'httpHeader', 'httpMethod', 'httpField'] as const

/**
 * Resolves the sink selection into exactly one delivery variant.
 */
export function resolveDelivery(flags: DeliveryFlags, ctx: ResolveContext): DeliveryConfig {
  const { env, cwd } = ctx
  const send = (flags.send ?? envValue(env, ENV_SEND) ?? 'none').trim().toLowerCase()

  const stray = (names: readonly (keyof DeliveryFlags)[]) => names.filter((name) => flags[name] !== undefined)
  if (send !== 'git' && stray(GIT_FLAGS).length > 0) {
    throw new ConfigurationError(`git options need --send git (send mode is "${send}")`, 'send')
  }
  if (send !== 'http' && stray(HTTP_FLAGS).length > 0) {
    throw new ConfigurationError(`http options need --send http (send mode is "${send}")`, 'send')
  }

  switch (send) {
    case 'none':
      return { kind: 'none' }

    case 'git': {
      const pushEvery = flags.gitPushEvery ?? envValue(env, ENV_GIT_PUSH_EVERY) ?? '1'
      return {
        kind: 'git',
        repoDir: resolvePath(flags.gitRepo ?? envValue(env, ENV_GIT_REPO) ?? cwd, cwd),
        remote: flags.gitRemote ?? envValue(env, ENV_GIT_REMOTE) ?? DEFAULT_GIT_REMOTE,
        branch: flags.gitBranch ?? envValue(env, ENV_GIT_BRANCH) ?? DEFAULT_GIT_BRANCH,
        push: flags.gitPush ?? true,
        pushEvery: parseInteger(pushEvery, 'git push every', 1),
      }
    }

    case 'http': {
      const url = flags.httpUrl ?? envValue(env, ENV_HTTP_URL)
      if (!url) throw new ConfigurationError('--http-url is required with --send http', 'send')

      const headers = flags.httpHeader ?? []
      headers.forEach(parseHeaderLine)

      return {
        kind: 'http',
        url,
        headers,
        method: (flags.httpMethod ?? DEFAULT_HTTP_METHOD).toUpperCase(),
        fieldName: flags.httpField ?? DEFAULT_HTTP_FIELD,
      }
    }

    default:
      throw new ConfigurationError(`must be one of none, git, http (got "${send}")`, 'send')
  }
}

// =============================================================================
// CAPTURE / DRIVER
// =============================================================================

/**
 * Resolves settings shared by one-shot capture and the driver.
 */
export function resolveCapture(flags: CaptureFlags, ctx: ResolveContext): ResolvedCaptureConfig {
  const { env, cwd } = ctx

  const outDir = resolvePath(flags.dir ?? envValue(env, ENV_OUT_DIR) ?? cwd, cwd)

  const displayRaw = flags.display ?? envValue(env, ENV_DISPLAY)
  const display =
    displayRaw === undefined ? DEFAULT_DISPLAY : parseInteger(displayRaw, flags.display ? 'display' : ENV_DISPLAY, 0)

  const region = flags.region
    ? parseRegion(flags.region.join(' '), 'region')
    : parseRegion(envValue(env, ENV_REGION) ?? '')

  const filenamePrefix = envValue(env, ENV_FILENAME_PREFIX) ?? DEFAULT_FILENAME_PREFIX

  return { outDir, display, region, filenamePrefix, delivery: resolveDelivery(flags, ctx) }
}

/**
 * Resolves the full driver configuration. The pidfile is always set.
 */
export function resolveDriver(flags: DriverFlags, ctx: ResolveContext): ResolvedDriverConfig {
  const { env } = ctx
  const capture = resolveCapture(flags, ctx)

  const intervalSeconds = resolveDuration(
    flags.interval ?? envValue(env, ENV_INTERVAL) ?? DEFAULT_INTERVAL,
    flags.interval ? 'interval' : ENV_INTERVAL
  )

  const { pidfile, checkpointCsv } = resolveLocations(
    { dir: capture.outDir, pidfile: flags.pidfile, checkpointCsv: flags.checkpointCsv },
    ctx
  )

  return {
    ...capture,
    intervalSeconds,
    pidfile,
    checkpointCsv,
    maxShots: flags.maxShots === undefined ? undefined : parseInteger(flags.maxShots, 'max shots', 1),
    keep: flags.keep === undefined ? undefined : parseInteger(flags.keep, 'keep', 1),
  }
}

/**
 * Resolves the pidfile and checkpoint log for status/stop without requiring
 * any capture settings to be valid.
 */
export function resolveLocations(
  flags: LocationFlags,
  ctx: ResolveContext
): { outDir: string; pidfile: string; checkpointCsv: string } {
  const { env, cwd } = ctx
  const outDir = resolvePath(flags.dir ?? envValue(env, ENV_OUT_DIR) ?? cwd, cwd)
  const pidfile = resolvePath(
    flags.pidfile ?? envValue(env, ENV_PIDFILE) ?? path.join(outDir, DEFAULT_PIDFILE_NAME),
    cwd
  )
  const checkpointCsv = resolvePath(
    flags.checkpointCsv ?? envValue(env, ENV_CHECKPOINT_CSV) ?? path.join(outDir, DEFAULT_CHECKPOINT_NAME),
    cwd
  )
  return { outDir, pidfile, checkpointCsv }
}
