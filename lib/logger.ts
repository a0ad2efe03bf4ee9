/**
 * Logging infrastructure using LogTape
 * Provides structured, timestamped logging with module-specific categories
 * @module lib/logger
 */

import {
  configure,
  getConsoleSink,
  getLogger,
  type Logger,
  type LogLevel,
  type LogRecord,
} from '@logtape/logtape'
import { ENV_LOG_LEVEL } from '../const.js'

// =============================================================================
// CONFIGURATION
// =============================================================================

const LOG_LEVELS = ['trace', 'debug', 'info', 'warning', 'error', 'fatal'] as const

/**
 * Log level determined by:
 * 1. LOG_LEVEL env var (highest priority)
 * 2. --verbose flag (enables debug mode)
 * 3. Default: 'info'
 */
export function resolveLogLevel(verbose: boolean, env: NodeJS.ProcessEnv = process.env): LogLevel {
  const envLevel = env[ENV_LOG_LEVEL]?.trim().toLowerCase()
  const matched = LOG_LEVELS.find((level) => level === envLevel)
  if (matched) return matched

  return verbose ? 'debug' : 'info'
}

/**
 * Root category for all loggers
 */
const ROOT_CATEGORY = 'shotloop'

// =============================================================================
// CUSTOM FORMATTER
// =============================================================================

/**
 * Formats log records with ISO timestamps and level indicators
 * Format: [2026-10-19T10:15:30.123Z] [INFO ] [driver] message
 */
export function formatLogRecord(record: LogRecord): readonly unknown[] {
  const timestamp = new Date(record.timestamp).toISOString()
  const level = record.level.toUpperCase().padEnd(5)
  const category = record.category.slice(1).join('.') || ROOT_CATEGORY

  let message = ''
  const values: unknown[] = []

  for (let i = 0; i < record.message.length; i++) {
    const part = record.message[i]
    if (i % 2 === 0) {
      message += String(part)
    } else if (typeof part === 'object' && part !== null) {
      message += '%o'
      values.push(part)
    } else {
      message += String(part)
    }
  }

  return [`[${timestamp}] [${level}] [${category}] ${message}`, ...values]
}

// =============================================================================
// INITIALIZATION
// =============================================================================

let initialized = false

/**
 * Initialize the logging system
 * Safe to call multiple times (no-op after first call)
 */
export async function initializeLogging(
  verbose = false,
  env: NodeJS.ProcessEnv = process.env
): Promise<void> {
  if (initialized) return

  await configure({
    sinks: {
      console: getConsoleSink({ formatter: formatLogRecord }),
    },
    loggers: [
      {
        category: [ROOT_CATEGORY],
        lowestLevel: resolveLogLevel(verbose, env),
        sinks: ['console'],
      },
      // Silence LogTape meta logger info messages
      {
        category: ['logtape', 'meta'],
        lowestLevel: 'warning',
        sinks: ['console'],
      },
    ],
  })

  initialized = true
}

// =============================================================================
// LOGGER FACTORY
// =============================================================================

type LoggerCategory =
  | 'cli'
  | 'config'
  | 'driver'
  | 'capture'
  | 'delivery'
  | 'git'
  | 'http'
  | 'checkpoint'
  | 'pidfile'
  | 'retention'

/**
 * Get a logger for a specific module category
 *
 * @example
 * const log = getModuleLogger('driver')
 * log.info`Captured ${filename}`
 */
export function getModuleLogger(category: LoggerCategory): Logger {
  return getLogger([ROOT_CATEGORY, category])
}

// =============================================================================
// PRE-CONFIGURED LOGGERS (convenience exports)
// =============================================================================

export const cliLogger = () => getModuleLogger('cli')
export const configLogger = () => getModuleLogger('config')
export const driverLogger = () => getModuleLogger('driver')
export const captureLogger = () => getModuleLogger('capture')
export const deliveryLogger = () => getModuleLogger('delivery')
export const gitLogger = () => getModuleLogger('git')
export const httpLogger = () => getModuleLogger('http')
export const checkpointLogger = () => getModuleLogger('checkpoint')
export const pidfileLogger = () => getModuleLogger('pidfile')
export const retentionLogger = () => getModuleLogger('retention')
