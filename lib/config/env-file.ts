/**
 * Env File Loader - KEY=VALUE files merged into the environment
 *
 * Parsing is dotenv's; this module decides which file to read and never
 * overrides a variable that is already set unless asked to.
 *
 * @module lib/config/env-file
 */

import fs from 'node:fs'
import path from 'node:path'
import dotenv from 'dotenv'
import { DEFAULT_ENV_FILES } from '../../const.js'
import { configLogger } from '../logger.js'

const log = configLogger()

/** Result from loading an env file */
export interface EnvFileResult {
  path: string
  /** Keys actually written into the environment */
  loaded: Record<string, string>
}

export function parseEnvFile(text: string): Record<string, string> {
  return dotenv.parse(text)
}

/**
 * First default env file present in cwd (.env, then shotloop.env).
 */
export function findDefaultEnvFile(cwd: string): string | undefined {
  for (const name of DEFAULT_ENV_FILES) {
    const candidate = path.join(cwd, name)
    if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) return candidate
  }
  return undefined
}

/**
 * Reads an env file into env.
 *
 * @param override - Replace variables already present in env
 */
export function loadEnvFile(
  filePath: string,
  env: NodeJS.ProcessEnv = process.env,
  { override = false }: { override?: boolean } = {}
): EnvFileResult {
  const data = parseEnvFile(fs.readFileSync(filePath, 'utf-8'))
  const loaded: Record<string, string> = {}

  for (const [key, value] of Object.entries(data)) {
    if (!override && env[key] !== undefined) continue
    env[key] = value
    loaded[key] = value
  }

  log.debug`Loaded ${Object.keys(loaded).length} variable(s) from ${filePath}`
  return { path: filePath, loaded }
}
