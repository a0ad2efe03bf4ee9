/**
 * Capture Invoker - region/display selection in front of a capture backend
 *
 * @module lib/capture/capture-invoker
 */

import fs from 'node:fs'
import path from 'node:path'
import { selectMonitor } from './monitors.js'
import { captureLogger } from '../logger.js'
import type { Rect } from '../../types/domain.js'

const log = captureLogger()

/** Screen access used by the invoker; grab() returns PNG bytes */
export interface CaptureBackend {
  listMonitors(): Promise<Rect[]>
  grab(rect: Rect): Promise<Buffer>
}

/** Options for a single capture */
export interface CaptureOptions {
  outPath: string
  display: number
  region?: Rect
  backend: CaptureBackend
}

/**
 * Captures a screenshot to outPath as PNG.
 *
 * A region is grabbed verbatim and the display index is ignored; otherwise
 * the display is looked up in the backend's monitor list.
 *
 * @returns The path written
 * @throws DisplayNotAvailableError when the display index is not reported
 */
export async function capturePng(options: CaptureOptions): Promise<string> {
  const { outPath, display, region, backend } = options
  fs.mkdirSync(path.dirname(outPath), { recursive: true })

  const rect = region ?? selectMonitor(await backend.listMonitors(), display)
  const png = await backend.grab(rect)
  fs.writeFileSync(outPath, png)

  log.debug`Grabbed ${rect.width}x${rect.height}+${rect.left}+${rect.top} into ${outPath}`
  return outPath
}

/**
 * Timestamped capture file name: <prefix>20261019T101530.123Z.png
 */
export function timestampedFilename(prefix: string, now: Date = new Date()): string {
  const timestamp = now.toISOString().replace(/[-:]/g, '')
  return `${prefix}${timestamp}.png`
}
