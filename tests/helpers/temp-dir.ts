/**
 * Per-test temporary directories
 * @module tests/helpers/temp-dir
 */

import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'

export function createTempDir(label: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `shotloop-${label}-`))
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true })
}
