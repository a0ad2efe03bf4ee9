/**
 * In-memory capture backend
 *
 * Reports a fixed monitor list and returns a minimal PNG for every grab,
 * recording the rectangles it was asked for.
 * @module tests/helpers/fake-backend
 */

import { withVirtualScreen } from '../../lib/capture/monitors.js'
import type { CaptureBackend } from '../../lib/capture/capture-invoker.js'
import type { Rect } from '../../types/domain.js'

/** PNG signature plus an 8x8 IHDR chunk */
export const TEST_PNG = Buffer.from([
  0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00, 0x00, 0x0d, 0x49, 0x48, 0x44, 0x52,
  0x00, 0x00, 0x00, 0x08, 0x00, 0x00, 0x00, 0x08, 0x08, 0x00, 0x00, 0x00, 0x00, 0x4b, 0x6d, 0x29,
  0xde,
])

export const TWO_DISPLAYS: Rect[] = [
  { left: 0, top: 0, width: 1920, height: 1080 },
  { left: 1920, top: 0, width: 1280, height: 1024 },
]

export class FakeCaptureBackend implements CaptureBackend {
  readonly grabs: Rect[] = []
  listCalls = 0
  #monitors: Rect[]
  #failOnGrab: number | undefined

  /**
   * @param displays - Physical displays; the virtual screen is prepended
   * @param failOnGrab - 1-based grab number that throws
   */
  constructor(displays: Rect[] = TWO_DISPLAYS, failOnGrab?: number) {
    this.#monitors = withVirtualScreen(displays)
    this.#failOnGrab = failOnGrab
  }

  async listMonitors(): Promise<Rect[]> {
    this.listCalls++
    return this.#monitors
  }

  async grab(rect: Rect): Promise<Buffer> {
    this.grabs.push(rect)
    if (this.grabs.length === this.#failOnGrab) {
      throw new Error(`grab ${this.grabs.length} failed`)
    }
    return TEST_PNG
  }
}
