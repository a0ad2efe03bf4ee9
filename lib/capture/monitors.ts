/**
 * Monitor geometry - virtual-screen bounds, selection and clipping
 *
 * Monitor lists follow one convention everywhere: index 0 is the bounding
 * box of all displays, 1..N are the displays in backend order.
 *
 * @module lib/capture/monitors
 */

import { DisplayNotAvailableError } from '../../error.js'
import type { Rect } from '../../types/domain.js'

/**
 * Bounding box covering every display.
 */
export function virtualBounds(displays: readonly Rect[]): Rect {
  if (displays.length === 0) return { left: 0, top: 0, width: 0, height: 0 }

  const left = Math.min(...displays.map((d) => d.left))
  const top = Math.min(...displays.map((d) => d.top))
  const right = Math.max(...displays.map((d) => d.left + d.width))
  const bottom = Math.max(...displays.map((d) => d.top + d.height))

  return { left, top, width: right - left, height: bottom - top }
}

/** Prepends the virtual screen to a list of displays */
export function withVirtualScreen(displays: readonly Rect[]): Rect[] {
  return [virtualBounds(displays), ...displays]
}

/**
 * Picks a monitor by index.
 *
 * @throws DisplayNotAvailableError when the index is negative or out of range
 */
export function selectMonitor(monitors: readonly Rect[], display: number): Rect {
  const available = Math.max(monitors.length - 1, 0)
  if (display < 0) throw new DisplayNotAvailableError(display, available)

  const monitor = monitors[display]
  if (!monitor) throw new DisplayNotAvailableError(display, available)

  return monitor
}

/**
 * Overlap of two rectangles, or undefined when they do not touch.
 */
export function intersect(a: Rect, b: Rect): Rect | undefined {
  const left = Math.max(a.left, b.left)
  const top = Math.max(a.top, b.top)
  const right = Math.min(a.left + a.width, b.left + b.width)
  const bottom = Math.min(a.top + a.height, b.top + b.height)

  if (right <= left || bottom <= top) return undefined
  return { left, top, width: right - left, height: bottom - top }
}
