/**
 * Desktop Capture Backend - screenshot-desktop for display access, sharp for pixels
 *
 * screenshot-desktop grabs whole displays only, so an arbitrary rectangle is
 * assembled by cropping every display it overlaps and compositing the pieces
 * onto a canvas of the requested size. Areas outside every display stay black.
 *
 * @module lib/capture/desktop-backend
 */

import screenshot from 'screenshot-desktop'
import sharp from 'sharp'
import { readFile } from 'node:fs/promises'
import { intersect, withVirtualScreen } from './monitors.js'
import { captureLogger } from '../logger.js'
import type { CaptureBackend } from './capture-invoker.js'
import type { Rect } from '../../types/domain.js'

const log = captureLogger()

type DisplayInfo = Awaited<ReturnType<typeof screenshot.listDisplays>>[number]

/** A display with its resolved position on the virtual desktop */
interface PlacedDisplay {
  id: DisplayInfo['id']
  rect: Rect
}

/** Reads a finite numeric property the display listing may or may not report */
function numberField(value: object, key: string): number | undefined {
  const field: unknown = Reflect.get(value, key)
  return typeof field === 'number' && Number.isFinite(field) ? field : undefined
}

export class DesktopCaptureBackend implements CaptureBackend {
  async listMonitors(): Promise<Rect[]> {
    const displays = await this.#placeDisplays()
    return withVirtualScreen(displays.map((display) => display.rect))
  }

  async grab(rect: Rect): Promise<Buffer> {
    const displays = await this.#placeDisplays()
    const layers: sharp.OverlayOptions[] = []

    for (const display of displays) {
      const overlap = intersect(rect, display.rect)
      if (!overlap) continue

      const image = await this.#captureDisplay(display.id)
      const piece = await sharp(image)
        .resize({ width: display.rect.width, height: display.rect.height, fit: 'fill' })
        .extract({
          left: overlap.left - display.rect.left,
          top: overlap.top - display.rect.top,
          width: overlap.width,
          height: overlap.height,
        })
        .png()
        .toBuffer()

      layers.push({ input: piece, left: overlap.left - rect.left, top: overlap.top - rect.top })
    }

    if (layers.length === 0) {
      log.warning`Region ${rect.width}x${rect.height}+${rect.left}+${rect.top} overlaps no display`
    }

    return sharp({
      create: {
        width: rect.width,
        height: rect.height,
        channels: 4,
        background: { r: 0, g: 0, b: 0, alpha: 1 },
      },
    })
      .composite(layers)
      .png()
      .toBuffer()
  }

  /**
   * Lists displays with geometry. Displays reported without a position are
   * measured from a capture and laid out left to right after the known ones.
   */
  async #placeDisplays(): Promise<PlacedDisplay[]> {
    const displays = await screenshot.listDisplays()
    const placed: PlacedDisplay[] = []
    let nextLeft = 0

    for (const display of displays) {
      const left = numberField(display, 'left')
      const top = numberField(display, 'top')
      const width = numberField(display, 'width')
      const height = numberField(display, 'height')

      if (left !== undefined && top !== undefined && width && height) {
        placed.push({ id: display.id, rect: { left, top, width, height } })
        nextLeft = Math.max(nextLeft, left + width)
        continue
      }

      const metadata = await sharp(await this.#captureDisplay(display.id)).metadata()
      const rect = { left: nextLeft, top: 0, width: metadata.width ?? 0, height: metadata.height ?? 0 }
      log.debug`Display ${display.id} has no reported geometry, measured ${rect.width}x${rect.height}`
      placed.push({ id: display.id, rect })
      nextLeft += rect.width
    }

    return placed
  }

  async #captureDisplay(id: DisplayInfo['id']): Promise<Buffer> {
    const image = await screenshot({ screen: id, format: 'png' })
    return Buffer.isBuffer(image) ? image : readFile(image)
  }
}
