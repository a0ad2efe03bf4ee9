/**
 * HTTP Delivery - uploads captures as multipart/form-data
 *
 * Stateless service with single options object parameter.
 * Throws on HTTP errors, network failures and timeouts (the driver treats all as fatal).
 *
 * @module lib/delivery/http-delivery
 */

import fs from 'node:fs/promises'
import path from 'node:path'
import { ConfigurationError, DeliveryFailedError, errorMessage } from '../../error.js'
import { HTTP_UPLOAD_TIMEOUT_MS, RESPONSE_BODY_TRUNCATE_LENGTH } from '../../const.js'
import { httpLogger } from '../logger.js'
import type { HttpDeliveryConfig } from '../../types/domain.js'

const log = httpLogger()

/** Options for HTTP upload */
export interface HttpDeliveryOptions {
  filePath: string
  config: HttpDeliveryConfig
  fetch?: typeof fetch
  /** Aborts the upload, response body included, after this long */
  timeoutMs?: number
}

/** Result from HTTP upload */
export interface HttpDeliveryResult {
  status: number
  statusText: string
}

/**
 * Splits a "Name: Value" header line.
 *
 * @throws ConfigurationError when the line has no name or no colon
 */
export function parseHeaderLine(line: string): [string, string] {
  const colon = line.indexOf(':')
  const name = colon > 0 ? line.slice(0, colon).trim() : ''
  if (!name) {
    throw new ConfigurationError(`expected "Name: Value", got "${line}"`, 'http header')
  }
  return [name, line.slice(colon + 1).trim()]
}

/**
 * Uploads a file as the configured multipart field.
 *
 * @throws DeliveryFailedError on non-2xx responses or transport errors
 */
export async function deliverToHttp(options: HttpDeliveryOptions): Promise<HttpDeliveryResult> {
  const { filePath, config, fetch: fetchFn = fetch, timeoutMs = HTTP_UPLOAD_TIMEOUT_MS } = options

  const headers = new Headers()
  for (const line of config.headers) {
    const [name, value] = parseHeaderLine(line)
    headers.append(name, value)
  }

  const body = new FormData()
  const bytes = await fs.readFile(filePath)
  body.append(config.fieldName, new Blob([new Uint8Array(bytes)], { type: 'image/png' }), path.basename(filePath))

  log.info`Uploading ${path.basename(filePath)} (${bytes.length} bytes) via ${config.method} ${config.url}`

  const signal = AbortSignal.timeout(timeoutMs)
  let response: Response
  let responseText: string
  try {
    response = await fetchFn(config.url, { method: config.method, headers, body, signal })
    responseText = await response.text()
  } catch (err) {
    const reason = signal.aborted ? `timed out after ${timeoutMs} ms` : errorMessage(err)
    throw new DeliveryFailedError(`${config.method} ${config.url} (${reason})`, undefined, {
      cause: err,
    })
  }

  log.debug`Upload response: ${response.status} ${response.statusText}`

  if (!response.ok) {
    throw new DeliveryFailedError(`${config.method} ${config.url}`, {
      command: `${config.method} ${config.url}`,
      exitCode: response.status,
      stdout: responseText.substring(0, RESPONSE_BODY_TRUNCATE_LENGTH),
      stderr: response.statusText,
    })
  }

  return { status: response.status, statusText: response.statusText }
}
