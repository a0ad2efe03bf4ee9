/**
 * Upload Test Server
 *
 * Real HTTP server for testing multipart delivery in integration tests.
 * Listens on an ephemeral port and records every request for inspection.
 * @module tests/helpers/upload-server
 */

import http from 'node:http'
import type { IncomingMessage, ServerResponse, Server } from 'node:http'

/** Recorded upload request structure */
export interface UploadRequest {
  method: string | undefined
  url: string | undefined
  headers: http.IncomingHttpHeaders
  body: Buffer
}

/**
 * Test server that receives and records uploads
 */
export class UploadTestServer {
  requests: UploadRequest[] = []
  responseStatus = 200
  responseBody = 'ok'
  /** When false, requests are recorded but never answered */
  respond = true
  #server: Server | undefined
  #port = 0

  get url(): string {
    return `http://127.0.0.1:${this.#port}/upload`
  }

  async start(): Promise<void> {
    if (this.#server) throw new Error('Server already started')

    const server = http.createServer((req, res) => this.#handleRequest(req, res))
    this.#server = server

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject)
      server.listen(0, '127.0.0.1', () => {
        const address = server.address()
        if (address && typeof address === 'object') this.#port = address.port
        resolve()
      })
    })
  }

  async stop(): Promise<void> {
    const server = this.#server
    if (!server) return

    server.closeAllConnections()
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()))
    })
    this.#server = undefined
  }

  reset(): void {
    this.requests = []
    this.responseStatus = 200
    this.responseBody = 'ok'
    this.respond = true
  }

  #handleRequest(req: IncomingMessage, res: ServerResponse): void {
    const chunks: Buffer[] = []

    req.on('data', (chunk: Buffer) => chunks.push(chunk))
    req.on('end', () => {
      this.requests.push({
        method: req.method,
        url: req.url,
        headers: req.headers,
        body: Buffer.concat(chunks),
      })
      if (!this.respond) return
      res.writeHead(this.responseStatus, { 'Content-Type': 'text/plain' })
      res.end(this.responseBody)
    })
    req.on('error', () => {
      res.writeHead(500)
      res.end('Internal Server Error')
    })
  }
}
