// SPDX-License-Identifier: GPL-2.0-or-later
// Loopback relay: an HTTP listener serving the capture page and a WebSocket
// listener receiving analog frames from it.

import { createServer, type Server } from 'node:http'
import { WebSocketServer, WebSocket, type RawData } from 'ws'
import {
  BRIDGE_HOST,
  FRAME_TYPE_ANALOG,
  RECONNECT_DELAY_MS,
  STATUS_WAITING,
  STATUS_CONNECTED,
  STATUS_ANALOG_ACTIVE,
  STATUS_DISCONNECTED,
} from '../../shared/constants/protocol'
import { parseBridgeFrame } from '../../shared/bridge-frame'
import type { SessionOutcome } from '../../shared/types/protocol'
import { applyAnalogReport } from '../analog-decoder'
import { openInBrowser, type BrowserOpener } from '../browser-launcher'
import type { KeyboardState } from '../keyboard-state'
import { log, logBridgeFrame } from '../logger'
import { sleep } from '../timing'
import { renderBridgePage } from './bridge-page'

export interface BridgeServerOptions {
  host?: string
  reconnectDelayMs?: number
  /** Open the page in a browser after the first successful bind */
  openBrowser?: boolean
  launchBrowser?: BrowserOpener
  /** Page template override; defaults to bridge.html beside this module */
  template?: string
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

function toBytes(data: RawData): Uint8Array {
  if (Array.isArray(data)) return Buffer.concat(data)
  if (data instanceof ArrayBuffer) return new Uint8Array(data)
  return data
}

function listenHttp(server: Server, host: string): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once('error', reject)
    server.listen(0, host, () => {
      server.off('error', reject)
      resolve()
    })
  })
}

function listenWs(host: string): Promise<WebSocketServer> {
  return new Promise((resolve, reject) => {
    const wss = new WebSocketServer({ host, port: 0 })
    wss.once('error', reject)
    wss.once('listening', () => {
      wss.off('error', reject)
      resolve(wss)
    })
  })
}

function boundPort(address: ReturnType<Server['address']>): number | null {
  return address && typeof address === 'object' ? address.port : null
}

/**
 * Serves one capture session at a time.
 *
 * Listeners are bound lazily on the first session and kept for later ones,
 * so the page URL and WebSocket port stay stable across reconnects. Sockets
 * accepted while a session is running are paused and queued.
 */
export class BridgeServer {
  private readonly host: string
  private readonly reconnectDelayMs: number
  private readonly openBrowser: boolean
  private readonly launchBrowser: BrowserOpener
  private readonly template: string | undefined

  private httpServer: Server | null = null
  private wss: WebSocketServer | null = null
  private page = ''
  private browserLaunched = false
  private sessionRunning = false
  private readonly pending: WebSocket[] = []
  private waiter: ((ws: WebSocket | null) => void) | null = null

  constructor(
    private readonly state: KeyboardState,
    options: BridgeServerOptions = {},
  ) {
    this.host = options.host ?? BRIDGE_HOST
    this.reconnectDelayMs = options.reconnectDelayMs ?? RECONNECT_DELAY_MS
    this.openBrowser = options.openBrowser ?? true
    this.launchBrowser = options.launchBrowser ?? openInBrowser
    this.template = options.template
  }

  get httpPort(): number | null {
    return this.httpServer ? boundPort(this.httpServer.address()) : null
  }

  get wsPort(): number | null {
    return this.wss ? boundPort(this.wss.address()) : null
  }

  get pageUrl(): string | null {
    const port = this.httpPort
    return port === null ? null : `http://${this.host}:${port}`
  }

  get renderedPage(): string {
    return this.page
  }

  /**
   * Bind both listeners if not bound yet.
   * The WebSocket listener goes first so the page is rendered before HTTP accepts.
   * On failure the status carries the OS error and nothing stays bound.
   */
  async listen(): Promise<boolean> {
    if (this.httpServer && this.wss) return true

    let wss: WebSocketServer
    try {
      wss = await listenWs(this.host)
    } catch (err) {
      this.state.setStatus(`WS bind: ${errorMessage(err)}`, 'error')
      return false
    }

    const wsPort = boundPort(wss.address()) ?? 0
    const page = renderBridgePage(wsPort, this.state.vid(), this.state.pid(), this.template)
    const httpServer = createServer((req, res) => {
      req.resume()
      res.writeHead(200, {
        'Content-Type': 'text/html;charset=utf-8',
        'Content-Length': Buffer.byteLength(page),
        Connection: 'close',
      })
      res.end(page)
    })
    try {
      await listenHttp(httpServer, this.host)
    } catch (err) {
      wss.close()
      this.state.setStatus(`HTTP bind: ${errorMessage(err)}`, 'error')
      return false
    }

    wss.on('connection', (ws) => this.accept(ws))
    wss.on('error', (err) => log('warn', `WebSocket server error: ${err.message}`))
    httpServer.on('error', (err) => log('warn', `HTTP server error: ${err.message}`))

    this.httpServer = httpServer
    this.wss = wss
    this.page = page

    const url = this.pageUrl ?? ''
    log('info', `Bridge listening: page ${url}, ws port ${wsPort}`)
    this.state.setStatus(`Open Chrome -> ${url}`)

    if (this.openBrowser && !this.browserLaunched) {
      this.browserLaunched = true
      this.launchBrowser(url).catch((err: unknown) => {
        log('warn', `Browser launch failed: ${errorMessage(err)}`)
        this.state.setStatus(`Browser launch failed - open ${url} manually`, 'warn')
      })
    }
    return true
  }

  /**
   * Wait for the capture page to connect and relay its frames until it goes away.
   * Resolves once the session has ended and the reconnect pause has elapsed.
   */
  async serveSession(signal?: AbortSignal): Promise<SessionOutcome> {
    if (this.sessionRunning) {
      throw new Error('A bridge session is already running')
    }
    this.sessionRunning = true
    try {
      if (!(await this.listen())) return 'bind-failed'

      this.state.setStatus(STATUS_WAITING)
      this.state.setActive(false)

      const ws = await this.nextConnection(signal)
      if (!ws) return 'aborted'

      this.state.setStatus(STATUS_CONNECTED)
      await this.relay(ws, signal)

      this.state.setActive(false)
      this.state.setStatus(STATUS_DISCONNECTED)
      const completed = await sleep(this.reconnectDelayMs, signal)
      return completed ? 'ended' : 'aborted'
    } finally {
      this.state.setActive(false)
      this.sessionRunning = false
    }
  }

  async close(): Promise<void> {
    this.resolveWaiter(null)
    for (const ws of this.pending.splice(0)) {
      ws.terminate()
    }

    const wss = this.wss
    const httpServer = this.httpServer
    this.wss = null
    this.httpServer = null

    if (wss) {
      for (const client of wss.clients) {
        client.terminate()
      }
      await new Promise<void>((resolve) => wss.close(() => resolve()))
    }
    if (httpServer) {
      httpServer.closeAllConnections()
      await new Promise<void>((resolve) => httpServer.close(() => resolve()))
    }
  }

  private accept(ws: WebSocket): void {
    // No frames are read until relay() resumes the socket
    ws.pause()
    if (this.waiter) {
      this.resolveWaiter(ws)
      return
    }
    this.pending.push(ws)
    ws.once('close', () => {
      const idx = this.pending.indexOf(ws)
      if (idx >= 0) this.pending.splice(idx, 1)
    })
  }

  private resolveWaiter(ws: WebSocket | null): void {
    const waiter = this.waiter
    this.waiter = null
    waiter?.(ws)
  }

  private nextConnection(signal?: AbortSignal): Promise<WebSocket | null> {
    while (this.pending.length > 0) {
      const ws = this.pending.shift()
      if (ws && ws.readyState === WebSocket.OPEN) return Promise.resolve(ws)
    }
    if (signal?.aborted) return Promise.resolve(null)

    return new Promise((resolve) => {
      const onAbort = (): void => this.resolveWaiter(null)
      this.waiter = (ws) => {
        signal?.removeEventListener('abort', onAbort)
        resolve(ws)
      }
      signal?.addEventListener('abort', onAbort, { once: true })
    })
  }

  private relay(ws: WebSocket, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      let gotAnalog = false
      let done = false

      const onMessage = (data: RawData, isBinary: boolean): void => {
        if (!isBinary) return
        const bytes = toBytes(data)
        logBridgeFrame('RX', bytes)
        const frame = parseBridgeFrame(bytes)
        if (!frame || frame.type !== FRAME_TYPE_ANALOG) return

        if (!gotAnalog) {
          gotAnalog = true
          this.state.setActive(true)
          this.state.setStatus(STATUS_ANALOG_ACTIVE)
        }
        applyAnalogReport(frame.payload, this.state)
        this.state.setStatus(`${STATUS_ANALOG_ACTIVE} (${this.state.pressedCount()} keys)`, 'debug')
      }

      const onError = (err: Error): void => {
        log('debug', `Bridge socket error: ${err.message}`)
        finish()
      }

      const onAbort = (): void => {
        ws.terminate()
        finish()
      }

      const finish = (): void => {
        if (done) return
        done = true
        ws.off('message', onMessage)
        ws.off('close', finish)
        ws.off('error', onError)
        signal?.removeEventListener('abort', onAbort)
        resolve()
      }

      if (ws.readyState !== WebSocket.OPEN) {
        finish()
        return
      }
      if (signal?.aborted) {
        onAbort()
        return
      }

      ws.on('message', onMessage)
      ws.on('close', finish)
      ws.on('error', onError)
      signal?.addEventListener('abort', onAbort, { once: true })
      ws.resume()
    })
  }
}
