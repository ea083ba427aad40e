import { WebSocket, type RawData } from 'ws'
import { TransportError } from '../errors.js'

/**
 * Bidirectional binary connection to the ASR service
 */
export interface AsrTransport {
  isOpen(): boolean
  /**
   * Send one binary frame
   * @throws TransportError when the connection is closed or the write fails
   */
  send(frame: Buffer): Promise<void>
  /**
   * Wait for the next inbound frame
   * @returns The frame, or null when timeoutMs elapses first
   * @throws TransportError once the connection has closed and no frames remain
   */
  receive(timeoutMs: number): Promise<Buffer | null>
  /** Close the connection; safe to call more than once */
  close(): Promise<void>
}

/**
 * Opens a transport for one session
 */
export type TransportFactory = (requestId: string) => Promise<AsrTransport>

/**
 * WebSocket transport configuration
 */
export interface WebSocketTransportConfig {
  /** Service endpoint */
  url: string
  /** Extra HTTP headers sent with the upgrade request */
  headers?: Record<string, string>
  /** Upgrade handshake timeout in ms (default: 5000) */
  connectTimeoutMs?: number
  /** Time to wait for a clean close before terminating, in ms (default: 1000) */
  closeTimeoutMs?: number
  /** Enable verbose logging */
  verbose?: boolean
}

interface PendingReceive {
  resolve: (frame: Buffer | null) => void
  reject: (error: Error) => void
  timer: NodeJS.Timeout
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) {
    return data
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data)
  }
  return Buffer.from(data)
}

/**
 * ASR transport over a ws client socket.
 * Inbound frames are queued so receive() can be called with a timeout.
 */
export class WebSocketTransport implements AsrTransport {
  private queue: Buffer[] = []
  private pending: PendingReceive | null = null
  private closedError: TransportError | null = null

  constructor(
    private readonly ws: WebSocket,
    private readonly closeTimeoutMs: number = 1000,
    private readonly verbose: boolean = false
  ) {
    ws.on('message', (data: RawData) => {
      this.push(toBuffer(data))
    })

    ws.on('error', (error) => {
      if (this.verbose) {
        console.error('ASR WebSocket error:', error.message)
      }
      this.markClosed(new TransportError(`WebSocket error: ${error.message}`, error))
    })

    ws.on('close', (code: number, reason: Buffer) => {
      const detail = reason.length > 0 ? `: ${reason.toString('utf8')}` : ''
      if (this.verbose) {
        console.log(`ASR WebSocket closed (${code}${detail})`)
      }
      this.markClosed(new TransportError(`Connection closed (${code}${detail})`))
    })
  }

  /**
   * Connect to the service and resolve once the socket is open
   * @throws TransportError when the upgrade fails or times out
   */
  static async connect(config: WebSocketTransportConfig): Promise<WebSocketTransport> {
    const { url, headers = {}, connectTimeoutMs = 5000, closeTimeoutMs = 1000, verbose = false } = config

    if (verbose) {
      console.log(`Connecting to ${url}`)
    }

    const ws = new WebSocket(url, {
      headers,
      handshakeTimeout: connectTimeoutMs,
      perMessageDeflate: false
    })

    await new Promise<void>((resolve, reject) => {
      const onOpen = () => {
        ws.off('error', onError)
        resolve()
      }
      const onError = (error: Error) => {
        ws.off('open', onOpen)
        reject(new TransportError(`Failed to connect to ${url}: ${error.message}`, error))
      }
      ws.once('open', onOpen)
      ws.once('error', onError)
    })

    return new WebSocketTransport(ws, closeTimeoutMs, verbose)
  }

  isOpen(): boolean {
    return this.closedError === null && this.ws.readyState === WebSocket.OPEN
  }

  send(frame: Buffer): Promise<void> {
    if (!this.isOpen()) {
      return Promise.reject(this.closedError ?? new TransportError('Connection is not open'))
    }

    return new Promise<void>((resolve, reject) => {
      this.ws.send(frame, { binary: true }, (error) => {
        if (error) {
          reject(new TransportError(`Send failed: ${error.message}`, error))
        } else {
          resolve()
        }
      })
    })
  }

  receive(timeoutMs: number): Promise<Buffer | null> {
    const next = this.queue.shift()
    if (next) {
      return Promise.resolve(next)
    }
    if (this.closedError) {
      return Promise.reject(this.closedError)
    }
    if (this.pending) {
      return Promise.reject(new TransportError('Concurrent receive() calls are not supported'))
    }

    return new Promise<Buffer | null>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = null
        resolve(null)
      }, timeoutMs)
      this.pending = { resolve, reject, timer }
    })
  }

  async close(): Promise<void> {
    if (this.ws.readyState === WebSocket.CLOSED) {
      return
    }

    await new Promise<void>((resolve) => {
      const timeout = setTimeout(() => {
        this.ws.terminate()
        resolve()
      }, this.closeTimeoutMs)

      this.ws.once('close', () => {
        clearTimeout(timeout)
        resolve()
      })

      if (this.ws.readyState !== WebSocket.CLOSING) {
        this.ws.close()
      }
    })
  }

  private push(frame: Buffer): void {
    const pending = this.pending
    if (pending) {
      this.pending = null
      clearTimeout(pending.timer)
      pending.resolve(frame)
    } else {
      this.queue.push(frame)
    }
  }

  private markClosed(error: TransportError): void {
    if (this.closedError) {
      return
    }
    this.closedError = error

    const pending = this.pending
    if (pending) {
      this.pending = null
      clearTimeout(pending.timer)
      pending.reject(error)
    }
  }
}
