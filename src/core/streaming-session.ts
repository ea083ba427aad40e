import { v4 as uuidv4 } from 'uuid'
import { BufferOverflow, RecognitionError, TransportError, type RecognitionErrorKind } from '../errors.js'
import type { AudioFormat, SessionState } from '../types/index.js'
import { decodeResponse, encodeAudioFrame, encodeRequest, type WireMessage } from './frame-codec.js'
import { bytesForDuration, DEFAULT_AUDIO_FORMAT } from './pcm.js'
import { SendBuffer } from './send-buffer.js'
import type { AsrTransport, TransportFactory } from './transport.js'

/**
 * Recognition options sent in the opening request
 */
export interface RecognitionRequestOptions {
  /** User identifier reported to the service */
  uid: string
  /** Recognition model */
  modelName: string
  /** Insert punctuation */
  enablePunctuation: boolean
  /** Inverse text normalization (numbers, dates) */
  enableItn: boolean
  /** 'single' returns the utterance so far; 'full' returns every segment */
  resultType: 'single' | 'full'
}

/**
 * Session event callbacks
 */
export interface RecognitionCallbacks {
  /** Called with each in-progress transcript */
  onPartialResult?: (text: string) => void
  /** Called once with the settled transcript */
  onFinalResult?: (text: string) => void
  /** Called for fatal errors (at most once) and for non-fatal overflow reports */
  onError?: (error: RecognitionError) => void
}

/**
 * Streaming session configuration
 */
export interface StreamingSessionConfig {
  /** Audio format fed to the session (default: 16kHz mono 16-bit) */
  format?: AudioFormat
  /** Audio per transmitted frame in ms (default: 200) */
  chunkDurationMs?: number
  /** Buffer ceiling in chunks (default: 60, about 12s) */
  maxBufferChunks?: number
  /** Fill ratio that triggers the one-time overflow warning (default: 0.8) */
  bufferWarningRatio?: number
  /** Sender wait when no whole chunk is buffered, in ms (default: 50) */
  pollIntervalMs?: number
  /** Receiver read timeout in ms (default: 1000) */
  receiveTimeoutMs?: number
  /** How long the receiver keeps waiting after stop() without any frame, in ms (default: 12000) */
  stopGraceMs?: number
  /** How long stop() waits for the exchange to finish, in ms (default: 10000) */
  stopWaitTimeoutMs?: number
  /** How long stop() waits after forcing the connection closed, in ms (default: 2000) */
  forceCloseWaitMs?: number
  /** Time allowed for the opening request's reply, in ms (default: 5000) */
  handshakeTimeoutMs?: number
  /** Recognition options for the opening request */
  request?: Partial<RecognitionRequestOptions>
  /** Enable verbose logging */
  verbose?: boolean
}

export interface SessionStats {
  state: SessionState
  /** Audio frames sent, excluding the terminal marker */
  chunksSent: number
  bufferedBytes: number
  droppedBytes: number
  /** Next sequence number to be used */
  sequence: number
}

type ResolvedConfig = Required<Omit<StreamingSessionConfig, 'request'>> & {
  request: RecognitionRequestOptions
}

const DEFAULT_REQUEST: RecognitionRequestOptions = {
  uid: 'voice_input_user',
  modelName: 'bigmodel',
  enablePunctuation: true,
  enableItn: true,
  resultType: 'single'
}

/**
 * Resolve once `promise` settles or `ms` elapses
 * @returns true when the promise settled in time
 */
function settleWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    const timer = setTimeout(() => resolve(false), ms)
    promise.then(
      () => {
        clearTimeout(timer)
        resolve(true)
      },
      () => {
        clearTimeout(timer)
        resolve(true)
      }
    )
  })
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Streaming Recognition Session
 * Drives one utterance: connect, handshake, stream audio from a bounded buffer
 * while reading partial results, then finalize with a bounded two-stage stop.
 * A session is single-use; create a new one per recording.
 */
export class StreamingRecognitionSession {
  readonly requestId: string = uuidv4()

  private state: SessionState = 'idle'
  private transport: AsrTransport | null = null
  private readonly buffer: SendBuffer
  private readonly config: ResolvedConfig
  private readonly chunkBytes: number
  private seq: number = 1
  private chunksSent: number = 0
  private finalText: string = ''
  private stopped: boolean = false
  private stoppedAt: number = 0
  private forcedClose: boolean = false
  private lifecycle: Promise<void> | null = null
  private stopPromise: Promise<string> | null = null
  private closing: Promise<void> | null = null
  private wakeSender: (() => void) | null = null

  constructor(
    private readonly connect: TransportFactory,
    private readonly callbacks: RecognitionCallbacks = {},
    config: StreamingSessionConfig = {}
  ) {
    this.config = {
      format: DEFAULT_AUDIO_FORMAT,
      chunkDurationMs: 200,
      maxBufferChunks: 60,
      bufferWarningRatio: 0.8,
      pollIntervalMs: 50,
      receiveTimeoutMs: 1000,
      stopGraceMs: 12_000,
      stopWaitTimeoutMs: 10_000,
      forceCloseWaitMs: 2_000,
      handshakeTimeoutMs: 5_000,
      verbose: false,
      ...config,
      request: { ...DEFAULT_REQUEST, ...config.request }
    }

    this.chunkBytes = bytesForDuration(this.config.chunkDurationMs, this.config.format)
    this.buffer = new SendBuffer({
      capacity: this.chunkBytes * this.config.maxBufferChunks,
      warningRatio: this.config.bufferWarningRatio,
      onWarning: (length, capacity) => {
        console.warn(`Session ${this.requestId}: send buffer at ${length}/${capacity} bytes`)
        this.report(new RecognitionError(
          `Send buffer nearly full (${length}/${capacity} bytes)`,
          'overflow_warning'
        ))
      },
      onOverflow: (droppedBytes) => {
        console.warn(`Session ${this.requestId}: send buffer overflow, dropped ${droppedBytes} oldest bytes`)
        const message = `Send buffer overflow: oldest audio dropped (${droppedBytes} bytes)`
        this.report(new RecognitionError(message, 'overflow_truncated', new BufferOverflow(message, droppedBytes)))
      }
    })
  }

  /** Maximum number of buffered bytes */
  get maxBufferSize(): number {
    return this.buffer.capacity
  }

  /** Bytes per transmitted audio frame */
  get chunkSize(): number {
    return this.chunkBytes
  }

  /**
   * Open the connection and start streaming in the background. Returns immediately.
   * Only the first call has any effect.
   */
  start(): void {
    if (this.state !== 'idle' || this.stopped) {
      return
    }

    this.seq = 1
    this.chunksSent = 0
    this.buffer.reset()
    this.state = 'connecting'

    this.lifecycle = this.run().catch((error: unknown) => {
      this.fail('connect', `Session terminated: ${errorMessage(error)}`, error)
    })
  }

  /**
   * Queue PCM for sending. Never blocks; no-op once stopped or failed.
   */
  feedAudio(pcm: Buffer): void {
    if (this.stopped || this.state === 'failed' || pcm.length === 0) {
      return
    }
    this.buffer.write(pcm)
  }

  /**
   * Finish the exchange and return the final transcript ('' when none arrived).
   * Every call returns the same promise.
   */
  stop(): Promise<string> {
    if (!this.stopPromise) {
      this.stopPromise = this.finish()
    }
    return this.stopPromise
  }

  /**
   * Abandon the exchange: close the connection without sending the terminal frame
   * or waiting for a final result. Later stop() calls resolve to ''.
   */
  async cancel(): Promise<void> {
    if (!this.stopPromise) {
      this.stopPromise = this.abort()
    }
    await this.stopPromise
  }

  getState(): SessionState {
    return this.state
  }

  getFinalText(): string {
    return this.finalText
  }

  getStats(): SessionStats {
    return {
      state: this.state,
      chunksSent: this.chunksSent,
      bufferedBytes: this.buffer.length,
      droppedBytes: this.buffer.dropped,
      sequence: this.seq
    }
  }

  private async finish(): Promise<string> {
    this.stopped = true
    this.stoppedAt = Date.now()
    if (this.state === 'connecting' || this.state === 'streaming') {
      this.state = 'stopping'
    }
    this.wakeSender?.()

    const lifecycle = this.lifecycle
    if (!lifecycle) {
      // never started
      this.state = 'finalized'
      return ''
    }

    const graceful = await settleWithin(lifecycle, this.config.stopWaitTimeoutMs)
    if (!graceful) {
      console.warn(`Session ${this.requestId}: no final result within ${this.config.stopWaitTimeoutMs}ms, closing connection`)
      this.forcedClose = true
      const unwound = await settleWithin(
        Promise.all([this.closeTransport(), lifecycle]),
        this.config.forceCloseWaitMs
      )
      if (!unwound) {
        console.warn(`Session ${this.requestId}: loops still running ${this.config.forceCloseWaitMs}ms after close`)
      }
    } else {
      await settleWithin(this.closeTransport(), this.config.forceCloseWaitMs)
    }

    if (this.state !== 'failed') {
      this.state = 'finalized'
    }

    if (this.config.verbose) {
      console.log(`Session ${this.requestId} stopped: "${this.finalText}" (${this.chunksSent} chunks sent)`)
    }
    return this.finalText
  }

  private async abort(): Promise<string> {
    this.stopped = true
    this.stoppedAt = Date.now()
    this.forcedClose = true
    if (this.state === 'connecting' || this.state === 'streaming') {
      this.state = 'stopping'
    }
    this.wakeSender?.()

    const lifecycle = this.lifecycle
    if (lifecycle) {
      await settleWithin(Promise.all([this.closeTransport(), lifecycle]), this.config.forceCloseWaitMs)
    }
    if (this.state !== 'failed') {
      this.state = 'finalized'
    }

    if (this.config.verbose) {
      console.log(`Session ${this.requestId} cancelled`)
    }
    return ''
  }

  private async run(): Promise<void> {
    let transport: AsrTransport
    try {
      transport = await this.connect(this.requestId)
    } catch (error) {
      this.fail('connect', `Failed to connect: ${errorMessage(error)}`, error)
      return
    }

    this.transport = transport
    if (this.forcedClose) {
      await this.closeTransport()
      return
    }

    if (!(await this.handshake(transport))) {
      await this.closeTransport()
      return
    }

    if (this.state === 'connecting') {
      this.state = 'streaming'
    }
    if (this.config.verbose) {
      console.log(`Session ${this.requestId} streaming`)
    }

    await Promise.all([this.sendLoop(transport), this.receiveLoop(transport)])
  }

  private async handshake(transport: AsrTransport): Promise<boolean> {
    let reply: WireMessage
    try {
      await transport.send(encodeRequest(this.buildRequest(), this.seq))
      this.seq++

      const data = await transport.receive(this.config.handshakeTimeoutMs)
      if (data === null) {
        throw new TransportError(`No handshake reply within ${this.config.handshakeTimeoutMs}ms`)
      }
      reply = decodeResponse(data)
    } catch (error) {
      this.fail('handshake', `Handshake failed: ${errorMessage(error)}`, error)
      return false
    }

    if (reply.type === 'error') {
      this.fail('handshake', `Handshake rejected: ${reply.message}`)
      return false
    }
    return true
  }

  private buildRequest(): Record<string, unknown> {
    const { format, request } = this.config
    return {
      user: { uid: request.uid },
      audio: {
        format: 'pcm',
        codec: 'pcm',
        rate: format.sampleRate,
        bits: format.bitsPerSample,
        channel: format.channels
      },
      request: {
        model_name: request.modelName,
        enable_punc: request.enablePunctuation,
        enable_itn: request.enableItn,
        result_type: request.resultType
      }
    }
  }

  /**
   * Sender loop: whole chunks while running; after stop, everything left as one frame, then the terminal marker
   */
  private async sendLoop(transport: AsrTransport): Promise<void> {
    while (!this.stopped && this.state !== 'failed') {
      const chunk = this.buffer.read(this.chunkBytes)
      if (!chunk) {
        await this.pause(this.config.pollIntervalMs)
        continue
      }
      if (!(await this.sendAudio(transport, chunk, false))) {
        return
      }
    }

    if (this.state === 'failed' || this.forcedClose) {
      return
    }

    const remaining = this.buffer.drain()
    if (remaining.length > 0 && !(await this.sendAudio(transport, remaining, false))) {
      return
    }

    await this.sendAudio(transport, Buffer.alloc(0), true)
  }

  private async sendAudio(transport: AsrTransport, pcm: Buffer, isLast: boolean): Promise<boolean> {
    const seq = this.seq
    try {
      await transport.send(encodeAudioFrame(pcm, seq, isLast))
    } catch (error) {
      this.fail('send', `Failed to send audio frame ${seq}: ${errorMessage(error)}`, error)
      return false
    }

    if (!isLast) {
      this.seq++
      this.chunksSent++
    }
    return true
  }

  /**
   * Receiver loop: partials until a final result, an error frame or the connection ends
   */
  private async receiveLoop(transport: AsrTransport): Promise<void> {
    while (this.state !== 'failed') {
      let data: Buffer | null
      try {
        data = await transport.receive(this.config.receiveTimeoutMs)
      } catch (error) {
        if (!this.stopped) {
          this.fail('closed', `Connection closed unexpectedly: ${errorMessage(error)}`, error)
        }
        return
      }

      if (this.forcedClose) {
        return
      }

      if (data === null) {
        if (this.stopped && Date.now() - this.stoppedAt >= this.config.stopGraceMs) {
          console.warn(`Session ${this.requestId}: no final result ${this.config.stopGraceMs}ms after stop, giving up`)
          return
        }
        continue
      }

      let message: WireMessage
      try {
        message = decodeResponse(data)
      } catch (error) {
        this.fail('decode', `Failed to decode response: ${errorMessage(error)}`, error)
        return
      }

      if (message.type === 'full_response') {
        if (message.terminal) {
          this.finalText = message.text
          this.state = 'finalized'
          this.emit('onFinalResult', message.text)
          return
        }
        this.emit('onPartialResult', message.text)
      } else if (message.type === 'error') {
        this.fail('server', message.message)
        return
      }
      // acks and unknown frames carry nothing for us
    }
  }

  private pause(ms: number): Promise<void> {
    return new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.wakeSender = null
        resolve()
      }, ms)
      this.wakeSender = () => {
        clearTimeout(timer)
        this.wakeSender = null
        resolve()
      }
    })
  }

  private closeTransport(): Promise<void> {
    const transport = this.transport
    if (!transport) {
      return Promise.resolve()
    }
    if (!this.closing) {
      this.closing = transport.close().catch((error: unknown) => {
        console.error(`Session ${this.requestId}: error closing connection:`, error)
      })
    }
    return this.closing
  }

  private fail(kind: RecognitionErrorKind, message: string, cause?: unknown): void {
    if (this.state === 'failed' || this.state === 'finalized' || this.forcedClose) {
      if (this.config.verbose) {
        console.log(`Session ${this.requestId}: ignoring ${kind} after settle: ${message}`)
      }
      return
    }

    this.state = 'failed'
    this.wakeSender?.()
    console.error(`Session ${this.requestId} failed (${kind}): ${message}`)
    this.report(new RecognitionError(message, kind, cause))
  }

  private report(error: RecognitionError): void {
    if (!this.callbacks.onError) {
      return
    }
    try {
      this.callbacks.onError(error)
    } catch (callbackError) {
      console.error('Error in onError callback:', callbackError)
    }
  }

  private emit(name: 'onPartialResult' | 'onFinalResult', text: string): void {
    const callback = this.callbacks[name]
    if (!callback) {
      return
    }
    try {
      callback(text)
    } catch (error) {
      console.error(`Error in ${name} callback:`, error)
    }
  }
}
