/**
 * voice-dictation-stream: streaming dictation pipeline with VAD auto-stop and
 * a binary-framed WebSocket ASR session
 *
 * @packageDocumentation
 */

// Core exports
export * from './core/index.js'
export * from './types/index.js'
export * from './plugins/index.js'
export * from './errors.js'
export * from './config.js'

import { assertCredentials, loadConfig, type DictationConfig, type DictationConfigInput } from './config.js'
import { AudioCapture } from './core/audio-capture.js'
import { FfmpegInputDevice, type AudioInputDevice } from './core/input-device.js'
import { calculateDuration } from './core/pcm.js'
import { StreamingRecognitionSession, type StreamingSessionConfig } from './core/streaming-session.js'
import { WebSocketTransport, type TransportFactory } from './core/transport.js'
import { EnergyVad, type VoiceActivityDetector } from './core/vad.js'
import type { RecognitionError } from './errors.js'
import type { DictationPlugins } from './plugins/index.js'
import type { AudioFormat, AutoStopReason, DictationResult } from './types/index.js'

export type DictationState = 'idle' | 'recording' | 'processing'

/**
 * Controller event hooks
 */
export interface DictationHooks {
  /** Called on every state transition */
  onStateChange?: (state: DictationState) => void
  /** Called with each in-progress transcript */
  onPartialResult?: (text: string) => void
  /** Called for session errors (including non-fatal overflow reports) and device failures */
  onError?: (error: Error) => void
  /** Called after an auto-stop has been handled; result is null when the recording was cancelled */
  onAutoStop?: (reason: AutoStopReason, result: DictationResult | null) => void
}

/**
 * Dictation controller options
 */
export interface DictationControllerOptions {
  /** Configuration overrides, merged over environment and defaults */
  config?: DictationConfigInput
  /** Environment to read configuration from (default: process.env) */
  env?: NodeJS.ProcessEnv
  /** Downstream collaborators */
  plugins: DictationPlugins
  /** Microphone (default: ffmpeg capture of the default input) */
  device?: AudioInputDevice
  /** Voice-activity detector (default: EnergyVad at the configured threshold) */
  vad?: VoiceActivityDetector
  /** Connection factory (default: WebSocket to the configured ASR endpoint) */
  transportFactory?: TransportFactory
  /** Millisecond clock used for auto-stop decisions (default: Date.now) */
  clock?: () => number
  /** Event hooks */
  hooks?: DictationHooks
}

/**
 * Connect to the ASR service over WebSocket with the credential headers it expects
 */
export function createWebSocketTransportFactory(config: DictationConfig): TransportFactory {
  return (requestId) => WebSocketTransport.connect({
    url: config.asr.url,
    headers: {
      'X-Api-App-Key': config.asr.appKey,
      'X-Api-Access-Key': config.asr.accessKey,
      'X-Api-Resource-Id': config.asr.resourceId,
      'X-Api-Request-Id': requestId
    },
    connectTimeoutMs: config.session.handshakeTimeoutMs,
    verbose: config.verbose
  })
}

/**
 * Map loaded configuration onto session options
 */
export function sessionConfigFrom(config: DictationConfig): StreamingSessionConfig {
  return {
    format: audioFormatFrom(config),
    chunkDurationMs: config.audio.chunkDurationMs,
    ...config.session,
    request: {
      uid: config.asr.uid,
      modelName: config.asr.modelName,
      enablePunctuation: config.asr.enablePunctuation,
      enableItn: config.asr.enableItn
    },
    verbose: config.verbose
  }
}

function audioFormatFrom(config: DictationConfig): AudioFormat {
  return {
    sampleRate: config.audio.sampleRate,
    channels: config.audio.channels,
    bitsPerSample: config.audio.bitsPerSample
  }
}

/**
 * Dictation Controller
 * Wires microphone capture to a fresh recognition session per utterance and
 * hands the settled transcript to the injection and history plugins
 */
export class DictationController {
  readonly config: DictationConfig
  private state: DictationState = 'idle'
  private capture: AudioCapture
  private session: StreamingRecognitionSession | null = null
  private lastPartial: string = ''
  private transportFactory: TransportFactory
  private plugins: DictationPlugins
  private hooks: DictationHooks

  constructor(options: DictationControllerOptions) {
    this.config = loadConfig(options.config, options.env)
    this.plugins = options.plugins
    this.hooks = options.hooks ?? {}

    if (options.transportFactory) {
      this.transportFactory = options.transportFactory
    } else {
      assertCredentials(this.config)
      this.transportFactory = createWebSocketTransportFactory(this.config)
    }

    const format = audioFormatFrom(this.config)
    this.capture = new AudioCapture(
      options.device ?? new FfmpegInputDevice({ verbose: this.config.verbose }, format),
      {
        format,
        vadWindowMs: this.config.audio.vadWindowMs,
        vad: options.vad ?? new EnergyVad({ thresholdDb: this.config.audio.vadThresholdDb }),
        clock: options.clock ?? Date.now,
        verbose: this.config.verbose
      }
    )
  }

  getState(): DictationState {
    return this.state
  }

  /**
   * Begin recording and streaming. Ignored unless idle.
   * @throws DeviceError when the microphone cannot be opened
   */
  async startDictation(): Promise<void> {
    if (this.state !== 'idle') {
      return
    }

    this.setState('recording')
    this.lastPartial = ''

    const session = new StreamingRecognitionSession(
      this.transportFactory,
      {
        onPartialResult: (text) => {
          this.lastPartial = text
          this.hooks.onPartialResult?.(text)
        },
        onError: (error) => this.handleSessionError(error)
      },
      sessionConfigFrom(this.config)
    )
    this.session = session

    // The microphone opens first so a busy device never costs a connection.
    // Frames recorded before the handshake completes wait in the session buffer.
    try {
      await this.capture.start({
        maxDurationMs: this.config.recording.maxDurationMs,
        silenceTimeoutMs: this.config.recording.silenceTimeoutMs,
        onFrame: (pcm) => session.feedAudio(pcm),
        onAutoStop: (reason) => this.handleAutoStop(reason),
        onDeviceError: (error) => this.handleDeviceError(error)
      })
    } catch (error) {
      this.session = null
      this.setState('idle')
      throw error
    }

    if (this.session === session) {
      session.start()
    }
  }

  /**
   * Stop recording, wait for the final transcript and deliver it.
   * @returns The settled result, or null when not recording
   */
  async stopDictation(): Promise<DictationResult | null> {
    if (this.state !== 'recording') {
      return null
    }

    this.setState('processing')
    const session = this.session
    this.session = null

    try {
      const audio = await this.capture.stop()
      const finalText = session ? await session.stop() : ''
      return await this.settle(finalText, audio)
    } finally {
      this.setState('idle')
    }
  }

  /**
   * Abandon the current recording without delivering anything
   */
  async cancelDictation(): Promise<void> {
    if (this.state !== 'recording') {
      return
    }

    this.setState('processing')
    const session = this.session
    this.session = null

    try {
      await this.capture.stop()
      if (session) {
        await session.cancel()
      }
    } finally {
      this.setState('idle')
    }

    if (this.config.verbose) {
      console.log('Dictation cancelled')
    }
  }

  /**
   * Reaching the duration limit finalizes; a silent recording is cancelled
   */
  private handleAutoStop(reason: AutoStopReason): void {
    if (this.state !== 'recording') {
      return
    }

    if (this.config.verbose) {
      console.log(`Auto-stop (${reason})`)
    }

    const task: Promise<DictationResult | null> = reason === 'timeout'
      ? this.stopDictation()
      : this.cancelDictation().then(() => null)

    task
      .then((result) => this.hooks.onAutoStop?.(reason, result))
      .catch((error: unknown) => {
        this.reportError(error instanceof Error ? error : new Error(String(error)))
      })
  }

  /**
   * The microphone died mid-recording: finish with what was already streamed
   */
  private handleDeviceError(error: Error): void {
    this.reportError(error)
    if (this.state !== 'recording') {
      return
    }

    this.stopDictation().catch((stopError: unknown) => {
      this.reportError(stopError instanceof Error ? stopError : new Error(String(stopError)))
    })
  }

  private async settle(finalText: string, audio: Buffer): Promise<DictationResult> {
    const { sampleRate, channels, bitsPerSample } = this.config.audio
    const audioDurationMs = calculateDuration(audio.length, sampleRate, channels, bitsPerSample) * 1000

    // The session never invents text; fall back to the last partial here
    const recognizedText = finalText || this.lastPartial
    const fromPartial = finalText === ''

    if (!recognizedText.trim()) {
      if (this.config.verbose) {
        console.log('No text recognized')
      }
      return { recognizedText: '', text: '', fromPartial, audioDurationMs }
    }

    const text = await this.postProcess(recognizedText)
    await this.plugins.injector.inject(text)

    if (this.plugins.history) {
      try {
        await this.plugins.history.append({
          original: recognizedText,
          text,
          corrected: text !== recognizedText,
          audioDurationMs,
          timestamp: Date.now()
        })
      } catch (error) {
        console.error(`Error in history plugin ${this.plugins.history.name}:`, error)
      }
    }

    return { recognizedText, text, fromPartial, audioDurationMs }
  }

  private async postProcess(text: string): Promise<string> {
    const plugin = this.plugins.postProcess
    if (!plugin) {
      return text
    }

    try {
      const processed = (await plugin.process(text)).trim()
      return processed || text
    } catch (error) {
      console.error(`Post-processing with ${plugin.name} failed, using recognized text:`, error)
      return text
    }
  }

  private handleSessionError(error: RecognitionError): void {
    if (this.config.verbose || error.fatal) {
      console.error(`Recognition error (${error.kind}): ${error.message}`)
    }
    this.reportError(error)
  }

  private reportError(error: Error): void {
    if (!this.hooks.onError) {
      return
    }
    try {
      this.hooks.onError(error)
    } catch (callbackError) {
      console.error('Error in onError hook:', callbackError)
    }
  }

  private setState(state: DictationState): void {
    this.state = state
    this.hooks.onStateChange?.(state)
  }
}

/**
 * Default export
 */
export default DictationController
