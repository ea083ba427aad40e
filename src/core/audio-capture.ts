import { DeviceError } from '../errors.js'
import type { AudioFormat, AutoStopReason, CaptureSession } from '../types/index.js'
import type { AudioInputDevice } from './input-device.js'
import { bytesForDuration, calculateDuration, DEFAULT_AUDIO_FORMAT } from './pcm.js'
import { EnergyVad, type VoiceActivityDetector } from './vad.js'

/**
 * Per-capture limits and callbacks
 */
export interface CaptureOptions {
  /** Stop with reason 'timeout' once this much time has elapsed (0 disables) */
  maxDurationMs: number
  /** Stop with reason 'silence' after this long without a speech window (0 disables) */
  silenceTimeoutMs: number
  /** Called with every frame as it arrives; must not block */
  onFrame?: (pcm: Buffer) => void
  /** Called at most once per start() */
  onAutoStop?: (reason: AutoStopReason) => void
  /** Called when the device fails after it was opened; frames recorded so far stay available to stop() */
  onDeviceError?: (error: Error) => void
}

/**
 * Recorder configuration
 */
export interface AudioCaptureConfig {
  /** Input format (default: 16kHz mono 16-bit) */
  format?: AudioFormat
  /** VAD window length in ms (default: 30) */
  vadWindowMs?: number
  /** Voice-activity detector (default: EnergyVad) */
  vad?: VoiceActivityDetector
  /** Millisecond clock read at frame arrival (default: Date.now) */
  clock?: () => number
  /** Enable verbose logging */
  verbose?: boolean
}

export interface CaptureStats {
  active: boolean
  /** Milliseconds of audio accumulated so far */
  recordedMs: number
  speechWindows: number
  vadFailures: number
}

/**
 * Audio Capture
 * Owns the microphone stream, runs windowed VAD over incoming frames and
 * decides when a recording should end on its own
 */
export class AudioCapture {
  private session: CaptureSession | null = null
  private options: CaptureOptions | null = null
  private starting: boolean = false
  private readonly config: Required<AudioCaptureConfig>
  private readonly windowBytes: number

  constructor(private readonly device: AudioInputDevice, config: AudioCaptureConfig = {}) {
    this.config = {
      format: DEFAULT_AUDIO_FORMAT,
      vadWindowMs: 30,
      vad: new EnergyVad(),
      clock: Date.now,
      verbose: false,
      ...config
    }
    this.windowBytes = bytesForDuration(this.config.vadWindowMs, this.config.format)
  }

  /**
   * Start capturing. No-op while a capture is already active.
   * @throws DeviceError when the input stream cannot be opened; no state is kept
   */
  async start(options: CaptureOptions): Promise<void> {
    if (this.starting || this.session?.active) {
      return
    }

    const now = this.config.clock()
    const session: CaptureSession = {
      active: true,
      startedAt: now,
      lastVoiceAt: now,
      accumulatedFrames: [],
      vadResidual: Buffer.alloc(0),
      autoStopped: false,
      speechWindows: 0,
      vadFailures: 0,
      deviceFailed: false
    }

    this.starting = true
    this.session = session
    this.options = options

    try {
      await this.device.open(
        (frame) => this.handleFrame(session, frame),
        (error) => this.handleDeviceError(session, error)
      )
    } catch (error) {
      session.active = false
      if (this.session === session) {
        this.session = null
        this.options = null
      }
      throw error instanceof DeviceError
        ? error
        : new DeviceError('Failed to open input device', error)
    } finally {
      this.starting = false
    }

    // stop() arrived while the device was opening
    if (!session.active) {
      await this.device.close()
      return
    }

    if (this.config.verbose) {
      console.log(`Capture started (max ${options.maxDurationMs}ms, silence ${options.silenceTimeoutMs}ms)`)
    }
  }

  /**
   * Stop capturing and return every frame recorded since start().
   * Returns an empty buffer when nothing is being recorded.
   */
  async stop(): Promise<Buffer> {
    const session = this.session
    if (!session) {
      return Buffer.alloc(0)
    }

    // Frames arriving from here on are dropped
    session.active = false
    this.session = null
    this.options = null

    if (!this.starting && !session.deviceFailed) {
      try {
        await this.device.close()
      } catch (error) {
        console.error('Error closing input device:', error)
      }
    }

    const audio = Buffer.concat(session.accumulatedFrames)
    session.accumulatedFrames = []
    session.vadResidual = Buffer.alloc(0)

    if (this.config.verbose) {
      console.log(`Capture stopped: ${audio.length} bytes`)
    }
    return audio
  }

  isRecording(): boolean {
    return this.session?.active ?? false
  }

  getStats(): CaptureStats {
    const session = this.session
    if (!session) {
      return { active: false, recordedMs: 0, speechWindows: 0, vadFailures: 0 }
    }

    const bytes = session.accumulatedFrames.reduce((sum, frame) => sum + frame.length, 0)
    const { sampleRate, channels, bitsPerSample } = this.config.format
    return {
      active: session.active,
      recordedMs: calculateDuration(bytes, sampleRate, channels, bitsPerSample) * 1000,
      speechWindows: session.speechWindows,
      vadFailures: session.vadFailures
    }
  }

  /**
   * Frame-arrival handler, called from the device's data callback
   */
  private handleFrame(session: CaptureSession, frame: Buffer): void {
    const options = this.options
    if (!session.active || session.autoStopped || !options || this.session !== session) {
      return
    }

    const now = this.config.clock()
    session.accumulatedFrames.push(frame)

    if (options.onFrame) {
      try {
        options.onFrame(frame)
      } catch (error) {
        console.error('Error in onFrame callback:', error)
      }
    }

    this.runVad(session, frame, now)
    this.checkAutoStop(session, options, now)
  }

  private runVad(session: CaptureSession, frame: Buffer, now: number): void {
    let pending = session.vadResidual.length > 0
      ? Buffer.concat([session.vadResidual, frame])
      : frame

    while (pending.length >= this.windowBytes) {
      const window = pending.subarray(0, this.windowBytes)
      pending = pending.subarray(this.windowBytes)

      let speech = false
      try {
        speech = this.config.vad.isSpeech(window, this.config.format.sampleRate)
      } catch (error) {
        // A failed window counts as silence
        session.vadFailures++
        if (this.config.verbose) {
          console.warn('VAD failed on window:', error instanceof Error ? error.message : error)
        }
      }

      if (speech) {
        session.speechWindows++
        session.lastVoiceAt = now
      }
    }

    session.vadResidual = Buffer.from(pending)
  }

  private checkAutoStop(session: CaptureSession, options: CaptureOptions, now: number): void {
    let reason: AutoStopReason | null = null

    if (options.maxDurationMs > 0 && now - session.startedAt >= options.maxDurationMs) {
      reason = 'timeout'
    } else if (options.silenceTimeoutMs > 0 && now - session.lastVoiceAt >= options.silenceTimeoutMs) {
      reason = 'silence'
    }

    if (!reason) {
      return
    }

    session.autoStopped = true
    if (this.config.verbose) {
      console.log(`Auto-stop: ${reason} after ${now - session.startedAt}ms`)
    }

    if (options.onAutoStop) {
      try {
        options.onAutoStop(reason)
      } catch (error) {
        console.error('Error in onAutoStop callback:', error)
      }
    }
  }

  /**
   * The device died mid-capture: stop taking frames and release it once.
   * The session is kept so stop() still returns what was recorded.
   */
  private handleDeviceError(session: CaptureSession, error: Error): void {
    if (!session.active || session.deviceFailed) {
      return
    }

    console.error('Input device error:', error.message)
    session.active = false
    session.deviceFailed = true
    this.device.close().catch((closeError: unknown) => {
      console.error('Error closing input device:', closeError)
    })

    const onDeviceError = this.options?.onDeviceError
    if (onDeviceError) {
      try {
        onDeviceError(error)
      } catch (callbackError) {
        console.error('Error in onDeviceError callback:', callbackError)
      }
    }
  }
}
