/**
 * Raw PCM audio format
 */
export interface AudioFormat {
  /** Sample rate in Hz */
  sampleRate: number
  /** Number of channels */
  channels: number
  /** Bits per sample */
  bitsPerSample: number
}

/**
 * One block of 16-bit signed little-endian PCM as delivered by the input device.
 * Treated as immutable once produced.
 */
export type AudioFrame = Buffer

/**
 * Why capture ended on its own
 */
export type AutoStopReason = 'timeout' | 'silence'

/**
 * Mutable state of one capture, created on start() and discarded on stop()
 */
export interface CaptureSession {
  active: boolean
  /** Clock reading (ms) when capture started */
  startedAt: number
  /** Clock reading (ms) of the most recent speech window, startedAt until speech is heard */
  lastVoiceAt: number
  accumulatedFrames: AudioFrame[]
  /** Bytes waiting for enough samples to fill one VAD window */
  vadResidual: Buffer
  /** Set once onAutoStop has fired; later frames are ignored */
  autoStopped: boolean
  speechWindows: number
  vadFailures: number
  /** Set when the device died after opening; it has already been closed */
  deviceFailed: boolean
}

/**
 * Lifecycle of a streaming recognition session
 */
export type SessionState =
  | 'idle'
  | 'connecting'
  | 'streaming'
  | 'stopping'
  | 'finalized'
  | 'failed'

/**
 * Settled outcome of one dictation
 */
export interface DictationResult {
  /** Text reported by the recognizer (final, or last partial when no final arrived) */
  recognizedText: string
  /** Text after post-processing; equal to recognizedText when none ran or it failed */
  text: string
  /** True when the recognizer never produced a final result */
  fromPartial: boolean
  /** Length of captured audio in milliseconds */
  audioDurationMs: number
}
