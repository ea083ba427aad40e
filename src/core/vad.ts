import { VadFailure } from '../errors.js'
import { rmsDbfs } from './pcm.js'

/**
 * Classifies one fixed-length window of s16le mono PCM
 */
export interface VoiceActivityDetector {
  /**
   * @param window Exactly one window of PCM (10, 20 or 30 ms worth of samples)
   * @param sampleRate Sample rate in Hz
   * @throws VadFailure when the window cannot be classified
   */
  isSpeech(window: Buffer, sampleRate: number): boolean
}

export interface EnergyVadOptions {
  /** Level in dBFS at or above which a window counts as speech (default: -45) */
  thresholdDb?: number
}

const SUPPORTED_SAMPLE_RATES = [8000, 16000, 32000, 48000]
const SUPPORTED_WINDOW_MS = [10, 20, 30]

/**
 * Energy-threshold detector. Accepts the same window sizes as WebRTC VAD
 * so a drop-in replacement keeps working with AudioCapture's framing.
 */
export class EnergyVad implements VoiceActivityDetector {
  private readonly thresholdDb: number

  constructor(options: EnergyVadOptions = {}) {
    this.thresholdDb = options.thresholdDb ?? -45
  }

  isSpeech(window: Buffer, sampleRate: number): boolean {
    if (!SUPPORTED_SAMPLE_RATES.includes(sampleRate)) {
      throw new VadFailure(`Unsupported sample rate: ${sampleRate}`)
    }

    const windowMs = (window.length / 2 / sampleRate) * 1000
    if (!SUPPORTED_WINDOW_MS.includes(windowMs)) {
      throw new VadFailure(`Unsupported window length: ${window.length} bytes (${windowMs}ms)`)
    }

    return rmsDbfs(window) >= this.thresholdDb
  }
}
