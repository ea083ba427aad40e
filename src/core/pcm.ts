import type { AudioFormat } from '../types/index.js'

/**
 * 16 kHz, mono, 16-bit: the only format the recognizer accepts
 */
export const DEFAULT_AUDIO_FORMAT: AudioFormat = {
  sampleRate: 16000,
  channels: 1,
  bitsPerSample: 16
}

/**
 * Number of PCM bytes covering a duration
 * @param durationMs Duration in milliseconds
 * @param format Audio format
 * @returns Byte count, rounded down to a whole sample frame
 */
export function bytesForDuration(durationMs: number, format: AudioFormat = DEFAULT_AUDIO_FORMAT): number {
  const frameBytes = (format.bitsPerSample / 8) * format.channels
  const frames = Math.floor((format.sampleRate * durationMs) / 1000)
  return frames * frameBytes
}

/**
 * Calculate audio duration from PCM data
 * @param dataSize Size of PCM data in bytes
 * @param sampleRate Sample rate in Hz
 * @param channels Number of channels
 * @param bitsPerSample Bits per sample
 * @returns Duration in seconds
 */
export function calculateDuration(
  dataSize: number,
  sampleRate: number,
  channels: number,
  bitsPerSample: number
): number {
  const bytesPerSample = (bitsPerSample / 8) * channels
  const totalSamples = dataSize / bytesPerSample
  return totalSamples / sampleRate
}

/**
 * Root-mean-square level of s16le samples in dBFS.
 * Digital silence returns -Infinity.
 */
export function rmsDbfs(pcm: Buffer): number {
  const samples = Math.floor(pcm.length / 2)
  if (samples === 0) {
    return -Infinity
  }

  let sumSquares = 0
  for (let i = 0; i < samples; i++) {
    const sample = pcm.readInt16LE(i * 2) / 32768
    sumSquares += sample * sample
  }

  const rms = Math.sqrt(sumSquares / samples)
  return rms === 0 ? -Infinity : 20 * Math.log10(rms)
}
