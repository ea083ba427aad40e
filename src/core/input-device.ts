import { spawn, type ChildProcess } from 'node:child_process'
import { DeviceError } from '../errors.js'
import type { AudioFormat } from '../types/index.js'
import { DEFAULT_AUDIO_FORMAT } from './pcm.js'

/**
 * Microphone abstraction. onData is invoked for every block the driver delivers
 * and must not block.
 */
export interface AudioInputDevice {
  /**
   * Open the input stream
   * @throws DeviceError when the stream cannot be opened
   */
  open(onData: (frame: Buffer) => void, onError: (error: Error) => void): Promise<void>
  /** Close the input stream; safe to call when not open */
  close(): Promise<void>
}

/**
 * Configuration for the ffmpeg capture device
 */
export interface FfmpegInputConfig {
  /** Path to ffmpeg binary (defaults to 'ffmpeg' in PATH) */
  ffmpegPath?: string
  /** Input format (defaults per platform: avfoundation, dshow or pulse) */
  inputFormat?: string
  /** Input device name (defaults per platform) */
  inputDevice?: string
  /** Time to wait for the first audio block before giving up (default: 3s) */
  openTimeoutMs?: number
  /** Enable verbose logging */
  verbose?: boolean
}

function platformInput(): { inputFormat: string; inputDevice: string } {
  switch (process.platform) {
    case 'darwin':
      return { inputFormat: 'avfoundation', inputDevice: ':0' }
    case 'win32':
      return { inputFormat: 'dshow', inputDevice: 'audio=default' }
    default:
      return { inputFormat: 'pulse', inputDevice: 'default' }
  }
}

/**
 * Captures the default microphone by streaming raw s16le PCM from ffmpeg's stdout
 */
export class FfmpegInputDevice implements AudioInputDevice {
  private process: ChildProcess | null = null
  private config: Required<FfmpegInputConfig>
  private format: AudioFormat

  constructor(config: FfmpegInputConfig = {}, format: AudioFormat = DEFAULT_AUDIO_FORMAT) {
    this.config = {
      ffmpegPath: 'ffmpeg',
      openTimeoutMs: 3000,
      verbose: false,
      ...platformInput(),
      ...config
    }
    this.format = format
  }

  async open(onData: (frame: Buffer) => void, onError: (error: Error) => void): Promise<void> {
    if (this.process) {
      throw new DeviceError('Input device already open')
    }

    const args = [
      '-hide_banner',
      '-loglevel', 'error',
      '-f', this.config.inputFormat,
      '-i', this.config.inputDevice,
      '-ar', this.format.sampleRate.toString(),
      '-ac', this.format.channels.toString(),
      '-f', 's16le',
      '-acodec', 'pcm_s16le',
      'pipe:1'
    ]

    if (this.config.verbose) {
      console.log('Starting ffmpeg with args:', args)
    }

    const child = spawn(this.config.ffmpegPath, args, { stdio: ['ignore', 'pipe', 'pipe'] })
    this.process = child

    await new Promise<void>((resolve, reject) => {
      let settled = false
      const settle = (error?: Error) => {
        if (settled) return
        settled = true
        clearTimeout(timer)
        if (error) {
          this.process = null
          child.kill('SIGKILL')
          reject(error)
        } else {
          resolve()
        }
      }

      const timer = setTimeout(() => {
        settle(new DeviceError(`No audio from input device within ${this.config.openTimeoutMs}ms`))
      }, this.config.openTimeoutMs)

      child.once('error', (error) => {
        settle(new DeviceError(`Failed to start ffmpeg: ${error.message}`, error))
      })

      child.once('exit', (code) => {
        if (!settled) {
          settle(new DeviceError(`ffmpeg exited before audio arrived (code ${code})`))
        } else if (this.process === child) {
          this.process = null
          onError(new DeviceError(`ffmpeg exited unexpectedly (code ${code})`))
        }
      })

      child.stderr?.on('data', (data: Buffer) => {
        if (this.config.verbose) {
          console.error('ffmpeg stderr:', data.toString())
        }
      })

      child.stdout?.on('data', (data: Buffer) => {
        settle()
        onData(data)
      })
    })
  }

  async close(): Promise<void> {
    const child = this.process
    if (!child) {
      return
    }
    this.process = null
    if (child.exitCode !== null || child.signalCode !== null) {
      return
    }

    await new Promise<void>((resolve) => {
      const timeout = setTimeout(() => {
        child.kill('SIGKILL')
        resolve()
      }, 2000)

      child.once('exit', () => {
        clearTimeout(timeout)
        resolve()
      })

      // ffmpeg flushes and exits on SIGINT
      child.kill('SIGINT')
    })
  }
}
