import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { AudioCapture, type CaptureOptions } from '../../src/core/audio-capture.js'
import type { VoiceActivityDetector } from '../../src/core/vad.js'
import { DeviceError, VadFailure } from '../../src/errors.js'
import type { AutoStopReason } from '../../src/types/index.js'
import { FakeInputDevice, silence, speech, WINDOW_BYTES } from '../helpers/fakes.js'

describe('AudioCapture', () => {
  let device: FakeInputDevice
  let now: number
  let capture: AudioCapture
  let reasons: AutoStopReason[]

  function options(overrides: Partial<CaptureOptions> = {}): CaptureOptions {
    return {
      maxDurationMs: 60_000,
      silenceTimeoutMs: 3_000,
      onAutoStop: (reason) => reasons.push(reason),
      ...overrides
    }
  }

  function emitAt(time: number, frame: Buffer): void {
    now = time
    device.emit(frame)
  }

  beforeEach(() => {
    device = new FakeInputDevice()
    now = 0
    reasons = []
    capture = new AudioCapture(device, { clock: () => now })
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('returns every frame recorded since start', async () => {
    await capture.start(options())
    expect(capture.isRecording()).toBe(true)

    const a = speech()
    const b = Buffer.from([1, 2, 3, 4])
    emitAt(30, a)
    emitAt(60, b)

    const audio = await capture.stop()
    expect(audio.equals(Buffer.concat([a, b]))).toBe(true)
    expect(capture.isRecording()).toBe(false)
    expect(device.closeCalls).toBe(1)
  })

  it('returns an empty buffer when stopped twice or never started', async () => {
    expect((await capture.stop()).length).toBe(0)

    await capture.start(options())
    emitAt(30, speech())
    expect((await capture.stop()).length).toBe(WINDOW_BYTES)
    expect((await capture.stop()).length).toBe(0)
    expect(device.closeCalls).toBe(1)
  })

  it('forwards frames to onFrame as they arrive', async () => {
    const onFrame = vi.fn()
    await capture.start(options({ onFrame }))

    const frame = speech()
    emitAt(30, frame)
    expect(onFrame).toHaveBeenCalledWith(frame)
  })

  it('ignores a second start while active', async () => {
    await capture.start(options())
    await capture.start(options())
    expect(device.openCalls).toBe(1)
  })

  it('drops frames that arrive after stop', async () => {
    const onFrame = vi.fn()
    await capture.start(options({ onFrame }))
    emitAt(30, speech())

    const audio = await capture.stop()
    device.lastOnData?.(speech())

    expect(audio.length).toBe(WINDOW_BYTES)
    expect(onFrame).toHaveBeenCalledTimes(1)
  })

  it('fires silence once after the timeout with no speech', async () => {
    await capture.start(options())

    for (let t = 30; t < 3000; t += 30) {
      emitAt(t, silence())
    }
    expect(reasons).toEqual([])

    emitAt(3000, silence())
    emitAt(3030, silence())
    emitAt(3060, speech())
    expect(reasons).toEqual(['silence'])
  })

  it('does not fire when speech starts just before the silence timeout', async () => {
    await capture.start(options())

    emitAt(1000, silence())
    emitAt(2000, silence())
    emitAt(2999, silence())
    for (let t = 3001; t <= 5000; t += 30) {
      emitAt(t, speech())
    }

    expect(reasons).toEqual([])
  })

  it('fires when the silence runs just past the timeout', async () => {
    await capture.start(options())

    emitAt(1000, silence())
    emitAt(2000, silence())
    emitAt(3001, silence())
    emitAt(3031, speech())

    expect(reasons).toEqual(['silence'])
  })

  it('measures silence from the last speech window', async () => {
    await capture.start(options({ silenceTimeoutMs: 500 }))

    emitAt(100, speech())
    emitAt(599, silence())
    expect(reasons).toEqual([])

    emitAt(600, silence())
    expect(reasons).toEqual(['silence'])
  })

  it('fires timeout once during continuous speech', async () => {
    await capture.start(options({ maxDurationMs: 1000 }))

    for (let t = 30; t <= 1500; t += 30) {
      emitAt(t, speech())
    }
    expect(reasons).toEqual(['timeout'])
  })

  it('prefers timeout when both limits are reached on the same frame', async () => {
    await capture.start(options({ maxDurationMs: 3000, silenceTimeoutMs: 3000 }))
    emitAt(3000, silence())
    expect(reasons).toEqual(['timeout'])
  })

  it('does not fire timeout after silence already stopped the capture', async () => {
    await capture.start(options({ maxDurationMs: 1000, silenceTimeoutMs: 500 }))

    for (let t = 30; t <= 1200; t += 30) {
      emitAt(t, silence())
    }
    expect(reasons).toEqual(['silence'])
  })

  it('treats a zero limit as disabled', async () => {
    await capture.start(options({ maxDurationMs: 0, silenceTimeoutMs: 0 }))

    for (let t = 1000; t <= 100_000; t += 1000) {
      emitAt(t, silence())
    }
    expect(reasons).toEqual([])
  })

  it('classifies fixed windows and carries the remainder to the next frame', async () => {
    const windows: number[] = []
    const vad: VoiceActivityDetector = {
      isSpeech: (window) => {
        windows.push(window.length)
        return false
      }
    }
    capture = new AudioCapture(device, { clock: () => now, vad })
    await capture.start(options())

    for (let i = 0; i < 4; i++) {
      emitAt(10 * i, silence(500))
    }

    expect(windows).toEqual([WINDOW_BYTES, WINDOW_BYTES])
  })

  it('counts failed VAD windows as silence and keeps recording', async () => {
    const vad: VoiceActivityDetector = {
      isSpeech: () => {
        throw new VadFailure('broken')
      }
    }
    capture = new AudioCapture(device, { clock: () => now, vad })
    await capture.start(options({ silenceTimeoutMs: 90 }))

    emitAt(30, speech())
    emitAt(60, speech())
    expect(capture.getStats()).toMatchObject({ active: true, speechWindows: 0, vadFailures: 2 })

    emitAt(90, speech())
    expect(reasons).toEqual(['silence'])
    expect((await capture.stop()).length).toBe(3 * WINDOW_BYTES)
  })

  it('reports recorded duration in stats', async () => {
    await capture.start(options())
    emitAt(30, speech())
    emitAt(60, speech())

    const stats = capture.getStats()
    expect(stats).toMatchObject({ active: true, speechWindows: 2, vadFailures: 0 })
    expect(stats.recordedMs).toBeCloseTo(60)
  })

  it('throws DeviceError and keeps no state when the device fails to open', async () => {
    device.failOpen = new Error('no microphone')

    await expect(capture.start(options())).rejects.toBeInstanceOf(DeviceError)
    expect(capture.isRecording()).toBe(false)
    expect((await capture.stop()).length).toBe(0)

    await capture.start(options())
    expect(capture.isRecording()).toBe(true)
    expect(device.openCalls).toBe(2)
  })

  it('passes DeviceError from the device through unchanged', async () => {
    const error = new DeviceError('permission denied')
    device.failOpen = error
    await expect(capture.start(options())).rejects.toBe(error)
  })

  it('stops taking frames and releases the device when it fails mid-capture', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    const onDeviceError = vi.fn()
    await capture.start(options({ onDeviceError, maxDurationMs: 1_000 }))
    const recorded = speech()
    emitAt(30, recorded)

    const error = new Error('device unplugged')
    device.fail(error)
    device.fail(new Error('second report'))

    expect(capture.isRecording()).toBe(false)
    expect(onDeviceError).toHaveBeenCalledTimes(1)
    expect(onDeviceError).toHaveBeenCalledWith(error)
    expect(device.closeCalls).toBe(1)

    now = 100_000
    device.lastOnData?.(speech())
    expect(reasons).toEqual([])

    const audio = await capture.stop()
    expect(audio.equals(recorded)).toBe(true)
    expect(device.closeCalls).toBe(1)

    await capture.start(options())
    expect(capture.isRecording()).toBe(true)
  })
})
