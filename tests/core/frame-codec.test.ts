import { gzipSync } from 'node:zlib'
import { describe, it, expect } from 'vitest'
import {
  buildHeader,
  Compression,
  decodeRequest,
  decodeResponse,
  encodeAck,
  encodeAudioFrame,
  encodeErrorResponse,
  encodeRequest,
  encodeResponse,
  extractResultText,
  MessageFlags,
  MessageTypes,
  parseHeader,
  Serialization
} from '../../src/core/frame-codec.js'
import { DecodingError, EncodingError, MalformedFrame } from '../../src/errors.js'

function sized(header: Buffer, seq: number | null, body: Buffer): Buffer {
  const parts = [header]
  if (seq !== null) {
    const seqBytes = Buffer.alloc(4)
    seqBytes.writeInt32BE(seq, 0)
    parts.push(seqBytes)
  }
  const length = Buffer.alloc(4)
  length.writeUInt32BE(body.length, 0)
  parts.push(length, body)
  return Buffer.concat(parts)
}

describe('frame header', () => {
  it('packs version, size, type, flags, serialization and compression into 4 bytes', () => {
    const header = buildHeader(MessageTypes.FULL_REQUEST, MessageFlags.POS_SEQUENCE, Serialization.JSON, Compression.GZIP)
    expect([...header]).toEqual([0x11, 0x11, 0x11, 0x00])
  })

  it('parses the nibbles back', () => {
    expect(parseHeader(Buffer.from([0x11, 0x93, 0x10, 0x00]))).toEqual({
      version: 1,
      headerWords: 1,
      messageType: MessageTypes.FULL_RESPONSE,
      flags: MessageFlags.NEG_WITH_SEQUENCE,
      serialization: Serialization.JSON,
      compression: Compression.NONE
    })
  })

  it('rejects frames shorter than a header', () => {
    expect(() => parseHeader(Buffer.from([0x11, 0x11, 0x11]))).toThrow(MalformedFrame)
  })
})

describe('encodeRequest', () => {
  it('round-trips the JSON payload with its sequence number', () => {
    const payload = { user: { uid: 'u1' }, audio: { rate: 16000 }, request: { enable_punc: true } }
    const message = decodeRequest(encodeRequest(payload, 1))

    expect(message.type).toBe('full_request')
    expect(message.sequence).toBe(1)
    expect(message.terminal).toBe(false)
    if (message.type === 'full_request') {
      expect(message.payload).toEqual(payload)
    }
  })

  it('gzips the body after the sequence and length prefix', () => {
    const frame = encodeRequest({ a: 1 }, 1)
    expect([...frame.subarray(0, 4)]).toEqual([0x11, 0x11, 0x11, 0x00])
    expect(frame.readInt32BE(4)).toBe(1)
    expect(frame.readUInt32BE(8)).toBe(frame.length - 12)
    // gzip magic
    expect([frame[12], frame[13]]).toEqual([0x1f, 0x8b])
  })

  it('fails on payloads that cannot be serialized', () => {
    const cyclic: Record<string, unknown> = {}
    cyclic.self = cyclic

    expect(() => encodeRequest(cyclic, 1)).toThrow(EncodingError)
    expect(() => encodeRequest({ big: 10n }, 1)).toThrow(EncodingError)
    expect(() => encodeRequest(undefined, 1)).toThrow(EncodingError)
  })

  it('fails on sequence numbers outside int32', () => {
    expect(() => encodeRequest({}, 1.5)).toThrow(EncodingError)
    expect(() => encodeRequest({}, 0x80000000)).toThrow(EncodingError)
  })
})

describe('encodeAudioFrame', () => {
  it('sends a positive sequence without the terminal flag', () => {
    const pcm = Buffer.from([1, 2, 3, 4])
    const frame = encodeAudioFrame(pcm, 7)
    const message = decodeRequest(frame)

    expect([...frame.subarray(0, 4)]).toEqual([0x11, 0x21, 0x11, 0x00])
    expect(message.sequence).toBe(7)
    expect(message.terminal).toBe(false)
    if (message.type === 'audio_only') {
      expect(message.audio.equals(pcm)).toBe(true)
    }
  })

  it('fails when the negated sequence of the last frame leaves int32', () => {
    expect(() => encodeAudioFrame(Buffer.alloc(0), -0x80000000, true)).toThrow(EncodingError)
    expect(() => encodeResponse({}, -0x80000000, true)).toThrow(EncodingError)
    expect(decodeRequest(encodeAudioFrame(Buffer.alloc(0), -0x80000000)).sequence).toBe(-0x80000000)
  })

  it('marks the last frame with the negated sequence and terminal flag', () => {
    const frame = encodeAudioFrame(Buffer.alloc(0), 7, true)
    const message = decodeRequest(frame)

    expect([...frame.subarray(0, 4)]).toEqual([0x11, 0x23, 0x11, 0x00])
    expect(message.type).toBe('audio_only')
    expect(message.sequence).toBe(-7)
    expect(message.terminal).toBe(true)
    if (message.type === 'audio_only') {
      expect(message.audio.length).toBe(0)
    }
  })
})

describe('decodeResponse', () => {
  it('reads text from an object result', () => {
    const message = decodeResponse(encodeResponse({ result: { text: 'hello' } }, 3))

    expect(message.type).toBe('full_response')
    expect(message.sequence).toBe(3)
    expect(message.terminal).toBe(false)
    if (message.type === 'full_response') {
      expect(message.text).toBe('hello')
    }
  })

  it('concatenates text from a list result', () => {
    const message = decodeResponse(encodeResponse({ result: [{ text: 'hel' }, { text: 'lo' }, {}] }, 4))
    expect(message.type === 'full_response' && message.text).toBe('hello')
  })

  it('flags final results', () => {
    const message = decodeResponse(encodeResponse({ result: { text: 'done' } }, 9, true))
    expect(message.terminal).toBe(true)
    expect(message.sequence).toBe(-9)
  })

  it('treats a missing result as empty text', () => {
    const message = decodeResponse(encodeResponse({ audio_info: { duration: 10 } }, 2))
    expect(message.type === 'full_response' && message.text).toBe('')
  })

  it('decodes an empty JSON body as an empty object', () => {
    const header = buildHeader(MessageTypes.FULL_RESPONSE, MessageFlags.POS_SEQUENCE, Serialization.JSON, Compression.NONE)
    const message = decodeResponse(sized(header, 1, Buffer.alloc(0)))

    expect(message.type).toBe('full_response')
    if (message.type === 'full_response') {
      expect(message.payload).toEqual({})
      expect(message.text).toBe('')
    }
  })

  it('decodes error frames with their code and message', () => {
    const message = decodeResponse(encodeErrorResponse(45000081, { message: 'quota exceeded' }))

    expect(message.type).toBe('error')
    expect(message.sequence).toBeNull()
    if (message.type === 'error') {
      expect(message.code).toBe(45000081)
      expect(message.detail).toEqual({ message: 'quota exceeded' })
      expect(message.message).toBe('ASR error 45000081: quota exceeded')
    }
  })

  it('decodes acknowledgements', () => {
    const message = decodeResponse(encodeAck(5))
    expect(message.type).toBe('ack')
    expect(message.sequence).toBe(5)
  })

  it('honours a header longer than one word', () => {
    const body = Buffer.from(JSON.stringify({ result: { text: 'ext' } }), 'utf8')
    const header = Buffer.from([0x12, 0x91, 0x10, 0x00, 0xaa, 0xbb, 0xcc, 0xdd])
    const message = decodeResponse(sized(header, 6, body))

    expect(message.header.headerWords).toBe(2)
    expect(message.sequence).toBe(6)
    expect(message.type === 'full_response' && message.text).toBe('ext')
  })

  it('returns unknown for unrecognised message types', () => {
    const header = buildHeader(0b0101, MessageFlags.NO_SEQUENCE, Serialization.NONE, Compression.NONE)
    expect(decodeResponse(header).type).toBe('unknown')
  })

  it('rejects a declared length past the end of the frame', () => {
    const frame = encodeResponse({ result: { text: 'hello' } }, 1)
    expect(() => decodeResponse(frame.subarray(0, frame.length - 1))).toThrow(MalformedFrame)
  })

  it('rejects a header size past the end of the frame', () => {
    expect(() => decodeResponse(Buffer.from([0x13, 0x90, 0x10, 0x00, 0, 0, 0, 0]))).toThrow(MalformedFrame)
  })

  it('rejects a missing sequence number', () => {
    const header = buildHeader(MessageTypes.FULL_RESPONSE, MessageFlags.POS_SEQUENCE, Serialization.JSON, Compression.GZIP)
    expect(() => decodeResponse(Buffer.concat([header, Buffer.from([0, 0])]))).toThrow(MalformedFrame)
  })

  it('rejects a body that is not gzip', () => {
    const header = buildHeader(MessageTypes.FULL_RESPONSE, MessageFlags.POS_SEQUENCE, Serialization.JSON, Compression.GZIP)
    expect(() => decodeResponse(sized(header, 1, Buffer.from('not gzip')))).toThrow(DecodingError)
  })

  it('rejects a body that is not JSON', () => {
    const header = buildHeader(MessageTypes.FULL_RESPONSE, MessageFlags.POS_SEQUENCE, Serialization.JSON, Compression.GZIP)
    expect(() => decodeResponse(sized(header, 1, gzipSync(Buffer.from('{oops'))))).toThrow(DecodingError)
  })
})

describe('decodeRequest', () => {
  it('rejects server frames', () => {
    expect(() => decodeRequest(encodeAck(1))).toThrow(MalformedFrame)
  })
})

describe('extractResultText', () => {
  it('ignores payloads without a usable result', () => {
    expect(extractResultText(null)).toBe('')
    expect(extractResultText({ result: 'text' })).toBe('')
    expect(extractResultText({ result: { text: 42 } })).toBe('')
  })
})
