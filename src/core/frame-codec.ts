import { gzipSync, gunzipSync } from 'node:zlib'
import { DecodingError, EncodingError, MalformedFrame } from '../errors.js'

export const PROTOCOL_VERSION = 0b0001
/** Header length in 4-byte words */
export const DEFAULT_HEADER_WORDS = 0b0001

export const MessageTypes = {
  FULL_REQUEST: 0b0001,
  AUDIO_ONLY: 0b0010,
  FULL_RESPONSE: 0b1001,
  ACK: 0b1011,
  ERROR: 0b1111
} as const

export const MessageFlags = {
  NO_SEQUENCE: 0b0000,
  POS_SEQUENCE: 0b0001,
  NEG_SEQUENCE: 0b0010,
  NEG_WITH_SEQUENCE: 0b0011
} as const

export const Serialization = {
  NONE: 0b0000,
  JSON: 0b0001
} as const

export const Compression = {
  NONE: 0b0000,
  GZIP: 0b0001
} as const

const FLAG_SEQUENCE = 0b0001
const FLAG_TERMINAL = 0b0010
const INT32_MIN = -0x80000000
const INT32_MAX = 0x7fffffff

/**
 * Decoded 4-byte frame header
 */
export interface FrameHeader {
  version: number
  /** Header length in 4-byte words; the payload starts at headerWords * 4 */
  headerWords: number
  messageType: number
  flags: number
  serialization: number
  compression: number
}

interface FrameBase {
  header: FrameHeader
  /** Signed sequence number, null when the frame carries none */
  sequence: number | null
  /** Terminal flag: last audio frame from the client, final result from the server */
  terminal: boolean
}

export type WireMessage =
  | (FrameBase & { type: 'full_request'; payload: unknown })
  | (FrameBase & { type: 'audio_only'; audio: Buffer })
  | (FrameBase & { type: 'full_response'; text: string; payload: unknown })
  | (FrameBase & { type: 'ack' })
  | (FrameBase & { type: 'error'; code: number; detail: unknown; message: string })
  | (FrameBase & { type: 'unknown' })

/**
 * Build the 4-byte protocol header
 */
export function buildHeader(
  messageType: number,
  flags: number,
  serialization: number,
  compression: number
): Buffer {
  const header = Buffer.alloc(4)
  header.writeUInt8((PROTOCOL_VERSION << 4) | DEFAULT_HEADER_WORDS, 0)
  header.writeUInt8(((messageType & 0x0f) << 4) | (flags & 0x0f), 1)
  header.writeUInt8(((serialization & 0x0f) << 4) | (compression & 0x0f), 2)
  header.writeUInt8(0x00, 3)
  return header
}

/**
 * Parse the fixed 4-byte header
 * @throws MalformedFrame when fewer than 4 bytes are present
 */
export function parseHeader(data: Buffer): FrameHeader {
  if (data.length < 4) {
    throw new MalformedFrame(`Frame too short: ${data.length} bytes`)
  }

  return {
    version: data[0] >> 4,
    headerWords: data[0] & 0x0f,
    messageType: data[1] >> 4,
    flags: data[1] & 0x0f,
    serialization: data[2] >> 4,
    compression: data[2] & 0x0f
  }
}

function assertSequence(seq: number): void {
  if (!Number.isInteger(seq) || seq < INT32_MIN || seq > INT32_MAX) {
    throw new EncodingError(`Sequence number is not a signed 32-bit integer: ${seq}`)
  }
}

function frame(header: Buffer, seq: number, body: Buffer): Buffer {
  const prefix = Buffer.alloc(8)
  prefix.writeInt32BE(seq, 0)
  prefix.writeUInt32BE(body.length, 4)
  return Buffer.concat([header, prefix, body])
}

/**
 * Encode a client full request (JSON, gzip-compressed)
 * @throws EncodingError when the payload cannot be serialized
 */
export function encodeRequest(payload: unknown, seq: number): Buffer {
  assertSequence(seq)

  let json: string | undefined
  try {
    json = JSON.stringify(payload)
  } catch (error) {
    throw new EncodingError('Request payload is not serializable', error)
  }
  if (json === undefined) {
    throw new EncodingError('Request payload serialized to nothing')
  }

  const header = buildHeader(
    MessageTypes.FULL_REQUEST,
    MessageFlags.POS_SEQUENCE,
    Serialization.JSON,
    Compression.GZIP
  )
  return frame(header, seq, gzipSync(Buffer.from(json, 'utf8')))
}

/**
 * Encode a client audio-only frame.
 * The last frame carries the negated sequence number and the terminal flag.
 */
export function encodeAudioFrame(pcm: Buffer, seq: number, isLast: boolean = false): Buffer {
  assertSequence(isLast ? -seq : seq)

  const flags = isLast ? MessageFlags.NEG_WITH_SEQUENCE : MessageFlags.POS_SEQUENCE
  const header = buildHeader(MessageTypes.AUDIO_ONLY, flags, Serialization.JSON, Compression.GZIP)
  return frame(header, isLast ? -seq : seq, gzipSync(pcm))
}

/**
 * Encode a server full response, as sent by the ASR service.
 * A final result carries the negated sequence number and the terminal flag.
 */
export function encodeResponse(payload: unknown, seq: number, isFinal: boolean = false): Buffer {
  assertSequence(isFinal ? -seq : seq)

  const json: string | undefined = JSON.stringify(payload)
  if (json === undefined) {
    throw new EncodingError('Response payload serialized to nothing')
  }

  const flags = isFinal ? MessageFlags.NEG_WITH_SEQUENCE : MessageFlags.POS_SEQUENCE
  const header = buildHeader(MessageTypes.FULL_RESPONSE, flags, Serialization.JSON, Compression.GZIP)
  return frame(header, isFinal ? -seq : seq, gzipSync(Buffer.from(json, 'utf8')))
}

/**
 * Encode a server error frame: int32 code, then the length-prefixed JSON detail
 */
export function encodeErrorResponse(code: number, detail: unknown): Buffer {
  assertSequence(code)

  const json: string | undefined = JSON.stringify(detail)
  const body = Buffer.from(json ?? '{}', 'utf8')
  const header = buildHeader(MessageTypes.ERROR, MessageFlags.NO_SEQUENCE, Serialization.JSON, Compression.NONE)
  const prefix = Buffer.alloc(8)
  prefix.writeInt32BE(code, 0)
  prefix.writeUInt32BE(body.length, 4)
  return Buffer.concat([header, prefix, body])
}

/**
 * Encode a server acknowledgement
 */
export function encodeAck(seq: number): Buffer {
  assertSequence(seq)

  const header = buildHeader(MessageTypes.ACK, MessageFlags.POS_SEQUENCE, Serialization.NONE, Compression.NONE)
  const prefix = Buffer.alloc(4)
  prefix.writeInt32BE(seq, 0)
  return Buffer.concat([header, prefix])
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function textOf(value: unknown): string {
  if (isRecord(value) && typeof value.text === 'string') {
    return value.text
  }
  return ''
}

/**
 * Pull transcript text out of a result payload.
 * Accepts {result: {text}} and the older {result: [{text}, ...]} shape.
 */
export function extractResultText(payload: unknown): string {
  if (!isRecord(payload)) {
    return ''
  }

  const result = payload.result
  if (Array.isArray(result)) {
    return result.map(textOf).join('')
  }
  return textOf(result)
}

function decompress(body: Buffer, compression: number): Buffer {
  if (compression === Compression.NONE) {
    return body
  }
  if (compression !== Compression.GZIP) {
    throw new DecodingError(`Unsupported compression kind: ${compression}`)
  }

  try {
    return gunzipSync(body)
  } catch (error) {
    throw new DecodingError('Failed to decompress payload', error)
  }
}

function deserialize(body: Buffer, serialization: number): unknown {
  if (serialization !== Serialization.JSON) {
    return body
  }
  if (body.length === 0) {
    return {}
  }

  try {
    return JSON.parse(body.toString('utf8'))
  } catch (error) {
    throw new DecodingError('Failed to parse JSON payload', error)
  }
}

/**
 * Read a uint32 length prefix at offset and return the bytes it covers
 */
function readSized(data: Buffer, offset: number): { body: Buffer; end: number } {
  if (offset + 4 > data.length) {
    throw new MalformedFrame(`Missing payload length at offset ${offset}`)
  }

  const size = data.readUInt32BE(offset)
  const start = offset + 4
  if (start + size > data.length) {
    throw new MalformedFrame(`Declared payload size ${size} exceeds frame (${data.length - start} bytes left)`)
  }

  return { body: data.subarray(start, start + size), end: start + size }
}

/**
 * Decode any frame of the protocol.
 * The header alone determines how the remainder is parsed.
 * @throws MalformedFrame on truncated frames or overrunning lengths
 * @throws DecodingError when decompression or JSON parsing fails
 */
export function decodeFrame(data: Buffer): WireMessage {
  const header = parseHeader(data)

  let offset = header.headerWords * 4
  if (offset < 4 || offset > data.length) {
    throw new MalformedFrame(`Header declares ${header.headerWords} words but frame has ${data.length} bytes`)
  }

  let sequence: number | null = null
  if (header.flags & FLAG_SEQUENCE) {
    if (offset + 4 > data.length) {
      throw new MalformedFrame('Sequence flag set but sequence number missing')
    }
    sequence = data.readInt32BE(offset)
    offset += 4
  }

  const base: FrameBase = {
    header,
    sequence,
    terminal: (header.flags & FLAG_TERMINAL) !== 0
  }

  switch (header.messageType) {
    case MessageTypes.FULL_REQUEST: {
      const { body } = readSized(data, offset)
      return {
        ...base,
        type: 'full_request',
        payload: deserialize(decompress(body, header.compression), header.serialization)
      }
    }

    case MessageTypes.AUDIO_ONLY: {
      const { body } = readSized(data, offset)
      return { ...base, type: 'audio_only', audio: decompress(body, header.compression) }
    }

    case MessageTypes.FULL_RESPONSE: {
      const { body } = readSized(data, offset)
      const payload = deserialize(decompress(body, header.compression), header.serialization)
      return { ...base, type: 'full_response', text: extractResultText(payload), payload }
    }

    case MessageTypes.ACK:
      return { ...base, type: 'ack' }

    case MessageTypes.ERROR: {
      if (offset + 4 > data.length) {
        throw new MalformedFrame('Error frame missing error code')
      }
      const code = data.readInt32BE(offset)
      const { body } = readSized(data, offset + 4)
      const detail = deserialize(decompress(body, header.compression), header.serialization)
      return { ...base, type: 'error', code, detail, message: describeError(code, detail) }
    }

    default:
      return { ...base, type: 'unknown' }
  }
}

function describeError(code: number, detail: unknown): string {
  if (isRecord(detail)) {
    const text = detail.message ?? detail.error ?? detail.msg
    if (typeof text === 'string') {
      return `ASR error ${code}: ${text}`
    }
  }
  if (Buffer.isBuffer(detail)) {
    return `ASR error ${code}: ${detail.toString('utf8')}`
  }
  return `ASR error ${code}: ${JSON.stringify(detail)}`
}

/**
 * Decode a frame sent by the ASR service
 */
export function decodeResponse(data: Buffer): WireMessage {
  return decodeFrame(data)
}

/**
 * Decode a frame sent by a client; used by in-process stand-in servers
 * @throws MalformedFrame when the frame is not a client message
 */
export function decodeRequest(data: Buffer): WireMessage {
  const message = decodeFrame(data)
  if (message.type !== 'full_request' && message.type !== 'audio_only') {
    throw new MalformedFrame(`Not a client frame: message type ${message.header.messageType}`)
  }
  return message
}
