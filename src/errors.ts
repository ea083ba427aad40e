/**
 * Base class for every error raised by the dictation pipeline
 */
export class DictationError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message)
    this.name = 'DictationError'
  }
}

/**
 * Microphone input stream could not be opened
 */
export class DeviceError extends DictationError {
  constructor(message: string, cause?: unknown) {
    super(message, cause)
    this.name = 'DeviceError'
  }
}

/**
 * Payload could not be serialized into a wire frame
 */
export class EncodingError extends DictationError {
  constructor(message: string, cause?: unknown) {
    super(message, cause)
    this.name = 'EncodingError'
  }
}

/**
 * Frame is truncated or declares lengths beyond its own size
 */
export class MalformedFrame extends DictationError {
  constructor(message: string) {
    super(message)
    this.name = 'MalformedFrame'
  }
}

/**
 * Frame payload failed to decompress or parse
 */
export class DecodingError extends DictationError {
  constructor(message: string, cause?: unknown) {
    super(message, cause)
    this.name = 'DecodingError'
  }
}

/**
 * Connect, send or receive failure on the ASR connection
 */
export class TransportError extends DictationError {
  constructor(message: string, cause?: unknown) {
    super(message, cause)
    this.name = 'TransportError'
  }
}

/**
 * Send buffer reached its ceiling; oldest audio was or will be dropped
 */
export class BufferOverflow extends DictationError {
  constructor(message: string, public readonly droppedBytes: number) {
    super(message)
    this.name = 'BufferOverflow'
  }
}

/**
 * Voice-activity detector rejected a window
 */
export class VadFailure extends DictationError {
  constructor(message: string, cause?: unknown) {
    super(message, cause)
    this.name = 'VadFailure'
  }
}

export class ConfigError extends DictationError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message)
    this.name = 'ConfigError'
  }
}

/**
 * Where in the session lifecycle an error was observed
 */
export type RecognitionErrorKind =
  | 'connect'
  | 'handshake'
  | 'send'
  | 'decode'
  | 'closed'
  | 'server'
  | 'overflow_warning'
  | 'overflow_truncated'

/**
 * Error reported through a session's onError callback
 */
export class RecognitionError extends DictationError {
  constructor(
    message: string,
    public readonly kind: RecognitionErrorKind,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'RecognitionError'
  }

  /**
   * Overflow reports are informational; streaming continues after them
   */
  get fatal(): boolean {
    return this.kind !== 'overflow_warning' && this.kind !== 'overflow_truncated'
  }
}
