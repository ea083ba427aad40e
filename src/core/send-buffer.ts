/**
 * Send buffer configuration
 */
export interface SendBufferOptions {
  /** Hard ceiling in bytes */
  capacity: number
  /** Fraction of capacity that triggers the one-time warning (default: 0.8, 0 disables) */
  warningRatio?: number
  /** Fired once, the first time the buffer crosses warningRatio */
  onWarning?: (length: number, capacity: number) => void
  /** Fired once, the first time old bytes are discarded */
  onOverflow?: (droppedBytes: number) => void
}

/**
 * Bounded FIFO of audio bytes between the capture callback and the sender loop.
 * Writes never block: when the ceiling would be exceeded the oldest bytes go first.
 * Every operation is synchronous, so a write and a read never interleave.
 */
export class SendBuffer {
  private chunks: Buffer[] = []
  /** Read offset into chunks[0] */
  private head: number = 0
  private size: number = 0
  private droppedBytes: number = 0
  private warned: boolean = false
  private overflowed: boolean = false
  private readonly options: Required<SendBufferOptions>

  constructor(options: SendBufferOptions) {
    if (!Number.isInteger(options.capacity) || options.capacity <= 0) {
      throw new RangeError(`Send buffer capacity must be a positive integer: ${options.capacity}`)
    }

    this.options = {
      warningRatio: 0.8,
      onWarning: () => {},
      onOverflow: () => {},
      ...options
    }
  }

  get length(): number {
    return this.size
  }

  get capacity(): number {
    return this.options.capacity
  }

  /** Total bytes discarded since construction or the last reset() */
  get dropped(): number {
    return this.droppedBytes
  }

  /**
   * Append bytes, discarding the oldest ones when over capacity
   * @returns Number of bytes discarded by this write
   */
  write(data: Buffer): number {
    if (data.length === 0) {
      return 0
    }

    const capacity = this.options.capacity
    let incoming = data
    let discarded = 0

    if (incoming.length >= capacity) {
      discarded += this.size + (incoming.length - capacity)
      this.clear()
      incoming = incoming.subarray(incoming.length - capacity)
    } else {
      const excess = this.size + incoming.length - capacity
      if (excess > 0) {
        this.discard(excess)
        discarded += excess
      }
    }

    this.chunks.push(incoming)
    this.size += incoming.length

    if (discarded > 0) {
      this.droppedBytes += discarded
      if (!this.overflowed) {
        this.overflowed = true
        this.options.onOverflow(discarded)
      }
    }

    const ratio = this.options.warningRatio
    if (!this.warned && ratio > 0 && this.size >= capacity * ratio) {
      this.warned = true
      this.options.onWarning(this.size, capacity)
    }

    return discarded
  }

  /**
   * Remove exactly `size` bytes from the front
   * @returns The bytes, or null when fewer than `size` are buffered
   */
  read(size: number): Buffer | null {
    if (size <= 0 || this.size < size) {
      return null
    }
    return this.take(size)
  }

  /**
   * Remove and return everything buffered
   */
  drain(): Buffer {
    return this.take(this.size)
  }

  /**
   * Empty the buffer and re-arm the one-time notifications
   */
  reset(): void {
    this.clear()
    this.droppedBytes = 0
    this.warned = false
    this.overflowed = false
  }

  private clear(): void {
    this.chunks = []
    this.head = 0
    this.size = 0
  }

  private take(size: number): Buffer {
    const out = Buffer.alloc(size)
    let written = 0

    while (written < size) {
      const chunk = this.chunks[0]
      const available = chunk.length - this.head
      const count = Math.min(available, size - written)

      chunk.copy(out, written, this.head, this.head + count)
      written += count
      this.consume(count)
    }

    return out
  }

  private discard(size: number): void {
    let remaining = size
    while (remaining > 0) {
      const available = this.chunks[0].length - this.head
      const count = Math.min(available, remaining)
      this.consume(count)
      remaining -= count
    }
  }

  private consume(count: number): void {
    this.head += count
    this.size -= count
    if (this.head >= this.chunks[0].length) {
      this.chunks.shift()
      this.head = 0
    }
  }
}
