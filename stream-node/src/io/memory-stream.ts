/**
 * In-memory byte transport.
 *
 * One position is shared by reads and writes, like a file opened for both:
 * writes overwrite from the current position and grow the buffer as needed.
 *
 * @module
 */
import { StreamClosedError } from '../errors.js'
import type { ByteTransport } from './types.js'

const INITIAL_CAPACITY = 1024

export class MemoryStream implements ByteTransport {
  private buffer: Uint8Array
  private size: number
  private position = 0
  private closed = false

  /**
   * @param initial - Initial contents (copied); reading starts at its first byte
   */
  constructor(initial?: Uint8Array) {
    this.buffer = new Uint8Array(Math.max(INITIAL_CAPACITY, initial?.length ?? 0))
    this.size = 0
    if (initial !== undefined) {
      this.buffer.set(initial)
      this.size = initial.length
    }
  }

  /** Bytes stored. */
  get length(): number {
    return this.size
  }

  get isClosed(): boolean {
    return this.closed
  }

  async read(into: Uint8Array): Promise<number> {
    this.checkOpen()
    const n = Math.min(into.length, this.size - this.position)
    if (n <= 0) return 0
    into.set(this.buffer.subarray(this.position, this.position + n))
    this.position += n
    return n
  }

  async write(data: Uint8Array): Promise<void> {
    this.checkOpen()
    const end = this.position + data.length
    this.ensureCapacity(end)
    this.buffer.set(data, this.position)
    this.position = end
    this.size = Math.max(this.size, end)
  }

  async flush(): Promise<void> {
    this.checkOpen()
  }

  async rewind(): Promise<void> {
    this.checkOpen()
    this.position = 0
  }

  async close(): Promise<void> {
    this.closed = true
  }

  /**
   * Copy of the stored bytes. Available after close.
   */
  toUint8Array(): Uint8Array {
    return this.buffer.slice(0, this.size)
  }

  private ensureCapacity(required: number): void {
    if (required <= this.buffer.length) return
    let capacity = this.buffer.length * 2
    while (capacity < required) capacity *= 2
    const grown = new Uint8Array(capacity)
    grown.set(this.buffer.subarray(0, this.size))
    this.buffer = grown
  }

  private checkOpen(): void {
    if (this.closed) throw new StreamClosedError('closed')
  }
}
