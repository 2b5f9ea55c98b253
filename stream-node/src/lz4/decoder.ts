/**
 * Decompression state for one stream direction: the context, the pending
 * input buffer, and the inbound byte counters.
 *
 * @module
 */
import type { CodecEngine, DecompressionContext } from '@lz4-stream/engine'
import type { Logger } from 'pino'
import { Lz4DecodeError } from '../errors.js'
import type { ByteSource } from '../io/types.js'
import { ContextHandle } from './context-handle.js'
import { compressionRatio } from './ratio.js'

/** Capacity of the pending-input buffer. */
export const PENDING_INPUT_SIZE = 64 * 1024

export class FrameDecoder {
  private readonly context: ContextHandle<DecompressionContext>
  private readonly buffer = new Uint8Array(PENDING_INPUT_SIZE)
  /** Bytes read from the source that the engine has not consumed yet. */
  private pending: Uint8Array = this.buffer.subarray(0, 0)
  private sourceDrained = false

  compressedBytes = 0
  uncompressedBytes = 0

  constructor(
    private readonly engine: CodecEngine,
    private readonly source: ByteSource,
    logger: Logger
  ) {
    this.context = new ContextHandle(engine.createDecompressionContext(), 'decompression', logger)
  }

  /**
   * True once the source has reported end of input and every byte read
   * from it has been handed to the engine.
   */
  get exhausted(): boolean {
    return this.sourceDrained && this.pending.length === 0
  }

  get compressionRatio(): number {
    return compressionRatio(this.uncompressedBytes, this.compressedBytes)
  }

  get released(): boolean {
    return this.context.released
  }

  /**
   * Decompress into `dest` until it is full, a frame ends, or the source
   * runs dry.
   *
   * @returns Bytes written to `dest`
   * @throws Lz4DecodeError when the engine rejects the input
   */
  async read(dest: Uint8Array): Promise<number> {
    const ctx = this.context.get()
    if (dest.length === 0) return 0

    let produced = 0
    // Input bytes the engine asked for last time; 0 before the first call
    let hint = 0

    for (;;) {
      const available = hint === 0 ? this.pending.length : Math.min(hint, this.pending.length)
      const result = ctx.decompress(dest.subarray(produced), this.pending.subarray(0, available))
      if (this.engine.isError(result.code)) {
        throw new Lz4DecodeError(result.code, this.engine.errorName(result.code))
      }

      hint = result.code
      this.pending = this.pending.subarray(result.consumed)
      produced += result.produced

      if (produced === dest.length) break
      if (hint === 0) break
      await this.refill()
      if (this.pending.length === 0) break
    }

    this.uncompressedBytes += produced
    return produced
  }

  /** Drop pending input, zero the counters and reset the context. */
  reset(): void {
    this.context.reset()
    this.pending = this.buffer.subarray(0, 0)
    this.sourceDrained = false
    this.compressedBytes = 0
    this.uncompressedBytes = 0
  }

  release(): void {
    this.context.release()
  }

  /** Read more input, but never over bytes the engine still has to see. */
  private async refill(): Promise<void> {
    if (this.pending.length > 0) return
    const n = await this.source.read(this.buffer)
    this.compressedBytes += n
    this.sourceDrained = n === 0
    this.pending = this.buffer.subarray(0, n)
  }
}
