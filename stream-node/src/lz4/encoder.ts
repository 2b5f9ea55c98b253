/**
 * Compression state for one stream direction: the context, the scratch
 * output buffer, the frame lifecycle flag and the outbound byte counters.
 *
 * The scratch buffer is sized once with the engine's bound for one
 * {@link MAX_CHUNK_SIZE} chunk and never grows; every engine call writes
 * into it and its output goes to the sink before the next call.
 *
 * @module
 */
import type { CodecEngine, CompressionContext, EnginePreferences } from '@lz4-stream/engine'
import type { Logger } from 'pino'
import { type EncodeOperation, Lz4EncodeError } from '../errors.js'
import type { ByteSink } from '../io/types.js'
import { ContextHandle } from './context-handle.js'
import { compressionRatio } from './ratio.js'

/** Largest slice of input handed to one `update` call. */
export const MAX_CHUNK_SIZE = 64 * 1024

export class FrameEncoder {
  private readonly context: ContextHandle<CompressionContext>
  private readonly scratch: Uint8Array
  private headerWritten = false

  compressedBytes = 0
  uncompressedBytes = 0

  constructor(
    private readonly engine: CodecEngine,
    private readonly sink: ByteSink,
    private readonly preferences: EnginePreferences,
    private readonly logger: Logger
  ) {
    this.context = new ContextHandle(engine.createCompressionContext(), 'compression', logger)
    this.scratch = new Uint8Array(engine.compressBound(MAX_CHUNK_SIZE, preferences))
  }

  /** A header has been written and the frame has not been ended yet. */
  get frameOpen(): boolean {
    return this.headerWritten
  }

  get compressionRatio(): number {
    return compressionRatio(this.uncompressedBytes, this.compressedBytes)
  }

  get released(): boolean {
    return this.context.released
  }

  /**
   * Compress all of `data` and write the output to the sink, starting a
   * frame first if none is open.
   */
  async write(data: Uint8Array): Promise<void> {
    const ctx = this.context.get()
    await this.writeHeader(ctx)
    this.uncompressedBytes += data.length

    let offset = 0
    while (offset < data.length) {
      const size = Math.min(data.length - offset, MAX_CHUNK_SIZE)
      // The rest of this call's input stays put while it is being compressed
      const stableSrc = data.length - offset > MAX_CHUNK_SIZE
      const n = this.check(
        'update',
        ctx.update(this.scratch, data.subarray(offset, offset + size), { stableSrc })
      )
      await this.emit(n)
      offset += size
    }
  }

  /**
   * Emit whatever the context holds without ending the frame, then flush
   * the sink.
   */
  async flush(): Promise<void> {
    const ctx = this.context.get()
    await this.writeHeader(ctx)
    await this.emit(this.check('flush', ctx.flush(this.scratch)))
    await this.sink.flush()
  }

  /**
   * Finish the frame: remaining blocks, end mark, optional checksum. A frame
   * with no prior write still gets its header, so the output always decodes.
   */
  async endFrame(): Promise<void> {
    const ctx = this.context.get()
    await this.writeHeader(ctx)
    const n = this.check('end', ctx.end(this.scratch))
    this.headerWritten = false
    await this.emit(n)
    await this.sink.flush()
    this.logger.debug(
      { compressedBytes: this.compressedBytes, uncompressedBytes: this.uncompressedBytes },
      'frame ended'
    )
  }

  /**
   * End an open frame, then zero the counters and reset the context.
   */
  async reset(): Promise<void> {
    if (this.headerWritten) {
      await this.endFrame()
    }
    this.compressedBytes = 0
    this.uncompressedBytes = 0
    this.context.reset()
  }

  release(): void {
    this.context.release()
  }

  private async writeHeader(ctx: CompressionContext): Promise<void> {
    if (this.headerWritten) return
    const n = this.check('begin', ctx.begin(this.scratch, this.preferences))
    // Only a header that reached the sink opens the frame; a retry begins again
    await this.emit(n)
    this.headerWritten = true
    this.logger.debug('frame started')
  }

  private async emit(size: number): Promise<void> {
    if (size === 0) return
    await this.sink.write(this.scratch.subarray(0, size))
    this.compressedBytes += size
  }

  private check(operation: EncodeOperation, code: number): number {
    if (this.engine.isError(code)) {
      throw new Lz4EncodeError(operation, code, this.engine.errorName(code))
    }
    return code
  }
}
