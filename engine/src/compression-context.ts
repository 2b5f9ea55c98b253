/**
 * Frame compression context.
 *
 * Lifecycle: `begin` writes the header, any number of `update`/`flush`
 * calls emit blocks, `end` writes the end mark (and content checksum) and
 * returns the context to its idle state, ready for another `begin`.
 *
 * Input that does not fill a block is kept in the context until more input,
 * a `flush`, or `end` arrives (unless `autoFlush` is set). Every method
 * returns the byte count written to `dst`, or an error code.
 *
 * @module
 */
import type { BlockCodec } from './block-codec.js'
import { compressBoundBuffered } from './bound.js'
import type { Checksum, StreamingChecksum } from './checksum.js'
import { errorCode } from './errors.js'
import {
  BLOCK_HEADER_SIZE,
  CHECKSUM_SIZE,
  headerSize,
  UNCOMPRESSED_FLAG,
  writeFrameHeader,
  writeU32
} from './frame-format.js'
import {
  blockSizeBytes,
  type EnginePreferences,
  isBlockSizeId,
  MAX_COMPRESSION_LEVEL
} from './preferences.js'

export interface CompressOptions {
  /**
   * The caller guarantees `src` stays untouched for the duration of the
   * call, so full blocks are compressed in place instead of being staged
   * through the context's block buffer.
   */
  readonly stableSrc: boolean
}

export interface CompressionContext {
  begin(dst: Uint8Array, prefs: EnginePreferences): number
  update(dst: Uint8Array, src: Uint8Array, options?: CompressOptions): number
  flush(dst: Uint8Array): number
  end(dst: Uint8Array): number
  /** Drop any frame in progress; the next call must be `begin`. */
  reset(): void
  /** Release buffers. Every later call fails. */
  free(): void
}

type CompressionStage = 'idle' | 'started' | 'freed'

export class FrameCompressionContext implements CompressionContext {
  private stage: CompressionStage = 'idle'
  private prefs: EnginePreferences | null = null
  private blockSize = 0
  private blockBuffer = new Uint8Array(0)
  private blockScratch = new Uint8Array(0)
  private buffered = 0
  private totalIn = 0
  private contentHash: StreamingChecksum | null = null

  constructor(
    private readonly codec: BlockCodec,
    private readonly checksum: Checksum
  ) {}

  begin(dst: Uint8Array, prefs: EnginePreferences): number {
    if (this.stage === 'freed') return errorCode('ERROR_compressionState_uninitialized')

    const info = prefs.frameInfo
    if (!isBlockSizeId(info.blockSizeId)) return errorCode('ERROR_maxBlockSize_invalid')
    if (info.blockMode !== 'linked' && info.blockMode !== 'independent') {
      return errorCode('ERROR_blockMode_invalid')
    }
    if (!Number.isInteger(prefs.compressionLevel)) {
      return errorCode('ERROR_compressionLevel_invalid')
    }
    if (!Number.isSafeInteger(info.contentSize) || info.contentSize < 0) {
      return errorCode('ERROR_parameter_invalid')
    }
    if (dst.length < headerSize(info)) return errorCode('ERROR_dstMaxSize_tooSmall')

    this.prefs = {
      ...prefs,
      compressionLevel: Math.min(prefs.compressionLevel, MAX_COMPRESSION_LEVEL)
    }
    this.allocate(blockSizeBytes(info.blockSizeId))
    this.buffered = 0
    this.totalIn = 0
    this.contentHash = info.contentChecksum ? this.checksum.create32() : null
    this.stage = 'started'

    return writeFrameHeader(dst, this.prefs, this.checksum)
  }

  update(dst: Uint8Array, src: Uint8Array, options: CompressOptions = { stableSrc: false }): number {
    const prefs = this.prefs
    if (this.stage !== 'started' || prefs === null) {
      return errorCode('ERROR_compressionState_uninitialized')
    }
    if (dst.length < compressBoundBuffered(src.length, prefs, this.buffered)) {
      return errorCode('ERROR_dstMaxSize_tooSmall')
    }

    this.contentHash?.update(src)
    this.totalIn += src.length

    let written = 0
    let consumed = 0

    // Top up a partially filled block first
    if (this.buffered > 0) {
      consumed = Math.min(this.blockSize - this.buffered, src.length)
      this.blockBuffer.set(src.subarray(0, consumed), this.buffered)
      this.buffered += consumed
      if (this.buffered === this.blockSize) {
        written += this.writeBlock(dst, written, this.blockBuffer)
        this.buffered = 0
      }
    }

    while (src.length - consumed >= this.blockSize) {
      const block = src.subarray(consumed, consumed + this.blockSize)
      if (options.stableSrc) {
        written += this.writeBlock(dst, written, block)
      } else {
        this.blockBuffer.set(block)
        written += this.writeBlock(dst, written, this.blockBuffer)
      }
      consumed += this.blockSize
    }

    if (consumed < src.length) {
      this.blockBuffer.set(src.subarray(consumed), this.buffered)
      this.buffered += src.length - consumed
    }

    if (prefs.autoFlush && this.buffered > 0) {
      written += this.writeBlock(dst, written, this.blockBuffer.subarray(0, this.buffered))
      this.buffered = 0
    }

    return written
  }

  flush(dst: Uint8Array): number {
    const prefs = this.prefs
    if (this.stage !== 'started' || prefs === null) {
      return errorCode('ERROR_compressionState_uninitialized')
    }
    if (this.buffered === 0) return 0
    if (dst.length < compressBoundBuffered(0, prefs, this.buffered)) {
      return errorCode('ERROR_dstMaxSize_tooSmall')
    }

    const written = this.writeBlock(dst, 0, this.blockBuffer.subarray(0, this.buffered))
    this.buffered = 0
    return written
  }

  end(dst: Uint8Array): number {
    const prefs = this.prefs
    if (this.stage !== 'started' || prefs === null) {
      return errorCode('ERROR_compressionState_uninitialized')
    }
    if (dst.length < compressBoundBuffered(0, prefs, this.buffered)) {
      return errorCode('ERROR_dstMaxSize_tooSmall')
    }

    let written = this.flush(dst)
    writeU32(dst, written, 0)
    written += BLOCK_HEADER_SIZE
    if (this.contentHash !== null) {
      writeU32(dst, written, this.contentHash.digest())
      written += CHECKSUM_SIZE
    }

    const declared = prefs.frameInfo.contentSize
    this.stage = 'idle'
    this.contentHash = null
    if (declared > 0 && declared !== this.totalIn) {
      return errorCode('ERROR_frameSize_wrong')
    }
    return written
  }

  reset(): void {
    if (this.stage === 'freed') return
    this.stage = 'idle'
    this.buffered = 0
    this.totalIn = 0
    this.contentHash = null
  }

  free(): void {
    this.stage = 'freed'
    this.prefs = null
    this.contentHash = null
    this.blockBuffer = new Uint8Array(0)
    this.blockScratch = new Uint8Array(0)
  }

  private allocate(blockSize: number): void {
    if (this.blockSize === blockSize) return
    this.blockSize = blockSize
    this.blockBuffer = new Uint8Array(blockSize)
    this.blockScratch = new Uint8Array(this.codec.compressBound(blockSize))
  }

  /**
   * Emit one block at `dst[offset]`; stored raw when compression does not
   * shrink it.
   */
  private writeBlock(dst: Uint8Array, offset: number, data: Uint8Array): number {
    const compressedSize = this.codec.compress(data, this.blockScratch)
    const start = offset + BLOCK_HEADER_SIZE
    let stored: number

    if (compressedSize > 0) {
      writeU32(dst, offset, compressedSize)
      dst.set(this.blockScratch.subarray(0, compressedSize), start)
      stored = compressedSize
    } else {
      writeU32(dst, offset, (data.length | UNCOMPRESSED_FLAG) >>> 0)
      dst.set(data, start)
      stored = data.length
    }

    if (this.prefs?.frameInfo.blockChecksum) {
      writeU32(dst, start + stored, this.checksum.hash32(dst.subarray(start, start + stored)))
      return BLOCK_HEADER_SIZE + stored + CHECKSUM_SIZE
    }
    return BLOCK_HEADER_SIZE + stored
  }
}
