/**
 * Frame decompression context.
 *
 * `decompress(dst, src)` accepts input in pieces of any size and produces
 * output into `dst` until either runs out. Partial headers and blocks are
 * collected inside the context, so the caller never has to hand back bytes
 * it already gave. A decoded block that does not fit in `dst` is held and
 * flushed on later calls before more input is consumed.
 *
 * The returned code is the number of input bytes that would complete the
 * current header or block plus the next block header, or 0 once a frame
 * has ended. Input after a frame's last byte is never consumed.
 *
 * @module
 */
import type { BlockCodec } from './block-codec.js'
import type { Checksum, StreamingChecksum } from './checksum.js'
import { type ErrorName, errorCode } from './errors.js'
import {
  BLOCK_HEADER_SIZE,
  CHECKSUM_SIZE,
  descriptorSize,
  HISTORY_SIZE,
  MAGIC_NUMBER,
  MAGIC_SIZE,
  MAX_HEADER_SIZE,
  MIN_HEADER_SIZE,
  parseDescriptor,
  readU32,
  SKIPPABLE_MAGIC,
  SKIPPABLE_MAGIC_MASK,
  UNCOMPRESSED_FLAG,
  validateFlg
} from './frame-format.js'
import { blockSizeBytes, type FrameInfo } from './preferences.js'

export interface DecompressResult {
  /** Next-input-size hint, 0 at frame end, or an error code. */
  readonly code: number
  /** Bytes taken from `src`. */
  readonly consumed: number
  /** Bytes written to `dst`. */
  readonly produced: number
}

export interface DecompressionContext {
  decompress(dst: Uint8Array, src: Uint8Array): DecompressResult
  /** Forget any frame in progress; the next input must start a frame. */
  reset(): void
  /** Release buffers. Every later call fails. */
  free(): void
}

type DecodeStage =
  | 'magic'
  | 'descriptor'
  | 'blockHeader'
  | 'block'
  | 'flush'
  | 'contentChecksum'
  | 'skippableSize'
  | 'skip'
  | 'freed'

const MIN_DESCRIPTOR_SIZE = MIN_HEADER_SIZE - MAGIC_SIZE

export class FrameDecompressionContext implements DecompressionContext {
  private stage: DecodeStage = 'magic'
  /** Collects headers, checksums and blocks that arrive split across calls. */
  private collect = new Uint8Array(MAX_HEADER_SIZE)
  private collected = 0
  private target = 0

  private frame: FrameInfo | null = null
  private blockSize = 0
  private blockCompressed = false
  private contentHash: StreamingChecksum | null = null
  private decodedTotal = 0

  /** Decoded output, preceded by up to 64 KiB of history in linked frames. */
  private window = new Uint8Array(0)
  private historyEnd = 0
  private flushStart = 0
  private flushEnd = 0

  private skipRemaining = 0

  constructor(
    private readonly codec: BlockCodec,
    private readonly checksum: Checksum
  ) {}

  decompress(dst: Uint8Array, src: Uint8Array): DecompressResult {
    let consumed = 0
    let produced = 0

    const fail = (name: ErrorName): DecompressResult => ({
      code: errorCode(name),
      consumed,
      produced
    })

    for (;;) {
      switch (this.stage) {
        case 'magic': {
          consumed = this.gather(src, consumed, MAGIC_SIZE)
          if (this.collected < MAGIC_SIZE) return this.pending(consumed, produced)

          const magic = readU32(this.collect, 0)
          if (magic === MAGIC_NUMBER) {
            this.startCollect('descriptor', MIN_DESCRIPTOR_SIZE)
          } else if (((magic & SKIPPABLE_MAGIC_MASK) >>> 0) === SKIPPABLE_MAGIC) {
            this.startCollect('skippableSize', 4)
          } else {
            return fail('ERROR_frameType_unknown')
          }
          break
        }

        case 'descriptor': {
          consumed = this.gather(src, consumed, this.target)
          if (this.collected >= 1 && this.target === MIN_DESCRIPTOR_SIZE) {
            const flgError = validateFlg(this.collect[0])
            if (flgError !== null) return fail(flgError)
            this.target = descriptorSize(this.collect[0])
            consumed = this.gather(src, consumed, this.target)
          }
          if (this.collected < this.target) return this.pending(consumed, produced)

          const parsed = parseDescriptor(this.collect.subarray(0, this.target), this.checksum)
          if (typeof parsed === 'string') return fail(parsed)
          this.beginFrame(parsed)
          this.startCollect('blockHeader', BLOCK_HEADER_SIZE)
          break
        }

        case 'blockHeader': {
          consumed = this.gather(src, consumed, BLOCK_HEADER_SIZE)
          if (this.collected < BLOCK_HEADER_SIZE) return this.pending(consumed, produced)

          const frame = this.frame
          if (frame === null) return fail('ERROR_GENERIC')
          const header = readU32(this.collect, 0)
          if (header === 0) {
            if (frame.contentSize > 0 && frame.contentSize !== this.decodedTotal) {
              return fail('ERROR_frameSize_wrong')
            }
            if (frame.contentChecksum) {
              this.startCollect('contentChecksum', CHECKSUM_SIZE)
              break
            }
            this.endFrame()
            return { code: 0, consumed, produced }
          }

          this.blockCompressed = (header & UNCOMPRESSED_FLAG) === 0
          const size = (header & ~UNCOMPRESSED_FLAG) >>> 0
          if (size > this.blockSize) return fail('ERROR_maxBlockSize_invalid')
          this.startCollect('block', size + (frame.blockChecksum ? CHECKSUM_SIZE : 0))
          break
        }

        case 'block': {
          consumed = this.gather(src, consumed, this.target)
          if (this.collected < this.target) return this.pending(consumed, produced)

          const frame = this.frame
          if (frame === null) return fail('ERROR_GENERIC')
          const error = this.decodeBlock(frame)
          if (error !== null) return fail(error)
          this.stage = 'flush'
          break
        }

        case 'flush': {
          const n = Math.min(this.flushEnd - this.flushStart, dst.length - produced)
          dst.set(this.window.subarray(this.flushStart, this.flushStart + n), produced)
          this.flushStart += n
          produced += n
          if (this.flushStart < this.flushEnd) return this.pending(consumed, produced)

          this.keepHistory()
          this.startCollect('blockHeader', BLOCK_HEADER_SIZE)
          break
        }

        case 'contentChecksum': {
          consumed = this.gather(src, consumed, CHECKSUM_SIZE)
          if (this.collected < CHECKSUM_SIZE) return this.pending(consumed, produced)

          if (this.contentHash !== null && readU32(this.collect, 0) !== this.contentHash.digest()) {
            return fail('ERROR_contentChecksum_invalid')
          }
          this.endFrame()
          return { code: 0, consumed, produced }
        }

        case 'skippableSize': {
          consumed = this.gather(src, consumed, 4)
          if (this.collected < 4) return this.pending(consumed, produced)
          this.skipRemaining = readU32(this.collect, 0)
          this.stage = 'skip'
          break
        }

        case 'skip': {
          const n = Math.min(this.skipRemaining, src.length - consumed)
          this.skipRemaining -= n
          consumed += n
          if (this.skipRemaining > 0) return this.pending(consumed, produced)
          this.endFrame()
          return { code: 0, consumed, produced }
        }

        case 'freed':
          return fail('ERROR_GENERIC')
      }
    }
  }

  reset(): void {
    if (this.stage === 'freed') return
    this.endFrame()
  }

  free(): void {
    this.endFrame()
    this.stage = 'freed'
    this.collect = new Uint8Array(0)
    this.window = new Uint8Array(0)
  }

  /** Result for a call that stopped because input or output ran out. */
  private pending(consumed: number, produced: number): DecompressResult {
    return { code: this.hint(), consumed, produced }
  }

  private hint(): number {
    const missing = this.target - this.collected
    switch (this.stage) {
      case 'magic':
        return MIN_HEADER_SIZE - this.collected
      case 'descriptor':
      case 'block':
        return missing + BLOCK_HEADER_SIZE
      case 'blockHeader':
      case 'contentChecksum':
      case 'skippableSize':
        return missing
      case 'flush':
        return BLOCK_HEADER_SIZE
      case 'skip':
        return this.skipRemaining
      case 'freed':
        return 0
    }
  }

  private startCollect(stage: DecodeStage, target: number): void {
    this.stage = stage
    this.target = target
    this.collected = 0
  }

  /** Copy input into the collect buffer until it holds `target` bytes. */
  private gather(src: Uint8Array, offset: number, target: number): number {
    const n = Math.min(target - this.collected, src.length - offset)
    if (n <= 0) return offset
    this.collect.set(src.subarray(offset, offset + n), this.collected)
    this.collected += n
    return offset + n
  }

  private beginFrame(frame: FrameInfo): void {
    this.frame = frame
    this.blockSize = blockSizeBytes(frame.blockSizeId)
    this.decodedTotal = 0
    this.historyEnd = 0
    this.contentHash = frame.contentChecksum ? this.checksum.create32() : null

    const collectSize = this.blockSize + CHECKSUM_SIZE
    if (this.collect.length < collectSize) {
      this.collect = new Uint8Array(collectSize)
    }
    const windowSize = (frame.blockMode === 'linked' ? HISTORY_SIZE : 0) + this.blockSize
    if (this.window.length !== windowSize) {
      this.window = new Uint8Array(windowSize)
    }
  }

  private endFrame(): void {
    this.frame = null
    this.contentHash = null
    this.historyEnd = 0
    this.flushStart = 0
    this.flushEnd = 0
    this.skipRemaining = 0
    this.startCollect('magic', MAGIC_SIZE)
  }

  /** Verify and decode the collected block into the window. */
  private decodeBlock(frame: FrameInfo): ErrorName | null {
    const dataSize = this.target - (frame.blockChecksum ? CHECKSUM_SIZE : 0)
    const data = this.collect.subarray(0, dataSize)

    if (frame.blockChecksum && readU32(this.collect, dataSize) !== this.checksum.hash32(data)) {
      return 'ERROR_blockChecksum_invalid'
    }

    let end: number
    if (this.blockCompressed) {
      end = this.codec.decompress(data, this.window, this.historyEnd, this.blockSize)
      if (end < 0) return 'ERROR_decompressionFailed'
    } else {
      this.window.set(data, this.historyEnd)
      end = this.historyEnd + dataSize
    }

    const output = this.window.subarray(this.historyEnd, end)
    this.contentHash?.update(output)
    this.decodedTotal += output.length
    this.flushStart = this.historyEnd
    this.flushEnd = end
    return null
  }

  /** Slide the last 64 KiB of output to the front for linked frames. */
  private keepHistory(): void {
    if (this.frame?.blockMode !== 'linked') {
      this.historyEnd = 0
      return
    }
    const keep = Math.min(HISTORY_SIZE, this.flushEnd)
    this.window.copyWithin(0, this.flushEnd - keep, this.flushEnd)
    this.historyEnd = keep
  }
}
