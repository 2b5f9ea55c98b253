/**
 * Raw LZ4 block codec backed by lz4js.
 *
 * lz4js compresses without the block format's end-of-block restrictions
 * and decodes without bounds checking, so both directions are checked
 * here:
 * - compressed output is walked sequence by sequence, and whatever breaks
 *   the end-of-block rules is re-emitted as trailing literals
 * - compressed input is walked before decoding; a match that reaches before
 *   the available history or a sequence that overruns the input or the
 *   block limit fails the block
 *
 * @module
 */
import * as lz4js from 'lz4js'

const HASH_TABLE_SIZE = 1 << 16

const MIN_MATCH = 4
/** The last match must start at least this many bytes before the block end. */
export const MF_LIMIT = 12
/** The last bytes of a block are always literals. */
export const LAST_LITERALS = 5

const RUN_MASK = 15

export interface BlockCodec {
  /** Scratch capacity needed to compress `size` bytes. */
  compressBound(size: number): number
  /**
   * Compress `src` into `dst` from offset 0.
   * @returns Compressed size, or 0 when the block does not shrink
   */
  compress(src: Uint8Array, dst: Uint8Array): number
  /**
   * Decode `src` into `window` starting at `offset`; earlier window bytes
   * serve as match history.
   * @returns End offset in `window`, or -1 on malformed input
   */
  decompress(src: Uint8Array, window: Uint8Array, offset: number, limit: number): number
}

/** One sequence of a compressed block; positions are in decoded bytes. */
export interface Sequence {
  /** Offset of the token in the compressed block. */
  readonly tokenAt: number
  readonly literalsAt: number
  readonly literals: number
  /** Position of the match, or -1 for the closing literal-only sequence. */
  readonly matchAt: number
  readonly matchLength: number
  readonly distance: number
}

/**
 * Read a length field that continues in extra bytes when its token nibble
 * is saturated.
 * @returns The length (-1 when the bytes run past `end`) and the next offset
 */
function readLength(block: Uint8Array, at: number, end: number, nibble: number): [number, number] {
  let length = nibble
  let pos = at
  if (nibble !== RUN_MASK) return [length, pos]
  for (;;) {
    if (pos >= end) return [-1, pos]
    const b = block[pos++]
    length += b
    if (b !== 255) return [length, pos]
  }
}

/**
 * Parse the sequences of `block[0, size)`.
 * @returns The sequences, or null when the block is truncated
 */
export function readSequences(block: Uint8Array, size = block.length): Sequence[] | null {
  const sequences: Sequence[] = []
  let ip = 0
  let op = 0

  while (ip < size) {
    const tokenAt = ip
    const token = block[ip++]
    const [literals, literalStart] = readLength(block, ip, size, token >>> 4)
    if (literals < 0 || literalStart + literals > size) return null
    ip = literalStart + literals
    const literalsAt = op
    op += literals

    if (ip === size) {
      sequences.push({ tokenAt, literalsAt, literals, matchAt: -1, matchLength: 0, distance: 0 })
      break
    }

    if (ip + 2 > size) return null
    const distance = block[ip] | (block[ip + 1] << 8)
    const [extra, next] = readLength(block, ip + 2, size, token & RUN_MASK)
    if (extra < 0) return null
    ip = next
    const matchLength = extra + MIN_MATCH
    sequences.push({ tokenAt, literalsAt, literals, matchAt: op, matchLength, distance })
    op += matchLength
  }

  return sequences
}

/**
 * Rewrite the tail of `dst[0, written)` so that no match starts within
 * {@link MF_LIMIT} bytes of the block end or reaches into its last
 * {@link LAST_LITERALS} bytes, and the block ends with literals.
 *
 * @returns New compressed size, or 0 when the block no longer shrinks
 */
export function enforceEndOfBlock(src: Uint8Array, dst: Uint8Array, written: number): number {
  const sequences = readSequences(dst, written)
  if (sequences === null) return 0

  const end = src.length
  const last = sequences[sequences.length - 1]
  const cut =
    sequences.find(
      (seq) =>
        seq.matchAt >= 0 &&
        (seq.matchAt > end - MF_LIMIT || seq.matchAt + seq.matchLength > end - LAST_LITERALS)
    ) ?? last
  if (cut === undefined) return 0
  if (cut === last && cut.matchAt < 0) return written

  // Everything from the offending sequence on becomes one literal run
  const literals = end - cut.literalsAt
  const lengthBytes = literals >= RUN_MASK ? Math.floor((literals - RUN_MASK) / 255) + 1 : 0
  const size = cut.tokenAt + 1 + lengthBytes + literals
  if (size >= src.length || size > dst.length) return 0

  let pos = cut.tokenAt
  dst[pos++] = Math.min(literals, RUN_MASK) << 4
  if (literals >= RUN_MASK) {
    let rest = literals - RUN_MASK
    while (rest >= 255) {
      dst[pos++] = 255
      rest -= 255
    }
    dst[pos++] = rest
  }
  dst.set(src.subarray(cut.literalsAt), pos)
  return size
}

/**
 * Walk a compressed block without decoding it.
 *
 * @param history - Bytes of earlier output a match may reach back into
 * @returns Decoded size, or -1 when the block is malformed
 */
export function checkBlock(block: Uint8Array, history: number, limit: number): number {
  const sequences = readSequences(block)
  if (sequences === null) return -1
  const last = sequences[sequences.length - 1]
  if (last === undefined || last.matchAt >= 0) return -1

  for (const seq of sequences) {
    if (seq.matchAt >= 0 && (seq.distance === 0 || seq.distance > history + seq.matchAt)) {
      return -1
    }
  }

  const size = last.literalsAt + last.literals
  return size <= limit ? size : -1
}

export function createBlockCodec(): BlockCodec {
  const hashTable = new Uint32Array(HASH_TABLE_SIZE)

  return {
    compressBound: (size) => lz4js.compressBound(size),

    compress(src, dst) {
      if (src.length === 0) {
        return 0
      }
      hashTable.fill(0)
      const written = lz4js.compressBlock(src, dst, 0, src.length, hashTable)
      if (written <= 0 || written >= src.length) return 0
      return enforceEndOfBlock(src, dst, written)
    },

    decompress(src, window, offset, limit) {
      const expected = checkBlock(src, offset, limit)
      if (expected < 0 || offset + expected > window.length) return -1
      const end = lz4js.decompressBlock(src, window, 0, src.length, offset)
      return end === offset + expected ? end : -1
    }
  }
}
