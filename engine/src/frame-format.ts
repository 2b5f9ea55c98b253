/**
 * LZ4 frame layout: constants and descriptor encoding/parsing.
 *
 * Frame structure:
 * - 4-byte magic number (little-endian 0x184D2204)
 * - frame descriptor: FLG, BD, optional 8-byte content size,
 *   optional 4-byte dictionary id, 1-byte header checksum
 * - blocks: 4-byte little-endian size (high bit = stored uncompressed),
 *   data, optional 4-byte block checksum
 * - end mark (4 zero bytes), optional 4-byte content checksum
 *
 * Skippable frames start with a magic in 0x184D2A50..0x184D2A5F followed by
 * a 4-byte little-endian payload size.
 *
 * @module
 */
import type { Checksum } from './checksum.js'
import type { ErrorName } from './errors.js'
import {
  type EnginePreferences,
  effectiveBlockSizeId,
  type FrameInfo,
  isBlockSizeId
} from './preferences.js'

export const MAGIC_NUMBER = 0x184d2204
export const SKIPPABLE_MAGIC = 0x184d2a50
export const SKIPPABLE_MAGIC_MASK = 0xfffffff0

export const MAGIC_SIZE = 4
export const BLOCK_HEADER_SIZE = 4
export const CHECKSUM_SIZE = 4
export const UNCOMPRESSED_FLAG = 0x80000000

/** Magic + FLG + BD + header checksum. */
export const MIN_HEADER_SIZE = 7
/** Magic + FLG + BD + content size + dict id + header checksum. */
export const MAX_HEADER_SIZE = 19

/** Matches may reach this far back into earlier blocks of a linked frame. */
export const HISTORY_SIZE = 64 * 1024

const FLG_VERSION = 0x40
const FLG_VERSION_MASK = 0xc0
const FLG_BLOCK_INDEPENDENCE = 0x20
const FLG_BLOCK_CHECKSUM = 0x10
const FLG_CONTENT_SIZE = 0x08
const FLG_CONTENT_CHECKSUM = 0x04
const FLG_RESERVED = 0x02
const FLG_DICT_ID = 0x01
const BD_RESERVED = 0x8f

export function readU32(bytes: Uint8Array, offset: number): number {
  return (
    (bytes[offset] |
      (bytes[offset + 1] << 8) |
      (bytes[offset + 2] << 16) |
      (bytes[offset + 3] << 24)) >>>
    0
  )
}

export function writeU32(bytes: Uint8Array, offset: number, value: number): void {
  bytes[offset] = value & 0xff
  bytes[offset + 1] = (value >>> 8) & 0xff
  bytes[offset + 2] = (value >>> 16) & 0xff
  bytes[offset + 3] = (value >>> 24) & 0xff
}

/**
 * Size of the header (magic included) the given preferences produce.
 */
export function headerSize(info: FrameInfo): number {
  return MIN_HEADER_SIZE + (info.contentSize > 0 ? 8 : 0) + (info.dictId !== 0 ? 4 : 0)
}

/**
 * Write the frame header for `prefs` at the start of `dst`.
 * The caller guarantees `dst` holds {@link headerSize} bytes.
 *
 * @returns Header length in bytes
 */
export function writeFrameHeader(dst: Uint8Array, prefs: EnginePreferences, checksum: Checksum): number {
  const info = prefs.frameInfo
  writeU32(dst, 0, MAGIC_NUMBER)

  let flg = FLG_VERSION
  if (info.blockMode === 'independent') flg |= FLG_BLOCK_INDEPENDENCE
  if (info.blockChecksum) flg |= FLG_BLOCK_CHECKSUM
  if (info.contentSize > 0) flg |= FLG_CONTENT_SIZE
  if (info.contentChecksum) flg |= FLG_CONTENT_CHECKSUM
  if (info.dictId !== 0) flg |= FLG_DICT_ID

  let pos = MAGIC_SIZE
  dst[pos++] = flg
  dst[pos++] = effectiveBlockSizeId(info.blockSizeId) << 4
  if (info.contentSize > 0) {
    writeU32(dst, pos, info.contentSize % 0x100000000)
    writeU32(dst, pos + 4, Math.floor(info.contentSize / 0x100000000))
    pos += 8
  }
  if (info.dictId !== 0) {
    writeU32(dst, pos, info.dictId)
    pos += 4
  }
  dst[pos] = descriptorChecksum(dst.subarray(MAGIC_SIZE, pos), checksum)
  return pos + 1
}

/**
 * Header checksum byte: second byte of xxHash-32 over the descriptor.
 */
export function descriptorChecksum(descriptor: Uint8Array, checksum: Checksum): number {
  return (checksum.hash32(descriptor) >>> 8) & 0xff
}

/**
 * Descriptor length (FLG through header checksum) announced by a FLG byte.
 */
export function descriptorSize(flg: number): number {
  return 3 + (flg & FLG_CONTENT_SIZE ? 8 : 0) + (flg & FLG_DICT_ID ? 4 : 0)
}

/**
 * Check the FLG byte on its own, before the rest of the descriptor arrives.
 */
export function validateFlg(flg: number): ErrorName | null {
  if ((flg & FLG_VERSION_MASK) !== FLG_VERSION) return 'ERROR_headerVersion_wrong'
  if (flg & FLG_RESERVED) return 'ERROR_reservedFlag_set'
  return null
}

/**
 * Parse a complete descriptor (FLG through header checksum).
 */
export function parseDescriptor(
  descriptor: Uint8Array,
  checksum: Checksum
): FrameInfo | ErrorName {
  const flg = descriptor[0]
  const bd = descriptor[1]

  const flgError = validateFlg(flg)
  if (flgError !== null) return flgError
  if (bd & BD_RESERVED) return 'ERROR_reservedFlag_set'

  const blockSizeId = (bd >>> 4) & 0x07
  if (!isBlockSizeId(blockSizeId) || blockSizeId < 4) return 'ERROR_maxBlockSize_invalid'

  const last = descriptor.length - 1
  if (descriptorChecksum(descriptor.subarray(0, last), checksum) !== descriptor[last]) {
    return 'ERROR_headerChecksum_invalid'
  }

  let pos = 2
  let contentSize = 0
  if (flg & FLG_CONTENT_SIZE) {
    contentSize = readU32(descriptor, pos) + readU32(descriptor, pos + 4) * 0x100000000
    pos += 8
  }
  let dictId = 0
  if (flg & FLG_DICT_ID) {
    dictId = readU32(descriptor, pos)
  }

  return {
    blockSizeId,
    blockMode: flg & FLG_BLOCK_INDEPENDENCE ? 'independent' : 'linked',
    contentChecksum: (flg & FLG_CONTENT_CHECKSUM) !== 0,
    blockChecksum: (flg & FLG_BLOCK_CHECKSUM) !== 0,
    contentSize,
    dictId,
    frameType: 'frame'
  }
}
