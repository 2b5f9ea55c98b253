import { BLOCK_HEADER_SIZE, CHECKSUM_SIZE } from './frame-format.js'
import { blockSizeBytes, type EnginePreferences } from './preferences.js'

/**
 * Worst-case output of one `update` of `srcSize` bytes on top of
 * `alreadyBuffered` bytes, including the frame end.
 *
 * Blocks that do not shrink are stored raw, so a full block never costs more
 * than its size plus header and optional checksum.
 */
export function compressBoundBuffered(
  srcSize: number,
  prefs: EnginePreferences,
  alreadyBuffered: number
): number {
  const info = prefs.frameInfo
  const flush = prefs.autoFlush || srcSize === 0
  const blockSize = blockSizeBytes(info.blockSizeId)
  const bufferedSize = Math.min(alreadyBuffered, blockSize - 1)
  const maxSrcSize = srcSize + bufferedSize
  const fullBlocks = Math.floor(maxSrcSize / blockSize)
  const partialBlockSize = maxSrcSize % blockSize
  const lastBlockSize = flush ? partialBlockSize : 0
  const blocks = fullBlocks + (lastBlockSize > 0 ? 1 : 0)
  const blockCrcSize = info.blockChecksum ? CHECKSUM_SIZE : 0
  const frameEnd = BLOCK_HEADER_SIZE + (info.contentChecksum ? CHECKSUM_SIZE : 0)

  return (
    (BLOCK_HEADER_SIZE + blockCrcSize) * blocks + blockSize * fullBlocks + lastBlockSize + frameEnd
  )
}

/**
 * Capacity a destination needs so that any single `update` of at most
 * `srcSize` bytes, or a `flush`/`end`, always fits.
 */
export function compressBound(srcSize: number, prefs: EnginePreferences): number {
  if (prefs.autoFlush) {
    return compressBoundBuffered(srcSize, prefs, 0)
  }
  return compressBoundBuffered(srcSize, prefs, Number.POSITIVE_INFINITY)
}
