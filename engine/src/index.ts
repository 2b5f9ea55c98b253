/**
 * LZ4 frame engine
 *
 * Stateful compression and decompression contexts producing and consuming
 * the LZ4 frame format over plain `Uint8Array` buffers. Block compression is
 * delegated to lz4js and checksums to xxhash-wasm.
 *
 * @packageDocumentation
 */

// Engine
export { type CodecEngine, createLz4Engine, getDefaultEngine, Lz4FrameEngine } from './engine.js'

// Contexts
export type { CompressionContext, CompressOptions } from './compression-context.js'
export { FrameCompressionContext } from './compression-context.js'
export type { DecompressionContext, DecompressResult } from './decompression-context.js'
export { FrameDecompressionContext } from './decompression-context.js'

// Sizing
export { compressBound, compressBoundBuffered } from './bound.js'

// Result codes
export { type ErrorName, errorCode, errorName, isError } from './errors.js'

// Preferences
export type { BlockMode, BlockSizeId, EnginePreferences, FrameInfo } from './preferences.js'
export {
  blockSizeBytes,
  DEFAULT_ENGINE_PREFERENCES,
  isBlockSizeId,
  MAX_COMPRESSION_LEVEL
} from './preferences.js'

// Frame layout
export {
  BLOCK_HEADER_SIZE,
  MAGIC_NUMBER,
  MAX_HEADER_SIZE,
  MIN_HEADER_SIZE,
  SKIPPABLE_MAGIC
} from './frame-format.js'

// Building blocks (for custom engines and tests)
export {
  type BlockCodec,
  checkBlock,
  createBlockCodec,
  LAST_LITERALS,
  MF_LIMIT,
  readSequences,
  type Sequence
} from './block-codec.js'
export { type Checksum, loadChecksum, type StreamingChecksum } from './checksum.js'
