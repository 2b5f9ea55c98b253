/**
 * LZ4 frame streams for Node.js
 *
 * Stream adapters that compress and decompress the LZ4 frame format over
 * files, in-memory buffers and Node streams.
 *
 * @example
 * ```ts
 * import { Lz4Reader, Lz4Writer, MemoryStream } from '@lz4-stream/node'
 *
 * const memory = new MemoryStream()
 * const writer = await Lz4Writer.create(memory, { preferences: { checksum: true } })
 * await writer.write(new TextEncoder().encode('hello'))
 * await writer.close()
 *
 * await memory.rewind()
 * const reader = await Lz4Reader.create(memory)
 * console.log((await reader.readToEnd()).toString()) // 'hello'
 * ```
 *
 * @packageDocumentation
 */

// Adapters
export {
  Lz4Duplex,
  type Lz4DuplexCreateOptions,
  type Lz4DuplexOptions,
  Lz4Reader,
  type Lz4ReaderCreateOptions,
  type Lz4ReaderOptions,
  Lz4Writer,
  type Lz4WriterCreateOptions,
  type Lz4WriterOptions,
  withLz4Reader,
  withLz4Writer
} from './lz4/index.js'

// Preferences
export {
  BLOCK_SIZE_IDS,
  BLOCK_SIZES,
  type BlockSize,
  COMPRESSION_LEVEL_NAMES,
  COMPRESSION_LEVELS,
  type CompressionLevel,
  type CompressionLevelName,
  compressionLevelValue,
  DEFAULT_FRAME_PREFERENCES,
  type FramePreferences,
  toEnginePreferences
} from './frame-preferences.js'

// Streams
export {
  type ByteSink,
  type ByteSource,
  type ByteTransport,
  DuplexTransport,
  FileStream,
  type FileStreamMode,
  MemoryStream,
  ReadableSource,
  WritableSink
} from './io/index.js'

// Errors
export {
  ConfigError,
  type EncodeOperation,
  Lz4DecodeError,
  Lz4EncodeError,
  Lz4Error,
  StreamClosedError,
  UnsupportedOperationError
} from './errors.js'

// Configuration
export { type Config, getConfig, type LogLevel, parseConfig } from './config.js'

// Engine
export { type CodecEngine, createLz4Engine, getDefaultEngine } from '@lz4-stream/engine'
