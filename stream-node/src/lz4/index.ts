export { ContextHandle, type EngineContext } from './context-handle.js'
export { FrameDecoder, PENDING_INPUT_SIZE } from './decoder.js'
export { Lz4Duplex, type Lz4DuplexCreateOptions, type Lz4DuplexOptions } from './duplex.js'
export { FrameEncoder, MAX_CHUNK_SIZE } from './encoder.js'
export { compressionRatio } from './ratio.js'
export { Lz4Reader, type Lz4ReaderCreateOptions, type Lz4ReaderOptions } from './reader.js'
export { withLz4Reader, withLz4Writer } from './scoped.js'
export {
  Lz4Writer,
  type Lz4WriterCreateOptions,
  type Lz4WriterOptions,
  resolvePreferences
} from './writer.js'
