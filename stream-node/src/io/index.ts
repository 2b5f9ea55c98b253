export { FileStream, type FileStreamMode } from './file-stream.js'
export { MemoryStream } from './memory-stream.js'
export {
  DuplexTransport,
  ReadableSource,
  WritableSink,
  writeWithBackpressure
} from './node-stream.js'
export type { ByteSink, ByteSource, ByteTransport } from './types.js'
