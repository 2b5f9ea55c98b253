/**
 * Lz4Reader: read-only stream that decompresses LZ4 frames from a source.
 *
 * Lifecycle:
 * 1. Construct over a {@link ByteSource} (or `open` a file path)
 * 2. `read` / `readToEnd` / iterate / `toReadable`
 * 3. `close` (only when the source is owned; closes it too) or `destroy`
 *
 * Consecutive frames in the source decode back to back. A `read` may return
 * 0 at a frame boundary while more input follows; `readToEnd`, iteration and
 * `toReadable` only stop once the source itself is exhausted.
 *
 * @module
 */
import { Readable } from 'node:stream'
import { type CodecEngine, getDefaultEngine } from '@lz4-stream/engine'
import { StreamClosedError, UnsupportedOperationError } from '../errors.js'
import { FileStream } from '../io/file-stream.js'
import type { ByteSource } from '../io/types.js'
import { createLogger } from '../logger.js'
import { FrameDecoder } from './decoder.js'

const logger = createLogger('lz4-reader')

/** Size of the chunks produced by iteration and `toReadable`. */
const READ_CHUNK_SIZE = 64 * 1024

export interface Lz4ReaderOptions {
  engine: CodecEngine
  /** Close the source when the reader is closed. */
  syncClose?: boolean
}

export type Lz4ReaderCreateOptions = Partial<Lz4ReaderOptions>

export class Lz4Reader implements AsyncIterable<Uint8Array> {
  /** Close the source when the reader is closed. */
  syncClose: boolean
  private readonly decoder: FrameDecoder
  private closed = false

  constructor(
    private readonly source: ByteSource,
    options: Lz4ReaderOptions
  ) {
    this.syncClose = options.syncClose ?? false
    this.decoder = new FrameDecoder(options.engine, source, logger)
  }

  /**
   * Reader over `source` using the shared default engine unless one is given.
   */
  static async create(source: ByteSource, options: Lz4ReaderCreateOptions = {}): Promise<Lz4Reader> {
    const engine = options.engine ?? (await getDefaultEngine())
    return new Lz4Reader(source, { ...options, engine })
  }

  /**
   * Reader over the file at `path`. The reader owns the file.
   */
  static async open(
    path: string,
    options: Omit<Lz4ReaderCreateOptions, 'syncClose'> = {}
  ): Promise<Lz4Reader> {
    const engine = options.engine ?? (await getDefaultEngine())
    const file = await FileStream.open(path, 'r')
    return new Lz4Reader(file, { engine, syncClose: true })
  }

  get isClosed(): boolean {
    return this.closed
  }

  /** Compressed bytes read from the source since construction or rewind. */
  get compressedBytesIn(): number {
    return this.decoder.compressedBytes
  }

  /** Decompressed bytes returned to callers since construction or rewind. */
  get uncompressedBytesIn(): number {
    return this.decoder.uncompressedBytes
  }

  get compressionRatio(): number {
    return this.decoder.compressionRatio
  }

  /**
   * Decompress into `dest`.
   *
   * @returns Bytes written; 0 for an empty `dest`, at end of input, or when
   *   a frame ended before any output of this call
   * @throws Lz4DecodeError on corrupt input
   */
  async read(dest: Uint8Array): Promise<number> {
    this.checkOpen()
    return this.decoder.read(dest)
  }

  /**
   * Decompress everything left in the source.
   */
  async readToEnd(): Promise<Buffer> {
    const chunks: Uint8Array[] = []
    for await (const chunk of this) {
      chunks.push(chunk)
    }
    return Buffer.concat(chunks)
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Uint8Array, void, undefined> {
    const chunk = new Uint8Array(READ_CHUNK_SIZE)
    for (;;) {
      const n = await this.read(chunk)
      if (n > 0) {
        yield chunk.slice(0, n)
      } else if (this.decoder.exhausted) {
        return
      }
    }
  }

  /**
   * Node `Readable` of the decompressed bytes.
   */
  toReadable(): Readable {
    return Readable.from(this, { objectMode: false })
  }

  /** Always throws: the reader is read-only. */
  write(_data: Uint8Array): never {
    throw new UnsupportedOperationError('write to', 'Lz4Reader')
  }

  /** Always throws: the reader is read-only. */
  flush(): never {
    throw new UnsupportedOperationError('flush', 'Lz4Reader')
  }

  /**
   * Rewind the source and start decoding from its first frame again.
   * Counters return to zero.
   */
  async rewind(): Promise<void> {
    this.checkOpen()
    await this.source.rewind()
    this.decoder.reset()
    logger.debug('rewound')
  }

  /**
   * Close an owning reader together with its source. The decompression
   * context is released even when closing the source fails.
   *
   * A reader that does not own its source stays open and readable; use
   * {@link destroy} to release it.
   */
  async close(): Promise<void> {
    if (this.closed || !this.syncClose) return
    this.closed = true
    try {
      await this.source.close()
    } finally {
      this.decoder.release()
      logger.debug('closed')
    }
  }

  /**
   * Release the decompression context without touching the source.
   */
  destroy(): void {
    this.closed = true
    this.decoder.release()
  }

  private checkOpen(): void {
    if (this.closed) throw new StreamClosedError('closed')
  }
}
