/**
 * Lz4Writer: write-only stream that compresses into LZ4 frames on a sink.
 *
 * The header goes out with the first `write` (or `flush`/`close`), blocks
 * follow as input fills them, and `close` ends the frame. Unless the writer
 * owns the sink, it stays usable after `close` and the next `write` starts a
 * new frame, so one sink can carry several frames back to back.
 *
 * @module
 */
import { Writable } from 'node:stream'
import { type CodecEngine, getDefaultEngine } from '@lz4-stream/engine'
import { getConfig } from '../config.js'
import { StreamClosedError, UnsupportedOperationError } from '../errors.js'
import { type FramePreferences, toEnginePreferences } from '../frame-preferences.js'
import { FileStream } from '../io/file-stream.js'
import type { ByteSink } from '../io/types.js'
import { createLogger } from '../logger.js'
import { FrameEncoder } from './encoder.js'

const logger = createLogger('lz4-writer')

export interface Lz4WriterOptions {
  engine: CodecEngine
  /**
   * Frame preferences. Fields left out take the configured defaults
   * (`LZ4_STREAM_*` variables), then the built-in ones.
   */
  preferences?: Partial<FramePreferences>
  /** Close the sink when the writer is closed. */
  syncClose?: boolean
}

export type Lz4WriterCreateOptions = Partial<Lz4WriterOptions>

/**
 * Configured defaults overlaid with explicit preferences.
 */
export function resolvePreferences(
  preferences: Partial<FramePreferences> = {}
): Partial<FramePreferences> {
  return { ...getConfig().preferences, ...preferences }
}

export class Lz4Writer {
  /** Close the sink when the writer is closed. */
  syncClose: boolean
  private readonly encoder: FrameEncoder
  private closed = false

  constructor(
    private readonly sink: ByteSink,
    options: Lz4WriterOptions
  ) {
    this.syncClose = options.syncClose ?? false
    this.encoder = new FrameEncoder(
      options.engine,
      sink,
      toEnginePreferences(resolvePreferences(options.preferences)),
      logger
    )
  }

  /**
   * Writer over `sink` using the shared default engine unless one is given.
   */
  static async create(sink: ByteSink, options: Lz4WriterCreateOptions = {}): Promise<Lz4Writer> {
    const engine = options.engine ?? (await getDefaultEngine())
    return new Lz4Writer(sink, { ...options, engine })
  }

  /**
   * Writer to the file at `path`, created or truncated. The writer owns the
   * file.
   */
  static async open(
    path: string,
    options: Omit<Lz4WriterCreateOptions, 'syncClose'> = {}
  ): Promise<Lz4Writer> {
    const engine = options.engine ?? (await getDefaultEngine())
    const file = await FileStream.open(path, 'w')
    return new Lz4Writer(file, { ...options, engine, syncClose: true })
  }

  get isClosed(): boolean {
    return this.closed
  }

  /** Compressed bytes written to the sink since construction or rewind. */
  get compressedBytesOut(): number {
    return this.encoder.compressedBytes
  }

  /** Bytes accepted by `write` since construction or rewind. */
  get uncompressedBytesOut(): number {
    return this.encoder.uncompressedBytes
  }

  get compressionRatio(): number {
    return this.encoder.compressionRatio
  }

  /**
   * Compress and write all of `data`.
   * @throws Lz4EncodeError when the engine fails
   */
  async write(data: Uint8Array): Promise<void> {
    this.checkOpen()
    await this.encoder.write(data)
  }

  /**
   * Push buffered data out as a block without ending the frame, then flush
   * the sink.
   */
  async flush(): Promise<void> {
    this.checkOpen()
    await this.encoder.flush()
  }

  /**
   * End the current frame and flush the sink. When the writer owns the sink,
   * also close the sink, release the compression context and mark the writer
   * closed, whether or not ending the frame succeeded.
   */
  async close(): Promise<void> {
    this.checkOpen()
    try {
      await this.encoder.endFrame()
    } finally {
      if (this.syncClose) {
        this.closed = true
        try {
          await this.sink.close()
        } finally {
          this.encoder.release()
          logger.debug('closed')
        }
      }
    }
  }

  /**
   * End any open frame, zero the counters, reset the context and rewind the
   * sink so the next frame overwrites from its start.
   */
  async rewind(): Promise<void> {
    this.checkOpen()
    await this.encoder.reset()
    await this.sink.rewind()
    logger.debug('rewound')
  }

  /**
   * Release the compression context without ending the frame or touching
   * the sink. The writer is closed afterwards.
   */
  destroy(): void {
    this.closed = true
    this.encoder.release()
  }

  /** Always throws: the writer is write-only. */
  read(_dest: Uint8Array): never {
    throw new UnsupportedOperationError('read from', 'Lz4Writer')
  }

  /**
   * Node `Writable` feeding this writer; ending it closes the writer.
   */
  toWritable(): Writable {
    return new Writable({
      write: (chunk: Buffer, _encoding, callback) => {
        this.write(chunk).then(() => callback(), callback)
      },
      final: (callback) => {
        this.close().then(() => callback(), callback)
      }
    })
  }

  private checkOpen(): void {
    if (this.closed) throw new StreamClosedError('closed')
  }
}
