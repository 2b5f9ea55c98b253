/**
 * Lz4Duplex: compressed reading and writing over one bidirectional
 * transport.
 *
 * Each direction has its own state bundle (context, buffer, counters, frame
 * lifecycle); they share nothing but the transport. `close` ends only the
 * outgoing frame: decompression has no terminator to emit.
 *
 * @module
 */
import { type CodecEngine, getDefaultEngine } from '@lz4-stream/engine'
import { StreamClosedError } from '../errors.js'
import type { FramePreferences } from '../frame-preferences.js'
import { toEnginePreferences } from '../frame-preferences.js'
import type { ByteTransport } from '../io/types.js'
import { createLogger } from '../logger.js'
import { FrameDecoder } from './decoder.js'
import { FrameEncoder } from './encoder.js'
import { resolvePreferences } from './writer.js'

const logger = createLogger('lz4-duplex')

const READ_CHUNK_SIZE = 64 * 1024

export interface Lz4DuplexOptions {
  engine: CodecEngine
  /** Preferences for outgoing frames. */
  preferences?: Partial<FramePreferences>
  /** Close the transport when the duplex is closed. */
  syncClose?: boolean
}

export type Lz4DuplexCreateOptions = Partial<Lz4DuplexOptions>

export class Lz4Duplex {
  /** Close the transport when the duplex is closed. */
  syncClose: boolean
  private readonly decoder: FrameDecoder
  private readonly encoder: FrameEncoder
  private closed = false

  constructor(
    private readonly transport: ByteTransport,
    options: Lz4DuplexOptions
  ) {
    this.syncClose = options.syncClose ?? false
    this.decoder = new FrameDecoder(options.engine, transport, logger)
    try {
      this.encoder = new FrameEncoder(
        options.engine,
        transport,
        toEnginePreferences(resolvePreferences(options.preferences)),
        logger
      )
    } catch (err) {
      this.decoder.release()
      throw err
    }
  }

  static async create(
    transport: ByteTransport,
    options: Lz4DuplexCreateOptions = {}
  ): Promise<Lz4Duplex> {
    const engine = options.engine ?? (await getDefaultEngine())
    return new Lz4Duplex(transport, { ...options, engine })
  }

  get isClosed(): boolean {
    return this.closed
  }

  get compressedBytesIn(): number {
    return this.decoder.compressedBytes
  }

  get uncompressedBytesIn(): number {
    return this.decoder.uncompressedBytes
  }

  get compressedBytesOut(): number {
    return this.encoder.compressedBytes
  }

  get uncompressedBytesOut(): number {
    return this.encoder.uncompressedBytes
  }

  get compressionRatioIn(): number {
    return this.decoder.compressionRatio
  }

  get compressionRatioOut(): number {
    return this.encoder.compressionRatio
  }

  async read(dest: Uint8Array): Promise<number> {
    this.checkOpen()
    return this.decoder.read(dest)
  }

  /**
   * Decompress incoming data until the transport reports end of input.
   */
  async readToEnd(): Promise<Buffer> {
    const chunks: Uint8Array[] = []
    const chunk = new Uint8Array(READ_CHUNK_SIZE)
    for (;;) {
      const n = await this.read(chunk)
      if (n > 0) {
        chunks.push(chunk.slice(0, n))
      } else if (this.decoder.exhausted) {
        return Buffer.concat(chunks)
      }
    }
  }

  async write(data: Uint8Array): Promise<void> {
    this.checkOpen()
    await this.encoder.write(data)
  }

  async flush(): Promise<void> {
    this.checkOpen()
    await this.encoder.flush()
  }

  /**
   * End the outgoing frame. When the duplex owns the transport, also close
   * it (ending both directions) and release both contexts.
   */
  async close(): Promise<void> {
    this.checkOpen()
    try {
      await this.encoder.endFrame()
    } finally {
      if (this.syncClose) {
        this.closed = true
        try {
          await this.transport.close()
        } finally {
          this.releaseContexts()
          logger.debug('closed')
        }
      }
    }
  }

  /**
   * Rewind both directions together: end an open outgoing frame, zero all
   * counters, reset both contexts and rewind the transport.
   */
  async rewind(): Promise<void> {
    this.checkOpen()
    await this.encoder.reset()
    this.decoder.reset()
    await this.transport.rewind()
    logger.debug('rewound')
  }

  /**
   * Release both contexts without ending the frame or touching the
   * transport.
   */
  destroy(): void {
    this.closed = true
    this.releaseContexts()
  }

  private releaseContexts(): void {
    try {
      this.encoder.release()
    } finally {
      this.decoder.release()
    }
  }

  private checkOpen(): void {
    if (this.closed) throw new StreamClosedError('closed')
  }
}
