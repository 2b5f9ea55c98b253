/**
 * Byte sources and sinks over Node streams (sockets, pipes, stdio).
 *
 * Writes wait for backpressure to clear before resolving, so an adapter
 * writing through a {@link WritableSink} never buffers more than one
 * stream high-water mark ahead of the consumer. Node streams cannot seek:
 * `rewind` always fails with {@link UnsupportedOperationError}.
 *
 * @remarks
 * **Single-reader, single-writer**: overlapping `read` calls (or overlapping
 * `write` calls) on one instance interleave data. Adapters never overlap
 * their own calls.
 *
 * @module
 */
import type { Duplex, Readable, Writable } from 'node:stream'
import { StreamClosedError, UnsupportedOperationError } from '../errors.js'
import type { ByteSink, ByteSource, ByteTransport } from './types.js'

/**
 * Write a buffer to a stream with backpressure handling.
 * Resolves only from a single code path to avoid double-resolution.
 *
 * @returns Promise that resolves when data is accepted by the stream
 * @throws StreamClosedError if the stream is closed/finished
 * @throws Error if the stream emits an error
 */
export function writeWithBackpressure(stream: Writable, data: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    if (stream.destroyed) {
      reject(new StreamClosedError('destroyed'))
      return
    }
    if (stream.writableEnded || stream.writableFinished) {
      reject(new StreamClosedError('ended'))
      return
    }

    let settled = false

    const settle = (fn: () => void) => {
      if (settled) return
      settled = true
      cleanup()
      fn()
    }

    const onError = (err: Error) => settle(() => reject(err))
    const onClose = () => settle(() => reject(new StreamClosedError('close')))
    const onFinish = () => settle(() => reject(new StreamClosedError('finish')))
    const onDrain = () => settle(() => resolve())

    const cleanup = () => {
      stream.off('error', onError)
      stream.off('close', onClose)
      stream.off('finish', onFinish)
      stream.off('drain', onDrain)
    }

    // Attach listeners before write to catch synchronous errors
    stream.on('error', onError)
    stream.on('close', onClose)
    stream.on('finish', onFinish)

    if (stream.write(data)) {
      // Accepted; resolve on the next tick so a synchronous error wins
      setImmediate(() => settle(() => resolve()))
    } else {
      stream.on('drain', onDrain)
    }
  })
}

/**
 * Wait until the stream's internal buffer has drained.
 */
function waitForDrain(stream: Writable): Promise<void> {
  if (!stream.writableNeedDrain) return Promise.resolve()

  return new Promise((resolve, reject) => {
    const onDrain = () => {
      cleanup()
      resolve()
    }
    const onError = (err: Error) => {
      cleanup()
      reject(err)
    }
    const onClose = () => {
      cleanup()
      reject(new StreamClosedError('close'))
    }
    const cleanup = () => {
      stream.off('drain', onDrain)
      stream.off('error', onError)
      stream.off('close', onClose)
    }
    stream.on('drain', onDrain)
    stream.on('error', onError)
    stream.on('close', onClose)
  })
}

/**
 * End the stream and wait until everything written has been flushed.
 */
function endStream(stream: Writable): Promise<void> {
  if (stream.writableFinished || stream.destroyed) return Promise.resolve()

  return new Promise<void>((resolve, reject) => {
    const onError = (err: Error): void => {
      cleanup()
      reject(err)
    }
    const onFinish = (): void => {
      cleanup()
      resolve()
    }
    const cleanup = (): void => {
      stream.off('error', onError)
      stream.off('finish', onFinish)
    }
    stream.on('error', onError)
    stream.on('finish', onFinish)
    if (!stream.writableEnded) stream.end()
  })
}

function toBytes(chunk: unknown): Uint8Array {
  if (chunk instanceof Uint8Array) return chunk
  if (typeof chunk === 'string') return Buffer.from(chunk)
  throw new TypeError('Readable produced a non-byte chunk; object mode streams are not supported')
}

/**
 * {@link ByteSource} over a `Readable`.
 *
 * Chunks larger than the caller's buffer are kept and handed out over
 * subsequent reads.
 */
export class ReadableSource implements ByteSource {
  private leftover: Uint8Array = new Uint8Array(0)
  private ended = false

  constructor(protected readonly readable: Readable) {}

  async read(into: Uint8Array): Promise<number> {
    if (into.length === 0) return 0

    while (this.leftover.length === 0) {
      if (this.ended) return 0
      const chunk = await this.nextChunk()
      if (chunk === null) {
        this.ended = true
        return 0
      }
      this.leftover = chunk
    }

    const n = Math.min(into.length, this.leftover.length)
    into.set(this.leftover.subarray(0, n))
    this.leftover = this.leftover.subarray(n)
    return n
  }

  async rewind(): Promise<void> {
    throw new UnsupportedOperationError('rewind', 'a Node stream')
  }

  async close(): Promise<void> {
    this.ended = true
    this.leftover = new Uint8Array(0)
    this.readable.destroy()
  }

  /** Next chunk from the stream, or null at end of input. */
  private nextChunk(): Promise<Uint8Array | null> {
    const stream = this.readable

    return new Promise((resolve, reject) => {
      const chunk: unknown = stream.read()
      if (chunk !== null) {
        resolve(toBytes(chunk))
        return
      }
      if (stream.readableEnded) {
        resolve(null)
        return
      }
      if (stream.destroyed) {
        reject(stream.errored ?? new StreamClosedError('destroyed'))
        return
      }

      let settled = false

      const settle = (fn: () => void) => {
        if (settled) return
        settled = true
        cleanup()
        fn()
      }

      const onReadable = () => settle(() => resolve(this.nextChunk()))
      const onEnd = () => settle(() => resolve(null))
      const onError = (err: Error) => settle(() => reject(err))
      const onClose = () => settle(() => reject(new StreamClosedError('close')))

      const cleanup = () => {
        stream.off('readable', onReadable)
        stream.off('end', onEnd)
        stream.off('error', onError)
        stream.off('close', onClose)
      }

      stream.on('readable', onReadable)
      stream.on('end', onEnd)
      stream.on('error', onError)
      stream.on('close', onClose)
    })
  }
}

/**
 * {@link ByteSink} over a `Writable`.
 */
export class WritableSink implements ByteSink {
  constructor(protected readonly writable: Writable) {}

  async write(data: Uint8Array): Promise<void> {
    if (data.length === 0) return
    // The stream may hold on to the chunk; callers reuse their buffers
    await writeWithBackpressure(this.writable, Buffer.from(data))
  }

  async flush(): Promise<void> {
    await waitForDrain(this.writable)
  }

  async rewind(): Promise<void> {
    throw new UnsupportedOperationError('rewind', 'a Node stream')
  }

  async close(): Promise<void> {
    await endStream(this.writable)
  }
}

/**
 * {@link ByteTransport} over a `Duplex` such as a socket.
 */
export class DuplexTransport implements ByteTransport {
  private readonly source: ReadableSource
  private readonly sink: WritableSink

  constructor(private readonly duplex: Duplex) {
    this.source = new ReadableSource(duplex)
    this.sink = new WritableSink(duplex)
  }

  read(into: Uint8Array): Promise<number> {
    return this.source.read(into)
  }

  write(data: Uint8Array): Promise<void> {
    return this.sink.write(data)
  }

  flush(): Promise<void> {
    return this.sink.flush()
  }

  async rewind(): Promise<void> {
    throw new UnsupportedOperationError('rewind', 'a Node stream')
  }

  /** End the writable side, then tear the stream down. */
  async close(): Promise<void> {
    try {
      await this.sink.close()
    } finally {
      this.duplex.destroy()
    }
  }
}
