/**
 * Byte stream contracts the adapters read from and write to.
 *
 * @module
 */

export interface ByteSource {
  /**
   * Read up to `into.length` bytes into `into`.
   * @returns Bytes read; 0 at end of input
   */
  read(into: Uint8Array): Promise<number>
  /** Return to the start of the stream. */
  rewind(): Promise<void>
  close(): Promise<void>
}

export interface ByteSink {
  /**
   * Write all of `data`. The sink is done with `data` once the promise
   * settles; implementations that keep it copy it.
   */
  write(data: Uint8Array): Promise<void>
  flush(): Promise<void>
  /** Return to the start of the stream; later writes overwrite. */
  rewind(): Promise<void>
  close(): Promise<void>
}

/**
 * A bidirectional stream (socket, pipe pair, file opened for both).
 */
export interface ByteTransport extends ByteSource, ByteSink {}
