/**
 * File-backed byte transport over a `node:fs/promises` handle.
 *
 * The stream tracks its own position and passes it to every read and write,
 * so `rewind` is just a seek to 0.
 *
 * @module
 */
import { type FileHandle, open } from 'node:fs/promises'
import { StreamClosedError } from '../errors.js'
import { createLogger } from '../logger.js'
import type { ByteTransport } from './types.js'

const logger = createLogger('file-stream')

/** `r`: read; `w`: create or truncate for writing; `r+`/`w+`: both. */
export type FileStreamMode = 'r' | 'w' | 'r+' | 'w+'

export class FileStream implements ByteTransport {
  private position = 0
  private closed = false

  private constructor(
    private readonly handle: FileHandle,
    readonly path: string
  ) {}

  static async open(path: string, mode: FileStreamMode = 'r'): Promise<FileStream> {
    const handle = await open(path, mode)
    logger.debug({ path, mode }, 'file opened')
    return new FileStream(handle, path)
  }

  get isClosed(): boolean {
    return this.closed
  }

  async read(into: Uint8Array): Promise<number> {
    this.checkOpen()
    if (into.length === 0) return 0
    const { bytesRead } = await this.handle.read(into, 0, into.length, this.position)
    this.position += bytesRead
    return bytesRead
  }

  async write(data: Uint8Array): Promise<void> {
    this.checkOpen()
    let offset = 0
    while (offset < data.length) {
      const { bytesWritten } = await this.handle.write(
        data,
        offset,
        data.length - offset,
        this.position
      )
      offset += bytesWritten
      this.position += bytesWritten
    }
  }

  /** Writes go straight to the handle; nothing is buffered here. */
  async flush(): Promise<void> {
    this.checkOpen()
  }

  async rewind(): Promise<void> {
    this.checkOpen()
    this.position = 0
  }

  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true
    await this.handle.close()
    logger.debug({ path: this.path }, 'file closed')
  }

  private checkOpen(): void {
    if (this.closed) throw new StreamClosedError('closed')
  }
}
