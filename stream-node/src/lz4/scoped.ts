/**
 * Scoped use of an adapter: create it, hand it to a callback, and close it
 * on every exit path.
 *
 * @module
 */
import type { ByteSink, ByteSource } from '../io/types.js'
import { Lz4Reader, type Lz4ReaderCreateOptions } from './reader.js'
import { Lz4Writer, type Lz4WriterCreateOptions } from './writer.js'

/**
 * Run `fn` with a reader over `source` (a file path is opened and owned).
 *
 * @example
 * ```ts
 * const text = await withLz4Reader('notes.lz4', async (reader) =>
 *   (await reader.readToEnd()).toString('utf8')
 * )
 * ```
 */
export async function withLz4Reader<T>(
  source: ByteSource | string,
  fn: (reader: Lz4Reader) => Promise<T> | T,
  options: Lz4ReaderCreateOptions = {}
): Promise<T> {
  const reader =
    typeof source === 'string'
      ? await Lz4Reader.open(source, options)
      : await Lz4Reader.create(source, options)
  try {
    return await fn(reader)
  } finally {
    try {
      await reader.close()
    } finally {
      reader.destroy()
    }
  }
}

/**
 * Run `fn` with a writer over `sink` (a file path is created and owned);
 * the frame is ended afterwards unless `fn` already closed an owning writer.
 */
export async function withLz4Writer<T>(
  sink: ByteSink | string,
  fn: (writer: Lz4Writer) => Promise<T> | T,
  options: Lz4WriterCreateOptions = {}
): Promise<T> {
  const writer =
    typeof sink === 'string' ? await Lz4Writer.open(sink, options) : await Lz4Writer.create(sink, options)
  try {
    return await fn(writer)
  } finally {
    try {
      if (!writer.isClosed) {
        await writer.close()
      }
    } finally {
      writer.destroy()
    }
  }
}
