import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { type CodecEngine, createLz4Engine } from '@lz4-stream/engine'
import { beforeAll, describe, expect, it } from 'vitest'
import {
  Lz4DecodeError,
  StreamClosedError,
  UnsupportedOperationError
} from '../../src/errors.js'
import { MemoryStream } from '../../src/io/memory-stream.js'
import { Lz4Reader } from '../../src/lz4/reader.js'
import { Lz4Writer } from '../../src/lz4/writer.js'
import {
  bytes,
  ChunkedSource,
  CountingEngine,
  ScriptedDecompression,
  scriptedEngine
} from '../_harness/index.js'

let engine: CodecEngine

beforeAll(async () => {
  engine = await createLz4Engine()
})

/** Compress `text` into a fresh memory stream, rewound for reading. */
async function compressed(...frames: string[]): Promise<MemoryStream> {
  const memory = new MemoryStream()
  const writer = new Lz4Writer(memory, { engine })
  for (const text of frames) {
    await writer.write(bytes(text))
    await writer.close()
  }
  await memory.rewind()
  return memory
}

describe('Lz4Reader', () => {
  describe('hint-driven read loop', () => {
    it('returns 0 for an empty destination without calling the engine', async () => {
      const ctx = new ScriptedDecompression([])
      const reader = new Lz4Reader(new ChunkedSource([]), { engine: scriptedEngine(ctx) })

      expect(await reader.read(new Uint8Array(0))).toBe(0)
      expect(ctx.calls).toEqual([])
    })

    it('refills mid-call when the hint exceeds buffered input', async () => {
      const ctx = new ScriptedDecompression([
        { consume: 0, code: 8 },
        { consume: 3, code: 5 },
        { consume: 5, produce: 4, code: 0 }
      ])
      const source = new ChunkedSource([new Uint8Array(3), new Uint8Array(5)])
      const reader = new Lz4Reader(source, { engine: scriptedEngine(ctx) })

      expect(await reader.read(new Uint8Array(10))).toBe(4)
      expect(ctx.calls).toEqual([
        { dst: 10, src: 0 },
        { dst: 10, src: 3 },
        { dst: 10, src: 5 }
      ])
      expect(source.reads).toBe(2)
      expect(reader.compressedBytesIn).toBe(8)
      expect(reader.uncompressedBytesIn).toBe(4)
    })

    it('never offers more input than the hint asks for', async () => {
      const ctx = new ScriptedDecompression([
        { consume: 0, code: 4 },
        { consume: 4, produce: 2, code: 6 },
        { consume: 6, produce: 3, code: 0 }
      ])
      const source = new ChunkedSource([new Uint8Array(10)])
      const reader = new Lz4Reader(source, { engine: scriptedEngine(ctx) })

      expect(await reader.read(new Uint8Array(10))).toBe(5)
      expect(ctx.calls.map((call) => call.src)).toEqual([0, 4, 6])
      expect(ctx.calls.map((call) => call.dst)).toEqual([10, 8, 8])
      expect(source.reads).toBe(1)
    })

    it('stops when the destination is full', async () => {
      const ctx = new ScriptedDecompression([
        { consume: 0, code: 7 },
        { consume: 6, produce: 2, code: 9 }
      ])
      const source = new ChunkedSource([new Uint8Array(6)])
      const reader = new Lz4Reader(source, { engine: scriptedEngine(ctx) })

      expect(await reader.read(new Uint8Array(2))).toBe(2)
      expect(source.reads).toBe(1)
    })

    it('stops when the source is exhausted', async () => {
      const ctx = new ScriptedDecompression([{ consume: 0, code: 7 }])
      const source = new ChunkedSource([])
      const reader = new Lz4Reader(source, { engine: scriptedEngine(ctx) })

      expect(await reader.read(new Uint8Array(8))).toBe(0)
      expect(source.reads).toBe(1)
    })

    it('surfaces engine errors with their name', async () => {
      const ctx = new ScriptedDecompression([{ consume: 0, code: -13 }])
      const reader = new Lz4Reader(new ChunkedSource([]), { engine: scriptedEngine(ctx) })

      const error = await reader.read(new Uint8Array(8)).catch((err: unknown) => err)

      expect(error).toBeInstanceOf(Lz4DecodeError)
      expect(error).toMatchObject({
        message: 'Failed to decompress: ERROR_frameType_unknown',
        errorName: 'ERROR_frameType_unknown',
        code: -13
      })
    })
  })

  describe('decoding', () => {
    it('reads a frame back', async () => {
      const reader = new Lz4Reader(await compressed('hello'), { engine })

      expect((await reader.readToEnd()).toString()).toBe('hello')
    })

    it('reads consecutive frames', async () => {
      const reader = new Lz4Reader(await compressed('first ', 'second'), { engine })

      expect((await reader.readToEnd()).toString()).toBe('first second')
    })

    it('reads into a destination smaller than a block', async () => {
      const reader = new Lz4Reader(await compressed('abcdefghij'), { engine })
      const dest = new Uint8Array(3)
      const parts: string[] = []

      for (;;) {
        const n = await reader.read(dest)
        if (n === 0) break
        parts.push(new TextDecoder().decode(dest.subarray(0, n)))
      }

      expect(parts).toEqual(['abc', 'def', 'ghi', 'j'])
    })

    it('iterates decoded chunks', async () => {
      const reader = new Lz4Reader(await compressed('one', 'two'), { engine })
      const chunks: string[] = []

      for await (const chunk of reader) {
        chunks.push(new TextDecoder().decode(chunk))
      }

      expect(chunks.join('')).toBe('onetwo')
    })

    it('exposes a Node Readable', async () => {
      const reader = new Lz4Reader(await compressed('streamed'), { engine })
      const chunks: Buffer[] = []

      for await (const chunk of reader.toReadable()) {
        if (Buffer.isBuffer(chunk)) chunks.push(chunk)
      }

      expect(Buffer.concat(chunks).toString()).toBe('streamed')
    })

    it('fails on a corrupted magic number', async () => {
      const memory = await compressed('hello')
      const data = memory.toUint8Array()
      data[0] ^= 0xff
      const reader = new Lz4Reader(new MemoryStream(data), { engine })

      await expect(reader.readToEnd()).rejects.toMatchObject({
        name: 'Lz4DecodeError',
        errorName: 'ERROR_frameType_unknown'
      })
    })
  })

  describe('counters', () => {
    it('start at zero with a ratio of 0', () => {
      const reader = new Lz4Reader(new MemoryStream(), { engine })

      expect(reader.compressedBytesIn).toBe(0)
      expect(reader.uncompressedBytesIn).toBe(0)
      expect(reader.compressionRatio).toBe(0)
    })

    it('count both sides of the stream', async () => {
      const memory = await compressed('hello')
      const reader = new Lz4Reader(memory, { engine })
      await reader.readToEnd()

      expect(reader.compressedBytesIn).toBe(20)
      expect(reader.uncompressedBytesIn).toBe(5)
      expect(reader.compressionRatio).toBe(5 / 20)
    })
  })

  describe('rewind', () => {
    it('reads from the top again with counters reset', async () => {
      const reader = new Lz4Reader(await compressed('again'), { engine })
      await reader.readToEnd()

      await reader.rewind()
      expect(reader.compressedBytesIn).toBe(0)
      expect(reader.uncompressedBytesIn).toBe(0)

      expect((await reader.readToEnd()).toString()).toBe('again')
    })

    it('resets rather than recreates the context', async () => {
      const ctx = new ScriptedDecompression([])
      const source = new ChunkedSource([])
      const reader = new Lz4Reader(source, { engine: scriptedEngine(ctx) })

      await reader.rewind()

      expect(source.rewinds).toBe(1)
      expect(ctx.resets).toBe(1)
      expect(ctx.frees).toBe(0)
    })
  })

  describe('misuse', () => {
    it('cannot be written to or flushed', () => {
      const reader = new Lz4Reader(new MemoryStream(), { engine })

      expect(() => reader.write(bytes('x'))).toThrow(UnsupportedOperationError)
      expect(() => reader.flush()).toThrow("Can't flush Lz4Reader")
    })

    it('rejects reads after close', async () => {
      const reader = new Lz4Reader(new MemoryStream(), { engine, syncClose: true })
      await reader.close()

      await expect(reader.read(new Uint8Array(1))).rejects.toBeInstanceOf(StreamClosedError)
    })
  })

  describe('close', () => {
    it('does nothing when the source is not owned', async () => {
      const memory = await compressed('still readable')
      const reader = new Lz4Reader(memory, { engine })
      await reader.close()

      expect(memory.isClosed).toBe(false)
      expect(reader.isClosed).toBe(false)
      expect((await reader.readToEnd()).toString()).toBe('still readable')
    })

    it('refuses reads after destroy when the source is not owned', async () => {
      const reader = new Lz4Reader(new MemoryStream(), { engine })
      await reader.close()
      reader.destroy()

      expect(reader.isClosed).toBe(true)
      await expect(reader.read(new Uint8Array(1))).rejects.toBeInstanceOf(StreamClosedError)
    })

    it('closes an owned source', async () => {
      const source = new ChunkedSource([])
      const reader = new Lz4Reader(source, { engine, syncClose: true })
      await reader.close()

      expect(source.closed).toBe(true)
    })

    it('releases the context exactly once', async () => {
      const counting = new CountingEngine(engine)
      const reader = new Lz4Reader(new MemoryStream(), { engine: counting, syncClose: true })

      await reader.close()
      await reader.close()
      reader.destroy()

      expect(counting.decompressionFrees).toBe(1)
    })

    it('releases the context when closing the source fails', async () => {
      const counting = new CountingEngine(engine)
      const source = new ChunkedSource([])
      source.close = async () => {
        throw new Error('close failed')
      }
      const reader = new Lz4Reader(source, { engine: counting, syncClose: true })

      await expect(reader.close()).rejects.toThrow('close failed')
      expect(counting.decompressionFrees).toBe(1)
    })
  })

  describe('files', () => {
    it('opens and owns a file', async () => {
      const dir = await mkdtemp(join(tmpdir(), 'lz4-reader-'))
      try {
        const path = join(dir, 'data.lz4')
        const writer = await Lz4Writer.open(path, { engine })
        await writer.write(bytes('from disk'))
        await writer.close()

        const reader = await Lz4Reader.open(path, { engine })
        expect(reader.syncClose).toBe(true)
        expect((await reader.readToEnd()).toString()).toBe('from disk')
        await reader.close()
      } finally {
        await rm(dir, { recursive: true, force: true })
      }
    })
  })

  describe('create', () => {
    it('uses the shared engine by default', async () => {
      const reader = await Lz4Reader.create(await compressed('shared'))

      expect((await reader.readToEnd()).toString()).toBe('shared')
    })
  })
})
