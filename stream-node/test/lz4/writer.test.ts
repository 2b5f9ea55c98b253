import { mkdtemp, readFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { Readable } from 'node:stream'
import { pipeline } from 'node:stream/promises'
import { type CodecEngine, createLz4Engine } from '@lz4-stream/engine'
import { beforeAll, describe, expect, it } from 'vitest'
import { Lz4EncodeError, StreamClosedError } from '../../src/errors.js'
import { MemoryStream } from '../../src/io/memory-stream.js'
import { Lz4Reader } from '../../src/lz4/reader.js'
import { Lz4Writer, resolvePreferences } from '../../src/lz4/writer.js'
import { bytes, CountingEngine, FailingSink, FlakySink } from '../_harness/index.js'

let engine: CodecEngine

beforeAll(async () => {
  engine = await createLz4Engine()
})

async function decode(data: Uint8Array): Promise<string> {
  const reader = new Lz4Reader(new MemoryStream(data), { engine })
  return (await reader.readToEnd()).toString()
}

describe('Lz4Writer', () => {
  describe('frame layout', () => {
    it('writes the header once, on the first write', async () => {
      const memory = new MemoryStream()
      const writer = new Lz4Writer(memory, { engine })

      await writer.write(bytes('a'))
      await writer.write(bytes('b'))

      // both writes are still buffered in the open block
      expect(memory.length).toBe(7)
      expect(writer.compressedBytesOut).toBe(7)
      expect(writer.uncompressedBytesOut).toBe(2)
    })

    it('emits a decodable empty frame when closed without writes', async () => {
      const memory = new MemoryStream()
      const writer = new Lz4Writer(memory, { engine })

      await writer.close()

      expect(memory.length).toBe(11)
      expect(Array.from(memory.toUint8Array().subarray(0, 4))).toEqual([0x04, 0x22, 0x4d, 0x18])
      expect(Array.from(memory.toUint8Array().subarray(7))).toEqual([0, 0, 0, 0])
      expect(await decode(memory.toUint8Array())).toBe('')
    })

    it('appends a content checksum when asked to', async () => {
      const memory = new MemoryStream()
      const writer = new Lz4Writer(memory, { engine, preferences: { checksum: true } })

      await writer.close()

      expect(memory.length).toBe(15)
    })

    it('flushes buffered input as a block without ending the frame', async () => {
      const memory = new MemoryStream()
      const writer = new Lz4Writer(memory, { engine })

      await writer.write(bytes('hello'))
      await writer.flush()

      expect(memory.length).toBe(16)
      // raw block: size with the high bit set, then the bytes themselves
      expect(Array.from(memory.toUint8Array().subarray(7, 11))).toEqual([5, 0, 0, 0x80])

      await writer.close()
      expect(memory.length).toBe(20)
      expect(await decode(memory.toUint8Array())).toBe('hello')
    })
  })

  describe('counters', () => {
    it('start at zero with a ratio of 0', () => {
      const writer = new Lz4Writer(new MemoryStream(), { engine })

      expect(writer.compressedBytesOut).toBe(0)
      expect(writer.uncompressedBytesOut).toBe(0)
      expect(writer.compressionRatio).toBe(0)
    })

    it('track both sides of a finished frame', async () => {
      const writer = new Lz4Writer(new MemoryStream(), { engine })

      await writer.write(bytes('hello'))
      await writer.close()

      expect(writer.uncompressedBytesOut).toBe(5)
      expect(writer.compressedBytesOut).toBe(20)
      expect(writer.compressionRatio).toBe(0.25)
    })
  })

  describe('close', () => {
    it('starts a new frame on the next write when the sink is not owned', async () => {
      const memory = new MemoryStream()
      const writer = new Lz4Writer(memory, { engine })

      await writer.write(bytes('A'))
      await writer.close()
      await writer.write(bytes('B'))
      await writer.close()

      expect(writer.isClosed).toBe(false)
      expect(memory.isClosed).toBe(false)
      expect(memory.length).toBe(32)
      expect(await decode(memory.toUint8Array())).toBe('AB')
    })

    it('closes an owned sink and refuses further writes', async () => {
      const memory = new MemoryStream()
      const writer = new Lz4Writer(memory, { engine, syncClose: true })

      await writer.write(bytes('done'))
      await writer.close()

      expect(writer.isClosed).toBe(true)
      expect(memory.isClosed).toBe(true)
      await expect(writer.write(bytes('more'))).rejects.toThrow(StreamClosedError)
      await expect(writer.close()).rejects.toThrow('Stream unavailable: closed')
      expect(await decode(memory.toUint8Array())).toBe('done')
    })

    it('releases the context once even when the sink fails', async () => {
      const counting = new CountingEngine(engine)
      const sink = new FailingSink(new Error('disk full'))
      const writer = new Lz4Writer(sink, { engine: counting, syncClose: true })

      await expect(writer.close()).rejects.toThrow('disk full')
      writer.destroy()

      expect(sink.closed).toBe(true)
      expect(writer.isClosed).toBe(true)
      expect(counting.compressionFrees).toBe(1)
    })
  })

  describe('rewind', () => {
    it('overwrites the sink from its start', async () => {
      const memory = new MemoryStream()
      const writer = new Lz4Writer(memory, { engine })

      await writer.write(bytes('first'))
      await writer.rewind()
      expect(writer.compressedBytesOut).toBe(0)
      expect(writer.uncompressedBytesOut).toBe(0)

      await writer.write(bytes('again'))
      await writer.close()

      expect(memory.length).toBe(20)
      expect(writer.compressedBytesOut).toBe(20)
      expect(await decode(memory.toUint8Array())).toBe('again')
    })

    it('leaves the tail of a longer earlier frame in place', async () => {
      const memory = new MemoryStream()
      const writer = new Lz4Writer(memory, { engine })

      await writer.write(bytes('first frame'))
      await writer.rewind()
      await writer.write(bytes('b'))
      await writer.close()

      // 16 bytes of the new frame over the 26 bytes of the old one
      expect(writer.compressedBytesOut).toBe(16)
      expect(memory.length).toBe(26)
      expect(new TextDecoder().decode(memory.toUint8Array().subarray(16, 22))).toBe(' frame')

      const reader = new Lz4Reader(new MemoryStream(memory.toUint8Array()), { engine })
      const dest = new Uint8Array(64)
      expect(await reader.read(dest)).toBe(1)
      expect(dest[0]).toBe(0x62)
      await expect(reader.read(dest)).rejects.toMatchObject({
        name: 'Lz4DecodeError',
        errorName: 'ERROR_frameType_unknown'
      })
    })
  })

  describe('errors', () => {
    it('cannot be read from', () => {
      const writer = new Lz4Writer(new MemoryStream(), { engine })

      expect(() => writer.read(new Uint8Array(1))).toThrow("Can't read from Lz4Writer")
    })

    it('reports invalid preferences when the frame starts', async () => {
      const writer = new Lz4Writer(new MemoryStream(), {
        engine,
        preferences: { compressionLevel: 1.5 }
      })

      const error = await writer.write(bytes('x')).catch((err: unknown) => err)

      expect(error).toBeInstanceOf(Lz4EncodeError)
      expect(error).toMatchObject({
        message: 'Failed to begin compression: ERROR_compressionLevel_invalid',
        operation: 'begin'
      })
    })

    it('propagates sink failures unchanged', async () => {
      const failure = new Error('disk full')
      const writer = new Lz4Writer(new FailingSink(failure), { engine })

      await expect(writer.write(bytes('x'))).rejects.toBe(failure)
    })

    it('writes the header again after the sink rejected it', async () => {
      const sink = new FlakySink(1)
      const writer = new Lz4Writer(sink, { engine })

      await expect(writer.write(bytes('retry'))).rejects.toThrow('temporarily unavailable')
      expect(writer.compressedBytesOut).toBe(0)
      expect(writer.uncompressedBytesOut).toBe(0)

      await writer.write(bytes('retry'))
      await writer.close()

      const output = sink.memory.toUint8Array()
      expect(output).toHaveLength(20)
      expect(Array.from(output.subarray(0, 4))).toEqual([0x04, 0x22, 0x4d, 0x18])
      expect(await decode(output)).toBe('retry')
    })
  })

  describe('toWritable', () => {
    it('compresses a piped stream and ends the frame on finish', async () => {
      const memory = new MemoryStream()
      const writer = new Lz4Writer(memory, { engine })

      await pipeline(
        Readable.from([Buffer.from('piped '), Buffer.from('data')]),
        writer.toWritable()
      )

      expect(await decode(memory.toUint8Array())).toBe('piped data')
    })
  })

  describe('open', () => {
    it('creates a file it owns', async () => {
      const dir = await mkdtemp(join(tmpdir(), 'lz4-writer-'))
      try {
        const path = join(dir, 'out.lz4')
        const writer = await Lz4Writer.open(path, { engine })
        expect(writer.syncClose).toBe(true)

        await writer.write(bytes('on disk'))
        await writer.close()

        expect(writer.isClosed).toBe(true)
        expect(await decode(new Uint8Array(await readFile(path)))).toBe('on disk')
      } finally {
        await rm(dir, { recursive: true, force: true })
      }
    })
  })
})

describe('resolvePreferences', () => {
  it('fills unset fields from the configured defaults', () => {
    expect(resolvePreferences({ blockLinked: false })).toEqual({
      blockSize: 'default',
      compressionLevel: 'fast',
      checksum: false,
      blockLinked: false
    })
  })

  it('lets explicit fields win', () => {
    expect(resolvePreferences({ checksum: true, blockSize: '4MB' })).toMatchObject({
      checksum: true,
      blockSize: '4MB'
    })
  })
})
