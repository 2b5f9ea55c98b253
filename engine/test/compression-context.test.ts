import { beforeAll, describe, expect, it } from 'vitest'
import { loadChecksum } from '../src/checksum.js'
import { type CodecEngine, createLz4Engine } from '../src/engine.js'
import { errorCode } from '../src/errors.js'
import { readU32 } from '../src/frame-format.js'
import { bytes, makePrefs } from './_harness/index.js'

let engine: CodecEngine

beforeAll(async () => {
  engine = await createLz4Engine()
})

function scratch(prefs = makePrefs()): Uint8Array {
  return new Uint8Array(engine.compressBound(64 * 1024, prefs) + 19)
}

describe('FrameCompressionContext', () => {
  describe('begin', () => {
    it('writes a 7-byte header for default preferences', () => {
      const ctx = engine.createCompressionContext()
      const dst = scratch()

      expect(ctx.begin(dst, makePrefs())).toBe(7)
      expect([...dst.subarray(0, 6)]).toEqual([0x04, 0x22, 0x4d, 0x18, 0x40, 0x40])
    })

    it('fails when the header does not fit', () => {
      const ctx = engine.createCompressionContext()
      expect(ctx.begin(new Uint8Array(6), makePrefs())).toBe(errorCode('ERROR_dstMaxSize_tooSmall'))
    })

    it('rejects a non-integer compression level', () => {
      const ctx = engine.createCompressionContext()
      expect(ctx.begin(scratch(), makePrefs({}, { compressionLevel: 1.5 }))).toBe(
        errorCode('ERROR_compressionLevel_invalid')
      )
    })

    it('rejects a negative content size', () => {
      const ctx = engine.createCompressionContext()
      expect(ctx.begin(scratch(), makePrefs({ contentSize: -1 }))).toBe(
        errorCode('ERROR_parameter_invalid')
      )
    })
  })

  describe('update', () => {
    it('buffers input smaller than a block', () => {
      const ctx = engine.createCompressionContext()
      const dst = scratch()
      ctx.begin(dst, makePrefs())

      expect(ctx.update(dst, bytes('hello'))).toBe(0)
    })

    it('emits small input at once under autoFlush', () => {
      const prefs = makePrefs({}, { autoFlush: true })
      const ctx = engine.createCompressionContext()
      const dst = scratch(prefs)
      ctx.begin(dst, prefs)

      const n = ctx.update(dst, bytes('hello'))

      expect(n).toBe(9)
      expect(readU32(dst, 0)).toBe(0x80000005)
      expect(new TextDecoder().decode(dst.subarray(4, 9))).toBe('hello')
    })

    it('emits a block once a full block has arrived', () => {
      const ctx = engine.createCompressionContext()
      const dst = scratch()
      ctx.begin(dst, makePrefs())

      const n = ctx.update(dst, new Uint8Array(64 * 1024).fill(7))
      const header = readU32(dst, 0)

      expect(header & 0x80000000).toBe(0)
      expect(n).toBe(4 + header)
      expect(header).toBeLessThan(64 * 1024)
    })

    it('produces the same bytes with and without stableSrc', () => {
      const data = new Uint8Array(3 * 64 * 1024)
      for (let i = 0; i < data.length; i++) data[i] = (i * 31) % 251

      const run = (stableSrc: boolean): number[] => {
        const ctx = engine.createCompressionContext()
        const dst = new Uint8Array(engine.compressBound(data.length, makePrefs()) + 19)
        ctx.begin(dst, makePrefs())
        const n = ctx.update(dst, data, { stableSrc })
        return [...dst.subarray(0, n)]
      }

      expect(run(true)).toEqual(run(false))
    })

    it('fails when dst is smaller than the bound', () => {
      const ctx = engine.createCompressionContext()
      ctx.begin(scratch(), makePrefs())

      expect(ctx.update(new Uint8Array(8), new Uint8Array(64 * 1024))).toBe(
        errorCode('ERROR_dstMaxSize_tooSmall')
      )
    })

    it('fails before begin', () => {
      const ctx = engine.createCompressionContext()
      expect(ctx.update(scratch(), bytes('x'))).toBe(
        errorCode('ERROR_compressionState_uninitialized')
      )
    })
  })

  describe('flush', () => {
    it('emits the buffered partial block', () => {
      const ctx = engine.createCompressionContext()
      const dst = scratch()
      ctx.begin(dst, makePrefs())
      ctx.update(dst, bytes('hello'))

      const n = ctx.flush(dst)

      expect(n).toBe(9)
      expect([...dst.subarray(0, 9)]).toEqual([0x05, 0, 0, 0x80, 0x68, 0x65, 0x6c, 0x6c, 0x6f])
    })

    it('returns 0 when nothing is buffered', () => {
      const ctx = engine.createCompressionContext()
      const dst = scratch()
      ctx.begin(dst, makePrefs())

      expect(ctx.flush(dst)).toBe(0)
    })

    it('appends a block checksum', async () => {
      const checksum = await loadChecksum()
      const prefs = makePrefs({ blockChecksum: true })
      const ctx = engine.createCompressionContext()
      const dst = scratch(prefs)
      ctx.begin(dst, prefs)
      ctx.update(dst, bytes('hello'))

      const n = ctx.flush(dst)

      expect(n).toBe(13)
      expect(readU32(dst, 9)).toBe(checksum.hash32(bytes('hello')))
    })
  })

  describe('end', () => {
    it('writes the end mark', () => {
      const ctx = engine.createCompressionContext()
      const dst = scratch()
      ctx.begin(dst, makePrefs())

      expect(ctx.end(dst)).toBe(4)
      expect([...dst.subarray(0, 4)]).toEqual([0, 0, 0, 0])
    })

    it('writes an empty frame with a content checksum', () => {
      const prefs = makePrefs({ blockMode: 'independent', contentChecksum: true })
      const ctx = engine.createCompressionContext()
      const dst = scratch(prefs)

      const header = [...dst.subarray(0, ctx.begin(dst, prefs))]
      const tail = [...dst.subarray(0, ctx.end(dst))]

      expect([...header, ...tail]).toEqual([
        0x04, 0x22, 0x4d, 0x18, 0x64, 0x40, 0xa7, 0, 0, 0, 0, 0x05, 0x5d, 0xcc, 0x02
      ])
    })

    it('flushes buffered input before the end mark', () => {
      const ctx = engine.createCompressionContext()
      const dst = scratch()
      ctx.begin(dst, makePrefs())
      ctx.update(dst, bytes('hello'))

      expect(ctx.end(dst)).toBe(13)
      expect(readU32(dst, 9)).toBe(0)
    })

    it('allows a new frame afterwards', () => {
      const ctx = engine.createCompressionContext()
      const dst = scratch()
      ctx.begin(dst, makePrefs())
      ctx.end(dst)

      expect(ctx.begin(dst, makePrefs())).toBe(7)
    })

    it('reports a declared content size that was not met', () => {
      const prefs = makePrefs({ contentSize: 10 })
      const ctx = engine.createCompressionContext()
      const dst = scratch(prefs)
      ctx.begin(dst, prefs)
      ctx.update(dst, bytes('hello'))

      expect(ctx.end(dst)).toBe(errorCode('ERROR_frameSize_wrong'))
    })
  })

  describe('reset and free', () => {
    it('drops buffered input on reset', () => {
      const ctx = engine.createCompressionContext()
      const dst = scratch()
      ctx.begin(dst, makePrefs())
      ctx.update(dst, bytes('hello'))
      ctx.reset()

      expect(ctx.flush(dst)).toBe(errorCode('ERROR_compressionState_uninitialized'))
      ctx.begin(dst, makePrefs())
      expect(ctx.flush(dst)).toBe(0)
    })

    it('fails every call after free', () => {
      const ctx = engine.createCompressionContext()
      const dst = scratch()
      ctx.free()

      expect(ctx.begin(dst, makePrefs())).toBe(errorCode('ERROR_compressionState_uninitialized'))
      expect(ctx.end(dst)).toBe(errorCode('ERROR_compressionState_uninitialized'))
    })
  })
})
