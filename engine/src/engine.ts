/**
 * Codec engine: the capability set adapters drive.
 *
 * Contexts are plain objects owned by whoever created them. The engine
 * keeps no per-context registry; freeing a context only invalidates that
 * context.
 *
 * @module
 */
import { type BlockCodec, createBlockCodec } from './block-codec.js'
import { compressBound } from './bound.js'
import { type Checksum, loadChecksum } from './checksum.js'
import { type CompressionContext, FrameCompressionContext } from './compression-context.js'
import { type DecompressionContext, FrameDecompressionContext } from './decompression-context.js'
import { errorName, isError } from './errors.js'
import type { EnginePreferences } from './preferences.js'

export interface CodecEngine {
  createCompressionContext(): CompressionContext
  createDecompressionContext(): DecompressionContext
  /** Destination capacity that always fits one update of `srcSize` bytes, a flush, or an end. */
  compressBound(srcSize: number, prefs: EnginePreferences): number
  isError(code: number): boolean
  errorName(code: number): string
}

/**
 * LZ4 frame engine over a block codec and an xxHash-32 implementation.
 */
export class Lz4FrameEngine implements CodecEngine {
  constructor(
    private readonly checksum: Checksum,
    private readonly createCodec: () => BlockCodec = createBlockCodec
  ) {}

  createCompressionContext(): CompressionContext {
    return new FrameCompressionContext(this.createCodec(), this.checksum)
  }

  createDecompressionContext(): DecompressionContext {
    return new FrameDecompressionContext(this.createCodec(), this.checksum)
  }

  compressBound(srcSize: number, prefs: EnginePreferences): number {
    return compressBound(srcSize, prefs)
  }

  isError(code: number): boolean {
    return isError(code)
  }

  errorName(code: number): string {
    return errorName(code)
  }
}

let defaultEngine: Promise<CodecEngine> | null = null

/**
 * Create an LZ4 frame engine. Resolves once the checksum module is ready.
 */
export async function createLz4Engine(): Promise<CodecEngine> {
  return new Lz4FrameEngine(await loadChecksum())
}

/**
 * Shared engine instance for callers that do not bring their own.
 */
export function getDefaultEngine(): Promise<CodecEngine> {
  if (defaultEngine === null) {
    defaultEngine = createLz4Engine()
  }
  return defaultEngine
}
