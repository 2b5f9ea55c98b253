/**
 * User-facing frame preferences and their translation into the engine's
 * preference structure.
 *
 * @module
 */
import {
  type BlockSizeId,
  DEFAULT_ENGINE_PREFERENCES,
  type EnginePreferences
} from '@lz4-stream/engine'

export const BLOCK_SIZES = ['default', '64KB', '256KB', '1MB', '4MB'] as const
export type BlockSize = (typeof BLOCK_SIZES)[number]

export const COMPRESSION_LEVEL_NAMES = ['fast', 'min', 'default', 'optMin', 'max'] as const
export type CompressionLevelName = (typeof COMPRESSION_LEVEL_NAMES)[number]

/** A named level, or the engine's numeric scale directly. */
export type CompressionLevel = CompressionLevelName | number

export interface FramePreferences {
  blockSize: BlockSize
  /** Blocks may reference data of earlier blocks. */
  blockLinked: boolean
  /** Append a content checksum to each frame. */
  checksum: boolean
  compressionLevel: CompressionLevel
  /** Emit every write's trailing partial block at once. */
  autoFlush: boolean
  favorDecompressionSpeed: boolean
  /** Append a checksum to every block. */
  blockChecksum: boolean
  /** Declared uncompressed size of each frame; 0 leaves it undeclared. */
  contentSize: number
}

export const DEFAULT_FRAME_PREFERENCES: Readonly<FramePreferences> = {
  blockSize: 'default',
  blockLinked: true,
  checksum: false,
  compressionLevel: 'fast',
  autoFlush: false,
  favorDecompressionSpeed: false,
  blockChecksum: false,
  contentSize: 0
}

export const BLOCK_SIZE_IDS: Readonly<Record<BlockSize, BlockSizeId>> = {
  default: 0,
  '64KB': 4,
  '256KB': 5,
  '1MB': 6,
  '4MB': 7
}

export const COMPRESSION_LEVELS: Readonly<Record<CompressionLevelName, number>> = {
  fast: 0,
  min: 3,
  default: 9,
  optMin: 10,
  max: 12
}

export function compressionLevelValue(level: CompressionLevel): number {
  return typeof level === 'number' ? level : COMPRESSION_LEVELS[level]
}

/**
 * Translate preferences into the engine representation. Missing fields take
 * {@link DEFAULT_FRAME_PREFERENCES}.
 */
export function toEnginePreferences(prefs: Partial<FramePreferences> = {}): EnginePreferences {
  const p: FramePreferences = { ...DEFAULT_FRAME_PREFERENCES, ...prefs }

  return {
    frameInfo: {
      ...DEFAULT_ENGINE_PREFERENCES.frameInfo,
      blockSizeId: BLOCK_SIZE_IDS[p.blockSize],
      blockMode: p.blockLinked ? 'linked' : 'independent',
      contentChecksum: p.checksum,
      blockChecksum: p.blockChecksum,
      contentSize: p.contentSize,
      dictId: 0,
      frameType: 'frame'
    },
    compressionLevel: compressionLevelValue(p.compressionLevel),
    autoFlush: p.autoFlush,
    favorDecSpeed: p.favorDecompressionSpeed
  }
}
