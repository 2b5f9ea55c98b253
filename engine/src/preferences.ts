/**
 * Engine-side frame preferences.
 *
 * This is the representation the contexts consume. User-facing knobs are
 * translated into it by the adapter layer; the engine only validates.
 *
 * @module
 */

/**
 * Block maximum size identifiers as written in the frame descriptor.
 * `0` selects the default (64 KiB) and is written as `4`.
 */
export type BlockSizeId = 0 | 4 | 5 | 6 | 7

export type BlockMode = 'linked' | 'independent'

export interface FrameInfo {
  readonly blockSizeId: BlockSizeId
  readonly blockMode: BlockMode
  readonly contentChecksum: boolean
  readonly blockChecksum: boolean
  /** Declared uncompressed size; 0 leaves it out of the header. */
  readonly contentSize: number
  /** Dictionary id; 0 leaves it out of the header. */
  readonly dictId: number
  readonly frameType: 'frame'
}

export interface EnginePreferences {
  readonly frameInfo: FrameInfo
  readonly compressionLevel: number
  readonly autoFlush: boolean
  readonly favorDecSpeed: boolean
}

/** Highest level the reference library accepts; higher values clamp to it. */
export const MAX_COMPRESSION_LEVEL = 12

export const DEFAULT_ENGINE_PREFERENCES: EnginePreferences = {
  frameInfo: {
    blockSizeId: 0,
    blockMode: 'linked',
    contentChecksum: false,
    blockChecksum: false,
    contentSize: 0,
    dictId: 0,
    frameType: 'frame'
  },
  compressionLevel: 0,
  autoFlush: false,
  favorDecSpeed: false
}

const BLOCK_SIZES: Record<Exclude<BlockSizeId, 0>, number> = {
  4: 64 * 1024,
  5: 256 * 1024,
  6: 1024 * 1024,
  7: 4 * 1024 * 1024
}

/**
 * Block size id as stored in the BD byte.
 */
export function effectiveBlockSizeId(id: BlockSizeId): Exclude<BlockSizeId, 0> {
  return id === 0 ? 4 : id
}

/**
 * Maximum uncompressed bytes per block for a block size id.
 */
export function blockSizeBytes(id: BlockSizeId): number {
  return BLOCK_SIZES[effectiveBlockSizeId(id)]
}

export function isBlockSizeId(value: number): value is BlockSizeId {
  return value === 0 || (value >= 4 && value <= 7 && Number.isInteger(value))
}
