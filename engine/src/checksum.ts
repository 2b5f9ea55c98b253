/**
 * xxHash-32 checksums used by the frame format.
 *
 * The hash itself comes from `xxhash-wasm`, whose WebAssembly module has to
 * be instantiated once before use; {@link loadChecksum} does that and hands
 * back a synchronous API so that context calls stay synchronous.
 *
 * @module
 */
import xxhash from 'xxhash-wasm'

/**
 * Incremental xxHash-32 state for content checksums.
 */
export interface StreamingChecksum {
  update(data: Uint8Array): void
  digest(): number
}

export interface Checksum {
  /** One-shot xxHash-32 with seed 0. */
  hash32(data: Uint8Array): number
  /** Incremental xxHash-32 with seed 0. */
  create32(): StreamingChecksum
}

let loading: Promise<Checksum> | null = null

/**
 * Instantiate the hash module. Memoised: every caller shares one instance.
 */
export function loadChecksum(): Promise<Checksum> {
  if (loading === null) {
    loading = xxhash().then((api): Checksum => ({
      hash32: (data) => api.h32Raw(data, 0) >>> 0,
      create32: () => {
        const state = api.create32(0)
        return {
          update: (data) => {
            state.update(data)
          },
          digest: () => state.digest() >>> 0
        }
      }
    }))
  }
  return loading
}
