/**
 * Type declarations for the block-level API of lz4js.
 *
 * lz4js ships no type definitions. Only the raw block functions are
 * declared here; framing is done by this package.
 */

declare module 'lz4js' {
  /**
   * Worst-case compressed size of an `n`-byte block.
   */
  export function compressBound(n: number): number

  /**
   * Compress `src[sIndex, sIndex + sLength)` into `dst` starting at 0.
   *
   * @param hashTable 65536-entry match table, zeroed by the caller
   * @returns Bytes written to `dst`; 0 when the block is not worth compressing
   */
  export function compressBlock(
    src: Uint8Array,
    dst: Uint8Array,
    sIndex: number,
    sLength: number,
    hashTable: Uint32Array
  ): number

  /**
   * Decode the block at `src[sIndex, sIndex + sLength)` into `dst` starting at
   * `dIndex`. Matches may reach back before `dIndex` into earlier output.
   *
   * @returns Index in `dst` one past the last byte written
   */
  export function decompressBlock(
    src: Uint8Array,
    dst: Uint8Array,
    sIndex: number,
    sLength: number,
    dIndex: number
  ): number
}
