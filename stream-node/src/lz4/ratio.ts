/**
 * Uncompressed over compressed bytes; 0 until something was compressed.
 */
export function compressionRatio(uncompressed: number, compressed: number): number {
  return compressed === 0 ? 0 : uncompressed / compressed
}
