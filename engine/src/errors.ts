/**
 * Engine result codes.
 *
 * Every context operation returns a plain number: a non-negative value is a
 * byte count (or, for decompression, the next-input-size hint), a negative
 * value is an error code. Callers test with {@link isError} and describe the
 * failure with {@link errorName}; the engine itself never throws.
 *
 * Names follow the reference LZ4 frame library so that messages read the
 * same whichever engine produced them.
 *
 * @module
 */

/**
 * Error names, indexed by the magnitude of their code.
 * Index 0 is the no-error slot and is never returned as an error.
 */
const ERROR_NAMES = [
  'OK_NoError',
  'ERROR_GENERIC',
  'ERROR_maxBlockSize_invalid',
  'ERROR_blockMode_invalid',
  'ERROR_parameter_invalid',
  'ERROR_compressionLevel_invalid',
  'ERROR_headerVersion_wrong',
  'ERROR_blockChecksum_invalid',
  'ERROR_reservedFlag_set',
  'ERROR_allocation_failed',
  'ERROR_srcSize_tooLarge',
  'ERROR_dstMaxSize_tooSmall',
  'ERROR_frameHeader_incomplete',
  'ERROR_frameType_unknown',
  'ERROR_frameSize_wrong',
  'ERROR_srcPtr_wrong',
  'ERROR_decompressionFailed',
  'ERROR_headerChecksum_invalid',
  'ERROR_contentChecksum_invalid',
  'ERROR_frameDecoding_alreadyStarted',
  'ERROR_compressionState_uninitialized',
  'ERROR_parameter_null'
] as const

export type ErrorName = Exclude<(typeof ERROR_NAMES)[number], 'OK_NoError'>

/**
 * Result code for a given error name.
 */
export function errorCode(name: ErrorName): number {
  return -ERROR_NAMES.indexOf(name)
}

/**
 * True when `code` signals a failure rather than a size or hint.
 */
export function isError(code: number): boolean {
  return code < 0
}

/**
 * Name of the failure behind `code`; `'Unspecified error code'` for values
 * the engine never produces.
 */
export function errorName(code: number): string {
  if (!isError(code)) {
    return ERROR_NAMES[0]
  }
  return ERROR_NAMES[-code] ?? 'Unspecified error code'
}
