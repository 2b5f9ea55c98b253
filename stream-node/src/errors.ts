/**
 * Error classes for the LZ4 stream adapters.
 *
 * Three kinds of failure surface to callers:
 * - engine failures ({@link Lz4DecodeError}, {@link Lz4EncodeError}), carrying
 *   the engine's result code and error name
 * - misuse ({@link UnsupportedOperationError}, {@link StreamClosedError})
 * - failures of the wrapped stream, which propagate unchanged
 *
 * @module
 */

/**
 * A codec engine call returned an error code.
 */
export class Lz4Error extends Error {
  /** Raw engine result code (negative). */
  readonly code: number
  /** Engine error name, e.g. `ERROR_frameType_unknown`. */
  readonly errorName: string

  constructor(operation: string, code: number, errorName: string) {
    super(`${operation}: ${errorName}`)
    this.name = 'Lz4Error'
    this.code = code
    this.errorName = errorName
  }
}

/**
 * Decompression failed: corrupt, truncated-then-continued, or foreign input.
 */
export class Lz4DecodeError extends Lz4Error {
  constructor(code: number, errorName: string) {
    super('Failed to decompress', code, errorName)
    this.name = 'Lz4DecodeError'
  }
}

export type EncodeOperation = 'begin' | 'update' | 'flush' | 'end'

const ENCODE_MESSAGES: Record<EncodeOperation, string> = {
  begin: 'Failed to begin compression',
  update: 'Failed to compress',
  flush: 'Failed to flush',
  end: 'Failed to end frame'
}

/**
 * A compression step failed.
 */
export class Lz4EncodeError extends Lz4Error {
  readonly operation: EncodeOperation

  constructor(operation: EncodeOperation, code: number, errorName: string) {
    super(ENCODE_MESSAGES[operation], code, errorName)
    this.name = 'Lz4EncodeError'
    this.operation = operation
  }
}

/**
 * The adapter or the stream underneath it can no longer be used.
 */
export class StreamClosedError extends Error {
  constructor(reason: 'closed' | 'destroyed' | 'ended' | 'close' | 'finish') {
    super(`Stream unavailable: ${reason}`)
    this.name = 'StreamClosedError'
  }
}

/**
 * The operation is not part of this object's contract, e.g. writing to a
 * reader or rewinding a socket.
 */
export class UnsupportedOperationError extends Error {
  constructor(operation: string, target: string) {
    super(`Can't ${operation} ${target}`)
    this.name = 'UnsupportedOperationError'
  }
}

/**
 * An environment variable failed validation.
 */
export class ConfigError extends Error {
  readonly variable: string

  constructor(variable: string, detail: string, cause?: unknown) {
    super(`Invalid environment variable ${variable}: ${detail}`)
    this.name = 'ConfigError'
    this.variable = variable
    this.cause = cause
  }
}
