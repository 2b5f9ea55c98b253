/**
 * Exclusive owner of one engine context.
 *
 * The context never leaves the handle's owner; `release` frees it exactly
 * once no matter how many exit paths call it.
 *
 * @module
 */
import type { Logger } from 'pino'
import { StreamClosedError } from '../errors.js'

export interface EngineContext {
  reset(): void
  free(): void
}

export class ContextHandle<T extends EngineContext> {
  private context: T | null

  constructor(
    context: T,
    private readonly kind: 'compression' | 'decompression',
    private readonly logger: Logger
  ) {
    this.context = context
  }

  get released(): boolean {
    return this.context === null
  }

  /**
   * The live context.
   * @throws StreamClosedError once released
   */
  get(): T {
    if (this.context === null) throw new StreamClosedError('destroyed')
    return this.context
  }

  reset(): void {
    this.get().reset()
  }

  /** Free the context. Later calls are no-ops. */
  release(): void {
    if (this.context === null) return
    const context = this.context
    this.context = null
    context.free()
    this.logger.debug({ kind: this.kind }, 'context released')
  }
}
