/**
 * Error Types
 *
 * SwitchyardError is the base for every error the library raises.
 * ConfigurationError is the single taxonomy for classification failures.
 */

import type { BindingContext } from '../types/index.js'
import type { ClassificationErrorCode } from './codes.js'

/**
 * Base error with string code and optional details
 */
export class SwitchyardError extends Error {
  constructor(
    /** String error code (e.g., 'ARITY_MISMATCH', 'NOT_A_MEDIATOR') */
    public readonly code: string,
    message: string,
    public readonly details?: unknown
  ) {
    super(message)
    this.name = 'SwitchyardError'
  }

  /**
   * Convert to plain object for serialization
   */
  toJSON(): { code: string; message: string; details?: unknown } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details !== undefined && { details: this.details }),
    }
  }
}

const CONTEXT_LABELS: Record<BindingContext, string> = {
  incoming: 'an incoming channel',
  outgoing: 'an outgoing channel',
  'incoming-outgoing': 'incoming and outgoing channels',
}

/**
 * A mediator signature that matches no supported pattern
 *
 * @example
 * ```typescript
 * // Invalid mediator bound to an outgoing channel: Price Prices#emit(Order) - no parameters expected
 * ```
 */
export class ConfigurationError extends SwitchyardError {
  constructor(
    code: ClassificationErrorCode,
    /** Binding annotations that were present */
    public readonly context: BindingContext,
    /** Diagnostic identity of the offending signature */
    public readonly identity: string,
    /** Why the signature was rejected */
    public readonly reason: string,
    /** Declaration as shown in the message (default: identity) */
    public readonly declaration: string = identity
  ) {
    super(
      code,
      `Invalid mediator bound to ${CONTEXT_LABELS[context]}: ${declaration} - ${reason}`,
      { context, identity, declaration, reason }
    )
    this.name = 'ConfigurationError'
  }
}

/**
 * Every classification failure of one startup pass
 */
export class AggregateConfigurationError extends SwitchyardError {
  constructor(public readonly errors: readonly ConfigurationError[]) {
    super(
      'CONFIGURATION_FAILED',
      [
        `${errors.length} mediator(s) failed configuration:`,
        ...errors.map((e) => `  - ${e.identity}: ${e.reason}`),
      ].join('\n'),
      { errors: errors.map((e) => e.toJSON()) }
    )
    this.name = 'AggregateConfigurationError'
  }
}
