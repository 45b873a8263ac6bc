/**
 * Error Factories
 *
 * Pre-built error helpers. Classification factories take the binding context
 * and signature first so a validation branch can bind them once.
 */

import type { BindingContext, Signature } from '../types/index.js'
import { formatSignature } from '../descriptors/format.js'
import type { ClassificationErrorCode } from './codes.js'
import { ConfigurationError, SwitchyardError } from './errors.js'

/**
 * Issue reported by descriptor validation
 */
export interface DescriptorIssue {
  path: string
  message: string
}

function rejected(
  code: ClassificationErrorCode,
  context: BindingContext,
  signature: Signature,
  reason: string
): ConfigurationError {
  return new ConfigurationError(code, context, signature.identity, reason, formatSignature(signature))
}

/**
 * Pre-built error factories for consistent error handling
 *
 * @example
 * ```typescript
 * Errors.arity('outgoing', signature, 'no parameters expected')
 * // ConfigurationError { code: 'ARITY_MISMATCH', reason: 'no parameters expected' }
 * ```
 */
export const Errors = {
  /**
   * Wrong parameter count for the deduced shape
   */
  arity(context: BindingContext, signature: Signature, reason: string): ConfigurationError {
    return rejected('ARITY_MISMATCH', context, signature, reason)
  },

  /**
   * Generic container declared without the required type argument
   */
  missingTypeArgument(
    context: BindingContext,
    signature: Signature,
    reason: string
  ): ConfigurationError {
    return rejected('MISSING_TYPE_ARGUMENT', context, signature, reason)
  },

  /**
   * Source declared with a void return
   */
  voidReturn(context: BindingContext, signature: Signature): ConfigurationError {
    return rejected('VOID_RETURN', context, signature, 'the method must not be void')
  },

  /**
   * No supported pattern matches
   */
  unsupported(context: BindingContext, signature: Signature): ConfigurationError {
    return rejected('UNSUPPORTED_SIGNATURE', context, signature, 'unsupported signature')
  },

  /**
   * Declaration with neither binding
   * @param identity - Identity of the rejected signature
   */
  notAMediator(identity: string): SwitchyardError {
    return new SwitchyardError(
      'NOT_A_MEDIATOR',
      `${identity} declares neither an incoming nor an outgoing channel`,
      { identity }
    )
  },

  /**
   * Identity registered twice
   */
  alreadyRegistered(identity: string): SwitchyardError {
    return new SwitchyardError(
      'ALREADY_REGISTERED',
      `Mediator '${identity}' already registered`,
      { identity }
    )
  },

  /**
   * Signature metadata failed schema validation
   * @param what - What was being parsed (e.g., 'signature', 'manifest')
   * @param issues - One entry per failing path
   */
  invalidDescriptor(what: string, issues: DescriptorIssue[]): SwitchyardError {
    const message = issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ')
    return new SwitchyardError('INVALID_DESCRIPTOR', `Invalid ${what}: ${message}`, { issues })
  },
} as const

/**
 * Type of the Errors object
 */
export type ErrorFactories = typeof Errors
