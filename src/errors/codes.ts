/**
 * Error Codes
 *
 * Central definition of every switchyard error code. Classification codes
 * describe a static mistake in a mediator signature; registry codes describe
 * a mistake in what the discovery mechanism handed over.
 */

/**
 * Error code definition
 */
export interface ErrorCodeDef {
  /** String identifier (e.g., 'ARITY_MISMATCH') */
  code: string
  /** Default message */
  message: string
}

/**
 * All switchyard error codes
 */
export const ErrorCodes = {
  // ─────────────────────────────────────────────────────────────
  // Classification
  // ─────────────────────────────────────────────────────────────

  /** Wrong number of parameters for the deduced shape */
  ARITY_MISMATCH: {
    code: 'ARITY_MISMATCH',
    message: 'Unexpected number of parameters',
  },

  /** A generic container was declared raw */
  MISSING_TYPE_ARGUMENT: {
    code: 'MISSING_TYPE_ARGUMENT',
    message: 'Missing type argument',
  },

  /** A source declared an empty return */
  VOID_RETURN: {
    code: 'VOID_RETURN',
    message: 'Void return',
  },

  /** No supported pattern matches */
  UNSUPPORTED_SIGNATURE: {
    code: 'UNSUPPORTED_SIGNATURE',
    message: 'Unsupported signature',
  },

  // ─────────────────────────────────────────────────────────────
  // Registry / discovery boundary
  // ─────────────────────────────────────────────────────────────

  /** Declaration carries neither an incoming nor an outgoing binding */
  NOT_A_MEDIATOR: {
    code: 'NOT_A_MEDIATOR',
    message: 'Not a mediator',
  },

  /** Same identity registered twice */
  ALREADY_REGISTERED: {
    code: 'ALREADY_REGISTERED',
    message: 'Already registered',
  },

  /** Signature metadata failed schema validation */
  INVALID_DESCRIPTOR: {
    code: 'INVALID_DESCRIPTOR',
    message: 'Invalid descriptor',
  },

  /** One or more mediators failed classification */
  CONFIGURATION_FAILED: {
    code: 'CONFIGURATION_FAILED',
    message: 'Mediator configuration failed',
  },
} as const satisfies Record<string, ErrorCodeDef>

/**
 * Error code type (string union)
 */
export type ErrorCode = keyof typeof ErrorCodes

/**
 * Codes a ConfigurationError can carry
 */
export type ClassificationErrorCode =
  | 'ARITY_MISMATCH'
  | 'MISSING_TYPE_ARGUMENT'
  | 'VOID_RETURN'
  | 'UNSUPPORTED_SIGNATURE'

/**
 * Get error code definition by string code
 */
export function getErrorCode(code: string): ErrorCodeDef {
  if (isErrorCode(code)) {
    return ErrorCodes[code]
  }

  return {
    code,
    message: code,
  }
}

/**
 * Check if a string is a known error code
 */
export function isErrorCode(code: string): code is ErrorCode {
  return Object.prototype.hasOwnProperty.call(ErrorCodes, code)
}

/**
 * Check if a code describes a signature classification failure
 */
export function isClassificationCode(code: string): code is ClassificationErrorCode {
  switch (code) {
    case 'ARITY_MISMATCH':
    case 'MISSING_TYPE_ARGUMENT':
    case 'VOID_RETURN':
    case 'UNSUPPORTED_SIGNATURE':
      return true
    default:
      return false
  }
}
