/**
 * Diagnostic formatting for descriptors and signatures
 */

import type { Signature, TypeDescriptor } from '../types/index.js'

/**
 * Format a type the way it would be declared
 *
 * @example
 * ```typescript
 * formatType(Types.stream(Types.envelope(Types.payload('Order'))))
 * // 'Publisher<Message<Order>>'
 * ```
 */
export function formatType(type: TypeDescriptor): string {
  if (type.typeArguments.length === 0) {
    return type.name
  }
  return `${type.name}<${type.typeArguments.map(formatType).join(', ')}>`
}

/**
 * Format a signature as `ReturnType Owner#method(Param, ...)`
 */
export function formatSignature(signature: Signature): string {
  const params = signature.parameterTypes.map(formatType).join(', ')
  return `${formatType(signature.returnType)} ${signature.identity}(${params})`
}
