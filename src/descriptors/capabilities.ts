/**
 * Capability Predicates
 *
 * Closed-set dispatch over TypeKind. A processor is both a stream source and
 * a stream sink, so it answers true to isStreamType and isSubscriberType.
 */

import type { TypeDescriptor } from '../types/index.js'

/**
 * Raw stream source (Publisher, Processor)
 */
export function isRawStreamType(type: TypeDescriptor): boolean {
  return type.kind === 'stream' || type.kind === 'processor'
}

/**
 * Builder-wrapped stream source (PublisherBuilder)
 */
export function isBuilderStreamType(type: TypeDescriptor): boolean {
  return type.kind === 'stream-builder'
}

/**
 * Stream source in either family
 */
export function isStreamType(type: TypeDescriptor): boolean {
  return isRawStreamType(type) || isBuilderStreamType(type)
}

/**
 * Processor in either family
 */
export function isProcessorType(type: TypeDescriptor): boolean {
  return type.kind === 'processor' || type.kind === 'processor-builder'
}

/**
 * Raw stream sink (Subscriber, Processor)
 */
export function isSubscriberType(type: TypeDescriptor): boolean {
  return type.kind === 'subscriber' || type.kind === 'processor'
}

/**
 * Fluent builder wrapper family
 */
export function isBuilderFamily(type: TypeDescriptor): boolean {
  return type.kind === 'stream-builder' || type.kind === 'processor-builder'
}

/**
 * The envelope type (vs. a bare payload)
 */
export function isEnvelope(type: TypeDescriptor): boolean {
  return type.kind === 'envelope'
}

/**
 * Asynchronous single value
 */
export function isAsync(type: TypeDescriptor): boolean {
  return type.kind === 'async'
}

export function isVoid(type: TypeDescriptor): boolean {
  return type.kind === 'void'
}

/**
 * Type argument at position `index`, or undefined when the type is raw or
 * declares fewer arguments
 */
export function typeArgument(type: TypeDescriptor, index: number): TypeDescriptor | undefined {
  return type.typeArguments[index]
}

/**
 * Element emitted by a stream source
 *
 * Processor<I, O> emits O; every other source emits its first argument.
 */
export function producedElement(type: TypeDescriptor): TypeDescriptor | undefined {
  return typeArgument(type, isProcessorType(type) ? 1 : 0)
}

/**
 * Element accepted by a stream sink
 */
export function consumedElement(type: TypeDescriptor): TypeDescriptor | undefined {
  return typeArgument(type, 0)
}
