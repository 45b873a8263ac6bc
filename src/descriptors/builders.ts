/**
 * Descriptor Builders
 *
 * Declarative construction of type descriptors and signatures at
 * registration time. Everything returned here is frozen.
 *
 * @example
 * ```typescript
 * const signature = defineSignature({
 *   identity: signatureIdentity('Prices', 'convert'),
 *   returns: Types.stream(Types.envelope(Types.payload('Price'))),
 *   parameters: [Types.payload('Price')],
 * })
 * ```
 */

import type { Signature, TypeDescriptor, TypeKind } from '../types/index.js'
import { Errors } from '../errors/index.js'

/**
 * Display name used when a descriptor is built without one
 */
export const DEFAULT_TYPE_NAMES: Record<TypeKind, string> = {
  payload: 'Object',
  void: 'void',
  envelope: 'Message',
  async: 'Promise',
  stream: 'Publisher',
  'stream-builder': 'PublisherBuilder',
  processor: 'Processor',
  'processor-builder': 'ProcessorBuilder',
  subscriber: 'Subscriber',
}

function describe(
  kind: TypeKind,
  name: string,
  typeArguments: Array<TypeDescriptor | undefined> = []
): TypeDescriptor {
  // Only trailing arguments may be omitted; those mean "declared raw"
  const args: TypeDescriptor[] = []
  for (const [index, arg] of typeArguments.entries()) {
    if (!arg) continue
    if (args.length !== index) {
      throw Errors.invalidDescriptor(`type arguments of ${name}`, [
        { path: String(args.length), message: 'omitted before a declared type argument' },
      ])
    }
    args.push(arg)
  }
  return Object.freeze({ kind, name, typeArguments: Object.freeze(args) })
}

/**
 * Type descriptor builders
 *
 * Omitting a type argument describes a raw (non-generic) declaration.
 * Only trailing arguments may be omitted: `Types.processor(undefined, out)`
 * throws INVALID_DESCRIPTOR.
 */
export const Types = {
  /** Plain value type */
  payload(name = DEFAULT_TYPE_NAMES.payload): TypeDescriptor {
    return describe('payload', name)
  },

  /** Empty return */
  voidType(): TypeDescriptor {
    return describe('void', DEFAULT_TYPE_NAMES.void)
  },

  /** Message<T> */
  envelope(payload?: TypeDescriptor): TypeDescriptor {
    return describe('envelope', DEFAULT_TYPE_NAMES.envelope, [payload])
  },

  /** Promise<T> */
  async(value?: TypeDescriptor): TypeDescriptor {
    return describe('async', DEFAULT_TYPE_NAMES.async, [value])
  },

  /** Publisher<T> */
  stream(element?: TypeDescriptor): TypeDescriptor {
    return describe('stream', DEFAULT_TYPE_NAMES.stream, [element])
  },

  /** PublisherBuilder<T> */
  streamBuilder(element?: TypeDescriptor): TypeDescriptor {
    return describe('stream-builder', DEFAULT_TYPE_NAMES['stream-builder'], [element])
  },

  /** Processor<I, O> */
  processor(input?: TypeDescriptor, output?: TypeDescriptor): TypeDescriptor {
    return describe('processor', DEFAULT_TYPE_NAMES.processor, [input, output])
  },

  /** ProcessorBuilder<I, O> */
  processorBuilder(input?: TypeDescriptor, output?: TypeDescriptor): TypeDescriptor {
    return describe('processor-builder', DEFAULT_TYPE_NAMES['processor-builder'], [input, output])
  },

  /** Subscriber<T> */
  subscriber(element?: TypeDescriptor): TypeDescriptor {
    return describe('subscriber', DEFAULT_TYPE_NAMES.subscriber, [element])
  },

  /** Any kind under a custom display name */
  named(kind: TypeKind, name: string, typeArguments: TypeDescriptor[] = []): TypeDescriptor {
    return describe(kind, name, typeArguments)
  },
} as const

/**
 * Signature definition
 */
export interface SignatureDefinition {
  /** Diagnostic identity (see signatureIdentity) */
  identity: string
  /** Declared return type */
  returns: TypeDescriptor
  /** Declared parameter types (default: none) */
  parameters?: TypeDescriptor[]
}

/**
 * Define a frozen signature
 */
export function defineSignature(definition: SignatureDefinition): Signature {
  return Object.freeze({
    identity: definition.identity,
    returnType: definition.returns,
    parameterTypes: Object.freeze([...(definition.parameters ?? [])]),
  })
}

/**
 * Conventional diagnostic identity: `Owner#method`
 */
export function signatureIdentity(owner: string, method: string): string {
  return `${owner}#${method}`
}
