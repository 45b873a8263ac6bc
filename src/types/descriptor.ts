/**
 * Type Descriptor Types
 *
 * A TypeDescriptor is the registration-time description of a declared type.
 * Capabilities (stream source, stream sink, async value, envelope) are carried
 * by the `kind` tag so the classifier never has to test assignability.
 */

/**
 * Declared type kinds
 */
export type TypeKind =
  | 'payload'            // Plain value
  | 'void'               // Empty return
  | 'envelope'           // Message<T> - payload + metadata + ack
  | 'async'              // Promise<T> - single future value
  | 'stream'             // Publisher<T>
  | 'stream-builder'     // PublisherBuilder<T>
  | 'processor'          // Processor<I, O> - source and sink
  | 'processor-builder'  // ProcessorBuilder<I, O>
  | 'subscriber'         // Subscriber<T>

/**
 * Declared type, possibly generic
 */
export interface TypeDescriptor {
  /** Capability tag */
  readonly kind: TypeKind

  /** Display name (diagnostics only) */
  readonly name: string

  /** Declared type arguments - empty when the type is raw */
  readonly typeArguments: readonly TypeDescriptor[]
}
