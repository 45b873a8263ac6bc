/**
 * Signature Types
 *
 * What the discovery mechanism hands over for each mediator.
 */

import type { TypeDescriptor } from './descriptor.js'

/**
 * Declared contract of a mediator function
 */
export interface Signature {
  /** Diagnostic identity, conventionally `Owner#method` */
  readonly identity: string

  /** Declared return type */
  readonly returnType: TypeDescriptor

  /** Declared parameter types, in order */
  readonly parameterTypes: readonly TypeDescriptor[]
}

/**
 * Inbound or outbound channel binding
 */
export interface ChannelBinding {
  /** Channel name (non-empty) */
  readonly channel: string

  /** Provider tag - passed through to the configuration, never inspected */
  readonly provider?: string
}

/**
 * Bindings declared on one mediator
 */
export interface MediatorBindings {
  incoming?: ChannelBinding | null
  outgoing?: ChannelBinding | null
}

/**
 * Which binding annotations a signature carries
 */
export type BindingContext = 'incoming' | 'outgoing' | 'incoming-outgoing'
