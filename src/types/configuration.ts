/**
 * Mediator Configuration Types
 *
 * Output of the classifier, read by the stream-wiring runtime.
 */

/**
 * Structural category of a mediator
 */
export const Shape = {
  /** Sink - consumes only */
  SUBSCRIBER: 'SUBSCRIBER',
  /** Source - produces only */
  PUBLISHER: 'PUBLISHER',
  /** Consumes one item, produces an item or a stream */
  PROCESSOR: 'PROCESSOR',
  /** Maps a whole stream to a stream */
  STREAM_TRANSFORMER: 'STREAM_TRANSFORMER',
} as const

export type Shape = (typeof Shape)[keyof typeof Shape]

/**
 * What a mediator produces and how
 */
export const Production = {
  STREAM_OF_MESSAGE: 'STREAM_OF_MESSAGE',
  STREAM_OF_PAYLOAD: 'STREAM_OF_PAYLOAD',

  INDIVIDUAL_PAYLOAD: 'INDIVIDUAL_PAYLOAD',
  INDIVIDUAL_MESSAGE: 'INDIVIDUAL_MESSAGE',
  COMPLETION_STAGE_OF_PAYLOAD: 'COMPLETION_STAGE_OF_PAYLOAD',
  COMPLETION_STAGE_OF_MESSAGE: 'COMPLETION_STAGE_OF_MESSAGE',

  NONE: 'NONE',
} as const

export type Production = (typeof Production)[keyof typeof Production]

/**
 * What a mediator consumes and how
 *
 * There is no asynchronous single-value variant: a mediator never consumes a
 * Promise.
 */
export const Consumption = {
  STREAM_OF_MESSAGE: 'STREAM_OF_MESSAGE',
  STREAM_OF_PAYLOAD: 'STREAM_OF_PAYLOAD',

  MESSAGE: 'MESSAGE',
  PAYLOAD: 'PAYLOAD',

  NONE: 'NONE',
} as const

export type Consumption = (typeof Consumption)[keyof typeof Consumption]

/**
 * Classified mediator
 *
 * Frozen at construction. `production` is NONE iff the shape is SUBSCRIBER,
 * `consumption` is NONE iff the shape is PUBLISHER.
 */
export interface MediatorConfiguration {
  /** Identity of the classified signature */
  readonly identity: string

  readonly shape: Shape
  readonly production: Production
  readonly consumption: Consumption

  /** Whether the builder wrapper family was declared instead of raw streams */
  readonly usesBuilderTypes: boolean

  readonly incomingChannelName: string | null
  readonly outgoingChannelName: string | null
  readonly incomingProviderTag: string | null
  readonly outgoingProviderTag: string | null
}
