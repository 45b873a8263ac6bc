/**
 * Signature Classifier
 *
 * Deduces the shape of a mediator from its bindings and declared signature,
 * then how one invocation consumes its input and produces its output.
 *
 * Every validation branch returns a result; `classify` is the only place
 * that throws.
 */

import type {
  Signature,
  ChannelBinding,
  BindingContext,
  MediatorConfiguration,
  TypeDescriptor,
} from '../types/index.js'
import { Shape, Production, Consumption } from '../types/index.js'
import {
  isStreamType,
  isRawStreamType,
  isBuilderStreamType,
  isProcessorType,
  isSubscriberType,
  isBuilderFamily,
  isEnvelope,
  isAsync,
  isVoid,
  typeArgument,
  producedElement,
  consumedElement,
} from '../descriptors/index.js'
import { Errors, type ConfigurationError } from '../errors/index.js'

/**
 * Outcome of a classification
 */
export type ClassificationResult =
  | { success: true; configuration: MediatorConfiguration }
  | { success: false; error: ConfigurationError }

/**
 * Consumption/production pair computed by a shape branch
 */
interface Modes {
  production: Production
  consumption: Consumption
  usesBuilderTypes: boolean
}

type BranchResult = { success: true; modes: Modes } | { success: false; error: ConfigurationError }

function ok(
  production: Production,
  consumption: Consumption,
  usesBuilderTypes = false
): BranchResult {
  return { success: true, modes: { production, consumption, usesBuilderTypes } }
}

function fail(error: ConfigurationError): BranchResult {
  return { success: false, error }
}

// === Envelope-flavored mode selection ===

function streamProduction(element: TypeDescriptor | undefined): Production {
  return element && isEnvelope(element) ? Production.STREAM_OF_MESSAGE : Production.STREAM_OF_PAYLOAD
}

function streamConsumption(element: TypeDescriptor): Consumption {
  return isEnvelope(element) ? Consumption.STREAM_OF_MESSAGE : Consumption.STREAM_OF_PAYLOAD
}

function completionProduction(value: TypeDescriptor): Production {
  return isEnvelope(value)
    ? Production.COMPLETION_STAGE_OF_MESSAGE
    : Production.COMPLETION_STAGE_OF_PAYLOAD
}

function itemConsumption(param: TypeDescriptor): Consumption {
  return isEnvelope(param) ? Consumption.MESSAGE : Consumption.PAYLOAD
}

// === Shape deduction ===

/**
 * Deduce the shape from the bindings and, for doubly-bound mediators, from
 * whether the whole function maps a stream to a stream
 */
export function deduceShape(
  signature: Signature,
  incoming: ChannelBinding | null | undefined,
  outgoing: ChannelBinding | null | undefined
): Shape {
  if (incoming && outgoing) {
    const first = signature.parameterTypes[0]
    if (isStreamType(signature.returnType) && first !== undefined && isStreamType(first)) {
      return Shape.STREAM_TRANSFORMER
    }
    return Shape.PROCESSOR
  }
  if (incoming) {
    return Shape.SUBSCRIBER
  }
  return Shape.PUBLISHER
}

// === Shape branches ===

/**
 * Supported signatures:
 * 1. Publisher<Message<O>> method(Publisher<Message<I>>)
 * 2. Publisher<O> method(Publisher<I>)
 * 3. PublisherBuilder<Message<O>> method(PublisherBuilder<Message<I>>)
 * 4. PublisherBuilder<O> method(PublisherBuilder<I>)
 */
function validateStreamTransformer(signature: Signature): BranchResult {
  const context: BindingContext = 'incoming-outgoing'
  const { returnType, parameterTypes } = signature

  const param = parameterTypes[0]
  if (parameterTypes.length !== 1 || param === undefined) {
    return fail(Errors.arity(context, signature, 'one parameter expected'))
  }

  const produced = producedElement(returnType)
  if (!produced) {
    return fail(
      Errors.missingTypeArgument(context, signature, 'expected a type parameter for the returned stream')
    )
  }

  // The parameter is itself a stream: what it emits is what we consume
  const consumed = producedElement(param)
  if (!consumed) {
    return fail(
      Errors.missingTypeArgument(context, signature, 'expected a type parameter for the consumed stream')
    )
  }

  return ok(streamProduction(produced), streamConsumption(consumed), isBuilderFamily(returnType))
}

/**
 * Supported signatures:
 * 1. Processor<Message<I>, Message<O>> method()
 * 2. Processor<I, O> method()
 * 3. ProcessorBuilder<Message<I>, Message<O>> method()
 * 4. ProcessorBuilder<I, O> method()
 * 5. Publisher<Message<O>> method(Message<I>)
 * 6. Publisher<O> method(I)
 * 7. PublisherBuilder<Message<O>> method(Message<I>)
 * 8. PublisherBuilder<O> method(I)
 * 9. Message<O> method(Message<I>)
 * 10. O method(I)
 * 11. Promise<O> method(I)
 * 12. Promise<Message<O>> method(Message<I>)
 */
function validateProcessor(signature: Signature): BranchResult {
  const context: BindingContext = 'incoming-outgoing'
  const { returnType, parameterTypes } = signature

  if (isProcessorType(returnType)) {
    // Cases 1-4
    if (parameterTypes.length !== 0) {
      return fail(Errors.arity(context, signature, 'the method must not have parameters'))
    }
    const input = typeArgument(returnType, 0)
    const output = typeArgument(returnType, 1)
    if (!input || !output) {
      return fail(
        Errors.missingTypeArgument(
          context,
          signature,
          'expected 2 type parameters for the returned processor'
        )
      )
    }
    return ok(streamProduction(output), streamConsumption(input), isBuilderFamily(returnType))
  }

  if (isStreamType(returnType)) {
    // Cases 5-8
    const param = parameterTypes[0]
    if (parameterTypes.length !== 1 || param === undefined) {
      return fail(Errors.arity(context, signature, 'one parameter expected'))
    }
    const produced = producedElement(returnType)
    if (!produced) {
      return fail(
        Errors.missingTypeArgument(context, signature, 'expected a type parameter for the returned stream')
      )
    }
    return ok(streamProduction(produced), streamConsumption(param), isBuilderFamily(returnType))
  }

  // Cases 9-12
  let production: Production
  if (isAsync(returnType)) {
    const value = typeArgument(returnType, 0)
    if (!value) {
      return fail(
        Errors.missingTypeArgument(
          context,
          signature,
          'expected a type parameter in the return asynchronous value'
        )
      )
    }
    production = completionProduction(value)
  } else {
    production = isEnvelope(returnType) ? Production.INDIVIDUAL_MESSAGE : Production.INDIVIDUAL_PAYLOAD
  }

  const param = parameterTypes[0]
  if (parameterTypes.length !== 1 || param === undefined) {
    return fail(Errors.arity(context, signature, 'one parameter expected'))
  }
  return ok(production, itemConsumption(param))
}

/**
 * Supported signatures:
 * 1. Publisher<Message<O>> method()
 * 2. Publisher<O> method()
 * 3. PublisherBuilder<Message<O>> method()
 * 4. PublisherBuilder<O> method()
 * 5. Message<O> method()
 * 6. O method() - O cannot be void
 * 7. Promise<Message<O>> method()
 * 8. Promise<O> method()
 */
function validatePublisher(signature: Signature): BranchResult {
  const context: BindingContext = 'outgoing'
  const { returnType, parameterTypes } = signature

  if (isVoid(returnType)) {
    return fail(Errors.voidReturn(context, signature))
  }
  if (parameterTypes.length !== 0) {
    return fail(Errors.arity(context, signature, 'no parameters expected'))
  }

  if (isRawStreamType(returnType)) {
    // Cases 1, 2 - a raw Publisher emits untyped payloads
    return ok(streamProduction(producedElement(returnType)), Consumption.NONE)
  }
  if (isBuilderStreamType(returnType)) {
    // Cases 3, 4
    return ok(streamProduction(producedElement(returnType)), Consumption.NONE, true)
  }
  if (isEnvelope(returnType)) {
    // Case 5
    return ok(Production.INDIVIDUAL_MESSAGE, Consumption.NONE)
  }
  if (isAsync(returnType)) {
    // Cases 7, 8
    const value = typeArgument(returnType, 0)
    if (!value) {
      return fail(
        Errors.missingTypeArgument(
          context,
          signature,
          'expected a type parameter for the returned asynchronous value'
        )
      )
    }
    return ok(completionProduction(value), Consumption.NONE)
  }
  // Case 6, and any other declared type
  return ok(Production.INDIVIDUAL_PAYLOAD, Consumption.NONE)
}

/**
 * Supported signatures:
 * 1. Subscriber<Message<I>> method()
 * 2. Subscriber<I> method()
 * 3. Promise<unknown> method(Message<I>)
 * 4. Promise<unknown> method(I)
 * 5. void method(Message<I>)
 * 6. void method(I)
 */
function validateSubscriber(signature: Signature): BranchResult {
  const context: BindingContext = 'incoming'
  const { returnType, parameterTypes } = signature

  if (isSubscriberType(returnType)) {
    // Cases 1, 2
    if (parameterTypes.length !== 0) {
      return fail(
        Errors.arity(context, signature, 'when returning a subscriber, no parameters are expected')
      )
    }
    const element = consumedElement(returnType)
    if (!element) {
      return fail(
        Errors.missingTypeArgument(
          context,
          signature,
          'the returned subscriber must declare a type parameter'
        )
      )
    }
    return ok(Production.NONE, streamConsumption(element))
  }

  const param = parameterTypes[0]

  if (isAsync(returnType)) {
    // Cases 3, 4
    if (parameterTypes.length !== 1 || param === undefined) {
      return fail(
        Errors.arity(
          context,
          signature,
          'when returning an asynchronous value, one parameter is expected'
        )
      )
    }
    return ok(Production.NONE, itemConsumption(param))
  }

  // Cases 5, 6
  if (parameterTypes.length === 1 && param !== undefined) {
    return ok(Production.NONE, itemConsumption(param))
  }

  return fail(Errors.unsupported(context, signature))
}

function validate(shape: Shape, signature: Signature): BranchResult {
  switch (shape) {
    case Shape.SUBSCRIBER:
      return validateSubscriber(signature)
    case Shape.PUBLISHER:
      return validatePublisher(signature)
    case Shape.PROCESSOR:
      return validateProcessor(signature)
    case Shape.STREAM_TRANSFORMER:
      return validateStreamTransformer(signature)
  }
}

// === Public API ===

/**
 * Classify a signature without throwing
 *
 * @example
 * ```typescript
 * const result = tryClassify(signature, null, { channel: 'prices' })
 * if (!result.success) {
 *   console.error(result.error.message)
 * }
 * ```
 */
export function tryClassify(
  signature: Signature,
  incoming: ChannelBinding | null | undefined,
  outgoing: ChannelBinding | null | undefined
): ClassificationResult {
  const shape = deduceShape(signature, incoming, outgoing)
  const result = validate(shape, signature)
  if (!result.success) {
    return result
  }

  const configuration: MediatorConfiguration = Object.freeze({
    identity: signature.identity,
    shape,
    production: result.modes.production,
    consumption: result.modes.consumption,
    usesBuilderTypes: result.modes.usesBuilderTypes,
    incomingChannelName: incoming?.channel ?? null,
    outgoingChannelName: outgoing?.channel ?? null,
    incomingProviderTag: incoming?.provider ?? null,
    outgoingProviderTag: outgoing?.provider ?? null,
  })

  return { success: true, configuration }
}

/**
 * Classify a signature
 *
 * @throws ConfigurationError when the signature matches no supported pattern
 */
export function classify(
  signature: Signature,
  incoming: ChannelBinding | null | undefined,
  outgoing: ChannelBinding | null | undefined
): MediatorConfiguration {
  const result = tryClassify(signature, incoming, outgoing)
  if (!result.success) {
    throw result.error
  }
  return result.configuration
}
