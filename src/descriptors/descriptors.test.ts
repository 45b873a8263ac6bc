import { describe, it, expect } from 'vitest'
import {
  Types,
  defineSignature,
  signatureIdentity,
  isStreamType,
  isRawStreamType,
  isBuilderStreamType,
  isProcessorType,
  isSubscriberType,
  isBuilderFamily,
  typeArgument,
  producedElement,
  consumedElement,
  formatType,
  formatSignature,
} from './index.js'
import { SwitchyardError } from '../errors/index.js'

const order = Types.payload('Order')

describe('Types', () => {
  it('should build frozen descriptors', () => {
    const stream = Types.stream(order)

    expect(stream).toEqual({ kind: 'stream', name: 'Publisher', typeArguments: [order] })
    expect(Object.isFrozen(stream)).toBe(true)
    expect(Object.isFrozen(stream.typeArguments)).toBe(true)
  })

  it('should describe omitted arguments as a raw type', () => {
    expect(Types.stream().typeArguments).toEqual([])
    expect(Types.processor().typeArguments).toEqual([])
    expect(Types.processor(order).typeArguments).toEqual([order])
  })

  it('should reject an omitted argument followed by a declared one', () => {
    let error: unknown
    try {
      Types.processor(undefined, order)
    } catch (err) {
      error = err
    }

    expect(error).toBeInstanceOf(SwitchyardError)
    expect(error instanceof SwitchyardError && error.code).toBe('INVALID_DESCRIPTOR')
    expect(error instanceof SwitchyardError && error.message).toBe(
      'Invalid type arguments of Processor: 0: omitted before a declared type argument'
    )
    expect(() => Types.processorBuilder(undefined, order)).toThrow(
      'Invalid type arguments of ProcessorBuilder: 0: omitted before a declared type argument'
    )
  })

  it('should default the payload name', () => {
    expect(Types.payload().name).toBe('Object')
  })
})

describe('capabilities', () => {
  it.each([
    ['stream', Types.stream(order), { stream: true, raw: true, builder: false, processor: false, subscriber: false }],
    ['stream-builder', Types.streamBuilder(order), { stream: true, raw: false, builder: true, processor: false, subscriber: false }],
    ['processor', Types.processor(order, order), { stream: true, raw: true, builder: false, processor: true, subscriber: true }],
    ['processor-builder', Types.processorBuilder(order, order), { stream: false, raw: false, builder: false, processor: true, subscriber: false }],
    ['subscriber', Types.subscriber(order), { stream: false, raw: false, builder: false, processor: false, subscriber: true }],
    ['async', Types.async(order), { stream: false, raw: false, builder: false, processor: false, subscriber: false }],
  ])('should classify %s', (_, type, expected) => {
    expect(isStreamType(type)).toBe(expected.stream)
    expect(isRawStreamType(type)).toBe(expected.raw)
    expect(isBuilderStreamType(type)).toBe(expected.builder)
    expect(isProcessorType(type)).toBe(expected.processor)
    expect(isSubscriberType(type)).toBe(expected.subscriber)
  })

  it('should group builders into one family', () => {
    expect(isBuilderFamily(Types.streamBuilder(order))).toBe(true)
    expect(isBuilderFamily(Types.processorBuilder(order, order))).toBe(true)
    expect(isBuilderFamily(Types.stream(order))).toBe(false)
  })
})

describe('element extraction', () => {
  const input = Types.payload('In')
  const output = Types.payload('Out')

  it('should return undefined past the declared arguments', () => {
    expect(typeArgument(Types.stream(order), 1)).toBeUndefined()
    expect(typeArgument(order, 0)).toBeUndefined()
  })

  it('should produce the output argument of a processor', () => {
    expect(producedElement(Types.processor(input, output))).toBe(output)
    expect(producedElement(Types.processorBuilder(input, output))).toBe(output)
    expect(producedElement(Types.stream(input))).toBe(input)
  })

  it('should consume the first argument', () => {
    expect(consumedElement(Types.processor(input, output))).toBe(input)
    expect(consumedElement(Types.subscriber(input))).toBe(input)
  })
})

describe('format', () => {
  it('should format nested generics', () => {
    expect(formatType(Types.streamBuilder(Types.envelope(order)))).toBe('PublisherBuilder<Message<Order>>')
    expect(formatType(Types.processor(order, Types.envelope(order)))).toBe(
      'Processor<Order, Message<Order>>'
    )
  })

  it('should format a signature', () => {
    const signature = defineSignature({
      identity: signatureIdentity('Orders', 'price'),
      returns: Types.async(order),
      parameters: [Types.envelope(order), order],
    })

    expect(formatSignature(signature)).toBe('Promise<Order> Orders#price(Message<Order>, Order)')
  })
})

describe('defineSignature', () => {
  it('should default to no parameters', () => {
    const signature = defineSignature({ identity: 'Orders#emit', returns: order })

    expect(signature.parameterTypes).toEqual([])
    expect(Object.isFrozen(signature)).toBe(true)
  })
})
