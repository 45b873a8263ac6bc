import { describe, it, expect } from 'vitest'
import { pino } from 'pino'
import { createMediatorRegistry } from './registry.js'
import { Types, defineSignature, signatureIdentity } from '../descriptors/index.js'
import { AggregateConfigurationError, SwitchyardError } from '../errors/index.js'
import { Shape } from '../types/index.js'
import type { TypeDescriptor } from '../types/index.js'

const order = Types.payload('Order')

function sig(method: string, returns: TypeDescriptor, parameters: TypeDescriptor[] = []) {
  return defineSignature({ identity: signatureIdentity('Orders', method), returns, parameters })
}

function catchError(fn: () => unknown): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }
  return undefined
}

describe('MediatorRegistry', () => {
  describe('registration', () => {
    it('should register a mediator', () => {
      const registry = createMediatorRegistry()

      registry.register(sig('emit', order), { outgoing: { channel: 'orders' } })

      expect(registry.has('Orders#emit')).toBe(true)
      expect(registry.list()).toHaveLength(1)
    })

    it('should reject a declaration with neither binding', () => {
      const registry = createMediatorRegistry()

      const error = catchError(() => registry.register(sig('noop', order), {}))

      expect(error).toBeInstanceOf(SwitchyardError)
      expect(error instanceof SwitchyardError && error.code).toBe('NOT_A_MEDIATOR')
      expect(registry.has('Orders#noop')).toBe(false)
    })

    it('should treat null bindings as absent', () => {
      const registry = createMediatorRegistry()

      expect(() =>
        registry.register(sig('noop', order), { incoming: null, outgoing: null })
      ).toThrow(/declares neither an incoming nor an outgoing channel/)
    })

    it('should prevent duplicate registration', () => {
      const registry = createMediatorRegistry()

      registry.register(sig('emit', order), { outgoing: { channel: 'orders' } })

      expect(() =>
        registry.register(sig('emit', order), { outgoing: { channel: 'other' } })
      ).toThrow(/already registered/)
    })

    it('should reject an empty channel name', () => {
      const registry = createMediatorRegistry()

      expect(() =>
        registry.register(sig('sink', Types.voidType(), [order]), { incoming: { channel: '  ' } })
      ).toThrow('Invalid bindings of Orders#sink: incoming.channel: channel name must not be empty')
    })

    it('should list declarations in registration order', () => {
      const registry = createMediatorRegistry()

      registry.register(sig('b', order), { outgoing: { channel: 'b' } })
      registry.register(sig('a', Types.voidType(), [order]), { incoming: { channel: 'a' } })

      const [first, second] = registry.list()
      expect(first?.signature.identity).toBe('Orders#b')
      expect(first?.incoming).toBeNull()
      expect(second?.signature.identity).toBe('Orders#a')
      expect(second?.outgoing).toBeNull()
    })
  })

  describe('build()', () => {
    it('should classify every mediator', () => {
      const registry = createMediatorRegistry()

      registry.register(sig('emit', Types.stream(order)), { outgoing: { channel: 'orders' } })
      registry.register(sig('price', order, [order]), {
        incoming: { channel: 'orders' },
        outgoing: { channel: 'priced' },
      })
      registry.register(sig('store', Types.voidType(), [order]), { incoming: { channel: 'priced' } })

      const configurations = registry.build()

      expect(configurations.map((c) => c.shape)).toEqual([
        Shape.PUBLISHER,
        Shape.PROCESSOR,
        Shape.SUBSCRIBER,
      ])
      expect(registry.get('Orders#price')?.outgoingChannelName).toBe('priced')
    })

    it('should report every failing mediator at once', () => {
      const registry = createMediatorRegistry()

      registry.register(sig('emit', order, [order]), { outgoing: { channel: 'orders' } })
      registry.register(sig('store', Types.voidType(), [order]), { incoming: { channel: 'orders' } })
      registry.register(sig('watch', Types.subscriber()), { incoming: { channel: 'orders' } })

      const error = catchError(() => registry.build())

      expect(error).toBeInstanceOf(AggregateConfigurationError)
      if (!(error instanceof AggregateConfigurationError)) return
      expect(error.code).toBe('CONFIGURATION_FAILED')
      expect(error.errors.map((e) => e.identity)).toEqual(['Orders#emit', 'Orders#watch'])
      expect(error.message).toBe(
        [
          '2 mediator(s) failed configuration:',
          '  - Orders#emit: no parameters expected',
          '  - Orders#watch: the returned subscriber must declare a type parameter',
        ].join('\n')
      )
    })

    it('should keep configurations of mediators that classified', () => {
      const registry = createMediatorRegistry()

      registry.register(sig('emit', order, [order]), { outgoing: { channel: 'orders' } })
      registry.register(sig('store', Types.voidType(), [order]), { incoming: { channel: 'orders' } })

      const report = registry.compute()

      expect(report.errors).toHaveLength(1)
      expect(report.configurations).toHaveLength(1)
      expect(registry.get('Orders#store')?.shape).toBe(Shape.SUBSCRIBER)
      expect(registry.get('Orders#emit')).toBeUndefined()
    })
  })

  describe('failFast', () => {
    it('should stop at the first failure', () => {
      const registry = createMediatorRegistry({ failFast: true })

      registry.register(sig('first', Types.stream(order)), { outgoing: { channel: 'a' } })
      registry.register(sig('broken', Types.voidType()), { outgoing: { channel: 'b' } })
      registry.register(sig('never', order, [order]), { outgoing: { channel: 'c' } })
      registry.register(sig('after', Types.voidType(), [order]), { incoming: { channel: 'a' } })

      const report = registry.compute()

      expect(report.errors.map((e) => e.identity)).toEqual(['Orders#broken'])
      expect(report.configurations.map((c) => c.identity)).toEqual(['Orders#first'])
      expect(registry.get('Orders#after')).toBeUndefined()
    })
  })

  describe('logging', () => {
    it('should log each failure through the given logger', () => {
      const lines: string[] = []
      const logger = pino({ level: 'debug' }, { write: (line: string) => void lines.push(line) })
      const registry = createMediatorRegistry({ logger })

      registry.register(sig('emit', Types.voidType()), { outgoing: { channel: 'orders' } })
      registry.compute()

      const records: Array<Record<string, unknown>> = lines.map((line) => JSON.parse(line))
      const failure = records.find((r) => r.msg === 'Mediator configuration failed')

      expect(failure?.identity).toBe('Orders#emit')
      expect(failure?.code).toBe('VOID_RETURN')
      expect(failure?.reason).toBe('the method must not be void')
      expect(records.some((r) => r.msg === 'Registered mediator')).toBe(true)
    })
  })
})
