/**
 * Mediator Registry
 *
 * Collects mediator declarations handed over by the discovery mechanism and
 * classifies them all in one startup pass. A failed pass reports every
 * offending mediator at once and aborts startup.
 */

import type { Logger } from 'pino'
import type {
  Signature,
  ChannelBinding,
  MediatorBindings,
  MediatorConfiguration,
} from '../types/index.js'
import {
  Errors,
  AggregateConfigurationError,
  type ConfigurationError,
  type DescriptorIssue,
} from '../errors/index.js'
import { createLogger } from '../utils/logger.js'
import { tryClassify } from './classifier.js'

/**
 * A registered mediator
 */
export interface MediatorDeclaration {
  signature: Signature
  incoming: ChannelBinding | null
  outgoing: ChannelBinding | null
}

/**
 * Outcome of one classification pass
 */
export interface RegistryReport {
  /** Configurations of every mediator that classified, in registration order */
  configurations: MediatorConfiguration[]
  /** Every classification failure, in registration order */
  errors: ConfigurationError[]
}

/**
 * Registry options
 */
export interface MediatorRegistryOptions {
  /** Stop at the first failing mediator (default: false, report all) */
  failFast?: boolean
  /** Logger (default: component logger 'registry') */
  logger?: Logger
}

/**
 * Registry interface
 */
export interface MediatorRegistry {
  // === Registration ===

  /** Register a mediator signature with its bindings */
  register(signature: Signature, bindings: MediatorBindings): void

  // === Classification ===

  /** Classify every registered mediator */
  compute(): RegistryReport

  /** Classify every registered mediator, throwing if any failed */
  build(): MediatorConfiguration[]

  // === Lookup ===

  /** Check if an identity is registered */
  has(identity: string): boolean

  /** Configuration from the last pass, if the mediator classified */
  get(identity: string): MediatorConfiguration | undefined

  /** List all declarations in registration order */
  list(): MediatorDeclaration[]
}

function bindingIssues(bindings: MediatorBindings): DescriptorIssue[] {
  const issues: DescriptorIssue[] = []
  for (const key of ['incoming', 'outgoing'] as const) {
    const binding = bindings[key]
    if (binding && binding.channel.trim() === '') {
      issues.push({ path: `${key}.channel`, message: 'channel name must not be empty' })
    }
  }
  return issues
}

/**
 * Create a new MediatorRegistry
 */
export function createMediatorRegistry(options: MediatorRegistryOptions = {}): MediatorRegistry {
  const logger = options.logger ?? createLogger('registry')
  const failFast = options.failFast ?? false

  const declarations = new Map<string, MediatorDeclaration>()
  let computed = new Map<string, MediatorConfiguration>()

  function compute(): RegistryReport {
    const configurations: MediatorConfiguration[] = []
    const errors: ConfigurationError[] = []
    computed = new Map()

    for (const { signature, incoming, outgoing } of declarations.values()) {
      const result = tryClassify(signature, incoming, outgoing)

      if (!result.success) {
        logger.error(
          { identity: signature.identity, code: result.error.code, reason: result.error.reason },
          'Mediator configuration failed'
        )
        errors.push(result.error)
        if (failFast) break
        continue
      }

      const { configuration } = result
      computed.set(signature.identity, configuration)
      configurations.push(configuration)
      logger.debug(
        {
          identity: configuration.identity,
          shape: configuration.shape,
          production: configuration.production,
          consumption: configuration.consumption,
        },
        'Classified mediator'
      )
    }

    return { configurations, errors }
  }

  return {
    // === Registration ===

    register(signature: Signature, bindings: MediatorBindings): void {
      const { identity } = signature
      const incoming = bindings.incoming ?? null
      const outgoing = bindings.outgoing ?? null

      if (!incoming && !outgoing) {
        throw Errors.notAMediator(identity)
      }
      if (declarations.has(identity)) {
        throw Errors.alreadyRegistered(identity)
      }
      const issues = bindingIssues(bindings)
      if (issues.length > 0) {
        throw Errors.invalidDescriptor(`bindings of ${identity}`, issues)
      }

      declarations.set(identity, { signature, incoming, outgoing })
      logger.debug(
        { identity, incoming: incoming?.channel, outgoing: outgoing?.channel },
        'Registered mediator'
      )
    },

    // === Classification ===

    compute,

    build(): MediatorConfiguration[] {
      const report = compute()
      if (report.errors.length > 0) {
        throw new AggregateConfigurationError(report.errors)
      }
      logger.info({ total: report.configurations.length }, 'Mediators configured')
      return report.configurations
    },

    // === Lookup ===

    has(identity: string): boolean {
      return declarations.has(identity)
    },

    get(identity: string): MediatorConfiguration | undefined {
      return computed.get(identity)
    },

    list(): MediatorDeclaration[] {
      return Array.from(declarations.values())
    },
  }
}
