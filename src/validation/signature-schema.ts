/**
 * Signature Metadata Schemas
 *
 * Turns weakly-structured signature metadata (for instance a JSON manifest
 * written by a build step) into validated, frozen descriptors.
 *
 * @example
 * ```typescript
 * const entries = parseManifest(JSON.parse(await readFile('mediators.json', 'utf8')))
 * registerManifest(registry, entries)
 * ```
 */

import { z } from 'zod'
import type { ChannelBinding, Signature, TypeDescriptor, TypeKind } from '../types/index.js'
import { DEFAULT_TYPE_NAMES, Types, defineSignature } from '../descriptors/index.js'
import { Errors, type DescriptorIssue } from '../errors/index.js'
import type { MediatorRegistry } from '../core/registry.js'

const TYPE_KINDS = [
  'payload',
  'void',
  'envelope',
  'async',
  'stream',
  'stream-builder',
  'processor',
  'processor-builder',
  'subscriber',
] as const satisfies readonly TypeKind[]

/**
 * Type descriptor as written in metadata
 */
export interface TypeDescriptorInput {
  kind: TypeKind
  name?: string
  typeArguments?: TypeDescriptorInput[]
}

export const TypeDescriptorSchema: z.ZodType<TypeDescriptorInput> = z.lazy(() =>
  z.object({
    kind: z.enum(TYPE_KINDS),
    name: z.string().min(1).optional(),
    typeArguments: z.array(TypeDescriptorSchema).optional(),
  })
)

export const SignatureSchema = z.object({
  identity: z.string().min(1),
  returns: TypeDescriptorSchema,
  parameters: z.array(TypeDescriptorSchema).default([]),
})

export const ChannelBindingSchema = z.object({
  channel: z.string().trim().min(1, 'channel name must not be empty'),
  provider: z.string().optional(),
})

export const MediatorManifestEntrySchema = z.object({
  signature: SignatureSchema,
  incoming: ChannelBindingSchema.nullish(),
  outgoing: ChannelBindingSchema.nullish(),
})

export const MediatorManifestSchema = z.array(MediatorManifestEntrySchema)

/**
 * One validated manifest entry
 */
export interface MediatorManifestEntry {
  signature: Signature
  incoming: ChannelBinding | null
  outgoing: ChannelBinding | null
}

function toIssues(error: z.ZodError): DescriptorIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.map(String).join('.'),
    message: issue.message,
  }))
}

function toDescriptor(input: TypeDescriptorInput): TypeDescriptor {
  return Types.named(
    input.kind,
    input.name ?? DEFAULT_TYPE_NAMES[input.kind],
    (input.typeArguments ?? []).map(toDescriptor)
  )
}

function toSignature(input: z.infer<typeof SignatureSchema>): Signature {
  return defineSignature({
    identity: input.identity,
    returns: toDescriptor(input.returns),
    parameters: input.parameters.map(toDescriptor),
  })
}

function toBinding(input: z.infer<typeof ChannelBindingSchema>): ChannelBinding {
  return Object.freeze(
    input.provider === undefined
      ? { channel: input.channel }
      : { channel: input.channel, provider: input.provider }
  )
}

/**
 * Parse a single type descriptor
 *
 * @throws SwitchyardError with INVALID_DESCRIPTOR code
 */
export function parseTypeDescriptor(input: unknown): TypeDescriptor {
  const result = TypeDescriptorSchema.safeParse(input)
  if (!result.success) {
    throw Errors.invalidDescriptor('type descriptor', toIssues(result.error))
  }
  return toDescriptor(result.data)
}

/**
 * Parse a signature
 *
 * @throws SwitchyardError with INVALID_DESCRIPTOR code
 */
export function parseSignature(input: unknown): Signature {
  const result = SignatureSchema.safeParse(input)
  if (!result.success) {
    throw Errors.invalidDescriptor('signature', toIssues(result.error))
  }
  return toSignature(result.data)
}

/**
 * Parse a channel binding
 *
 * @throws SwitchyardError with INVALID_DESCRIPTOR code
 */
export function parseChannelBinding(input: unknown): ChannelBinding {
  const result = ChannelBindingSchema.safeParse(input)
  if (!result.success) {
    throw Errors.invalidDescriptor('channel binding', toIssues(result.error))
  }
  return toBinding(result.data)
}

/**
 * Parse a manifest: an array of `{ signature, incoming?, outgoing? }`
 *
 * @throws SwitchyardError with INVALID_DESCRIPTOR code
 */
export function parseManifest(input: unknown): MediatorManifestEntry[] {
  const result = MediatorManifestSchema.safeParse(input)
  if (!result.success) {
    throw Errors.invalidDescriptor('manifest', toIssues(result.error))
  }
  return result.data.map((entry) => ({
    signature: toSignature(entry.signature),
    incoming: entry.incoming ? toBinding(entry.incoming) : null,
    outgoing: entry.outgoing ? toBinding(entry.outgoing) : null,
  }))
}

/**
 * Register every manifest entry
 */
export function registerManifest(
  registry: MediatorRegistry,
  entries: MediatorManifestEntry[]
): void {
  for (const { signature, incoming, outgoing } of entries) {
    registry.register(signature, { incoming, outgoing })
  }
}
