/**
 * Validation Module
 *
 * Schema validation of signature metadata handed over by a discovery step.
 */

export {
  TypeDescriptorSchema,
  SignatureSchema,
  ChannelBindingSchema,
  MediatorManifestEntrySchema,
  MediatorManifestSchema,
  parseTypeDescriptor,
  parseSignature,
  parseChannelBinding,
  parseManifest,
  registerManifest,
} from './signature-schema.js'

export type { TypeDescriptorInput, MediatorManifestEntry } from './signature-schema.js'
