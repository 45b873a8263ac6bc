/**
 * switchyard - Mediator Signature Classification
 *
 * Classifies declared mediator signatures into processing shapes ahead of
 * any message traffic.
 */

// === Core ===
export { classify, tryClassify, deduceShape, createMediatorRegistry } from './core/index.js'
export type {
  ClassificationResult,
  MediatorRegistry,
  MediatorRegistryOptions,
  MediatorDeclaration,
  RegistryReport,
} from './core/index.js'

// === Types ===
export { Shape, Production, Consumption } from './types/index.js'
export type {
  TypeKind,
  TypeDescriptor,
  Signature,
  ChannelBinding,
  MediatorBindings,
  BindingContext,
  MediatorConfiguration,
} from './types/index.js'

// === Descriptors ===
export {
  Types,
  DEFAULT_TYPE_NAMES,
  defineSignature,
  signatureIdentity,
  isRawStreamType,
  isBuilderStreamType,
  isStreamType,
  isProcessorType,
  isSubscriberType,
  isBuilderFamily,
  isEnvelope,
  isAsync,
  isVoid,
  typeArgument,
  producedElement,
  consumedElement,
  formatType,
  formatSignature,
} from './descriptors/index.js'
export type { SignatureDefinition } from './descriptors/index.js'

// === Validation ===
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
} from './validation/index.js'
export type { TypeDescriptorInput, MediatorManifestEntry } from './validation/index.js'

// === Errors ===
export {
  Errors,
  SwitchyardError,
  ConfigurationError,
  AggregateConfigurationError,
  ErrorCodes,
  getErrorCode,
  isErrorCode,
  isClassificationCode,
} from './errors/index.js'
export type {
  ErrorFactories,
  DescriptorIssue,
  ErrorCode,
  ErrorCodeDef,
  ClassificationErrorCode,
} from './errors/index.js'

// === Utils ===
export { createLogger, getLogger } from './utils/logger.js'
