/**
 * Descriptors Module
 *
 * Registration-time description of mediator signatures.
 */

export { Types, DEFAULT_TYPE_NAMES, defineSignature, signatureIdentity } from './builders.js'
export type { SignatureDefinition } from './builders.js'

export {
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
} from './capabilities.js'

export { formatType, formatSignature } from './format.js'
