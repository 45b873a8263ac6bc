// Descriptor types
export type { TypeKind, TypeDescriptor } from './descriptor.js'

// Signature types
export type {
  Signature,
  ChannelBinding,
  MediatorBindings,
  BindingContext,
} from './signature.js'

// Configuration types
export { Shape, Production, Consumption } from './configuration.js'
export type { MediatorConfiguration } from './configuration.js'
