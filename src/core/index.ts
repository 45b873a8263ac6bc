// Classifier
export { classify, tryClassify, deduceShape } from './classifier.js'
export type { ClassificationResult } from './classifier.js'

// Registry
export { createMediatorRegistry } from './registry.js'
export type {
  MediatorRegistry,
  MediatorRegistryOptions,
  MediatorDeclaration,
  RegistryReport,
} from './registry.js'
