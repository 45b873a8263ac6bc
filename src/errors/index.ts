/**
 * Error Module
 *
 * Error types, error factories, and error code definitions.
 */

export { Errors, type ErrorFactories, type DescriptorIssue } from './factories.js'

export {
  SwitchyardError,
  ConfigurationError,
  AggregateConfigurationError,
} from './errors.js'

export {
  ErrorCodes,
  type ErrorCode,
  type ErrorCodeDef,
  type ClassificationErrorCode,
  getErrorCode,
  isErrorCode,
  isClassificationCode,
} from './codes.js'
