/**
 * Error exports for core
 */

export {
  CausewayError,
  ConfigError,
  ReferenceLoadError,
  SuggestionServiceError,
  LedgerSealedError,
  QualityConfigError,
  QualityCheckRuntimeError,
  wrapError,
} from './causeway-error.js';
export type { ErrorCode, CausewayErrorDetails } from './causeway-error.js';
